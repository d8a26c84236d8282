// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@vefee/distributor/tests/_fakes/fake-fee-token`
 * Purpose: In-memory ERC-20 ledger implementing FeeToken for the distributor's holdings.
 * Scope: Balances, plain transfers out of the distributor, transferFrom without allowances. Does not model approvals or fees on transfer.
 * Invariants: Insufficient balance returns false and moves nothing.
 * Side-effects: none (in-memory only)
 * Notes: failTransfers("revert") makes transfer return false; failTransfers("throw") makes it throw. rejectRecipient() fails transfers to one account only.
 * Links: src/ports/fee-token.port.ts
 * @public
 */

import type { Account } from "@vefee/ledger-core";

import type { FeeToken } from "../../src/ports";

export type TransferFailureMode = "revert" | "throw";

export class FakeFeeToken implements FeeToken {
  private readonly balances = new Map<string, bigint>();
  private failureMode: TransferFailureMode | null = null;
  private readonly rejected = new Set<string>();

  public transfers: Array<{ from: Account; to: Account; amount: bigint }> = [];

  constructor(private readonly holder: Account) {}

  mint(to: Account, amount: bigint): void {
    this.balances.set(to.toLowerCase(), this.balance(to) + amount);
  }

  failTransfers(mode: TransferFailureMode | null): void {
    this.failureMode = mode;
  }

  rejectRecipient(account: Account): void {
    this.rejected.add(account.toLowerCase());
  }

  private balance(holder: Account): bigint {
    return this.balances.get(holder.toLowerCase()) ?? 0n;
  }

  private move(from: Account, to: Account, amount: bigint): boolean {
    if (this.balance(from) < amount) {
      return false;
    }
    this.balances.set(from.toLowerCase(), this.balance(from) - amount);
    this.balances.set(to.toLowerCase(), this.balance(to) + amount);
    this.transfers.push({ from, to, amount });
    return true;
  }

  async balanceOf(holder: Account): Promise<bigint> {
    return this.balance(holder);
  }

  async transfer(to: Account, amount: bigint): Promise<boolean> {
    if (this.failureMode === "throw") {
      throw new Error("execution reverted");
    }
    if (this.failureMode === "revert" || this.rejected.has(to.toLowerCase())) {
      return false;
    }
    return this.move(this.holder, to, amount);
  }

  async transferFrom(
    from: Account,
    to: Account,
    amount: bigint
  ): Promise<boolean> {
    if (this.failureMode === "throw") {
      throw new Error("execution reverted");
    }
    if (this.failureMode === "revert") {
      return false;
    }
    return this.move(from, to, amount);
  }
}
