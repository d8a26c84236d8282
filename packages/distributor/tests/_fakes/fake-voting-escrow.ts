// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@vefee/distributor/tests/_fakes/fake-voting-escrow`
 * Purpose: In-memory voting-escrow curve implementing VotingPowerOracle.
 * Scope: Linear-decay locks (bias = slope * (end - t)), withdrawals and first-activity lookup. Does not model lock extensions.
 * Invariants: totalSupply(t) is exactly the sum of balanceOf(account, t); unlock times are floored to a week.
 * Side-effects: none (in-memory only)
 * Notes: Call setUnavailable(true) to make every query throw. Tracks balanceOf calls for assertions.
 * Links: src/ports/voting-power-oracle.port.ts
 * @public
 */

import { type Account, epochOf } from "@vefee/ledger-core";

import type { VotingPowerOracle } from "../../src/ports";

/** Longest lock: four years of 365 days */
export const MAX_LOCK_SECONDS = 4 * 365 * 86_400;

interface Lock {
  readonly start: number;
  readonly end: number;
  readonly slope: bigint;
  withdrawnAt: number | null;
}

export class FakeVotingEscrow implements VotingPowerOracle {
  private readonly locks = new Map<string, Lock[]>();
  private unavailable = false;

  public balanceOfCalls: Array<{ account: Account; timestamp: number }> = [];

  createLock(
    account: Account,
    amount: bigint,
    start: number,
    unlockTime: number
  ): void {
    const locks = this.locks.get(account.toLowerCase()) ?? [];
    locks.push({
      start,
      end: epochOf(unlockTime),
      slope: amount / BigInt(MAX_LOCK_SECONDS),
      withdrawnAt: null,
    });
    this.locks.set(account.toLowerCase(), locks);
  }

  withdraw(account: Account, at: number): void {
    for (const lock of this.locks.get(account.toLowerCase()) ?? []) {
      if (lock.withdrawnAt === null) {
        lock.withdrawnAt = at;
      }
    }
  }

  setUnavailable(unavailable: boolean): void {
    this.unavailable = unavailable;
  }

  private guard(): void {
    if (this.unavailable) {
      throw new Error("voting escrow RPC unreachable");
    }
  }

  private powerAt(locks: readonly Lock[], t: number): bigint {
    let power = 0n;
    for (const lock of locks) {
      const stop = Math.min(lock.end, lock.withdrawnAt ?? lock.end);
      if (t >= lock.start && t < stop) {
        power += lock.slope * BigInt(lock.end - t);
      }
    }
    return power;
  }

  async balanceOf(account: Account, timestamp: number): Promise<bigint> {
    this.guard();
    this.balanceOfCalls.push({ account, timestamp });
    return this.powerAt(this.locks.get(account.toLowerCase()) ?? [], timestamp);
  }

  async totalSupply(timestamp: number): Promise<bigint> {
    this.guard();
    let supply = 0n;
    for (const locks of this.locks.values()) {
      supply += this.powerAt(locks, timestamp);
    }
    return supply;
  }

  async firstActivityOf(account: Account): Promise<number | null> {
    this.guard();
    const locks = this.locks.get(account.toLowerCase()) ?? [];
    if (locks.length === 0) {
      return null;
    }
    return Math.min(...locks.map((lock) => lock.start));
  }
}
