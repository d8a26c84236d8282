// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@vefee/distributor/adapters/viem-fee-token`
 * Purpose: FeeToken backed by an ERC-20 contract, signing transfers with the distributor's wallet.
 * Scope: balanceOf read, transfer and transferFrom writes, each awaited to a mined receipt. Does not manage nonces or gas.
 * Invariants: A transfer reports true only for a receipt with status "success"; a reverted or rejected call is false or throws.
 * Side-effects: IO (RPC calls, signed transactions)
 * Links: Implements FeeToken, docs/FEE_DISTRIBUTION.md#fee-token
 * @public
 */

import type { Account } from "@vefee/ledger-core";
import type {
  Chain,
  Hash,
  PublicClient,
  Transport,
  WalletClient,
  Account as WalletAccount,
} from "viem";

import type { FeeToken } from "../ports";
import { ERC20_ABI } from "./abi";

export type TokenReader = Pick<
  PublicClient<Transport, Chain>,
  "readContract" | "waitForTransactionReceipt"
>;

export type TokenSigner = Pick<
  WalletClient<Transport, Chain, WalletAccount>,
  "writeContract"
>;

export class ViemFeeToken implements FeeToken {
  constructor(
    private readonly reader: TokenReader,
    private readonly signer: TokenSigner,
    private readonly token: Account
  ) {}

  balanceOf(holder: Account): Promise<bigint> {
    return this.reader.readContract({
      address: this.token,
      abi: ERC20_ABI,
      functionName: "balanceOf",
      args: [holder],
    });
  }

  async transfer(to: Account, amount: bigint): Promise<boolean> {
    const hash = await this.signer.writeContract({
      address: this.token,
      abi: ERC20_ABI,
      functionName: "transfer",
      args: [to, amount],
    });
    return this.succeeded(hash);
  }

  async transferFrom(
    from: Account,
    to: Account,
    amount: bigint
  ): Promise<boolean> {
    const hash = await this.signer.writeContract({
      address: this.token,
      abi: ERC20_ABI,
      functionName: "transferFrom",
      args: [from, to, amount],
    });
    return this.succeeded(hash);
  }

  private async succeeded(hash: Hash): Promise<boolean> {
    const receipt = await this.reader.waitForTransactionReceipt({ hash });
    return receipt.status === "success";
  }
}
