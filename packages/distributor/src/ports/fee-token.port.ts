// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@vefee/distributor/ports/fee-token`
 * Purpose: Port onto the fee token's balance and transfer primitives (ERC-20 shaped).
 * Scope: Interface only. Does not decide token eligibility or perform swaps.
 * Invariants: A `false` result or a thrown error both mean the transfer did not happen.
 * Side-effects: none (interface definition only)
 * Links: docs/FEE_DISTRIBUTION.md#fee-token
 * @public
 */

import type { Account } from "@vefee/ledger-core";

export interface FeeToken {
  balanceOf(holder: Account): Promise<bigint>;

  /** Move `amount` out of the distributor's holdings to `to` */
  transfer(to: Account, amount: bigint): Promise<boolean>;

  /** Pull `amount` from `from` into `to` using a prior allowance */
  transferFrom(from: Account, to: Account, amount: bigint): Promise<boolean>;
}
