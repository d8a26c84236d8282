// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@vefee/distributor/ports/voting-power-oracle`
 * Purpose: Read port onto the voting-escrow lock engine's historical voting-power curve.
 * Scope: Read-only interface. Does not implement lock or decay math.
 * Invariants:
 * - Deterministic for past timestamps.
 * - balanceOf is zero outside an active lock; totalSupply(t) >= balanceOf(any, t).
 * - Implementations throw OracleUnavailableError when they cannot answer.
 * Side-effects: none (interface definition only)
 * Links: docs/FEE_DISTRIBUTION.md#voting-power-oracle
 * @public
 */

import type { Account } from "@vefee/ledger-core";

export interface VotingPowerOracle {
  /** Decayed voting power of `account` at unix time `timestamp` */
  balanceOf(account: Account, timestamp: number): Promise<bigint>;

  /** Sum of every account's voting power at unix time `timestamp`; zero before genesis */
  totalSupply(timestamp: number): Promise<bigint>;

  /**
   * Time of the account's earliest recorded lock activity.
   * Returns null when the account has never locked.
   */
  firstActivityOf(account: Account): Promise<number | null>;
}
