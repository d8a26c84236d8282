// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@vefee/ledger-core/store`
 * Purpose: Port interface for the fee ledger store — epoch ledgers, checkpoint cursors, account cursors and admin state.
 * Scope: Type definitions only. Does not contain implementations or I/O.
 * Invariants:
 * - TOKENS_APPEND_ONLY: creditTokens only adds positive amounts; an epoch's total never decreases.
 * - SUPPLY_WRITE_ONCE: recordSupply rejects a second, different value for the same epoch.
 * - CURSOR_MONOTONE: setAccountCursor and setSupplyCursor never move backwards.
 * - ALL_OR_NOTHING: writes made inside transaction() are discarded when the callback throws.
 * Side-effects: none
 * Links: docs/FEE_DISTRIBUTION.md#ledger-store
 * @public
 */

import type {
  Account,
  AdminState,
  Epoch,
  EpochCredit,
  LedgerGenesis,
  TokenCursor,
} from "./model";

// ---------------------------------------------------------------------------
// Port interface
// ---------------------------------------------------------------------------

export interface LedgerStore {
  // Genesis
  /** Seed cursors and admin state. No-op when the ledger already exists. */
  initialize(genesis: LedgerGenesis): Promise<void>;
  getStartEpoch(): Promise<Epoch>;

  // Token ledger (written by the token checkpointer only)
  getTokenCursor(): Promise<TokenCursor>;
  setTokenCursor(cursor: TokenCursor): Promise<void>;
  creditTokens(credits: readonly EpochCredit[]): Promise<void>;
  getTokensPerEpoch(epoch: Epoch): Promise<bigint>;

  // Supply ledger (written by the total-supply checkpointer only)
  getSupplyCursor(): Promise<Epoch>;
  setSupplyCursor(epoch: Epoch): Promise<void>;
  recordSupply(epoch: Epoch, supply: bigint): Promise<void>;
  getSupplyAt(epoch: Epoch): Promise<bigint>;

  // Account claim cursors (written by claims for that account only)
  getAccountCursor(account: Account): Promise<Epoch | null>;
  setAccountCursor(account: Account, epoch: Epoch): Promise<void>;

  // Admin gate
  getAdminState(): Promise<AdminState>;
  setAdminState(state: AdminState): Promise<void>;

  /**
   * Run `fn` against a staged view of the store. Staged writes become visible
   * only when `fn` resolves; a rejection discards them all.
   */
  transaction<T>(fn: (tx: LedgerStore) => Promise<T>): Promise<T>;
}
