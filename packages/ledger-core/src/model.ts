// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@vefee/ledger-core/model`
 * Purpose: Domain types and constants for the weekly fee ledger.
 * Scope: Pure types. Does not contain business logic or perform I/O.
 * Invariants: All token and voting-power amounts are bigint base units (ALL_MATH_BIGINT); timestamps are unix seconds.
 * Side-effects: none
 * Links: docs/FEE_DISTRIBUTION.md
 * @public
 */

/** One week in seconds; the ledger's discretization unit */
export const EPOCH_LENGTH_SECONDS = 604_800;

/** Most epochs a single total-supply checkpoint walks before returning */
export const MAX_SUPPLY_CHECKPOINT_EPOCHS = 20;

/** Most epochs a single claim walks before returning */
export const MAX_CLAIM_EPOCHS = 50;

/** Most accounts accepted by one claimMany call */
export const MAX_CLAIM_MANY_ACCOUNTS = 20;

/** Unix timestamp (seconds) aligned to an epoch boundary */
export type Epoch = number;

/** EVM account address (checksummed at the edges) */
export type Account = `0x${string}`;

/** Amount credited to one epoch by a token checkpoint */
export interface EpochCredit {
  readonly epoch: Epoch;
  readonly amount: bigint;
}

/** Token-side checkpoint cursor */
export interface TokenCursor {
  /** Time of the last token checkpoint; initialised to the start epoch */
  readonly lastTokenTime: number;
  /** Fee-token balance observed at that checkpoint, net of later claims */
  readonly lastTokenBalance: bigint;
}

export interface AdminState {
  readonly admin: Account;
  /** Pending admin from commitAdmin, applied by applyAdmin */
  readonly futureAdmin: Account | null;
  /** Whether non-admins (and claims) may trigger token checkpoints */
  readonly publicCheckpoint: boolean;
}

/** Immutable values fixed when the ledger is created */
export interface LedgerGenesis {
  /** Earliest payable epoch (start time floored to an epoch) */
  readonly startEpoch: Epoch;
  readonly admin: Account;
  readonly publicCheckpoint: boolean;
}

/** Read-only view of the process-wide cursors and admin state */
export interface LedgerSnapshot {
  readonly startEpoch: Epoch;
  readonly tokenCursor: TokenCursor;
  /** Next epoch boundary whose total supply is not yet recorded */
  readonly supplyCursor: Epoch;
  readonly adminState: AdminState;
}
