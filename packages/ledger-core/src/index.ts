// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@vefee/ledger-core`
 * Purpose: Pure domain logic for the weekly fee ledger — shared by the distributor service and its adapters.
 * Scope: Re-exports epoch clock, model types, distribution rules, store port and errors. Does not contain I/O or infrastructure code.
 * Invariants: No imports from other workspace packages. Pure domain logic only.
 * Side-effects: none
 * Links: docs/FEE_DISTRIBUTION.md
 * @public
 */

// Epoch clock
export {
  epochCeil,
  epochOf,
  epochsBetween,
  isEpochBoundary,
  nextEpoch,
} from "./epoch-clock";
// Errors
export {
  AdminNotCommittedError,
  GenesisMismatchError,
  isAdminNotCommittedError,
  isGenesisMismatchError,
  isOracleUnavailableError,
  isPermissionDeniedError,
  isTokenTransferFailedError,
  OracleUnavailableError,
  PermissionDeniedError,
  TokenTransferFailedError,
} from "./errors";
// Model types and constants
export type {
  Account,
  AdminState,
  Epoch,
  EpochCredit,
  LedgerGenesis,
  LedgerSnapshot,
  TokenCursor,
} from "./model";
export {
  EPOCH_LENGTH_SECONDS,
  MAX_CLAIM_EPOCHS,
  MAX_CLAIM_MANY_ACCOUNTS,
  MAX_SUPPLY_CHECKPOINT_EPOCHS,
} from "./model";

// Rules
export { epochShare, spreadTokenDelta } from "./rules";

// Store port
export type { LedgerStore } from "./store";
