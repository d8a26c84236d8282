// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@vefee/ledger-core/errors`
 * Purpose: Domain error classes for fee distribution operations.
 * Scope: Error definitions and type guards. Does not perform I/O or contain business logic.
 * Invariants: All errors have a readonly `code` discriminant for type guards.
 * Side-effects: none
 * Links: docs/FEE_DISTRIBUTION.md#errors
 * @public
 */

import type { Account } from "./model";

export class PermissionDeniedError extends Error {
  public readonly code = "PERMISSION_DENIED" as const;
  constructor(
    public readonly action: string,
    public readonly caller: Account
  ) {
    super(`${caller} is not allowed to ${action}`);
    this.name = "PermissionDeniedError";
  }
}

/**
 * The voting-power oracle could not answer. Never recovered inside the engine:
 * the whole operation aborts and staged writes are discarded.
 */
export class OracleUnavailableError extends Error {
  public readonly code = "ORACLE_UNAVAILABLE" as const;
  constructor(
    public readonly query: string,
    options?: { cause?: unknown }
  ) {
    super(`Voting power oracle unavailable for ${query}`, options);
    this.name = "OracleUnavailableError";
  }
}

export class TokenTransferFailedError extends Error {
  public readonly code = "TOKEN_TRANSFER_FAILED" as const;
  constructor(
    public readonly to: Account,
    public readonly amount: bigint,
    options?: { cause?: unknown }
  ) {
    super(`Fee token transfer of ${amount} to ${to} failed`, options);
    this.name = "TokenTransferFailedError";
  }
}

export class AdminNotCommittedError extends Error {
  public readonly code = "ADMIN_NOT_COMMITTED" as const;
  constructor() {
    super("No admin transfer has been committed");
    this.name = "AdminNotCommittedError";
  }
}

/**
 * The store already holds a ledger whose start epoch differs from the one
 * configured. The start epoch is fixed at genesis.
 */
export class GenesisMismatchError extends Error {
  public readonly code = "GENESIS_MISMATCH" as const;
  constructor(
    public readonly storedStartEpoch: number,
    public readonly configuredStartEpoch: number
  ) {
    super(
      `Ledger was started at epoch ${storedStartEpoch}, configured start epoch is ${configuredStartEpoch}`
    );
    this.name = "GenesisMismatchError";
  }
}

// Type guards

export function isPermissionDeniedError(
  error: unknown
): error is PermissionDeniedError {
  return error instanceof Error && error.name === "PermissionDeniedError";
}

export function isOracleUnavailableError(
  error: unknown
): error is OracleUnavailableError {
  return error instanceof Error && error.name === "OracleUnavailableError";
}

export function isTokenTransferFailedError(
  error: unknown
): error is TokenTransferFailedError {
  return error instanceof Error && error.name === "TokenTransferFailedError";
}

export function isAdminNotCommittedError(
  error: unknown
): error is AdminNotCommittedError {
  return error instanceof Error && error.name === "AdminNotCommittedError";
}

export function isGenesisMismatchError(
  error: unknown
): error is GenesisMismatchError {
  return error instanceof Error && error.name === "GenesisMismatchError";
}
