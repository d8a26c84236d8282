// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@vefee/db-client`
 * Purpose: Postgres-backed fee ledger: client factory, LedgerStore adapter and schema.
 * Scope: Client factory, adapter, schema re-export. Does not read process.env.
 * Invariants:
 * - FORBIDDEN: process.env reads; callers inject the connection string
 * - Re-exports full schema
 * Side-effects: IO (database operations)
 * Links: docs/FEE_DISTRIBUTION.md#ledger-store
 * @public
 */

export * from "@vefee/db-schema";
export { DrizzleFeeLedgerStore } from "./adapters/drizzle-fee-ledger.adapter";
export { createFeeLedgerDbClient, type Database } from "./client";
