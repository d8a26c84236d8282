// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@vefee/db-client/client`
 * Purpose: Database client factory with injected connection string.
 * Scope: Creates the Drizzle database instance the fee ledger store runs on. Does not read from environment.
 * Invariants:
 * - Connection string injected, never from process.env
 * - Database type preserves drizzle's `$client` accessor for pool control (e.g. `end()`)
 * Side-effects: IO (database connections)
 * Links: docs/FEE_DISTRIBUTION.md#ledger-store
 * @public
 */

import * as feeLedgerSchema from "@vefee/db-schema";
import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";

function buildClient(connectionString: string, applicationName: string) {
  const client = postgres(connectionString, {
    max: 10,
    idle_timeout: 20,
    connect_timeout: 10,
    connection: {
      application_name: applicationName,
    },
  });

  return drizzle(client, { schema: feeLedgerSchema });
}

/** Drizzle client including the postgres.js `$client` accessor for pool control. */
export type Database = ReturnType<typeof buildClient>;

/**
 * Creates a Drizzle database client for the fee distributor service.
 */
export function createFeeLedgerDbClient(connectionString: string): Database {
  return buildClient(connectionString, "fee_distributor");
}
