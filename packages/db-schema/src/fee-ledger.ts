// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@vefee/db-schema/fee-ledger`
 * Purpose: Postgres schema for the weekly fee ledger — cursors and admin state, per-epoch token and supply ledgers, account claim cursors.
 * Scope: Table definitions only. Does not contain queries, business logic, or I/O.
 * Invariants:
 * - Token and voting-power amounts use NUMERIC(78,0) so any uint256 fits (ALL_MATH_BIGINT); epochs and timestamps use BIGINT seconds.
 * - SINGLETON_STATE: fee_ledger_state holds exactly one row (id = 1).
 * - TOKENS_POSITIVE: every fee_tokens_per_epoch row is > 0.
 * - Account keys are lowercased hex.
 * Side-effects: none (schema definitions only)
 * Links: migrations/0000_fee_ledger.sql, docs/FEE_DISTRIBUTION.md#ledger-store
 * @public
 */

import { sql } from "drizzle-orm";
import {
  bigint,
  boolean,
  check,
  integer,
  numeric,
  pgTable,
  text,
  timestamp,
} from "drizzle-orm/pg-core";

const amount = (name: string) => numeric(name, { precision: 78, scale: 0 });
const seconds = (name: string) => bigint(name, { mode: "number" });

/**
 * Process-wide cursors and admin gate (SINGLETON_STATE).
 */
export const feeLedgerState = pgTable(
  "fee_ledger_state",
  {
    id: integer("id").primaryKey().default(1),
    startEpoch: seconds("start_epoch").notNull(),
    lastTokenTime: seconds("last_token_time").notNull(),
    lastTokenBalance: amount("last_token_balance").notNull(),
    supplyCursor: seconds("supply_cursor").notNull(),
    admin: text("admin").notNull(),
    futureAdmin: text("future_admin"),
    publicCheckpoint: boolean("public_checkpoint").notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [check("fee_ledger_state_singleton", sql`${table.id} = 1`)]
);

/** Tokens credited per epoch by the token checkpointer (append-only sums) */
export const feeTokensPerEpoch = pgTable(
  "fee_tokens_per_epoch",
  {
    epoch: seconds("epoch").primaryKey(),
    amount: amount("amount").notNull(),
  },
  (table) => [
    check("fee_tokens_per_epoch_positive", sql`${table.amount} > 0`),
  ]
);

/** Total voting power snapshot per epoch boundary (write-once) */
export const feeSupplyPerEpoch = pgTable(
  "fee_supply_per_epoch",
  {
    epoch: seconds("epoch").primaryKey(),
    supply: amount("supply").notNull(),
    recordedAt: timestamp("recorded_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    check("fee_supply_per_epoch_non_negative", sql`${table.supply} >= 0`),
  ]
);

/** First unpaid epoch per account */
export const feeAccountCursors = pgTable("fee_account_cursors", {
  account: text("account").primaryKey(),
  epoch: seconds("epoch").notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true })
    .notNull()
    .defaultNow(),
});
