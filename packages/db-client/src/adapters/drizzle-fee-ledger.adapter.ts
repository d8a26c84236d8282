// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@vefee/db-client/adapters/drizzle-fee-ledger`
 * Purpose: Drizzle ORM implementation of the LedgerStore port.
 * Scope: Maps ledger reads and writes onto the fee_* tables; transactions map onto Postgres transactions (savepoints when nested). Does not contain distribution logic.
 * Invariants:
 * - TOKENS_APPEND_ONLY: creditTokens upserts `amount + excluded.amount`; non-positive credits are rejected before any write.
 * - SUPPLY_WRITE_ONCE: recordSupply accepts a repeat of the same value and rejects a different one.
 * - CURSOR_MONOTONE: cursor setters read the current value and refuse to move backwards.
 * - SINGLE_WRITER: every transaction first locks the fee_ledger_state row (FOR UPDATE), so service instances sharing one database run operations one at a time.
 * - Amount columns are NUMERIC; values cross the boundary as decimal strings and are parsed to bigint.
 * Side-effects: IO (database operations)
 * Links: packages/ledger-core/src/store.ts, packages/db-schema/src/fee-ledger.ts
 * @public
 */

import type {
  Account,
  AdminState,
  Epoch,
  EpochCredit,
  LedgerGenesis,
  LedgerStore,
  TokenCursor,
} from "@vefee/ledger-core";
import {
  feeAccountCursors,
  feeLedgerState,
  feeSupplyPerEpoch,
  feeTokensPerEpoch,
} from "@vefee/db-schema/fee-ledger";
import { eq, sql, type TablesRelationalConfig } from "drizzle-orm";
import type { PgDatabase, PgQueryResultHKT } from "drizzle-orm/pg-core";

const STATE_ID = 1;

type StateRow = typeof feeLedgerState.$inferSelect;

function toAdminAccount(value: string): Account {
  if (!value.startsWith("0x")) {
    throw new Error(`Stored admin is not a hex address: ${value}`);
  }
  return `0x${value.slice(2)}`;
}

export class DrizzleFeeLedgerStore<
  TQueryResult extends PgQueryResultHKT,
  TFullSchema extends Record<string, unknown>,
  TSchema extends TablesRelationalConfig,
> implements LedgerStore
{
  constructor(
    private readonly db: PgDatabase<TQueryResult, TFullSchema, TSchema>
  ) {}

  // ── Genesis ─────────────────────────────────────────────────

  async initialize(genesis: LedgerGenesis): Promise<void> {
    await this.db
      .insert(feeLedgerState)
      .values({
        id: STATE_ID,
        startEpoch: genesis.startEpoch,
        lastTokenTime: genesis.startEpoch,
        lastTokenBalance: "0",
        supplyCursor: genesis.startEpoch,
        admin: genesis.admin,
        futureAdmin: null,
        publicCheckpoint: genesis.publicCheckpoint,
      })
      .onConflictDoNothing({ target: feeLedgerState.id });
  }

  private async state(): Promise<StateRow> {
    const [row] = await this.db
      .select()
      .from(feeLedgerState)
      .where(eq(feeLedgerState.id, STATE_ID))
      .limit(1);
    if (!row) {
      throw new Error("Ledger not initialized; call initialize() first");
    }
    return row;
  }

  private async updateState(
    values: Partial<Omit<StateRow, "id" | "updatedAt">>
  ): Promise<void> {
    await this.db
      .update(feeLedgerState)
      .set({ ...values, updatedAt: new Date() })
      .where(eq(feeLedgerState.id, STATE_ID));
  }

  async getStartEpoch(): Promise<Epoch> {
    return (await this.state()).startEpoch;
  }

  // ── Token ledger ────────────────────────────────────────────

  async getTokenCursor(): Promise<TokenCursor> {
    const row = await this.state();
    return {
      lastTokenTime: row.lastTokenTime,
      lastTokenBalance: BigInt(row.lastTokenBalance),
    };
  }

  async setTokenCursor(cursor: TokenCursor): Promise<void> {
    const row = await this.state();
    if (cursor.lastTokenTime < row.lastTokenTime) {
      throw new RangeError(
        `Token cursor cannot move backwards (${row.lastTokenTime} -> ${cursor.lastTokenTime})`
      );
    }
    await this.updateState({
      lastTokenTime: cursor.lastTokenTime,
      lastTokenBalance: cursor.lastTokenBalance.toString(),
    });
  }

  async creditTokens(credits: readonly EpochCredit[]): Promise<void> {
    if (credits.length === 0) return;
    for (const { epoch, amount } of credits) {
      if (amount <= 0n) {
        throw new RangeError(
          `Token credits must be positive, got ${amount} for epoch ${epoch}`
        );
      }
    }
    for (const { epoch, amount } of credits) {
      await this.db
        .insert(feeTokensPerEpoch)
        .values({ epoch, amount: amount.toString() })
        .onConflictDoUpdate({
          target: feeTokensPerEpoch.epoch,
          set: { amount: sql`${feeTokensPerEpoch.amount} + excluded.amount` },
        });
    }
  }

  async getTokensPerEpoch(epoch: Epoch): Promise<bigint> {
    const [row] = await this.db
      .select({ amount: feeTokensPerEpoch.amount })
      .from(feeTokensPerEpoch)
      .where(eq(feeTokensPerEpoch.epoch, epoch))
      .limit(1);
    return row ? BigInt(row.amount) : 0n;
  }

  // ── Supply ledger ───────────────────────────────────────────

  async getSupplyCursor(): Promise<Epoch> {
    return (await this.state()).supplyCursor;
  }

  async setSupplyCursor(epoch: Epoch): Promise<void> {
    const row = await this.state();
    if (epoch < row.supplyCursor) {
      throw new RangeError(
        `Supply cursor cannot move backwards (${row.supplyCursor} -> ${epoch})`
      );
    }
    await this.updateState({ supplyCursor: epoch });
  }

  async recordSupply(epoch: Epoch, supply: bigint): Promise<void> {
    const [existing] = await this.db
      .select({ supply: feeSupplyPerEpoch.supply })
      .from(feeSupplyPerEpoch)
      .where(eq(feeSupplyPerEpoch.epoch, epoch))
      .limit(1);

    if (existing) {
      if (BigInt(existing.supply) !== supply) {
        throw new Error(
          `Supply for epoch ${epoch} already recorded as ${existing.supply}, refusing ${supply}`
        );
      }
      return;
    }

    await this.db
      .insert(feeSupplyPerEpoch)
      .values({ epoch, supply: supply.toString() });
  }

  async getSupplyAt(epoch: Epoch): Promise<bigint> {
    const [row] = await this.db
      .select({ supply: feeSupplyPerEpoch.supply })
      .from(feeSupplyPerEpoch)
      .where(eq(feeSupplyPerEpoch.epoch, epoch))
      .limit(1);
    return row ? BigInt(row.supply) : 0n;
  }

  // ── Account cursors ─────────────────────────────────────────

  async getAccountCursor(account: Account): Promise<Epoch | null> {
    const [row] = await this.db
      .select({ epoch: feeAccountCursors.epoch })
      .from(feeAccountCursors)
      .where(eq(feeAccountCursors.account, account.toLowerCase()))
      .limit(1);
    return row ? row.epoch : null;
  }

  async setAccountCursor(account: Account, epoch: Epoch): Promise<void> {
    const existing = await this.getAccountCursor(account);
    if (existing !== null && epoch < existing) {
      throw new RangeError(
        `Cursor for ${account} cannot move backwards (${existing} -> ${epoch})`
      );
    }
    await this.db
      .insert(feeAccountCursors)
      .values({ account: account.toLowerCase(), epoch })
      .onConflictDoUpdate({
        target: feeAccountCursors.account,
        set: { epoch, updatedAt: new Date() },
      });
  }

  // ── Admin gate ──────────────────────────────────────────────

  async getAdminState(): Promise<AdminState> {
    const row = await this.state();
    return {
      admin: toAdminAccount(row.admin),
      futureAdmin:
        row.futureAdmin === null ? null : toAdminAccount(row.futureAdmin),
      publicCheckpoint: row.publicCheckpoint,
    };
  }

  async setAdminState(state: AdminState): Promise<void> {
    await this.updateState({
      admin: state.admin,
      futureAdmin: state.futureAdmin,
      publicCheckpoint: state.publicCheckpoint,
    });
  }

  // ── Transactions ────────────────────────────────────────────

  transaction<T>(fn: (tx: LedgerStore) => Promise<T>): Promise<T> {
    return this.db.transaction(async (tx) => {
      // Row lock on the singleton serialises writers across processes
      await tx
        .select({ id: feeLedgerState.id })
        .from(feeLedgerState)
        .where(eq(feeLedgerState.id, STATE_ID))
        .for("update");
      return fn(new DrizzleFeeLedgerStore(tx));
    });
  }
}
