// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@vefee/distributor/adapters/in-memory-ledger-store`
 * Purpose: Process-local LedgerStore for tests and single-process deployments without a database.
 * Scope: Holds the ledger in Maps; transactions stage writes on a copy and swap it in on success. Does not persist anything.
 * Invariants:
 * - TOKENS_APPEND_ONLY, SUPPLY_WRITE_ONCE and CURSOR_MONOTONE are enforced on write.
 * - A rejected transaction leaves the committed state untouched.
 * - Account keys are case-insensitive.
 * Side-effects: none (in-memory only)
 * Links: Implements LedgerStore (@vefee/ledger-core)
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

interface LedgerState {
  startEpoch: Epoch;
  tokenCursor: TokenCursor;
  supplyCursor: Epoch;
  adminState: AdminState;
  tokensPerEpoch: Map<Epoch, bigint>;
  supplyPerEpoch: Map<Epoch, bigint>;
  accountCursors: Map<string, Epoch>;
}

function cloneState(state: LedgerState): LedgerState {
  return {
    ...state,
    tokensPerEpoch: new Map(state.tokensPerEpoch),
    supplyPerEpoch: new Map(state.supplyPerEpoch),
    accountCursors: new Map(state.accountCursors),
  };
}

export class InMemoryLedgerStore implements LedgerStore {
  private state: LedgerState | null;

  constructor(initial: LedgerState | null = null) {
    this.state = initial;
  }

  private get current(): LedgerState {
    if (!this.state) {
      throw new Error("Ledger not initialized; call initialize() first");
    }
    return this.state;
  }

  async initialize(genesis: LedgerGenesis): Promise<void> {
    if (this.state) {
      return;
    }
    this.state = {
      startEpoch: genesis.startEpoch,
      tokenCursor: {
        lastTokenTime: genesis.startEpoch,
        lastTokenBalance: 0n,
      },
      supplyCursor: genesis.startEpoch,
      adminState: {
        admin: genesis.admin,
        futureAdmin: null,
        publicCheckpoint: genesis.publicCheckpoint,
      },
      tokensPerEpoch: new Map(),
      supplyPerEpoch: new Map(),
      accountCursors: new Map(),
    };
  }

  async getStartEpoch(): Promise<Epoch> {
    return this.current.startEpoch;
  }

  async getTokenCursor(): Promise<TokenCursor> {
    return this.current.tokenCursor;
  }

  async setTokenCursor(cursor: TokenCursor): Promise<void> {
    const state = this.current;
    if (cursor.lastTokenTime < state.tokenCursor.lastTokenTime) {
      throw new RangeError(
        `Token cursor cannot move backwards (${state.tokenCursor.lastTokenTime} -> ${cursor.lastTokenTime})`
      );
    }
    state.tokenCursor = cursor;
  }

  async creditTokens(credits: readonly EpochCredit[]): Promise<void> {
    const state = this.current;
    for (const { epoch, amount } of credits) {
      if (amount <= 0n) {
        throw new RangeError(
          `Token credits must be positive, got ${amount} for epoch ${epoch}`
        );
      }
    }
    for (const { epoch, amount } of credits) {
      state.tokensPerEpoch.set(
        epoch,
        (state.tokensPerEpoch.get(epoch) ?? 0n) + amount
      );
    }
  }

  async getTokensPerEpoch(epoch: Epoch): Promise<bigint> {
    return this.current.tokensPerEpoch.get(epoch) ?? 0n;
  }

  async getSupplyCursor(): Promise<Epoch> {
    return this.current.supplyCursor;
  }

  async setSupplyCursor(epoch: Epoch): Promise<void> {
    const state = this.current;
    if (epoch < state.supplyCursor) {
      throw new RangeError(
        `Supply cursor cannot move backwards (${state.supplyCursor} -> ${epoch})`
      );
    }
    state.supplyCursor = epoch;
  }

  async recordSupply(epoch: Epoch, supply: bigint): Promise<void> {
    const supplyPerEpoch = this.current.supplyPerEpoch;
    const existing = supplyPerEpoch.get(epoch);
    if (existing !== undefined && existing !== supply) {
      throw new Error(
        `Supply for epoch ${epoch} already recorded as ${existing}, refusing ${supply}`
      );
    }
    supplyPerEpoch.set(epoch, supply);
  }

  async getSupplyAt(epoch: Epoch): Promise<bigint> {
    return this.current.supplyPerEpoch.get(epoch) ?? 0n;
  }

  async getAccountCursor(account: Account): Promise<Epoch | null> {
    return this.current.accountCursors.get(account.toLowerCase()) ?? null;
  }

  async setAccountCursor(account: Account, epoch: Epoch): Promise<void> {
    const cursors = this.current.accountCursors;
    const key = account.toLowerCase();
    const existing = cursors.get(key);
    if (existing !== undefined && epoch < existing) {
      throw new RangeError(
        `Cursor for ${account} cannot move backwards (${existing} -> ${epoch})`
      );
    }
    cursors.set(key, epoch);
  }

  async getAdminState(): Promise<AdminState> {
    return this.current.adminState;
  }

  async setAdminState(state: AdminState): Promise<void> {
    this.current.adminState = state;
  }

  async transaction<T>(fn: (tx: LedgerStore) => Promise<T>): Promise<T> {
    const staged = new InMemoryLedgerStore(
      this.state ? cloneState(this.state) : null
    );
    const result = await fn(staged);
    this.state = staged.state;
    return result;
  }
}
