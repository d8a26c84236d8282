// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@vefee/distributor/tests/in-memory-ledger-store`
 * Purpose: Unit tests for InMemoryLedgerStore write guards and transaction staging.
 * Scope: Store behaviour only. Does not run distributor operations.
 * Invariants: TOKENS_APPEND_ONLY, SUPPLY_WRITE_ONCE, CURSOR_MONOTONE, ALL_OR_NOTHING.
 * Side-effects: none
 * Links: src/adapters/in-memory-ledger-store.ts
 * @internal
 */

import { beforeEach, describe, expect, it } from "vitest";

import { InMemoryLedgerStore } from "../src/adapters/in-memory-ledger-store";
import { ADMIN, T0, W } from "./fixtures";

const MIXED_CASE = "0xAbCdEf0123456789aBcDeF0123456789AbCdEf01";
const LOWER_CASE = "0xabcdef0123456789abcdef0123456789abcdef01";

describe("InMemoryLedgerStore", () => {
  let store: InMemoryLedgerStore;

  beforeEach(async () => {
    store = new InMemoryLedgerStore();
    await store.initialize({
      startEpoch: T0,
      admin: ADMIN,
      publicCheckpoint: true,
    });
  });

  it("rejects reads before initialize", async () => {
    await expect(new InMemoryLedgerStore().getSupplyCursor()).rejects.toThrow(
      "Ledger not initialized"
    );
  });

  it("keeps the first genesis", async () => {
    await store.initialize({
      startEpoch: T0 + W,
      admin: ADMIN,
      publicCheckpoint: false,
    });

    expect(await store.getStartEpoch()).toBe(T0);
    expect((await store.getAdminState()).publicCheckpoint).toBe(true);
  });

  it("sums credits and validates all of them before writing", async () => {
    await store.creditTokens([{ epoch: T0, amount: 2n }]);
    await store.creditTokens([{ epoch: T0, amount: 3n }]);
    await expect(
      store.creditTokens([
        { epoch: T0, amount: 1n },
        { epoch: T0 + W, amount: -1n },
      ])
    ).rejects.toThrow(RangeError);

    expect(await store.getTokensPerEpoch(T0)).toBe(5n);
  });

  it("writes a supply snapshot once", async () => {
    await store.recordSupply(T0, 10n);
    await store.recordSupply(T0, 10n);

    await expect(store.recordSupply(T0, 11n)).rejects.toThrow(
      "already recorded"
    );
    expect(await store.getSupplyAt(T0)).toBe(10n);
    expect(await store.getSupplyAt(T0 + W)).toBe(0n);
  });

  it("keys account cursors case-insensitively", async () => {
    await store.setAccountCursor(MIXED_CASE, T0 + W);

    expect(await store.getAccountCursor(LOWER_CASE)).toBe(T0 + W);
    await expect(store.setAccountCursor(LOWER_CASE, T0)).rejects.toThrow(
      RangeError
    );
  });

  it("refuses to move the supply or token cursor backwards", async () => {
    await store.setSupplyCursor(T0 + 2 * W);
    await store.setTokenCursor({ lastTokenTime: T0 + 50, lastTokenBalance: 1n });

    await expect(store.setSupplyCursor(T0 + W)).rejects.toThrow(RangeError);
    await expect(
      store.setTokenCursor({ lastTokenTime: T0 + 49, lastTokenBalance: 1n })
    ).rejects.toThrow(RangeError);
  });

  it("hides staged writes until the transaction resolves", async () => {
    let seenOutside: bigint | undefined;
    await store.transaction(async (tx) => {
      await tx.creditTokens([{ epoch: T0, amount: 4n }]);
      seenOutside = await store.getTokensPerEpoch(T0);
    });

    expect(seenOutside).toBe(0n);
    expect(await store.getTokensPerEpoch(T0)).toBe(4n);
  });

  it("discards staged writes when the transaction rejects", async () => {
    await expect(
      store.transaction(async (tx) => {
        await tx.creditTokens([{ epoch: T0, amount: 4n }]);
        await tx.setAccountCursor(MIXED_CASE, T0 + W);
        await tx.setAdminState({
          admin: ADMIN,
          futureAdmin: null,
          publicCheckpoint: false,
        });
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    expect(await store.getTokensPerEpoch(T0)).toBe(0n);
    expect(await store.getAccountCursor(MIXED_CASE)).toBeNull();
    expect((await store.getAdminState()).publicCheckpoint).toBe(true);
  });

  it("commits a nested transaction into its parent only", async () => {
    await expect(
      store.transaction(async (outer) => {
        await outer.transaction(async (inner) => {
          await inner.recordSupply(T0, 7n);
        });
        expect(await outer.getSupplyAt(T0)).toBe(7n);
        throw new Error("outer failed");
      })
    ).rejects.toThrow("outer failed");

    expect(await store.getSupplyAt(T0)).toBe(0n);
  });
});
