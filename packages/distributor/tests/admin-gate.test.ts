// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@vefee/distributor/tests/admin-gate`
 * Purpose: Tests for token-checkpoint permissions, the public flag and two-step admin rotation.
 * Scope: Pure due-check plus the FeeDistributor admin surface. Does not cover claims.
 * Invariants: Admin-only actions from anyone else throw PermissionDeniedError before any write.
 * Side-effects: none
 * Links: src/core/admin-gate.ts
 * @internal
 */

import {
  AdminNotCommittedError,
  isPermissionDeniedError,
  PermissionDeniedError,
} from "@vefee/ledger-core";
import { describe, expect, it } from "vitest";

import { isPublicCheckpointDue } from "../src/core/admin-gate";
import { ADMIN, ALICE, BOB, createHarness, DISTRIBUTOR, T0 } from "./fixtures";

describe("isPublicCheckpointDue", () => {
  const cursor = { lastTokenTime: T0, lastTokenBalance: 0n };
  const open = { admin: ADMIN, futureAdmin: null, publicCheckpoint: true };

  it("is due only once the deadline has strictly passed", () => {
    expect(isPublicCheckpointDue(open, cursor, T0 + 3600, 3600)).toBe(false);
    expect(isPublicCheckpointDue(open, cursor, T0 + 3601, 3600)).toBe(true);
  });

  it("is never due while the flag is off", () => {
    expect(
      isPublicCheckpointDue(
        { ...open, publicCheckpoint: false },
        cursor,
        T0 + 10 * 3600,
        3600
      )
    ).toBe(false);
  });
});

describe("admin gate", () => {
  it("lets only the admin checkpoint tokens while public checkpoints are off", async () => {
    const h = createHarness(T0 + 1);
    const distributor = await h.create();
    h.feeToken.mint(DISTRIBUTOR, 5n);

    const error = await distributor
      .checkpointToken(ALICE)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PermissionDeniedError);
    expect(isPermissionDeniedError(error) ? error.caller : null).toBe(ALICE);
    expect(await distributor.tokensPerEpoch(T0)).toBe(0n);

    await distributor.checkpointToken(ADMIN);
    expect(await distributor.tokensPerEpoch(T0)).toBe(5n);
  });

  it("opens token checkpoints to anyone after the cooldown", async () => {
    const h = createHarness(T0 + 1);
    const distributor = await h.create({ publicCheckpoint: true });
    await distributor.checkpointToken(ADMIN);

    h.clock.advance(3600);
    await expect(distributor.checkpointToken(ALICE)).rejects.toBeInstanceOf(
      PermissionDeniedError
    );

    h.clock.advance(1);
    await distributor.checkpointToken(ALICE);
    expect((await distributor.snapshot()).tokenCursor.lastTokenTime).toBe(
      T0 + 3602
    );
  });

  it("toggles the public flag for the admin only", async () => {
    const h = createHarness(T0 + 1);
    const distributor = await h.create();

    await expect(
      distributor.togglePublicCheckpoint(ALICE)
    ).rejects.toBeInstanceOf(PermissionDeniedError);
    expect(await distributor.togglePublicCheckpoint(ADMIN)).toBe(true);
    expect(await distributor.togglePublicCheckpoint(ADMIN)).toBe(false);
  });

  it("hands over admin rights in two steps", async () => {
    const h = createHarness(T0 + 1);
    const distributor = await h.create();

    await expect(distributor.commitAdmin(BOB, BOB)).rejects.toBeInstanceOf(
      PermissionDeniedError
    );
    await distributor.commitAdmin(ADMIN, BOB);
    expect((await distributor.snapshot()).adminState).toEqual({
      admin: ADMIN,
      futureAdmin: BOB,
      publicCheckpoint: false,
    });

    expect(await distributor.applyAdmin(ADMIN)).toBe(BOB);
    expect((await distributor.snapshot()).adminState).toEqual({
      admin: BOB,
      futureAdmin: null,
      publicCheckpoint: false,
    });
    await expect(
      distributor.togglePublicCheckpoint(ADMIN)
    ).rejects.toBeInstanceOf(PermissionDeniedError);
    expect(await distributor.togglePublicCheckpoint(BOB)).toBe(true);
  });

  it("refuses to apply an admin that was never committed", async () => {
    const h = createHarness(T0 + 1);
    const distributor = await h.create();

    await expect(distributor.applyAdmin(ADMIN)).rejects.toBeInstanceOf(
      AdminNotCommittedError
    );
  });
});
