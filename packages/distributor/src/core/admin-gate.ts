// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@vefee/distributor/core/admin-gate`
 * Purpose: Admin gate: who may checkpoint tokens, the public-checkpoint flag, and two-step admin rotation.
 * Scope: Permission checks and admin-state transitions inside a caller-provided transaction. Does not checkpoint anything itself.
 * Invariants:
 * - Admin-only actions from anyone else throw PermissionDeniedError before any write.
 * - A public checkpoint is due only when the flag is set and the cooldown has strictly elapsed.
 * Side-effects: IO (store writes, logging)
 * Links: docs/FEE_DISTRIBUTION.md#admin-gate
 * @internal
 */

import {
  type Account,
  AdminNotCommittedError,
  type AdminState,
  type LedgerStore,
  PermissionDeniedError,
  type TokenCursor,
} from "@vefee/ledger-core";

import { sameAccount } from "../config/account";
import { logEvent } from "../observability/events";
import type { DistributorContext } from "./context";

export function isAdmin(state: AdminState, caller: Account): boolean {
  return sameAccount(state.admin, caller);
}

export function assertAdmin(
  state: AdminState,
  caller: Account,
  action: string
): void {
  if (!isAdmin(state, caller)) {
    throw new PermissionDeniedError(action, caller);
  }
}

/** Whether anyone (or a claim) may trigger a token checkpoint right now */
export function isPublicCheckpointDue(
  state: AdminState,
  cursor: TokenCursor,
  now: number,
  deadlineSeconds: number
): boolean {
  return state.publicCheckpoint && now > cursor.lastTokenTime + deadlineSeconds;
}

export async function assertCanCheckpointToken(
  ctx: DistributorContext,
  tx: LedgerStore,
  caller: Account
): Promise<void> {
  const state = await tx.getAdminState();
  if (isAdmin(state, caller)) {
    return;
  }
  const cursor = await tx.getTokenCursor();
  if (
    !isPublicCheckpointDue(
      state,
      cursor,
      ctx.clock.now(),
      ctx.config.tokenCheckpointDeadlineSeconds
    )
  ) {
    throw new PermissionDeniedError("checkpoint token", caller);
  }
}

export async function togglePublicCheckpoint(
  ctx: DistributorContext,
  tx: LedgerStore,
  caller: Account
): Promise<boolean> {
  const state = await tx.getAdminState();
  assertAdmin(state, caller, "toggle public checkpoint");

  const publicCheckpoint = !state.publicCheckpoint;
  await tx.setAdminState({ ...state, publicCheckpoint });

  logEvent(ctx.logger, {
    event: "fees.admin",
    action: "toggle_public_checkpoint",
    caller,
    publicCheckpoint,
  });
  return publicCheckpoint;
}

export async function commitAdmin(
  ctx: DistributorContext,
  tx: LedgerStore,
  caller: Account,
  futureAdmin: Account
): Promise<void> {
  const state = await tx.getAdminState();
  assertAdmin(state, caller, "commit admin");

  await tx.setAdminState({ ...state, futureAdmin });

  logEvent(ctx.logger, {
    event: "fees.admin",
    action: "commit_admin",
    caller,
    admin: futureAdmin,
  });
}

export async function applyAdmin(
  ctx: DistributorContext,
  tx: LedgerStore,
  caller: Account
): Promise<Account> {
  const state = await tx.getAdminState();
  assertAdmin(state, caller, "apply admin");

  if (state.futureAdmin === null) {
    throw new AdminNotCommittedError();
  }

  const admin = state.futureAdmin;
  await tx.setAdminState({ ...state, admin, futureAdmin: null });

  logEvent(ctx.logger, {
    event: "fees.admin",
    action: "apply_admin",
    caller,
    admin,
  });
  return admin;
}
