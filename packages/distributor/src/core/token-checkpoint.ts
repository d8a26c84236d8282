// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@vefee/distributor/core/token-checkpoint`
 * Purpose: Token-balance checkpointer — reconciles the distributor's fee-token balance delta into the weekly ledger.
 * Scope: Reads the balance, spreads the delta over (lastTokenTime, now] and advances the token cursor. Does not check permissions (see admin-gate).
 * Invariants:
 * - DELTA_CONSERVED: the full positive delta is credited; a non-positive delta credits nothing.
 * - The token cursor always advances to now, and never moves backwards.
 * - A start time in the future holds early deposits in the start epoch.
 * Side-effects: IO (token balance read, store writes, logging)
 * Links: docs/FEE_DISTRIBUTION.md#token-checkpoint
 * @internal
 */

import {
  type EpochCredit,
  type LedgerStore,
  spreadTokenDelta,
} from "@vefee/ledger-core";

import { logEvent } from "../observability/events";
import type { DistributorContext } from "./context";

export async function checkpointToken(
  ctx: DistributorContext,
  tx: LedgerStore
): Promise<EpochCredit[]> {
  const balance = await ctx.feeToken.balanceOf(ctx.config.distributorAddress);
  const cursor = await tx.getTokenCursor();
  const now = Math.max(ctx.clock.now(), cursor.lastTokenTime);
  const delta = balance - cursor.lastTokenBalance;

  const credits = spreadTokenDelta({
    delta,
    fromTime: cursor.lastTokenTime,
    toTime: now,
  });

  await tx.creditTokens(credits);
  await tx.setTokenCursor({ lastTokenTime: now, lastTokenBalance: balance });

  logEvent(ctx.logger, {
    event: "fees.token_checkpoint",
    fromTime: cursor.lastTokenTime,
    toTime: now,
    balance: balance.toString(),
    delta: delta.toString(),
    epochsCredited: credits.length,
  });

  return credits;
}
