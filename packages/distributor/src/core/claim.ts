// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@vefee/distributor/core/claim`
 * Purpose: Claim engine: replays the weekly ledger from an account's cursor and computes what it is owed.
 * Scope: Cursor initialisation, bounded epoch walk, cursor advance. Does not transfer tokens (the caller pays after this returns).
 * Invariants:
 * - PAID_ONCE: only epochs >= the account's cursor are read, and the cursor only moves forward.
 * - FINALISED_ONLY: an epoch is payable when its token entry is final (before epochOf(lastTokenTime)) and its supply is recorded.
 * - BOUNDED_WALK: at most config.maxClaimEpochs epochs per call; each call is individually correct and resumable.
 * - SHARE_FLOORED: per-epoch remainders stay with the ledger.
 * Side-effects: IO (oracle reads, store writes)
 * Links: docs/FEE_DISTRIBUTION.md#claim-engine
 * @internal
 */

import {
  type Account,
  type Epoch,
  epochOf,
  epochShare,
  type LedgerStore,
  nextEpoch,
} from "@vefee/ledger-core";

import { type DistributorContext, queryOracle } from "./context";

export interface ClaimComputation {
  readonly account: Account;
  readonly amount: bigint;
  /** Cursor before the walk; null when the account has never locked */
  readonly fromEpoch: Epoch | null;
  /** Cursor after the walk */
  readonly toEpoch: Epoch | null;
  /** Payable bound (exclusive) at the time of the walk */
  readonly limitEpoch: Epoch;
}

async function resolveCursor(
  ctx: DistributorContext,
  tx: LedgerStore,
  account: Account
): Promise<Epoch | null> {
  const existing = await tx.getAccountCursor(account);
  if (existing !== null) {
    return existing;
  }

  const firstActivity = await queryOracle(`firstActivityOf(${account})`, () =>
    ctx.oracle.firstActivityOf(account)
  );
  if (firstActivity === null) {
    return null;
  }

  const startEpoch = await tx.getStartEpoch();
  return Math.max(startEpoch, epochOf(firstActivity));
}

/**
 * Walk payable epochs for `account` and advance its cursor in `tx`.
 * The checkpointers are expected to have run already when fresh data is wanted.
 */
export async function computeClaim(
  ctx: DistributorContext,
  tx: LedgerStore,
  account: Account
): Promise<ClaimComputation> {
  const tokenCursor = await tx.getTokenCursor();
  const supplyCursor = await tx.getSupplyCursor();
  const limitEpoch = Math.min(epochOf(tokenCursor.lastTokenTime), supplyCursor);

  const fromEpoch = await resolveCursor(ctx, tx, account);
  if (fromEpoch === null) {
    return { account, amount: 0n, fromEpoch, toEpoch: null, limitEpoch };
  }

  let epoch = fromEpoch;
  let amount = 0n;
  for (
    let walked = 0;
    epoch < limitEpoch && walked < ctx.config.maxClaimEpochs;
    walked++
  ) {
    const supply = await tx.getSupplyAt(epoch);
    const tokens = await tx.getTokensPerEpoch(epoch);

    if (supply > 0n && tokens > 0n) {
      const at = epoch;
      const balance = await queryOracle(`balanceOf(${account}, ${at})`, () =>
        ctx.oracle.balanceOf(account, at)
      );
      amount += epochShare({ tokens, balance, supply });
    }

    epoch = nextEpoch(epoch);
  }

  await tx.setAccountCursor(account, epoch);

  return { account, amount, fromEpoch, toEpoch: epoch, limitEpoch };
}
