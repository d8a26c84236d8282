// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@vefee/ledger-core/rules`
 * Purpose: Distribution arithmetic — time-proportional spreading of a token delta across epochs, and per-epoch claim shares.
 * Scope: Pure functions. Does not perform I/O or mutate external state.
 * Invariants:
 * - All arithmetic uses BigInt, no floating point (ALL_MATH_BIGINT).
 * - DELTA_CONSERVED: sum of spreadTokenDelta credits === delta.
 * - SHARE_FLOORED: epochShare rounds down; the remainder stays with the ledger.
 * Side-effects: none
 * Links: docs/FEE_DISTRIBUTION.md#token-checkpoint
 * @public
 */

import { epochOf, nextEpoch } from "./epoch-clock";
import type { EpochCredit } from "./model";

/**
 * Spread `delta` over the half-open interval `(fromTime, toTime]`.
 *
 * 1. Split the interval at every epoch boundary it crosses
 * 2. Credit each piece `delta * pieceLength / intervalLength` (floor)
 * 3. Assign the rounding residual to the final piece so credits sum to `delta`
 *
 * A zero-length interval credits the whole delta to `epochOf(toTime)`.
 * A non-positive delta credits nothing.
 *
 * @returns Credits in ascending epoch order, one per epoch touched
 */
export function spreadTokenDelta(params: {
  readonly delta: bigint;
  readonly fromTime: number;
  readonly toTime: number;
}): EpochCredit[] {
  const { delta, fromTime, toTime } = params;

  if (toTime < fromTime) {
    throw new RangeError(
      `Checkpoint interval runs backwards: ${fromTime} -> ${toTime}`
    );
  }

  if (delta <= 0n) {
    return [];
  }

  if (toTime === fromTime) {
    return [{ epoch: epochOf(toTime), amount: delta }];
  }

  const pieces: Array<{ epoch: number; length: number }> = [];
  for (let t = fromTime; t < toTime; ) {
    const epoch = epochOf(t);
    const end = Math.min(nextEpoch(epoch), toTime);
    pieces.push({ epoch, length: end - t });
    t = end;
  }

  const total = BigInt(toTime - fromTime);
  const credits: EpochCredit[] = [];
  let credited = 0n;

  pieces.forEach(({ epoch, length }, i) => {
    const amount =
      i === pieces.length - 1
        ? delta - credited
        : (delta * BigInt(length)) / total;
    credited += amount;
    credits.push({ epoch, amount });
  });

  return credits;
}

/**
 * Account's share of one epoch's tokens: `tokens * balance / supply`, floored.
 * Zero supply means nobody held voting power at that boundary, so nothing is owed.
 */
export function epochShare(params: {
  readonly tokens: bigint;
  readonly balance: bigint;
  readonly supply: bigint;
}): bigint {
  const { tokens, balance, supply } = params;

  if (tokens < 0n || balance < 0n || supply < 0n) {
    throw new RangeError(
      `Negative share input: tokens=${tokens} balance=${balance} supply=${supply}`
    );
  }

  if (supply === 0n || tokens === 0n || balance === 0n) {
    return 0n;
  }

  return (tokens * balance) / supply;
}
