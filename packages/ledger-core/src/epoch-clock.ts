// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@vefee/ledger-core/epoch-clock`
 * Purpose: Pure, deterministic mapping from unix timestamps (seconds) to week-aligned epoch boundaries.
 * Scope: Floors, ceils and steps epoch boundaries. Does not read the wall clock or perform I/O.
 * Invariants:
 * - EPOCH_ALIGNED: every returned epoch is a multiple of EPOCH_LENGTH_SECONDS.
 * - Epochs are anchored at unix time 0 (Thursday 00:00 UTC), not at a calendar weekday.
 * Side-effects: none
 * Links: docs/FEE_DISTRIBUTION.md#epoch-clock
 * @public
 */

import { EPOCH_LENGTH_SECONDS, type Epoch } from "./model";

function assertTimestamp(t: number): void {
  if (!Number.isSafeInteger(t) || t < 0) {
    throw new RangeError(
      `Timestamp must be a non-negative integer (unix seconds), got ${t}`
    );
  }
}

/**
 * Epoch containing `t`: `floor(t / W) * W`.
 */
export function epochOf(t: number): Epoch {
  assertTimestamp(t);
  return Math.floor(t / EPOCH_LENGTH_SECONDS) * EPOCH_LENGTH_SECONDS;
}

export function nextEpoch(epoch: Epoch): Epoch {
  return epoch + EPOCH_LENGTH_SECONDS;
}

/**
 * First epoch boundary at or after `t`. Equal to `epochOf(t)` when `t` already sits on a boundary.
 */
export function epochCeil(t: number): Epoch {
  const floor = epochOf(t);
  return floor === t ? floor : nextEpoch(floor);
}

export function isEpochBoundary(t: number): boolean {
  return Number.isSafeInteger(t) && t >= 0 && t % EPOCH_LENGTH_SECONDS === 0;
}

/**
 * Epoch boundaries in `[from, to]`, oldest first, capped at `limit` entries.
 * Both bounds are floored to their epoch first.
 */
export function epochsBetween(
  from: number,
  to: number,
  limit = Number.POSITIVE_INFINITY
): Epoch[] {
  const epochs: Epoch[] = [];
  for (
    let epoch = epochOf(from), last = epochOf(to);
    epoch <= last && epochs.length < limit;
    epoch = nextEpoch(epoch)
  ) {
    epochs.push(epoch);
  }
  return epochs;
}
