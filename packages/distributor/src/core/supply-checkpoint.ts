// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@vefee/distributor/core/supply-checkpoint`
 * Purpose: Total-supply checkpointer — records one voting-power snapshot per epoch boundary up to now.
 * Scope: Walks the supply cursor forward inside a caller-provided transaction. Does not touch the token ledger.
 * Invariants:
 * - SUPPLY_WRITE_ONCE: only epochs at or after the supply cursor are written.
 * - BOUNDED_CATCH_UP: at most config.maxSupplyCheckpointEpochs epochs per call; callers repeat to catch up.
 * - Idempotent: with no new boundary reached, nothing is written.
 * Side-effects: IO (oracle reads, store writes, logging)
 * Links: docs/FEE_DISTRIBUTION.md#total-supply-checkpoint
 * @internal
 */

import {
  epochOf,
  epochsBetween,
  type LedgerStore,
  nextEpoch,
} from "@vefee/ledger-core";

import { logEvent } from "../observability/events";
import { type DistributorContext, queryOracle } from "./context";

/**
 * @returns Number of epochs written by this call
 */
export async function checkpointTotalSupply(
  ctx: DistributorContext,
  tx: LedgerStore
): Promise<number> {
  const roundedNow = epochOf(ctx.clock.now());
  const cursor = await tx.getSupplyCursor();
  const epochs = epochsBetween(
    cursor,
    roundedNow,
    ctx.config.maxSupplyCheckpointEpochs
  );

  const last = epochs.at(-1);
  if (last === undefined) {
    return 0;
  }

  for (const epoch of epochs) {
    const supply = await queryOracle(`totalSupply(${epoch})`, () =>
      ctx.oracle.totalSupply(epoch)
    );
    await tx.recordSupply(epoch, supply);
  }

  const supplyCursor = nextEpoch(last);
  await tx.setSupplyCursor(supplyCursor);

  logEvent(ctx.logger, {
    event: "fees.supply_checkpoint",
    fromEpoch: cursor,
    epochsWritten: epochs.length,
    supplyCursor,
  });

  return epochs.length;
}
