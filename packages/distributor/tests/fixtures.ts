// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@vefee/distributor/tests/fixtures`
 * Purpose: Reusable accounts, times and a wired-up distributor for distributor tests.
 * Scope: Builds fakes plus an in-memory store by default. Does not assert anything.
 * Invariants: Addresses contain digits only, so their checksummed form equals the literal.
 * Side-effects: none
 * Links: tests/*.test.ts
 * @internal
 */

import {
  type Account,
  EPOCH_LENGTH_SECONDS,
  type LedgerStore,
} from "@vefee/ledger-core";
import type { Logger } from "pino";

import { InMemoryLedgerStore } from "../src/adapters/in-memory-ledger-store";
import type { DistributorConfigInput } from "../src/config/distributor-config";
import { FeeDistributor } from "../src/core/fee-distributor";
import { FakeClock, FakeFeeToken, FakeVotingEscrow } from "./_fakes";

export const W = EPOCH_LENGTH_SECONDS;

/** Epoch-aligned start used across scenarios */
export const T0 = 100 * W;

export const ADMIN: Account = "0x1000000000000000000000000000000000000001";
export const ALICE: Account = "0x2000000000000000000000000000000000000002";
export const BOB: Account = "0x3000000000000000000000000000000000000003";
export const CAROL: Account = "0x4000000000000000000000000000000000000004";
export const DISTRIBUTOR: Account = "0x9000000000000000000000000000000000000009";

/** 1000 tokens at 18 decimals */
export const LOCK_AMOUNT = 10n ** 21n;

export const ONE_TOKEN = 10n ** 18n;

export const DAY = 86_400;

export interface HarnessOptions {
  store?: LedgerStore;
  logger?: Logger;
}

export function createHarness(now: number, options: HarnessOptions = {}) {
  const clock = new FakeClock(now);
  const votingEscrow = new FakeVotingEscrow();
  const feeToken = new FakeFeeToken(DISTRIBUTOR);
  const store = options.store ?? new InMemoryLedgerStore();

  const create = (config?: Partial<DistributorConfigInput>) =>
    FeeDistributor.create(
      { store, oracle: votingEscrow, feeToken, clock, logger: options.logger },
      {
        startTime: T0,
        admin: ADMIN,
        distributorAddress: DISTRIBUTOR,
        ...config,
      }
    );

  return { clock, votingEscrow, feeToken, store, create };
}

/** Lock LOCK_AMOUNT for a year, starting one week before T0 */
export function lockBeforeStart(
  votingEscrow: FakeVotingEscrow,
  account: Account
): void {
  votingEscrow.createLock(account, LOCK_AMOUNT, T0 - W, T0 + 52 * W);
}
