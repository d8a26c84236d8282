// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@vefee/distributor/config/distributor-config`
 * Purpose: Zod schema for the engine's construction parameters.
 * Scope: Validates and defaults FeeDistributor options. Does not read process.env (see ./env).
 * Invariants:
 * - startTime is immutable once the ledger exists.
 * - Iteration bounds are positive so every call makes progress.
 * Side-effects: none
 * Links: docs/FEE_DISTRIBUTION.md#configuration
 * @public
 */

import {
  MAX_CLAIM_EPOCHS,
  MAX_CLAIM_MANY_ACCOUNTS,
  MAX_SUPPLY_CHECKPOINT_EPOCHS,
} from "@vefee/ledger-core";
import { z } from "zod";

import { AccountSchema } from "./account";

/** Cooldown between public token checkpoints */
export const DEFAULT_TOKEN_CHECKPOINT_DEADLINE_SECONDS = 3600;

export const DistributorConfigSchema = z.object({
  /** Earliest payable time; floored to an epoch */
  startTime: z.number().int().nonnegative(),
  admin: AccountSchema,
  /** Address holding the fee tokens (balanceOf(self)) */
  distributorAddress: AccountSchema,
  tokenCheckpointDeadlineSeconds: z
    .number()
    .int()
    .nonnegative()
    .default(DEFAULT_TOKEN_CHECKPOINT_DEADLINE_SECONDS),
  maxSupplyCheckpointEpochs: z
    .number()
    .int()
    .positive()
    .default(MAX_SUPPLY_CHECKPOINT_EPOCHS),
  maxClaimEpochs: z.number().int().positive().default(MAX_CLAIM_EPOCHS),
  maxClaimManyAccounts: z
    .number()
    .int()
    .positive()
    .default(MAX_CLAIM_MANY_ACCOUNTS),
  publicCheckpoint: z.boolean().default(false),
});

export type DistributorConfigInput = z.input<typeof DistributorConfigSchema>;
export type DistributorConfig = z.output<typeof DistributorConfigSchema>;
