// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@vefee/distributor/config/env`
 * Purpose: Environment variable validation for running the distributor against a live chain.
 * Scope: Parses an env record into typed settings and maps them onto DistributorConfigInput. Does not create clients.
 * Invariants: Fails fast on invalid env; reports every missing and invalid key at once.
 * Side-effects: none (caller passes the env record)
 * Notes: Missing vs invalid is derived from zod issue codes, without casting.
 * Links: docs/FEE_DISTRIBUTION.md#configuration
 * @public
 */

import { type Hex, isHex } from "viem";
import { ZodError, z } from "zod";

import { AccountSchema } from "./account";
import {
  DEFAULT_TOKEN_CHECKPOINT_DEADLINE_SECONDS,
  type DistributorConfigInput,
} from "./distributor-config";

export interface ConfigValidationMeta {
  code: "INVALID_CONFIG";
  missing: string[];
  invalid: string[];
}

export class ConfigValidationError extends Error {
  readonly meta: ConfigValidationMeta;

  constructor(meta: ConfigValidationMeta) {
    super(`Invalid distributor env: ${JSON.stringify(meta)}`);
    this.name = "ConfigValidationError";
    this.meta = meta;
  }
}

export function isConfigValidationError(
  error: unknown
): error is ConfigValidationError {
  return error instanceof Error && error.name === "ConfigValidationError";
}

const booleanFlag = z
  .enum(["true", "false"])
  .default("false")
  .transform((value) => value === "true");

const envSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),

  // Service identity for observability
  SERVICE_NAME: z.string().default("fee-distributor"),
  PINO_LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error"])
    .default("info"),

  // Optional Postgres ledger; in-memory when unset
  DATABASE_URL: z.string().url().optional(),

  // Chain access
  EVM_RPC_URL: z.string().url(),
  CHAIN_ID: z.coerce.number().int().positive().default(1),
  VOTING_ESCROW_ADDRESS: AccountSchema,
  FEE_TOKEN_ADDRESS: AccountSchema,
  /** Hot wallet that holds fees and signs payouts */
  FEE_DISTRIBUTOR_SIGNER_KEY: z
    .string()
    .refine((value): value is Hex => isHex(value) && value.length === 66, {
      message: "Expected a 32-byte hex private key",
    }),

  // Distributor parameters
  FEE_DISTRIBUTOR_ADMIN: AccountSchema,
  FEE_DISTRIBUTOR_START_TIME: z.coerce.number().int().nonnegative(),
  FEE_DISTRIBUTOR_PUBLIC_CHECKPOINT: booleanFlag,
  FEE_DISTRIBUTOR_CHECKPOINT_DEADLINE_SECONDS: z.coerce
    .number()
    .int()
    .nonnegative()
    .default(DEFAULT_TOKEN_CHECKPOINT_DEADLINE_SECONDS),
});

export type DistributorEnv = z.infer<typeof envSchema>;

export function loadDistributorEnv(
  source: Record<string, string | undefined>
): DistributorEnv {
  try {
    return envSchema.parse(source);
  } catch (error) {
    if (error instanceof ZodError) {
      const missing = new Set<string>();
      const invalid = new Set<string>();

      for (const issue of error.issues) {
        const key = issue.path[0]?.toString();
        if (!key) continue;

        if (issue.code === "invalid_type") {
          missing.add(key);
        } else {
          invalid.add(key);
        }
      }

      throw new ConfigValidationError({
        code: "INVALID_CONFIG",
        missing: [...missing],
        invalid: [...invalid],
      });
    }

    throw error;
  }
}

/**
 * Map validated env onto engine options. The distributor address is the
 * signer's address, derived by the caller from FEE_DISTRIBUTOR_SIGNER_KEY.
 */
export function toDistributorConfig(
  env: DistributorEnv,
  distributorAddress: string
): DistributorConfigInput {
  return {
    startTime: env.FEE_DISTRIBUTOR_START_TIME,
    admin: env.FEE_DISTRIBUTOR_ADMIN,
    distributorAddress,
    tokenCheckpointDeadlineSeconds:
      env.FEE_DISTRIBUTOR_CHECKPOINT_DEADLINE_SECONDS,
    publicCheckpoint: env.FEE_DISTRIBUTOR_PUBLIC_CHECKPOINT,
  };
}
