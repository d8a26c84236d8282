// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@vefee/distributor/observability/events`
 * Purpose: Strict event schemas for the distributor's structured logs, plus a typed emitter.
 * Scope: Define log event types and emit them. Does not create loggers.
 * Invariants: Event names come from this registry only; amounts are logged as decimal strings (bigint is not JSON).
 * Side-effects: IO (logging via provided logger)
 * Links: Used by core/* operations.
 * @public
 */

import type { Logger } from "pino";

export interface TokenCheckpointEvent {
  event: "fees.token_checkpoint";
  fromTime: number;
  toTime: number;
  balance: string;
  delta: string;
  epochsCredited: number;
}

export interface SupplyCheckpointEvent {
  event: "fees.supply_checkpoint";
  fromEpoch: number;
  epochsWritten: number;
  supplyCursor: number;
}

export interface ClaimEvent {
  event: "fees.claim";
  account: string;
  fromEpoch: number;
  toEpoch: number;
  amount: string;
  reason?: "not_yet_checkpointed" | "no_lock_history" | undefined;
}

export interface AdminEvent {
  event: "fees.admin";
  action:
    | "toggle_public_checkpoint"
    | "commit_admin"
    | "apply_admin";
  caller: string;
  publicCheckpoint?: boolean | undefined;
  admin?: string | undefined;
}

export type DistributorEvent =
  | TokenCheckpointEvent
  | SupplyCheckpointEvent
  | ClaimEvent
  | AdminEvent;

export type DistributorEventName = DistributorEvent["event"];

export function logEvent(logger: Logger, fields: DistributorEvent): void {
  logger.info(fields, fields.event);
}
