// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@vefee/distributor`
 * Purpose: Time-weighted fee distribution engine for voting-escrow lockers, with its ports, adapters and env bootstrap.
 * Scope: Public exports only. Does not contain logic.
 * Invariants: Core operations depend on ports, never on concrete adapters.
 * Side-effects: none
 * Links: docs/FEE_DISTRIBUTION.md
 * @public
 */

// Engine
export {
  FeeDistributor,
  type FeeDistributorDeps,
} from "./core/fee-distributor";
export type { ClaimComputation } from "./core/claim";

// Ports
export type { Clock, FeeToken, LedgerStore, VotingPowerOracle } from "./ports";

// Adapters
export { ERC20_ABI, VOTING_ESCROW_ABI } from "./adapters/abi";
export { InMemoryLedgerStore } from "./adapters/in-memory-ledger-store";
export { SystemClock } from "./adapters/system-clock";
export {
  type TokenReader,
  type TokenSigner,
  ViemFeeToken,
} from "./adapters/viem-fee-token";
export {
  type ContractReader,
  ViemVotingEscrowOracle,
} from "./adapters/viem-voting-escrow-oracle";

// Configuration
export { AccountSchema, sameAccount, toAccount } from "./config/account";
export {
  DEFAULT_TOKEN_CHECKPOINT_DEADLINE_SECONDS,
  type DistributorConfig,
  type DistributorConfigInput,
  DistributorConfigSchema,
} from "./config/distributor-config";
export {
  ConfigValidationError,
  type DistributorEnv,
  isConfigValidationError,
  loadDistributorEnv,
  toDistributorConfig,
} from "./config/env";

// Bootstrap
export {
  createFeeDistributorFromEnv,
  type FeeDistributorContainer,
  resolveChain,
} from "./bootstrap/container";

// Observability
export type { DistributorEvent, DistributorEventName } from "./observability/events";
export { makeLogger, makeNoopLogger } from "./observability/logger";
