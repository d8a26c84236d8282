// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@vefee/distributor/ports`
 * Purpose: Collaborator ports consumed by the fee distributor.
 * Scope: Re-exports port interfaces. Does not contain implementations.
 * Invariants: none
 * Side-effects: none
 * Links: docs/FEE_DISTRIBUTION.md
 * @public
 */

export type { LedgerStore } from "@vefee/ledger-core";
export type { Clock } from "./clock.port";
export type { FeeToken } from "./fee-token.port";
export type { VotingPowerOracle } from "./voting-power-oracle.port";
