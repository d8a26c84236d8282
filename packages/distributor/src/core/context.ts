// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@vefee/distributor/core/context`
 * Purpose: Dependencies shared by every distributor operation, plus the oracle call guard.
 * Scope: Type definitions and one error-wrapping helper. Does not hold ledger state (that lives behind LedgerStore).
 * Invariants: Every oracle failure surfaces as OracleUnavailableError.
 * Side-effects: none
 * Links: docs/FEE_DISTRIBUTION.md
 * @internal
 */

import { OracleUnavailableError } from "@vefee/ledger-core";
import type { Logger } from "pino";

import type { DistributorConfig } from "../config/distributor-config";
import type { Clock, FeeToken, VotingPowerOracle } from "../ports";

export interface DistributorContext {
  readonly config: DistributorConfig;
  readonly oracle: VotingPowerOracle;
  readonly feeToken: FeeToken;
  readonly clock: Clock;
  readonly logger: Logger;
}

export async function queryOracle<T>(
  query: string,
  call: () => Promise<T>
): Promise<T> {
  try {
    return await call();
  } catch (error) {
    if (error instanceof OracleUnavailableError) {
      throw error;
    }
    throw new OracleUnavailableError(query, { cause: error });
  }
}
