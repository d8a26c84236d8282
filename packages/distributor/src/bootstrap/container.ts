// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@vefee/distributor/bootstrap/container`
 * Purpose: Wires a FeeDistributor from validated env: viem clients, signer, ledger store and logger.
 * Scope: Composition root only. Does not contain distribution logic.
 * Invariants:
 * - Env is validated once, up front; invalid env throws ConfigValidationError.
 * - The distributor address is the signer's address (it holds the fees and signs payouts).
 * - Without DATABASE_URL the ledger lives in memory and is lost on exit.
 * Side-effects: IO (RPC clients, database pool)
 * Links: docs/FEE_DISTRIBUTION.md#configuration
 * @public
 */

import { createFeeLedgerDbClient, DrizzleFeeLedgerStore } from "@vefee/db-client";
import type { LedgerStore } from "@vefee/ledger-core";
import type { Logger } from "pino";
import {
  type Chain,
  createPublicClient,
  createWalletClient,
  http,
} from "viem";
import { privateKeyToAccount } from "viem/accounts";
import { base, mainnet, sepolia } from "viem/chains";

import { InMemoryLedgerStore } from "../adapters/in-memory-ledger-store";
import { SystemClock } from "../adapters/system-clock";
import { ViemFeeToken } from "../adapters/viem-fee-token";
import { ViemVotingEscrowOracle } from "../adapters/viem-voting-escrow-oracle";
import { loadDistributorEnv, toDistributorConfig } from "../config/env";
import { FeeDistributor } from "../core/fee-distributor";
import { makeLogger } from "../observability/logger";

const CHAINS: Readonly<Record<number, Chain>> = {
  [mainnet.id]: mainnet,
  [base.id]: base,
  [sepolia.id]: sepolia,
};

export function resolveChain(chainId: number): Chain {
  const chain = CHAINS[chainId];
  if (!chain) {
    throw new Error(
      `[container] Unsupported CHAIN_ID ${chainId}; expected one of ${Object.keys(CHAINS).join(", ")}`
    );
  }
  return chain;
}

export interface FeeDistributorContainer {
  distributor: FeeDistributor;
  logger: Logger;
  /** Release the database pool, if any */
  stop: () => Promise<void>;
}

export async function createFeeDistributorFromEnv(
  source: Record<string, string | undefined> = process.env
): Promise<FeeDistributorContainer> {
  const env = loadDistributorEnv(source);
  const logger = makeLogger({ component: "bootstrap" });
  const chain = resolveChain(env.CHAIN_ID);

  const signer = privateKeyToAccount(env.FEE_DISTRIBUTOR_SIGNER_KEY);
  const transport = http(env.EVM_RPC_URL);
  const publicClient = createPublicClient({ chain, transport });
  const walletClient = createWalletClient({ account: signer, chain, transport });

  let store: LedgerStore;
  let stop = async (): Promise<void> => {};
  if (env.DATABASE_URL) {
    const db = createFeeLedgerDbClient(env.DATABASE_URL);
    store = new DrizzleFeeLedgerStore(db);
    stop = async () => {
      await db.$client.end();
    };
  } else {
    logger.warn(
      {},
      "DATABASE_URL not set; fee ledger is in-memory and will not survive a restart"
    );
    store = new InMemoryLedgerStore();
  }

  const distributor = await FeeDistributor.create(
    {
      store,
      oracle: new ViemVotingEscrowOracle(
        publicClient,
        env.VOTING_ESCROW_ADDRESS
      ),
      feeToken: new ViemFeeToken(
        publicClient,
        walletClient,
        env.FEE_TOKEN_ADDRESS
      ),
      clock: new SystemClock(),
      logger,
    },
    toDistributorConfig(env, signer.address)
  );

  logger.info(
    { chainId: chain.id, distributor: signer.address },
    "Fee distributor ready"
  );

  return { distributor, logger, stop };
}
