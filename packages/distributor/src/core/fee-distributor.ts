// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@vefee/distributor/core/fee-distributor`
 * Purpose: Public surface of the fee distribution engine — checkpoints, claims, deposits, admin gate and read-only views.
 * Scope: Serialises operations, opens one store transaction per operation and moves tokens. Does not implement the per-component math (see sibling modules).
 * Invariants:
 * - SERIALIZED: at most one mutating operation runs at a time (single-slot queue).
 * - ALL_OR_NOTHING: an operation that throws leaves no staged writes behind, including the pre-claim checkpoints.
 * - PAY_LAST: the token transfer is the final step of a claim's transaction; a commit failing after it is logged at error level.
 * - Accounts are checksummed on entry so one address maps to one cursor.
 * Side-effects: IO (oracle, fee token, store, logging)
 * Links: docs/FEE_DISTRIBUTION.md
 * @public
 */

import {
  type Account,
  type Epoch,
  epochOf,
  GenesisMismatchError,
  type LedgerSnapshot,
  type LedgerStore,
  TokenTransferFailedError,
} from "@vefee/ledger-core";
import pLimit from "p-limit";
import type { Logger } from "pino";

import { sameAccount, toAccount } from "../config/account";
import {
  type DistributorConfigInput,
  DistributorConfigSchema,
} from "../config/distributor-config";
import { logEvent } from "../observability/events";
import { makeNoopLogger } from "../observability/logger";
import type { Clock, FeeToken, VotingPowerOracle } from "../ports";
import {
  applyAdmin,
  assertCanCheckpointToken,
  commitAdmin,
  isPublicCheckpointDue,
  togglePublicCheckpoint,
} from "./admin-gate";
import { computeClaim } from "./claim";
import { type DistributorContext, queryOracle } from "./context";
import { checkpointTotalSupply } from "./supply-checkpoint";
import { checkpointToken } from "./token-checkpoint";

export interface FeeDistributorDeps {
  store: LedgerStore;
  oracle: VotingPowerOracle;
  feeToken: FeeToken;
  clock: Clock;
  /** Defaults to a silent logger */
  logger?: Logger;
}

export class FeeDistributor {
  private readonly serial = pLimit(1);

  private constructor(
    private readonly ctx: DistributorContext,
    private readonly store: LedgerStore
  ) {}

  /**
   * Create the distributor, seeding an empty ledger on first use and taking
   * the initial total-supply checkpoint.
   *
   * @throws GenesisMismatchError when an existing ledger has another start epoch
   */
  static async create(
    deps: FeeDistributorDeps,
    input: DistributorConfigInput
  ): Promise<FeeDistributor> {
    const config = DistributorConfigSchema.parse(input);
    const logger = (deps.logger ?? makeNoopLogger()).child({
      component: "fee-distributor",
    });

    const startEpoch = epochOf(config.startTime);
    await deps.store.initialize({
      startEpoch,
      admin: config.admin,
      publicCheckpoint: config.publicCheckpoint,
    });

    const storedStartEpoch = await deps.store.getStartEpoch();
    if (storedStartEpoch !== startEpoch) {
      throw new GenesisMismatchError(storedStartEpoch, startEpoch);
    }
    const { admin } = await deps.store.getAdminState();
    if (!sameAccount(admin, config.admin)) {
      logger.warn(
        { storedAdmin: admin, configuredAdmin: config.admin },
        "Configured admin differs from the ledger's admin; the ledger's admin stays in effect"
      );
    }

    const distributor = new FeeDistributor(
      {
        config,
        oracle: deps.oracle,
        feeToken: deps.feeToken,
        clock: deps.clock,
        logger,
      },
      deps.store
    );
    await distributor.checkpointTotalSupply();
    return distributor;
  }

  private run<T>(fn: (tx: LedgerStore) => Promise<T>): Promise<T> {
    return this.serial(() => this.store.transaction(fn));
  }

  // ── Checkpoints ─────────────────────────────────────────────

  /**
   * Reconcile the fee-token balance into the weekly ledger.
   * @throws PermissionDeniedError unless `caller` is admin or a public checkpoint is due
   */
  checkpointToken(caller: Account): Promise<void> {
    const account = toAccount(caller);
    return this.run(async (tx) => {
      await assertCanCheckpointToken(this.ctx, tx, account);
      await checkpointToken(this.ctx, tx);
    });
  }

  /** @returns Number of epoch snapshots written */
  checkpointTotalSupply(): Promise<number> {
    return this.run((tx) => checkpointTotalSupply(this.ctx, tx));
  }

  // ── Claims ──────────────────────────────────────────────────

  /**
   * Pay `account` everything owed for finalised epochs since its cursor
   * (bounded per call). Zero is a valid result.
   */
  claim(account: Account): Promise<bigint> {
    const claimant = toAccount(account);
    return this.serial(() =>
      this.settle(claimant, async (tx) => {
        await this.refreshLedgers(tx);
        return this.claimAndPay(tx, claimant);
      })
    );
  }

  /**
   * Claim for up to `maxClaimManyAccounts` accounts in order. Ledgers are
   * refreshed once; each account then settles in its own transaction, so a
   * failed transfer stops the batch without undoing earlier payouts.
   *
   * @returns Total amount transferred
   */
  claimMany(accounts: readonly Account[]): Promise<bigint> {
    if (accounts.length > this.ctx.config.maxClaimManyAccounts) {
      return Promise.reject(
        new RangeError(
          `claimMany accepts at most ${this.ctx.config.maxClaimManyAccounts} accounts, got ${accounts.length}`
        )
      );
    }
    const claimants = accounts.map(toAccount);

    return this.serial(async () => {
      await this.store.transaction((tx) => this.refreshLedgers(tx));

      let total = 0n;
      for (const claimant of claimants) {
        total += await this.settle(claimant, (tx) =>
          this.claimAndPay(tx, claimant)
        );
      }
      return total;
    });
  }

  /**
   * Run one claim in its own transaction. The payout is sent before the
   * commit, so a commit that fails after a transfer is logged at error level
   * with the amount already paid.
   */
  private async settle(
    account: Account,
    work: (tx: LedgerStore) => Promise<bigint>
  ): Promise<bigint> {
    let paid: bigint = 0n;
    try {
      return await this.store.transaction(async (tx) => {
        paid = await work(tx);
        return paid;
      });
    } catch (error) {
      if (paid > 0n) {
        this.ctx.logger.error(
          { err: error, account, amount: paid.toString() },
          "claim paid out but the ledger commit failed; cursor not advanced"
        );
      } else {
        this.ctx.logger.warn({ err: error, account }, "claim aborted");
      }
      throw error;
    }
  }

  private async refreshLedgers(tx: LedgerStore): Promise<void> {
    const now = this.ctx.clock.now();
    const state = await tx.getAdminState();
    const cursor = await tx.getTokenCursor();

    if (
      isPublicCheckpointDue(
        state,
        cursor,
        now,
        this.ctx.config.tokenCheckpointDeadlineSeconds
      )
    ) {
      await checkpointToken(this.ctx, tx);
    }

    if (now >= (await tx.getSupplyCursor())) {
      await checkpointTotalSupply(this.ctx, tx);
    }
  }

  private async claimAndPay(tx: LedgerStore, account: Account): Promise<bigint> {
    const claim = await computeClaim(this.ctx, tx, account);

    if (claim.amount > 0n) {
      const cursor = await tx.getTokenCursor();
      await tx.setTokenCursor({
        ...cursor,
        lastTokenBalance: cursor.lastTokenBalance - claim.amount,
      });
      await this.transferOut(account, claim.amount);
    }

    logEvent(this.ctx.logger, {
      event: "fees.claim",
      account,
      fromEpoch: claim.fromEpoch ?? claim.limitEpoch,
      toEpoch: claim.toEpoch ?? claim.limitEpoch,
      amount: claim.amount.toString(),
      reason:
        claim.fromEpoch === null
          ? "no_lock_history"
          : claim.fromEpoch === claim.toEpoch
            ? "not_yet_checkpointed"
            : undefined,
    });

    return claim.amount;
  }

  private async transferOut(to: Account, amount: bigint): Promise<void> {
    let ok: boolean;
    try {
      ok = await this.ctx.feeToken.transfer(to, amount);
    } catch (error) {
      throw new TokenTransferFailedError(to, amount, { cause: error });
    }
    if (!ok) {
      throw new TokenTransferFailedError(to, amount);
    }
  }

  // ── Deposits ────────────────────────────────────────────────

  /**
   * Pull `amount` fee tokens from `from` (needs an allowance), then checkpoint
   * if a public checkpoint is due. Plain transfers to the distributor address
   * are equally valid deposits; they are credited at the next checkpoint.
   *
   * @returns Whether a token checkpoint ran
   */
  depositFees(from: Account, amount: bigint): Promise<boolean> {
    if (amount < 0n) {
      return Promise.reject(
        new RangeError(`Deposit amount must be non-negative, got ${amount}`)
      );
    }
    const depositor = toAccount(from);
    if (amount === 0n) {
      return Promise.resolve(false);
    }

    return this.run(async (tx) => {
      const to = this.ctx.config.distributorAddress;
      let ok: boolean;
      try {
        ok = await this.ctx.feeToken.transferFrom(depositor, to, amount);
      } catch (error) {
        throw new TokenTransferFailedError(to, amount, { cause: error });
      }
      if (!ok) {
        throw new TokenTransferFailedError(to, amount);
      }

      const state = await tx.getAdminState();
      const cursor = await tx.getTokenCursor();
      if (
        !isPublicCheckpointDue(
          state,
          cursor,
          this.ctx.clock.now(),
          this.ctx.config.tokenCheckpointDeadlineSeconds
        )
      ) {
        return false;
      }
      await checkpointToken(this.ctx, tx);
      return true;
    });
  }

  // ── Admin gate ──────────────────────────────────────────────

  /** @returns The new flag value */
  togglePublicCheckpoint(caller: Account): Promise<boolean> {
    const account = toAccount(caller);
    return this.run((tx) => togglePublicCheckpoint(this.ctx, tx, account));
  }

  commitAdmin(caller: Account, futureAdmin: Account): Promise<void> {
    const account = toAccount(caller);
    const next = toAccount(futureAdmin);
    return this.run((tx) => commitAdmin(this.ctx, tx, account, next));
  }

  /** @returns The new admin */
  applyAdmin(caller: Account): Promise<Account> {
    const account = toAccount(caller);
    return this.run((tx) => applyAdmin(this.ctx, tx, account));
  }

  // ── Read-only views ─────────────────────────────────────────

  /** Tokens credited to the epoch containing `timestamp` */
  tokensPerEpoch(timestamp: number): Promise<bigint> {
    return this.store.getTokensPerEpoch(epochOf(timestamp));
  }

  /** Recorded total voting power at the epoch containing `timestamp` */
  supplyAt(timestamp: number): Promise<bigint> {
    return this.store.getSupplyAt(epochOf(timestamp));
  }

  /** First unpaid epoch for `account`; null before its first claim */
  timeCursorOf(account: Account): Promise<Epoch | null> {
    return this.store.getAccountCursor(toAccount(account));
  }

  votingBalanceAt(account: Account, timestamp: number): Promise<bigint> {
    const holder = toAccount(account);
    return queryOracle(`balanceOf(${holder}, ${timestamp})`, () =>
      this.ctx.oracle.balanceOf(holder, timestamp)
    );
  }

  async snapshot(): Promise<LedgerSnapshot> {
    return {
      startEpoch: await this.store.getStartEpoch(),
      tokenCursor: await this.store.getTokenCursor(),
      supplyCursor: await this.store.getSupplyCursor(),
      adminState: await this.store.getAdminState(),
    };
  }
}
