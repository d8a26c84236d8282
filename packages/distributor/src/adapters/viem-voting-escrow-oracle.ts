// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@vefee/distributor/adapters/viem-voting-escrow-oracle`
 * Purpose: VotingPowerOracle backed by an on-chain voting-escrow contract via viem.
 * Scope: Reads the global and per-user point history and evaluates the decay curve locally. Does not cache.
 * Invariants:
 * - Any past timestamp is answerable, however many points were written after it.
 * - balanceOf: latest user point at or before t, `max(bias - slope * (t - ts), 0)`.
 * - totalSupply: latest global point at or before t, then weekly slope changes up to t.
 * - Every RPC or decode failure surfaces as OracleUnavailableError.
 * Side-effects: IO (RPC calls to EVM node)
 * Notes: Point searches are binary searches over history indices, O(log n) reads each. Index 0 is the empty genesis point.
 * Links: Implements VotingPowerOracle, docs/FEE_DISTRIBUTION.md#voting-power-oracle
 * @public
 */

import {
  type Account,
  EPOCH_LENGTH_SECONDS,
  OracleUnavailableError,
} from "@vefee/ledger-core";
import type { Chain, PublicClient, Transport } from "viem";

import type { VotingPowerOracle } from "../ports";
import { VOTING_ESCROW_ABI } from "./abi";

export type ContractReader = Pick<
  PublicClient<Transport, Chain>,
  "readContract"
>;

interface Point {
  readonly bias: bigint;
  readonly slope: bigint;
  readonly ts: bigint;
}

const WEEK = BigInt(EPOCH_LENGTH_SECONDS);

/** Same bound the contract's own supply walk uses */
const MAX_SUPPLY_WEEKS = 255;

function toPoint([bias, slope, ts]: readonly [
  bigint,
  bigint,
  bigint,
  bigint,
]): Point {
  return { bias, slope, ts };
}

/**
 * Latest point with `ts <= t` among indices `1..last`; null when there is none.
 */
async function findPoint(
  t: bigint,
  last: bigint,
  pointAt: (index: bigint) => Promise<Point>
): Promise<Point | null> {
  let lo = 0n;
  let hi = last;
  let found: Point | null = null;
  while (lo < hi) {
    const mid = (lo + hi + 1n) / 2n;
    const point = await pointAt(mid);
    if (point.ts <= t) {
      lo = mid;
      found = point;
    } else {
      hi = mid - 1n;
    }
  }
  return found;
}

export class ViemVotingEscrowOracle implements VotingPowerOracle {
  constructor(
    private readonly client: ContractReader,
    private readonly votingEscrow: Account
  ) {}

  private async read<T>(query: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (error) {
      throw new OracleUnavailableError(query, { cause: error });
    }
  }

  private async userPoint(account: Account, index: bigint): Promise<Point> {
    return toPoint(
      await this.client.readContract({
        address: this.votingEscrow,
        abi: VOTING_ESCROW_ABI,
        functionName: "user_point_history",
        args: [account, index],
      })
    );
  }

  private async globalPoint(index: bigint): Promise<Point> {
    return toPoint(
      await this.client.readContract({
        address: this.votingEscrow,
        abi: VOTING_ESCROW_ABI,
        functionName: "point_history",
        args: [index],
      })
    );
  }

  private userPointEpoch(account: Account): Promise<bigint> {
    return this.client.readContract({
      address: this.votingEscrow,
      abi: VOTING_ESCROW_ABI,
      functionName: "user_point_epoch",
      args: [account],
    });
  }

  private slopeChange(week: bigint): Promise<bigint> {
    return this.client.readContract({
      address: this.votingEscrow,
      abi: VOTING_ESCROW_ABI,
      functionName: "slope_changes",
      args: [week],
    });
  }

  balanceOf(account: Account, timestamp: number): Promise<bigint> {
    return this.read(`balanceOf(${account}, ${timestamp})`, async () => {
      const t = BigInt(timestamp);
      const point = await findPoint(
        t,
        await this.userPointEpoch(account),
        (index) => this.userPoint(account, index)
      );
      if (!point) {
        return 0n;
      }
      const bias = point.bias - point.slope * (t - point.ts);
      return bias > 0n ? bias : 0n;
    });
  }

  totalSupply(timestamp: number): Promise<bigint> {
    return this.read(`totalSupply(${timestamp})`, async () => {
      const t = BigInt(timestamp);
      const epoch = await this.client.readContract({
        address: this.votingEscrow,
        abi: VOTING_ESCROW_ABI,
        functionName: "epoch",
      });
      const point = await findPoint(t, epoch, (index) =>
        this.globalPoint(index)
      );
      if (!point) {
        return 0n;
      }

      let { bias, slope, ts } = point;
      let week = (ts / WEEK) * WEEK;
      for (let i = 0; i < MAX_SUPPLY_WEEKS; i++) {
        week += WEEK;
        let slopeDelta = 0n;
        if (week > t) {
          week = t;
        } else {
          slopeDelta = await this.slopeChange(week);
        }
        bias -= slope * (week - ts);
        if (week === t) {
          break;
        }
        slope += slopeDelta;
        ts = week;
      }
      return bias > 0n ? bias : 0n;
    });
  }

  firstActivityOf(account: Account): Promise<number | null> {
    return this.read(`firstActivityOf(${account})`, async () => {
      if ((await this.userPointEpoch(account)) === 0n) {
        return null;
      }
      return Number((await this.userPoint(account, 1n)).ts);
    });
  }
}
