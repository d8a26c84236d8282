// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@vefee/distributor/config/account`
 * Purpose: Boundary validation for EVM account addresses.
 * Scope: Zod schema and constructor that checksum an address. Does not look anything up on-chain.
 * Invariants: toAccount() is the single entry point for turning raw input into an Account.
 * Side-effects: none
 * Links: docs/FEE_DISTRIBUTION.md
 * @public
 */

import type { Account } from "@vefee/ledger-core";
import { getAddress, isAddress } from "viem";
import { z } from "zod";

export const AccountSchema = z
  .string()
  .refine((value) => isAddress(value, { strict: false }), {
    message: "Invalid EVM address",
  })
  .transform((value): Account => getAddress(value));

/** Validate and checksum a raw address. Call at edges only. */
export function toAccount(raw: string): Account {
  return AccountSchema.parse(raw);
}

export function sameAccount(a: Account, b: Account): boolean {
  return a.toLowerCase() === b.toLowerCase();
}
