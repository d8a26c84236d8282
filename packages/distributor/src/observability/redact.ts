// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@vefee/distributor/observability/redact`
 * Purpose: Redaction paths for sensitive data in logs.
 * Scope: Define paths to redact from log output. Does not implement redaction logic.
 * Invariants: Only redact known secret-bearing keys.
 * Side-effects: none
 * Links: Imported by logger module.
 * @public
 */

export const REDACT_PATHS = [
  "secret",
  "apiKey",
  "EVM_RPC_URL",
  "DATABASE_URL",
  // Wallet/crypto
  "privateKey",
  "signerKey",
  "FEE_DISTRIBUTOR_SIGNER_KEY",
  "mnemonic",
  "seed",
];
