// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@vefee/distributor/ports/clock`
 * Purpose: Time abstraction for deterministic testing.
 * Scope: Provides current time as unix seconds. Does not handle timezone conversion or epoch arithmetic.
 * Invariants: Always returns a non-negative integer
 * Side-effects: none (interface only)
 * Links: Implemented by SystemClock, FakeClock
 * @public
 */

export interface Clock {
  /**
   * Get current time
   * @returns Unix timestamp in whole seconds
   */
  now(): number;
}
