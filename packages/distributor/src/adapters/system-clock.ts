// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@vefee/distributor/adapters/system-clock`
 * Purpose: Wall-clock implementation of the Clock port.
 * Scope: Returns Date.now() truncated to whole unix seconds. Does not track chain time.
 * Invariants: Monotonic only as far as the host clock is.
 * Side-effects: reads system time
 * Links: Implements Clock
 * @public
 */

import type { Clock } from "../ports";

export class SystemClock implements Clock {
  now(): number {
    return Math.floor(Date.now() / 1000);
  }
}
