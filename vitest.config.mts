// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `vitest.config`
 * Purpose: Vitest test runner configuration for every workspace package.
 * Scope: Discovers packages/<pkg>/tests/**. No external infrastructure required; Postgres tests run on in-process PGlite.
 * Invariants: Coverage disabled by default; single run, no watch.
 * Side-effects: file system (coverage reports written to ./coverage/ when enabled)
 * Notes: Workspace packages export their TypeScript sources, so no build runs before tests.
 * Links: package.json
 * @public
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["packages/*/tests/**/*.{test,spec}.ts"],
    exclude: ["node_modules", "dist", "packages/*/tests/_fakes/**"],
    coverage: {
      enabled: false,
      provider: "v8",
      reporter: ["text", "html"],
      reportsDirectory: "coverage",
      exclude: ["node_modules/", "**/tests/**", "dist/", "**/index.ts"],
    },
    testTimeout: 10_000,
    // PGlite boots a WASM Postgres per test file
    hookTimeout: 30_000,
  },
});
