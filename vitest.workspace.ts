// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `vitest.workspace`
 * Purpose: Vitest workspace configuration for monorepo test discovery.
 * Scope: Discovers package-local and service-local vitest configs.
 * Invariants:
 *   - Tests in packages/<pkg>/tests/** import only that package and its declared workspace deps
 *   - Nothing in any project reaches the network
 * Side-effects: none
 * Links: packages/&lt;pkg&gt;/vitest.config.ts, services/&lt;svc&gt;/vitest.config.ts
 * @public
 */

import { defineWorkspace } from "vitest/config";

export default defineWorkspace([
  "./packages/*/vitest.config.ts",
  "./services/*/vitest.config.ts",
]);
