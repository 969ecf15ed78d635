#!/usr/bin/env tsx
// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@digest/agent-runtime/main`
 * Purpose: Service entry point with graceful shutdown.
 * Scope: Validates config once at boot, starts the HTTP server. Does not contain business logic.
 * Invariants:
 *   - Reads config from env (no hardcoded values); each request re-reads it through the handler
 *   - Handles SIGTERM/SIGINT for graceful shutdown
 * Side-effects: IO (HTTP listener, process signals)
 * Links: server.ts, handler.ts
 * @public
 */

import { loadRuntimeConfig } from "./bootstrap/config";
import { makeLogger } from "./observability/logger";
import { createRuntimeServer } from "./server";

async function main(): Promise<void> {
  const config = loadRuntimeConfig(process.env);
  const logger = makeLogger({
    level: config.logLevel,
    serviceName: config.serviceName,
  });

  logger.info(
    {
      gateway: new URL(config.gatewayUrl).origin,
      identity: config.identity.kind,
      modelId: config.modelId,
    },
    "Starting agent runtime"
  );

  const server = createRuntimeServer({ env: process.env, log: logger });
  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(config.port, () => resolve());
  });
  logger.info({ port: config.port }, "Agent runtime listening");

  let shuttingDown = false;
  const shutdown = (signal: string): void => {
    if (shuttingDown) {
      logger.warn({ signal }, "Shutdown already in progress");
      return;
    }
    shuttingDown = true;
    logger.info({ signal }, "Received signal, shutting down");
    server.close((err) => {
      if (err) {
        logger.error({ err }, "Error during shutdown");
        logger.flush();
        process.exit(1);
      }
      logger.info({}, "Server stopped");
      logger.flush();
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

const bootLogger = makeLogger({ bindings: { phase: "boot" } });

main().catch((err: unknown) => {
  bootLogger.fatal({ err }, "Fatal error during startup");
  bootLogger.flush();
  process.exit(1);
});
