// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@digest/agent-runtime/observability/logger`
 * Purpose: Pino logger factory - JSON-only stdout emission.
 * Scope: Create configured pino loggers. Request-scoped children are bound by createRunContext.
 * Invariants: Always emits JSON to stdout; silenced under vitest or NODE_ENV=test. Safe to call at module scope.
 * Side-effects: none
 * Notes: Use makeLogger for the service logger; use makeNoopLogger for tests.
 * Links: redact.ts, main.ts
 * @public
 */

import type { Logger } from "pino";
import pino from "pino";

import { REDACT_PATHS } from "./redact";

export type { Logger } from "pino";

export interface LoggerOptions {
  readonly level?: string;
  readonly serviceName?: string;
  readonly bindings?: Record<string, unknown>;
}

export function makeLogger(options: LoggerOptions = {}): Logger {
  const isVitest = process.env.VITEST === "true";
  const nodeEnv = process.env.NODE_ENV ?? "development";
  const level = options.level ?? process.env.LOG_LEVEL ?? "info";
  const serviceName =
    options.serviceName ?? process.env.SERVICE_NAME ?? "agent-runtime";

  return pino(
    {
      level,
      enabled: !(isVitest || nodeEnv === "test"),
      // Bindings first, then reserved keys
      base: { ...options.bindings, app: "digest-graph", service: serviceName },
      messageKey: "msg",
      timestamp: pino.stdTimeFunctions.isoTime,
      redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
    },
    pino.destination({ dest: 1, sync: nodeEnv !== "production" })
  );
}

/**
 * For tests - pino with enabled:false (preserves type, silences output)
 */
export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}
