// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@digest/agent-graph/context/run-context`
 * Purpose: Per-request context passed explicitly through catalog fetch, graph run and aggregation.
 * Scope: Type and factory only. No ambient or global state.
 * Invariants: log is a child logger with sessionId, userId and correlationId bound.
 * Side-effects: none
 * @public
 */

import type { Logger } from "pino";

export type { Logger } from "pino";

export interface RunContext {
  readonly sessionId: string;
  readonly userId: string;
  /** Correlation ID for this request (one per invocation) */
  readonly correlationId: string;
  readonly log: Logger;
}

export function createRunContext(
  baseLog: Logger,
  ids: { sessionId: string; userId: string; correlationId: string }
): RunContext {
  return {
    ...ids,
    log: baseLog.child({
      sessionId: ids.sessionId,
      userId: ids.userId,
      correlationId: ids.correlationId,
    }),
  };
}
