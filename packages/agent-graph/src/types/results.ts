// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@digest/agent-graph/types/results`
 * Purpose: Node and run status types plus the NodeResult record.
 * Scope: Types only.
 * Invariants:
 *   - A NodeResult exists only for executed nodes (completed or failed)
 *   - skipped/pending nodes have a status but no NodeResult
 * Side-effects: none
 * @public
 */

import type { ExecutionErrorCode } from "../errors";
import type { AgentInvocationResult, TokenUsage } from "./content";

export type NodeStatus =
  | "pending"
  | "running"
  | "completed"
  | "failed"
  | "skipped";

export type RunStatus = "pending" | "running" | "completed" | "failed";

export interface ExecutionFailure {
  readonly code: ExecutionErrorCode;
  readonly message: string;
}

export interface NodeResult {
  readonly nodeId: string;
  readonly status: "completed" | "failed";
  /** Agent invocation results in call order (empty for terminal nodes and failures) */
  readonly results: readonly AgentInvocationResult[];
  readonly executionTimeMs: number;
  readonly usage: TokenUsage;
  readonly error?: ExecutionFailure;
}
