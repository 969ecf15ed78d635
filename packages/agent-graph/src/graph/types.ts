// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@digest/agent-graph/graph/types`
 * Purpose: Edge, run-state and GraphRun types for the graph executor.
 * Scope: Types only.
 * Invariants:
 *   - Edge conditions are pure functions of GraphRunState
 *   - "terminal" edges are markers that never fire
 *   - GraphRun.results iterates in completion order; nodeStatuses in declaration order
 * Side-effects: none
 * Links: builder.ts, graph.ts
 * @public
 */

import type { TokenUsage } from "../types/content";
import type {
  ExecutionFailure,
  NodeResult,
  NodeStatus,
  RunStatus,
} from "../types/results";

/**
 * Read-only view of a run in progress, handed to edge conditions and input policies.
 */
export interface GraphRunState {
  readonly input: string;
  readonly results: ReadonlyMap<string, NodeResult>;
  readonly statuses: ReadonlyMap<string, NodeStatus>;
}

export type EdgeCondition = (state: GraphRunState) => boolean;

export interface EdgeInputContext {
  readonly source: NodeResult;
  readonly state: GraphRunState;
}

/**
 * Input handed to an edge's target: a fixed prompt, or computed from the run.
 */
export type EdgeInput = string | ((ctx: EdgeInputContext) => string);

interface EdgeBase {
  readonly from: string;
  readonly to: string;
}

export interface UnconditionalEdge extends EdgeBase {
  readonly kind: "always";
  readonly input?: EdgeInput;
}

export interface ConditionalEdge extends EdgeBase {
  readonly kind: "conditional";
  readonly condition: EdgeCondition;
  readonly input?: EdgeInput;
}

/**
 * Blocks propagation past `from`. Declares that `to` exists downstream but is never reached.
 */
export interface TerminalEdge extends EdgeBase {
  readonly kind: "terminal";
}

export type GraphEdge = UnconditionalEdge | ConditionalEdge | TerminalEdge;

export interface EdgeOptions {
  readonly condition?: EdgeCondition;
  readonly input?: EdgeInput;
}

/**
 * Completed (or failed) execution instance of a graph.
 */
export interface GraphRun {
  readonly entryNodeId: string;
  readonly input: string;
  readonly status: RunStatus;
  /** Executed nodes only, in completion order */
  readonly results: ReadonlyMap<string, NodeResult>;
  /** Every node, in declaration order */
  readonly nodeStatuses: ReadonlyMap<string, NodeStatus>;
  readonly usage: TokenUsage;
  readonly totalNodes: number;
  readonly completedNodes: number;
  readonly failedNodes: number;
  readonly skippedNodes: number;
  readonly executionTimeMs: number;
  /** Run-level failure cause not tied to one node (e.g. cancellation) */
  readonly error?: ExecutionFailure;
}
