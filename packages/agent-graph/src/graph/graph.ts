// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@digest/agent-graph/graph/graph`
 * Purpose: Sequential executor and status tracker for a validated agent graph.
 * Scope: Runs nodes in edge-firing order, records NodeResults, derives run status. Does NOT validate (see builder.ts).
 * Invariants:
 *   - SEQUENTIAL: exactly one node runs at a time, FIFO in edge-firing order
 *   - RUN_ONCE: a node executes at most once per run, however many edges target it
 *   - FAILURE_RECORDED: node failures become failed NodeResults; run() never throws for them
 *   - ROUTING_FAILURE: a throwing condition, input policy or onNodeEnd ends the run with run.error "internal"
 *   - A throwing onNodeStart fails its own node
 *   - NEVER_RUN_IS_SKIPPED: nodes not executed by the end of the run are "skipped"
 *   - RUN_STATUS: failed iff any node failed or run.error is set, else completed
 * Side-effects: IO via node execution; logging through the RunContext logger
 * Links: builder.ts, node/agent-node.ts, aggregate/aggregator.ts
 * @public
 */

import type { RunContext } from "../context/run-context";
import { isAgentGraphError, normalizeErrorCode } from "../errors";
import type { AgentNode } from "../node/agent-node";
import { addUsage, ZERO_USAGE, type TokenUsage } from "../types/content";
import type {
  ExecutionFailure,
  NodeResult,
  NodeStatus,
  RunStatus,
} from "../types/results";
import type { GraphEdge, GraphRun, GraphRunState } from "./types";

export interface GraphDefinition {
  readonly nodes: readonly AgentNode[];
  readonly edges: readonly GraphEdge[];
  readonly entryPoint: string;
  readonly followUpPrompt?: string;
}

export interface GraphRunOptions {
  readonly context: RunContext;
  readonly signal?: AbortSignal;
  /** Millisecond clock (defaults to Date.now) */
  readonly now?: () => number;
  readonly onNodeStart?: (nodeId: string, input: string) => void;
  readonly onNodeEnd?: (result: NodeResult) => void;
}

interface PendingNode {
  readonly node: AgentNode;
  readonly input: string;
}

/**
 * Mutable bookkeeping for one run. Exposed to conditions only through GraphRunState.
 */
class RunTracker implements GraphRunState {
  status: RunStatus = "pending";
  readonly results = new Map<string, NodeResult>();
  readonly statuses = new Map<string, NodeStatus>();
  usage: TokenUsage = ZERO_USAGE;
  error: ExecutionFailure | undefined;

  constructor(
    readonly input: string,
    nodes: readonly AgentNode[]
  ) {
    for (const node of nodes) {
      this.statuses.set(node.id, "pending");
    }
  }

  record(result: NodeResult): void {
    this.results.set(result.nodeId, result);
    this.statuses.set(result.nodeId, result.status);
    this.usage = addUsage(this.usage, result.usage);
  }

  count(status: NodeStatus): number {
    let n = 0;
    for (const s of this.statuses.values()) {
      if (s === status) n++;
    }
    return n;
  }
}

export class Graph {
  readonly entryPoint: string;
  private readonly nodes: ReadonlyMap<string, AgentNode>;
  private readonly edges: readonly GraphEdge[];
  private readonly followUpPrompt: string | undefined;

  /** Use GraphBuilder.build(); the constructor trusts its input. */
  constructor(definition: GraphDefinition) {
    this.entryPoint = definition.entryPoint;
    this.nodes = new Map(definition.nodes.map((n) => [n.id, n]));
    this.edges = definition.edges;
    this.followUpPrompt = definition.followUpPrompt;
  }

  get nodeIds(): readonly string[] {
    return [...this.nodes.keys()];
  }

  outgoingEdges(nodeId: string): readonly GraphEdge[] {
    return this.edges.filter((e) => e.from === nodeId);
  }

  async run(input: string, options: GraphRunOptions): Promise<GraphRun> {
    const now = options.now ?? Date.now;
    const log = options.context.log;
    const signal = options.signal ?? new AbortController().signal;
    const startedAt = now();

    const tracker = new RunTracker(input, [...this.nodes.values()]);
    const scheduled = new Set<string>([this.entryPoint]);
    const queue: PendingNode[] = [
      { node: this.requireNode(this.entryPoint), input },
    ];

    tracker.status = "running";
    log.info(
      { entryPoint: this.entryPoint, totalNodes: this.nodes.size },
      "graph run started"
    );

    while (queue.length > 0) {
      if (signal.aborted) {
        tracker.error = { code: "aborted", message: "Run cancelled" };
        break;
      }

      const next = queue.shift();
      if (!next) break;

      const result = await this.executeNode(next, tracker, options, now);
      tracker.record(result);

      let targets: PendingNode[] = [];
      try {
        options.onNodeEnd?.(result);
        if (result.status !== "failed") {
          targets = this.fire(result, tracker);
        }
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        log.error({ err: error, nodeId: result.nodeId }, "routing failed");
        tracker.error = {
          code: "internal",
          message: `Routing after node "${result.nodeId}" failed: ${message}`,
        };
        break;
      }

      if (result.status === "failed") {
        if (result.error?.code === "aborted") {
          tracker.error = { code: "aborted", message: "Run cancelled" };
          break;
        }
        continue;
      }

      for (const target of targets) {
        if (scheduled.has(target.node.id)) {
          log.debug(
            { from: result.nodeId, to: target.node.id },
            "edge target already scheduled; not re-running"
          );
          continue;
        }
        scheduled.add(target.node.id);
        queue.push(target);
      }
    }

    for (const [nodeId, status] of tracker.statuses) {
      if (status === "pending" || status === "running") {
        tracker.statuses.set(nodeId, "skipped");
      }
    }

    const failedNodes = tracker.count("failed");
    tracker.status =
      failedNodes > 0 || tracker.error !== undefined ? "failed" : "completed";

    const run: GraphRun = {
      entryNodeId: this.entryPoint,
      input,
      status: tracker.status,
      results: tracker.results,
      nodeStatuses: tracker.statuses,
      usage: tracker.usage,
      totalNodes: this.nodes.size,
      completedNodes: tracker.count("completed"),
      failedNodes,
      skippedNodes: tracker.count("skipped"),
      executionTimeMs: now() - startedAt,
      ...(tracker.error !== undefined && { error: tracker.error }),
    };

    log.info(
      {
        status: run.status,
        completedNodes: run.completedNodes,
        failedNodes: run.failedNodes,
        skippedNodes: run.skippedNodes,
        totalTokens: run.usage.totalTokens,
        durationMs: run.executionTimeMs,
      },
      "graph run finished"
    );

    return run;
  }

  private async executeNode(
    pending: PendingNode,
    tracker: RunTracker,
    options: GraphRunOptions,
    now: () => number
  ): Promise<NodeResult> {
    const { node, input } = pending;
    const log = options.context.log.child({ nodeId: node.id });
    const signal = options.signal ?? new AbortController().signal;
    const startedAt = now();

    tracker.statuses.set(node.id, "running");

    try {
      options.onNodeStart?.(node.id, input);
      log.info({ kind: node.kind }, "node started");
      const result = await node.run(input, { signal, log, now });
      log.info(
        {
          durationMs: result.executionTimeMs,
          totalTokens: result.usage.totalTokens,
        },
        "node completed"
      );
      return result;
    } catch (error) {
      const code = normalizeErrorCode(
        error instanceof Error && error.cause !== undefined ? error.cause : error
      );
      const message = error instanceof Error ? error.message : String(error);
      log.error(
        { err: error, errorCode: code, expected: isAgentGraphError(error) },
        "node failed"
      );
      return {
        nodeId: node.id,
        status: "failed",
        results: [],
        executionTimeMs: now() - startedAt,
        usage: ZERO_USAGE,
        error: { code, message },
      };
    }
  }

  /**
   * Evaluate outgoing edges of a completed node in declaration order.
   */
  private fire(source: NodeResult, state: GraphRunState): PendingNode[] {
    const fired: PendingNode[] = [];
    for (const edge of this.outgoingEdges(source.nodeId)) {
      if (edge.kind === "terminal") continue;
      if (edge.kind === "conditional" && !edge.condition(state)) continue;

      const input =
        typeof edge.input === "function"
          ? edge.input({ source, state })
          : (edge.input ?? this.followUpPrompt ?? state.input);
      fired.push({ node: this.requireNode(edge.to), input });
    }
    return fired;
  }

  private requireNode(nodeId: string): AgentNode {
    const node = this.nodes.get(nodeId);
    if (!node) {
      // Unreachable after build(): endpoints are validated there
      throw new Error(`Node not found: ${nodeId}`);
    }
    return node;
  }
}
