// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@digest/agent-graph/graph/builder`
 * Purpose: Fluent construction and build-time validation of agent graphs.
 * Scope: Collects nodes/edges/entry, validates, returns an immutable Graph. Does NOT execute.
 * Invariants:
 *   - FAIL_AT_BUILD: duplicate ids, unknown edge endpoints, missing/unknown entry and
 *     unreachable nodes throw GraphValidationError from build(), never from run()
 *   - Edge declaration order is preserved (it is the firing order)
 * Side-effects: none
 * Links: graph.ts, types.ts
 * @public
 */

import { GraphValidationError } from "../errors";
import type { AgentNode } from "../node/agent-node";
import { Graph } from "./graph";
import type { EdgeOptions, GraphEdge } from "./types";

export interface GraphBuilderOptions {
  /**
   * Fixed prompt handed to every fired edge's target that has no input of its own.
   * When omitted, targets receive the run's initial input.
   */
  readonly followUpPrompt?: string;
}

export class GraphBuilder {
  private readonly nodes: AgentNode[] = [];
  private readonly edges: GraphEdge[] = [];
  private entryPoint: string | undefined;

  constructor(private readonly options: GraphBuilderOptions = {}) {}

  addNode(node: AgentNode): this {
    this.nodes.push(node);
    return this;
  }

  /**
   * Add an edge. With `condition` it fires only when the predicate is true for the
   * run state at the time `from` completes.
   */
  addEdge(from: string, to: string, options: EdgeOptions = {}): this {
    const { condition, input } = options;
    if (condition) {
      this.edges.push({
        kind: "conditional",
        from,
        to,
        condition,
        ...(input !== undefined && { input }),
      });
    } else {
      this.edges.push({
        kind: "always",
        from,
        to,
        ...(input !== undefined && { input }),
      });
    }
    return this;
  }

  /**
   * Mark `to` as a downstream stop point of `from`. The edge never fires; `to` ends
   * every run as "skipped".
   */
  addTerminalEdge(from: string, to: string): this {
    this.edges.push({ kind: "terminal", from, to });
    return this;
  }

  setEntryPoint(nodeId: string): this {
    this.entryPoint = nodeId;
    return this;
  }

  build(): Graph {
    const byId = new Map<string, AgentNode>();
    for (const node of this.nodes) {
      if (byId.has(node.id)) {
        throw new GraphValidationError(
          "duplicate_node",
          `Duplicate node id "${node.id}"`
        );
      }
      byId.set(node.id, node);
    }

    if (this.entryPoint === undefined) {
      throw new GraphValidationError("missing_entry", "No entry point set");
    }
    if (!byId.has(this.entryPoint)) {
      throw new GraphValidationError(
        "unknown_entry",
        `Entry point "${this.entryPoint}" is not a node of this graph`
      );
    }

    for (const edge of this.edges) {
      for (const endpoint of [edge.from, edge.to]) {
        if (!byId.has(endpoint)) {
          throw new GraphValidationError(
            "unknown_edge_node",
            `Edge ${edge.from} -> ${edge.to} references unknown node "${endpoint}"`
          );
        }
      }
    }

    const reachable = collectReachable(this.entryPoint, this.edges);
    const unreachable = this.nodes.filter((n) => !reachable.has(n.id));
    if (unreachable.length > 0) {
      throw new GraphValidationError(
        "unreachable_node",
        `Nodes not reachable from "${this.entryPoint}": ${unreachable
          .map((n) => n.id)
          .join(", ")}`
      );
    }

    return new Graph({
      nodes: [...this.nodes],
      edges: [...this.edges],
      entryPoint: this.entryPoint,
      ...(this.options.followUpPrompt !== undefined && {
        followUpPrompt: this.options.followUpPrompt,
      }),
    });
  }
}

/** Structural reachability over every edge kind, terminal markers included. */
function collectReachable(
  entry: string,
  edges: readonly GraphEdge[]
): Set<string> {
  const seen = new Set<string>([entry]);
  const stack = [entry];
  while (stack.length > 0) {
    const current = stack.pop();
    for (const edge of edges) {
      if (edge.from === current && !seen.has(edge.to)) {
        seen.add(edge.to);
        stack.push(edge.to);
      }
    }
  }
  return seen;
}
