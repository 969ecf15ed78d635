// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@digest/agent-graph/aggregate/aggregator`
 * Purpose: Turns a finished GraphRun into a Report.
 * Scope: Flattening, capability-usage detection and full-text assembly. Does NOT serialize (see payload.ts).
 * Invariants:
 *   - DETERMINISTIC: same GraphRun + options → structurally identical Report
 *   - Executed nodes are listed in completion order, then never-executed nodes in declaration order
 *   - fullText is never empty: NO_CONTENT_SENTINEL when no node produced text
 *   - capabilityUsed is a heuristic (marker substrings in node text), not proof of a tool call
 * Side-effects: logging only
 * Links: flatten.ts, payload.ts
 * @public
 */

import type { Logger } from "pino";

import type { GraphRun } from "../graph/types";
import type { ExecutionFailure, NodeStatus } from "../types/results";
import { flattenContent } from "./flatten";

export const NO_CONTENT_SENTINEL = "(no content)";

export type ReportMessage =
  | { readonly type: "text"; readonly content: string }
  | { readonly type: "json"; readonly content: unknown };

export interface AgentReport {
  readonly name: string;
  readonly status: NodeStatus;
  readonly messages: readonly ReportMessage[];
  readonly executionTimeMs: number;
  readonly tokensUsed: number;
  readonly error?: ExecutionFailure;
}

export interface Report {
  readonly status: "completed" | "failed";
  readonly agents: readonly AgentReport[];
  readonly totalExecutionTimeMs: number;
  readonly totalTokens: number;
  readonly capabilityUsed: boolean;
  readonly fullText: string;
  readonly totalNodes: number;
  readonly completedNodes: number;
  readonly failedNodes: number;
  readonly skippedNodes: number;
  readonly error?: ExecutionFailure;
}

export interface AggregateOptions {
  /**
   * Case-insensitive substrings whose presence in a node's text counts as
   * evidence that an external capability was used.
   */
  readonly capabilityMarkers: readonly string[];
  readonly log?: Logger;
}

export function aggregateGraphRun(
  run: GraphRun,
  options: AggregateOptions
): Report {
  const markers = options.capabilityMarkers
    .map((m) => m.toLowerCase())
    .filter((m) => m.length > 0);

  const agents: AgentReport[] = [];
  const sections: string[] = [];
  let capabilityUsed = false;

  for (const result of run.results.values()) {
    const messages: ReportMessage[] = [];
    const nodeTexts: string[] = [];

    for (const invocation of result.results) {
      const flat = flattenContent(invocation.message.content);
      if (flat.dropped > 0) {
        options.log?.warn(
          { nodeId: result.nodeId, dropped: flat.dropped },
          "content nested beyond depth cap dropped"
        );
      }

      const text = flat.texts.join("\n").trim();
      if (text.length > 0) {
        messages.push({ type: "text", content: text });
        nodeTexts.push(text);
      }
      for (const value of flat.json) {
        messages.push({ type: "json", content: value });
      }
    }

    const nodeText = nodeTexts.join("\n");
    if (nodeText.length > 0) {
      sections.push(`[${result.nodeId}]\n${nodeText}`);
      const haystack = nodeText.toLowerCase();
      if (!capabilityUsed && markers.some((m) => haystack.includes(m))) {
        capabilityUsed = true;
      }
    }

    agents.push({
      name: result.nodeId,
      status: result.status,
      messages,
      executionTimeMs: result.executionTimeMs,
      tokensUsed: result.usage.totalTokens,
      ...(result.error !== undefined && { error: result.error }),
    });
  }

  for (const [nodeId, status] of run.nodeStatuses) {
    if (run.results.has(nodeId)) continue;
    agents.push({
      name: nodeId,
      status,
      messages: [],
      executionTimeMs: 0,
      tokensUsed: 0,
    });
  }

  return {
    status: run.status === "completed" ? "completed" : "failed",
    agents,
    totalExecutionTimeMs: run.executionTimeMs,
    totalTokens: run.usage.totalTokens,
    capabilityUsed,
    fullText: sections.length > 0 ? sections.join("\n") : NO_CONTENT_SENTINEL,
    totalNodes: run.totalNodes,
    completedNodes: run.completedNodes,
    failedNodes: run.failedNodes,
    skippedNodes: run.skippedNodes,
    ...(run.error !== undefined && { error: run.error }),
  };
}
