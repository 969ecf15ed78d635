// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@digest/agent-runtime/pipeline/graph`
 * Purpose: Builds the two-agent digest graph from a routed catalog.
 * Scope: Routing + graph wiring. Does NOT run the graph or open sessions.
 * Invariants:
 *   - slack_agent is the entry; it fires tavily_agent with the fixed follow-up prompt
 *   - block_agent is a terminal marker after tavily_agent and never runs
 *   - Each agent gets the capabilities matching its keyword, or the whole catalog as fallback
 * Side-effects: logging only (routing fallback warnings)
 * Links: prompts.ts, handler.ts
 * @public
 */

import {
  type AgentRunner,
  type Catalog,
  createAgentNode,
  createTerminalNode,
  type Graph,
  GraphBuilder,
  type RunContext,
} from "@digest/agent-graph";
import { routeCapabilities } from "@digest/gateway-tools";

import {
  BLOCK_AGENT_ID,
  SLACK_AGENT_ID,
  SUMMARY_AGENT_ID,
  SUMMARY_AGENT_SYSTEM_PROMPT,
  SUMMARY_FOLLOW_UP_PROMPT,
  slackAgentSystemPrompt,
} from "./prompts";

export interface DigestPipelineOptions<THandle> {
  readonly catalog: Catalog<THandle>;
  readonly runner: AgentRunner<THandle>;
  readonly slackToolKeyword: string;
  readonly summaryToolKeyword: string;
  readonly slackChannel: string;
}

export interface DigestPipeline {
  readonly graph: Graph;
  /** Markers that flag gateway tool use in the aggregated report */
  readonly capabilityMarkers: readonly string[];
}

export function buildDigestPipeline<THandle>(
  options: DigestPipelineOptions<THandle>,
  ctx: Pick<RunContext, "log">
): DigestPipeline {
  const slack = routeCapabilities(options.catalog, options.slackToolKeyword, ctx);
  const summary = routeCapabilities(
    options.catalog,
    options.summaryToolKeyword,
    ctx
  );

  const graph = new GraphBuilder({ followUpPrompt: SUMMARY_FOLLOW_UP_PROMPT })
    .addNode(
      createAgentNode({
        id: SLACK_AGENT_ID,
        capabilities: slack.capabilities,
        systemPrompt: slackAgentSystemPrompt(options.slackChannel),
        runner: options.runner,
      })
    )
    .addNode(
      createAgentNode({
        id: SUMMARY_AGENT_ID,
        capabilities: summary.capabilities,
        systemPrompt: SUMMARY_AGENT_SYSTEM_PROMPT,
        runner: options.runner,
      })
    )
    .addNode(createTerminalNode(BLOCK_AGENT_ID))
    .addEdge(SLACK_AGENT_ID, SUMMARY_AGENT_ID)
    .addTerminalEdge(SUMMARY_AGENT_ID, BLOCK_AGENT_ID)
    .setEntryPoint(SLACK_AGENT_ID)
    .build();

  return {
    graph,
    capabilityMarkers: [options.slackToolKeyword, options.summaryToolKeyword],
  };
}
