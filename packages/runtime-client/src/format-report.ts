// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@digest/runtime-client/format-report`
 * Purpose: Renders runtime replies as Markdown for a chat surface.
 * Scope: Pure string building. Does NOT print.
 * Invariants:
 *   - One section per agent, in payload order; agents without content get a skipped/failed/no-output marker
 *   - full_text is only rendered when the payload lists no agents
 * Side-effects: none
 * Links: reply.ts
 * @public
 */

import type { AgentPayload, ResultPayload } from "@digest/agent-graph";

import type { RuntimeReply } from "./reply";

const AGENT_DISPLAY_NAMES: Readonly<Record<string, string>> = {
  slack_agent: "Slack agent",
  tavily_agent: "Tavily agent",
  block_agent: "Block agent",
};

export function agentDisplayName(name: string): string {
  return AGENT_DISPLAY_NAMES[name] ?? name;
}

function seconds(ms: number): string {
  return `${(ms / 1000).toFixed(2)}s`;
}

function renderAgent(agent: AgentPayload): string[] {
  const lines: string[] = [];
  let header = `#### **${agentDisplayName(agent.name)}**`;
  if (agent.execution_time_ms > 0) {
    header += ` *(${seconds(agent.execution_time_ms)})*`;
  }
  lines.push(header);

  let hasContent = false;
  for (const message of agent.messages) {
    if (message.type === "text") {
      const content = message.content.trim();
      if (content.length === 0) continue;
      hasContent = true;
      lines.push("");
      for (const line of content.split("\n")) {
        if (line.trim().length > 0) lines.push(`> ${line}`);
      }
    } else {
      hasContent = true;
      const items = Array.isArray(message.content)
        ? message.content
        : [message.content];
      lines.push("", "```json");
      for (const item of items) {
        lines.push(JSON.stringify(item, null, 2));
      }
      lines.push("```");
    }
  }

  if (!hasContent) {
    if (agent.status === "skipped") {
      lines.push("> *(skipped)*");
    } else if (agent.error) {
      lines.push(`> *(failed: ${agent.error.message})*`);
    } else {
      lines.push("> *(no output)*");
    }
  }
  return lines;
}

export function formatReport(payload: ResultPayload): string {
  const lines: string[] = [];
  lines.push(payload.status === "completed" ? "### ✅ Completed" : "### ❌ Failed");

  const stats: string[] = [];
  if (payload.total_execution_time_ms > 0) {
    stats.push(`⏱️ ${seconds(payload.total_execution_time_ms)}`);
  }
  if (payload.total_tokens > 0) {
    stats.push(`🎯 ${payload.total_tokens.toLocaleString("en-US")} tokens`);
  }
  if (payload.mcp_tools_used) {
    stats.push("🔧 gateway tools used");
  }
  if (stats.length > 0) {
    lines.push(`*${stats.join(" | ")}*`);
  }
  lines.push("", "---", "");

  if (payload.agents.length > 0) {
    payload.agents.forEach((agent, i) => {
      if (i > 0) lines.push("");
      lines.push(...renderAgent(agent));
    });
  } else if (payload.full_text.length > 0) {
    lines.push("### Result", "");
    for (const line of payload.full_text.split("\n")) {
      if (line.trim().length > 0) lines.push(line);
    }
  }

  const meta = payload.metadata;
  if (meta.total_nodes > 0 || meta.completed_nodes > 0) {
    const details: string[] = [];
    if (meta.total_nodes > 0) details.push(`Nodes: ${meta.total_nodes}`);
    if (meta.completed_nodes > 0) details.push(`Completed: ${meta.completed_nodes}`);
    if (meta.failed_nodes > 0) details.push(`Failed: ${meta.failed_nodes}`);
    if (meta.skipped_nodes !== undefined && meta.skipped_nodes > 0) {
      details.push(`Skipped: ${meta.skipped_nodes}`);
    }
    lines.push("", "---", "", "##### Execution details", `*${details.join(" | ")}*`);
  }

  return lines.join("\n");
}

/**
 * Markdown for any reply kind.
 */
export function formatReply(reply: RuntimeReply): string {
  switch (reply.kind) {
    case "report":
      return formatReport(reply.payload);
    case "data":
      return ["```json", JSON.stringify(reply.data, null, 2), "```"].join("\n");
    case "text":
      return reply.message;
    case "error":
      return `❌ ${reply.message}`;
    case "empty":
      return "The agent runtime returned an empty response.";
  }
}
