// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@digest/gateway-tools/langchain/mcp-tools`
 * Purpose: Wraps gateway capabilities as LangChain StructuredTools.
 * Scope: Tool wrappers delegate to GatewaySession.callTool at invocation time. Does NOT choose which tools a node gets.
 * Invariants:
 *   - Uses the MCP tool's JSON Schema as the tool input schema
 *   - Tool errors are returned to the model as {"error": ...} JSON, never thrown
 *   - The run's AbortSignal is forwarded to the gateway call
 * Side-effects: none (IO happens when the model calls a tool)
 * Links: mcp/session.ts
 * @public
 */

import type { Capability } from "@digest/agent-graph";
import type { RunnableConfig } from "@langchain/core/runnables";
import {
  DynamicStructuredTool,
  type StructuredToolInterface,
} from "@langchain/core/tools";
import type { Tool } from "@modelcontextprotocol/sdk/types.js";

import type { GatewaySession } from "../mcp/session";

/**
 * Constructs DynamicStructuredTool without triggering TS2589.
 * Quarantines `any` at the constructor call; the public boundary returns StructuredToolInterface.
 */
function createTool(toolConfig: {
  name: string;
  description: string;
  schema: Tool["inputSchema"];
  func: (
    args: unknown,
    runManager?: unknown,
    config?: RunnableConfig
  ) => Promise<string>;
}): StructuredToolInterface {
  // biome-ignore lint/suspicious/noExplicitAny: TS2589 workaround - breaks deep generic instantiation
  const UntypedToolClass: any = DynamicStructuredTool;
  return new UntypedToolClass(toolConfig);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function toLangChainTool(
  capability: Capability<Tool>,
  session: Pick<GatewaySession, "callTool">
): StructuredToolInterface {
  const toolName = capability.name;

  return createTool({
    name: toolName,
    description: capability.description ?? capability.displayName,
    schema: capability.handle.inputSchema,
    func: async (args, _runManager, config) => {
      try {
        const outcome = await session.callTool(
          toolName,
          isRecord(args) ? args : {},
          config?.signal
        );
        return outcome.isError
          ? JSON.stringify({ error: outcome.text })
          : outcome.text;
      } catch (error) {
        if (error instanceof Error && error.name === "AbortError") throw error;
        return JSON.stringify({
          error: error instanceof Error ? error.message : String(error),
        });
      }
    },
  });
}

export function toLangChainTools(
  capabilities: readonly Capability<Tool>[],
  session: Pick<GatewaySession, "callTool">
): StructuredToolInterface[] {
  return capabilities.map((c) => toLangChainTool(c, session));
}
