// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@digest/gateway-tools/mcp/lister`
 * Purpose: Adapts an MCP client's tools/list to the CapabilityLister port.
 * Scope: One listing call per page; maps MCP tool definitions to Capabilities.
 * Side-effects: IO via the MCP client
 * Links: catalog/fetch-catalog.ts, mcp/session.ts
 * @internal
 */

import type { Capability } from "@digest/agent-graph";
import type { Tool } from "@modelcontextprotocol/sdk/types.js";

import type { CapabilityLister } from "../catalog/fetch-catalog";

/** The slice of the MCP Client that listing needs */
export interface ToolListingClient {
  listTools(params?: { cursor?: string }): Promise<{
    tools: Tool[];
    nextCursor?: string | undefined;
  }>;
}

export function toCapability(tool: Tool): Capability<Tool> {
  const title =
    typeof tool.title === "string" && tool.title.length > 0
      ? tool.title
      : tool.name;
  return {
    name: tool.name,
    displayName: title,
    ...(tool.description !== undefined && { description: tool.description }),
    handle: tool,
  };
}

export function mcpToolLister(client: ToolListingClient): CapabilityLister<Tool> {
  return {
    async listPage(cursor) {
      const result = await client.listTools(
        cursor === undefined ? undefined : { cursor }
      );
      return {
        capabilities: result.tools.map(toCapability),
        nextCursor: result.nextCursor,
      };
    },
  };
}
