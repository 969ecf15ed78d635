// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@digest/gateway-tools/mcp/session`
 * Purpose: Scoped, authenticated MCP session to the tool gateway.
 * Scope: Connect over streamable HTTP with a Bearer token, expose listing and tool calls, close on every exit path.
 * Invariants:
 *   - SCOPED_SESSION: the session is open for the whole callback and closed after it, success or failure
 *   - A close failure is logged and never masks the callback's outcome
 *   - Connection failures surface as GatewayConnectionError
 * Side-effects: IO (HTTP to the gateway, token endpoint via the provider)
 * Links: mcp/lister.ts, auth/token-provider.ts
 * @public
 */

import {
  GatewayConnectionError,
  isAgentGraphError,
  type Logger,
} from "@digest/agent-graph";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StreamableHTTPClientTransport } from "@modelcontextprotocol/sdk/client/streamableHttp.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import type { Tool } from "@modelcontextprotocol/sdk/types.js";

import type { AccessTokenProvider } from "../auth/token-provider";
import type { CapabilityLister } from "../catalog/fetch-catalog";
import { mcpToolLister } from "./lister";

export interface ToolCallOutcome {
  /** Text rendering of the tool's content, handed back to the model */
  readonly text: string;
  readonly isError: boolean;
}

export interface GatewaySession {
  readonly lister: CapabilityLister<Tool>;
  callTool(
    name: string,
    args: Record<string, unknown>,
    signal?: AbortSignal
  ): Promise<ToolCallOutcome>;
}

export interface GatewaySessionOptions {
  readonly gatewayUrl: string;
  readonly getAccessToken: AccessTokenProvider;
  readonly log: Logger;
  readonly clientInfo?: { readonly name: string; readonly version: string };
  /** Replaces the streamable HTTP transport (tests use an in-memory pair) */
  readonly createTransport?: (url: URL, accessToken: string) => Transport;
}

const DEFAULT_CLIENT_INFO = { name: "digest-graph", version: "0.1.0" };

/** Default transport: streamable HTTP with the bearer token on every request */
export function httpTransport(url: URL, accessToken: string): Transport {
  return new StreamableHTTPClientTransport(url, {
    requestInit: { headers: { Authorization: `Bearer ${accessToken}` } },
  });
}

function renderContent(content: unknown): string {
  if (!Array.isArray(content)) return "";
  const parts: string[] = [];
  for (const item of content) {
    if (
      typeof item === "object" &&
      item !== null &&
      "type" in item &&
      item.type === "text" &&
      "text" in item &&
      typeof item.text === "string"
    ) {
      parts.push(item.text);
    } else {
      parts.push(JSON.stringify(item));
    }
  }
  return parts.join("\n");
}

function toSession(client: Client): GatewaySession {
  return {
    lister: mcpToolLister(client),
    async callTool(name, args, signal) {
      const result = await client.callTool(
        { name, arguments: args },
        undefined,
        signal === undefined ? undefined : { signal }
      );
      const text =
        "structuredContent" in result && result.structuredContent !== undefined
          ? JSON.stringify(result.structuredContent)
          : renderContent(result.content);
      return { text, isError: result.isError === true };
    },
  };
}

/**
 * Open a gateway session, run `fn` inside it, and always close it.
 */
export async function withGatewaySession<T>(
  options: GatewaySessionOptions,
  fn: (session: GatewaySession) => Promise<T>
): Promise<T> {
  const log = options.log;

  let url: URL;
  try {
    url = new URL(options.gatewayUrl);
  } catch (cause) {
    throw new GatewayConnectionError(
      `Invalid gateway URL: ${options.gatewayUrl}`,
      { cause }
    );
  }

  const accessToken = await options.getAccessToken();
  const transport = (options.createTransport ?? httpTransport)(url, accessToken);
  const client = new Client(options.clientInfo ?? DEFAULT_CLIENT_INFO, {
    capabilities: {},
  });

  try {
    await client.connect(transport);
  } catch (cause) {
    await closeQuietly(client, log);
    if (isAgentGraphError(cause)) throw cause;
    const detail = cause instanceof Error ? cause.message : String(cause);
    throw new GatewayConnectionError(
      `Could not connect to tool gateway at ${url.origin}: ${detail}`,
      { cause }
    );
  }
  log.info({ gateway: url.origin }, "gateway session opened");

  try {
    return await fn(toSession(client));
  } finally {
    await closeQuietly(client, log);
    log.info({ gateway: url.origin }, "gateway session closed");
  }
}

async function closeQuietly(client: Client, log: Logger): Promise<void> {
  try {
    await client.close();
  } catch (error) {
    log.warn({ err: error }, "gateway session close failed");
  }
}
