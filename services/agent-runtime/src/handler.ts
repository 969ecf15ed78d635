// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@digest/agent-runtime/handler`
 * Purpose: One invocation end to end: config, identity, gateway session, catalog, digest graph, report.
 * Scope: Transport-agnostic. server.ts maps HTTP onto handleInvocation/streamInvocation.
 * Invariants:
 *   - ONE_REPLY: every invocation resolves to exactly one result payload or error payload; it never rejects
 *   - Configuration and payload problems are reported before any IO
 *   - The gateway session spans catalog fetch and every node execution, and closes on every exit path
 *   - Nothing mutable is shared across invocations; config is read per request
 * Side-effects: IO (token endpoint, tool gateway, LLM endpoint via the runner)
 * Links: bootstrap/config.ts, pipeline/graph.ts, adapters/langgraph-agent-runner.ts
 * @public
 */

import { randomUUID } from "node:crypto";
import {
  type AgentRunner,
  AsyncQueue,
  aggregateGraphRun,
  createRunContext,
  type ErrorPayload,
  type Logger,
  type NodeStatus,
  type ResultPayload,
  toErrorPayload,
  toResultPayload,
} from "@digest/agent-graph";
import {
  type AccessTokenProvider,
  clientCredentialsTokenProvider,
  fetchCatalog,
  type GatewaySession,
  type GatewaySessionOptions,
  memoizeTokenProvider,
  staticTokenProvider,
  withGatewaySession,
} from "@digest/gateway-tools";
import type { Tool } from "@modelcontextprotocol/sdk/types.js";

import {
  createChatModel,
  LangGraphAgentRunner,
} from "./adapters/langgraph-agent-runner";
import { loadRuntimeConfig, type RuntimeConfig } from "./bootstrap/config";
import {
  parseInvocationPayload,
  resolvePrompt,
  sessionIdFromPayload,
} from "./invocation/payload";
import { buildDigestPipeline } from "./pipeline/graph";

export type InvocationReply = ResultPayload | ErrorPayload;

export type InvocationEvent =
  | {
      readonly type: "node";
      readonly name: string;
      readonly phase: "start" | "end";
      readonly status?: NodeStatus;
    }
  | { readonly type: "result"; readonly payload: InvocationReply };

export interface InvocationRequest {
  /** Parsed JSON body */
  readonly body: unknown;
  /** Session id from transport metadata; wins over the body's input.session_id */
  readonly sessionId?: string;
  /** Overrides the configured user id */
  readonly userId?: string;
  readonly signal?: AbortSignal;
}

export interface HandlerDeps {
  readonly env: Readonly<Record<string, string | undefined>>;
  readonly log: Logger;
  /** Token endpoint fetch; defaults to global fetch */
  readonly fetch?: typeof fetch;
  readonly createTransport?: GatewaySessionOptions["createTransport"];
  readonly createRunner?: (
    session: GatewaySession,
    config: RuntimeConfig
  ) => AgentRunner<Tool>;
  readonly randomId?: () => string;
  readonly now?: () => number;
}

const CLIENT_VERSION = "0.1.0";

function tokenProviderFor(
  config: RuntimeConfig,
  log: Logger,
  doFetch: typeof fetch | undefined
): AccessTokenProvider {
  const identity = config.identity;
  if (identity.kind === "static") {
    return staticTokenProvider(identity.accessToken);
  }
  return clientCredentialsTokenProvider({
    tokenUrl: identity.tokenUrl,
    clientId: identity.clientId,
    clientSecret: identity.clientSecret,
    scope: config.scope,
    log,
    ...(doFetch !== undefined && { fetch: doFetch }),
  });
}

function defaultRunner(
  session: GatewaySession,
  config: RuntimeConfig
): AgentRunner<Tool> {
  return new LangGraphAgentRunner({
    llm: createChatModel({ modelId: config.modelId, ...config.llm }),
    session,
  });
}

async function execute(
  request: InvocationRequest,
  deps: HandlerDeps,
  emit: (event: InvocationEvent) => void
): Promise<InvocationReply> {
  const randomId = deps.randomId ?? randomUUID;
  const correlationId = randomId();

  try {
    const config = loadRuntimeConfig(deps.env);
    const payload = parseInvocationPayload(request.body);
    const prompt = resolvePrompt(payload);
    const sessionId =
      request.sessionId ?? sessionIdFromPayload(payload) ?? randomId();

    const ctx = createRunContext(deps.log, {
      sessionId,
      userId: request.userId ?? config.userId,
      correlationId,
    });
    ctx.log.info({ promptLength: prompt.length }, "invocation started");

    const getAccessToken = memoizeTokenProvider(
      tokenProviderFor(config, ctx.log, deps.fetch)
    );

    return await withGatewaySession(
      {
        gatewayUrl: config.gatewayUrl,
        getAccessToken,
        log: ctx.log,
        clientInfo: { name: config.workloadName, version: CLIENT_VERSION },
        ...(deps.createTransport !== undefined && {
          createTransport: deps.createTransport,
        }),
      },
      async (session) => {
        const catalog = await fetchCatalog(session.lister, { log: ctx.log });
        const runner = (deps.createRunner ?? defaultRunner)(session, config);
        const pipeline = buildDigestPipeline(
          {
            catalog,
            runner,
            slackToolKeyword: config.slackToolKeyword,
            summaryToolKeyword: config.summaryToolKeyword,
            slackChannel: config.slackChannel,
          },
          ctx
        );

        const run = await pipeline.graph.run(prompt, {
          context: ctx,
          ...(request.signal !== undefined && { signal: request.signal }),
          ...(deps.now !== undefined && { now: deps.now }),
          onNodeStart: (nodeId) =>
            emit({ type: "node", name: nodeId, phase: "start" }),
          onNodeEnd: (result) =>
            emit({
              type: "node",
              name: result.nodeId,
              phase: "end",
              status: result.status,
            }),
        });

        const report = aggregateGraphRun(run, {
          capabilityMarkers: pipeline.capabilityMarkers,
          log: ctx.log,
        });
        ctx.log.info(
          {
            status: report.status,
            totalTokens: report.totalTokens,
            durationMs: report.totalExecutionTimeMs,
          },
          "invocation finished"
        );
        return toResultPayload(report, { sessionId });
      }
    );
  } catch (error) {
    deps.log.error({ err: error, correlationId }, "invocation failed");
    return toErrorPayload(error);
  }
}

/**
 * Run one invocation and resolve to its single reply.
 */
export function handleInvocation(
  request: InvocationRequest,
  deps: HandlerDeps
): Promise<InvocationReply> {
  return execute(request, deps, () => undefined);
}

/**
 * Run one invocation as an event stream: node progress events, then exactly one result event.
 * `final` resolves to the same reply the result event carries.
 */
export function streamInvocation(
  request: InvocationRequest,
  deps: HandlerDeps
): { stream: AsyncQueue<InvocationEvent>; final: Promise<InvocationReply> } {
  const queue = new AsyncQueue<InvocationEvent>();

  const final = (async (): Promise<InvocationReply> => {
    try {
      const reply = await execute(request, deps, (event) => queue.push(event));
      queue.push({ type: "result", payload: reply });
      return reply;
    } finally {
      queue.close();
    }
  })();

  return { stream: queue, final };
}
