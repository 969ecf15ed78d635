// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@digest/agent-runtime/tests/handler.test`
 * Purpose: End-to-end invocation against an in-process gateway and a scripted runner.
 * Scope: Result payload, error payloads per category, identity modes, streaming events, cancellation.
 * Invariants:
 *   - ONE_REPLY: every case resolves to exactly one payload
 *   - No network: gateway is an in-memory MCP server, token endpoint a fake fetch
 * Side-effects: none
 * Links: src/handler.ts
 * @internal
 */

import { ResultPayloadSchema } from "@digest/agent-graph";
import { describe, expect, it, vi } from "vitest";

import {
  type HandlerDeps,
  handleInvocation,
  type InvocationEvent,
  streamInvocation,
} from "../src/handler";
import {
  BASE_ENV,
  createFakeGateway,
  FakeRunner,
  type FakeGateway,
  reply,
  silentLogger,
  tool,
} from "./_fakes/fakes";

function deps(
  gateway: FakeGateway,
  runner: FakeRunner,
  overrides: Partial<HandlerDeps> = {}
): HandlerDeps {
  return {
    env: BASE_ENV,
    log: silentLogger,
    createTransport: gateway.createTransport,
    createRunner: () => runner,
    randomId: () => "generated-id",
    now: () => 0,
    ...overrides,
  };
}

function happyRunner(): FakeRunner {
  return new FakeRunner({
    slack_agent: reply("Read 1 slack message: https://example.test/a", 10, 5),
    tavily_agent: reply("A page about testing.", 20, 7),
  });
}

const digestTools = [tool("slack___read"), tool("tavily___extract")];

describe("handleInvocation", () => {
  it("runs the digest graph and returns the result payload", async () => {
    const gateway = await createFakeGateway(digestTools);

    const payload = await handleInvocation(
      { body: { prompt: "collect links" }, sessionId: "session-1" },
      deps(gateway, happyRunner())
    );

    expect(payload).toEqual({
      status: "completed",
      agents: [
        {
          name: "slack_agent",
          messages: [
            { type: "text", content: "Read 1 slack message: https://example.test/a" },
          ],
          execution_time_ms: 0,
          status: "completed",
          tokens_used: 15,
        },
        {
          name: "tavily_agent",
          messages: [{ type: "text", content: "A page about testing." }],
          execution_time_ms: 0,
          status: "completed",
          tokens_used: 27,
        },
        {
          name: "block_agent",
          messages: [],
          execution_time_ms: 0,
          status: "skipped",
          tokens_used: 0,
        },
      ],
      total_execution_time_ms: 0,
      total_tokens: 42,
      mcp_tools_used: true,
      full_text:
        "[slack_agent]\nRead 1 slack message: https://example.test/a\n[tavily_agent]\nA page about testing.",
      metadata: {
        session_id: "session-1",
        total_nodes: 3,
        completed_nodes: 2,
        failed_nodes: 0,
        skipped_nodes: 1,
      },
    });
    expect(ResultPayloadSchema.safeParse(payload).success).toBe(true);
    expect(gateway.tokens).toEqual(["test-token"]);
    expect(gateway.urls).toEqual(["https://gateway.test/mcp"]);
    expect(gateway.isClosed()).toBe(true);
  });

  it("falls back to input.session_id, then to a generated id", async () => {
    const first = await handleInvocation(
      { body: { input: { prompt: "go", session_id: "from-body" } } },
      deps(await createFakeGateway(digestTools), happyRunner())
    );
    const second = await handleInvocation(
      { body: { prompt: "go" } },
      deps(await createFakeGateway(digestTools), happyRunner())
    );

    expect("metadata" in first && first.metadata.session_id).toBe("from-body");
    expect("metadata" in second && second.metadata.session_id).toBe("generated-id");
  });

  it("passes the user id override into the run context", async () => {
    const runner = happyRunner();
    const log = silentLogger.child({});
    const childSpy = vi.spyOn(log, "child");

    await handleInvocation(
      { body: { prompt: "go" }, sessionId: "s", userId: "user-from-header" },
      deps(await createFakeGateway(digestTools), runner, { log })
    );

    expect(childSpy).toHaveBeenCalledWith({
      sessionId: "s",
      userId: "user-from-header",
      correlationId: "generated-id",
    });
  });

  it("reports configuration errors without touching the gateway", async () => {
    const gateway = await createFakeGateway(digestTools);

    const payload = await handleInvocation(
      { body: { prompt: "go" } },
      deps(gateway, happyRunner(), { env: {} })
    );

    expect(payload).toEqual({
      error: expect.stringContaining("GATEWAY_URL: GATEWAY_URL is required"),
      category: "configuration",
    });
    expect(gateway.tokens).toEqual([]);
  });

  it("reports a blank prompt as a configuration error", async () => {
    const gateway = await createFakeGateway(digestTools);

    const payload = await handleInvocation(
      { body: { input: { prompt: " " } } },
      deps(gateway, happyRunner())
    );

    expect(payload).toEqual({
      error: "Invalid payload: a non-empty 'prompt' is required",
      category: "configuration",
    });
    expect(gateway.tokens).toEqual([]);
  });

  it("reports an empty catalog as a capability error and still closes the session", async () => {
    const gateway = await createFakeGateway([]);
    const runner = happyRunner();

    const payload = await handleInvocation(
      { body: { prompt: "go" } },
      deps(gateway, runner)
    );

    expect(payload).toEqual({
      error: "The tool gateway returned no tools",
      category: "capability",
    });
    expect(runner.requests).toEqual([]);
    expect(gateway.isClosed()).toBe(true);
  });

  it("returns a failed report when a node fails", async () => {
    const runner = new FakeRunner({
      slack_agent: new Error("model unavailable"),
      tavily_agent: reply("never"),
    });

    const payload = await handleInvocation(
      { body: { prompt: "go" }, sessionId: "s" },
      deps(await createFakeGateway(digestTools), runner)
    );

    if (!("agents" in payload)) throw new Error("expected a result payload");
    expect(payload.status).toBe("failed");
    expect(payload.full_text).toBe("(no content)");
    expect(payload.agents.map((a) => `${a.name}:${a.status}`)).toEqual([
      "slack_agent:failed",
      "tavily_agent:skipped",
      "block_agent:skipped",
    ]);
    expect(payload.agents[0]?.error).toEqual({
      code: "internal",
      message: 'Node "slack_agent" failed: model unavailable',
    });
  });

  it("exchanges client credentials for the gateway token", async () => {
    const gateway = await createFakeGateway(digestTools);
    const fetchFn = vi.fn<typeof fetch>(async () =>
      new Response(JSON.stringify({ access_token: "token-from-idp" }), {
        status: 200,
        headers: { "Content-Type": "application/json" },
      })
    );

    await handleInvocation(
      { body: { prompt: "go" } },
      deps(gateway, happyRunner(), {
        env: {
          GATEWAY_URL: "https://gateway.test/mcp",
          GATEWAY_SCOPE: "gateway/invoke",
          TOKEN_URL: "https://auth.test/oauth2/token",
          CLIENT_ID: "test-client",
          CLIENT_SECRET: "test-secret",
        },
        fetch: fetchFn,
      })
    );

    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(fetchFn.mock.calls[0]?.[0]).toBe("https://auth.test/oauth2/token");
    expect(gateway.tokens).toEqual(["token-from-idp"]);
  });

  it("reports an unreachable identity provider as a connectivity error", async () => {
    const gateway = await createFakeGateway(digestTools);
    const fetchFn = vi.fn<typeof fetch>(async () => {
      throw new TypeError("fetch failed");
    });

    const payload = await handleInvocation(
      { body: { prompt: "go" } },
      deps(gateway, happyRunner(), {
        env: {
          GATEWAY_URL: "https://gateway.test/mcp",
          GATEWAY_SCOPE: "gateway/invoke",
          TOKEN_URL: "https://auth.test/oauth2/token",
          CLIENT_ID: "test-client",
          CLIENT_SECRET: "test-secret",
        },
        fetch: fetchFn,
      })
    );

    expect(payload).toEqual({
      error: "Identity provider unreachable",
      category: "connectivity",
    });
  });

  it("marks the run failed when the caller has already gone away", async () => {
    const controller = new AbortController();
    controller.abort();
    const runner = happyRunner();

    const payload = await handleInvocation(
      { body: { prompt: "go" }, signal: controller.signal },
      deps(await createFakeGateway(digestTools), runner)
    );

    expect(runner.requests).toEqual([]);
    expect("status" in payload && payload.status).toBe("failed");
  });
});

describe("streamInvocation", () => {
  it("emits node progress and then exactly one result", async () => {
    const { stream, final } = streamInvocation(
      { body: { prompt: "go" }, sessionId: "s" },
      deps(await createFakeGateway(digestTools), happyRunner())
    );

    const events: InvocationEvent[] = [];
    for await (const event of stream) events.push(event);
    const payload = await final;

    expect(events.slice(0, 4)).toEqual([
      { type: "node", name: "slack_agent", phase: "start" },
      { type: "node", name: "slack_agent", phase: "end", status: "completed" },
      { type: "node", name: "tavily_agent", phase: "start" },
      { type: "node", name: "tavily_agent", phase: "end", status: "completed" },
    ]);
    expect(events).toHaveLength(5);
    expect(events[4]).toEqual({ type: "result", payload });
  });

  it("emits only the error result when configuration fails", async () => {
    const { stream } = streamInvocation(
      { body: { prompt: "go" } },
      deps(await createFakeGateway(digestTools), happyRunner(), { env: {} })
    );

    const events: InvocationEvent[] = [];
    for await (const event of stream) events.push(event);

    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({
      type: "result",
      payload: { category: "configuration" },
    });
  });
});
