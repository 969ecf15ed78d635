// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@digest/agent-runtime/tests/server.test`
 * Purpose: HTTP routing of the runtime through dispatch() (no socket is bound).
 * Scope: /ping, /invocations JSON and SSE modes, status codes, header handling.
 * Side-effects: none
 * Links: src/server.ts
 * @internal
 */

import type { IncomingHttpHeaders } from "node:http";
import { describe, expect, it } from "vitest";

import type { HandlerDeps } from "../src/handler";
import { dispatch, type RuntimeResponse, toSseChunk } from "../src/server";
import {
  BASE_ENV,
  createFakeGateway,
  FakeRunner,
  reply,
  silentLogger,
  tool,
} from "./_fakes/fakes";

async function runtimeDeps(
  overrides: Partial<HandlerDeps> = {}
): Promise<HandlerDeps> {
  const gateway = await createFakeGateway([tool("slack___read"), tool("tavily___extract")]);
  return {
    env: BASE_ENV,
    log: silentLogger,
    createTransport: gateway.createTransport,
    createRunner: () =>
      new FakeRunner({
        slack_agent: reply("https://example.test/a"),
        tavily_agent: reply("Summary."),
      }),
    randomId: () => "generated-id",
    now: () => 0,
    ...overrides,
  };
}

function request(
  method: string,
  path: string,
  options: { body?: string; headers?: IncomingHttpHeaders } = {}
) {
  return {
    method,
    path,
    headers: options.headers ?? {},
    body: options.body ?? "",
    signal: new AbortController().signal,
  };
}

function json(response: RuntimeResponse): { status: number; body: unknown } {
  if (response.kind !== "json") throw new Error("expected a JSON response");
  return { status: response.status, body: response.body };
}

describe("dispatch", () => {
  it("answers the health probe", async () => {
    const response = await dispatch(request("GET", "/ping"), await runtimeDeps());
    expect(json(response)).toEqual({ status: 200, body: { status: "Healthy" } });
  });

  it("rejects unknown paths and wrong methods", async () => {
    const deps = await runtimeDeps();
    expect(json(await dispatch(request("GET", "/nope"), deps)).status).toBe(404);
    expect(json(await dispatch(request("POST", "/ping"), deps)).status).toBe(405);
    expect(json(await dispatch(request("GET", "/invocations"), deps)).status).toBe(405);
  });

  it("answers a malformed body with a configuration error", async () => {
    const response = await dispatch(
      request("POST", "/invocations", { body: "{prompt" }),
      await runtimeDeps()
    );
    expect(json(response)).toEqual({
      status: 400,
      body: {
        error: "Invalid payload: body is not valid JSON",
        category: "configuration",
      },
    });
  });

  it("returns the result payload, taking the session id from the header", async () => {
    const response = await dispatch(
      request("POST", "/invocations", {
        body: JSON.stringify({ input: { prompt: "go", session_id: "body-session" } }),
        headers: {
          "x-runtime-session-id": "header-session",
          "x-runtime-user-id": "user-2",
        },
      }),
      await runtimeDeps()
    );

    const { status, body } = json(response);
    expect(status).toBe(200);
    expect(body).toMatchObject({
      status: "completed",
      full_text: "[slack_agent]\nhttps://example.test/a\n[tavily_agent]\nSummary.",
      metadata: { session_id: "header-session" },
    });
  });

  it("maps error categories onto status codes", async () => {
    const configFailure = await dispatch(
      request("POST", "/invocations", { body: '{"prompt":"go"}' }),
      await runtimeDeps({ env: {} })
    );
    expect(json(configFailure).status).toBe(400);

    const gateway = await createFakeGateway([]);
    const capabilityFailure = await dispatch(
      request("POST", "/invocations", { body: '{"prompt":"go"}' }),
      await runtimeDeps({ createTransport: gateway.createTransport })
    );
    expect(json(capabilityFailure)).toEqual({
      status: 502,
      body: { error: "The tool gateway returned no tools", category: "capability" },
    });
  });

  it("streams progress comments and one data line when asked for SSE", async () => {
    const response = await dispatch(
      request("POST", "/invocations", {
        body: '{"prompt":"go"}',
        headers: { accept: "text/event-stream" },
      }),
      await runtimeDeps()
    );
    if (response.kind !== "sse") throw new Error("expected an SSE response");

    const chunks: string[] = [];
    for await (const chunk of response.chunks) chunks.push(chunk);

    expect(chunks.slice(0, 4)).toEqual([
      ": node slack_agent start\n\n",
      ": node slack_agent end\n\n",
      ": node tavily_agent start\n\n",
      ": node tavily_agent end\n\n",
    ]);
    expect(chunks).toHaveLength(5);
    const last = chunks[4] ?? "";
    expect(last.startsWith("data: ")).toBe(true);
    expect(JSON.parse(last.slice("data: ".length))).toMatchObject({
      status: "completed",
      metadata: { session_id: "generated-id" },
    });
  });
});

describe("toSseChunk", () => {
  it("frames error results as a data line", () => {
    expect(
      toSseChunk({
        type: "result",
        payload: { error: "boom", category: "generic" },
      })
    ).toBe('data: {"error":"boom","category":"generic"}\n\n');
  });
});
