// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@digest/agent-runtime/server`
 * Purpose: HTTP surface of the agent runtime.
 * Scope: POST /invocations (JSON or SSE), GET /ping. Routing lives in dispatch(); createRuntimeServer adapts it to node:http.
 * Invariants:
 *   - /ping always returns 200 {"status":"Healthy"}
 *   - /invocations answers with exactly one result payload or error payload (JSON body, or one SSE data line)
 *   - SSE progress is sent as comment lines, never as data lines
 *   - A client disconnect aborts the in-flight run
 * Side-effects: IO (binds HTTP server when listen() is called by main.ts)
 * Links: handler.ts, main.ts
 * @public
 */

import {
  createServer,
  type IncomingHttpHeaders,
  type IncomingMessage,
  type Server,
  type ServerResponse,
} from "node:http";
import {
  ConfigurationError,
  type ErrorCategory,
  SESSION_ID_HEADER,
  toErrorPayload,
  USER_ID_HEADER,
} from "@digest/agent-graph";

import {
  type HandlerDeps,
  handleInvocation,
  type InvocationEvent,
  type InvocationRequest,
  streamInvocation,
} from "./handler";

export interface RuntimeRequest {
  readonly method: string;
  /** Path without query string */
  readonly path: string;
  readonly headers: IncomingHttpHeaders;
  readonly body: string;
  readonly signal: AbortSignal;
}

export type RuntimeResponse =
  | { readonly kind: "json"; readonly status: number; readonly body: unknown }
  | { readonly kind: "sse"; readonly chunks: AsyncIterable<string> };

const ERROR_STATUS: Record<ErrorCategory, number> = {
  configuration: 400,
  connectivity: 502,
  capability: 502,
  generic: 500,
};

function headerValue(
  headers: IncomingHttpHeaders,
  name: string
): string | undefined {
  const raw = headers[name];
  const value = Array.isArray(raw) ? raw[0] : raw;
  return value !== undefined && value.length > 0 ? value : undefined;
}

function wantsEventStream(headers: IncomingHttpHeaders): boolean {
  return (headerValue(headers, "accept") ?? "").includes("text/event-stream");
}

/** One SSE frame per event: comment lines for progress, a data line for the reply. */
export function toSseChunk(event: InvocationEvent): string {
  if (event.type === "node") {
    return `: node ${event.name} ${event.phase}\n\n`;
  }
  return `data: ${JSON.stringify(event.payload)}\n\n`;
}

async function* sseChunks(
  events: AsyncIterable<InvocationEvent>
): AsyncGenerator<string> {
  for await (const event of events) {
    yield toSseChunk(event);
  }
}

function parseBody(body: string): unknown {
  if (body.trim().length === 0) return {};
  try {
    return JSON.parse(body);
  } catch (cause) {
    throw new ConfigurationError("Invalid payload: body is not valid JSON", [
      cause instanceof Error ? cause.message : String(cause),
    ]);
  }
}

async function invocations(
  request: RuntimeRequest,
  deps: HandlerDeps
): Promise<RuntimeResponse> {
  let body: unknown;
  try {
    body = parseBody(request.body);
  } catch (error) {
    const payload = toErrorPayload(error);
    return { kind: "json", status: ERROR_STATUS[payload.category], body: payload };
  }

  const sessionId = headerValue(request.headers, SESSION_ID_HEADER);
  const userId = headerValue(request.headers, USER_ID_HEADER);
  const invocation: InvocationRequest = {
    body,
    signal: request.signal,
    ...(sessionId !== undefined && { sessionId }),
    ...(userId !== undefined && { userId }),
  };

  if (wantsEventStream(request.headers)) {
    const { stream } = streamInvocation(invocation, deps);
    return { kind: "sse", chunks: sseChunks(stream) };
  }

  const reply = await handleInvocation(invocation, deps);
  if ("category" in reply) {
    return { kind: "json", status: ERROR_STATUS[reply.category], body: reply };
  }
  return { kind: "json", status: 200, body: reply };
}

/**
 * Route one request. Transport-free so tests can call it directly.
 */
export async function dispatch(
  request: RuntimeRequest,
  deps: HandlerDeps
): Promise<RuntimeResponse> {
  if (request.path === "/ping") {
    return request.method === "GET"
      ? { kind: "json", status: 200, body: { status: "Healthy" } }
      : { kind: "json", status: 405, body: { error: "Method not allowed" } };
  }
  if (request.path === "/invocations") {
    return request.method === "POST"
      ? invocations(request, deps)
      : { kind: "json", status: 405, body: { error: "Method not allowed" } };
  }
  return { kind: "json", status: 404, body: { error: "Not found" } };
}

async function readBody(req: IncomingMessage): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString("utf8");
}

async function writeResponse(
  res: ServerResponse,
  response: RuntimeResponse
): Promise<void> {
  if (response.kind === "json") {
    res.writeHead(response.status, { "Content-Type": "application/json" });
    res.end(JSON.stringify(response.body));
    return;
  }
  res.writeHead(200, {
    "Content-Type": "text/event-stream",
    "Cache-Control": "no-cache",
    Connection: "keep-alive",
  });
  for await (const chunk of response.chunks) {
    res.write(chunk);
  }
  res.end();
}

export function createRuntimeServer(deps: HandlerDeps): Server {
  return createServer((req, res) => {
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableFinished) controller.abort();
    });

    const serve = async (): Promise<void> => {
      const url = new URL(req.url ?? "/", "http://localhost");
      const response = await dispatch(
        {
          method: req.method ?? "GET",
          path: url.pathname,
          headers: req.headers,
          body: await readBody(req),
          signal: controller.signal,
        },
        deps
      );
      await writeResponse(res, response);
    };

    serve().catch((err: unknown) => {
      deps.log.error({ err }, "request handling failed");
      if (!res.headersSent) {
        res.writeHead(500, { "Content-Type": "application/json" });
        res.end(JSON.stringify(toErrorPayload(err)));
      } else {
        res.end();
      }
    });
  });
}
