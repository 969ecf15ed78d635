// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@digest/runtime-client/invoke`
 * Purpose: Calls the agent runtime's /invocations endpoint and decodes whatever comes back.
 * Scope: One HTTP round trip. Does NOT render (see format-report.ts).
 * Invariants:
 *   - Body is {"input": {"prompt", "session_id"}}; user id travels in x-runtime-user-id
 *   - Every outcome is a DecodedResult; transport failures become {type: "error"}
 *   - Caller aborts propagate as AbortError
 * Side-effects: IO (HTTP)
 * Links: @digest/agent-graph decode/decoder.ts
 * @public
 */

import {
  type DecodedResult,
  decodeResponse,
  isAbortError,
  type Logger,
  SESSION_ID_HEADER,
  USER_ID_HEADER,
} from "@digest/agent-graph";

export interface RuntimeInvocation {
  /** Base URL of the runtime, e.g. http://localhost:8080 */
  readonly endpoint: string;
  readonly prompt: string;
  readonly sessionId: string;
  readonly userId: string;
  /** Ask for the SSE rendition (progress comments + one data line) */
  readonly stream?: boolean;
  readonly signal?: AbortSignal;
  readonly log: Logger;
  /** Injected for tests; defaults to global fetch */
  readonly fetch?: typeof fetch;
}

export async function invokeAgentRuntime(
  invocation: RuntimeInvocation
): Promise<DecodedResult> {
  const doFetch = invocation.fetch ?? fetch;
  const url = new URL("/invocations", invocation.endpoint);
  const log = invocation.log.child({ sessionId: invocation.sessionId });

  log.info({ url: url.toString(), stream: Boolean(invocation.stream) }, "invoking agent runtime");

  let response: Response;
  try {
    response = await doFetch(url, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Accept: invocation.stream ? "text/event-stream" : "application/json",
        [SESSION_ID_HEADER]: invocation.sessionId,
        [USER_ID_HEADER]: invocation.userId,
      },
      body: JSON.stringify({
        input: { prompt: invocation.prompt, session_id: invocation.sessionId },
      }),
      ...(invocation.signal !== undefined && { signal: invocation.signal }),
    });
  } catch (error) {
    if (isAbortError(error)) throw error;
    const detail = error instanceof Error ? error.message : String(error);
    log.error({ err: error }, "agent runtime unreachable");
    return { type: "error", message: `Could not reach the agent runtime: ${detail}` };
  }

  let bytes: Uint8Array;
  try {
    bytes = new Uint8Array(await response.arrayBuffer());
  } catch (error) {
    if (isAbortError(error)) throw error;
    const detail = error instanceof Error ? error.message : String(error);
    log.error({ err: error, status: response.status }, "agent runtime reply interrupted");
    return { type: "error", message: `Could not read the agent runtime reply: ${detail}` };
  }
  log.info({ status: response.status, bytes: bytes.length }, "agent runtime replied");

  const decoded = decodeResponse(bytes, {
    onDecodeError: (error) =>
      log.warn({ err: error }, "runtime reply is not valid UTF-8"),
  });

  if (!response.ok && decoded.type !== "error") {
    return {
      type: "error",
      message: `Agent runtime returned HTTP ${response.status}`,
    };
  }
  return decoded;
}
