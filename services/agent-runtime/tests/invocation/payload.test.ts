// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@digest/agent-runtime/tests/invocation/payload.test`
 * Purpose: Prompt and session id resolution from inbound payloads.
 * Side-effects: none
 * Links: src/invocation/payload.ts
 * @internal
 */

import { ConfigurationError } from "@digest/agent-graph";
import { describe, expect, it } from "vitest";

import {
  parseInvocationPayload,
  resolvePrompt,
  sessionIdFromPayload,
} from "../../src/invocation/payload";

function promptOf(body: unknown): string {
  return resolvePrompt(parseInvocationPayload(body));
}

describe("resolvePrompt", () => {
  it("reads a top-level prompt", () => {
    expect(promptOf({ prompt: "latest links" })).toBe("latest links");
  });

  it("prefers input.prompt over the top-level prompt", () => {
    expect(promptOf({ prompt: "outer", input: { prompt: "inner" } })).toBe("inner");
  });

  it("decodes a JSON string input", () => {
    expect(promptOf({ input: '{"prompt":"from json"}' })).toBe("from json");
  });

  it("uses a non-JSON string input as the prompt itself", () => {
    expect(promptOf({ input: "just words" })).toBe("just words");
    expect(promptOf({ input: '{"other":1}' })).toBe('{"other":1}');
  });

  it("rejects a missing or blank prompt before anything runs", () => {
    expect(() => promptOf({})).toThrow(ConfigurationError);
    expect(() => promptOf({ prompt: "   " })).toThrow(
      "Invalid payload: a non-empty 'prompt' is required"
    );
    expect(() => promptOf({ input: '{"prompt":""}' })).toThrow(ConfigurationError);
  });

  it("rejects bodies that are not payload objects", () => {
    expect(() => parseInvocationPayload("prompt")).toThrow(ConfigurationError);
    expect(() => parseInvocationPayload({ prompt: 42 })).toThrow(
      "Invalid payload: expected an object with 'prompt' or 'input'"
    );
  });
});

describe("sessionIdFromPayload", () => {
  it("reads input.session_id when present and non-empty", () => {
    expect(
      sessionIdFromPayload(parseInvocationPayload({ input: { prompt: "p", session_id: "s-1" } }))
    ).toBe("s-1");
    expect(
      sessionIdFromPayload(parseInvocationPayload({ input: { prompt: "p", session_id: "" } }))
    ).toBeUndefined();
    expect(sessionIdFromPayload(parseInvocationPayload({ prompt: "p" }))).toBeUndefined();
  });
});
