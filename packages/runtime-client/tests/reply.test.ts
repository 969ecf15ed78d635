// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@digest/runtime-client/tests/reply.test`
 * Purpose: Reply interpretation, including result payloads wrapped as text.
 * Side-effects: none
 * Links: src/reply.ts
 * @internal
 */

import { describe, expect, it } from "vitest";

import { interpretReply } from "../src/reply";

const report = {
  status: "completed",
  agents: [],
  total_execution_time_ms: 5,
  total_tokens: 0,
  mcp_tools_used: false,
  full_text: "(no content)",
  metadata: { session_id: "s", total_nodes: 0, completed_nodes: 0, failed_nodes: 0 },
};

describe("interpretReply", () => {
  it("recognizes a structured result payload", () => {
    expect(interpretReply({ type: "structured", data: report })).toEqual({
      kind: "report",
      payload: report,
    });
  });

  it("keeps other structured data as data", () => {
    expect(interpretReply({ type: "structured", data: { agents: "nope" } })).toEqual({
      kind: "data",
      data: { agents: "nope" },
    });
  });

  it("re-detects a result payload delivered as text", () => {
    const reply = interpretReply({ type: "text", message: ` ${JSON.stringify(report)} ` });

    expect(reply.kind).toBe("report");
  });

  it("leaves brace-wrapped prose as text", () => {
    expect(interpretReply({ type: "text", message: "{not json}" })).toEqual({
      kind: "text",
      message: "{not json}",
    });
  });

  it("passes errors and empties through", () => {
    expect(interpretReply({ type: "error", message: "boom" })).toEqual({
      kind: "error",
      message: "boom",
    });
    expect(interpretReply({ type: "empty" })).toEqual({ kind: "empty" });
  });
});
