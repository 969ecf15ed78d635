// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@digest/agent-graph/tests/node/agent-node.test`
 * Purpose: Agent node kinds and failure wrapping.
 * Scope: Terminal no-op, text and structured output, NodeExecutionError. Runner is scripted.
 * Side-effects: none
 * Links: src/node/agent-node.ts
 * @internal
 */

import { describe, expect, it } from "vitest";

import { NodeExecutionError } from "../../src/errors";
import { createAgentNode, parseJsonBody } from "../../src/node/agent-node";
import type { Capability } from "../../src/types/capability";
import { textBlock, toolResultBlock } from "../../src/types/content";
import {
  assistant,
  ScriptedRunner,
  silentLogger,
  textResult,
  usage,
} from "../_fakes/scripted-runner";

const signal = new AbortController().signal;
const options = { signal, log: silentLogger };

const slackTool: Capability<string> = {
  name: "slack___search",
  displayName: "slack___search",
  handle: "slack-handle",
};

describe("createAgentNode", () => {
  it("builds a terminal no-op when capabilities and prompt are both empty", async () => {
    const runner = new ScriptedRunner({});
    const node = createAgentNode({
      id: "block_agent",
      capabilities: [],
      systemPrompt: "   ",
      runner,
    });

    const result = await node.run("anything", options);

    expect(node.kind).toBe("terminal");
    expect(runner.calls).toHaveLength(0);
    expect(result).toEqual({
      nodeId: "block_agent",
      status: "completed",
      results: [],
      executionTimeMs: 0,
      usage: { inputTokens: 0, outputTokens: 0, totalTokens: 0 },
    });
  });

  it("passes prompt, system prompt and capabilities to the runner", async () => {
    const runner = new ScriptedRunner({
      slack_agent: textResult("found 2 links", usage(12, 3)),
    });
    const node = createAgentNode({
      id: "slack_agent",
      capabilities: [slackTool],
      systemPrompt: "Read Slack.",
      runner,
    });

    const result = await node.run("latest posts", options);

    expect(node.kind).toBe("text");
    expect(runner.calls[0]).toMatchObject({
      nodeId: "slack_agent",
      prompt: "latest posts",
      systemPrompt: "Read Slack.",
      capabilities: [slackTool],
    });
    expect(result.status).toBe("completed");
    expect(result.results).toHaveLength(1);
    expect(result.usage.totalTokens).toBe(15);
  });

  it("lifts JSON text into json blocks for structured nodes", async () => {
    const runner = new ScriptedRunner({
      extract: assistant([
        textBlock('```json\n{"urls": ["https://example.test"]}\n```'),
        textBlock("plain words"),
        toolResultBlock([textBlock("[1, 2]")], "search"),
      ]),
    });
    const node = createAgentNode({
      id: "extract",
      capabilities: [],
      systemPrompt: "Return JSON.",
      runner,
      output: "structured",
    });

    const result = await node.run("go", options);

    expect(result.results[0]?.message.content).toEqual([
      { type: "json", json: { urls: ["https://example.test"] } },
      { type: "text", text: "plain words" },
      {
        type: "tool_result",
        toolName: "search",
        content: [{ type: "text", text: "[1, 2]" }],
      },
    ]);
  });

  it("wraps runner failures in NodeExecutionError with the node id and cause", async () => {
    const cause = new Error("model unavailable");
    const runner = new ScriptedRunner({ slack_agent: cause });
    const node = createAgentNode({
      id: "slack_agent",
      capabilities: [slackTool],
      systemPrompt: "Read Slack.",
      runner,
    });

    const error = await node.run("go", options).then(
      () => undefined,
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(NodeExecutionError);
    if (!(error instanceof NodeExecutionError)) return;
    expect(error.nodeId).toBe("slack_agent");
    expect(error.cause).toBe(cause);
    expect(error.code).toBe("internal");
  });

  it("rejects with code aborted without calling the runner when already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const runner = new ScriptedRunner({ a: textResult("x") });
    const node = createAgentNode({
      id: "a",
      capabilities: [],
      systemPrompt: "p",
      runner,
    });

    await expect(
      node.run("go", { signal: controller.signal, log: silentLogger })
    ).rejects.toMatchObject({ code: "aborted", nodeId: "a" });
    expect(runner.calls).toHaveLength(0);
  });
});

describe("parseJsonBody", () => {
  it("accepts objects, arrays and fenced JSON", () => {
    expect(parseJsonBody('{"a":1}')).toEqual({ a: 1 });
    expect(parseJsonBody(" [1,2] ")).toEqual([1, 2]);
    expect(parseJsonBody("```\n{\"b\":2}\n```")).toEqual({ b: 2 });
  });

  it("rejects scalars and broken JSON", () => {
    expect(parseJsonBody("42")).toBeUndefined();
    expect(parseJsonBody('"text"')).toBeUndefined();
    expect(parseJsonBody("{not json")).toBeUndefined();
  });
});
