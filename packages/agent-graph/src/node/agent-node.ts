// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@digest/agent-graph/node/agent-node`
 * Purpose: Wraps one capability subset + system prompt into an executable graph node.
 * Scope: Builds text, structured and terminal nodes; runs them through the AgentRunner port. Does NOT schedule nodes.
 * Invariants:
 *   - TERMINAL_IS_NOOP: empty capabilities + empty prompt → completed result, runner never called
 *   - FAILURES_NOT_SWALLOWED: runner failures rethrown as NodeExecutionError(nodeId, cause)
 *   - ABORT_ABANDONS: an abort rejects immediately even if the runner ignores the signal
 * Side-effects: IO via AgentRunner
 * Links: agent-runner.port.ts, graph/graph.ts
 * @public
 */

import type { Logger } from "pino";

import { NodeExecutionError } from "../errors";
import type { Capability } from "../types/capability";
import {
  type AgentInvocationResult,
  type ContentBlock,
  jsonBlock,
  ZERO_USAGE,
} from "../types/content";
import type { NodeResult } from "../types/results";
import { raceAbort, throwIfAborted } from "../util/abort";
import type { AgentRunner } from "./agent-runner.port";

/**
 * - text: agent output kept as produced
 * - structured: JSON-bearing text blocks are lifted into json blocks
 * - terminal: no-op node used to model pipeline termination
 */
export type AgentNodeKind = "text" | "structured" | "terminal";

export interface NodeRunOptions {
  readonly signal: AbortSignal;
  readonly log: Logger;
  /** Millisecond clock (defaults to Date.now) */
  readonly now?: () => number;
}

export interface AgentNode {
  readonly id: string;
  readonly kind: AgentNodeKind;
  readonly capabilities: readonly Capability[];
  readonly systemPrompt: string;
  run(input: string, options: NodeRunOptions): Promise<NodeResult>;
}

export interface AgentNodeSpec<THandle = unknown> {
  readonly id: string;
  readonly capabilities: readonly Capability<THandle>[];
  readonly systemPrompt: string;
  readonly runner: AgentRunner<THandle>;
  /** Defaults to "text"; ignored when the node is degenerate (terminal) */
  readonly output?: "text" | "structured";
}

const JSON_FENCE = /^```(?:json)?\s*\n([\s\S]*?)\n?```$/;

/**
 * Parse a text body as a JSON object or array, tolerating a Markdown ```json fence.
 * Returns undefined for anything else (including bare JSON scalars).
 */
export function parseJsonBody(text: string): object | undefined {
  const trimmed = text.trim();
  const fenced = JSON_FENCE.exec(trimmed);
  const body = fenced?.[1] ?? trimmed;
  if (!body.startsWith("{") && !body.startsWith("[")) {
    return undefined;
  }
  try {
    const parsed: unknown = JSON.parse(body);
    return typeof parsed === "object" && parsed !== null ? parsed : undefined;
  } catch {
    return undefined;
  }
}

function liftStructured(result: AgentInvocationResult): AgentInvocationResult {
  const content: ContentBlock[] = result.message.content.map((block) => {
    if (block.type !== "text") return block;
    const parsed = parseJsonBody(block.text);
    return parsed === undefined ? block : jsonBlock(parsed);
  });
  return { ...result, message: { role: "assistant", content } };
}

function isDegenerate(spec: {
  capabilities: readonly unknown[];
  systemPrompt: string;
}): boolean {
  return spec.capabilities.length === 0 && spec.systemPrompt.trim() === "";
}

class TerminalNode implements AgentNode {
  readonly kind = "terminal";
  readonly capabilities: readonly Capability[] = [];
  readonly systemPrompt = "";

  constructor(readonly id: string) {}

  async run(_input: string, options: NodeRunOptions): Promise<NodeResult> {
    options.log.debug({ nodeId: this.id }, "terminal node reached");
    return {
      nodeId: this.id,
      status: "completed",
      results: [],
      executionTimeMs: 0,
      usage: ZERO_USAGE,
    };
  }
}

class RunnerNode<THandle> implements AgentNode {
  readonly id: string;
  readonly kind: "text" | "structured";
  readonly capabilities: readonly Capability<THandle>[];
  readonly systemPrompt: string;
  private readonly runner: AgentRunner<THandle>;

  constructor(spec: AgentNodeSpec<THandle>) {
    this.id = spec.id;
    this.kind = spec.output ?? "text";
    this.capabilities = spec.capabilities;
    this.systemPrompt = spec.systemPrompt;
    this.runner = spec.runner;
  }

  async run(input: string, options: NodeRunOptions): Promise<NodeResult> {
    const now = options.now ?? Date.now;
    const startedAt = now();

    try {
      throwIfAborted(options.signal);
      const raw = await raceAbort(
        this.runner.invoke({
          nodeId: this.id,
          prompt: input,
          systemPrompt: this.systemPrompt,
          capabilities: this.capabilities,
          signal: options.signal,
          log: options.log,
        }),
        options.signal
      );
      const result = this.kind === "structured" ? liftStructured(raw) : raw;

      return {
        nodeId: this.id,
        status: "completed",
        results: [result],
        executionTimeMs: now() - startedAt,
        usage: result.usage,
      };
    } catch (error) {
      throw new NodeExecutionError(this.id, error);
    }
  }
}

/**
 * Build an executable node from a capability subset and a system prompt.
 * A node with no capabilities and an empty prompt is a terminal no-op.
 */
export function createAgentNode<THandle>(spec: AgentNodeSpec<THandle>): AgentNode {
  if (isDegenerate(spec)) {
    return new TerminalNode(spec.id);
  }
  return new RunnerNode(spec);
}

export function createTerminalNode(id: string): AgentNode {
  return new TerminalNode(id);
}
