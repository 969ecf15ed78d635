// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@digest/agent-graph/types/content`
 * Purpose: Content blocks, agent invocation results and token usage.
 * Scope: Types plus small pure constructors. Does NOT flatten or render content (see aggregate/).
 * Invariants:
 *   - ContentBlock is a closed tagged union: text | json | tool_result
 *   - tool_result nesting is bounded by the agent runtime (aggregate/ caps traversal depth)
 * Side-effects: none
 * @public
 */

export interface TextBlock {
  readonly type: "text";
  readonly text: string;
}

export interface JsonBlock {
  readonly type: "json";
  readonly json: unknown;
}

export interface ToolResultBlock {
  readonly type: "tool_result";
  /** Name of the tool that produced this result, when the runtime reports it */
  readonly toolName?: string;
  readonly content: readonly ContentBlock[];
}

export type ContentBlock = TextBlock | JsonBlock | ToolResultBlock;

export interface TokenUsage {
  readonly inputTokens: number;
  readonly outputTokens: number;
  readonly totalTokens: number;
}

export const ZERO_USAGE: TokenUsage = Object.freeze({
  inputTokens: 0,
  outputTokens: 0,
  totalTokens: 0,
});

/**
 * One assistant message produced by one call into the agent runtime.
 */
export interface AgentInvocationResult {
  readonly message: {
    readonly role: "assistant";
    readonly content: readonly ContentBlock[];
  };
  readonly usage: TokenUsage;
  readonly stopReason?: string;
}

export function textBlock(text: string): TextBlock {
  return { type: "text", text };
}

export function jsonBlock(json: unknown): JsonBlock {
  return { type: "json", json };
}

export function toolResultBlock(
  content: readonly ContentBlock[],
  toolName?: string
): ToolResultBlock {
  return toolName === undefined
    ? { type: "tool_result", content }
    : { type: "tool_result", toolName, content };
}

export function addUsage(a: TokenUsage, b: TokenUsage): TokenUsage {
  return {
    inputTokens: a.inputTokens + b.inputTokens,
    outputTokens: a.outputTokens + b.outputTokens,
    totalTokens: a.totalTokens + b.totalTokens,
  };
}
