// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@digest/agent-runtime/adapters/langgraph-agent-runner`
 * Purpose: AgentRunner backed by a LangGraph React agent over gateway tools.
 * Scope: Builds one React agent per invocation, runs it, and converts the new messages into content blocks.
 * Invariants:
 *   - Only messages produced by this invocation are converted (the input turn is skipped)
 *   - Tool messages become tool_result blocks in order; the last AI text becomes a trailing text block
 *   - Usage is summed over every AI message's usage_metadata
 *   - The node's AbortSignal is forwarded to the agent (and from there to tool calls)
 * Side-effects: IO (LLM endpoint, gateway tool calls)
 * Links: @digest/gateway-tools/langchain/mcp-tools, @digest/agent-graph AgentRunner port
 * @public
 */

import {
  type AgentInvocationRequest,
  type AgentInvocationResult,
  type AgentRunner,
  type ContentBlock,
  type TokenUsage,
  textBlock,
  toolResultBlock,
} from "@digest/agent-graph";
import { type GatewaySession, toLangChainTools } from "@digest/gateway-tools";
import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import {
  AIMessage,
  type BaseMessage,
  HumanMessage,
  ToolMessage,
} from "@langchain/core/messages";
import type { StructuredToolInterface } from "@langchain/core/tools";
import { createReactAgent } from "@langchain/langgraph/prebuilt";
import { ChatOpenAI } from "@langchain/openai";
import type { Tool } from "@modelcontextprotocol/sdk/types.js";

/**
 * Minimal structural interface for a compiled React agent.
 * LangGraph's generics stay behind this boundary.
 */
export interface ReactAgent {
  invoke(
    input: { messages: BaseMessage[] },
    config?: { signal?: AbortSignal }
  ): Promise<{ messages: BaseMessage[] }>;
}

export type ReactAgentFactory = (args: {
  readonly llm: BaseChatModel;
  readonly tools: StructuredToolInterface[];
  readonly systemPrompt: string;
}) => ReactAgent;

export const createLangGraphReactAgent: ReactAgentFactory = ({
  llm,
  tools,
  systemPrompt,
}) => {
  const agent = createReactAgent({
    llm,
    tools,
    ...(systemPrompt ? { messageModifier: systemPrompt } : {}),
  });
  // Cast to our minimal structural interface
  return agent as unknown as ReactAgent;
};

export function createChatModel(opts: {
  readonly modelId: string;
  readonly baseUrl?: string;
  readonly apiKey?: string;
}): ChatOpenAI {
  return new ChatOpenAI({
    model: opts.modelId,
    ...(opts.baseUrl !== undefined && {
      configuration: { baseURL: opts.baseUrl },
    }),
    ...(opts.apiKey !== undefined && { apiKey: opts.apiKey }),
  });
}

export interface LangGraphAgentRunnerOptions {
  readonly llm: BaseChatModel;
  readonly session: Pick<GatewaySession, "callTool">;
  /** Defaults to createLangGraphReactAgent */
  readonly createAgent?: ReactAgentFactory;
}

export class LangGraphAgentRunner implements AgentRunner<Tool> {
  private readonly createAgent: ReactAgentFactory;

  constructor(private readonly options: LangGraphAgentRunnerOptions) {
    this.createAgent = options.createAgent ?? createLangGraphReactAgent;
  }

  async invoke(
    request: AgentInvocationRequest<Tool>
  ): Promise<AgentInvocationResult> {
    const tools = toLangChainTools(request.capabilities, this.options.session);
    const agent = this.createAgent({
      llm: this.options.llm,
      tools,
      systemPrompt: request.systemPrompt,
    });

    const input = [new HumanMessage(request.prompt)];
    request.log.debug({ tools: tools.map((t) => t.name) }, "agent invoke");
    const output = await agent.invoke(
      { messages: input },
      { signal: request.signal }
    );

    return toInvocationResult(output.messages.slice(input.length));
  }
}

/** Plain text of a LangChain message content (string or content parts). */
export function messageText(content: unknown): string {
  if (typeof content === "string") return content;
  if (!Array.isArray(content)) return "";
  const parts: unknown[] = content;
  return parts
    .map((part) =>
      typeof part === "object" &&
      part !== null &&
      "type" in part &&
      part.type === "text" &&
      "text" in part &&
      typeof part.text === "string"
        ? part.text
        : ""
    )
    .join("");
}

export function toInvocationResult(
  messages: readonly BaseMessage[]
): AgentInvocationResult {
  const content: ContentBlock[] = [];
  let inputTokens = 0;
  let outputTokens = 0;
  let totalTokens = 0;
  let finalText = "";
  let stopReason: string | undefined;

  for (const message of messages) {
    if (message instanceof AIMessage) {
      const usage = message.usage_metadata;
      if (usage) {
        inputTokens += usage.input_tokens;
        outputTokens += usage.output_tokens;
        totalTokens += usage.total_tokens;
      }
      finalText = messageText(message.content);
      const finish: unknown = message.response_metadata.finish_reason;
      stopReason = typeof finish === "string" ? finish : undefined;
    } else if (message instanceof ToolMessage) {
      content.push(
        toolResultBlock([textBlock(messageText(message.content))], message.name)
      );
    }
  }

  if (finalText.trim().length > 0) {
    content.push(textBlock(finalText));
  }

  const usage: TokenUsage = { inputTokens, outputTokens, totalTokens };
  return {
    message: { role: "assistant", content },
    usage,
    ...(stopReason !== undefined && { stopReason }),
  };
}
