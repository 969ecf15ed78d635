// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@digest/agent-runtime`
 * Purpose: Public surface of the agent runtime service (for embedding and tests).
 * Scope: Barrel. main.ts is the process entry and is not exported.
 * Side-effects: none
 * @public
 */

export {
  createChatModel,
  createLangGraphReactAgent,
  LangGraphAgentRunner,
  type LangGraphAgentRunnerOptions,
  messageText,
  type ReactAgent,
  type ReactAgentFactory,
  toInvocationResult,
} from "./adapters/langgraph-agent-runner";
export {
  type GatewayIdentity,
  loadRuntimeConfig,
  type RuntimeConfig,
} from "./bootstrap/config";
export {
  type HandlerDeps,
  handleInvocation,
  type InvocationEvent,
  type InvocationReply,
  type InvocationRequest,
  streamInvocation,
} from "./handler";
export {
  type InvocationPayload,
  parseInvocationPayload,
  resolvePrompt,
  sessionIdFromPayload,
} from "./invocation/payload";
export { makeLogger, makeNoopLogger } from "./observability/logger";
export {
  buildDigestPipeline,
  type DigestPipeline,
  type DigestPipelineOptions,
} from "./pipeline/graph";
export {
  BLOCK_AGENT_ID,
  SLACK_AGENT_ID,
  SUMMARY_AGENT_ID,
  SUMMARY_FOLLOW_UP_PROMPT,
} from "./pipeline/prompts";
export {
  createRuntimeServer,
  dispatch,
  type RuntimeRequest,
  type RuntimeResponse,
  toSseChunk,
} from "./server";
