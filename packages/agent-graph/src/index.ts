// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@digest/agent-graph`
 * Purpose: Graph-based agent execution engine: nodes, graph runs, aggregation and reply decoding.
 * Scope: Public barrel. No IO of its own; the agent runtime is reached through the AgentRunner port.
 * Side-effects: none
 * @public
 */

export {
  type AgentReport,
  type AggregateOptions,
  aggregateGraphRun,
  NO_CONTENT_SENTINEL,
  type Report,
  type ReportMessage,
} from "./aggregate/aggregator";
export {
  collectText,
  type FlattenedContent,
  flattenContent,
  MAX_CONTENT_DEPTH,
} from "./aggregate/flatten";
export {
  type AgentPayload,
  AgentPayloadSchema,
  type ErrorPayload,
  ErrorPayloadSchema,
  type ResultPayload,
  ResultPayloadSchema,
  SESSION_ID_HEADER,
  toErrorPayload,
  toResultPayload,
  USER_ID_HEADER,
} from "./aggregate/payload";
export {
  createRunContext,
  type Logger,
  type RunContext,
} from "./context/run-context";
export {
  type DecodedResult,
  type DecodeOptions,
  decodeResponse,
} from "./decode/decoder";
export {
  AgentGraphError,
  CatalogError,
  categorizeError,
  ConfigurationError,
  DecodeError,
  EmptyCatalogError,
  ERROR_CATEGORIES,
  type ErrorCategory,
  EXECUTION_ERROR_CODES,
  type ExecutionErrorCode,
  GatewayConnectionError,
  GraphValidationError,
  type GraphValidationCode,
  isAbortError,
  isAgentGraphError,
  isExecutionErrorCode,
  NodeExecutionError,
  normalizeErrorCode,
  PaginationOverflowError,
} from "./errors";
export { GraphBuilder, type GraphBuilderOptions } from "./graph/builder";
export { Graph, type GraphDefinition, type GraphRunOptions } from "./graph/graph";
export {
  fromUpstreamText,
  type UpstreamTextOptions,
} from "./graph/input-policy";
export type {
  ConditionalEdge,
  EdgeCondition,
  EdgeInput,
  EdgeInputContext,
  EdgeOptions,
  GraphEdge,
  GraphRun,
  GraphRunState,
  TerminalEdge,
  UnconditionalEdge,
} from "./graph/types";
export {
  type AgentNode,
  type AgentNodeKind,
  type AgentNodeSpec,
  createAgentNode,
  createTerminalNode,
  type NodeRunOptions,
  parseJsonBody,
} from "./node/agent-node";
export type {
  AgentInvocationRequest,
  AgentRunner,
} from "./node/agent-runner.port";
export { AsyncQueue } from "./runtime/async-queue";
export type { Capability, Catalog } from "./types/capability";
export {
  type AgentInvocationResult,
  addUsage,
  type ContentBlock,
  type JsonBlock,
  jsonBlock,
  type TextBlock,
  textBlock,
  type TokenUsage,
  type ToolResultBlock,
  toolResultBlock,
  ZERO_USAGE,
} from "./types/content";
export type {
  ExecutionFailure,
  NodeResult,
  NodeStatus,
  RunStatus,
} from "./types/results";
export {
  createAbortError,
  raceAbort,
  throwIfAborted,
} from "./util/abort";
