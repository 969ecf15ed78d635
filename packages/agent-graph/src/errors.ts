// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@digest/agent-graph/errors`
 * Purpose: Error taxonomy, error codes and normalization for graph runs and the surrounding runtime.
 * Scope: Defines error classes, type guards and categorization. Does NOT log or recover.
 * Invariants:
 *   - Every class carries a stable `code` and a user-facing `category`
 *   - normalizeErrorCode() is the single normalizer for unknown thrown values
 *   - AbortError (by name) always maps to "aborted"
 * Side-effects: none
 * Links: graph/graph.ts, node/agent-node.ts
 * @public
 */

/**
 * Category surfaced to callers in structured error objects.
 * - configuration: missing/invalid settings or request payload (fatal, no retry)
 * - connectivity: gateway or identity provider unreachable
 * - capability: tool catalog empty, malformed or unlistable
 * - generic: anything else
 */
export const ERROR_CATEGORIES = [
  "configuration",
  "connectivity",
  "capability",
  "generic",
] as const;

export type ErrorCategory = (typeof ERROR_CATEGORIES)[number];

/**
 * Execution error codes recorded on failed nodes and runs.
 * - invalid_request: input missing or malformed
 * - timeout: exceeded a time limit
 * - aborted: cancelled through an AbortSignal
 * - rate_limit: provider rate limit exceeded
 * - internal: unexpected failure
 */
export const EXECUTION_ERROR_CODES = [
  "invalid_request",
  "timeout",
  "aborted",
  "rate_limit",
  "internal",
] as const;

export type ExecutionErrorCode = (typeof EXECUTION_ERROR_CODES)[number];

export function isExecutionErrorCode(x: unknown): x is ExecutionErrorCode {
  return (
    typeof x === "string" &&
    (EXECUTION_ERROR_CODES as readonly string[]).includes(x)
  );
}

/**
 * Base class for every error this repository throws on purpose.
 */
export abstract class AgentGraphError extends Error {
  abstract readonly code: string;
  abstract readonly category: ErrorCategory;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Missing or invalid required settings, or an unusable request payload.
 */
export class ConfigurationError extends AgentGraphError {
  readonly code = "configuration_invalid";
  readonly category = "configuration";
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super(message);
    this.issues = issues;
  }
}

/**
 * Tool catalog could not be assembled.
 */
export class CatalogError extends AgentGraphError {
  readonly code: string = "catalog_unavailable";
  readonly category = "capability";
}

/**
 * The gateway listed no capabilities at all.
 */
export class EmptyCatalogError extends CatalogError {
  override readonly code = "catalog_empty";

  constructor() {
    super("The tool gateway returned no tools");
  }
}

/**
 * The gateway kept returning cursors past the page cap.
 */
export class PaginationOverflowError extends CatalogError {
  override readonly code = "catalog_pagination_overflow";
  readonly maxPages: number;

  constructor(maxPages: number) {
    super(`Tool listing did not terminate within ${maxPages} pages`);
    this.maxPages = maxPages;
  }
}

/**
 * The gateway (or the identity provider in front of it) could not be reached.
 */
export class GatewayConnectionError extends AgentGraphError {
  readonly code = "gateway_unreachable";
  readonly category = "connectivity";
}

/**
 * One node's agent invocation failed.
 * Caught at the node boundary by the graph and recorded on the NodeResult.
 */
export class NodeExecutionError extends AgentGraphError {
  readonly code: ExecutionErrorCode;
  readonly category = "generic";
  readonly nodeId: string;

  constructor(nodeId: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Node "${nodeId}" failed: ${detail}`, { cause });
    this.nodeId = nodeId;
    this.code = normalizeErrorCode(cause);
  }
}

export type GraphValidationCode =
  | "missing_entry"
  | "unknown_entry"
  | "unknown_edge_node"
  | "duplicate_node"
  | "unreachable_node";

/**
 * Malformed graph construction. A programming error raised by build().
 */
export class GraphValidationError extends AgentGraphError {
  readonly code: GraphValidationCode;
  readonly category = "generic";

  constructor(code: GraphValidationCode, message: string) {
    super(message);
    this.code = code;
  }
}

/**
 * Response bytes were not valid UTF-8. Never escapes decodeResponse().
 */
export class DecodeError extends AgentGraphError {
  readonly code = "decode_failed";
  readonly category = "generic";
}

export function isAgentGraphError(error: unknown): error is AgentGraphError {
  return error instanceof AgentGraphError;
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

/**
 * Normalize any thrown value to an ExecutionErrorCode.
 *
 * Priority:
 * 1. AbortError → "aborted"
 * 2. `.code` already an ExecutionErrorCode → that code
 * 3. HTTP-ish `.status` (429 → rate_limit, 408 → timeout)
 * 4. TimeoutError by name → "timeout"
 * 5. Default → "internal"
 */
export function normalizeErrorCode(error: unknown): ExecutionErrorCode {
  if (isAbortError(error)) {
    return "aborted";
  }
  if (!(error instanceof Error)) {
    return "internal";
  }

  const code = "code" in error ? error.code : undefined;
  if (isExecutionErrorCode(code)) {
    return code;
  }
  const status = "status" in error ? error.status : undefined;
  if (status === 429) return "rate_limit";
  if (status === 408) return "timeout";
  if (error.name === "TimeoutError") return "timeout";

  return "internal";
}

/**
 * Map any thrown value to the category reported to the caller.
 * Errors outside the taxonomy are "generic".
 */
export function categorizeError(error: unknown): ErrorCategory {
  if (isAgentGraphError(error)) {
    return error.category;
  }
  return "generic";
}
