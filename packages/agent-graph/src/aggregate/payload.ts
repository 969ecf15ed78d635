// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@digest/agent-graph/aggregate/payload`
 * Purpose: Wire contract for the runtime's outbound result payload and error object.
 * Scope: Zod schemas, inferred types and the Report → payload mapping. Shared by runtime and client.
 * Invariants:
 *   - Wire keys are snake_case; Report stays camelCase
 *   - Every failure path on the wire is exactly one ErrorPayload
 * Side-effects: none
 * Links: aggregator.ts, decode/decoder.ts
 * @public
 */

import { z } from "zod";

import { categorizeError, ERROR_CATEGORIES } from "../errors";
import type { Report } from "./aggregator";

/** Request header carrying the runtime session id */
export const SESSION_ID_HEADER = "x-runtime-session-id";
/** Request header overriding the runtime's configured user id */
export const USER_ID_HEADER = "x-runtime-user-id";

export const NodeStatusSchema = z.enum([
  "pending",
  "running",
  "completed",
  "failed",
  "skipped",
]);

export const ReportMessageSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("text"), content: z.string() }),
  z.object({ type: z.literal("json"), content: z.unknown() }),
]);

export const AgentPayloadSchema = z.object({
  name: z.string(),
  messages: z.array(ReportMessageSchema),
  execution_time_ms: z.number(),
  status: NodeStatusSchema,
  tokens_used: z.number(),
  error: z.object({ code: z.string(), message: z.string() }).optional(),
});

export const ResultPayloadSchema = z.object({
  status: z.enum(["completed", "failed"]),
  agents: z.array(AgentPayloadSchema),
  total_execution_time_ms: z.number(),
  total_tokens: z.number(),
  mcp_tools_used: z.boolean(),
  full_text: z.string(),
  metadata: z.object({
    session_id: z.string(),
    total_nodes: z.number(),
    completed_nodes: z.number(),
    failed_nodes: z.number(),
    skipped_nodes: z.number().optional(),
  }),
});

export const ErrorPayloadSchema = z.object({
  error: z.string(),
  category: z.enum(ERROR_CATEGORIES),
});

export type ResultPayload = z.infer<typeof ResultPayloadSchema>;
export type AgentPayload = z.infer<typeof AgentPayloadSchema>;
export type ErrorPayload = z.infer<typeof ErrorPayloadSchema>;

export function toResultPayload(
  report: Report,
  metadata: { sessionId: string }
): ResultPayload {
  return {
    status: report.status,
    agents: report.agents.map((agent) => ({
      name: agent.name,
      messages: agent.messages.map((m) => ({ ...m })),
      execution_time_ms: agent.executionTimeMs,
      status: agent.status,
      tokens_used: agent.tokensUsed,
      ...(agent.error !== undefined && {
        error: { code: agent.error.code, message: agent.error.message },
      }),
    })),
    total_execution_time_ms: report.totalExecutionTimeMs,
    total_tokens: report.totalTokens,
    mcp_tools_used: report.capabilityUsed,
    full_text: report.fullText,
    metadata: {
      session_id: metadata.sessionId,
      total_nodes: report.totalNodes,
      completed_nodes: report.completedNodes,
      failed_nodes: report.failedNodes,
      skipped_nodes: report.skippedNodes,
    },
  };
}

/**
 * Structured error object for any thrown value.
 */
export function toErrorPayload(error: unknown): ErrorPayload {
  return {
    error: error instanceof Error ? error.message : String(error),
    category: categorizeError(error),
  };
}
