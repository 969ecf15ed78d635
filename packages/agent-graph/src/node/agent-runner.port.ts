// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@digest/agent-graph/node/agent-runner.port`
 * Purpose: Port to the external agent runtime (model invocation + tool-calling loop).
 * Scope: Interface only. Adapters live in services (LangGraph) and tests (fakes).
 * Invariants:
 *   - One invoke() is one logical agent call
 *   - Implementations honour `signal` and reject with an AbortError when it fires
 * Side-effects: none (types only)
 * Links: node/agent-node.ts
 * @public
 */

import type { Logger } from "pino";

import type { Capability } from "../types/capability";
import type { AgentInvocationResult } from "../types/content";

export interface AgentInvocationRequest<THandle = unknown> {
  readonly nodeId: string;
  /** User-turn input for this call */
  readonly prompt: string;
  readonly systemPrompt: string;
  readonly capabilities: readonly Capability<THandle>[];
  readonly signal: AbortSignal;
  readonly log: Logger;
}

export interface AgentRunner<THandle = unknown> {
  invoke(
    request: AgentInvocationRequest<THandle>
  ): Promise<AgentInvocationResult>;
}
