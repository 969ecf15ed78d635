// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@digest/agent-graph/types/capability`
 * Purpose: Capability (one invocable tool) and Catalog types.
 * Scope: Types only. Fetching lives in @digest/gateway-tools.
 * Invariants: A Catalog is frozen once assembled for a session.
 * Side-effects: none
 * @public
 */

/**
 * A single externally invocable operation exposed by the tool gateway.
 *
 * @typeParam THandle - Opaque invocation handle (for MCP: the tool definition)
 */
export interface Capability<THandle = unknown> {
  /** Tool name as the gateway exposes it (stable identifier) */
  readonly name: string;
  /** Title when the gateway provides one, else the name */
  readonly displayName: string;
  readonly description?: string;
  readonly handle: THandle;
}

export type Catalog<THandle = unknown> = readonly Capability<THandle>[];
