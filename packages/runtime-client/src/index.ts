// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@digest/runtime-client`
 * Purpose: Caller side of the agent runtime: invoke, interpret, render.
 * Scope: Public barrel (the CLI is not exported).
 * Side-effects: none
 * @public
 */

export { type ClientConfig, loadClientConfig } from "./config";
export { agentDisplayName, formatReply, formatReport } from "./format-report";
export {
  invokeAgentRuntime,
  type RuntimeInvocation,
} from "./invoke";
export { interpretReply, type RuntimeReply } from "./reply";
