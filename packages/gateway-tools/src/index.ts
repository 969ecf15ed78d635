// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@digest/gateway-tools`
 * Purpose: Tool gateway access: catalog fetch, keyword routing, authenticated MCP sessions, LangChain tool bridge.
 * Scope: Public barrel.
 * Side-effects: none
 * @public
 */

export {
  type AccessTokenProvider,
  type ClientCredentialsOptions,
  clientCredentialsTokenProvider,
  memoizeTokenProvider,
  staticTokenProvider,
} from "./auth/token-provider";
export {
  type CapabilityLister,
  type CapabilityPage,
  DEFAULT_MAX_PAGES,
  type FetchCatalogOptions,
  fetchCatalog,
} from "./catalog/fetch-catalog";
export { toLangChainTool, toLangChainTools } from "./langchain/mcp-tools";
export {
  mcpToolLister,
  type ToolListingClient,
  toCapability,
} from "./mcp/lister";
export {
  type GatewaySession,
  type GatewaySessionOptions,
  type ToolCallOutcome,
  withGatewaySession,
} from "./mcp/session";
export {
  type CatalogPartition,
  matchCapabilities,
  partitionCatalog,
  type RoutedCapabilities,
  routeCapabilities,
} from "./routing/router";
