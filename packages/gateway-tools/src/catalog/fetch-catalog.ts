// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@digest/gateway-tools/catalog/fetch-catalog`
 * Purpose: Drains a paginated tool listing into one frozen Catalog.
 * Scope: Cursor loop only. Transport lives behind CapabilityLister (see mcp/lister.ts).
 * Invariants:
 *   - N pages → exactly N listing calls; capabilities appended in page order
 *   - Absent, null or "" cursor ends the fetch
 *   - Bounded pagination: more than maxPages pages → PaginationOverflowError
 *   - Zero capabilities in total → EmptyCatalogError
 * Side-effects: IO via the lister
 * Links: mcp/lister.ts, routing/router.ts
 * @public
 */

import {
  type Capability,
  type Catalog,
  CatalogError,
  EmptyCatalogError,
  isAgentGraphError,
  type Logger,
  PaginationOverflowError,
} from "@digest/agent-graph";

export const DEFAULT_MAX_PAGES = 10_000;

export interface CapabilityPage<THandle> {
  readonly capabilities: readonly Capability<THandle>[];
  /** Opaque continuation token; absent, null or "" means last page */
  readonly nextCursor?: string | null | undefined;
}

export interface CapabilityLister<THandle> {
  listPage(cursor: string | undefined): Promise<CapabilityPage<THandle>>;
}

export interface FetchCatalogOptions {
  readonly log: Logger;
  readonly maxPages?: number;
}

export async function fetchCatalog<THandle>(
  lister: CapabilityLister<THandle>,
  options: FetchCatalogOptions
): Promise<Catalog<THandle>> {
  const maxPages = options.maxPages ?? DEFAULT_MAX_PAGES;
  const log = options.log;
  const capabilities: Capability<THandle>[] = [];

  let cursor: string | undefined;
  let pages = 0;

  do {
    if (pages >= maxPages) {
      throw new PaginationOverflowError(maxPages);
    }

    let page: CapabilityPage<THandle>;
    try {
      page = await lister.listPage(cursor);
    } catch (error) {
      if (isAgentGraphError(error)) throw error;
      const detail = error instanceof Error ? error.message : String(error);
      throw new CatalogError(`Tool listing failed: ${detail}`, { cause: error });
    }

    pages++;
    capabilities.push(...page.capabilities);
    log.debug(
      { page: pages, count: page.capabilities.length, hasMore: Boolean(page.nextCursor) },
      "tool page listed"
    );
    cursor = page.nextCursor ? page.nextCursor : undefined;
  } while (cursor !== undefined);

  if (capabilities.length === 0) {
    throw new EmptyCatalogError();
  }

  log.info(
    { pages, toolCount: capabilities.length, tools: capabilities.map((c) => c.name) },
    "tool catalog fetched"
  );

  return Object.freeze(capabilities);
}
