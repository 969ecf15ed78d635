// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@digest/gateway-tools/routing/router`
 * Purpose: Keyword routing of catalog capabilities to graph nodes.
 * Scope: Pure selection plus a fallback warning. Does NOT fetch.
 * Invariants:
 *   - Case-insensitive substring match on displayName; catalog order preserved
 *   - routeCapabilities never returns an empty subset for a non-empty catalog
 *   - partitionCatalog assigns each capability to at most one keyword
 * Side-effects: logging only
 * Links: catalog/fetch-catalog.ts
 * @public
 */

import type { Capability, Catalog, RunContext } from "@digest/agent-graph";

export function matchCapabilities<THandle>(
  catalog: Catalog<THandle>,
  keyword: string
): Capability<THandle>[] {
  const needle = keyword.toLowerCase();
  return catalog.filter((c) => c.displayName.toLowerCase().includes(needle));
}

export interface RoutedCapabilities<THandle> {
  readonly capabilities: readonly Capability<THandle>[];
  /** True when nothing matched and the whole catalog was handed out */
  readonly usedFallback: boolean;
}

/**
 * Route by keyword; falls back to the entire catalog when nothing matches.
 */
export function routeCapabilities<THandle>(
  catalog: Catalog<THandle>,
  keyword: string,
  ctx: Pick<RunContext, "log">
): RoutedCapabilities<THandle> {
  const matched = matchCapabilities(catalog, keyword);
  if (matched.length > 0) {
    ctx.log.debug(
      { keyword, tools: matched.map((c) => c.name) },
      "capabilities routed"
    );
    return { capabilities: matched, usedFallback: false };
  }

  ctx.log.warn(
    { keyword, catalogSize: catalog.length },
    "no capability matched keyword; falling back to full catalog"
  );
  return { capabilities: catalog, usedFallback: true };
}

export interface CatalogPartition<THandle> {
  readonly byKeyword: ReadonlyMap<string, readonly Capability<THandle>[]>;
  readonly unmatched: readonly Capability<THandle>[];
}

/**
 * Assign each capability to the first keyword that matches it.
 */
export function partitionCatalog<THandle>(
  catalog: Catalog<THandle>,
  keywords: readonly string[]
): CatalogPartition<THandle> {
  const byKeyword = new Map<string, Capability<THandle>[]>(
    keywords.map((k) => [k, []])
  );
  const unmatched: Capability<THandle>[] = [];

  for (const capability of catalog) {
    const name = capability.displayName.toLowerCase();
    const keyword = keywords.find((k) => name.includes(k.toLowerCase()));
    const bucket = keyword === undefined ? undefined : byKeyword.get(keyword);
    if (bucket) {
      bucket.push(capability);
    } else {
      unmatched.push(capability);
    }
  }

  return { byKeyword, unmatched };
}
