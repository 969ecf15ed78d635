// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@digest/agent-graph/graph/input-policy`
 * Purpose: Edge input policies that thread upstream output into the next node.
 * Scope: Pure functions usable as `EdgeOptions.input`.
 * Side-effects: none
 * Links: graph.ts, types.ts
 * @public
 */

import { collectText } from "../aggregate/flatten";
import type { EdgeInputContext } from "./types";

export interface UpstreamTextOptions {
  /** Prepended to the upstream text, separated by a blank line */
  readonly preamble?: string;
  /** Used when the source node produced no text */
  readonly fallback?: string;
}

/**
 * Pass the source node's text output to the edge target.
 */
export function fromUpstreamText(
  options: UpstreamTextOptions = {}
): (ctx: EdgeInputContext) => string {
  return ({ source, state }) => {
    const text = source.results
      .map((result) => collectText(result.message.content))
      .filter((t) => t.length > 0)
      .join("\n");

    if (text.length === 0) {
      return options.fallback ?? state.input;
    }
    return options.preamble ? `${options.preamble}\n\n${text}` : text;
  };
}
