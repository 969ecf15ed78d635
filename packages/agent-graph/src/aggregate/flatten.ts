// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@digest/agent-graph/aggregate/flatten`
 * Purpose: Flattens a content-block tree into a text bucket and a JSON bucket.
 * Scope: Pure, iterative traversal. Does NOT build reports (see aggregator.ts).
 * Invariants:
 *   - DEPTH_CAPPED: blocks nested deeper than maxDepth are dropped and counted, never traversed
 *   - ORDER_PRESERVED: both buckets keep depth-first arrival order
 * Side-effects: none
 * @internal
 */

import type { ContentBlock } from "../types/content";

/** Top-level blocks are depth 1; each tool_result adds one level. */
export const MAX_CONTENT_DEPTH = 3;

export interface FlattenedContent {
  readonly texts: readonly string[];
  readonly json: readonly unknown[];
  /** Blocks dropped for exceeding the depth cap */
  readonly dropped: number;
}

export function flattenContent(
  blocks: readonly ContentBlock[],
  maxDepth: number = MAX_CONTENT_DEPTH
): FlattenedContent {
  const texts: string[] = [];
  const json: unknown[] = [];
  let dropped = 0;

  // Explicit stack; children pushed in reverse so they pop in order
  const stack: { block: ContentBlock; depth: number }[] = [];
  for (let i = blocks.length - 1; i >= 0; i--) {
    const block = blocks[i];
    if (block) stack.push({ block, depth: 1 });
  }

  while (stack.length > 0) {
    const entry = stack.pop();
    if (!entry) break;
    const { block, depth } = entry;

    if (depth > maxDepth) {
      dropped++;
      continue;
    }

    switch (block.type) {
      case "text":
        texts.push(block.text);
        break;
      case "json":
        json.push(block.json);
        break;
      case "tool_result":
        for (let i = block.content.length - 1; i >= 0; i--) {
          const child = block.content[i];
          if (child) stack.push({ block: child, depth: depth + 1 });
        }
        break;
    }
  }

  return { texts, json, dropped };
}

/**
 * Newline-joined, trimmed text of a block tree ("" when there is none).
 */
export function collectText(blocks: readonly ContentBlock[]): string {
  return flattenContent(blocks).texts.join("\n").trim();
}
