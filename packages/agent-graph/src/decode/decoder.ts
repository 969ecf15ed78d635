// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@digest/agent-graph/decode/decoder`
 * Purpose: Classifies a raw runtime reply that may be one JSON document or an SSE/NDJSON stream.
 * Scope: Pure. First match wins: empty → whole JSON → first parseable line → text.
 * Invariants:
 *   - NEVER_THROWS: invalid UTF-8 is decoded lossily; DecodeError is only reported via onDecodeError
 *   - The first classifiable line wins; later lines are ignored
 *   - JSON numbers/booleans/null are not classifiable and fall through
 * Side-effects: none
 * Links: aggregate/payload.ts
 * @public
 */

import { DecodeError } from "../errors";

export type DecodedResult =
  | { readonly type: "error"; readonly message: string }
  | { readonly type: "empty" }
  | { readonly type: "structured"; readonly data: object }
  | { readonly type: "text"; readonly message: string };

export interface DecodeOptions {
  /** Called when the bytes are not valid UTF-8; decoding continues lossily */
  readonly onDecodeError?: (error: DecodeError) => void;
}

const SSE_DATA_PREFIX = "data: ";

function decodeUtf8(raw: Uint8Array, options: DecodeOptions): string {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(raw);
  } catch (cause) {
    options.onDecodeError?.(
      new DecodeError("Response is not valid UTF-8", { cause })
    );
    return new TextDecoder("utf-8").decode(raw);
  }
}

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Classify one parsed JSON value, or undefined when it is not classifiable.
 */
function classify(value: unknown): DecodedResult | undefined {
  if (isRecord(value) && "error" in value) {
    const error = value.error;
    return {
      type: "error",
      message: typeof error === "string" ? error : JSON.stringify(error),
    };
  }
  if (typeof value === "object" && value !== null) {
    return { type: "structured", data: value };
  }
  if (typeof value === "string") {
    return { type: "text", message: value };
  }
  return undefined;
}

export function decodeResponse(
  raw: Uint8Array | string,
  options: DecodeOptions = {}
): DecodedResult {
  const text = typeof raw === "string" ? raw : decodeUtf8(raw, options);
  if (text.length === 0) {
    return { type: "empty" };
  }

  const whole = tryParse(text);
  if (whole.ok) {
    const classified = classify(whole.value);
    if (classified) return classified;
  }

  for (const line of text.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (trimmed.length === 0) continue;
    const body = trimmed.startsWith(SSE_DATA_PREFIX)
      ? trimmed.slice(SSE_DATA_PREFIX.length)
      : trimmed;
    const parsed = tryParse(body);
    if (!parsed.ok) continue;

    const classified = classify(parsed.value);
    if (classified) return classified;
  }

  return { type: "text", message: text };
}
