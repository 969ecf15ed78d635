// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@digest/runtime-client/reply`
 * Purpose: Interprets a decoded runtime reply as a result report, an error, or plain content.
 * Scope: Pure. Re-detects result payloads that arrive wrapped as text.
 * Side-effects: none
 * @public
 */

import {
  type DecodedResult,
  type ResultPayload,
  ResultPayloadSchema,
} from "@digest/agent-graph";

export type RuntimeReply =
  | { readonly kind: "report"; readonly payload: ResultPayload }
  | { readonly kind: "data"; readonly data: object }
  | { readonly kind: "text"; readonly message: string }
  | { readonly kind: "error"; readonly message: string }
  | { readonly kind: "empty" };

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function asReport(value: unknown): ResultPayload | undefined {
  const parsed = ResultPayloadSchema.safeParse(value);
  return parsed.success ? parsed.data : undefined;
}

export function interpretReply(decoded: DecodedResult): RuntimeReply {
  switch (decoded.type) {
    case "empty":
      return { kind: "empty" };
    case "error":
      return { kind: "error", message: decoded.message };
    case "structured": {
      const payload = asReport(decoded.data);
      return payload
        ? { kind: "report", payload }
        : { kind: "data", data: decoded.data };
    }
    case "text": {
      const trimmed = decoded.message.trim();
      if (trimmed.startsWith("{") && trimmed.endsWith("}")) {
        const payload = asReport(parseJson(trimmed));
        if (payload) return { kind: "report", payload };
      }
      return { kind: "text", message: decoded.message };
    }
  }
}
