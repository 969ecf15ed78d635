// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@digest/agent-runtime/invocation/payload`
 * Purpose: Inbound invocation payload: prompt and session id resolution.
 * Scope: Pure parsing. Does NOT execute anything.
 * Invariants:
 *   - `input` wins over top-level `prompt`
 *   - A string `input` is JSON-decoded for `prompt`; otherwise the whole string is the prompt
 *   - A missing or blank prompt is a ConfigurationError raised before any execution
 * Side-effects: none
 * Links: handler.ts, server.ts
 * @public
 */

import { ConfigurationError } from "@digest/agent-graph";
import { z } from "zod";

const PromptFieldSchema = z.object({ prompt: z.string() }).passthrough();

const InvocationPayloadSchema = z
  .object({
    prompt: z.string().optional(),
    input: z
      .union([
        z
          .object({
            prompt: z.string().optional(),
            session_id: z.string().optional(),
          })
          .passthrough(),
        z.string(),
      ])
      .optional(),
  })
  .passthrough();

export type InvocationPayload = z.infer<typeof InvocationPayloadSchema>;

function promptFromString(input: string): string {
  let decoded: unknown;
  try {
    decoded = JSON.parse(input);
  } catch {
    return input;
  }
  const parsed = PromptFieldSchema.safeParse(decoded);
  return parsed.success ? parsed.data.prompt : input;
}

/**
 * Parse an arbitrary JSON body as an invocation payload.
 * @throws ConfigurationError when the body is not an object of the expected shape
 */
export function parseInvocationPayload(body: unknown): InvocationPayload {
  const parsed = InvocationPayloadSchema.safeParse(body);
  if (!parsed.success) {
    throw new ConfigurationError(
      "Invalid payload: expected an object with 'prompt' or 'input'",
      parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
    );
  }
  return parsed.data;
}

/**
 * @throws ConfigurationError when no non-blank prompt can be resolved
 */
export function resolvePrompt(payload: InvocationPayload): string {
  const { input } = payload;
  let prompt: string | undefined;
  if (typeof input === "string") {
    prompt = promptFromString(input);
  } else if (input !== undefined && input.prompt !== undefined) {
    prompt = input.prompt;
  } else {
    prompt = payload.prompt;
  }

  if (prompt === undefined || prompt.trim().length === 0) {
    throw new ConfigurationError(
      "Invalid payload: a non-empty 'prompt' is required"
    );
  }
  return prompt;
}

export function sessionIdFromPayload(
  payload: InvocationPayload
): string | undefined {
  const { input } = payload;
  if (typeof input === "object" && input.session_id !== undefined) {
    return input.session_id.length > 0 ? input.session_id : undefined;
  }
  return undefined;
}
