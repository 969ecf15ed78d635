// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@digest/runtime-client/config`
 * Purpose: Environment for the chat client.
 * Scope: Zod validation of process-style env. Does NOT read process.env itself.
 * Side-effects: none
 * @public
 */

import { ConfigurationError } from "@digest/agent-graph";
import { z } from "zod";

const ClientEnvSchema = z.object({
  RUNTIME_URL: z.string().url().default("http://localhost:8080"),
  RUNTIME_USER_ID: z.string().min(1).default("m2m-user-001"),
  RUNTIME_SESSION_ID: z.string().min(1).optional(),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("warn"),
});

export type ClientConfig = z.infer<typeof ClientEnvSchema>;

export function loadClientConfig(
  env: Readonly<Record<string, string | undefined>>
): ClientConfig {
  const parsed = ClientEnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (i) => `${i.path.join(".")}: ${i.message}`
    );
    throw new ConfigurationError(
      `Invalid client configuration:\n${issues.join("\n")}`,
      issues
    );
  }
  return parsed.data;
}
