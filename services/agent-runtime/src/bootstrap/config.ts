// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@digest/agent-runtime/bootstrap/config`
 * Purpose: Environment configuration for the agent runtime with Zod validation.
 * Scope: Validates a process-style env record. Does NOT read process.env itself; main.ts and the handler pass it in.
 * Invariants:
 *   - Every problem is reported at once as one ConfigurationError
 *   - Gateway identity is either a static access token or a full client-credentials triple
 * Side-effects: none
 * Links: handler.ts, main.ts
 * @public
 */

import { ConfigurationError } from "@digest/agent-graph";
import { z } from "zod";

const optionalString = z
  .string()
  .min(1)
  .optional()
  .or(z.literal("").transform(() => undefined));

const EnvSchema = z
  .object({
    /** MCP endpoint of the tool gateway */
    GATEWAY_URL: z
      .string({ required_error: "GATEWAY_URL is required" })
      .url("GATEWAY_URL must be a URL"),
    /** OAuth2 scope requested for gateway tokens */
    GATEWAY_SCOPE: optionalString,
    /** Accepted alias of GATEWAY_SCOPE */
    COGNITO_SCOPE: optionalString,

    /** Static bearer token; skips the client-credentials exchange */
    GATEWAY_ACCESS_TOKEN: optionalString,
    TOKEN_URL: z.string().url().optional().or(z.literal("").transform(() => undefined)),
    CLIENT_ID: optionalString,
    CLIENT_SECRET: optionalString,

    /** Workload identity name reported in gateway session metadata */
    WORKLOAD_NAME: z.string().min(1).default("slack-gateway-agent"),
    USER_ID: z.string().min(1).default("m2m-user-001"),
    /** Model name as served at LLM_BASE_URL; the default is a Bedrock id routed by a LiteLLM-style proxy */
    MODEL_ID: z
      .string()
      .min(1)
      .default("us.anthropic.claude-sonnet-4-20250514-v1:0"),
    /** OpenAI-compatible endpoint the agent runner talks to */
    LLM_BASE_URL: z.string().url().optional().or(z.literal("").transform(() => undefined)),
    LLM_API_KEY: optionalString,

    SLACK_TOOL_KEYWORD: z.string().min(1).default("slack"),
    SUMMARY_TOOL_KEYWORD: z.string().min(1).default("tavily"),
    /** Channel the retrieval agent reads */
    SLACK_CHANNEL: z.string().min(1).default("link-digest"),

    PORT: z.coerce.number().int().min(1).max(65535).default(8080),
    LOG_LEVEL: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace"])
      .default("info"),
    SERVICE_NAME: z.string().default("agent-runtime"),
  })
  .superRefine((env, ctx) => {
    if (env.GATEWAY_SCOPE === undefined && env.COGNITO_SCOPE === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["GATEWAY_SCOPE"],
        message: "GATEWAY_SCOPE is required",
      });
    }
    if (env.GATEWAY_ACCESS_TOKEN !== undefined) return;
    for (const key of ["TOKEN_URL", "CLIENT_ID", "CLIENT_SECRET"] as const) {
      if (env[key] === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `${key} is required when GATEWAY_ACCESS_TOKEN is not set`,
        });
      }
    }
  });

export type GatewayIdentity =
  | { readonly kind: "static"; readonly accessToken: string }
  | {
      readonly kind: "client_credentials";
      readonly tokenUrl: string;
      readonly clientId: string;
      readonly clientSecret: string;
    };

export interface RuntimeConfig {
  readonly gatewayUrl: string;
  readonly scope: string;
  readonly identity: GatewayIdentity;
  readonly workloadName: string;
  readonly userId: string;
  readonly modelId: string;
  readonly llm: { readonly baseUrl?: string; readonly apiKey?: string };
  readonly slackToolKeyword: string;
  readonly summaryToolKeyword: string;
  readonly slackChannel: string;
  readonly port: number;
  readonly logLevel: string;
  readonly serviceName: string;
}

/**
 * Validate `env` and map it onto RuntimeConfig.
 * @throws ConfigurationError listing every invalid or missing setting
 */
export function loadRuntimeConfig(
  env: Readonly<Record<string, string | undefined>>
): RuntimeConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map(
      (i) => `${i.path.join(".")}: ${i.message}`
    );
    throw new ConfigurationError(
      `Invalid environment configuration:\n${issues.map((i) => `  ${i}`).join("\n")}`,
      issues
    );
  }
  const e = result.data;

  let identity: GatewayIdentity;
  if (e.GATEWAY_ACCESS_TOKEN !== undefined) {
    identity = { kind: "static", accessToken: e.GATEWAY_ACCESS_TOKEN };
  } else if (
    e.TOKEN_URL !== undefined &&
    e.CLIENT_ID !== undefined &&
    e.CLIENT_SECRET !== undefined
  ) {
    identity = {
      kind: "client_credentials",
      tokenUrl: e.TOKEN_URL,
      clientId: e.CLIENT_ID,
      clientSecret: e.CLIENT_SECRET,
    };
  } else {
    throw new ConfigurationError("Gateway identity is not configured");
  }

  return {
    gatewayUrl: e.GATEWAY_URL,
    scope: e.GATEWAY_SCOPE ?? e.COGNITO_SCOPE ?? "",
    identity,
    workloadName: e.WORKLOAD_NAME,
    userId: e.USER_ID,
    modelId: e.MODEL_ID,
    llm: {
      ...(e.LLM_BASE_URL !== undefined && { baseUrl: e.LLM_BASE_URL }),
      ...(e.LLM_API_KEY !== undefined && { apiKey: e.LLM_API_KEY }),
    },
    slackToolKeyword: e.SLACK_TOOL_KEYWORD,
    summaryToolKeyword: e.SUMMARY_TOOL_KEYWORD,
    slackChannel: e.SLACK_CHANNEL,
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    serviceName: e.SERVICE_NAME,
  };
}
