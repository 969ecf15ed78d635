// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@digest/agent-runtime/tests/bootstrap/config.test`
 * Purpose: Environment validation and mapping onto RuntimeConfig.
 * Scope: Defaults, identity modes, scope alias, reported issues.
 * Side-effects: none
 * Links: src/bootstrap/config.ts
 * @internal
 */

import { ConfigurationError } from "@digest/agent-graph";
import { describe, expect, it } from "vitest";

import { loadRuntimeConfig } from "../../src/bootstrap/config";
import { BASE_ENV } from "../_fakes/fakes";

function configError(env: Record<string, string | undefined>): ConfigurationError {
  try {
    loadRuntimeConfig(env);
  } catch (error) {
    if (error instanceof ConfigurationError) return error;
    throw error;
  }
  throw new Error("expected loadRuntimeConfig to throw");
}

describe("loadRuntimeConfig", () => {
  it("applies defaults around the required settings", () => {
    expect(loadRuntimeConfig(BASE_ENV)).toEqual({
      gatewayUrl: "https://gateway.test/mcp",
      scope: "gateway/invoke",
      identity: { kind: "static", accessToken: "test-token" },
      workloadName: "slack-gateway-agent",
      userId: "m2m-user-001",
      modelId: "us.anthropic.claude-sonnet-4-20250514-v1:0",
      llm: {},
      slackToolKeyword: "slack",
      summaryToolKeyword: "tavily",
      slackChannel: "link-digest",
      port: 8080,
      logLevel: "info",
      serviceName: "agent-runtime",
    });
  });

  it("accepts COGNITO_SCOPE as the scope", () => {
    const config = loadRuntimeConfig({
      GATEWAY_URL: "https://gateway.test/mcp",
      COGNITO_SCOPE: "legacy/scope",
      GATEWAY_ACCESS_TOKEN: "test-token",
    });
    expect(config.scope).toBe("legacy/scope");
  });

  it("builds a client-credentials identity and treats empty strings as unset", () => {
    const config = loadRuntimeConfig({
      GATEWAY_URL: "https://gateway.test/mcp",
      GATEWAY_SCOPE: "gateway/invoke",
      GATEWAY_ACCESS_TOKEN: "",
      TOKEN_URL: "https://auth.test/oauth2/token",
      CLIENT_ID: "test-client",
      CLIENT_SECRET: "test-secret",
      LLM_BASE_URL: "",
      PORT: "9090",
    });

    expect(config.identity).toEqual({
      kind: "client_credentials",
      tokenUrl: "https://auth.test/oauth2/token",
      clientId: "test-client",
      clientSecret: "test-secret",
    });
    expect(config.llm).toEqual({});
    expect(config.port).toBe(9090);
  });

  it("pairs a model alias with the endpoint that serves it", () => {
    const config = loadRuntimeConfig({
      ...BASE_ENV,
      MODEL_ID: "digest-default",
      LLM_BASE_URL: "http://llm-proxy.test:4000/v1",
      LLM_API_KEY: "test-key",
    });

    expect(config.modelId).toBe("digest-default");
    expect(config.llm).toEqual({
      baseUrl: "http://llm-proxy.test:4000/v1",
      apiKey: "test-key",
    });
  });

  it("reports a missing gateway URL", () => {
    const error = configError({
      GATEWAY_SCOPE: "gateway/invoke",
      GATEWAY_ACCESS_TOKEN: "test-token",
    });

    expect(error.issues).toContain("GATEWAY_URL: GATEWAY_URL is required");
    expect(error.category).toBe("configuration");
  });

  it("reports a missing scope", () => {
    const error = configError({
      GATEWAY_URL: "https://gateway.test/mcp",
      GATEWAY_ACCESS_TOKEN: "test-token",
    });

    expect(error.issues).toEqual(["GATEWAY_SCOPE: GATEWAY_SCOPE is required"]);
    expect(error.message).toBe(
      "Invalid environment configuration:\n  GATEWAY_SCOPE: GATEWAY_SCOPE is required"
    );
  });

  it("lists every missing client-credentials setting when no token is set", () => {
    const error = configError({
      GATEWAY_URL: "https://gateway.test/mcp",
      GATEWAY_SCOPE: "gateway/invoke",
      TOKEN_URL: "https://auth.test/oauth2/token",
    });

    expect(error.issues).toEqual([
      "CLIENT_ID: CLIENT_ID is required when GATEWAY_ACCESS_TOKEN is not set",
      "CLIENT_SECRET: CLIENT_SECRET is required when GATEWAY_ACCESS_TOKEN is not set",
    ]);
  });

  it("rejects a non-numeric port", () => {
    const error = configError({ ...BASE_ENV, PORT: "http" });
    expect(error.issues.some((i) => i.startsWith("PORT: "))).toBe(true);
  });
});
