// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@digest/gateway-tools/tests/token-provider.test`
 * Purpose: Client-credentials request shape, failure mapping and memoization.
 * Scope: fetch is injected; no network.
 * Side-effects: none
 * Links: src/auth/token-provider.ts
 * @internal
 */

import { GatewayConnectionError } from "@digest/agent-graph";
import { describe, expect, it, vi } from "vitest";

import {
  clientCredentialsTokenProvider,
  memoizeTokenProvider,
  staticTokenProvider,
} from "../src/auth/token-provider";
import { silentLogger } from "./_fakes/fake-gateway";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

const baseOptions = {
  tokenUrl: "https://auth.test/oauth2/token",
  clientId: "test-client",
  clientSecret: "test-secret",
  scope: "gateway/invoke",
  log: silentLogger,
};

describe("clientCredentialsTokenProvider", () => {
  it("posts a client-credentials grant with basic auth", async () => {
    const fetchFn = vi.fn<typeof fetch>(async () =>
      jsonResponse({ access_token: "token-1", expires_in: 3600 })
    );
    const provider = clientCredentialsTokenProvider({ ...baseOptions, fetch: fetchFn });

    await expect(provider()).resolves.toBe("token-1");

    const [url, init] = fetchFn.mock.calls[0] ?? [];
    expect(url).toBe("https://auth.test/oauth2/token");
    expect(init?.method).toBe("POST");
    expect(init?.body).toBe("grant_type=client_credentials&scope=gateway%2Finvoke");
    expect(init?.headers).toMatchObject({
      Authorization: `Basic ${Buffer.from("test-client:test-secret").toString("base64")}`,
      "Content-Type": "application/x-www-form-urlencoded",
    });
  });

  it("maps a rejected request to GatewayConnectionError", async () => {
    const provider = clientCredentialsTokenProvider({
      ...baseOptions,
      fetch: async () => jsonResponse({ error: "invalid_client" }, 401),
    });

    const error = await provider().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GatewayConnectionError);
    expect(error).toMatchObject({ category: "connectivity" });
  });

  it("maps an unreachable identity provider to GatewayConnectionError", async () => {
    const provider = clientCredentialsTokenProvider({
      ...baseOptions,
      fetch: async () => {
        throw new TypeError("fetch failed");
      },
    });

    await expect(provider()).rejects.toThrow("Identity provider unreachable");
  });

  it("rejects a response without an access token", async () => {
    const provider = clientCredentialsTokenProvider({
      ...baseOptions,
      fetch: async () => jsonResponse({ token_type: "Bearer" }),
    });

    await expect(provider()).rejects.toThrow(
      "Token response did not contain an access_token"
    );
  });
});

describe("memoizeTokenProvider", () => {
  it("shares one acquisition across callers", async () => {
    const inner = vi.fn(async () => "token-1");
    const provider = memoizeTokenProvider(inner);

    const tokens = await Promise.all([provider(), provider()]);
    await provider();

    expect(tokens).toEqual(["token-1", "token-1"]);
    expect(inner).toHaveBeenCalledTimes(1);
  });

  it("does not cache a failure", async () => {
    const inner = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error("flaky"))
      .mockResolvedValueOnce("token-2");
    const provider = memoizeTokenProvider(inner);

    await expect(provider()).rejects.toThrow("flaky");
    await expect(provider()).resolves.toBe("token-2");
    expect(inner).toHaveBeenCalledTimes(2);
  });
});

describe("staticTokenProvider", () => {
  it("returns the configured token", async () => {
    await expect(staticTokenProvider("test-token")()).resolves.toBe("test-token");
  });
});
