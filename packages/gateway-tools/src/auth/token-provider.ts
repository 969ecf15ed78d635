// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@digest/gateway-tools/auth/token-provider`
 * Purpose: Access-token providers for gateway authentication.
 * Scope: Static token, OAuth2 client-credentials grant, request-scoped memoization. Does NOT persist tokens.
 * Invariants:
 *   - Providers are re-entrant; memoized providers share one in-flight request
 *   - A failed acquisition is not cached
 *   - Secrets never appear in log fields or error messages
 * Side-effects: IO (HTTP to the token endpoint)
 * Links: mcp/session.ts
 * @public
 */

import { GatewayConnectionError, type Logger } from "@digest/agent-graph";
import { z } from "zod";

export type AccessTokenProvider = () => Promise<string>;

export function staticTokenProvider(token: string): AccessTokenProvider {
  return () => Promise.resolve(token);
}

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
  expires_in: z.number().optional(),
});

export interface ClientCredentialsOptions {
  readonly tokenUrl: string;
  readonly clientId: string;
  readonly clientSecret: string;
  readonly scope: string;
  readonly log: Logger;
  /** Injected for tests; defaults to global fetch */
  readonly fetch?: typeof fetch;
}

/**
 * OAuth2 client-credentials grant (machine-to-machine identity).
 */
export function clientCredentialsTokenProvider(
  options: ClientCredentialsOptions
): AccessTokenProvider {
  const doFetch = options.fetch ?? fetch;

  return async () => {
    const basic = Buffer.from(
      `${options.clientId}:${options.clientSecret}`
    ).toString("base64");

    let response: Response;
    try {
      response = await doFetch(options.tokenUrl, {
        method: "POST",
        headers: {
          Authorization: `Basic ${basic}`,
          "Content-Type": "application/x-www-form-urlencoded",
        },
        body: new URLSearchParams({
          grant_type: "client_credentials",
          scope: options.scope,
        }).toString(),
      });
    } catch (cause) {
      throw new GatewayConnectionError("Identity provider unreachable", {
        cause,
      });
    }

    if (!response.ok) {
      throw new GatewayConnectionError(
        `Token request failed: ${response.status} ${response.statusText}`.trim()
      );
    }

    const parsed = TokenResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new GatewayConnectionError(
        "Token response did not contain an access_token"
      );
    }

    options.log.debug(
      { scope: options.scope, expiresIn: parsed.data.expires_in },
      "gateway access token acquired"
    );
    return parsed.data.access_token;
  };
}

/**
 * Cache one token for the lifetime of the returned provider (one request).
 */
export function memoizeTokenProvider(
  provider: AccessTokenProvider
): AccessTokenProvider {
  let pending: Promise<string> | undefined;

  return () => {
    if (!pending) {
      pending = provider().catch((error: unknown) => {
        pending = undefined;
        throw error;
      });
    }
    return pending;
  };
}
