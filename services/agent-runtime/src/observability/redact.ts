// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@digest/agent-runtime/observability/redact`
 * Purpose: Redaction paths for sensitive data in logs.
 * Scope: Path list only. Does not implement redaction logic.
 * Invariants: Only redact known secret-bearing keys (not generic "url").
 * Side-effects: none
 * Links: logger.ts
 * @internal
 */

export const REDACT_PATHS = [
  // Auth & secrets
  "token",
  "accessToken",
  "access_token",
  "clientSecret",
  "client_secret",
  "apiKey",
  "api_key",
  "*.accessToken",
  "*.clientSecret",
  "*.apiKey",
  // Config records as loaded
  "config.identity.accessToken",
  "config.identity.clientSecret",
  "config.llm.apiKey",
  // HTTP headers
  "authorization",
  "req.headers.authorization",
  "req.headers.cookie",
  "headers.authorization",
  "headers.Authorization",
];
