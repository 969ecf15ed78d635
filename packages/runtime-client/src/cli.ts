#!/usr/bin/env tsx
// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@digest/runtime-client/cli`
 * Purpose: Terminal chat client for the agent runtime.
 * Scope: One-shot (`chat <prompt>`) or interactive loop; one session id per process. Markdown to stdout, logs to stderr.
 * Invariants: Exit code 1 on configuration errors or an error reply in one-shot mode.
 * Side-effects: IO (stdin/stdout, HTTP)
 * Links: invoke.ts, reply.ts, format-report.ts
 * @internal
 */

import { randomUUID } from "node:crypto";
import { stdin, stdout } from "node:process";
import { createInterface } from "node:readline/promises";

import { ConfigurationError } from "@digest/agent-graph";
import pino from "pino";

import { type ClientConfig, loadClientConfig } from "./config";
import { formatReply } from "./format-report";
import { invokeAgentRuntime } from "./invoke";
import { interpretReply, type RuntimeReply } from "./reply";

async function ask(
  config: ClientConfig,
  sessionId: string,
  prompt: string,
  stream: boolean
): Promise<RuntimeReply> {
  const log = pino({ level: config.LOG_LEVEL }, pino.destination(2));
  const decoded = await invokeAgentRuntime({
    endpoint: config.RUNTIME_URL,
    prompt,
    sessionId,
    userId: config.RUNTIME_USER_ID,
    stream,
    log,
  });
  return interpretReply(decoded);
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const stream = args.includes("--stream");
  const prompt = args.filter((a) => a !== "--stream").join(" ").trim();

  const config = loadClientConfig(process.env);
  const sessionId = config.RUNTIME_SESSION_ID ?? randomUUID();

  if (prompt.length > 0) {
    const reply = await ask(config, sessionId, prompt, stream);
    console.log(formatReply(reply));
    if (reply.kind === "error") process.exit(1);
    return;
  }

  console.log(`Session ${sessionId} (empty line to quit)`);
  const rl = createInterface({ input: stdin, output: stdout });
  try {
    for (;;) {
      const line = (await rl.question("> ")).trim();
      if (line.length === 0) break;
      console.log("🔄 Running agent graph...");
      console.log(formatReply(await ask(config, sessionId, line, stream)));
    }
  } finally {
    rl.close();
  }
}

main().catch((error: unknown) => {
  if (error instanceof ConfigurationError) {
    console.error("❌ Client configuration invalid");
    for (const issue of error.issues) console.error(`   ${issue}`);
  } else {
    console.error("❌ Unexpected error", error);
  }
  process.exit(1);
});
