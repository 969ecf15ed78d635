// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@digest/agent-runtime/pipeline/prompts`
 * Purpose: System prompts and the follow-up prompt of the digest pipeline.
 * Scope: Constants and prompt builders only.
 * Side-effects: none
 * @internal
 */

export const SLACK_AGENT_ID = "slack_agent";
export const SUMMARY_AGENT_ID = "tavily_agent";
export const BLOCK_AGENT_ID = "block_agent";

/** Prompt handed to the summarization agent once retrieval completes. */
export const SUMMARY_FOLLOW_UP_PROMPT =
  "Summarize the content of the retrieved URLs.";

export function slackAgentSystemPrompt(channel: string): string {
  return [
    "You are a Slack integration assistant.",
    `Fetch every message in the "${channel}" channel that has a URL attached, and return those messages in full.`,
  ].join("\n");
}

export const SUMMARY_AGENT_SYSTEM_PROMPT = [
  "You are a web summarization assistant.",
  "For each retrieved URL, use the extract tool to pull the page body, then summarize its content.",
].join("\n");
