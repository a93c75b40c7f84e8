/**
 * LLM model factory.
 *
 * Key points
 * - Core capability: depends only on `AgentConfig`, never on the session or CLI.
 * - Uses the OpenAI *chat* model so the wire format stays
 *   `POST <baseUrl>/chat/completions` with `{ model, messages, max_tokens, temperature }`
 *   and the reply is read from `choices[0].message.content`.
 */

import { createOpenAI } from "@ai-sdk/openai";
import { type LanguageModel } from "ai";
import { createLlmLoggingFetch, getLogger, type Logger, type ProviderFetch } from "../../utils/logger/index.js";
import type { AgentConfig } from "../../types/config.js";

export function createModel(input: {
  config: AgentConfig;
  logger?: Logger;
  /** Transport override (tests, proxies). Defaults to the global fetch. */
  fetch?: ProviderFetch;
}): LanguageModel {
  const logger = input.logger ?? getLogger();
  const { apiKey, baseUrl, model } = input.config.llm;

  const loggingFetch = createLlmLoggingFetch({
    logger,
    enabled: input.config.logging.llmMessages,
    baseFetch: input.fetch,
  });

  const openaiProvider = createOpenAI({
    apiKey,
    baseURL: baseUrl,
    fetch: loggingFetch,
  });
  return openaiProvider.chat(model);
}
