import fs from "fs-extra";
import os from "os";
import path from "path";
import { Logger } from "../utils/logger/logger.js";
import type { AgentConfig } from "../types/config.js";

export const TEST_SYSTEM_PROMPT = "You are a test assistant.";

export function makeConfig(overrides: {
  llm?: Partial<AgentConfig["llm"]>;
  scripts?: Partial<AgentConfig["scripts"]>;
  logging?: Partial<AgentConfig["logging"]>;
} = {}): AgentConfig {
  return {
    systemPrompt: TEST_SYSTEM_PROMPT,
    llm: {
      apiKey: "test-secret",
      baseUrl: "https://api.openai.com/v1",
      model: "gpt-3.5-turbo",
      maxTokens: 1000,
      temperature: 0.7,
      timeoutMs: 30_000,
      ...overrides.llm,
    },
    scripts: {
      interpreter: process.execPath,
      extension: ".js",
      timeoutMs: 30_000,
      fetchTimeoutMs: 10_000,
      maxOutputChars: 12_000,
      tempDir: os.tmpdir(),
      trustedRawHost: "raw.githubusercontent.com",
      ...overrides.scripts,
    },
    logging: {
      level: "error",
      llmMessages: false,
      ...overrides.logging,
    },
  };
}

/** Logger that only prints errors; entries are still kept in memory. */
export function createQuietLogger(): Logger {
  return new Logger("error");
}

export async function makeTempDir(prefix = "relay-test-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

/**
 * Resolves never; rejects with the signal's reason once `init.signal` aborts.
 */
export function waitForAbort(init?: RequestInit): Promise<Response> {
  return new Promise((_resolve, reject) => {
    const signal = init?.signal;
    if (!signal) return;
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    signal.addEventListener("abort", () => reject(signal.reason), { once: true });
  });
}
