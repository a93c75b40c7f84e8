import type { LogLevel } from "../utils/logger/logger.js";

/**
 * Explicit agent configuration, built once at startup.
 */
export interface AgentConfig {
  systemPrompt: string;
  llm: {
    apiKey: string;
    /** OpenAI-compatible base URL; requests go to `<baseUrl>/chat/completions`. */
    baseUrl: string;
    model: string;
    maxTokens: number;
    temperature: number;
    timeoutMs: number;
  };
  scripts: {
    /** Interpreter binary, resolved through PATH. */
    interpreter: string;
    /** Extension given to fetched scripts' temp files. */
    extension: string;
    timeoutMs: number;
    fetchTimeoutMs: number;
    /** Per-stream output budget. */
    maxOutputChars: number;
    tempDir: string;
    /** Substring the host of a `run_github` URL must contain. */
    trustedRawHost: string;
  };
  logging: {
    level: LogLevel;
    dir?: string;
    llmMessages: boolean;
  };
}
