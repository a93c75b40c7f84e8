/**
 * Configuration loading.
 *
 * Responsibilities:
 * 1. Load `.env` from the project root only (no upward search).
 * 2. Validate the environment with zod and build one explicit `AgentConfig`.
 * 3. Components receive `AgentConfig` at construction and never read `process.env` again.
 */
import dotenv from "dotenv";
import os from "os";
import path from "path";
import { z } from "zod";
import { ConfigurationError } from "../../core/errors/index.js";
import type { AgentConfig } from "../../types/config.js";

export type { AgentConfig };

export const DEFAULT_SYSTEM_PROMPT =
  "You are a helpful and friendly AI assistant. Explain things simply.";

export function loadProjectDotenv(projectRoot: string): void {
  dotenv.config({ path: path.join(projectRoot, ".env") });
}

// Accepts true/false, 1/0, yes/no, on/off.
const parseBoolean = (value: unknown): unknown => {
  if (value === undefined || value === "") return undefined;
  const s = String(value).trim().toLowerCase();
  if (["true", "1", "yes", "y", "on"].includes(s)) return true;
  if (["false", "0", "no", "n", "off"].includes(s)) return false;
  return value;
};

// Treats an empty variable like an unset one so defaults apply.
const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const positiveInt = (fallback: number) =>
  z.preprocess(
    (value) => (value === undefined || value === "" ? undefined : value),
    z.coerce.number().int().positive().default(fallback),
  );

const envSchema = z.object({
  OPENAI_API_KEY: z
    .string({ required_error: "is required" })
    .trim()
    .min(1, "must not be empty"),
  OPENAI_BASE_URL: optionalString.pipe(z.string().url().optional()),
  AGENT_MODEL: optionalString,
  AGENT_MAX_TOKENS: positiveInt(1000),
  AGENT_TEMPERATURE: z.preprocess(
    (value) => (value === undefined || value === "" ? undefined : value),
    z.coerce.number().min(0).max(2).default(0.7),
  ),
  AGENT_CHAT_TIMEOUT_MS: positiveInt(30_000),
  AGENT_SYSTEM_PROMPT: optionalString,
  SCRIPT_INTERPRETER: optionalString,
  SCRIPT_EXTENSION: optionalString.pipe(
    z.string().regex(/^\.[A-Za-z0-9]+$/, "must look like .py").optional(),
  ),
  SCRIPT_TIMEOUT_MS: positiveInt(30_000),
  SCRIPT_FETCH_TIMEOUT_MS: positiveInt(10_000),
  SCRIPT_MAX_OUTPUT_CHARS: positiveInt(12_000),
  SCRIPT_TEMP_DIR: optionalString,
  SCRIPT_TRUSTED_RAW_HOST: optionalString,
  AGENT_LOG_LEVEL: z.preprocess(
    (value) => (typeof value === "string" && value.trim() ? value.trim().toLowerCase() : undefined),
    z.enum(["debug", "info", "warn", "error"]).default("info"),
  ),
  AGENT_LOG_DIR: optionalString,
  AGENT_LOG_LLM_MESSAGES: z.preprocess(parseBoolean, z.boolean().default(false)),
});

/**
 * Builds `AgentConfig` from an environment map.
 *
 * Throws `ConfigurationError` listing every invalid variable; nothing is constructed on failure.
 */
export function parseAgentConfig(
  env: NodeJS.ProcessEnv,
  projectRoot: string = process.cwd(),
): AgentConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")} ${issue.message}`),
    );
  }

  const e = parsed.data;
  return {
    systemPrompt: e.AGENT_SYSTEM_PROMPT ?? DEFAULT_SYSTEM_PROMPT,
    llm: {
      apiKey: e.OPENAI_API_KEY,
      baseUrl: e.OPENAI_BASE_URL ?? "https://api.openai.com/v1",
      model: e.AGENT_MODEL ?? "gpt-3.5-turbo",
      maxTokens: e.AGENT_MAX_TOKENS,
      temperature: e.AGENT_TEMPERATURE,
      timeoutMs: e.AGENT_CHAT_TIMEOUT_MS,
    },
    scripts: {
      interpreter: e.SCRIPT_INTERPRETER ?? "python3",
      extension: e.SCRIPT_EXTENSION ?? ".py",
      timeoutMs: e.SCRIPT_TIMEOUT_MS,
      fetchTimeoutMs: e.SCRIPT_FETCH_TIMEOUT_MS,
      maxOutputChars: e.SCRIPT_MAX_OUTPUT_CHARS,
      tempDir: e.SCRIPT_TEMP_DIR ? path.resolve(projectRoot, e.SCRIPT_TEMP_DIR) : os.tmpdir(),
      trustedRawHost: e.SCRIPT_TRUSTED_RAW_HOST ?? "raw.githubusercontent.com",
    },
    logging: {
      level: e.AGENT_LOG_LEVEL,
      dir: e.AGENT_LOG_DIR ? path.resolve(projectRoot, e.AGENT_LOG_DIR) : undefined,
      llmMessages: e.AGENT_LOG_LLM_MESSAGES,
    },
  };
}

/**
 * Startup entry: `.env` from `projectRoot`, then validation against `process.env`.
 */
export function loadAgentConfig(projectRoot: string): AgentConfig {
  const root = path.resolve(projectRoot);
  loadProjectDotenv(root);
  return parseAgentConfig(process.env, root);
}
