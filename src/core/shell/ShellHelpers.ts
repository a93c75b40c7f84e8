/**
 * Script execution helpers.
 *
 * Key points
 * - Child environment forces UTF-8 so decoding does not depend on the host locale.
 * - Result formatting and output budgets live here, away from the process handling.
 */

import { AgentError, describeError } from "../errors/index.js";
import type { Logger } from "../../utils/logger/index.js";
import type { ExecutionResult } from "../../types/script.js";
import { truncate } from "../../utils/text.js";

export const DEFAULT_MAX_OUTPUT_CHARS = 12_000;

export const SCRIPT_RESULT_LABEL = "--- Script Result ---";
export const SCRIPT_ERROR_LABEL = "--- Script Error ---";

function setEnvDefault(env: NodeJS.ProcessEnv, key: string, value: string): void {
  if (typeof env[key] === "string" && env[key]?.trim()) return;
  env[key] = value;
}

/**
 * Environment for interpreter processes.
 *
 * - `PYTHONIOENCODING` / `PYTHONUTF8` are always overridden.
 * - Locale variables only get a UTF-8 default when the parent has none.
 */
export function buildScriptEnv(base: NodeJS.ProcessEnv = process.env): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = { ...base };
  env.PYTHONIOENCODING = "utf-8";
  env.PYTHONUTF8 = "1";
  setEnvDefault(env, "LANG", "C.UTF-8");
  setEnvDefault(env, "LC_ALL", "C.UTF-8");
  return env;
}

/**
 * Exit code 0 shows stdout under the result label; anything else shows stderr under the
 * error label.
 */
export function formatExecutionResult(
  result: ExecutionResult,
  maxOutputChars: number = DEFAULT_MAX_OUTPUT_CHARS,
): string {
  if (result.exitCode === 0) {
    return `${SCRIPT_RESULT_LABEL}\n${truncate(result.stdout, maxOutputChars)}`;
  }
  return `${SCRIPT_ERROR_LABEL}\n${truncate(result.stderr, maxOutputChars)}`;
}

/**
 * Reply text for a script run that produced no result.
 *
 * Known failures read `Error: <message>`; process start failures and anything unexpected
 * read `An error occurred: <detail>`.
 */
export function formatRunFailure(error: unknown, logger: Logger): string {
  if (error instanceof AgentError) {
    logger.warn(`Script run failed: ${error.message}`, { kind: error.kind });
    if (error.kind === "script_execution") {
      return `An error occurred: ${error.message}`;
    }
    return `Error: ${error.message}`;
  }
  logger.error(`Script run failed: ${describeError(error)}`);
  return `An error occurred: ${describeError(error)}`;
}
