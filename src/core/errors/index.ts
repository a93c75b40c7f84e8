/**
 * Agent error taxonomy.
 *
 * Key points
 * - Components throw these internally; runners and the chat agent turn them into reply text.
 * - Only `ConfigurationError` is fatal, and only at startup.
 */

import { formatDuration } from "../../process/utils/time.js";

export type AgentErrorKind =
  | "configuration"
  | "remote_api"
  | "script_not_found"
  | "script_timeout"
  | "fetch"
  | "script_execution"
  | "interrupted";

export abstract class AgentError extends Error {
  abstract readonly kind: AgentErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends AgentError {
  readonly kind = "configuration";

  constructor(readonly problems: string[]) {
    super(`Invalid configuration:\n${problems.map((p) => `  - ${p}`).join("\n")}`);
  }
}

export class RemoteApiError extends AgentError {
  readonly kind = "remote_api";

  constructor(
    message: string,
    readonly reason: "timeout" | "interrupted" | "transport",
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class ScriptNotFoundError extends AgentError {
  readonly kind = "script_not_found";

  constructor(readonly scriptPath: string) {
    super(`Script not found at '${scriptPath}'.`);
  }
}

export class ScriptTimeoutError extends AgentError {
  readonly kind = "script_timeout";

  constructor(readonly timeoutMs: number) {
    super(`Script execution timed out after ${formatDuration(timeoutMs)}.`);
  }
}

export class FetchError extends AgentError {
  readonly kind = "fetch";

  constructor(
    message: string,
    readonly reason: "rejected" | "timeout" | "transport" | "interrupted",
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class ScriptExecutionError extends AgentError {
  readonly kind = "script_execution";
}

export class ScriptInterruptedError extends AgentError {
  readonly kind = "interrupted";

  constructor(message = "Script execution was interrupted.") {
    super(message);
  }
}

/**
 * Renders any thrown value as a single line of text.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message || error.name;
  return String(error);
}
