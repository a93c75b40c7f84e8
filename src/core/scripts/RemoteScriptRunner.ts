/**
 * Runs a script fetched from a raw-content URL (`run_github <url>`).
 *
 * Key points
 * - The host check happens before any network traffic.
 * - The body is written to a scoped temp file that is removed whatever the outcome.
 */

import { FetchError, describeError } from "../errors/index.js";
import { formatExecutionResult, formatRunFailure } from "../shell/ShellHelpers.js";
import { withTempScript } from "../shell/TempScript.js";
import { createDeadline } from "../../utils/abort.js";
import { formatDuration } from "../../process/utils/time.js";
import { getLogger, type Logger, type ProviderFetch } from "../../utils/logger/index.js";
import type { ScriptExecutor, ScriptRunOptions, ScriptRunner } from "../../types/script.js";

export interface RemoteScriptRunnerOptions {
  executor: ScriptExecutor;
  trustedRawHost: string;
  fetchTimeoutMs: number;
  tempDir: string;
  extension: string;
  maxOutputChars: number;
  fetch?: ProviderFetch;
  logger?: Logger;
}

/**
 * True when `url` parses and its host contains `trustedRawHost`.
 *
 * This is a substring match on the host, not an origin comparison:
 * `raw.githubusercontent.com.example.org` passes.
 */
export function isTrustedRawUrl(url: string, trustedRawHost: string): boolean {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return false;
  }
  if (parsed.protocol !== "https:" && parsed.protocol !== "http:") return false;
  return parsed.host.toLowerCase().includes(trustedRawHost.toLowerCase());
}

export function rawUrlGuidance(trustedRawHost: string): string {
  return `Please provide a raw GitHub URL (the host must contain '${trustedRawHost}').`;
}

export class RemoteScriptRunner implements ScriptRunner {
  private readonly logger: Logger;
  private readonly fetch: ProviderFetch;

  constructor(private readonly options: RemoteScriptRunnerOptions) {
    this.logger = options.logger ?? getLogger();
    this.fetch = options.fetch ?? globalThis.fetch.bind(globalThis);
  }

  async run(url: string, runOptions: ScriptRunOptions = {}): Promise<string> {
    const { trustedRawHost, tempDir, extension, maxOutputChars } = this.options;
    try {
      if (!isTrustedRawUrl(url, trustedRawHost)) {
        throw new FetchError(rawUrlGuidance(trustedRawHost), "rejected");
      }
      this.logger.action(`Executing script from: ${url}`);
      const source = await this.fetchScript(url, runOptions.signal);
      const result = await withTempScript(source, { dir: tempDir, extension }, (scriptPath) =>
        this.options.executor.execute(scriptPath, runOptions),
      );
      return formatExecutionResult(result, maxOutputChars);
    } catch (error) {
      return formatRunFailure(error, this.logger);
    }
  }

  private async fetchScript(url: string, signal?: AbortSignal): Promise<string> {
    const { fetchTimeoutMs } = this.options;
    const deadline = createDeadline(fetchTimeoutMs, signal);
    try {
      const response = await this.fetch(url, { method: "GET", signal: deadline.signal });
      if (!response.ok) {
        throw new FetchError(
          `Failed to fetch script: HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ""}`,
          "transport",
        );
      }
      const buffer = await response.arrayBuffer();
      return new TextDecoder("utf-8").decode(buffer);
    } catch (error) {
      if (error instanceof FetchError) throw error;
      if (deadline.timedOut()) {
        throw new FetchError(
          `Fetching the script timed out after ${formatDuration(fetchTimeoutMs)}.`,
          "timeout",
          { cause: error },
        );
      }
      if (deadline.interrupted()) {
        throw new FetchError("Fetching the script was interrupted.", "interrupted", {
          cause: error,
        });
      }
      throw new FetchError(`Failed to fetch script: ${describeError(error)}`, "transport", {
        cause: error,
      });
    } finally {
      deadline.dispose();
    }
  }
}
