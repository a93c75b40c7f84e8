/**
 * `run` command options.
 */
export interface RunOptions {
  /** Overrides AGENT_LOG_LEVEL for this run. */
  logLevel?: "debug" | "info" | "warn" | "error";
}
