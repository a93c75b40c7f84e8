/**
 * Script execution types.
 */

export interface ExecutionResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface ScriptRunOptions {
  /** Cancels fetching and the running process (user interrupt). */
  signal?: AbortSignal;
}

/**
 * Anything able to run a script file to completion.
 *
 * Runners depend on this seam instead of on execa directly so the process layer can be
 * instrumented in tests.
 */
export interface ScriptExecutor {
  execute(scriptPath: string, options?: ScriptRunOptions): Promise<ExecutionResult>;
}

export interface ScriptRunner {
  run(target: string, options?: ScriptRunOptions): Promise<string>;
}
