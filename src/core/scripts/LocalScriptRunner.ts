import fs from "fs-extra";
import path from "path";
import { ScriptNotFoundError } from "../errors/index.js";
import { formatExecutionResult, formatRunFailure } from "../shell/ShellHelpers.js";
import { getLogger, type Logger } from "../../utils/logger/index.js";
import type { ScriptExecutor, ScriptRunOptions, ScriptRunner } from "../../types/script.js";

export interface LocalScriptRunnerOptions {
  executor: ScriptExecutor;
  maxOutputChars: number;
  /** Relative paths resolve against this directory. */
  cwd?: string;
  logger?: Logger;
}

async function isRegularFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") return false;
    if (error instanceof Error && "code" in error && error.code === "ENOTDIR") return false;
    throw error;
  }
}

/**
 * Runs a script from the local filesystem (`run_local <path>`).
 */
export class LocalScriptRunner implements ScriptRunner {
  private readonly logger: Logger;

  constructor(private readonly options: LocalScriptRunnerOptions) {
    this.logger = options.logger ?? getLogger();
  }

  async run(scriptPath: string, runOptions: ScriptRunOptions = {}): Promise<string> {
    const resolved = path.resolve(this.options.cwd ?? process.cwd(), scriptPath);
    this.logger.action(`Executing local script: ${resolved}`);

    try {
      if (!(await isRegularFile(resolved))) {
        throw new ScriptNotFoundError(scriptPath);
      }
      const result = await this.options.executor.execute(resolved, runOptions);
      return formatExecutionResult(result, this.options.maxOutputChars);
    } catch (error) {
      return formatRunFailure(error, this.logger);
    }
  }
}
