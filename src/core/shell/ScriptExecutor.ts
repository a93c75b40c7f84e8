/**
 * Interpreter process runner built on execa.
 *
 * Every call is one scoped process: spawned without a shell in its own process group,
 * bounded by a wall-clock timeout, cancelled on interrupt, and always reaped before
 * `execute` settles. On timeout or cancel the whole group is killed, so processes the
 * script started cannot keep the output pipes open past the deadline.
 */

import { execa } from "execa";
import {
  ScriptExecutionError,
  ScriptInterruptedError,
  ScriptTimeoutError,
} from "../errors/index.js";
import { buildScriptEnv } from "./ShellHelpers.js";
import { createDeadline } from "../../utils/abort.js";
import { getLogger, type Logger } from "../../utils/logger/index.js";
import { formatDuration } from "../../process/utils/time.js";
import type { ExecutionResult, ScriptExecutor, ScriptRunOptions } from "../../types/script.js";

function isMissingProcess(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ESRCH";
}

/**
 * SIGKILL to the process group led by `pid`. Windows has no process groups; there only the
 * interpreter itself is killed.
 */
function killProcessGroup(pid: number | undefined, killSelf: () => void): void {
  if (pid === undefined || process.platform === "win32") {
    killSelf();
    return;
  }
  try {
    process.kill(-pid, "SIGKILL");
  } catch (error) {
    // Group already gone.
    if (!isMissingProcess(error)) throw error;
  }
}

export interface InterpreterExecutorOptions {
  interpreter: string;
  timeoutMs: number;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

export class InterpreterExecutor implements ScriptExecutor {
  private readonly logger: Logger;

  constructor(private readonly options: InterpreterExecutorOptions) {
    this.logger = options.logger ?? getLogger();
  }

  async execute(scriptPath: string, runOptions: ScriptRunOptions = {}): Promise<ExecutionResult> {
    const { interpreter, timeoutMs, cwd } = this.options;
    const startedAt = Date.now();
    const deadline = createDeadline(timeoutMs, runOptions.signal);

    const subprocess = execa(interpreter, [scriptPath], {
      cwd,
      env: buildScriptEnv(this.options.env),
      extendEnv: false,
      detached: true,
      cancelSignal: deadline.signal,
      encoding: "utf8",
      stripFinalNewline: false,
      stdin: "ignore",
      reject: false,
    });

    const killGroup = () => {
      killProcessGroup(subprocess.pid, () => {
        subprocess.kill("SIGKILL");
      });
    };
    if (deadline.signal.aborted) {
      killGroup();
    } else {
      deadline.signal.addEventListener("abort", killGroup, { once: true });
    }

    let result: Awaited<typeof subprocess>;
    try {
      result = await subprocess;
    } finally {
      deadline.signal.removeEventListener("abort", killGroup);
      deadline.dispose();
    }

    const durationMs = Date.now() - startedAt;
    this.logger.debug(`Script process finished in ${formatDuration(durationMs)}`, {
      interpreter,
      scriptPath,
      exitCode: result.exitCode ?? null,
      timedOut: deadline.timedOut(),
    });

    if (deadline.timedOut()) {
      throw new ScriptTimeoutError(timeoutMs);
    }
    if (deadline.interrupted()) {
      throw new ScriptInterruptedError();
    }
    if (result.exitCode === undefined) {
      // Never ran to an exit: spawn failure or killed by a signal.
      const detail =
        "shortMessage" in result && typeof result.shortMessage === "string"
          ? result.shortMessage
          : `${interpreter} terminated${result.signal ? ` by ${result.signal}` : ""}`;
      throw new ScriptExecutionError(detail);
    }

    return {
      exitCode: result.exitCode,
      stdout: result.stdout,
      stderr: result.stderr,
    };
  }
}
