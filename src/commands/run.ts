/**
 * `relay-agent [path]`: starts the interactive session in the current terminal.
 *
 * Responsibilities
 * - Load `.env` from `path` and validate configuration (fatal on failure).
 * - Build the agent components and bind the logger.
 * - Route SIGINT/SIGTERM to the session so an in-flight line is aborted and cleaned up.
 * - Flush logs before the process exits.
 */

import { createAgentComponents } from "../core/agent/factory.js";
import { ConfigurationError, describeError } from "../core/errors/index.js";
import { Session } from "../core/session/Session.js";
import { createTerminalIO } from "../infra/terminal.js";
import { loadAgentConfig } from "../process/project/config.js";
import { logger } from "../utils/logger/index.js";
import type { AgentConfig } from "../types/config.js";
import type { RunOptions } from "./types/run.js";

/**
 * Configuration is the only fatal error: report it and build nothing.
 */
function loadConfigOrReport(cwd: string): AgentConfig | null {
  try {
    return loadAgentConfig(cwd);
  } catch (error) {
    if (!(error instanceof ConfigurationError)) throw error;
    console.error(`❌ ${error.message}`);
    console.error("Set the variables in your environment or in a .env file (see .env.example).");
    return null;
  }
}

export async function runCommand(cwd: string = ".", options: RunOptions = {}): Promise<void> {
  const config = loadConfigOrReport(cwd);
  if (!config) {
    process.exitCode = 1;
    return;
  }

  logger.setLevel(options.logLevel ?? config.logging.level);
  logger.bindLogDir(config.logging.dir);

  const { dispatcher } = createAgentComponents({ config, logger });
  const session = new Session(dispatcher, createTerminalIO("Relay Agent (OpenAI chat)"), logger);

  // Signal handling: abort the current line; a second signal while busy forces exit.
  let signalled = false;
  const onSignal = (signal: NodeJS.Signals) => {
    if (signalled) {
      logger.warn(`Received ${signal} again, exiting immediately`);
      process.exit(130);
    }
    signalled = true;
    logger.info(`Received ${signal}, stopping session...`);
    session.interrupt();
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  try {
    logger.debug("Session started", { model: config.llm.model, baseUrl: config.llm.baseUrl });
    await session.run();
  } catch (error) {
    logger.error(`Session crashed: ${describeError(error)}`);
    process.exitCode = 1;
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
    await logger.saveAllLogs();
  }
}
