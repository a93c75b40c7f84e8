/**
 * Builds the agent's components from one `AgentConfig`.
 */

import type { LanguageModel } from "ai";
import { ChatAgent } from "./ChatAgent.js";
import { CommandDispatcher } from "../dispatch/CommandDispatcher.js";
import { createModel } from "../llm/create-model.js";
import { LocalScriptRunner } from "../scripts/LocalScriptRunner.js";
import { RemoteScriptRunner } from "../scripts/RemoteScriptRunner.js";
import { InterpreterExecutor } from "../shell/ScriptExecutor.js";
import { getLogger, type Logger, type ProviderFetch } from "../../utils/logger/index.js";
import type { AgentConfig } from "../../types/config.js";
import type { ScriptExecutor } from "../../types/script.js";

export interface AgentComponents {
  chat: ChatAgent;
  executor: ScriptExecutor;
  localRunner: LocalScriptRunner;
  remoteRunner: RemoteScriptRunner;
  dispatcher: CommandDispatcher;
}

export function createAgentComponents(input: {
  config: AgentConfig;
  cwd?: string;
  logger?: Logger;
  /** Transport for both the chat API and script downloads. */
  fetch?: ProviderFetch;
  model?: LanguageModel;
  executor?: ScriptExecutor;
}): AgentComponents {
  const { config } = input;
  const logger = input.logger ?? getLogger();
  const cwd = input.cwd ?? process.cwd();

  const model = input.model ?? createModel({ config, logger, fetch: input.fetch });
  const chat = new ChatAgent(config, model, logger);

  const executor =
    input.executor ??
    new InterpreterExecutor({
      interpreter: config.scripts.interpreter,
      timeoutMs: config.scripts.timeoutMs,
      cwd,
      logger,
    });

  const localRunner = new LocalScriptRunner({
    executor,
    maxOutputChars: config.scripts.maxOutputChars,
    cwd,
    logger,
  });
  const remoteRunner = new RemoteScriptRunner({
    executor,
    trustedRawHost: config.scripts.trustedRawHost,
    fetchTimeoutMs: config.scripts.fetchTimeoutMs,
    tempDir: config.scripts.tempDir,
    extension: config.scripts.extension,
    maxOutputChars: config.scripts.maxOutputChars,
    fetch: input.fetch,
    logger,
  });

  const dispatcher = new CommandDispatcher({ chat, localRunner, remoteRunner });
  return { chat, executor, localRunner, remoteRunner, dispatcher };
}
