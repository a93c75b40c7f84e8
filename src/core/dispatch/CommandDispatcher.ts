/**
 * Input classification and routing.
 *
 * Key points
 * - `classifyInput` is pure: one line in, one tagged command out.
 * - Only the chat path receives the raw line; verbs and their arguments are trimmed.
 */

import type { ChatAgent } from "../agent/ChatAgent.js";
import type { ScriptRunner } from "../../types/script.js";

export type ScriptVerb = "run_local" | "run_github";

export type InputCommand =
  | { kind: "exit" }
  | { kind: "skip" }
  | { kind: "run_local"; path: string }
  | { kind: "run_github"; url: string }
  | { kind: "usage"; verb: ScriptVerb }
  | { kind: "chat"; text: string };

export type DispatchOutcome =
  | { type: "exit" }
  | { type: "skip" }
  | { type: "reply"; text: string };

const EXIT_WORDS = new Set(["quit", "exit"]);
const VERB_PATTERN = /^(run_local|run_github)(?:\s+([\s\S]*))?$/i;

export const USAGE: Record<ScriptVerb, string> = {
  run_local: "Usage: run_local <path>",
  run_github: "Usage: run_github <raw_url>",
};

function toVerb(value: string): ScriptVerb {
  return value.toLowerCase() === "run_local" ? "run_local" : "run_github";
}

export function classifyInput(rawLine: string): InputCommand {
  const line = rawLine.trim();
  if (!line) return { kind: "skip" };
  if (EXIT_WORDS.has(line.toLowerCase())) return { kind: "exit" };

  const match = VERB_PATTERN.exec(line);
  if (match) {
    const verb = toVerb(match[1] ?? "");
    const argument = (match[2] ?? "").trim();
    if (!argument) return { kind: "usage", verb };
    return verb === "run_local"
      ? { kind: "run_local", path: argument }
      : { kind: "run_github", url: argument };
  }

  return { kind: "chat", text: rawLine };
}

export interface CommandDispatcherDeps {
  chat: Pick<ChatAgent, "sendUserMessage">;
  localRunner: ScriptRunner;
  remoteRunner: ScriptRunner;
}

export class CommandDispatcher {
  constructor(private readonly deps: CommandDispatcherDeps) {}

  async dispatch(rawLine: string, options: { signal?: AbortSignal } = {}): Promise<DispatchOutcome> {
    const command = classifyInput(rawLine);
    switch (command.kind) {
      case "exit":
        return { type: "exit" };
      case "skip":
        return { type: "skip" };
      case "usage":
        return { type: "reply", text: USAGE[command.verb] };
      case "run_local":
        return { type: "reply", text: await this.deps.localRunner.run(command.path, options) };
      case "run_github":
        return { type: "reply", text: await this.deps.remoteRunner.run(command.url, options) };
      case "chat":
        return { type: "reply", text: await this.deps.chat.sendUserMessage(command.text, options) };
    }
  }
}
