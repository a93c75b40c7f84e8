/**
 * Terminal front end built with @clack/prompts.
 *
 * - One `text` prompt per line; Ctrl-C at the prompt, or an aborted session signal, comes
 *   back as a cancel symbol.
 * - Agent replies go through `log.message` so multi-line script output stays readable.
 */

import * as p from "@clack/prompts";
import type { SessionIO } from "../core/session/Session.js";

export function createTerminalIO(title: string): SessionIO {
  return {
    async readLine(signal) {
      const value = await p.text({
        message: "You",
        placeholder: "Type a message or a command",
        signal,
      });
      if (p.isCancel(value)) return null;
      return value ?? "";
    },
    banner(lines) {
      console.clear();
      p.intro(title);
      p.note(lines.join("\n"), "Ready");
    },
    reply(text) {
      p.log.message(text, { symbol: "Agent:" });
    },
    goodbye(text) {
      p.outro(`Agent: ${text}`);
    },
  };
}
