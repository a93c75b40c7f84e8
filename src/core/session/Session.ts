/**
 * Interactive session loop.
 *
 * Key points
 * - Strictly sequential: a line is fully handled before the next one is read.
 * - `interrupt()` aborts the in-flight line or the pending read; the loop then ends with the
 *   goodbye message once runners have cleaned up. A line read after an interrupt is dropped.
 * - An unexpected fault is reported and ends the loop; it never escapes as a stack trace.
 */

import { describeError } from "../errors/index.js";
import { getLogger, type Logger } from "../../utils/logger/index.js";
import type { CommandDispatcher } from "../dispatch/CommandDispatcher.js";

export const GOODBYE_MESSAGE = "Goodbye!";

export const BANNER_LINES = [
  "Commands:",
  "  run_local <path>      run a local script",
  "  run_github <raw_url>  fetch a script from a raw GitHub URL and run it",
  "  quit | exit           end the session",
  "Anything else is sent to the AI.",
];

export interface SessionIO {
  /**
   * Next line, or null when the user cancelled (Ctrl-C) or input ended. `signal` aborts when
   * the session is interrupted while waiting.
   */
  readLine(signal: AbortSignal): Promise<string | null>;
  banner(lines: string[]): void;
  reply(text: string): void;
  goodbye(text: string): void;
}

export type SessionEndReason = "exit" | "cancelled" | "interrupted" | "fault";

export class Session {
  private readonly logger: Logger;
  private current: AbortController | null = null;
  private readonly stop = new AbortController();

  constructor(
    private readonly dispatcher: Pick<CommandDispatcher, "dispatch">,
    private readonly io: SessionIO,
    logger?: Logger,
  ) {
    this.logger = logger ?? getLogger();
  }

  /**
   * Requests the loop to stop. Returns true when a line was in flight and got aborted.
   */
  interrupt(): boolean {
    this.stop.abort(new Error("Interrupted by user"));
    if (!this.current) return false;
    this.current.abort(new Error("Interrupted by user"));
    return true;
  }

  async run(): Promise<SessionEndReason> {
    this.io.banner(BANNER_LINES);
    const reason = await this.loop();
    this.io.goodbye(GOODBYE_MESSAGE);
    this.logger.info(`Session ended (${reason})`);
    return reason;
  }

  private async loop(): Promise<SessionEndReason> {
    while (!this.stop.signal.aborted) {
      let line: string | null;
      try {
        line = await this.nextLine();
      } catch (error) {
        return this.fault(error);
      }
      if (this.stop.signal.aborted) return "interrupted";
      if (line === null) return "cancelled";

      const controller = new AbortController();
      this.current = controller;
      try {
        const outcome = await this.dispatcher.dispatch(line, { signal: controller.signal });
        if (outcome.type === "exit") return "exit";
        if (outcome.type === "reply") this.io.reply(outcome.text);
      } catch (error) {
        return this.fault(error);
      } finally {
        this.current = null;
      }
    }
    return "interrupted";
  }

  /**
   * Resolves with null as soon as the session is interrupted, whether or not the front end
   * gives up its prompt.
   */
  private nextLine(): Promise<string | null> {
    const { signal } = this.stop;
    return new Promise((resolve, reject) => {
      const onAbort = () => resolve(null);
      signal.addEventListener("abort", onAbort, { once: true });
      this.io.readLine(signal).then(
        (line) => {
          signal.removeEventListener("abort", onAbort);
          resolve(line);
        },
        (error: unknown) => {
          signal.removeEventListener("abort", onAbort);
          reject(error);
        },
      );
    });
  }

  private fault(error: unknown): SessionEndReason {
    this.logger.error(`Unexpected session fault: ${describeError(error)}`, {
      stack: error instanceof Error ? (error.stack ?? null) : null,
    });
    this.io.reply(`An unexpected error occurred: ${describeError(error)}`);
    return "fault";
  }
}
