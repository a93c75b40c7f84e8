/**
 * Conversation history with transactional turns.
 *
 * Key points
 * - The first message is the system prompt fixed at construction; nothing removes it.
 * - A user message is only staged while the remote call runs. It enters the history
 *   together with the assistant reply on `commit`, so a failed turn never leaves an
 *   unanswered user message behind.
 */

import type { ConversationMessage } from "../../types/conversation.js";

export interface PendingTurn {
  /** History plus the staged user message: what the remote call must see. */
  readonly messages: readonly ConversationMessage[];
  commit(reply: string): void;
}

export class ConversationState {
  private readonly messages: ConversationMessage[];
  private turnSeq = 0;

  constructor(systemPrompt: string) {
    this.messages = [{ role: "system", content: systemPrompt }];
  }

  get length(): number {
    return this.messages.length;
  }

  getMessages(): readonly ConversationMessage[] {
    return this.messages.map((message) => ({ ...message }));
  }

  /**
   * Stages a user message. Dropping the returned turn without `commit` discards it.
   *
   * Only the most recently staged turn can commit, and only while the history has not
   * changed since it was staged.
   */
  begin(userText: string): PendingTurn {
    const seq = ++this.turnSeq;
    const baseLength = this.messages.length;
    const userMessage: ConversationMessage = { role: "user", content: userText };
    const snapshot = [...this.getMessages(), { ...userMessage }];
    let committed = false;

    return {
      messages: snapshot,
      commit: (reply: string) => {
        if (committed) {
          throw new Error("Turn already committed");
        }
        if (seq !== this.turnSeq || baseLength !== this.messages.length) {
          throw new Error("Stale turn: the conversation changed after it was staged");
        }
        committed = true;
        this.messages.push(userMessage, { role: "assistant", content: reply });
      },
    };
  }
}
