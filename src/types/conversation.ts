/**
 * Conversation message types.
 *
 * The history is an ordered list of role-tagged messages; the first entry is always the
 * system message fixed at construction.
 */

export type MessageRole = "system" | "user" | "assistant";

export interface ConversationMessage {
  role: MessageRole;
  content: string;
}

export interface SendMessageOptions {
  /** Aborts the in-flight request (user interrupt). */
  signal?: AbortSignal;
}
