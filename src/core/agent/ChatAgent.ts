import { generateText, type LanguageModel, type ModelMessage } from "ai";
import { ConversationState } from "../conversation/ConversationState.js";
import { RemoteApiError, describeError } from "../errors/index.js";
import { createDeadline } from "../../utils/abort.js";
import { formatDuration } from "../../process/utils/time.js";
import { getLogger, type Logger } from "../../utils/logger/index.js";
import type { AgentConfig } from "../../types/config.js";
import type { ConversationMessage, SendMessageOptions } from "../../types/conversation.js";

export const EMPTY_REPLY_MESSAGE = "Error: The AI's response was empty.";

function toModelMessage(message: ConversationMessage): ModelMessage {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "user":
      return { role: "user", content: message.content };
    case "assistant":
      return { role: "assistant", content: message.content };
  }
}

/**
 * Chat path of the agent: owns the conversation and talks to the completion API.
 *
 * `sendUserMessage` always resolves with text. Every failure mode (empty reply, HTTP error,
 * malformed payload, timeout, interrupt) discards the staged user message.
 */
export class ChatAgent {
  private readonly conversation: ConversationState;
  private readonly logger: Logger;

  constructor(
    private readonly config: AgentConfig,
    private readonly model: LanguageModel,
    logger?: Logger,
  ) {
    this.conversation = new ConversationState(config.systemPrompt);
    this.logger = logger ?? getLogger();
  }

  getMessages(): readonly ConversationMessage[] {
    return this.conversation.getMessages();
  }

  async sendUserMessage(text: string, options: SendMessageOptions = {}): Promise<string> {
    const turn = this.conversation.begin(text);
    const startedAt = Date.now();

    let reply: string;
    try {
      reply = await this.requestCompletion(turn.messages, options.signal);
    } catch (error) {
      const message =
        error instanceof RemoteApiError && error.reason !== "transport"
          ? `Error: ${error.message}`
          : `Error talking to the AI: ${describeError(error)}`;
      this.logger.warn("Chat turn failed, conversation rolled back", {
        error: describeError(error),
        durationMs: Date.now() - startedAt,
      });
      return message;
    }

    if (!reply) {
      this.logger.warn("Chat turn returned empty reply, conversation rolled back", {
        durationMs: Date.now() - startedAt,
      });
      return EMPTY_REPLY_MESSAGE;
    }

    turn.commit(reply);
    this.logger.debug("Chat turn completed", {
      durationMs: Date.now() - startedAt,
      messages: this.conversation.length,
    });
    return reply;
  }

  /**
   * One completion request, no retries. Throws `RemoteApiError` on any failure.
   *
   * The system prompt travels through `system`; the provider still sends it as the first
   * chat message.
   */
  private async requestCompletion(
    messages: readonly ConversationMessage[],
    signal?: AbortSignal,
  ): Promise<string> {
    const { model, maxTokens, temperature, timeoutMs } = this.config.llm;
    this.logger.debug(`Requesting completion from ${model}`, { messages: messages.length });
    const deadline = createDeadline(timeoutMs, signal);

    try {
      const result = await generateText({
        model: this.model,
        system: messages
          .filter((message) => message.role === "system")
          .map((message) => message.content)
          .join("\n"),
        messages: messages.filter((message) => message.role !== "system").map(toModelMessage),
        maxOutputTokens: maxTokens,
        temperature,
        maxRetries: 0,
        abortSignal: deadline.signal,
      });
      return result.text;
    } catch (error) {
      if (deadline.timedOut()) {
        throw new RemoteApiError(
          `The request to the AI timed out after ${formatDuration(timeoutMs)}.`,
          "timeout",
          { cause: error },
        );
      }
      if (deadline.interrupted()) {
        throw new RemoteApiError("The request to the AI was interrupted.", "interrupted", {
          cause: error,
        });
      }
      throw new RemoteApiError(describeError(error), "transport", { cause: error });
    } finally {
      deadline.dispose();
    }
  }
}
