import type { JsonObject, JsonValue } from "../../types/Json.js";
import { indentBlock, truncate } from "../text.js";

export type ProviderFetch = (
  input: string | URL | Request,
  init?: RequestInit,
) => Promise<Response>;

type FormattedMessage = {
  role: string;
  content: string;
};

function isJsonObject(value: JsonValue | null | undefined): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function getStringField(objectValue: JsonObject, field: string): string | undefined {
  const value = objectValue[field];
  return typeof value === "string" ? value : undefined;
}

function safeJsonParse(input: string | undefined): JsonObject | null {
  if (typeof input !== "string") return null;
  const trimmed = input.trim();
  if (!trimmed.startsWith("{")) return null;
  try {
    const parsed: JsonValue = JSON.parse(trimmed);
    return isJsonObject(parsed) ? parsed : null;
  } catch {
    // Not JSON: the caller logs the request without a payload.
    return null;
  }
}

function contentToText(content: JsonValue | undefined, maxChars: number): string {
  if (typeof content === "string") return truncate(content, maxChars);
  if (Array.isArray(content)) {
    const parts = content
      .map((part) =>
        isJsonObject(part) && getStringField(part, "type") === "text"
          ? (getStringField(part, "text") ?? "")
          : "",
      )
      .filter(Boolean)
      .join("\n");
    return truncate(parts, maxChars);
  }
  return truncate(JSON.stringify(content ?? ""), maxChars);
}

function formatMessagesForLog(messages: JsonValue[], maxContentChars: number): FormattedMessage[] {
  const out: FormattedMessage[] = [];
  for (const message of messages) {
    if (!isJsonObject(message)) continue;
    out.push({
      role: getStringField(message, "role") ?? "unknown",
      content: contentToText(message.content, maxContentChars),
    });
  }
  return out;
}

/**
 * Renders an outgoing chat-completion request as a readable block plus structured meta.
 *
 * Returns null when there is no body to describe (e.g. a GET).
 */
export function parseFetchRequestForLog(
  input: string | URL | Request,
  init?: RequestInit,
): { requestText: string; meta: JsonObject } | null {
  const url =
    typeof input === "string" ? input : input instanceof URL ? input.toString() : input.url;
  const method = String(init?.method || (input instanceof Request ? input.method : "GET"));

  const initBody = typeof init?.body === "string" ? init.body : undefined;
  if (!initBody) return null;

  const payload = safeJsonParse(initBody);
  if (!payload) {
    return {
      requestText: `===== LLM REQUEST BEGIN =====\nmethod: ${method}\nurl: ${url}\n(non-JSON body)\n===== LLM REQUEST END =====`,
      meta: { kind: "llm_request", url, method },
    };
  }

  const model = getStringField(payload, "model");
  const rawMessages = payload.messages;
  const messages = Array.isArray(rawMessages)
    ? formatMessagesForLog(rawMessages, 2000)
    : null;

  const lines: string[] = [
    "===== LLM REQUEST BEGIN =====",
    `method: ${method}`,
    `url: ${url}`,
    ...(model ? [`model: ${model}`] : []),
  ];
  if (messages) {
    lines.push(`messages: ${JSON.stringify(messages, null, 2)}`);
  } else {
    lines.push(["payload:", indentBlock(truncate(JSON.stringify(payload), 12000), "  ")].join("\n"));
  }
  lines.push("===== LLM REQUEST END =====");

  return {
    requestText: lines.join("\n"),
    meta: {
      kind: "llm_request",
      url,
      method,
      ...(model ? { model } : {}),
      messagesCount: messages ? messages.length : 0,
    },
  };
}
