/**
 * Shared JSON types.
 *
 * Key points
 * - Constrains serializable data passed between modules (log details, request dumps).
 * - Keeps business code free of broad casts.
 */

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonObject | JsonValue[];

export type JsonObject = {
  [key: string]: JsonValue;
};
