import { InvalidToolCallError } from "./errors";
import type { ToolCall } from "./types";
import { isRecord } from "./util";

export type ToolCallInput = {
  tool_name: string;
  arguments?: Record<string, unknown>;
  roles?: readonly string[];
  actor?: string;
  request_id?: string;
  client?: Record<string, unknown>;
};

/**
 * Builds a frozen ToolCall. Top-level containers are copied before freezing so
 * the caller's own objects are left alone; nested argument values are shared.
 */
export function createToolCall(input: ToolCallInput): ToolCall {
  if (typeof input.tool_name !== "string" || input.tool_name.trim() === "") {
    throw new InvalidToolCallError("tool_name must be a non-empty string");
  }
  const call: ToolCall = {
    tool_name: input.tool_name,
    arguments: Object.freeze({ ...(input.arguments ?? {}) }),
    roles: Object.freeze([...new Set(input.roles ?? [])]),
    ...(input.actor !== undefined ? { actor: input.actor } : {}),
    ...(input.request_id !== undefined ? { request_id: input.request_id } : {}),
    ...(input.client !== undefined ? { client: Object.freeze({ ...input.client }) } : {}),
  };
  return Object.freeze(call);
}

/** Builds a ToolCall from untrusted JSON (HTTP body, CLI stdin). */
export function parseToolCall(input: unknown): ToolCall {
  if (!isRecord(input)) {
    throw new InvalidToolCallError("tool call must be an object");
  }
  const { tool_name, arguments: args, roles, actor, request_id, client } = input;
  if (typeof tool_name !== "string") {
    throw new InvalidToolCallError("tool_name must be a non-empty string");
  }
  if (args !== undefined && !isRecord(args)) {
    throw new InvalidToolCallError("arguments must be an object");
  }
  if (roles !== undefined && !isStringArray(roles)) {
    throw new InvalidToolCallError("roles must be an array of strings");
  }
  if (actor !== undefined && typeof actor !== "string") {
    throw new InvalidToolCallError("actor must be a string");
  }
  if (request_id !== undefined && typeof request_id !== "string") {
    throw new InvalidToolCallError("request_id must be a string");
  }
  if (client !== undefined && !isRecord(client)) {
    throw new InvalidToolCallError("client must be an object");
  }
  return createToolCall({ tool_name, arguments: args, roles, actor, request_id, client });
}

/** UTF-8 size of the JSON-serialized arguments; unserializable arguments count as unbounded. */
export function argumentsSizeBytes(call: ToolCall): number {
  try {
    return Buffer.byteLength(JSON.stringify(call.arguments), "utf8");
  } catch {
    return Number.POSITIVE_INFINITY;
  }
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}
