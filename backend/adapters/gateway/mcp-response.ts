import { z } from "zod";

import { GatewayError } from "@/backend/application/errors";

const jsonRpcErrorSchema = z.object({
  code: z.number().optional(),
  message: z.string(),
  data: z.unknown().optional(),
});

const toolCallResultSchema = z.object({
  content: z
    .array(z.object({ type: z.string(), text: z.string().optional() }).passthrough())
    .optional(),
  structuredContent: z.record(z.unknown()).optional(),
  isError: z.boolean().optional(),
});

/**
 * Reads a JSON-RPC response that arrived either as a JSON body or as
 * `data: {json}` lines of an event stream, returning its `result`.
 * With `expectedId`, messages answering another request are skipped; an
 * error with a null id (the server could not read the request) still counts.
 */
export async function readJsonRpcResult(response: Response, expectedId?: number | string): Promise<unknown> {
  const contentType = response.headers.get("content-type") ?? "";
  const text = await response.text();

  const payloads = contentType.includes("text/event-stream") ? eventStreamPayloads(text) : [text];

  for (const payload of payloads) {
    const message = safeJsonParse(payload);
    if (!isRecord(message) || !answers(message, expectedId)) {
      continue;
    }

    if ("error" in message) {
      const error = jsonRpcErrorSchema.safeParse(message.error);
      throw new GatewayError(`Gateway returned error: ${error.success ? error.data.message : "unknown error"}`);
    }

    if ("result" in message) {
      return message.result;
    }
  }

  throw new GatewayError(
    contentType.includes("text/event-stream")
      ? "No valid data found in event stream response"
      : "Unexpected response format from gateway",
  );
}

/** MCP tool results wrap their payload; prefer `structuredContent`, then JSON in the first text item. */
export function unwrapToolResult(result: unknown): unknown {
  const parsed = toolCallResultSchema.safeParse(result);
  if (!parsed.success || (!parsed.data.content && !parsed.data.structuredContent)) {
    return result;
  }

  const textItem = parsed.data.content?.find((item) => item.type === "text" && item.text !== undefined);

  if (parsed.data.isError) {
    throw new GatewayError(`Gateway tool failed: ${textItem?.text ?? "unknown error"}`);
  }

  if (parsed.data.structuredContent) {
    return parsed.data.structuredContent;
  }

  if (textItem?.text === undefined) {
    return result;
  }

  const decoded = safeJsonParse(textItem.text);
  if (decoded === undefined) {
    throw new GatewayError("Gateway tool returned non-JSON text content");
  }

  return decoded;
}

export function eventStreamPayloads(body: string): string[] {
  return body
    .split(/\r?\n/)
    .filter((line) => line.startsWith("data:"))
    .map((line) => line.slice("data:".length).trim())
    .filter((payload) => payload.length > 0);
}

function answers(message: Record<string, unknown>, expectedId: number | string | undefined): boolean {
  if (expectedId === undefined) {
    return true;
  }

  if (message.id === expectedId) {
    return true;
  }

  return message.id === null && "error" in message;
}

function safeJsonParse(text: string): unknown {
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch {
    return undefined;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
