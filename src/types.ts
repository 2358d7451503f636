import { z } from 'zod';

// Protocol revision spoken by the legacy HTTP+SSE transport.
export const MCP_PROTOCOL_VERSION = '2024-11-05';

// --- Base JSON-RPC Types ---

export const JsonRpcIdSchema = z.union([z.string(), z.number()]);
export type JsonRpcId = z.infer<typeof JsonRpcIdSchema>;

export const JsonRpcRequestSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: JsonRpcIdSchema,
  method: z.string(),
  params: z.unknown().optional(), // Params validation is specific to the method
});
export type JsonRpcRequest = z.infer<typeof JsonRpcRequestSchema>;

export const JsonRpcNotificationSchema = z.object({
  jsonrpc: z.literal('2.0'),
  method: z.string(),
  params: z.unknown().optional(),
}).strict();
// `id?: never` keeps requests from passing for notifications in type guards.
export type JsonRpcNotification = z.infer<typeof JsonRpcNotificationSchema> & { id?: never };

export const JsonRpcErrorObjectSchema = z.object({
  code: z.number().int(),
  message: z.string(),
  data: z.unknown().optional(),
});
export type JsonRpcErrorObject = z.infer<typeof JsonRpcErrorObjectSchema>;

export const JsonRpcSuccessResponseSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: JsonRpcIdSchema,
  result: z.record(z.unknown()),
});
export type JsonRpcSuccessResponse = z.infer<typeof JsonRpcSuccessResponseSchema>;

export const JsonRpcErrorResponseSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: JsonRpcIdSchema.nullable(),
  error: JsonRpcErrorObjectSchema,
});
export type JsonRpcErrorResponse = z.infer<typeof JsonRpcErrorResponseSchema>;

export type JsonRpcResponse = JsonRpcSuccessResponse | JsonRpcErrorResponse;

export type JsonRpcMessage = JsonRpcRequest | JsonRpcNotification | JsonRpcResponse;

export function isRequest(message: JsonRpcMessage): message is JsonRpcRequest {
  return 'method' in message && 'id' in message;
}

export function isNotification(message: JsonRpcMessage): message is JsonRpcNotification {
  return 'method' in message && !('id' in message);
}

export function isResponse(message: JsonRpcMessage): message is JsonRpcResponse {
  return !('method' in message);
}

export function isErrorResponse(message: JsonRpcResponse): message is JsonRpcErrorResponse {
  return 'error' in message;
}

/**
 * Classifies an arbitrary value as one JSON-RPC 2.0 message kind.
 * Order matters: an error response also satisfies a schema with an optional
 * result, so errors are tried before successes.
 */
export function parseJsonRpcMessage(value: unknown): JsonRpcMessage | undefined {
  const request = JsonRpcRequestSchema.safeParse(value);
  if (request.success) return request.data;

  const notification = JsonRpcNotificationSchema.safeParse(value);
  if (notification.success) return notification.data;

  const failure = JsonRpcErrorResponseSchema.safeParse(value);
  if (failure.success) return failure.data;

  const success = JsonRpcSuccessResponseSchema.safeParse(value);
  if (success.success) return success.data;

  return undefined;
}

// Id of anything that looks like a JSON-RPC message, valid or not.
export function idOf(value: unknown): JsonRpcId | undefined {
  if (typeof value !== 'object' || value === null || !('id' in value)) {
    return undefined;
  }
  const id = JsonRpcIdSchema.safeParse(value.id);
  return id.success ? id.data : undefined;
}

// --- Connector envelope ---

// Body of POST /sse and of its 200 answer. Every field is optional and no
// other field is allowed; `params`, `result` and `error` must be objects.
export const McpSseQuerySchema = z.object({
  jsonrpc: z.string().optional(),
  id: JsonRpcIdSchema.optional(),
  method: z.string().optional(),
  params: z.record(z.unknown()).optional(),
  result: z.record(z.unknown()).optional(),
  error: z.record(z.unknown()).optional(),
}).strict();
export type McpSseQuery = z.infer<typeof McpSseQuerySchema>;

// --- MCP handshake ---

export const ImplementationSchema = z.object({
  name: z.string(),
  version: z.string(),
}).passthrough();
export type Implementation = z.infer<typeof ImplementationSchema>;

export const InitializeResultSchema = z.object({
  protocolVersion: z.string(),
  capabilities: z.record(z.unknown()),
  serverInfo: ImplementationSchema,
  instructions: z.string().optional(),
}).passthrough();
export type InitializeResult = z.infer<typeof InitializeResultSchema>;
