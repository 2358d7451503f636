import { ErrorCode } from "@modelcontextprotocol/sdk/types.js";
import type { JsonRpcErrorResponse, JsonRpcId } from "./types.js";

export type GatewayErrorKind =
  | "parse_error"
  | "invalid_request"
  | "method_not_found"
  | "payload_too_large"
  | "connection_closed"
  | "request_timeout"
  | "unauthorized"
  | "route_not_found"
  | "session_not_found"
  | "upstream_unavailable"
  | "too_many_sessions"
  | "invalid_response"
  | "internal_error";

const ERROR_TABLE: Record<GatewayErrorKind, { code: number; httpStatus: number }> = {
  parse_error: { code: ErrorCode.ParseError, httpStatus: 400 },
  invalid_request: { code: ErrorCode.InvalidRequest, httpStatus: 400 },
  method_not_found: { code: ErrorCode.MethodNotFound, httpStatus: 200 },
  payload_too_large: { code: ErrorCode.InvalidRequest, httpStatus: 413 },
  connection_closed: { code: ErrorCode.ConnectionClosed, httpStatus: 502 },
  request_timeout: { code: ErrorCode.RequestTimeout, httpStatus: 504 },
  unauthorized: { code: -32010, httpStatus: 401 },
  route_not_found: { code: -32011, httpStatus: 404 },
  session_not_found: { code: -32012, httpStatus: 404 },
  upstream_unavailable: { code: -32013, httpStatus: 502 },
  too_many_sessions: { code: -32014, httpStatus: 503 },
  invalid_response: { code: -32015, httpStatus: 502 },
  internal_error: { code: ErrorCode.InternalError, httpStatus: 500 },
};

export class GatewayError extends Error {
  readonly code: number;
  readonly httpStatus: number;

  constructor(
    readonly kind: GatewayErrorKind,
    message: string,
    readonly data?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "GatewayError";
    this.code = ERROR_TABLE[kind].code;
    this.httpStatus = ERROR_TABLE[kind].httpStatus;
  }

  toResponse(id: JsonRpcId | null): JsonRpcErrorResponse {
    const error: JsonRpcErrorResponse["error"] = { code: this.code, message: this.message };
    if (this.data !== undefined) {
      error.data = this.data;
    }
    return { jsonrpc: "2.0", id, error };
  }
}

export function makeGatewayError(
  kind: GatewayErrorKind,
  message: string,
  data?: Record<string, unknown>,
): GatewayError {
  return new GatewayError(kind, message, data);
}

/**
 * Anything that is not already a GatewayError becomes an internal error.
 * The original message stays on the server side.
 */
export function toGatewayError(error: unknown): GatewayError {
  if (error instanceof GatewayError) {
    return error;
  }
  return new GatewayError("internal_error", "Internal gateway error");
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
