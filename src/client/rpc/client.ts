import { v4 as uuid } from "uuid";
import {
  InitializeResultSchema,
  MCP_PROTOCOL_VERSION,
  idOf,
  isErrorResponse,
  isNotification,
  isRequest,
  parseJsonRpcMessage,
  type InitializeResult,
  type JsonRpcId,
  type JsonRpcMessage,
  type JsonRpcRequest,
  type JsonRpcResponse,
} from "../../types.js";
import type { Transport } from "../transport/types.js";
import type { InitializeParams, NotificationListener, PendingCall, RpcClientOptions } from "./types.js";
import { describeError, makeGatewayError } from "../../errors.js";
import { createLogger } from "../../logger.js";

const log = createLogger("rpc");

export const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * JSON-RPC client over one upstream transport: correlates answers with
 * requests, enforces per-call timeouts, and fans out notifications.
 */
export class RpcClient {
  private pending = new Map<JsonRpcId, PendingCall>();
  private notificationListeners: NotificationListener[] = [];
  private initializePromise: Promise<InitializeResult> | null = null;
  private closed = false;
  private readonly timeoutMs: number;
  private readonly nextId: () => JsonRpcId;

  constructor(private t: Transport, options: RpcClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.nextId = options.idGenerator ?? (() => uuid());
    t.onMessage((value) => this.receive(value));
    t.onClose((reason) => {
      if (!this.closed) {
        log.warn("Upstream transport closed", { kind: t.kind, reason: reason?.message });
      }
      this.close();
    });
  }

  private receive(value: unknown): void {
    if (this.closed) {
      return;
    }
    const message = parseJsonRpcMessage(value);
    if (message) {
      this.handle(message);
      return;
    }
    // A malformed answer still settles the call it names.
    const id = idOf(value);
    const call = id === undefined ? undefined : this.pending.get(id);
    if (id === undefined || !call) {
      log.warn("Skipping upstream message that is not JSON-RPC", { message: value });
      return;
    }
    this.pending.delete(id);
    clearTimeout(call.timer);
    call.fail(makeGatewayError("invalid_response", `Upstream sent a malformed answer to ${call.method}`, { method: call.method }));
  }

  private handle(m: JsonRpcMessage): void {
    if (isNotification(m)) {
      for (const listener of this.notificationListeners) {
        listener(m);
      }
      return;
    }
    if (isRequest(m)) {
      this.answerUpstreamRequest(m);
      return;
    }
    if (m.id === null) {
      log.warn("Upstream reported an error without a request id", { error: m });
      return;
    }
    const call = this.pending.get(m.id);
    if (!call) {
      log.debug("Dropping answer for an unknown or expired request", { id: m.id });
      return;
    }
    this.pending.delete(m.id);
    clearTimeout(call.timer);
    call.settle(m);
  }

  // Servers may ping their client; nothing else is served back upstream.
  private answerUpstreamRequest(request: JsonRpcRequest): void {
    const reply: JsonRpcResponse =
      request.method === "ping"
        ? { jsonrpc: "2.0", id: request.id, result: {} }
        : makeGatewayError("method_not_found", `Method not supported by gateway: ${request.method}`).toResponse(request.id);
    this.t.send(reply).catch((err: unknown) => {
      log.warn("Failed to answer upstream request", { method: request.method, error: describeError(err) });
    });
  }

  /**
   * Runs the MCP handshake once; later calls share the first result.
   */
  performHandshake(clientName = "mcp-sse-gateway", clientVersion = "0.0.0"): Promise<InitializeResult> {
    if (!this.initializePromise) {
      this.initializePromise = this.initialize(clientName, clientVersion).catch((err: unknown) => {
        this.initializePromise = null;
        throw err;
      });
    }
    return this.initializePromise;
  }

  private async initialize(clientName: string, clientVersion: string): Promise<InitializeResult> {
    const params: InitializeParams = {
      protocolVersion: MCP_PROTOCOL_VERSION,
      capabilities: {},
      clientInfo: { name: clientName, version: clientVersion },
    };
    const result = await this.call("initialize", params);
    const parsed = InitializeResultSchema.safeParse(result);
    if (!parsed.success) {
      throw new Error(`Initialize failed: malformed result (${parsed.error.issues[0].message})`);
    }
    await this.notify("notifications/initialized");
    return parsed.data;
  }

  /**
   * Sends a request and resolves with the upstream's answer, error answers
   * included. Rejects on timeout, send failure or connection loss.
   */
  request(method: string, params?: unknown, timeoutMs = this.timeoutMs): Promise<JsonRpcResponse> {
    if (this.closed) {
      return Promise.reject(makeGatewayError("connection_closed", "Upstream connection closed"));
    }
    const id = this.nextId();
    const req: JsonRpcRequest = { jsonrpc: "2.0", id, method };
    if (params !== undefined) {
      req.params = params;
    }

    return new Promise<JsonRpcResponse>((resolve, reject) => {
      const call: PendingCall = { method, settle: resolve, fail: reject };
      call.timer = setTimeout(() => {
        if (this.pending.delete(id)) {
          reject(makeGatewayError("request_timeout", `Upstream did not answer ${method} within ${timeoutMs} ms`, { method, timeoutMs }));
        }
      }, timeoutMs);
      this.pending.set(id, call);

      this.t.send(req).catch((err: unknown) => {
        if (this.pending.delete(id)) {
          clearTimeout(call.timer);
          reject(makeGatewayError("upstream_unavailable", `Sending ${method} upstream failed: ${describeError(err)}`));
        }
      });
    });
  }

  // Like request(), but an error answer becomes a rejection.
  async call(method: string, params?: unknown): Promise<Record<string, unknown>> {
    const response = await this.request(method, params);
    if (isErrorResponse(response)) {
      throw new Error(`RPC Error: ${response.error.message} (Code: ${response.error.code})`);
    }
    return response.result;
  }

  async notify(method: string, params?: unknown): Promise<void> {
    if (this.closed) {
      throw makeGatewayError("connection_closed", "Upstream connection closed");
    }
    await this.t.send(params === undefined ? { jsonrpc: "2.0", method } : { jsonrpc: "2.0", method, params });
  }

  onNotification(listener: NotificationListener): () => void {
    this.notificationListeners.push(listener);
    return () => {
      this.notificationListeners = this.notificationListeners.filter((candidate) => candidate !== listener);
    };
  }

  pendingCount(): number {
    return this.pending.size;
  }

  isClosed(): boolean {
    return this.closed;
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true; // set first so handle() ignores late messages
    try {
      this.t.close();
    } catch (e) {
      log.warn("Error closing transport", { error: describeError(e) });
    }
    for (const call of this.pending.values()) {
      clearTimeout(call.timer);
      call.fail(makeGatewayError("connection_closed", "Upstream connection closed", { method: call.method }));
    }
    this.pending.clear();
  }
}
