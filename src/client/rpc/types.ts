import type { Implementation, JsonRpcId, JsonRpcNotification, JsonRpcResponse } from "../../types.js";

export interface InitializeParams {
  protocolVersion: string;
  capabilities: Record<string, unknown>;
  clientInfo: Implementation;
}

export interface RpcClientOptions {
  // Applied when a call gives no timeout of its own.
  timeoutMs?: number;
  idGenerator?: () => JsonRpcId;
}

export type NotificationListener = (notification: JsonRpcNotification) => void;

export interface PendingCall {
  method: string;
  settle: (response: JsonRpcResponse) => void;
  fail: (error: Error) => void;
  timer?: NodeJS.Timeout;
}
