import type { JsonRpcMessage } from "../../types.js";

export type TransportKind = "stdio" | "sse" | "memory";

export interface Transport {
  readonly kind: TransportKind;
  send(msg: JsonRpcMessage): Promise<void>;
  // Receives every decoded JSON value; telling messages apart is up to the listener.
  onMessage(cb: (msg: unknown) => void): void;
  // Fires once, when the connection ends for any reason.
  onClose(cb: (reason?: Error) => void): void;
  close(): void;
}
