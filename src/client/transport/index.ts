import { StdioTransport } from "./stdio.js";
import { SseTransport } from "./sse.js";
import type { Transport } from "./types.js";
import { isSseServer, type ServerConfig } from "../config/manager.js";

export function createTransport(cfg: ServerConfig): Transport {
  if (isSseServer(cfg)) {
    return new SseTransport(cfg.sseUrl, cfg.headers);
  }
  return new StdioTransport(cfg);
}

export { InMemoryServerTransport, type ConnectableServer } from "./memory.js";
export type { Transport, TransportKind } from "./types.js";
