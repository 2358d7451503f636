import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import type { Transport as SdkTransport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { JSONRPCMessageSchema } from "@modelcontextprotocol/sdk/types.js";
import type { Transport } from "./types.js";
import type { JsonRpcMessage } from "../../types.js";
import { createLogger } from "../../logger.js";

const log = createLogger("memory-transport");

// Anything the SDK can serve: Server, McpServer.
export interface ConnectableServer {
  connect(transport: SdkTransport): Promise<void>;
  close(): Promise<void>;
}

/**
 * Links an MCP SDK server living in this process.
 */
export class InMemoryServerTransport implements Transport {
  readonly kind = "memory";
  private readonly link: InMemoryTransport;
  private readonly ready: Promise<void>;
  private onMsg: ((m: unknown) => void) | null = null;
  private closeListeners: Array<(reason?: Error) => void> = [];
  private closed = false;

  constructor(private readonly server: ConnectableServer) {
    const [clientSide, serverSide] = InMemoryTransport.createLinkedPair();
    this.link = clientSide;
    this.link.onmessage = (message) => this.onMsg?.(message);
    this.link.onclose = () => this.finish();
    this.ready = Promise.all([server.connect(serverSide), clientSide.start()]).then(() => undefined);
    // A failed link surfaces through send().
    this.ready.catch(() => undefined);
  }

  async send(msg: JsonRpcMessage): Promise<void> {
    if (this.closed) {
      throw new Error("In-memory transport is closed");
    }
    await this.ready;
    await this.link.send(JSONRPCMessageSchema.parse(msg));
  }

  onMessage(cb: (msg: unknown) => void): void {
    this.onMsg = cb;
  }

  onClose(cb: (reason?: Error) => void): void {
    this.closeListeners.push(cb);
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.server.close().catch((err: unknown) => {
      log.warn("Closing in-process server failed", { error: err instanceof Error ? err.message : String(err) });
    });
    this.finish();
  }

  private finish(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    const listeners = this.closeListeners;
    this.closeListeners = [];
    for (const listener of listeners) {
      listener();
    }
  }
}
