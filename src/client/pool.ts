import { RpcClient } from "./rpc/client.js";
import { createTransport, type Transport, type TransportKind } from "./transport/index.js";
import { isSseServer, type ConfigManager } from "./config/manager.js";
import { describeError, makeGatewayError } from "../errors.js";
import type { Implementation, InitializeResult, JsonRpcNotification } from "../types.js";
import { createLogger } from "../logger.js";

const log = createLogger("pool");

export interface RouteDefinition {
  kind: TransportKind;
  create: () => Transport;
}

export interface UpstreamConnection {
  route: string;
  client: RpcClient;
  init: InitializeResult;
}

export interface RouteStatus {
  route: string;
  kind: TransportKind;
  connected: boolean;
  serverInfo?: Implementation;
}

export interface UpstreamPoolOptions {
  clientName: string;
  clientVersion: string;
  requestTimeoutMs: number;
}

export type RouteNotificationListener = (route: string, notification: JsonRpcNotification) => void;

/**
 * Keeps one handshaken client per route. Connections open on first use and
 * are dropped when their transport closes, so the next use reconnects.
 */
export class UpstreamPool {
  private definitions = new Map<string, RouteDefinition>();
  private connections = new Map<string, Promise<UpstreamConnection>>();
  private ready = new Map<string, UpstreamConnection>();
  private listeners: RouteNotificationListener[] = [];
  private closed = false;

  constructor(private readonly options: UpstreamPoolOptions) {}

  static fromConfig(config: ConfigManager, options: UpstreamPoolOptions): UpstreamPool {
    const pool = new UpstreamPool(options);
    for (const [route, cfg] of Object.entries(config.getAllServers())) {
      pool.register(route, { kind: isSseServer(cfg) ? "sse" : "stdio", create: () => createTransport(cfg) });
    }
    return pool;
  }

  register(route: string, definition: RouteDefinition): void {
    if (this.definitions.has(route)) {
      throw new Error(`Route '${route}' is already registered`);
    }
    this.definitions.set(route, definition);
  }

  has(route: string): boolean {
    return this.definitions.has(route);
  }

  routes(): string[] {
    return [...this.definitions.keys()];
  }

  acquire(route: string): Promise<UpstreamConnection> {
    const definition = this.definitions.get(route);
    if (!definition) {
      return Promise.reject(makeGatewayError("route_not_found", `Unknown route: ${route}`, { route }));
    }
    const existing = this.connections.get(route);
    if (existing) {
      return existing;
    }
    const attempt: Promise<UpstreamConnection> = this.connect(route, definition, () => this.evict(route, attempt));
    this.connections.set(route, attempt);
    attempt.catch(() => this.evict(route, attempt));
    return attempt;
  }

  private async connect(route: string, definition: RouteDefinition, onLost: () => void): Promise<UpstreamConnection> {
    if (this.closed) {
      throw makeGatewayError("upstream_unavailable", "Gateway is shutting down", { route });
    }
    let transport: Transport;
    try {
      transport = definition.create();
    } catch (err) {
      throw makeGatewayError("upstream_unavailable", `Route '${route}' is unavailable: ${describeError(err)}`, { route });
    }
    const client = new RpcClient(transport, { timeoutMs: this.options.requestTimeoutMs });
    transport.onClose(onLost);

    let init: InitializeResult;
    try {
      init = await client.performHandshake(this.options.clientName, this.options.clientVersion);
    } catch (err) {
      client.close();
      throw makeGatewayError("upstream_unavailable", `Route '${route}' is unavailable: ${describeError(err)}`, { route });
    }
    if (this.closed) {
      client.close();
      throw makeGatewayError("upstream_unavailable", "Gateway is shutting down", { route });
    }

    client.onNotification((notification) => {
      for (const listener of this.listeners) {
        listener(route, notification);
      }
    });

    const connection: UpstreamConnection = { route, client, init };
    this.ready.set(route, connection);
    log.info("Upstream connected", { route, kind: definition.kind, server: init.serverInfo.name });
    return connection;
  }

  private evict(route: string, attempt: Promise<UpstreamConnection>): void {
    if (this.connections.get(route) !== attempt) {
      return;
    }
    this.connections.delete(route);
    if (this.ready.delete(route)) {
      log.info("Upstream disconnected", { route });
    }
  }

  onNotification(listener: RouteNotificationListener): void {
    this.listeners.push(listener);
  }

  status(): RouteStatus[] {
    return [...this.definitions].map(([route, definition]) => {
      const connection = this.ready.get(route);
      const status: RouteStatus = { route, kind: definition.kind, connected: false };
      if (connection && !connection.client.isClosed()) {
        status.connected = true;
        status.serverInfo = connection.init.serverInfo;
      }
      return status;
    });
  }

  close(): void {
    this.closed = true;
    for (const connection of this.ready.values()) {
      connection.client.close();
    }
    this.ready.clear();
    this.connections.clear();
  }
}
