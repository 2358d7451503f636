import type { Server } from "node:http";
import { createGatewayApp, type GatewayApp } from "./app.js";
import { UpstreamPool } from "../client/pool.js";
import type { ConfigManager } from "../client/config/manager.js";
import { registerBuiltinRoute } from "../builtin/server.js";
import type { GatewayConfig } from "../config.js";
import { packageInfo } from "../version.js";
import { createLogger } from "../logger.js";

const log = createLogger("gateway");

export interface RunningGateway {
  url: string;
  gateway: GatewayApp;
  pool: UpstreamPool;
  server: Server;
  close(): Promise<void>;
}

export function createGatewayPool(registry: ConfigManager, config: Pick<GatewayConfig, "requestTimeoutMs" | "builtinRoute">): UpstreamPool {
  const { name, version } = packageInfo();
  const pool = UpstreamPool.fromConfig(registry, {
    clientName: name,
    clientVersion: version,
    requestTimeoutMs: config.requestTimeoutMs,
  });
  if (config.builtinRoute) {
    if (registry.has(config.builtinRoute)) {
      throw new Error(`Route '${config.builtinRoute}' is reserved for the built-in server; rename it in ${registry.path}`);
    }
    registerBuiltinRoute(pool, config.builtinRoute, version);
  }
  return pool;
}

/**
 * Listens on the configured address with an already built pool.
 */
export async function startGateway(config: GatewayConfig, pool: UpstreamPool): Promise<RunningGateway> {
  if (config.apiKeys.length === 0) {
    throw new Error("No API keys configured; set MCP_GATEWAY_API_KEYS");
  }
  const gateway = createGatewayApp({ config, pool, version: packageInfo().version });

  const server = await new Promise<Server>((resolve, reject) => {
    const listening = gateway.app.listen(config.port, config.host, () => resolve(listening));
    listening.once("error", reject);
  });

  const address = server.address();
  const port = typeof address === "object" && address !== null ? address.port : config.port;
  const host = config.host === "0.0.0.0" || config.host === "::" ? "localhost" : config.host;
  const url = `http://${host}:${port}`;
  log.info("Gateway listening", { url, routes: pool.routes() });

  let closing: Promise<void> | undefined;
  const close = (): Promise<void> => {
    closing ??= new Promise<void>((resolve, reject) => {
      gateway.close();
      pool.close();
      server.close((err) => (err ? reject(err) : resolve()));
      server.closeAllConnections();
    });
    return closing;
  };

  return { url, gateway, pool, server, close };
}
