import type { UpstreamPool } from "../client/pool.js";
import { makeGatewayError } from "../errors.js";
import { isNotification, isResponse, type JsonRpcMessage, type JsonRpcResponse } from "../types.js";
import { createLogger } from "../logger.js";

const log = createLogger("dispatch");

/**
 * Routes one JSON-RPC message to the upstream named by `route` and returns
 * the answer under the caller's own id, or null when nothing answers.
 *
 * The gateway owns the upstream handshake, so `initialize` is served from
 * the cached result and `notifications/initialized` stops here. `ping` never
 * leaves the gateway.
 */
export class Dispatcher {
  constructor(private readonly pool: UpstreamPool) {}

  async dispatch(route: string, message: JsonRpcMessage): Promise<JsonRpcResponse | null> {
    if (!this.pool.has(route)) {
      throw makeGatewayError("route_not_found", `Unknown route: ${route}`, { route });
    }

    if (isResponse(message)) {
      log.debug("Ignoring response posted by client", { route, id: message.id });
      return null;
    }

    if (isNotification(message)) {
      if (message.method === "notifications/initialized") {
        return null;
      }
      const { client } = await this.pool.acquire(route);
      await client.notify(message.method, message.params);
      return null;
    }

    if (message.method === "ping") {
      return { jsonrpc: "2.0", id: message.id, result: {} };
    }

    const { client, init } = await this.pool.acquire(route);
    if (message.method === "initialize") {
      return { jsonrpc: "2.0", id: message.id, result: { ...init } };
    }

    const started = Date.now();
    const response = await client.request(message.method, message.params);
    log.debug("Upstream answered", { route, method: message.method, ms: Date.now() - started });
    return { ...response, id: message.id };
  }
}
