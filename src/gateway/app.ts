import express, { type ErrorRequestHandler, type Request, type RequestHandler, type Response } from "express";
import cors from "cors";
import { Dispatcher } from "./dispatcher.js";
import { SessionRegistry } from "./sessions.js";
import { API_KEY_HEADER, requireApiKey } from "./auth.js";
import { ROUTE_HEADER, buildConnectorDefinition } from "./connector.js";
import type { UpstreamPool } from "../client/pool.js";
import type { GatewayConfig } from "../config.js";
import { GatewayError, makeGatewayError, toGatewayError } from "../errors.js";
import { McpSseQuerySchema, idOf, isRequest, parseJsonRpcMessage, type JsonRpcMessage } from "../types.js";
import { createLogger } from "../logger.js";

const log = createLogger("http");

export const SSE_PATH = "/sse";

export type GatewayAppConfig = Pick<
  GatewayConfig,
  "apiKeys" | "bodyLimit" | "corsOrigin" | "keepaliveMs" | "maxSessions" | "publicHost"
>;

export interface GatewayAppOptions {
  config: GatewayAppConfig;
  pool: UpstreamPool;
  version: string;
}

export interface GatewayApp {
  app: express.Express;
  sessions: SessionRegistry;
  dispatcher: Dispatcher;
  close(): void;
}

/**
 * Validates a POST body against the connector envelope and classifies it.
 */
export function parseEnvelope(body: unknown): JsonRpcMessage {
  const envelope = McpSseQuerySchema.safeParse(body);
  if (!envelope.success) {
    const issue = envelope.error.issues[0];
    const where = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw makeGatewayError("invalid_request", `Invalid request body: ${where}${issue.message}`);
  }
  if (envelope.data.jsonrpc !== "2.0") {
    throw makeGatewayError("invalid_request", 'Unsupported jsonrpc version, expected "2.0"');
  }
  const message = parseJsonRpcMessage(envelope.data);
  if (!message) {
    throw makeGatewayError("invalid_request", "Body is not a JSON-RPC request, notification or response");
  }
  return message;
}

export function routeHeaderOf(req: Request): string {
  const route = req.header(ROUTE_HEADER)?.trim();
  if (!route) {
    throw makeGatewayError("invalid_request", `Missing required header: ${ROUTE_HEADER}`);
  }
  return route;
}

// body-parser failures carry an http-errors `type` and `status`.
function fromHttpError(err: unknown): GatewayError {
  if (err instanceof GatewayError) {
    return err;
  }
  if (typeof err === "object" && err !== null && "type" in err && typeof err.type === "string") {
    if (err.type === "entity.parse.failed") {
      return makeGatewayError("parse_error", "Request body is not valid JSON");
    }
    if (err.type === "entity.too.large") {
      return makeGatewayError("payload_too_large", "Request body is too large");
    }
    if ("status" in err && err.status === 415) {
      return makeGatewayError("invalid_request", "Unsupported request body encoding");
    }
  }
  return toGatewayError(err);
}

export function createGatewayApp(options: GatewayAppOptions): GatewayApp {
  const { config, pool, version } = options;
  const sessions = new SessionRegistry({
    maxSessions: config.maxSessions,
    keepaliveMs: config.keepaliveMs,
    endpointPath: SSE_PATH,
  });
  const dispatcher = new Dispatcher(pool);

  pool.onNotification((route, notification) => {
    sessions.broadcast(route, notification).then(
      (delivered) => log.debug("Forwarded upstream notification", { route, method: notification.method, sessions: delivered }),
      (err: unknown) => log.warn("Forwarding upstream notification failed", { route, error: String(err) }),
    );
  });

  const deliverLater = (sessionId: string, route: string, message: JsonRpcMessage): void => {
    dispatcher
      .dispatch(route, message)
      .then(
        async (response) => {
          if (response) {
            await sessions.deliver(sessionId, response);
          }
        },
        async (err: unknown) => {
          const gatewayError = toGatewayError(err);
          log.warn("Deferred dispatch failed", { sessionId, route, code: gatewayError.code, error: gatewayError.message });
          if (isRequest(message)) {
            await sessions.deliver(sessionId, gatewayError.toResponse(message.id));
          }
        },
      )
      .catch((err: unknown) => {
        log.error("Delivering deferred answer failed", { sessionId, error: String(err) });
      });
  };

  const handlePost = async (req: Request, res: Response): Promise<void> => {
    const route = routeHeaderOf(req);
    const message = parseEnvelope(req.body);
    const sessionId = typeof req.query.sessionId === "string" ? req.query.sessionId : undefined;

    if (sessionId !== undefined) {
      const session = sessions.require(sessionId);
      if (!pool.has(route)) {
        throw makeGatewayError("route_not_found", `Unknown route: ${route}`, { route });
      }
      session.routes.add(route);
      res.status(201).json({});
      deliverLater(session.id, route, message);
      return;
    }

    const response = await dispatcher.dispatch(route, message);
    if (response === null) {
      res.status(202).json({});
      return;
    }
    res.status(200).json(response);
  };

  const checkRouteHeader: RequestHandler = (req, _res, next) => {
    routeHeaderOf(req);
    next();
  };

  const app = express();
  app.disable("x-powered-by");

  if (config.corsOrigin) {
    app.use(
      cors({
        origin: config.corsOrigin,
        allowedHeaders: ["Content-Type", API_KEY_HEADER, ROUTE_HEADER],
        exposedHeaders: ["Content-Length"],
        methods: ["GET", "POST", "OPTIONS"],
        maxAge: 600,
      }),
    );
  }

  app.get("/health", (_req, res) => {
    res.json({
      status: "healthy",
      service: "mcp-sse-gateway",
      version,
      sessions: sessions.size,
      routes: pool.routes(),
      timestamp: new Date().toISOString(),
    });
  });

  app.get("/connector.json", (req, res) => {
    res.json(
      buildConnectorDefinition({
        title: "MCP SSE Gateway",
        description: `MCP servers reachable through this gateway: ${pool.routes().join(", ") || "none"}`,
        version,
        host: config.publicHost ?? req.get("host") ?? "localhost",
        ssePath: SSE_PATH,
      }),
    );
  });

  app.get(SSE_PATH, requireApiKey(config.apiKeys), (_req, res, next) => {
    sessions.open(res).catch(next);
  });

  // The body is read first so that every error envelope can carry its id.
  app.post(
    SSE_PATH,
    express.json({ limit: config.bodyLimit }),
    requireApiKey(config.apiKeys),
    checkRouteHeader,
    (req, res, next) => {
      handlePost(req, res).catch(next);
    },
  );

  const errorHandler: ErrorRequestHandler = (err: unknown, req, res, _next) => {
    const gatewayError = fromHttpError(err);
    if (gatewayError.kind === "internal_error") {
      log.error("Request failed", { path: req.path, error: err instanceof Error ? err.stack ?? err.message : String(err) });
    } else {
      log.debug("Request rejected", { path: req.path, code: gatewayError.code, error: gatewayError.message });
    }
    if (res.headersSent) {
      res.end();
      return;
    }
    res.status(gatewayError.httpStatus).json(gatewayError.toResponse(idOf(req.body) ?? null));
  };
  app.use(errorHandler);

  return {
    app,
    sessions,
    dispatcher,
    close: () => sessions.closeAll(),
  };
}
