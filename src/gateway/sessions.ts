import type { ServerResponse } from "node:http";
import { SSEServerTransport } from "@modelcontextprotocol/sdk/server/sse.js";
import { JSONRPCMessageSchema } from "@modelcontextprotocol/sdk/types.js";
import { writeSseComment } from "./sse.js";
import { describeError, makeGatewayError } from "../errors.js";
import type { JsonRpcMessage } from "../types.js";
import { createLogger } from "../logger.js";

const log = createLogger("sessions");

export interface GatewaySession {
  id: string;
  createdAt: Date;
  // Routes this session has posted to; their notifications are forwarded here.
  routes: Set<string>;
  transport: SSEServerTransport;
  res: ServerResponse;
}

export interface SessionRegistryOptions {
  maxSessions: number;
  keepaliveMs: number;
  // Path the `endpoint` event points at; the transport appends `?sessionId=`.
  endpointPath: string;
}

export class SessionRegistry {
  private sessions = new Map<string, GatewaySession>();
  private timers = new Map<string, NodeJS.Timeout>();

  constructor(private readonly options: SessionRegistryOptions) {}

  /**
   * Turns the response into an event stream and announces where to post.
   */
  async open(res: ServerResponse): Promise<GatewaySession> {
    if (this.sessions.size >= this.options.maxSessions) {
      throw makeGatewayError("too_many_sessions", `Session limit of ${this.options.maxSessions} reached`);
    }
    const transport = new SSEServerTransport(this.options.endpointPath, res);
    const session: GatewaySession = {
      id: transport.sessionId,
      createdAt: new Date(),
      routes: new Set(),
      transport,
      res,
    };
    this.sessions.set(session.id, session);
    transport.onclose = () => this.forget(session.id);

    await transport.start();

    const timer = setInterval(() => {
      if (!writeSseComment(res, "keepalive")) {
        this.close(session.id);
      }
    }, this.options.keepaliveMs);
    timer.unref();
    this.timers.set(session.id, timer);

    log.info("Session opened", { sessionId: session.id, open: this.sessions.size });
    return session;
  }

  get(id: string): GatewaySession | undefined {
    return this.sessions.get(id);
  }

  require(id: string): GatewaySession {
    const session = this.sessions.get(id);
    if (!session) {
      throw makeGatewayError("session_not_found", `Unknown or closed session: ${id}`, { sessionId: id });
    }
    return session;
  }

  async deliver(id: string, message: JsonRpcMessage): Promise<boolean> {
    const session = this.sessions.get(id);
    if (!session) {
      log.warn("Dropping message for closed session", { sessionId: id });
      return false;
    }
    return this.sendTo(session, message);
  }

  /**
   * Sends to every open session that has used the route.
   */
  async broadcast(route: string, message: JsonRpcMessage): Promise<number> {
    const targets = [...this.sessions.values()].filter((session) => session.routes.has(route));
    const sent = await Promise.all(targets.map((session) => this.sendTo(session, message)));
    return sent.filter(Boolean).length;
  }

  private async sendTo(session: GatewaySession, message: JsonRpcMessage): Promise<boolean> {
    // Error answers without an id have no place on the stream.
    const parsed = JSONRPCMessageSchema.safeParse(message);
    if (!parsed.success) {
      log.warn("Dropping message the stream cannot carry", { sessionId: session.id });
      return false;
    }
    try {
      await session.transport.send(parsed.data);
      return true;
    } catch (err) {
      log.warn("Writing to session failed", { sessionId: session.id, error: describeError(err) });
      this.close(session.id);
      return false;
    }
  }

  close(id: string): void {
    const session = this.sessions.get(id);
    if (!session) {
      return;
    }
    this.forget(id);
    session.transport.close().catch((err: unknown) => {
      log.warn("Closing session stream failed", { sessionId: id, error: describeError(err) });
    });
  }

  closeAll(): void {
    for (const id of [...this.sessions.keys()]) {
      this.close(id);
    }
  }

  get size(): number {
    return this.sessions.size;
  }

  private forget(id: string): void {
    if (!this.sessions.delete(id)) {
      return;
    }
    clearInterval(this.timers.get(id));
    this.timers.delete(id);
    log.info("Session closed", { sessionId: id, open: this.sessions.size });
  }
}
