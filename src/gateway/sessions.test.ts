import { createServer, type Server } from "node:http";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { SessionRegistry } from "./sessions.js";
import { GatewayError } from "../errors.js";
import { setLogLevel } from "../logger.js";
import { SseReader } from "../testing/fixtures.js";

describe("SessionRegistry", () => {
  let registry: SessionRegistry;
  let server: Server;
  let baseUrl: string;
  let openErrors: unknown[];
  const readers: SseReader[] = [];

  beforeEach(async () => {
    setLogLevel("silent");
    registry = new SessionRegistry({ maxSessions: 2, keepaliveMs: 50, endpointPath: "/sse" });
    openErrors = [];
    server = createServer((_req, res) => {
      registry.open(res).catch((error: unknown) => {
        openErrors.push(error);
        res.statusCode = 503;
        res.end();
      });
    });
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
    const address = server.address();
    baseUrl = `http://127.0.0.1:${typeof address === "object" && address !== null ? address.port : 0}`;
  });

  afterEach(async () => {
    for (const reader of readers.splice(0)) {
      await reader.cancel().catch(() => undefined);
    }
    registry.closeAll();
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  async function connect(): Promise<{ reader: SseReader; sessionId: string }> {
    const response = await fetch(`${baseUrl}/sse`);
    expect(response.status).toBe(200);
    expect(response.headers.get("content-type")).toBe("text/event-stream");
    const reader = new SseReader(response);
    readers.push(reader);
    const endpoint = await reader.next();
    expect(endpoint.event).toBe("endpoint");
    const sessionId = new URL(endpoint.data, baseUrl).searchParams.get("sessionId");
    if (!sessionId) {
      throw new Error(`No session id in ${endpoint.data}`);
    }
    return { reader, sessionId };
  }

  it("announces the post endpoint for the session", async () => {
    const { sessionId } = await connect();
    expect(registry.size).toBe(1);
    expect(registry.get(sessionId)?.id).toBe(sessionId);
  });

  it("delivers messages to one session", async () => {
    const { reader, sessionId } = await connect();
    expect(await registry.deliver(sessionId, { jsonrpc: "2.0", id: "1", result: { ok: true } })).toBe(true);

    const event = await reader.next();
    expect(event.event).toBe("message");
    expect(JSON.parse(event.data)).toEqual({ jsonrpc: "2.0", id: "1", result: { ok: true } });
  });

  it("broadcasts only to sessions that used the route", async () => {
    const first = await connect();
    const second = await connect();
    registry.require(first.sessionId).routes.add("weather");

    const delivered = await registry.broadcast("weather", { jsonrpc: "2.0", method: "notifications/tools/list_changed" });
    expect(delivered).toBe(1);
    const event = await first.reader.next();
    expect(JSON.parse(event.data)).toEqual({ jsonrpc: "2.0", method: "notifications/tools/list_changed" });
    await expect(second.reader.next(100)).rejects.toThrow("No event within 100 ms");
  });

  it("refuses sessions over the limit", async () => {
    await connect();
    await connect();
    const response = await fetch(`${baseUrl}/sse`);
    expect(response.status).toBe(503);
    expect(openErrors).toHaveLength(1);
    expect(openErrors[0]).toBeInstanceOf(GatewayError);
    expect(openErrors[0]).toMatchObject({ kind: "too_many_sessions" });
  });

  it("fails lookups of unknown sessions", async () => {
    expect(() => registry.require("nope")).toThrow("Unknown or closed session: nope");
    expect(await registry.deliver("nope", { jsonrpc: "2.0", method: "x" })).toBe(false);
  });

  it("does not put id-less error answers on the stream", async () => {
    const { sessionId } = await connect();
    const delivered = await registry.deliver(sessionId, {
      jsonrpc: "2.0",
      id: null,
      error: { code: -32700, message: "Parse error" },
    });
    expect(delivered).toBe(false);
    expect(registry.get(sessionId)).toBeDefined();
  });

  it("writes keepalive comments while the stream is open", async () => {
    const { reader } = await connect();
    const text = await reader.waitForText(": keepalive\n\n");
    expect(text).toMatch(/^event: endpoint\ndata: \/sse\?sessionId=[0-9a-f-]{36}\n\n/);
  });

  it("drops a session whose stream can no longer be written", async () => {
    const { sessionId } = await connect();
    const session = registry.require(sessionId);
    session.res.end();
    await vi.waitFor(() => expect(registry.get(sessionId)).toBeUndefined());
  });

  it("forgets a session when the client disconnects", async () => {
    const { reader, sessionId } = await connect();
    await reader.cancel();
    await vi.waitFor(() => expect(registry.get(sessionId)).toBeUndefined());
    expect(registry.size).toBe(0);
  });

  it("ends the stream when the session is closed", async () => {
    const { reader, sessionId } = await connect();
    registry.close(sessionId);
    await expect(reader.next()).rejects.toThrow("Event stream ended");
  });
});
