import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import { createParser, type ParsedEvent, type ParseEvent } from "eventsource-parser";
import { z } from "zod";
import { UpstreamPool } from "../client/pool.js";
import { InMemoryServerTransport, type Transport } from "../client/transport/index.js";
import {
  isErrorResponse,
  isRequest,
  type JsonRpcMessage,
  type JsonRpcRequest,
  type JsonRpcResponse,
} from "../types.js";

// Legacy-style method some upstreams expose next to their tools.
const GetForecastRequestSchema = z.object({
  method: z.literal("getForecast"),
  params: z.object({ latitude: z.number(), longitude: z.number() }),
});

function forecastText(latitude: number, longitude: number): string {
  return `Forecast for ${latitude},${longitude}: sunny`;
}

/**
 * Upstream MCP server with one tool, `get_forecast`, and one bare
 * `getForecast` method.
 */
export function createWeatherServer(): McpServer {
  const server = new McpServer({ name: "weather-test", version: "1.0.0" });
  server.tool(
    "get_forecast",
    "Forecast for a point",
    { latitude: z.number(), longitude: z.number() },
    async ({ latitude, longitude }) => ({
      content: [{ type: "text", text: forecastText(latitude, longitude) }],
    }),
  );
  server.server.setRequestHandler(GetForecastRequestSchema, async (request) => ({
    content: [{ type: "text", text: forecastText(request.params.latitude, request.params.longitude) }],
  }));
  return server;
}

export interface TestPool {
  pool: UpstreamPool;
  // How many transports each route has opened.
  created: Map<string, number>;
  // Most recent upstream server per route.
  servers: Map<string, McpServer>;
}

export function createTestPool(routes: string[] = ["weather"], requestTimeoutMs = 2_000): TestPool {
  const pool = new UpstreamPool({ clientName: "test-gateway", clientVersion: "0.0.1", requestTimeoutMs });
  const created = new Map<string, number>();
  const servers = new Map<string, McpServer>();
  for (const route of routes) {
    pool.register(route, {
      kind: "memory",
      create: () => {
        created.set(route, (created.get(route) ?? 0) + 1);
        const server = createWeatherServer();
        servers.set(route, server);
        return new InMemoryServerTransport(server);
      },
    });
  }
  return { pool, created, servers };
}

export function resultOf(response: JsonRpcResponse | null): Record<string, unknown> {
  if (!response) {
    throw new Error("Expected a response, got null");
  }
  if (isErrorResponse(response)) {
    throw new Error(`Expected a result, got error ${response.error.code}: ${response.error.message}`);
  }
  return response.result;
}

// First text block of a tools/call result.
export function toolText(result: Record<string, unknown>): string {
  const parsed = CallToolResultSchema.parse(result);
  const first = parsed.content[0];
  if (!first || first.type !== "text") {
    throw new Error("Tool result has no text content");
  }
  return first.text;
}

/**
 * Scriptable transport: records what is sent and lets the test play the
 * upstream's part.
 */
export class FakeTransport implements Transport {
  readonly kind = "memory";
  readonly sent: JsonRpcMessage[] = [];
  failSends = false;
  closed = false;
  respond?: (request: JsonRpcRequest) => JsonRpcResponse | undefined;
  private onMsg: ((m: unknown) => void) | null = null;
  private closeListeners: Array<(reason?: Error) => void> = [];

  async send(msg: JsonRpcMessage): Promise<void> {
    if (this.failSends) {
      throw new Error("pipe broken");
    }
    this.sent.push(msg);
    if (isRequest(msg) && this.respond) {
      const answer = this.respond(msg);
      if (answer) {
        queueMicrotask(() => this.receive(answer));
      }
    }
  }

  receive(msg: unknown): void {
    this.onMsg?.(msg);
  }

  onMessage(cb: (msg: unknown) => void): void {
    this.onMsg = cb;
  }

  onClose(cb: (reason?: Error) => void): void {
    this.closeListeners.push(cb);
  }

  // Simulates the upstream going away.
  drop(reason?: Error): void {
    this.closed = true;
    const listeners = this.closeListeners;
    this.closeListeners = [];
    for (const listener of listeners) {
      listener(reason);
    }
  }

  close(): void {
    if (!this.closed) {
      this.drop();
    }
  }
}

/**
 * Reads named events off a fetch() response carrying an event stream.
 */
export class SseReader {
  private queue: ParsedEvent[] = [];
  // Everything read so far, comments included.
  private raw = "";
  private waiters: Array<() => void> = [];
  private ended = false;
  private readonly cancelBody: () => Promise<void>;

  constructor(response: Response) {
    if (!response.body) {
      throw new Error("Response has no body");
    }
    const reader = response.body.getReader();
    this.cancelBody = () => reader.cancel();
    this.pump(() => reader.read()).catch(() => this.end());
  }

  private async pump(read: () => Promise<{ done: boolean; value?: Uint8Array }>): Promise<void> {
    const decoder = new TextDecoder();
    const parser = createParser((event: ParseEvent) => {
      if (event.type === "event") {
        this.queue.push(event);
        this.wake();
      }
    });
    for (;;) {
      const { done, value } = await read();
      if (done || !value) {
        break;
      }
      const text = decoder.decode(value, { stream: true });
      this.raw += text;
      parser.feed(text);
      this.wake();
    }
    this.end();
  }

  private end(): void {
    this.ended = true;
    this.wake();
  }

  private wake(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter();
    }
  }

  async next(timeoutMs = 2_000): Promise<ParsedEvent> {
    return this.until(() => this.queue.shift(), timeoutMs, `No event within ${timeoutMs} ms`);
  }

  // Resolves with all text read once `fragment` has appeared in it.
  async waitForText(fragment: string, timeoutMs = 2_000): Promise<string> {
    return this.until(
      () => (this.raw.includes(fragment) ? this.raw : undefined),
      timeoutMs,
      `No ${JSON.stringify(fragment)} within ${timeoutMs} ms`,
    );
  }

  private async until<T>(take: () => T | undefined, timeoutMs: number, timeoutMessage: string): Promise<T> {
    const deadline = Date.now() + timeoutMs;
    for (;;) {
      const value = take();
      if (value !== undefined) {
        return value;
      }
      if (this.ended) {
        throw new Error("Event stream ended");
      }
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        throw new Error(timeoutMessage);
      }
      await new Promise<void>((resolve) => {
        const timer = setTimeout(resolve, remaining);
        this.waiters.push(() => {
          clearTimeout(timer);
          resolve();
        });
      });
    }
  }

  async cancel(): Promise<void> {
    await this.cancelBody();
  }
}
