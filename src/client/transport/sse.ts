import fetch from "node-fetch";
import { createParser, type ParseEvent } from "eventsource-parser";
import type { Transport } from "./types.js";
import type { JsonRpcMessage } from "../../types.js";
import { createLogger } from "../../logger.js";

const log = createLogger("sse-transport");

/**
 * Client side of the legacy MCP HTTP+SSE transport.
 *
 * The stream's first `endpoint` event names the URL that messages are posted
 * to; sends wait for it. Every `message` event carries one JSON-RPC message.
 */
export class SseTransport implements Transport {
  readonly kind = "sse";
  private controller = new AbortController();
  private onMsg: ((m: unknown) => void) | null = null;
  private closeListeners: Array<(reason?: Error) => void> = [];
  private closed = false;
  private readonly endpoint: Promise<string>;
  private resolveEndpoint: (url: string) => void = () => undefined;
  private rejectEndpoint: (reason: Error) => void = () => undefined;

  constructor(
    private readonly url: string,
    private readonly headers: Record<string, string> = {},
  ) {
    this.endpoint = new Promise<string>((resolve, reject) => {
      this.resolveEndpoint = resolve;
      this.rejectEndpoint = reject;
    });
    // Sends observe the rejection; this keeps an unused endpoint from surfacing as unhandled.
    this.endpoint.catch(() => undefined);
    this.start().then(
      () => this.finish(),
      (err: unknown) => this.finish(err instanceof Error ? err : new Error(String(err))),
    );
  }

  private async start(): Promise<void> {
    const response = await fetch(this.url, {
      headers: { ...this.headers, Accept: "text/event-stream" },
      signal: this.controller.signal,
    });

    if (!response.ok) {
      throw new Error(`SSE endpoint answered ${response.status} ${response.statusText}`);
    }
    if (!response.body) {
      throw new Error("No response body from SSE endpoint");
    }

    const parser = createParser((event: ParseEvent) => {
      if (event.type !== "event") {
        return;
      }
      if (event.event === "endpoint") {
        this.resolveEndpoint(new URL(event.data, this.url).href);
        return;
      }
      if (event.event !== undefined && event.event !== "message") {
        return;
      }
      let parsed: unknown;
      try {
        parsed = JSON.parse(event.data);
      } catch {
        log.warn("Skipping SSE message that is not JSON", { data: event.data });
        return;
      }
      this.onMsg?.(parsed);
    });

    const decoder = new TextDecoder();
    try {
      for await (const chunk of response.body) {
        parser.feed(typeof chunk === "string" ? chunk : decoder.decode(chunk, { stream: true }));
      }
    } catch (err) {
      if (this.controller.signal.aborted) {
        return;
      }
      throw err;
    }
  }

  async send(msg: JsonRpcMessage): Promise<void> {
    if (this.closed) {
      throw new Error("SSE transport is closed");
    }
    const endpoint = await this.endpoint;
    const response = await fetch(endpoint, {
      method: "POST",
      headers: {
        ...this.headers,
        "Content-Type": "application/json",
      },
      body: JSON.stringify(msg),
    });
    if (!response.ok) {
      throw new Error(`Posting to ${endpoint} failed with ${response.status} ${response.statusText}`);
    }
  }

  onMessage(cb: (msg: unknown) => void): void {
    this.onMsg = cb;
  }

  onClose(cb: (reason?: Error) => void): void {
    this.closeListeners.push(cb);
  }

  close(): void {
    this.controller.abort();
    this.finish();
  }

  private finish(reason?: Error): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    if (reason) {
      log.warn("SSE stream ended", { url: this.url, error: reason.message });
    }
    this.rejectEndpoint(reason ?? new Error("SSE stream closed before an endpoint was announced"));
    const listeners = this.closeListeners;
    this.closeListeners = [];
    for (const listener of listeners) {
      listener(reason);
    }
  }
}
