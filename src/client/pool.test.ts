import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { UpstreamPool } from "./pool.js";
import { createTestPool, type TestPool } from "../testing/fixtures.js";
import { setLogLevel } from "../logger.js";
import type { JsonRpcNotification } from "../types.js";

describe("UpstreamPool", () => {
  let fixture: TestPool;

  beforeEach(() => {
    setLogLevel("silent");
    fixture = createTestPool(["weather"]);
  });

  afterEach(() => {
    fixture.pool.close();
  });

  it("shares one handshaken connection per route", async () => {
    const [first, second] = await Promise.all([fixture.pool.acquire("weather"), fixture.pool.acquire("weather")]);
    expect(second).toBe(first);
    expect(fixture.created.get("weather")).toBe(1);
    expect(first.init.serverInfo).toMatchObject({ name: "weather-test", version: "1.0.0" });
    expect(first.init.protocolVersion).toBe("2024-11-05");
  });

  it("rejects unknown routes", async () => {
    await expect(fixture.pool.acquire("nope")).rejects.toMatchObject({
      kind: "route_not_found",
      code: -32011,
      message: "Unknown route: nope",
    });
  });

  it("refuses duplicate registrations", () => {
    expect(() => fixture.pool.register("weather", { kind: "memory", create: () => { throw new Error("unused"); } })).toThrow(
      "Route 'weather' is already registered",
    );
  });

  it("reports connection state", async () => {
    expect(fixture.pool.status()).toEqual([{ route: "weather", kind: "memory", connected: false }]);
    await fixture.pool.acquire("weather");
    expect(fixture.pool.status()).toMatchObject([
      { route: "weather", kind: "memory", connected: true, serverInfo: { name: "weather-test" } },
    ]);
  });

  it("reconnects after the upstream closes", async () => {
    const first = await fixture.pool.acquire("weather");
    first.client.close();
    expect(fixture.pool.status()[0].connected).toBe(false);

    const second = await fixture.pool.acquire("weather");
    expect(second).not.toBe(first);
    expect(fixture.created.get("weather")).toBe(2);
  });

  it("turns startup failures into upstream_unavailable and retries later", async () => {
    const pool = new UpstreamPool({ clientName: "test-gateway", clientVersion: "0.0.1", requestTimeoutMs: 500 });
    let attempts = 0;
    pool.register("broken", {
      kind: "stdio",
      create: () => {
        attempts++;
        throw new Error("spawn weather-server ENOENT");
      },
    });
    await expect(pool.acquire("broken")).rejects.toMatchObject({
      kind: "upstream_unavailable",
      message: "Route 'broken' is unavailable: spawn weather-server ENOENT",
      data: { route: "broken" },
    });
    await expect(pool.acquire("broken")).rejects.toMatchObject({ kind: "upstream_unavailable" });
    expect(attempts).toBe(2);
    pool.close();
  });

  it("forwards upstream notifications with their route", async () => {
    const seen: Array<[string, JsonRpcNotification]> = [];
    fixture.pool.onNotification((route, notification) => seen.push([route, notification]));
    await fixture.pool.acquire("weather");

    const upstream = fixture.servers.get("weather");
    if (!upstream) throw new Error("upstream not started");
    await upstream.server.sendToolListChanged();

    await vi.waitFor(() => expect(seen).toHaveLength(1));
    expect(seen[0][0]).toBe("weather");
    expect(seen[0][1].method).toBe("notifications/tools/list_changed");
  });

  it("stops connecting once closed", async () => {
    fixture.pool.close();
    await expect(fixture.pool.acquire("weather")).rejects.toMatchObject({
      kind: "upstream_unavailable",
      message: "Gateway is shutting down",
    });
  });
});
