import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { registerBuiltinRoute } from "./server.js";
import { Dispatcher } from "../gateway/dispatcher.js";
import { createTestPool, resultOf, toolText, type TestPool } from "../testing/fixtures.js";
import { setLogLevel } from "../logger.js";

describe("built-in gateway route", () => {
    let fixture: TestPool;
    let dispatcher: Dispatcher;

    beforeEach(() => {
        setLogLevel("silent");
        fixture = createTestPool(["weather"]);
        registerBuiltinRoute(fixture.pool, "gateway", "0.3.0");
        dispatcher = new Dispatcher(fixture.pool);
    });

    afterEach(() => {
        fixture.pool.close();
    });

    async function callTool(name: string, args: Record<string, unknown> = {}) {
        const result = resultOf(
            await dispatcher.dispatch("gateway", { jsonrpc: "2.0", id: "t", method: "tools/call", params: { name, arguments: args } }),
        );
        return { result, text: toolText(result) };
    }

    it("lists its tools", async () => {
        const result = resultOf(await dispatcher.dispatch("gateway", { jsonrpc: "2.0", id: 1, method: "tools/list" }));
        expect(result).toMatchObject({
            tools: [
                { name: "list_routes", inputSchema: { type: "object" } },
                { name: "describe_route", inputSchema: { type: "object", required: ["route"] } },
            ],
        });
    });

    it("lists routes with their state", async () => {
        const { text } = await callTool("list_routes");
        expect(JSON.parse(text)).toEqual([
            { route: "weather", kind: "memory", connected: false },
            { route: "gateway", kind: "memory", connected: true, serverInfo: { name: "mcp-sse-gateway", version: "0.3.0" } },
        ]);
    });

    it("describes a route by connecting to it", async () => {
        const { text } = await callTool("describe_route", { route: "weather" });
        expect(JSON.parse(text)).toMatchObject({
            route: "weather",
            serverInfo: { name: "weather-test", version: "1.0.0" },
            protocolVersion: "2024-11-05",
        });
        expect(fixture.created.get("weather")).toBe(1);
    });

    it("reports unknown routes and tools as tool errors", async () => {
        const unknownRoute = await callTool("describe_route", { route: "nope" });
        expect(unknownRoute.result.isError).toBe(true);
        expect(unknownRoute.text).toBe("Unknown route: nope");

        const unknownTool = await callTool("forecast");
        expect(unknownTool.result.isError).toBe(true);
        expect(unknownTool.text).toBe("Unknown tool: forecast");
    });

    it("validates arguments", async () => {
        const { result, text } = await callTool("describe_route", {});
        expect(result.isError).toBe(true);
        expect(JSON.parse(text)).toMatchObject({ error: true, message: "Invalid arguments for describe_route" });
    });
});
