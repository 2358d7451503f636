import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
    CallToolRequestSchema,
    CallToolResultSchema,
    ListToolsRequestSchema,
    ToolSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";
import type { RouteStatus, UpstreamConnection, UpstreamPool } from "../client/pool.js";
import { InMemoryServerTransport } from "../client/transport/index.js";
import { describeError } from "../errors.js";
import { createLogger } from "../logger.js";

const log = createLogger("builtin");

// What the built-in server needs to know about the gateway's routes.
export interface RouteDirectory {
    has(route: string): boolean;
    status(): RouteStatus[];
    acquire(route: string): Promise<UpstreamConnection>;
}

type Tool = z.infer<typeof ToolSchema>;
type CallToolRequestType = z.infer<typeof CallToolRequestSchema>;
type CallToolResultType = z.infer<typeof CallToolResultSchema>;

export const ListRoutesArgsSchema = z.object({}).strict();

export const DescribeRouteArgsSchema = z.object({
    route: z.string().min(1).describe('Route name, as sent in the "route" header.'),
}).strict();

function inputSchema(schema: z.ZodTypeAny): Tool["inputSchema"] {
    return { ...zodToJsonSchema(schema, { target: 'jsonSchema7', $refStrategy: 'none' }), type: "object" };
}

export const BUILTIN_TOOLS: Tool[] = [
    {
        name: "list_routes",
        description: "List the routes this gateway forwards to, with their transport and connection state.",
        inputSchema: inputSchema(ListRoutesArgsSchema),
    },
    {
        name: "describe_route",
        description: "Connect to a route if needed and report the upstream server's info, protocol version and capabilities.",
        inputSchema: inputSchema(DescribeRouteArgsSchema),
    },
];

function textResult(value: unknown, isError = false): CallToolResultType {
    const result: CallToolResultType = {
        content: [{ type: "text", text: typeof value === "string" ? value : JSON.stringify(value, null, 2) }],
    };
    if (isError) {
        result.isError = true;
    }
    return result;
}

async function describeRoute(routes: RouteDirectory, route: string): Promise<CallToolResultType> {
    if (!routes.has(route)) {
        return textResult(`Unknown route: ${route}`, true);
    }
    try {
        const { init } = await routes.acquire(route);
        return textResult({
            route,
            serverInfo: init.serverInfo,
            protocolVersion: init.protocolVersion,
            capabilities: init.capabilities,
        });
    } catch (error) {
        return textResult(`Route ${route} is unavailable: ${describeError(error)}`, true);
    }
}

export function createGatewayServer(routes: RouteDirectory, version: string): Server {
    const server = new Server(
        {
            name: "mcp-sse-gateway",
            version,
        },
        {
            capabilities: {
                tools: {},
            },
            instructions: "Introspection tools for the routes served by this MCP gateway.",
        },
    );

    server.setRequestHandler(ListToolsRequestSchema, () => {
        return {
            tools: BUILTIN_TOOLS,
        };
    });

    server.setRequestHandler(CallToolRequestSchema, async (request: CallToolRequestType): Promise<CallToolResultType> => {
        const { name, arguments: args } = request.params;
        log.debug("Tool call", { name });

        switch (name) {
            case "list_routes": {
                const parsedArgs = ListRoutesArgsSchema.safeParse(args ?? {});
                if (!parsedArgs.success) {
                    return textResult({ error: true, message: "Invalid arguments for list_routes", details: parsedArgs.error.issues }, true);
                }
                return textResult(routes.status());
            }
            case "describe_route": {
                const parsedArgs = DescribeRouteArgsSchema.safeParse(args ?? {});
                if (!parsedArgs.success) {
                    return textResult({ error: true, message: "Invalid arguments for describe_route", details: parsedArgs.error.issues }, true);
                }
                return describeRoute(routes, parsedArgs.data.route);
            }
            default:
                return textResult(`Unknown tool: ${name}`, true);
        }
    });

    return server;
}

/**
 * Serves the introspection tools under `route`, linked in process.
 */
export function registerBuiltinRoute(pool: UpstreamPool, route: string, version: string): void {
    pool.register(route, {
        kind: "memory",
        create: () => new InMemoryServerTransport(createGatewayServer(pool, version)),
    });
}
