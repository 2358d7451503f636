import { API_KEY_HEADER } from "./auth.js";

export const ROUTE_HEADER = "route";
export const ENVELOPE_DEFINITION = "McpSseQueryResponse";

export interface ConnectorOptions {
  title: string;
  description: string;
  version: string;
  host: string;
  basePath?: string;
  // Path of the SSE route relative to basePath.
  ssePath?: string;
}

type SchemaObject = { type: string; properties?: Record<string, SchemaObject> } | { $ref: string };

interface Operation {
  summary: string;
  operationId: string;
  [extension: `x-${string}`]: string;
  parameters?: Array<
    | { in: "header"; name: string; type: "string"; required: boolean }
    | { in: "body"; name: string; schema: SchemaObject }
  >;
  produces?: string[];
  responses: Record<string, { description: string; schema?: SchemaObject }>;
  tags?: string[];
}

export interface ConnectorDefinition {
  swagger: "2.0";
  info: { title: string; description: string; version: string };
  host: string;
  basePath: string;
  schemes: string[];
  consumes: string[];
  produces: string[];
  paths: Record<string, { get: Operation; post: Operation }>;
  definitions: Record<string, SchemaObject>;
  parameters: Record<string, never>;
  responses: Record<string, never>;
  securityDefinitions: Record<string, { type: "apiKey"; in: "header"; name: string }>;
  security: Array<Record<string, string[]>>;
  tags: string[];
}

const envelopeRef = { $ref: `#/definitions/${ENVELOPE_DEFINITION}` };

/**
 * Swagger 2.0 document registering the gateway's SSE route as an MCP
 * connector: GET opens the stream, POST submits envelopes.
 */
export function buildConnectorDefinition(options: ConnectorOptions): ConnectorDefinition {
  const ssePath = options.ssePath ?? "/sse";
  return {
    swagger: "2.0",
    info: {
      title: options.title,
      description: options.description,
      version: options.version,
    },
    host: options.host,
    basePath: options.basePath ?? "/",
    schemes: ["https"],
    consumes: [],
    produces: [],
    paths: {
      [ssePath]: {
        get: {
          summary: options.title,
          "x-ms-agentic-protocol": "mcp-sse-1.0",
          operationId: "InvokeMCP",
          responses: {
            "200": { description: "Success" },
          },
          tags: ["Agentic", "McpSse"],
        },
        post: {
          summary: "MCP SSE Action",
          operationId: "PostInvokeMCP",
          "x-ms-agentic-origin-operation": "InvokeMCP",
          "x-ms-visibility": "internal",
          parameters: [
            { in: "header", name: ROUTE_HEADER, type: "string", required: true },
            { in: "body", name: "requestBody", schema: envelopeRef },
          ],
          produces: ["application/json"],
          responses: {
            "200": { description: "Immediate Response", schema: envelopeRef },
            "201": { description: "Created and will follow callback" },
          },
        },
      },
    },
    definitions: {
      [ENVELOPE_DEFINITION]: {
        type: "object",
        properties: {
          jsonrpc: { type: "string" },
          id: { type: "string" },
          method: { type: "string" },
          params: { type: "object" },
          result: { type: "object" },
          error: { type: "object" },
        },
      },
    },
    parameters: {},
    responses: {},
    securityDefinitions: {
      api_key: { type: "apiKey", in: "header", name: API_KEY_HEADER },
    },
    security: [{ api_key: [] }],
    tags: [],
  };
}
