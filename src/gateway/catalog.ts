import { z } from "zod";

export const CatalogToolSchema = z.object({
  name: z.string(),
  description: z.string().optional(),
  inputSchema: z
    .object({
      properties: z.record(z.object({ type: z.string().optional(), description: z.string().optional() }).passthrough()).optional(),
      required: z.array(z.string()).optional(),
    })
    .passthrough()
    .optional(),
});
export type CatalogTool = z.infer<typeof CatalogToolSchema>;

export const ToolListSchema = z.object({ tools: z.array(CatalogToolSchema) }).passthrough();

export interface RouteTools {
  route: string;
  tools?: CatalogTool[];
  error?: string;
}

function describeParameters(tool: CatalogTool): string {
  const properties = tool.inputSchema?.properties ?? {};
  const required = new Set(tool.inputSchema?.required ?? []);
  return Object.entries(properties)
    .map(([name, details]) => `${name}${required.has(name) ? "*" : ""}: ${details.type ?? "any"}`)
    .join(", ");
}

/**
 * Plain-text catalog of every route's tools, used as the connector
 * description. Required parameters carry a `*`.
 */
export function formatToolCatalog(results: RouteTools[]): string {
  const lines = ['MCP servers reachable through this gateway. Pick one with the "route" header.'];
  for (const result of results) {
    lines.push("");
    lines.push(`Route ${result.route}:`);
    if (result.error) {
      lines.push(`- unavailable (${result.error})`);
      continue;
    }
    if (!result.tools || result.tools.length === 0) {
      lines.push("- no tools");
      continue;
    }
    for (const tool of result.tools) {
      const parameters = describeParameters(tool);
      const signature = `${tool.name}(${parameters})`;
      lines.push(tool.description ? `- ${signature}: ${tool.description}` : `- ${signature}`);
    }
  }
  return lines.join("\n");
}
