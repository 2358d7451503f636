import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { dirname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

export const CONFIG_FILE_NAME = "mcpServers.json";

const StdioServerConfigSchema = z.object({
  command: z.string().min(1).refine((value) => value !== "sse", {
    message: '"sse" servers need an "sseUrl"',
  }),
  args: z.array(z.string()).optional(),
  env: z.record(z.string()).optional(),
  cwd: z.string().optional(),
});

const SseServerConfigSchema = z.object({
  command: z.literal("sse"),
  sseUrl: z.string().url(),
  headers: z.record(z.string()).optional(),
});

export const ServerConfigSchema = z.union([SseServerConfigSchema, StdioServerConfigSchema]);

export type StdioServerConfig = z.infer<typeof StdioServerConfigSchema>;
export type SseServerConfig = z.infer<typeof SseServerConfigSchema>;
export type ServerConfig = z.infer<typeof ServerConfigSchema>;

export const ConfigShapeSchema = z.object({
  mcpServers: z.record(ServerConfigSchema),
});
export type ConfigShape = z.infer<typeof ConfigShapeSchema>;

export function isSseServer(cfg: ServerConfig): cfg is SseServerConfig {
  return cfg.command === "sse";
}

// Candidate locations, in order: explicit path, cwd, project root, home.
export function candidatePaths(configPath?: string): string[] {
  if (configPath) {
    return [resolve(configPath)];
  }
  // src/client/config (or dist/src/client/config) -> project root
  const moduleDir = dirname(fileURLToPath(import.meta.url));
  const roots = [join(moduleDir, "..", "..", ".."), join(moduleDir, "..", "..", "..", "..")];
  return [
    resolve(CONFIG_FILE_NAME),
    ...roots.map((root) => join(root, CONFIG_FILE_NAME)),
    join(homedir(), CONFIG_FILE_NAME),
  ];
}

/**
 * Registry of upstream MCP servers, read from mcpServers.json.
 */
export class ConfigManager {
  private constructor(
    readonly path: string,
    private readonly data: ConfigShape,
  ) {}

  static locate(configPath?: string): string | undefined {
    return candidatePaths(configPath).find((candidate) => existsSync(candidate));
  }

  static load(configPath?: string): ConfigManager {
    const resolvedPath = ConfigManager.locate(configPath);
    if (!resolvedPath) {
      throw new Error(`Cannot find ${CONFIG_FILE_NAME} at ${candidatePaths(configPath).join(", ")}`);
    }
    return ConfigManager.fromJson(readFileSync(resolvedPath, "utf-8"), resolvedPath);
  }

  static fromJson(json: string, source = "<inline>"): ConfigManager {
    let parsedJson: unknown;
    try {
      parsedJson = JSON.parse(json);
    } catch (error) {
      throw new Error(`Invalid JSON in ${source}: ${error instanceof Error ? error.message : String(error)}`);
    }
    const parsed = ConfigShapeSchema.safeParse(parsedJson);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue.path.length > 0 ? issue.path.join(".") : "root";
      throw new Error(`Invalid config format in ${source} at ${where}: ${issue.message}`);
    }
    return new ConfigManager(source, parsed.data);
  }

  static empty(): ConfigManager {
    return new ConfigManager("<empty>", { mcpServers: {} });
  }

  get(server: string): ServerConfig {
    const cfg = this.data.mcpServers[server];
    if (!cfg) {
      throw new Error(`Server '${server}' not found in ${this.path}`);
    }
    return cfg;
  }

  has(server: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.data.mcpServers, server);
  }

  getAllServers(): Record<string, ServerConfig> {
    return { ...this.data.mcpServers };
  }
}
