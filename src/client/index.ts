#!/usr/bin/env node
import { Command } from "commander";
import dotenv from "dotenv";
import { ConfigManager } from "./config/manager.js";
import { createTransport } from "./transport/index.js";
import { RpcClient } from "./rpc/client.js";
import { buildParams } from "./params.js";
import { isLogLevel } from "../config.js";
import { isErrorResponse } from "../types.js";
import { createLogger, setLogLevel } from "../logger.js";
import { packageInfo } from "../version.js";

dotenv.config();

const log = createLogger("cli");
const program = new Command();

interface CliOptions {
  file?: string;
  timeout: string;
  logLevel: string;
}

program
  .name("mcp")
  .usage("[options] <server> <method> [args...]")
  .description("Call an upstream MCP server from mcpServers.json directly, bypassing the gateway")
  .argument("<server>", "server name from mcpServers.json")
  .argument("<method>", "method to call (e.g., tools/list, tools/call, ping)")
  .argument("[args...]", "a JSON object of params, or for tools/call a tool name and a JSON object")
  .option("-f, --file <path>", "path to mcpServers.json")
  .option("-t, --timeout <ms>", "request timeout in milliseconds", "30000")
  .option("--log-level <level>", "debug, info, warn, error or silent", "warn")
  .action(async (server: string, method: string, args: string[], options: CliOptions) => {
    if (isLogLevel(options.logLevel)) {
      setLogLevel(options.logLevel);
    }
    const timeoutMs = Number(options.timeout);
    if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
      throw new Error(`Invalid timeout: ${options.timeout}`);
    }

    const registry = ConfigManager.load(options.file);
    const cfg = registry.get(server);
    const params = buildParams(method, args);

    const client = new RpcClient(createTransport(cfg), { timeoutMs });
    try {
      const { name, version } = packageInfo();
      const serverInfo = await client.performHandshake(`${name}-cli`, version);
      log.info("Handshake successful", { server, serverInfo: serverInfo.serverInfo });

      const resp = await client.request(method, params);
      console.log(JSON.stringify(resp, null, 2));
      if (isErrorResponse(resp)) {
        process.exitCode = 1;
      }
    } finally {
      client.close();
    }
  });

program.parseAsync().catch((e: unknown) => {
  console.error(`Error: ${e instanceof Error ? e.message : String(e)}`);
  process.exit(1);
});
