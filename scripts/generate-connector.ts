import { writeFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { Command } from 'commander';
import dotenv from 'dotenv';
import { ConfigManager, type ServerConfig } from '../src/client/config/manager.js';
import { createTransport } from '../src/client/transport/index.js';
import { RpcClient } from '../src/client/rpc/client.js';
import { buildConnectorDefinition } from '../src/gateway/connector.js';
import { ToolListSchema, formatToolCatalog, type RouteTools } from '../src/gateway/catalog.js';
import { describeError } from '../src/errors.js';
import { createLogger } from '../src/logger.js';
import { packageInfo } from '../src/version.js';

dotenv.config();

const log = createLogger('generate-connector');

async function getToolsFromServer(route: string, config: ServerConfig, timeoutMs: number): Promise<RouteTools> {
    log.info('Querying server', { route });
    const client = new RpcClient(createTransport(config), { timeoutMs });
    try {
        await client.performHandshake('mcp-connector-generator', packageInfo().version);
        const result = await client.call('tools/list', {});
        const parsed = ToolListSchema.safeParse(result);
        if (!parsed.success) {
            throw new Error('Invalid response structure from tools/list');
        }
        log.info('Found tools', { route, count: parsed.data.tools.length });
        return { route, tools: parsed.data.tools };
    } catch (error) {
        log.warn('Could not list tools', { route, error: describeError(error) });
        return { route, error: describeError(error) };
    } finally {
        client.close();
    }
}

interface GenerateOptions {
    file?: string;
    host: string;
    output: string;
    timeout: string;
}

async function generateConnector(options: GenerateOptions): Promise<void> {
    const registry = ConfigManager.load(options.file);
    const timeoutMs = Number(options.timeout);
    const servers = registry.getAllServers();

    const results = await Promise.all(
        Object.entries(servers).map(([route, config]) => getToolsFromServer(route, config, timeoutMs)),
    );

    const definition = buildConnectorDefinition({
        title: 'MCP SSE Gateway',
        description: formatToolCatalog(results),
        version: packageInfo().version,
        host: options.host,
    });

    const outputFilePath = resolve(process.cwd(), options.output);
    writeFileSync(outputFilePath, `${JSON.stringify(definition, null, 2)}\n`, 'utf8');
    log.info('Connector definition written', { path: outputFilePath });
}

const program = new Command()
    .name('generate-connector')
    .description('Write a Swagger 2.0 connector definition listing the tools of every configured server')
    .option('-f, --file <path>', 'path to mcpServers.json')
    .option('--host <host>', 'public host of the gateway', process.env.MCP_GATEWAY_PUBLIC_HOST ?? 'localhost:3000')
    .option('-o, --output <path>', 'output file', 'connector.swagger.json')
    .option('-t, --timeout <ms>', 'per-server timeout in milliseconds', '10000')
    .action(generateConnector);

program.parseAsync().catch((error: unknown) => {
    console.error(`Error: ${describeError(error)}`);
    process.exit(1);
});
