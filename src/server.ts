#!/usr/bin/env node
import dotenv from 'dotenv';
import chalk from 'chalk';
import { CONFIG_FILE_NAME, ConfigManager } from './client/config/manager.js';
import { GatewayConfigError, isLogLevel, loadGatewayConfig, type GatewayConfig } from './config.js';
import { createGatewayPool, startGateway } from './gateway/index.js';
import { setLogLevel } from './logger.js';

// Load environment variables from .env file if present
dotenv.config();

// Process command line arguments for configuration
function processArgs(argv: string[]): Partial<GatewayConfig> {
    const overrides: Partial<GatewayConfig> = {};
    let i = 0;

    const valueOf = (flag: string): string => {
        const value = argv[i + 1];
        if (value === undefined) {
            console.error(chalk.red(`Error: ${flag} requires a value`));
            process.exit(1);
        }
        i += 2;
        return value;
    };

    while (i < argv.length) {
        const arg = argv[i];

        if (arg === '--file' || arg === '-f') {
            overrides.serversFile = valueOf(arg);
        } else if (arg === '--port' || arg === '-p') {
            const port = Number(valueOf(arg));
            if (!Number.isInteger(port) || port < 0 || port > 65535) {
                console.error(chalk.red('Error: --port must be an integer between 0 and 65535'));
                process.exit(1);
            }
            overrides.port = port;
        } else if (arg === '--log-level') {
            const level = valueOf(arg);
            if (!isLogLevel(level)) {
                console.error(chalk.red(`Error: unknown log level ${level}`));
                process.exit(1);
            }
            overrides.logLevel = level;
        } else {
            console.error(chalk.yellow(`Warning: Unknown argument: ${arg}`));
            i++;
        }
    }
    return overrides;
}

// Only an explicitly named registry file has to exist.
function loadRegistry(serversFile: string | undefined): ConfigManager {
    if (!serversFile && !ConfigManager.locate()) {
        console.error(chalk.yellow(`Warning: no ${CONFIG_FILE_NAME} found; serving the built-in route only`));
        return ConfigManager.empty();
    }
    return ConfigManager.load(serversFile);
}

async function runServer(): Promise<void> {
    const overrides = processArgs(process.argv.slice(2));
    const config = loadGatewayConfig(process.env, overrides);
    setLogLevel(config.logLevel);

    const registry = loadRegistry(config.serversFile);
    const pool = createGatewayPool(registry, config);
    const running = await startGateway(config, pool);
    console.error(chalk.green(`MCP SSE gateway running at ${running.url}/sse`));

    const shutdown = (signal: string) => {
        console.error(chalk.yellow(`\nReceived ${signal} signal, shutting down gateway`));
        running.close().then(
            () => process.exit(0),
            (error: unknown) => {
                console.error(chalk.red('Error during shutdown:'), error);
                process.exit(1);
            },
        );
    };
    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
}

runServer().catch((error: unknown) => {
    if (error instanceof GatewayConfigError) {
        console.error(chalk.red(error.message));
    } else {
        console.error(chalk.red("Fatal error running gateway:"), error);
    }
    process.exit(1);
});
