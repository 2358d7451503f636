import { z } from 'zod';
import { LOG_LEVELS, type LogLevel } from './logger.js';

const commaList = z
  .string()
  .default('')
  .transform((value) => value.split(',').map((item) => item.trim()).filter((item) => item.length > 0));

const optionalText = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

// Environment variables understood by the gateway, with their defaults.
export const GatewayEnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  HOST: z.string().min(1).default('0.0.0.0'),
  MCP_GATEWAY_API_KEYS: commaList,
  MCP_SERVERS_FILE: optionalText,
  MCP_GATEWAY_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  MCP_GATEWAY_KEEPALIVE_MS: z.coerce.number().int().positive().default(15_000),
  MCP_GATEWAY_MAX_SESSIONS: z.coerce.number().int().positive().default(100),
  MCP_GATEWAY_BUILTIN_ROUTE: z.string().default('gateway').transform((value) => value.trim()),
  MCP_GATEWAY_PUBLIC_HOST: optionalText,
  MCP_GATEWAY_CORS_ORIGIN: optionalText,
  MCP_GATEWAY_BODY_LIMIT: z.string().min(1).default('1mb'),
  LOG_LEVEL: z
    .string()
    .default('info')
    .transform((value) => value.toLowerCase())
    .pipe(z.enum(['debug', 'info', 'warn', 'error', 'silent'])),
});

export interface GatewayConfig {
  port: number;
  host: string;
  apiKeys: string[];
  serversFile?: string;
  requestTimeoutMs: number;
  keepaliveMs: number;
  maxSessions: number;
  builtinRoute?: string;
  publicHost?: string;
  corsOrigin?: string;
  bodyLimit: string;
  logLevel: LogLevel;
}

export class GatewayConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid gateway configuration:\n  - ${issues.join('\n  - ')}`);
    this.name = 'GatewayConfigError';
  }
}

/**
 * Reads the gateway configuration from environment variables.
 * Every invalid variable is reported at once.
 */
export function loadGatewayConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: Partial<GatewayConfig> = {},
): GatewayConfig {
  const parsed = GatewayEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new GatewayConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  const values = parsed.data;
  return {
    port: values.PORT,
    host: values.HOST,
    apiKeys: values.MCP_GATEWAY_API_KEYS,
    serversFile: values.MCP_SERVERS_FILE,
    requestTimeoutMs: values.MCP_GATEWAY_REQUEST_TIMEOUT_MS,
    keepaliveMs: values.MCP_GATEWAY_KEEPALIVE_MS,
    maxSessions: values.MCP_GATEWAY_MAX_SESSIONS,
    builtinRoute: values.MCP_GATEWAY_BUILTIN_ROUTE.length > 0 ? values.MCP_GATEWAY_BUILTIN_ROUTE : undefined,
    publicHost: values.MCP_GATEWAY_PUBLIC_HOST,
    corsOrigin: values.MCP_GATEWAY_CORS_ORIGIN,
    bodyLimit: values.MCP_GATEWAY_BODY_LIMIT,
    logLevel: values.LOG_LEVEL,
    ...overrides,
  };
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}
