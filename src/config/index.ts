import { z } from 'zod';
import { readFileSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import { parse as parseYaml } from 'yaml';

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Interpolate environment variables in a string
 * Supports ${VAR_NAME} and ${VAR_NAME:-default} syntax
 */
function interpolateEnvVars(value: string): string {
  return value.replace(
    /\$\{([^}:]+)(?::-([^}]*))?\}/g,
    (_, varName: string, defaultValue: string | undefined) => {
      const envValue = process.env[varName];
      if (envValue !== undefined) {
        return envValue;
      }
      if (defaultValue !== undefined) {
        return defaultValue;
      }
      // Return empty string if no value and no default
      return '';
    }
  );
}

/**
 * Recursively process an object and interpolate environment variables in string values
 */
function processEnvVars(obj: unknown): unknown {
  if (typeof obj === 'string') {
    return interpolateEnvVars(obj);
  }
  if (Array.isArray(obj)) {
    return obj.map(processEnvVars);
  }
  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = processEnvVars(value);
    }
    return result;
  }
  return obj;
}

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);
const LogFormatSchema = z.enum(['json', 'pretty']);

const DEFAULT_ISSUER = 'https://accounts.google.com';

const ConfigSchema = z.object({
  server: z
    .object({
      host: z.string().default('127.0.0.1'),
      port: z.number().int().min(0).max(65535).default(8000),
      trust_proxy: z.boolean().default(false),
      cors_origin: z.string().default(''),
      rate_limit_max: z.number().int().positive().default(100),
      rate_limit_window_ms: z.number().int().min(1000).default(60000),
    })
    .default({}),
  auth: z
    .object({
      oauth_client_id: z.string().default(''),
      cache_ttl_seconds: z.number().int().default(600),
      introspection_url: z.string().url().default('https://oauth2.googleapis.com/tokeninfo'),
      validation_timeout_ms: z.number().int().positive().default(5000),
      protected_prefixes: z.array(z.string().startsWith('/')).default(['/sse', '/messages', '/tools']),
      discovery_prefixes: z
        .array(z.string().startsWith('/'))
        .default(['/.well-known', '/sse/.well-known']),
      cache_cleanup_interval_ms: z.number().int().positive().default(300000),
    })
    .default({}),
  discovery: z
    .object({
      issuer: z.string().url().default(DEFAULT_ISSUER),
      authorization_endpoint: z.string().url().default('https://accounts.google.com/o/oauth2/v2/auth'),
      token_endpoint: z.string().url().default('https://oauth2.googleapis.com/token'),
      jwks_uri: z.string().url().default('https://www.googleapis.com/oauth2/v3/certs'),
      response_types_supported: z.array(z.string()).default(['code']),
      grant_types_supported: z.array(z.string()).default(['authorization_code', 'refresh_token']),
      token_endpoint_auth_methods_supported: z
        .array(z.string())
        .default(['client_secret_post', 'client_secret_basic']),
      scopes_supported: z.array(z.string()).default(['openid', 'email', 'profile']),
    })
    .default({}),
  memory: z
    .object({
      dir: z.string().min(1).default('~/.fitbridge/memory'),
      read_only: z.boolean().default(true),
      write_enabled: z.boolean().default(true),
    })
    .default({}),
  logging: z
    .object({
      level: LogLevelSchema.default('info'),
      format: LogFormatSchema.default('json'),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

export type ConfigOverrides = { [Section in keyof Config]?: Partial<Config[Section]> };

/**
 * "1", "true" and "yes" (any case) are true, anything else is false
 */
export function parseBoolean(value: string): boolean {
  return ['1', 'true', 'yes'].includes(value.trim().toLowerCase());
}

function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}

function parseList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function expandHome(path: string): string {
  if (path === '~') {
    return homedir();
  }
  if (path.startsWith('~/')) {
    return join(homedir(), path.slice(2));
  }
  return path;
}

export function loadConfig(configPath: string): Config {
  try {
    const content = readFileSync(configPath, 'utf-8');
    const parsed: unknown = parseYaml(content);
    // Interpolate environment variables in config values
    const processed = processEnvVars(parsed ?? {});
    return ConfigSchema.parse(processed);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      // Config file doesn't exist, use defaults
      return ConfigSchema.parse({});
    }
    throw error;
  }
}

/**
 * Only variables that are actually set produce an override
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
  const server: Partial<Config['server']> = {};
  if (env.HOST) server.host = env.HOST;
  const port = parseInteger(env.PORT);
  if (port !== undefined) server.port = port;
  if (env.TRUST_PROXY !== undefined) server.trust_proxy = parseBoolean(env.TRUST_PROXY);
  if (env.CORS_ORIGIN !== undefined) server.cors_origin = env.CORS_ORIGIN;
  const rateLimitMax = parseInteger(env.RATE_LIMIT_MAX);
  if (rateLimitMax !== undefined) server.rate_limit_max = rateLimitMax;
  const rateLimitWindow = parseInteger(env.RATE_LIMIT_WINDOW);
  if (rateLimitWindow !== undefined) server.rate_limit_window_ms = rateLimitWindow;

  const auth: Partial<Config['auth']> = {};
  if (env.OAUTH_CLIENT_ID !== undefined) auth.oauth_client_id = env.OAUTH_CLIENT_ID.trim();
  const cacheTtl = parseInteger(env.OAUTH_CACHE_TTL_SECONDS);
  if (cacheTtl !== undefined) auth.cache_ttl_seconds = cacheTtl;
  if (env.OAUTH_INTROSPECTION_URL) auth.introspection_url = env.OAUTH_INTROSPECTION_URL;
  const timeout = parseInteger(env.OAUTH_VALIDATION_TIMEOUT_MS);
  if (timeout !== undefined) auth.validation_timeout_ms = timeout;
  if (env.PROTECTED_PREFIXES) auth.protected_prefixes = parseList(env.PROTECTED_PREFIXES);

  const memory: Partial<Config['memory']> = {};
  if (env.CREDENTIAL_STORE_DIR) memory.dir = env.CREDENTIAL_STORE_DIR;
  if (env.READ_ONLY !== undefined) memory.read_only = parseBoolean(env.READ_ONLY);
  if (env.MEMORY_WRITE_ENABLED !== undefined) {
    memory.write_enabled = parseBoolean(env.MEMORY_WRITE_ENABLED);
  }

  const logging: Partial<Config['logging']> = {};
  const level = LogLevelSchema.safeParse(env.LOG_LEVEL);
  if (level.success) logging.level = level.data;
  const format = LogFormatSchema.safeParse(env.LOG_FORMAT);
  if (format.success) logging.format = format.data;

  return { server, auth, memory, logging };
}

/**
 * Environment overrides win over the file; the result is re-validated
 */
export function mergeConfig(fileConfig: Config, envConfig: ConfigOverrides): Config {
  const merged = ConfigSchema.parse({
    server: { ...fileConfig.server, ...envConfig.server },
    auth: { ...fileConfig.auth, ...envConfig.auth },
    discovery: { ...fileConfig.discovery, ...envConfig.discovery },
    memory: { ...fileConfig.memory, ...envConfig.memory },
    logging: { ...fileConfig.logging, ...envConfig.logging },
  });

  return {
    ...merged,
    memory: { ...merged.memory, dir: expandHome(merged.memory.dir) },
  };
}
