import fp from 'fastify-plugin';
import type { ReportScope } from '@delaylens/shared';
import { DEFAULT_BODY_LIMIT } from '../constants.js';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

const VALID_LOG_LEVELS: readonly LogLevel[] = [
  'trace',
  'debug',
  'info',
  'warn',
  'error',
  'fatal',
  'silent',
];

// Type-safe configuration interface
export interface AppConfig {
  port: number;
  host: string;
  logLevel: LogLevel;
  nodeEnv: string;
  trustProxy: boolean;
  bodyLimit: number; // bytes
  defaultScope: ReportScope;
}

// Type augmentation: makes fastify.config available across all routes/plugins
declare module 'fastify' {
  interface FastifyInstance {
    config: AppConfig;
  }
}

type Env = Record<string, string | undefined>;

// Treat empty strings as undefined
function getValue(env: Env, key: string): string | undefined {
  const value = env[key];
  return value === '' ? undefined : value;
}

function parseLogLevel(env: Env, errors: string[]): LogLevel {
  const logLevelStr = (getValue(env, 'LOG_LEVEL') ?? 'info').toLowerCase();
  const logLevel = VALID_LOG_LEVELS.find((level) => level === logLevelStr);
  if (!logLevel) {
    errors.push(
      `LOG_LEVEL must be one of ${VALID_LOG_LEVELS.join(', ')}, got: ${getValue(env, 'LOG_LEVEL')}`,
    );
    return 'info';
  }
  return logLevel;
}

function throwIfInvalid(errors: string[]): void {
  if (errors.length > 0) {
    throw new Error(`Configuration validation failed:\n  - ${errors.join('\n  - ')}`);
  }
}

/**
 * Read LOG_LEVEL alone. Used by the CLI, which needs no server settings.
 *
 * @throws Error if LOG_LEVEL is invalid
 */
export function loadLogLevel(env: Env): LogLevel {
  const errors: string[] = [];
  const logLevel = parseLogLevel(env, errors);
  throwIfInvalid(errors);
  return logLevel;
}

/**
 * Pure function to load and validate configuration from environment variables.
 *
 * @param env - Environment variables object (e.g., process.env)
 * @returns Validated AppConfig
 * @throws Error if configuration is invalid (lists all validation errors)
 */
export function loadConfig(env: Env): AppConfig {
  const errors: string[] = [];

  // Parse and validate PORT
  const portStr = getValue(env, 'PORT') ?? '3000';
  const port = parseInt(portStr, 10);
  if (isNaN(port)) {
    errors.push(`PORT must be a valid number, got: ${portStr}`);
  } else if (port < 0 || port > 65535) {
    errors.push(`PORT must be in range 0-65535, got: ${port}`);
  }

  // HOST (simple string, no validation)
  const host = getValue(env, 'HOST') ?? '0.0.0.0';

  const logLevel = parseLogLevel(env, errors);

  // NODE_ENV (simple string, no validation)
  const nodeEnv = getValue(env, 'NODE_ENV') ?? 'production';

  // Parse TRUST_PROXY (boolean, default false)
  const trustProxyStr = (getValue(env, 'TRUST_PROXY') ?? 'false').toLowerCase();
  let trustProxy: boolean;
  if (trustProxyStr === 'true') {
    trustProxy = true;
  } else if (trustProxyStr === 'false') {
    trustProxy = false;
  } else {
    errors.push(`TRUST_PROXY must be 'true' or 'false', got: ${getValue(env, 'TRUST_PROXY')}`);
    trustProxy = false; // Default fallback
  }

  // Parse and validate BODY_LIMIT
  const bodyLimitStr = getValue(env, 'BODY_LIMIT') ?? String(DEFAULT_BODY_LIMIT);
  const bodyLimit = parseInt(bodyLimitStr, 10);
  if (isNaN(bodyLimit)) {
    errors.push(`BODY_LIMIT must be a valid number, got: ${bodyLimitStr}`);
  } else if (bodyLimit <= 0) {
    errors.push(`BODY_LIMIT must be greater than 0, got: ${bodyLimit}`);
  }

  // Parse and validate DEFAULT_SCOPE
  const scopeStr = (getValue(env, 'DEFAULT_SCOPE') ?? 'critical').toLowerCase();
  let defaultScope: ReportScope;
  if (scopeStr === 'critical' || scopeStr === 'all') {
    defaultScope = scopeStr;
  } else {
    errors.push(`DEFAULT_SCOPE must be 'critical' or 'all', got: ${getValue(env, 'DEFAULT_SCOPE')}`);
    defaultScope = 'critical';
  }

  // If there are any validation errors, throw a single error listing all of them
  throwIfInvalid(errors);

  return {
    port,
    host,
    logLevel,
    nodeEnv,
    trustProxy,
    bodyLimit,
    defaultScope,
  };
}

export interface ConfigPluginOptions {
  /** Already-loaded configuration; read from process.env when omitted. */
  config?: AppConfig;
}

export default fp<ConfigPluginOptions>(
  async function configPlugin(fastify, opts) {
    const config = opts.config ?? loadConfig(process.env);

    fastify.log.info(config, 'Configuration loaded');

    // Decorate Fastify instance with the config
    fastify.decorate('config', config);
  },
  {
    name: 'config',
  },
);
