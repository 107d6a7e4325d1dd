import { IBaseApiConfig } from '../models/base-api-config.interface.js';

export const DEFAULT_PORT = 8000;
export const DEFAULT_HOST_NAME = '0.0.0.0';

export let config: IBaseApiConfig;
let isConfigSet = false;

export function setBaseApiConfig(apiConfig: IBaseApiConfig) {
  if (!isConfigSet) {
    config = { ...apiConfig };
    isConfigSet = true;
  } else if (config.env !== 'test') {
    console.warn('BaseApiConfig data has already been set. Ignoring subsequent calls to setBaseApiConfig.');
  }
}

function parsePort(value: string | undefined): number {
  if (value === undefined || value.trim() === '') {
    return DEFAULT_PORT;
  }
  const port = Number(value);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new Error(`PORT must be an integer between 1 and 65535, got "${value}"`);
  }
  return port;
}

function parseList(value: string | undefined, fallback: string[]): string[] {
  if (!value) {
    return fallback;
  }
  const items = value.split(',').map(item => item.trim()).filter(item => item.length > 0);
  return items.length > 0 ? items : fallback;
}

/**
 * Builds the api config from environment variables:
 * NODE_ENV, HOST, PORT, DATABASE_URL, DATABASE_NAME, CORS_ALLOWED_ORIGINS, SHOW_ERRORS, RUN_MIGRATIONS.
 */
export function loadBaseApiConfig(env: NodeJS.ProcessEnv = process.env): IBaseApiConfig {
  const databaseUrl = env.DATABASE_URL?.trim();
  const databaseName = env.DATABASE_NAME?.trim();

  return {
    app: {
      name: 'school-portal-api',
    },
    database: databaseUrl && databaseName ? { url: databaseUrl, name: databaseName } : undefined,
    debug: {
      showErrors: env.SHOW_ERRORS === 'true',
    },
    env: env.NODE_ENV || 'development',
    migrations: {
      runOnStartup: env.RUN_MIGRATIONS === 'true',
    },
    network: {
      corsAllowedOrigins: parseList(env.CORS_ALLOWED_ORIGINS, ['*']),
      externalPort: parsePort(env.PORT),
      hostName: env.HOST || DEFAULT_HOST_NAME,
    },
  };
}
