import { DEFAULT_RECORDS_TABLE } from 'film-locations-query';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export type DataSourceConfig =
  | { readonly kind: 'postgres'; readonly connectionString: string; readonly table: string }
  | { readonly kind: 'geojson'; readonly path: string };

export interface AppConfig {
  readonly source: DataSourceConfig;
  readonly port: number;
  readonly host: string;
  readonly logLevel: LogLevel;
  readonly diagnosticsPath: string | null;
}

export class InvalidConfigError extends Error {
  override readonly name = 'InvalidConfigError';

  constructor(
    readonly variable: string,
    message: string,
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

type Env = Readonly<Record<string, string | undefined>>;

function read(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value === undefined || value === '' ? undefined : value;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function parsePort(raw: string | undefined): number {
  if (raw === undefined) return 3000;
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new InvalidConfigError('PORT', `PORT must be an integer between 0 and 65535, got "${raw}"`);
  }
  return port;
}

/**
 * Reads the service configuration from environment variables. DATABASE_URL
 * wins over DATASET_PATH when both are set; neither is a start-up error.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const databaseUrl = read(env, 'DATABASE_URL');
  const datasetPath = read(env, 'DATASET_PATH');

  let source: DataSourceConfig;
  if (databaseUrl !== undefined) {
    source = {
      kind: 'postgres',
      connectionString: databaseUrl,
      table: read(env, 'RECORDS_TABLE') ?? DEFAULT_RECORDS_TABLE,
    };
  } else if (datasetPath !== undefined) {
    source = { kind: 'geojson', path: datasetPath };
  } else {
    throw new InvalidConfigError('DATABASE_URL', 'Either DATABASE_URL or DATASET_PATH environment variable is required');
  }

  const logLevel = read(env, 'LOG_LEVEL') ?? 'info';
  if (!isLogLevel(logLevel)) {
    throw new InvalidConfigError('LOG_LEVEL', `LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${logLevel}"`);
  }

  return {
    source,
    port: parsePort(read(env, 'PORT')),
    host: read(env, 'HOST') ?? '0.0.0.0',
    logLevel,
    diagnosticsPath: read(env, 'DIAGNOSTICS_PATH') ?? null,
  };
}
