import * as fs from 'fs';
import * as path from 'path';
import type * as sql from 'mssql';
import { z } from 'zod';

export type DuplicatePolicy = 'overwrite' | 'reject';

export interface CollisionsETLConfig {
  database: {
    connectionString: string;
    schema: string; // 'dbo'
  };
  source: {
    file: string;
  };
  load: {
    batchSize: number;
    duplicatePolicy: DuplicatePolicy;
    rowLimit: number; // 0 = no limit
    ignoredFactors: string[];
    maxErrorSamples: number;
  };
  connection: {
    maxRetries: number;
    retryDelayMs: number;
  };
  debugMode: {
    enabled: boolean;
  };
}

export type ConfigOverrides = {
  [K in keyof CollisionsETLConfig]?: Partial<CollisionsETLConfig[K]>;
};

export interface LoadConfigOptions {
  /** Settings file; defaults to appsettings.json in the working directory */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  warn?: (message: string) => void;
}

const DUPLICATE_POLICIES: readonly DuplicatePolicy[] = ['overwrite', 'reject'];

// Placeholder the source uses for "no factor recorded"; IGNORED_FACTORS= (empty) keeps it
const DEFAULT_IGNORED_FACTORS = ['Unspecified'];

const AppSettingsSchema = z
  .object({
    database: z
      .object({
        connectionString: z.string(),
        schema: z.string(),
      })
      .partial(),
    source: z.object({ file: z.string() }).partial(),
    load: z
      .object({
        batchSize: z.number().int().positive(),
        duplicatePolicy: z.enum(['overwrite', 'reject']),
        rowLimit: z.number().int().nonnegative(),
        ignoredFactors: z.array(z.string()),
        maxErrorSamples: z.number().int().nonnegative(),
      })
      .partial(),
    connection: z
      .object({
        maxRetries: z.number().int().positive(),
        retryDelayMs: z.number().int().nonnegative(),
      })
      .partial(),
    debugMode: z.object({ enabled: z.boolean() }).partial(),
  })
  .partial();

type AppSettings = z.infer<typeof AppSettingsSchema>;

/**
 * Parse a SQL Server connection string into mssql config
 * Format: Server=...;Database=...;User Id=...;Password=...;TrustServerCertificate=...;Encrypt=...;
 */
function parseConnectionString(connStr: string): Partial<sql.config> {
  const parts: Record<string, string> = {};
  connStr.split(';').forEach(part => {
    const [key, ...valueParts] = part.split('=');
    if (key && valueParts.length > 0) {
      parts[key.trim().toLowerCase()] = valueParts.join('=').trim();
    }
  });

  let server = parts['server'] || parts['data source'];
  let port: number | undefined;
  // Server=host,1433 is the SQL Server way of naming a port
  if (server && server.includes(',')) {
    const [host, portText] = server.split(',');
    server = host.trim();
    port = parseInt(portText, 10) || undefined;
  }

  return {
    server,
    port,
    database: parts['database'] || parts['initial catalog'],
    user: parts['user id'] || parts['uid'] || parts['user'],
    password: parts['password'] || parts['pwd'],
    options: {
      encrypt: parts['encrypt']?.toLowerCase() !== 'false',
      trustServerCertificate: parts['trustservercertificate']?.toLowerCase() === 'true',
    }
  };
}

function readSettingsFile(configPath: string, warn: (message: string) => void): AppSettings {
  if (!fs.existsSync(configPath)) {
    return {};
  }

  try {
    const parsed = AppSettingsSchema.safeParse(JSON.parse(fs.readFileSync(configPath, 'utf-8')));
    if (parsed.success) {
      return parsed.data;
    }
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    warn(`⚠️  Warning: Ignoring invalid ${path.basename(configPath)} (${issues})`);
  } catch (error) {
    warn(`⚠️  Warning: Failed to parse ${path.basename(configPath)}: ${error}`);
  }
  return {};
}

function parseNonNegativeInt(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = parseInt(value, 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : undefined;
}

function parseDuplicatePolicy(value: string | undefined): DuplicatePolicy | undefined {
  const policy = value?.trim().toLowerCase();
  return DUPLICATE_POLICIES.find(p => p === policy);
}

function parseList(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  return value.split(',').map(item => item.trim()).filter(item => item.length > 0);
}

/**
 * Load ETL configuration from appsettings.json and environment variables
 *
 * Priority:
 * 1. Command-line overrides (passed as parameter)
 * 2. Environment variables
 * 3. appsettings.json (or options.configPath)
 * 4. Default values
 */
export function loadConfig(overrides?: ConfigOverrides, options: LoadConfigOptions = {}): CollisionsETLConfig {
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? path.join(process.cwd(), 'appsettings.json');
  const fileConfig = readSettingsFile(configPath, options.warn ?? console.warn);

  // Build connection string from individual environment variables
  let connectionString = env.SQLSERVER || '';

  if (!connectionString && (env.SQLSERVER_HOST || env.SQLSERVER_DATABASE)) {
    const server = env.SQLSERVER_HOST;
    const database = env.SQLSERVER_DATABASE;
    const user = env.SQLSERVER_USER;
    const password = env.SQLSERVER_PASSWORD;

    if (server && database && user && password) {
      connectionString = `Server=${server};Database=${database};User Id=${user};Password=${password};TrustServerCertificate=True;Encrypt=True;`;
    }
  }

  const o = overrides ?? {};

  return {
    database: {
      connectionString: o.database?.connectionString || connectionString || fileConfig.database?.connectionString || '',
      schema: o.database?.schema || env.DB_SCHEMA || fileConfig.database?.schema || 'dbo',
    },
    source: {
      file: o.source?.file || env.CSV_FILE || fileConfig.source?.file || 'motor_vehicle_collisions.csv',
    },
    load: {
      batchSize: o.load?.batchSize || parseNonNegativeInt(env.BATCH_SIZE) || fileConfig.load?.batchSize || 500,
      duplicatePolicy: o.load?.duplicatePolicy ?? parseDuplicatePolicy(env.DUPLICATE_POLICY) ?? fileConfig.load?.duplicatePolicy ?? 'overwrite',
      rowLimit: o.load?.rowLimit ?? parseNonNegativeInt(env.ROW_LIMIT) ?? fileConfig.load?.rowLimit ?? 0,
      ignoredFactors: o.load?.ignoredFactors ?? parseList(env.IGNORED_FACTORS) ?? fileConfig.load?.ignoredFactors ?? [...DEFAULT_IGNORED_FACTORS],
      maxErrorSamples: o.load?.maxErrorSamples ?? parseNonNegativeInt(env.MAX_ERROR_SAMPLES) ?? fileConfig.load?.maxErrorSamples ?? 20,
    },
    connection: {
      maxRetries: o.connection?.maxRetries || parseNonNegativeInt(env.DB_MAX_RETRIES) || fileConfig.connection?.maxRetries || 5,
      retryDelayMs: o.connection?.retryDelayMs ?? parseNonNegativeInt(env.DB_RETRY_DELAY_MS) ?? fileConfig.connection?.retryDelayMs ?? 2000,
    },
    debugMode: {
      enabled: o.debugMode?.enabled ?? (env.DEBUG_MODE === 'true' || fileConfig.debugMode?.enabled || false),
    },
  };
}

/**
 * Convert ETL config to mssql config
 */
export function getSqlConfig(config: CollisionsETLConfig): sql.config {
  if (!config.database.connectionString) {
    throw new Error('Database connection string is required');
  }

  const parsed = parseConnectionString(config.database.connectionString);

  if (!parsed.server || !parsed.database || !parsed.user || !parsed.password) {
    throw new Error('Invalid connection string. Expected format: Server=...;Database=...;User Id=...;Password=...;TrustServerCertificate=True;Encrypt=True;');
  }

  return {
    server: parsed.server,
    port: parsed.port,
    database: parsed.database,
    user: parsed.user,
    password: parsed.password,
    options: {
      encrypt: parsed.options?.encrypt ?? true,
      trustServerCertificate: parsed.options?.trustServerCertificate ?? true,
    },
    requestTimeout: 300000,
    connectionTimeout: 30000,
    pool: {
      max: 4,
      min: 0,
      idleTimeoutMillis: 30000,
    },
  };
}

/**
 * Validate configuration
 */
export function validateConfig(config: CollisionsETLConfig): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!config.database.connectionString) {
    errors.push('Database connection string is required');
  }

  // Schema name is interpolated into SQL, so only plain identifiers are allowed
  if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(config.database.schema)) {
    errors.push(`Invalid schema name: "${config.database.schema}"`);
  }

  if (!config.source.file) {
    errors.push('Source CSV file is required');
  }

  if (!Number.isInteger(config.load.batchSize) || config.load.batchSize < 1) {
    errors.push('Batch size must be a positive integer');
  }

  if (!DUPLICATE_POLICIES.includes(config.load.duplicatePolicy)) {
    errors.push(`Unknown duplicate policy: "${config.load.duplicatePolicy}"`);
  }

  return {
    valid: errors.length === 0,
    errors
  };
}

/**
 * Mask the password of a connection string
 */
export function maskConnectionString(connectionString: string): string {
  return connectionString.replace(/(Password|Pwd)=[^;]+/i, '$1=***');
}

/**
 * Print configuration (for debugging, masks sensitive data)
 */
export function printConfig(config: CollisionsETLConfig, log: (line: string) => void = console.log): void {
  const maskedConfig: CollisionsETLConfig = {
    ...config,
    database: {
      ...config.database,
      connectionString: maskConnectionString(config.database.connectionString),
    },
  };

  log('\n📋 ETL Configuration:');
  log('════════════════════════════════════════════════════════════════');
  log(JSON.stringify(maskedConfig, null, 2));
  log('════════════════════════════════════════════════════════════════\n');
}
