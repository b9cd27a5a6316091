/**
 * Schema Setup
 * Creates the collision tables (and optionally the analytics indexes) in the configured schema
 *
 * Usage:
 *   npx tsx scripts/setup-schema.ts                  # Create missing tables
 *   npx tsx scripts/setup-schema.ts --reset          # Drop and recreate all tables
 *   npx tsx scripts/setup-schema.ts --with-indexes   # Also create secondary indexes
 *   npx tsx scripts/setup-schema.ts --config appsettings.local.json
 */

import * as sql from 'mssql';
import * as dotenv from 'dotenv';
import * as path from 'path';
import { valueAfter } from './lib/cli-args';
import { getSqlConfig, loadConfig, validateConfig } from './lib/config-loader';
import { formatError, retryWithBackoff, toConnectivityError } from './lib/error-handler';
import { ProgressReporter } from './lib/progress-reporter';
import { executeSQLScript } from './lib/sql-executor';

dotenv.config();

const SQL_DIR = path.resolve(__dirname, '..', 'sql');

async function main(): Promise<number> {
  const args = process.argv.slice(2);
  const config = loadConfig(undefined, { configPath: valueAfter(args, '--config') });
  const validation = validateConfig(config);
  if (!validation.valid) {
    console.error('❌ Invalid configuration:');
    validation.errors.forEach(error => console.error(`   - ${error}`));
    return 1;
  }

  const scripts = [
    ...(args.includes('--reset') ? ['reset.sql'] : []),
    'schema.sql',
    ...(args.includes('--with-indexes') ? ['indexes.sql'] : []),
  ];

  const reporter = new ProgressReporter();
  const sqlConfig = getSqlConfig(config);
  const retry = { maxRetries: config.connection.maxRetries, baseDelay: config.connection.retryDelayMs };

  let pool: sql.ConnectionPool;
  try {
    pool = await retryWithBackoff(() => new sql.ConnectionPool(sqlConfig).connect(), retry);
  } catch (error) {
    throw toConnectivityError(error, `Cannot connect to ${sqlConfig.server}`);
  }
  reporter.logInfo(`Connected to ${sqlConfig.server}/${sqlConfig.database} [${config.database.schema}]`);

  try {
    for (let i = 0; i < scripts.length; i++) {
      reporter.logPhase(scripts[i], i + 1, scripts.length);
      const result = await executeSQLScript({
        pool,
        scriptPath: path.join(SQL_DIR, scripts[i]),
        schema: config.database.schema,
        retry,
      });

      if (!result.success) {
        reporter.logStepFailure(scripts[i], result.error ?? new Error('unknown failure'));
        return 1;
      }
      reporter.logStepComplete(scripts[i], result.duration);
    }
  } finally {
    await pool.close();
  }

  console.log('✅ Schema ready');
  return 0;
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(formatError(error));
    process.exit(1);
  });
