/**
 * Post-load verification
 * Prints row counts and checks referential integrity of the collision tables
 *
 * Usage:
 *   npx tsx scripts/verify-load.ts [--config <path>]
 *
 * Exits 1 when any integrity problem is found.
 */

import * as dotenv from 'dotenv';
import { valueAfter } from './lib/cli-args';
import { getSqlConfig, loadConfig, validateConfig } from './lib/config-loader';
import { formatError } from './lib/error-handler';
import { findIntegrityProblems, formatIntegrityReport } from './lib/integrity-check';
import { MssqlCollisionStore } from './lib/mssql-store';

dotenv.config();

async function main(): Promise<number> {
  const config = loadConfig(undefined, { configPath: valueAfter(process.argv.slice(2), '--config') });
  const validation = validateConfig(config);
  if (!validation.valid) {
    console.error('❌ Invalid configuration:');
    validation.errors.forEach(error => console.error(`   - ${error}`));
    return 1;
  }

  const store = await MssqlCollisionStore.connect(getSqlConfig(config), {
    schema: config.database.schema,
    retry: { maxRetries: config.connection.maxRetries, baseDelay: config.connection.retryDelayMs },
  });

  try {
    console.log(`\n=== COLLISION TABLES (${store.description}) ===`);
    const report = await store.integrityReport();
    formatIntegrityReport(report).forEach(line => console.log(line));
    return findIntegrityProblems(report).length > 0 ? 1 : 0;
  } finally {
    await store.close();
  }
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(formatError(error));
    process.exit(1);
  });
