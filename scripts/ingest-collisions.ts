/**
 * Collision CSV Ingestion
 * =======================
 * Loads a motor vehicle collisions CSV into the normalized SQL Server schema
 *
 * Usage:
 *   npx tsx scripts/ingest-collisions.ts [options]
 *
 * Options:
 *   --file <path>          Source CSV (default: $CSV_FILE or appsettings.json)
 *   --config <path>        Settings file (default: ./appsettings.json)
 *   --limit <n>            Read only the first n data rows
 *   --batch-size <n>       Rows per transaction (default: 500)
 *   --reject-duplicates    Skip rows whose collision_id already exists (default: overwrite)
 *   --verify               Run the integrity report after loading
 *   --debug                Print configuration and per-row skip details
 *
 * Exit codes:
 *   0  all rows loaded
 *   1  fatal error (configuration, connectivity, failed verification)
 *   2  finished, but some rows were skipped (see summary)
 *
 * Run scripts/setup-schema.ts first to create the tables.
 */

import * as dotenv from 'dotenv';
import { parseIngestArgs, toConfigOverrides } from './lib/cli-args';
import { getSqlConfig, loadConfig, printConfig, validateConfig } from './lib/config-loader';
import { formatError } from './lib/error-handler';
import { exitCodeFor, runIngestion } from './lib/ingest-pipeline';
import { findIntegrityProblems, formatIntegrityReport } from './lib/integrity-check';
import { MssqlCollisionStore } from './lib/mssql-store';
import { ProgressReporter } from './lib/progress-reporter';

dotenv.config();

const USAGE = `Usage: npx tsx scripts/ingest-collisions.ts [--file <path>] [--config <path>] [--limit <n>]
       [--batch-size <n>] [--reject-duplicates] [--verify] [--debug]`;

async function main(): Promise<number> {
  const args = parseIngestArgs(process.argv.slice(2));
  if (args.help) {
    console.log(USAGE);
    return 0;
  }

  const config = loadConfig(toConfigOverrides(args), { configPath: args.configPath });
  const validation = validateConfig(config);
  if (!validation.valid) {
    console.error('❌ Invalid configuration:');
    validation.errors.forEach(error => console.error(`   - ${error}`));
    return 1;
  }

  if (config.debugMode.enabled) {
    printConfig(config);
  }

  const reporter = new ProgressReporter({ debug: config.debugMode.enabled });
  const store = await MssqlCollisionStore.connect(getSqlConfig(config), {
    schema: config.database.schema,
    retry: { maxRetries: config.connection.maxRetries, baseDelay: config.connection.retryDelayMs },
  });
  reporter.logInfo(`Connected to ${store.description}`);

  try {
    const summary = await runIngestion({ store, source: config.source.file, config, reporter });
    let exitCode = exitCodeFor(summary);

    if (args.verify) {
      reporter.logPhase('Verify load', 1, 1);
      const report = await store.integrityReport();
      formatIntegrityReport(report).forEach(line => console.log(line));
      if (findIntegrityProblems(report).length > 0) {
        exitCode = 1;
      }
    }

    return exitCode;
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
