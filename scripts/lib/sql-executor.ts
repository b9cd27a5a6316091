import * as sql from 'mssql';
import * as fs from 'fs';
import * as path from 'path';
import { retryWithBackoff, type RetryOptions } from './error-handler';

export interface SQLExecutionOptions {
  pool: sql.ConnectionPool;
  scriptPath: string;
  schema: string;
  retry?: RetryOptions;
  log?: (line: string) => void;
}

export interface SQLExecutionResult {
  success: boolean;
  batches: number;
  recordsAffected: number;
  duration: number;
  error?: Error;
}

/**
 * Replace $(SCHEMA) placeholders with the configured schema name
 */
export function substituteSchemaVariables(script: string, schema: string): string {
  return script.replace(/\$\(SCHEMA\)/g, schema);
}

/**
 * Split a script on GO batch separators (SQL Server requirement)
 */
export function splitBatches(script: string): string[] {
  return script
    .split(/^\s*GO\s*$/gim)
    .map(batch => batch.trim())
    .filter(batch => batch.length > 0);
}

/**
 * Execute SQL script with schema variable substitution
 */
export async function executeSQLScript(options: SQLExecutionOptions): Promise<SQLExecutionResult> {
  const startTime = Date.now();
  const log = options.log ?? console.log;
  let batchCount = 0;

  try {
    const scriptContent = fs.readFileSync(options.scriptPath, 'utf-8');
    const batches = splitBatches(substituteSchemaVariables(scriptContent, options.schema));
    batchCount = batches.length;

    log(`   ⚡ Executing ${batches.length} SQL batch(es) from ${path.basename(options.scriptPath)}...`);
    let totalRowsAffected = 0;

    for (let i = 0; i < batches.length; i++) {
      const batch = batches[i];
      const result = await retryWithBackoff(
        () => options.pool.request().query(batch),
        {
          maxRetries: 3,
          baseDelay: 1000,
          ...options.retry,
          onRetry: attempt => {
            log(`    Retry attempt ${attempt} for ${path.basename(options.scriptPath)} batch ${i + 1}`);
          }
        }
      );

      totalRowsAffected += result.rowsAffected.reduce((sum, n) => sum + n, 0);
    }

    return {
      success: true,
      batches: batchCount,
      recordsAffected: totalRowsAffected,
      duration: (Date.now() - startTime) / 1000
    };
  } catch (error) {
    return {
      success: false,
      batches: batchCount,
      recordsAffected: 0,
      duration: (Date.now() - startTime) / 1000,
      error: error instanceof Error ? error : new Error(String(error))
    };
  }
}
