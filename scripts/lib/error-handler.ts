/**
 * Error Handler for the collision ETL
 * Row-level error taxonomy, driver error classification and retry logic for transient failures
 */

import * as sql from 'mssql';

export type IngestErrorKind = 'parse' | 'integrity' | 'connectivity';

/**
 * Base class for errors the pipeline reports by kind
 */
export abstract class IngestError extends Error {
  abstract readonly kind: IngestErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A row whose required field could not be parsed; the row is skipped
 */
export class ParseError extends IngestError {
  readonly kind = 'parse' as const;

  constructor(
    message: string,
    readonly row: number,
    readonly field?: string
  ) {
    super(message);
  }
}

/**
 * A row that would break a key or reference rule; the row is skipped
 */
export class IntegrityError extends IngestError {
  readonly kind = 'integrity' as const;

  constructor(
    message: string,
    readonly collisionId: number | null,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * The target store cannot be reached; aborts the run
 */
export class ConnectivityError extends IngestError {
  readonly kind = 'connectivity' as const;
}

export type ErrorCategory = 'connection' | 'timeout' | 'deadlock' | 'constraint' | 'syntax' | 'unknown';

export interface ErrorClassification {
  isTransient: boolean;
  isRecoverable: boolean;
  category: ErrorCategory;
  message: string;
  suggestion: string;
}

interface ErrorDetails {
  name: string;
  message: string;
  code: string | number | undefined;
  number: number | undefined;
  lineNumber: number | undefined;
  procName: string | undefined;
  stack: string;
}

function readProperty(error: unknown, key: string): unknown {
  if (typeof error === 'object' && error !== null && key in error) {
    return Reflect.get(error, key);
  }
  return undefined;
}

function errorDetails(error: unknown): ErrorDetails {
  const message = readProperty(error, 'message');
  const code = readProperty(error, 'code');
  const number = readProperty(error, 'number');
  const lineNumber = readProperty(error, 'lineNumber');
  const procName = readProperty(error, 'procName');
  const stack = readProperty(error, 'stack');
  const name = readProperty(error, 'name');

  return {
    name: typeof name === 'string' ? name : 'Error',
    message: typeof message === 'string' ? message : String(error),
    code: typeof code === 'string' || typeof code === 'number' ? code : undefined,
    number: typeof number === 'number' ? number : undefined,
    lineNumber: typeof lineNumber === 'number' ? lineNumber : undefined,
    procName: typeof procName === 'string' && procName !== '' ? procName : undefined,
    stack: typeof stack === 'string' ? stack : '',
  };
}

const CONNECTION_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ENOTFOUND', 'ESOCKET', 'ECONNCLOSED', 'ENOTOPEN']);

/**
 * Classify an error to determine if it's transient and recoverable
 */
export function classifyError(error: unknown): ErrorClassification {
  // Driver errors carry a string `code` (EREQUEST, ESOCKET, ...) and the server's error `number` separately
  const { message, code, number } = errorDetails(error);

  // Login failures will not fix themselves on retry
  if (code === 'ELOGIN') {
    return {
      isTransient: false,
      isRecoverable: false,
      category: 'connection',
      message: 'Database login failed',
      suggestion: 'Check the user and password in the connection string'
    };
  }

  // Connection errors (transient)
  if (
    (typeof code === 'string' && CONNECTION_CODES.has(code)) ||
    message.includes('Connection lost') ||
    message.includes('socket hang up') ||
    message.includes('Failed to connect')
  ) {
    return {
      isTransient: true,
      isRecoverable: true,
      category: 'connection',
      message: 'Database connection error',
      suggestion: 'Retrying with exponential backoff'
    };
  }

  // Timeout errors (transient)
  if (
    number === -2 || // SQL Server timeout
    code === 'ETIMEOUT' ||
    code === 'ETIMEDOUT' ||
    /timeout/i.test(message)
  ) {
    return {
      isTransient: true,
      isRecoverable: true,
      category: 'timeout',
      message: 'Query timeout',
      suggestion: 'Consider increasing requestTimeout or lowering the batch size'
    };
  }

  // Deadlock victim (transient)
  if (number === 1205 || message.includes('deadlock')) {
    return {
      isTransient: true,
      isRecoverable: true,
      category: 'deadlock',
      message: 'Transaction deadlock detected',
      suggestion: 'Retrying transaction'
    };
  }

  // Constraint and truncation violations (not transient, the row can be skipped)
  if (
    number === 547 || // Foreign key / check constraint
    number === 2627 || // Unique constraint
    number === 2601 || // Duplicate key in unique index
    number === 2628 || // String truncation
    number === 8152 || // String truncation (older servers)
    message.includes('FOREIGN KEY constraint') ||
    message.includes('PRIMARY KEY constraint') ||
    message.includes('UNIQUE KEY constraint') ||
    message.includes('CHECK constraint') ||
    message.includes('would be truncated')
  ) {
    return {
      isTransient: false,
      isRecoverable: true,
      category: 'constraint',
      message: 'Database constraint violation',
      suggestion: 'Check data integrity and fix source data'
    };
  }

  // Syntax / schema errors (not recoverable without a code or schema change)
  if (
    number === 102 || // Syntax error
    number === 156 || // Incorrect syntax
    number === 208 || // Invalid object name
    message.includes('Incorrect syntax') ||
    message.includes('Invalid object name')
  ) {
    return {
      isTransient: false,
      isRecoverable: false,
      category: 'syntax',
      message: 'SQL syntax or schema error',
      suggestion: 'Run scripts/setup-schema.ts or verify the configured schema'
    };
  }

  return {
    isTransient: false,
    isRecoverable: true,
    category: 'unknown',
    message,
    suggestion: 'Review error details and logs'
  };
}

/**
 * True when the error means the target store is unreachable
 */
export function isConnectivityFailure(error: unknown): boolean {
  if (error instanceof ConnectivityError) return true;
  if (error instanceof IngestError) return false;
  return classifyError(error).category === 'connection' || errorDetails(error).name === 'ConnectionError';
}

/**
 * Wrap a driver error as a ConnectivityError, keeping the original as cause
 */
export function toConnectivityError(error: unknown, context: string): ConnectivityError {
  if (error instanceof ConnectivityError) return error;
  const { message } = errorDetails(error);
  return new ConnectivityError(`${context}: ${message}`, { cause: error });
}

export interface RetryOptions {
  maxRetries?: number;
  baseDelay?: number; // milliseconds
  maxDelay?: number; // milliseconds
  onRetry?: (attempt: number, error: unknown) => void;
  log?: (line: string) => void;
}

/**
 * Retry a function with exponential backoff
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxRetries = 3,
    baseDelay = 1000,
    maxDelay = 30000,
    onRetry,
    log = console.log
  } = options;

  let lastError: unknown;

  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      const classification = classifyError(error);

      if (!classification.isTransient || attempt === maxRetries) {
        throw error;
      }

      // Exponential backoff with up to 30% jitter
      const exponentialDelay = Math.min(baseDelay * Math.pow(2, attempt - 1), maxDelay);
      const jitter = Math.random() * 0.3 * exponentialDelay;
      const delay = exponentialDelay + jitter;

      if (onRetry) {
        onRetry(attempt, error);
      }

      log(`  ⚠️  ${classification.message} (attempt ${attempt}/${maxRetries})`);
      log(`     ${classification.suggestion}`);
      log(`     Retrying in ${(delay / 1000).toFixed(1)}s...`);

      await sleep(delay);
    }
  }

  throw lastError;
}

/**
 * Execute with transaction wrapper and error handling
 */
export async function executeWithTransaction<T>(
  pool: sql.ConnectionPool,
  fn: (transaction: sql.Transaction) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  return retryWithBackoff(async () => {
    const transaction = pool.transaction();
    await transaction.begin();

    try {
      const result = await fn(transaction);
      await transaction.commit();
      return result;
    } catch (error) {
      try {
        await transaction.rollback();
      } catch (rollbackError) {
        console.error('  ⚠️  Failed to rollback transaction:', rollbackError);
      }
      throw error;
    }
  }, options);
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Format error for logging
 */
export function formatError(error: unknown): string {
  const classification = classifyError(error);
  const details = errorDetails(error);

  let formatted = `\n╔════════════════════════════════════════════════════════════════╗\n`;
  formatted += `║  ERROR DETAILS                                                 ║\n`;
  formatted += `╚════════════════════════════════════════════════════════════════╝\n`;
  if (error instanceof IngestError) {
    formatted += `  Kind:        ${error.kind}\n`;
  }
  formatted += `  Category:    ${classification.category}\n`;
  formatted += `  Transient:   ${classification.isTransient ? 'Yes' : 'No'}\n`;
  formatted += `  Recoverable: ${classification.isRecoverable ? 'Yes' : 'No'}\n`;
  formatted += `  Message:     ${details.message}\n`;
  formatted += `  Suggestion:  ${classification.suggestion}\n`;

  if (details.code !== undefined) {
    formatted += `  Error Code:  ${details.code}\n`;
  }

  if (details.number !== undefined) {
    formatted += `  SQL Number:  ${details.number}\n`;
  }

  if (details.lineNumber !== undefined) {
    formatted += `  Line:        ${details.lineNumber}\n`;
  }

  if (details.procName) {
    formatted += `  Procedure:   ${details.procName}\n`;
  }

  formatted += `\n  Stack Trace:\n`;
  formatted += `  ${details.stack.split('\n').join('\n  ')}\n`;

  return formatted;
}
