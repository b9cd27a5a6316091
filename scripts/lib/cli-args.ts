import type { ConfigOverrides } from './config-loader';

export interface IngestArgs {
  file?: string;
  configPath?: string;
  limit?: number;
  batchSize?: number;
  rejectDuplicates: boolean;
  verify: boolean;
  debug: boolean;
  help: boolean;
}

export function valueAfter(args: string[], flag: string): string | undefined {
  const index = args.indexOf(flag);
  if (index === -1) return undefined;
  const value = args[index + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new Error(`${flag} expects a value`);
  }
  return value;
}

function intAfter(args: string[], flag: string, min: number): number | undefined {
  const value = valueAfter(args, flag);
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new Error(`${flag} expects an integer >= ${min}, got "${value}"`);
  }
  return parsed;
}

export function parseIngestArgs(args: string[]): IngestArgs {
  return {
    file: valueAfter(args, '--file'),
    configPath: valueAfter(args, '--config'),
    limit: intAfter(args, '--limit', 0),
    batchSize: intAfter(args, '--batch-size', 1),
    rejectDuplicates: args.includes('--reject-duplicates'),
    verify: args.includes('--verify'),
    debug: args.includes('--debug'),
    help: args.includes('--help') || args.includes('-h'),
  };
}

export function toConfigOverrides(args: IngestArgs): ConfigOverrides {
  return {
    source: { file: args.file },
    load: {
      rowLimit: args.limit,
      batchSize: args.batchSize,
      duplicatePolicy: args.rejectDuplicates ? 'reject' : undefined,
    },
    debugMode: { enabled: args.debug ? true : undefined },
  };
}
