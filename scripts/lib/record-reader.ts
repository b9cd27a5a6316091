/**
 * Raw Record Reader
 * Streams a collisions CSV through csv-parse and yields one typed record or ParseError per data row
 */

import * as fs from 'fs';
import type { Readable } from 'stream';
import { parse } from 'csv-parse';
import type { CollisionRecord } from './collision-types';
import { ParseError } from './error-handler';
import { CollisionCsvSchema, normalizeHeader, toCollisionRecord } from './record-schema';

export type RecordReadResult =
  | { ok: true; row: number; record: CollisionRecord }
  | { ok: false; row: number; error: ParseError };

export interface ReadOptions {
  /** Stop after this many data rows; 0 reads everything */
  limit?: number;
}

function toStringRecord(value: unknown): Record<string, string> {
  const record: Record<string, string> = {};
  if (typeof value !== 'object' || value === null) {
    return record;
  }
  for (const [key, field] of Object.entries(value)) {
    if (typeof field === 'string') {
      record[key] = field;
    }
  }
  return record;
}

/**
 * Validate and coerce one CSV row (keys already normalized)
 */
export function parseCollisionRow(raw: Record<string, string>, row: number): RecordReadResult {
  const parsed = CollisionCsvSchema.safeParse(raw);
  if (parsed.success) {
    return { ok: true, row, record: toCollisionRecord(parsed.data, raw) };
  }

  const [first] = parsed.error.issues;
  const message = parsed.error.issues.map(i => i.message).join('; ');
  return { ok: false, row, error: new ParseError(message, row, first?.path.join('.')) };
}

/**
 * Read collision records from a CSV file path or stream.
 * Rows are numbered from 1 (the first data row after the header).
 */
export async function* readCollisionRecords(
  source: string | Readable,
  options: ReadOptions = {}
): AsyncGenerator<RecordReadResult> {
  const limit = options.limit ?? 0;

  if (typeof source === 'string' && !fs.existsSync(source)) {
    throw new Error(`CSV file not found: ${source}. Pass --file or set CSV_FILE.`);
  }

  const input = typeof source === 'string' ? fs.createReadStream(source) : source;
  const parser = parse({
    columns: (header: string[]) => header.map(normalizeHeader),
    skip_empty_lines: true,
    relax_column_count: true,
    bom: true,
  });
  input.on('error', (error: Error) => parser.destroy(error));
  input.pipe(parser);

  let row = 0;
  try {
    for await (const chunk of parser) {
      if (limit > 0 && row >= limit) {
        break;
      }
      row++;
      const raw: unknown = chunk;
      yield parseCollisionRow(toStringRecord(raw), row);
    }
  } finally {
    input.unpipe(parser);
    parser.destroy();
    if (typeof source === 'string') {
      input.destroy();
    }
  }
}
