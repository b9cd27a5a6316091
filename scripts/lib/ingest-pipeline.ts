/**
 * Collision ingestion pipeline
 *
 * Reader → Lookup Resolver → Fact Loader → Junction Loader, in batches:
 *   1. New lookup rows of the batch are committed in their own transaction
 *   2. Each row's collision, then its junction rows, are written in one batch transaction
 *   3. A batch that hits a constraint violation is rolled back and replayed row by row
 *
 * Parse and integrity failures skip the row; a ConnectivityError aborts the run.
 */

import type { Readable } from 'stream';
import type { CollisionsETLConfig } from './config-loader';
import type { CollisionStore, CollisionWriter } from './collision-store';
import { LOOKUP_KINDS, type LookupKind, type ResolvedCollision } from './collision-types';
import {
  classifyError,
  IntegrityError,
  isConnectivityFailure,
  toConnectivityError,
  type IngestErrorKind,
} from './error-handler';
import { FactLoader, type LoadedFact } from './fact-loader';
import { JunctionLoader, type JunctionPlan } from './junction-loader';
import { LookupResolver, type PendingLookups } from './lookup-resolver';
import { ProgressReporter } from './progress-reporter';
import { readCollisionRecords } from './record-reader';

const PROGRESS_EVERY = 50000;

export interface RowErrorSample {
  kind: Exclude<IngestErrorKind, 'connectivity'>;
  row: number;
  collisionId: number | null;
  message: string;
}

export interface IngestSummary {
  rowsRead: number;
  collisionsInserted: number;
  collisionsOverwritten: number;
  vehicleRows: number;
  factorRows: number;
  lookupsCreated: Record<LookupKind, number>;
  skipped: { parse: number; integrity: number };
  errorSamples: RowErrorSample[];
  durationSeconds: number;
}

export interface IngestOptions {
  store: CollisionStore;
  /** CSV file path or stream */
  source: string | Readable;
  config: Pick<CollisionsETLConfig, 'load'>;
  reporter?: ProgressReporter;
}

interface BatchRow {
  row: number;
  resolved: ResolvedCollision;
}

interface RejectedRow {
  row: number;
  error: IntegrityError;
}

interface BatchOutcome {
  inserted: number;
  overwritten: number;
  vehicleRows: number;
  factorRows: number;
  rejected: RejectedRow[];
}

function emptyOutcome(): BatchOutcome {
  return { inserted: 0, overwritten: 0, vehicleRows: 0, factorRows: 0, rejected: [] };
}

function emptySummary(): IngestSummary {
  return {
    rowsRead: 0,
    collisionsInserted: 0,
    collisionsOverwritten: 0,
    vehicleRows: 0,
    factorRows: 0,
    lookupsCreated: { borough: 0, vehicleType: 0, factor: 0 },
    skipped: { parse: 0, integrity: 0 },
    errorSamples: [],
    durationSeconds: 0,
  };
}

function hasPending(pending: PendingLookups): boolean {
  return LOOKUP_KINDS.some(kind => pending[kind].length > 0);
}

/**
 * 0 when every row loaded, 2 when rows were skipped
 */
export function exitCodeFor(summary: IngestSummary): number {
  return summary.skipped.parse + summary.skipped.integrity > 0 ? 2 : 0;
}

export async function runIngestion(options: IngestOptions): Promise<IngestSummary> {
  const { store, source } = options;
  const { batchSize, duplicatePolicy, rowLimit, ignoredFactors, maxErrorSamples } = options.config.load;
  const reporter = options.reporter ?? new ProgressReporter();

  const startTime = Date.now();
  const summary = emptySummary();
  const facts = new FactLoader(duplicatePolicy);
  const junctions = new JunctionLoader();

  const recordSkip = (sample: RowErrorSample): void => {
    summary.skipped[sample.kind]++;
    if (summary.errorSamples.length < maxErrorSamples) {
      summary.errorSamples.push(sample);
    }
    reporter.logDebug(`Skipped row ${sample.row} (${sample.kind}): ${sample.message}`);
  };

  const loadRows = async (writer: CollisionWriter, rows: readonly BatchRow[]): Promise<BatchOutcome> => {
    const outcome = emptyOutcome();

    for (const { row, resolved } of rows) {
      let plan: JunctionPlan;
      let fact: LoadedFact;
      try {
        plan = junctions.plan(resolved);
        fact = await facts.load(writer, resolved);
      } catch (error) {
        if (error instanceof IntegrityError) {
          outcome.rejected.push({ row, error });
          continue;
        }
        throw error;
      }

      if (fact.outcome === 'inserted') {
        outcome.inserted++;
      } else {
        outcome.overwritten++;
      }

      const written = await junctions.load(writer, fact, plan);
      outcome.vehicleRows += written.vehicles;
      outcome.factorRows += written.factors;
    }

    return outcome;
  };

  const applyOutcome = (outcome: BatchOutcome): void => {
    summary.collisionsInserted += outcome.inserted;
    summary.collisionsOverwritten += outcome.overwritten;
    summary.vehicleRows += outcome.vehicleRows;
    summary.factorRows += outcome.factorRows;
    for (const { row, error } of outcome.rejected) {
      recordSkip({ kind: 'integrity', row, collisionId: error.collisionId, message: error.message });
    }
  };

  const commitLookups = async (pending: PendingLookups): Promise<void> => {
    if (!hasPending(pending)) return;

    await store.transaction(async writer => {
      for (const kind of LOOKUP_KINDS) {
        if (pending[kind].length > 0) {
          await writer.insertLookups(kind, pending[kind]);
        }
      }
    });

    for (const kind of LOOKUP_KINDS) {
      summary.lookupsCreated[kind] += pending[kind].length;
    }
  };

  // Each row in its own transaction; rows that still break a constraint are skipped
  const replayRows = async (rows: readonly BatchRow[]): Promise<BatchOutcome> => {
    const total = emptyOutcome();

    for (const item of rows) {
      try {
        const outcome = await store.transaction(writer => loadRows(writer, [item]));
        total.inserted += outcome.inserted;
        total.overwritten += outcome.overwritten;
        total.vehicleRows += outcome.vehicleRows;
        total.factorRows += outcome.factorRows;
        total.rejected.push(...outcome.rejected);
      } catch (error) {
        if (isConnectivityFailure(error) || classifyError(error).category !== 'constraint') {
          throw error;
        }
        const collisionId = item.resolved.record.collisionId;
        const message = error instanceof Error ? error.message : String(error);
        total.rejected.push({
          row: item.row,
          error: new IntegrityError(`collision ${collisionId} violates a constraint: ${message}`, collisionId, { cause: error }),
        });
      }
    }

    return total;
  };

  const flushBatch = async (rows: readonly BatchRow[], resolver: LookupResolver): Promise<void> => {
    await commitLookups(resolver.drainPending());
    if (rows.length === 0) return;

    let outcome: BatchOutcome;
    try {
      outcome = await store.transaction(writer => loadRows(writer, rows));
    } catch (error) {
      if (isConnectivityFailure(error) || classifyError(error).category !== 'constraint') {
        throw error;
      }
      reporter.logWarning(`Batch of ${rows.length} rows hit a constraint violation; replaying rows individually`);
      outcome = await replayRows(rows);
    }

    applyOutcome(outcome);
    reporter.logDebug(`Committed batch of ${rows.length} rows (${summary.rowsRead} read)`);
  };

  reporter.logRunStart(typeof source === 'string' ? source : 'stream', store.description);

  try {
    reporter.logPhase('Seed lookup tables', 1, 2);
    const resolver = await LookupResolver.fromStore(store, { ignoredFactors });
    reporter.logInfo(
      `Existing lookups: ${resolver.boroughs.size} boroughs, ${resolver.vehicleTypes.size} vehicle types, ${resolver.factors.size} factors`
    );

    reporter.logPhase('Load collisions', 2, 2);
    let batch: BatchRow[] = [];

    for await (const result of readCollisionRecords(source, { limit: rowLimit })) {
      summary.rowsRead++;

      if (result.ok) {
        try {
          batch.push({ row: result.row, resolved: resolver.resolveRow(result.record) });
        } catch (error) {
          if (!(error instanceof IntegrityError)) {
            throw error;
          }
          recordSkip({ kind: 'integrity', row: result.row, collisionId: error.collisionId, message: error.message });
        }
      } else {
        recordSkip({
          kind: 'parse',
          row: result.row,
          collisionId: null,
          message: result.error.message,
        });
      }

      if (batch.length >= batchSize) {
        await flushBatch(batch, resolver);
        batch = [];
      }

      if (summary.rowsRead % PROGRESS_EVERY === 0) {
        const elapsed = (Date.now() - startTime) / 1000;
        reporter.logRecords({ processed: summary.rowsRead, rate: summary.rowsRead / elapsed, duration: elapsed });
      }
    }

    await flushBatch(batch, resolver);
  } catch (error) {
    const fatal = isConnectivityFailure(error) ? toConnectivityError(error, 'Target store unreachable') : error;
    if (fatal instanceof Error) {
      reporter.logRunFailure(fatal, summary.collisionsInserted + summary.collisionsOverwritten);
    }
    throw fatal;
  }

  summary.durationSeconds = (Date.now() - startTime) / 1000;
  reporter.logStepComplete('Load collisions', summary.durationSeconds, summary.rowsRead);
  reporter.logRunComplete(summary);

  return summary;
}
