/**
 * Progress Reporter for the collision ETL
 * Provides formatted console output for tracking ingestion progress
 */

import type { IngestSummary } from './ingest-pipeline';

export interface ProgressStats {
  processed: number;
  total?: number;
  rate?: number; // records per second
  duration?: number; // seconds
}

export interface ProgressReporterOptions {
  debug?: boolean;
  write?: (line: string) => void;
}

export class ProgressReporter {
  private startTime: Date | null = null;
  private readonly debug: boolean;
  private readonly write: (line: string) => void;

  constructor(options: ProgressReporterOptions = {}) {
    this.debug = options.debug ?? false;
    this.write = options.write ?? (line => console.log(line));
  }

  /**
   * Log the start of an ingestion run
   */
  logRunStart(source: string, target: string): void {
    this.startTime = new Date();
    this.write('\n╔════════════════════════════════════════════════════════════════╗');
    this.write(`║  Collision Ingestion Started                                   ║`);
    this.write('╚════════════════════════════════════════════════════════════════╝');
    this.write(`  Source:      ${source}`);
    this.write(`  Target:      ${target}`);
    this.write(`  Started:     ${this.startTime.toISOString()}`);
    this.write('');
  }

  /**
   * Log the start of a phase
   */
  logPhase(phase: string, phaseNumber: number, totalPhases: number): void {
    this.write('');
    this.write('━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━');
    this.write(`📦 Phase ${phaseNumber}/${totalPhases}: ${phase}`);
    this.write('━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━');
    this.write('');
  }

  /**
   * Log progress with record counts and rate
   */
  logRecords(stats: ProgressStats): void {
    const { processed, total, rate, duration } = stats;

    let progressLine = `    Processed: ${this.formatNumber(processed)}`;

    if (total && total > 0) {
      const percent = ((processed / total) * 100).toFixed(1);
      progressLine += ` / ${this.formatNumber(total)} (${percent}%)`;
    }

    if (rate) {
      progressLine += ` | ${this.formatNumber(Math.round(rate))} rec/sec`;
    }

    if (duration) {
      progressLine += ` | ${this.formatDuration(duration)}`;
    }

    this.write(progressLine);
  }

  /**
   * Log step completion
   */
  logStepComplete(stepName: string, duration: number, recordsProcessed?: number): void {
    let message = `    ✅ ${stepName} completed`;

    if (recordsProcessed !== undefined) {
      message += ` (${this.formatNumber(recordsProcessed)} records)`;
    }

    message += ` in ${this.formatDuration(duration)}`;
    this.write(message);
    this.write('');
  }

  /**
   * Log step failure
   */
  logStepFailure(stepName: string, error: Error): void {
    this.write(`    ❌ ${stepName} FAILED`);
    this.write(`       Error: ${error.message}`);
    this.write('');
  }

  /**
   * Log run completion with the ingestion summary
   */
  logRunComplete(summary: IngestSummary): void {
    const skipped = summary.skipped.parse + summary.skipped.integrity;
    const title = skipped > 0
      ? '║  Collision Ingestion Completed With Skipped Rows               ║'
      : '║  Collision Ingestion Completed                                 ║';

    this.write('\n╔════════════════════════════════════════════════════════════════╗');
    this.write(title);
    this.write('╚════════════════════════════════════════════════════════════════╝');
    this.field('Rows Read', this.formatNumber(summary.rowsRead));
    this.field('Collisions Inserted', this.formatNumber(summary.collisionsInserted));
    this.field('Collisions Overwritten', this.formatNumber(summary.collisionsOverwritten));
    this.field('Vehicle Rows', this.formatNumber(summary.vehicleRows));
    this.field('Factor Rows', this.formatNumber(summary.factorRows));
    this.field('New Boroughs', this.formatNumber(summary.lookupsCreated.borough));
    this.field('New Vehicle Types', this.formatNumber(summary.lookupsCreated.vehicleType));
    this.field('New Factors', this.formatNumber(summary.lookupsCreated.factor));
    this.field('Skipped (parse)', this.formatNumber(summary.skipped.parse));
    this.field('Skipped (integrity)', this.formatNumber(summary.skipped.integrity));
    this.field('Total Duration', this.formatDuration(summary.durationSeconds));

    if (summary.errorSamples.length > 0) {
      this.write('');
      this.write('  Skipped row samples:');
      for (const sample of summary.errorSamples) {
        this.write(`    [${sample.kind}] row ${sample.row}: ${sample.message}`);
      }
    }

    if (this.startTime) {
      this.write('');
      this.write(`  Started:               ${this.startTime.toISOString()}`);
      this.write(`  Completed:             ${new Date().toISOString()}`);
    }
    this.write('');
  }

  /**
   * Log run failure
   */
  logRunFailure(error: Error, rowsCommitted: number): void {
    this.write('\n╔════════════════════════════════════════════════════════════════╗');
    this.write(`║  Collision Ingestion FAILED                                    ║`);
    this.write('╚════════════════════════════════════════════════════════════════╝');
    this.write(`  Error: ${error.message}`);
    this.write(`  Collisions committed before failure: ${this.formatNumber(rowsCommitted)}`);
    this.write('');
  }

  private field(label: string, value: string): void {
    this.write(`  ${(label + ':').padEnd(24)}${value}`);
  }

  /**
   * Log warning message
   */
  logWarning(message: string): void {
    this.write(`  ⚠️  ${message}`);
  }

  /**
   * Log info message
   */
  logInfo(message: string): void {
    this.write(`  ℹ️  ${message}`);
  }

  /**
   * Log debug message (only if debug mode enabled)
   */
  logDebug(message: string): void {
    if (this.debug) {
      this.write(`  🐛 DEBUG: ${message}`);
    }
  }

  /**
   * Format a number with thousand separators
   */
  private formatNumber(num: number): string {
    return num.toLocaleString('en-US');
  }

  /**
   * Format duration in human-readable format
   */
  formatDuration(seconds: number): string {
    if (seconds < 60) {
      return `${seconds.toFixed(1)}s`;
    } else if (seconds < 3600) {
      const minutes = Math.floor(seconds / 60);
      const secs = seconds % 60;
      return `${minutes}m ${secs.toFixed(0)}s`;
    } else {
      const hours = Math.floor(seconds / 3600);
      const minutes = Math.floor((seconds % 3600) / 60);
      return `${hours}h ${minutes}m`;
    }
  }
}
