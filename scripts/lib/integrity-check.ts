/**
 * Post-load integrity checks over an IntegrityReport
 */

import type { IntegrityReport } from './collision-store';
import { JUNCTION_KINDS, JUNCTION_TABLES, LOOKUP_KINDS, LOOKUP_TABLES } from './collision-types';

/**
 * Human-readable problems; an empty list means the load is consistent
 */
export function findIntegrityProblems(report: IntegrityReport): string[] {
  const problems: string[] = [];

  for (const kind of JUNCTION_KINDS) {
    const { table } = JUNCTION_TABLES[kind];
    if (report.orphanJunctionRows[kind] > 0) {
      problems.push(`${table}: ${report.orphanJunctionRows[kind]} rows reference a missing collision`);
    }
    if (report.invalidOrdinals[kind] > 0) {
      problems.push(`${table}: ${report.invalidOrdinals[kind]} rows have an ordinal outside 1..5`);
    }
  }

  if (report.negativeCountRows > 0) {
    problems.push(`collisions: ${report.negativeCountRows} rows have a negative injury or fatality count`);
  }

  for (const kind of LOOKUP_KINDS) {
    if (report.duplicateLookupNames[kind] > 0) {
      problems.push(`${LOOKUP_TABLES[kind].table}: ${report.duplicateLookupNames[kind]} names are duplicated after normalization`);
    }
  }

  return problems;
}

export function formatIntegrityReport(report: IntegrityReport): string[] {
  const lines = Object.entries(report.tableCounts).map(
    ([table, count]) => `  ${table.padEnd(20)} ${count.toLocaleString('en-US')}`
  );
  const problems = findIntegrityProblems(report);

  lines.push('');
  if (problems.length === 0) {
    lines.push('  ✅ Referential integrity holds and no counts are negative');
  } else {
    lines.push(`  ❌ ${problems.length} integrity problem(s):`);
    lines.push(...problems.map(problem => `     - ${problem}`));
  }
  return lines;
}
