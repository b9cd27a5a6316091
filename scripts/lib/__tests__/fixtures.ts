import { Readable } from 'stream';
import { emptyCounts, type CollisionRecord } from '../collision-types';

// Column order of the published collisions export
export const HEADER = [
  'CRASH DATE',
  'CRASH TIME',
  'BOROUGH',
  'ZIP CODE',
  'LATITUDE',
  'LONGITUDE',
  'LOCATION',
  'ON STREET NAME',
  'CROSS STREET NAME',
  'OFF STREET NAME',
  'NUMBER OF PERSONS INJURED',
  'NUMBER OF PERSONS KILLED',
  'NUMBER OF PEDESTRIANS INJURED',
  'NUMBER OF PEDESTRIANS KILLED',
  'NUMBER OF CYCLIST INJURED',
  'NUMBER OF CYCLIST KILLED',
  'NUMBER OF MOTORIST INJURED',
  'NUMBER OF MOTORIST KILLED',
  'CONTRIBUTING FACTOR VEHICLE 1',
  'CONTRIBUTING FACTOR VEHICLE 2',
  'CONTRIBUTING FACTOR VEHICLE 3',
  'CONTRIBUTING FACTOR VEHICLE 4',
  'CONTRIBUTING FACTOR VEHICLE 5',
  'COLLISION_ID',
  'VEHICLE TYPE CODE 1',
  'VEHICLE TYPE CODE 2',
  'VEHICLE TYPE CODE 3',
  'VEHICLE TYPE CODE 4',
  'VEHICLE TYPE CODE 5',
];

export type CsvRow = Partial<Record<string, string>>;

function quote(value: string): string {
  return /[",\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/**
 * CSV text with HEADER and one line per row; rows are keyed by header name
 */
export function collisionCsv(rows: CsvRow[], header: string[] = HEADER): string {
  const lines = [header.join(',')];
  for (const row of rows) {
    lines.push(header.map(column => quote(row[column] ?? '')).join(','));
  }
  return lines.join('\n') + '\n';
}

export function csvStream(rows: CsvRow[], header?: string[]): Readable {
  return Readable.from([collisionCsv(rows, header)]);
}

export function row(collisionId: number | string, fields: CsvRow = {}): CsvRow {
  return { COLLISION_ID: String(collisionId), ...fields };
}

export function slots(...values: Array<string | null>): Array<string | null> {
  return Array.from({ length: 5 }, (_, i) => values[i] ?? null);
}

export function collisionRecord(collisionId: number, fields: Partial<CollisionRecord> = {}): CollisionRecord {
  return {
    collisionId,
    crashDate: null,
    crashTime: null,
    borough: null,
    zipCode: null,
    latitude: null,
    longitude: null,
    location: null,
    onStreetName: null,
    offStreetName: null,
    crossStreetName: null,
    counts: emptyCounts(),
    vehicleTypes: slots(),
    factors: slots(),
    ...fields,
  };
}
