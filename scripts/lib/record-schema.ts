import { z } from 'zod';
import { SLOT_COUNT, TEXT_WIDTHS, type CollisionRecord, type SlotValues } from './collision-types';

/**
 * Canonical column name for a CSV header.
 * "VEHICLE TYPE CODE 1", "vehicle_type_code1" and "vehicle_type_code_1" all map to "vehicle_type_code_1".
 */
export function normalizeHeader(header: string): string {
  return header
    .replace(/^\uFEFF/, '')
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '')
    .replace(/([a-z])(\d+)$/, '$1_$2');
}

function slotColumns(prefix: string): string[] {
  return Array.from({ length: SLOT_COUNT }, (_, i) => `${prefix}_${i + 1}`);
}

export const VEHICLE_TYPE_COLUMNS = slotColumns('vehicle_type_code');
export const FACTOR_COLUMNS = slotColumns('contributing_factor_vehicle');

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

function isValidDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) return false;
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return day <= daysInMonth;
}

/**
 * MM/DD/YYYY, YYYY-MM-DD or an ISO timestamp → YYYY-MM-DD; anything else → null
 */
export function parseCrashDate(value: string | undefined): string | null {
  const text = value?.trim() ?? '';
  const us = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/.exec(text);
  const iso = /^(\d{4})-(\d{2})-(\d{2})(?:[T ].*)?$/.exec(text);

  let parts: [number, number, number];
  if (us) {
    parts = [Number(us[3]), Number(us[1]), Number(us[2])];
  } else if (iso) {
    parts = [Number(iso[1]), Number(iso[2]), Number(iso[3])];
  } else {
    return null;
  }

  const [year, month, day] = parts;
  return isValidDate(year, month, day) ? `${year}-${pad(month)}-${pad(day)}` : null;
}

/**
 * H:MM or HH:MM:SS → HH:MM:SS; anything else → null
 */
export function parseCrashTime(value: string | undefined): string | null {
  const match = /^(\d{1,2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?$/.exec(value?.trim() ?? '');
  if (!match) return null;

  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  const seconds = match[3] === undefined ? 0 : Number(match[3]);
  if (hours > 23 || minutes > 59 || seconds > 59) return null;

  return `${pad(hours)}:${pad(minutes)}:${pad(seconds)}`;
}

/**
 * Blank or unparseable → 0, negative → 0, fractional → truncated
 */
export function toCount(value: string | undefined): number {
  const n = Number(value?.trim() ?? '');
  if (!Number.isFinite(n) || n < 0) return 0;
  return Math.trunc(n);
}

export function toText(value: string | undefined): string | null {
  const text = value?.trim() ?? '';
  return text === '' ? null : text;
}

function toCoordinate(value: string | undefined, limit: number): number | null {
  const text = toText(value);
  if (text === null) return null;
  const n = Number(text);
  return Number.isFinite(n) && Math.abs(n) <= limit ? n : null;
}

// Helpers
const text = z.string().optional().transform(toText);

const count = z.string().optional().transform(toCount);

// Values wider than their column are rejected rather than truncated by the server
function boundedText(field: string, width: number) {
  return text.refine(v => v === null || v.length <= width, { message: `${field} is longer than ${width} characters` });
}

const zipCode = z
  .string()
  .optional()
  .transform(v => {
    const zip = toText(v);
    // Spreadsheet exports render zips as floats ("11208.0")
    return zip !== null && /^\d+\.0+$/.test(zip) ? zip.replace(/\.0+$/, '') : zip;
  })
  .refine(v => v === null || v.length <= TEXT_WIDTHS.zipCode, {
    message: `zip_code is longer than ${TEXT_WIDTHS.zipCode} characters`,
  });

const collisionId = z
  .string({ required_error: 'collision_id is missing' })
  .transform((value, ctx) => {
    const trimmed = value.trim();
    const n = Number(trimmed);
    if (trimmed === '' || !Number.isSafeInteger(n) || n <= 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: trimmed === '' ? 'collision_id is blank' : `unparseable collision_id "${trimmed}"`,
      });
      return z.NEVER;
    }
    return n;
  });

// Row schema for CSV after header normalization
export const CollisionCsvSchema = z.object({
  collision_id: collisionId,
  crash_date: z.string().optional().transform(parseCrashDate),
  crash_time: z.string().optional().transform(parseCrashTime),
  borough: text,
  zip_code: zipCode,
  latitude: z.string().optional().transform(v => toCoordinate(v, 90)),
  longitude: z.string().optional().transform(v => toCoordinate(v, 180)),
  location: boundedText('location', TEXT_WIDTHS.location),
  on_street_name: boundedText('on_street_name', TEXT_WIDTHS.streetName),
  off_street_name: boundedText('off_street_name', TEXT_WIDTHS.streetName),
  cross_street_name: boundedText('cross_street_name', TEXT_WIDTHS.streetName),
  number_of_persons_injured: count,
  number_of_persons_killed: count,
  number_of_pedestrians_injured: count,
  number_of_pedestrians_killed: count,
  number_of_cyclist_injured: count,
  number_of_cyclist_killed: count,
  number_of_motorist_injured: count,
  number_of_motorist_killed: count,
});

export type CollisionCsv = z.infer<typeof CollisionCsvSchema>;

function readSlots(raw: Record<string, string>, columns: string[]): SlotValues {
  return columns.map(column => toText(raw[column]));
}

export function toCollisionRecord(row: CollisionCsv, raw: Record<string, string>): CollisionRecord {
  return {
    collisionId: row.collision_id,
    crashDate: row.crash_date,
    crashTime: row.crash_time,
    borough: row.borough,
    zipCode: row.zip_code,
    latitude: row.latitude,
    longitude: row.longitude,
    location: row.location,
    onStreetName: row.on_street_name,
    offStreetName: row.off_street_name,
    crossStreetName: row.cross_street_name,
    counts: {
      personsInjured: row.number_of_persons_injured,
      personsKilled: row.number_of_persons_killed,
      pedestriansInjured: row.number_of_pedestrians_injured,
      pedestriansKilled: row.number_of_pedestrians_killed,
      cyclistsInjured: row.number_of_cyclist_injured,
      cyclistsKilled: row.number_of_cyclist_killed,
      motoristsInjured: row.number_of_motorist_injured,
      motoristsKilled: row.number_of_motorist_killed,
    },
    vehicleTypes: readSlots(raw, VEHICLE_TYPE_COLUMNS),
    factors: readSlots(raw, FACTOR_COLUMNS),
  };
}
