/**
 * Lookup Resolver
 * Owns the name → surrogate key mappings for boroughs, vehicle types and contributing factors.
 * One resolver is constructed per run and threaded through row processing.
 */

import {
  LOOKUP_KINDS,
  LOOKUP_TABLES,
  type CollisionRecord,
  type LookupEntry,
  type LookupKind,
  type ResolvedCollision,
  type SlotKeys,
  type SlotValues,
} from './collision-types';
import type { CollisionStore } from './collision-store';
import { IntegrityError } from './error-handler';

export type PendingLookups = Record<LookupKind, LookupEntry[]>;

export interface LookupResolverOptions {
  /** Factor values treated as empty, e.g. "Unspecified" */
  ignoredFactors?: readonly string[];
}

/**
 * Matching key for a lookup value: trimmed, inner whitespace collapsed, lower-cased
 */
export function normalizeLookupName(value: string): string {
  return displayName(value).toLowerCase();
}

function displayName(value: string): string {
  return value.trim().replace(/\s+/g, ' ');
}

export class LookupTable {
  private readonly entries = new Map<string, LookupEntry>();
  private readonly ignored: Set<string>;
  private pending: LookupEntry[] = [];
  private nextKey = 1;
  private readonly maxNameLength: number;
  private readonly nameColumn: string;

  constructor(
    readonly kind: LookupKind,
    seed: readonly LookupEntry[] = [],
    ignoredValues: readonly string[] = []
  ) {
    this.ignored = new Set(ignoredValues.map(normalizeLookupName));
    this.maxNameLength = LOOKUP_TABLES[kind].maxNameLength;
    this.nameColumn = LOOKUP_TABLES[kind].nameColumn;

    // Lowest key wins if the store already holds names that normalize alike
    const ordered = [...seed].sort((a, b) => a.key - b.key);
    for (const entry of ordered) {
      const normalized = normalizeLookupName(entry.name);
      if (!this.entries.has(normalized)) {
        this.entries.set(normalized, entry);
      }
      this.nextKey = Math.max(this.nextKey, entry.key + 1);
    }
  }

  /**
   * Key for a value, assigning the next key on first encounter.
   * Empty and ignored values resolve to null and are never recorded.
   */
  resolve(value: string | null): number | null {
    if (value === null) return null;

    const normalized = normalizeLookupName(value);
    if (normalized === '' || this.ignored.has(normalized)) return null;

    const existing = this.entries.get(normalized);
    if (existing) return existing.key;

    const problem = this.check(value);
    if (problem !== null) {
      throw new IntegrityError(problem, null);
    }

    const entry: LookupEntry = { key: this.nextKey++, name: displayName(value) };
    this.entries.set(normalized, entry);
    this.pending.push(entry);
    return entry.key;
  }

  /**
   * Why the value cannot be stored in the lookup column, or null when it can
   */
  check(value: string | null): string | null {
    if (value === null) return null;
    const name = displayName(value);
    if (name.length <= this.maxNameLength || this.ignored.has(name.toLowerCase())) return null;
    return `${this.nameColumn} is ${name.length} characters, the column holds ${this.maxNameLength}`;
  }

  resolveSlots(values: SlotValues): SlotKeys {
    return values.map(value => this.resolve(value));
  }

  /**
   * Entries created since the last drain, in key order
   */
  drainPending(): LookupEntry[] {
    const drained = this.pending;
    this.pending = [];
    return drained;
  }

  get size(): number {
    return this.entries.size;
  }

  list(): LookupEntry[] {
    return [...this.entries.values()].sort((a, b) => a.key - b.key);
  }
}

export class LookupResolver {
  readonly boroughs: LookupTable;
  readonly vehicleTypes: LookupTable;
  readonly factors: LookupTable;

  constructor(seed: Partial<Record<LookupKind, readonly LookupEntry[]>> = {}, options: LookupResolverOptions = {}) {
    this.boroughs = new LookupTable('borough', seed.borough);
    this.vehicleTypes = new LookupTable('vehicleType', seed.vehicleType);
    this.factors = new LookupTable('factor', seed.factor, options.ignoredFactors);
  }

  /**
   * Build a resolver that continues from the lookup rows already in the store
   */
  static async fromStore(store: CollisionStore, options: LookupResolverOptions = {}): Promise<LookupResolver> {
    const [borough, vehicleType, factor] = await Promise.all(LOOKUP_KINDS.map(kind => store.loadLookups(kind)));
    return new LookupResolver({ borough, vehicleType, factor }, options);
  }

  table(kind: LookupKind): LookupTable {
    switch (kind) {
      case 'borough':
        return this.boroughs;
      case 'vehicleType':
        return this.vehicleTypes;
      case 'factor':
        return this.factors;
    }
  }

  /**
   * Throws IntegrityError before assigning any key when one of the row's names does not fit its column
   */
  resolveRow(record: CollisionRecord): ResolvedCollision {
    const values: Array<[LookupTable, string | null]> = [
      [this.boroughs, record.borough],
      ...record.vehicleTypes.map((value): [LookupTable, string | null] => [this.vehicleTypes, value]),
      ...record.factors.map((value): [LookupTable, string | null] => [this.factors, value]),
    ];
    for (const [table, value] of values) {
      const problem = table.check(value);
      if (problem !== null) {
        throw new IntegrityError(`collision ${record.collisionId}: ${problem}`, record.collisionId);
      }
    }

    return {
      record,
      boroughKey: this.boroughs.resolve(record.borough),
      vehicleTypeKeys: this.vehicleTypes.resolveSlots(record.vehicleTypes),
      factorKeys: this.factors.resolveSlots(record.factors),
    };
  }

  drainPending(): PendingLookups {
    return {
      borough: this.boroughs.drainPending(),
      vehicleType: this.vehicleTypes.drainPending(),
      factor: this.factors.drainPending(),
    };
  }
}
