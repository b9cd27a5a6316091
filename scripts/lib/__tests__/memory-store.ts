/**
 * In-process CollisionStore for tests.
 * Enforces the keys, references and checks of sql/schema.sql and raises
 * errors carrying the SQL Server error numbers the driver would report.
 */

import type { CollisionStore, CollisionWriter, IntegrityReport } from '../collision-store';
import {
  INJURY_COUNT_FIELDS,
  JUNCTION_KINDS,
  JUNCTION_TABLES,
  LOOKUP_KINDS,
  LOOKUP_TABLES,
  SLOT_COUNT,
  TEXT_WIDTHS,
  type CollisionFact,
  type JunctionKind,
  type JunctionRow,
  type LookupEntry,
  type LookupKind,
} from '../collision-types';

/** Shaped like the driver's RequestError: code is always EREQUEST, the server error is in `number` */
export class SqlServerError extends Error {
  readonly code = 'EREQUEST';

  constructor(
    message: string,
    readonly number: number
  ) {
    super(message);
    this.name = 'RequestError';
  }
}

export class SocketError extends Error {
  readonly code = 'ESOCKET';

  constructor(message = 'Connection lost - read ECONNRESET') {
    super(message);
    this.name = 'ConnectionError';
  }
}

interface StoreState {
  lookups: Record<LookupKind, Map<number, string>>;
  collisions: Map<number, CollisionFact>;
  junctions: Record<JunctionKind, Map<number, JunctionRow[]>>;
}

function emptyState(): StoreState {
  return {
    lookups: { borough: new Map(), vehicleType: new Map(), factor: new Map() },
    collisions: new Map(),
    junctions: { vehicle: new Map(), factor: new Map() },
  };
}

function cloneState(state: StoreState): StoreState {
  return structuredClone(state);
}

// Default SQL Server collations compare case-insensitively and ignore trailing spaces.
// Inner whitespace stays significant; collapsing it is the resolver's job, not the store's.
function collate(name: string): string {
  return name.trimEnd().toLowerCase();
}

function truncationError(table: string, column: string, value: string): SqlServerError {
  return new SqlServerError(
    `String or binary data would be truncated in table '${table}', column '${column}'. Truncated value: '${value}'.`,
    2628
  );
}

class MemoryCollisionWriter implements CollisionWriter {
  constructor(
    private readonly state: StoreState,
    private readonly brokenCollisions: ReadonlySet<number>
  ) {}

  async insertLookups(kind: LookupKind, entries: readonly LookupEntry[]): Promise<void> {
    const table = this.state.lookups[kind];
    const { table: tableName, nameColumn, maxNameLength } = LOOKUP_TABLES[kind];

    for (const entry of entries) {
      if (table.has(entry.key)) continue;
      if (entry.name.length > maxNameLength) {
        throw truncationError(tableName, nameColumn, entry.name.slice(0, maxNameLength));
      }
      for (const name of table.values()) {
        if (collate(name) === collate(entry.name)) {
          throw new SqlServerError(
            `Violation of UNIQUE KEY constraint. Cannot insert duplicate key in object '${tableName}'. The duplicate key value is (${entry.name}).`,
            2627
          );
        }
      }
      table.set(entry.key, entry.name);
    }
  }

  async upsertCollision(fact: CollisionFact): Promise<'inserted' | 'updated'> {
    this.checkFact(fact);
    const existed = this.state.collisions.has(fact.collisionId);
    this.state.collisions.set(fact.collisionId, structuredClone(fact));
    return existed ? 'updated' : 'inserted';
  }

  async insertCollisionIfAbsent(fact: CollisionFact): Promise<boolean> {
    if (this.state.collisions.has(fact.collisionId)) return false;
    this.checkFact(fact);
    this.state.collisions.set(fact.collisionId, structuredClone(fact));
    return true;
  }

  async replaceJunctionRows(kind: JunctionKind, collisionId: number, rows: readonly JunctionRow[]): Promise<void> {
    const { table, lookup } = JUNCTION_TABLES[kind];
    const ordinals = new Set<number>();

    for (const row of rows) {
      if (!this.state.collisions.has(row.collisionId)) {
        throw new SqlServerError(
          `The INSERT statement conflicted with the FOREIGN KEY constraint on table '${table}', column 'collision_id'.`,
          547
        );
      }
      if (!this.state.lookups[lookup].has(row.lookupKey)) {
        throw new SqlServerError(
          `The INSERT statement conflicted with the FOREIGN KEY constraint on table '${table}', column '${JUNCTION_TABLES[kind].keyColumn}'.`,
          547
        );
      }
      if (row.ordinal < 1 || row.ordinal > SLOT_COUNT) {
        throw new SqlServerError(`The INSERT statement conflicted with the CHECK constraint on table '${table}'.`, 547);
      }
      if (ordinals.has(row.ordinal)) {
        throw new SqlServerError(`Violation of PRIMARY KEY constraint. Cannot insert duplicate key in object '${table}'.`, 2627);
      }
      ordinals.add(row.ordinal);
    }

    this.state.junctions[kind].set(collisionId, rows.map(row => ({ ...row })));
  }

  private checkFact(fact: CollisionFact): void {
    if (this.brokenCollisions.has(fact.collisionId)) {
      throw new SqlServerError(`The MERGE statement conflicted with the CHECK constraint on table 'collisions'.`, 547);
    }
    if (fact.boroughKey !== null && !this.state.lookups.borough.has(fact.boroughKey)) {
      throw new SqlServerError(
        `The MERGE statement conflicted with the FOREIGN KEY constraint on table 'collisions', column 'borough_id'.`,
        547
      );
    }
    for (const field of INJURY_COUNT_FIELDS) {
      if (fact.counts[field] < 0) {
        throw new SqlServerError(`The MERGE statement conflicted with the CHECK constraint on table 'collisions'.`, 547);
      }
    }
    const widths: Array<[string, string | null, number]> = [
      ['zip_code', fact.zipCode, TEXT_WIDTHS.zipCode],
      ['location', fact.location, TEXT_WIDTHS.location],
      ['on_street_name', fact.onStreetName, TEXT_WIDTHS.streetName],
      ['off_street_name', fact.offStreetName, TEXT_WIDTHS.streetName],
      ['cross_street_name', fact.crossStreetName, TEXT_WIDTHS.streetName],
    ];
    for (const [column, value, width] of widths) {
      if (value !== null && value.length > width) {
        throw truncationError('collisions', column, value.slice(0, width));
      }
    }
  }
}

export class MemoryCollisionStore implements CollisionStore {
  readonly description = 'memory';
  commits = 0;
  rollbacks = 0;
  closed = false;

  private state = emptyState();
  private failAfterCommits: number | null = null;
  private readonly brokenCollisions = new Set<number>();

  /** Every transaction after `commits` successful ones fails as if the socket dropped */
  dropConnectionAfter(commits: number): void {
    this.failAfterCommits = commits;
  }

  /** Writes of this collision fail with a CHECK constraint violation */
  breakCollision(collisionId: number): void {
    this.brokenCollisions.add(collisionId);
  }

  seedLookups(kind: LookupKind, entries: readonly LookupEntry[]): void {
    for (const entry of entries) {
      this.state.lookups[kind].set(entry.key, entry.name);
    }
  }

  lookups(kind: LookupKind): LookupEntry[] {
    return [...this.state.lookups[kind].entries()]
      .map(([key, name]) => ({ key, name }))
      .sort((a, b) => a.key - b.key);
  }

  collision(collisionId: number): CollisionFact | undefined {
    return this.state.collisions.get(collisionId);
  }

  collisionIds(): number[] {
    return [...this.state.collisions.keys()].sort((a, b) => a - b);
  }

  junctionRows(kind: JunctionKind, collisionId: number): JunctionRow[] {
    return this.state.junctions[kind].get(collisionId) ?? [];
  }

  junctionRowCount(kind: JunctionKind): number {
    let total = 0;
    for (const rows of this.state.junctions[kind].values()) {
      total += rows.length;
    }
    return total;
  }

  async loadLookups(kind: LookupKind): Promise<LookupEntry[]> {
    this.assertReachable();
    return this.lookups(kind);
  }

  async transaction<T>(fn: (writer: CollisionWriter) => Promise<T>): Promise<T> {
    this.assertReachable();
    const working = cloneState(this.state);

    try {
      const result = await fn(new MemoryCollisionWriter(working, this.brokenCollisions));
      this.state = working;
      this.commits++;
      return result;
    } catch (error) {
      this.rollbacks++;
      throw error;
    }
  }

  async integrityReport(): Promise<IntegrityReport> {
    const tableCounts: Record<string, number> = { collisions: this.state.collisions.size };
    for (const kind of LOOKUP_KINDS) {
      tableCounts[LOOKUP_TABLES[kind].table] = this.state.lookups[kind].size;
    }
    for (const kind of JUNCTION_KINDS) {
      tableCounts[JUNCTION_TABLES[kind].table] = this.junctionRowCount(kind);
    }

    const orphanJunctionRows: Record<JunctionKind, number> = { vehicle: 0, factor: 0 };
    const invalidOrdinals: Record<JunctionKind, number> = { vehicle: 0, factor: 0 };
    for (const kind of JUNCTION_KINDS) {
      for (const [collisionId, rows] of this.state.junctions[kind]) {
        if (!this.state.collisions.has(collisionId)) {
          orphanJunctionRows[kind] += rows.length;
        }
        invalidOrdinals[kind] += rows.filter(row => row.ordinal < 1 || row.ordinal > SLOT_COUNT).length;
      }
    }

    let negativeCountRows = 0;
    for (const fact of this.state.collisions.values()) {
      if (INJURY_COUNT_FIELDS.some(field => fact.counts[field] < 0)) {
        negativeCountRows++;
      }
    }

    const duplicateLookupNames: Record<LookupKind, number> = { borough: 0, vehicleType: 0, factor: 0 };
    for (const kind of LOOKUP_KINDS) {
      const seen = new Map<string, number>();
      for (const name of this.state.lookups[kind].values()) {
        const normalized = name.trim().toLowerCase();
        seen.set(normalized, (seen.get(normalized) ?? 0) + 1);
      }
      duplicateLookupNames[kind] = [...seen.values()].filter(count => count > 1).length;
    }

    return { tableCounts, orphanJunctionRows, negativeCountRows, duplicateLookupNames, invalidOrdinals };
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private assertReachable(): void {
    if (this.failAfterCommits !== null && this.commits >= this.failAfterCommits) {
      throw new SocketError();
    }
  }
}
