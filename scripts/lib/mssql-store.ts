/**
 * SQL Server implementation of the collision store
 */

import * as sql from 'mssql';
import type { CollisionStore, CollisionWriter, IntegrityReport } from './collision-store';
import {
  COUNT_COLUMNS,
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
} from './collision-types';
import {
  executeWithTransaction,
  retryWithBackoff,
  toConnectivityError,
  type RetryOptions,
} from './error-handler';

interface FactColumn {
  column: string;
  value: string; // SQL expression over the bound parameters
}

// Dates and times are bound as text and converted server-side
const FACT_COLUMNS: FactColumn[] = [
  { column: 'crash_date', value: 'TRY_CONVERT(DATE, @crash_date, 23)' },
  { column: 'crash_time', value: 'TRY_CONVERT(TIME(0), @crash_time, 108)' },
  { column: 'borough_id', value: '@borough_id' },
  { column: 'zip_code', value: '@zip_code' },
  { column: 'latitude', value: '@latitude' },
  { column: 'longitude', value: '@longitude' },
  { column: 'location', value: '@location' },
  { column: 'on_street_name', value: '@on_street_name' },
  { column: 'off_street_name', value: '@off_street_name' },
  { column: 'cross_street_name', value: '@cross_street_name' },
  ...INJURY_COUNT_FIELDS.map(field => ({ column: COUNT_COLUMNS[field], value: `@${COUNT_COLUMNS[field]}` })),
];

function bindFact(request: sql.Request, fact: CollisionFact): sql.Request {
  request
    .input('collision_id', sql.BigInt, fact.collisionId)
    .input('crash_date', sql.VarChar(10), fact.crashDate)
    .input('crash_time', sql.VarChar(8), fact.crashTime)
    .input('borough_id', sql.Int, fact.boroughKey)
    .input('zip_code', sql.NVarChar(TEXT_WIDTHS.zipCode), fact.zipCode)
    .input('latitude', sql.Decimal(9, 6), fact.latitude)
    .input('longitude', sql.Decimal(9, 6), fact.longitude)
    .input('location', sql.NVarChar(TEXT_WIDTHS.location), fact.location)
    .input('on_street_name', sql.NVarChar(TEXT_WIDTHS.streetName), fact.onStreetName)
    .input('off_street_name', sql.NVarChar(TEXT_WIDTHS.streetName), fact.offStreetName)
    .input('cross_street_name', sql.NVarChar(TEXT_WIDTHS.streetName), fact.crossStreetName);

  for (const field of INJURY_COUNT_FIELDS) {
    request.input(COUNT_COLUMNS[field], sql.Int, fact.counts[field]);
  }
  return request;
}

class MssqlCollisionWriter implements CollisionWriter {
  constructor(
    private readonly transaction: sql.Transaction,
    private readonly table: (name: string) => string
  ) {}

  private request(): sql.Request {
    return new sql.Request(this.transaction);
  }

  async insertLookups(kind: LookupKind, entries: readonly LookupEntry[]): Promise<void> {
    const { table, idColumn, nameColumn, maxNameLength } = LOOKUP_TABLES[kind];
    const target = this.table(table);

    for (const entry of entries) {
      await this.request()
        .input('key', sql.Int, entry.key)
        .input('name', sql.NVarChar(maxNameLength), entry.name)
        .query(`
          IF NOT EXISTS (SELECT 1 FROM ${target} WHERE ${idColumn} = @key)
            INSERT INTO ${target} (${idColumn}, ${nameColumn}) VALUES (@key, @name)
        `);
    }
  }

  async upsertCollision(fact: CollisionFact): Promise<'inserted' | 'updated'> {
    const target = this.table('collisions');
    const result = await bindFact(this.request(), fact).query<{ action: string }>(`
      MERGE ${target} WITH (HOLDLOCK) AS tgt
      USING (SELECT @collision_id AS collision_id) AS src
        ON tgt.collision_id = src.collision_id
      WHEN MATCHED THEN
        UPDATE SET ${FACT_COLUMNS.map(c => `${c.column} = ${c.value}`).join(', ')}
      WHEN NOT MATCHED THEN
        INSERT (collision_id, ${FACT_COLUMNS.map(c => c.column).join(', ')})
        VALUES (@collision_id, ${FACT_COLUMNS.map(c => c.value).join(', ')})
      OUTPUT $action AS action;
    `);

    return result.recordset[0]?.action === 'INSERT' ? 'inserted' : 'updated';
  }

  async insertCollisionIfAbsent(fact: CollisionFact): Promise<boolean> {
    const target = this.table('collisions');
    const result = await bindFact(this.request(), fact).query(`
      INSERT INTO ${target} (collision_id, ${FACT_COLUMNS.map(c => c.column).join(', ')})
      SELECT @collision_id, ${FACT_COLUMNS.map(c => c.value).join(', ')}
      WHERE NOT EXISTS (
        SELECT 1 FROM ${target} WITH (UPDLOCK, HOLDLOCK) WHERE collision_id = @collision_id
      )
    `);

    return result.rowsAffected[0] === 1;
  }

  async replaceJunctionRows(kind: JunctionKind, collisionId: number, rows: readonly JunctionRow[]): Promise<void> {
    const { table, ordinalColumn, keyColumn } = JUNCTION_TABLES[kind];
    const target = this.table(table);
    const request = this.request().input('collision_id', sql.BigInt, collisionId);

    let statement = `DELETE FROM ${target} WHERE collision_id = @collision_id;`;

    if (rows.length > 0) {
      const values = rows.map((row, i) => {
        request.input(`ordinal_${i}`, sql.Int, row.ordinal).input(`key_${i}`, sql.Int, row.lookupKey);
        return `(@collision_id, @ordinal_${i}, @key_${i})`;
      });
      statement += `\nINSERT INTO ${target} (collision_id, ${ordinalColumn}, ${keyColumn}) VALUES ${values.join(', ')};`;
    }

    await request.query(statement);
  }
}

export interface MssqlStoreOptions {
  schema: string;
  retry?: RetryOptions;
}

export class MssqlCollisionStore implements CollisionStore {
  readonly description: string;

  private constructor(
    private readonly pool: sql.ConnectionPool,
    private readonly schema: string,
    private readonly retry: RetryOptions,
    target: string
  ) {
    this.description = `${target} [${schema}]`;
  }

  /**
   * Connect, retrying while the server is starting up; ConnectivityError when it never answers
   */
  static async connect(config: sql.config, options: MssqlStoreOptions): Promise<MssqlCollisionStore> {
    const retry = options.retry ?? {};

    try {
      const pool = await retryWithBackoff(async () => {
        const connected = await new sql.ConnectionPool(config).connect();
        await connected.request().query('SELECT 1');
        return connected;
      }, retry);

      return new MssqlCollisionStore(pool, options.schema, retry, `${config.server}/${config.database ?? ''}`);
    } catch (error) {
      throw toConnectivityError(error, `Cannot connect to ${config.server}`);
    }
  }

  private table = (name: string): string => `[${this.schema}].[${name}]`;

  async loadLookups(kind: LookupKind): Promise<LookupEntry[]> {
    const { table, idColumn, nameColumn } = LOOKUP_TABLES[kind];
    const result = await retryWithBackoff(
      () => this.pool.request().query<LookupEntry>(
        `SELECT ${idColumn} AS [key], ${nameColumn} AS [name] FROM ${this.table(table)} ORDER BY ${idColumn}`
      ),
      this.retry
    );
    return result.recordset.map(row => ({ key: row.key, name: row.name }));
  }

  async transaction<T>(fn: (writer: CollisionWriter) => Promise<T>): Promise<T> {
    return executeWithTransaction(
      this.pool,
      transaction => fn(new MssqlCollisionWriter(transaction, this.table)),
      this.retry
    );
  }

  private async count(query: string): Promise<number> {
    const result = await this.pool.request().query<{ cnt: number }>(query);
    return result.recordset[0]?.cnt ?? 0;
  }

  async integrityReport(): Promise<IntegrityReport> {
    const tables = [
      'collisions',
      ...LOOKUP_KINDS.map(kind => LOOKUP_TABLES[kind].table),
      ...JUNCTION_KINDS.map(kind => JUNCTION_TABLES[kind].table),
    ];
    const countResult = await this.pool.request().query<{ tbl: string; cnt: number }>(
      tables.map(t => `SELECT '${t}' AS tbl, COUNT(*) AS cnt FROM ${this.table(t)}`).join('\nUNION ALL ')
    );
    const tableCounts: Record<string, number> = {};
    for (const row of countResult.recordset) {
      tableCounts[row.tbl] = row.cnt;
    }

    const orphanJunctionRows: Record<JunctionKind, number> = { vehicle: 0, factor: 0 };
    const invalidOrdinals: Record<JunctionKind, number> = { vehicle: 0, factor: 0 };
    for (const kind of JUNCTION_KINDS) {
      const { table, ordinalColumn } = JUNCTION_TABLES[kind];
      orphanJunctionRows[kind] = await this.count(`
        SELECT COUNT(*) AS cnt
        FROM ${this.table(table)} j
        LEFT JOIN ${this.table('collisions')} c ON c.collision_id = j.collision_id
        WHERE c.collision_id IS NULL
      `);
      invalidOrdinals[kind] = await this.count(
        `SELECT COUNT(*) AS cnt FROM ${this.table(table)} WHERE ${ordinalColumn} NOT BETWEEN 1 AND ${SLOT_COUNT}`
      );
    }

    const negativeCountRows = await this.count(`
      SELECT COUNT(*) AS cnt FROM ${this.table('collisions')}
      WHERE ${INJURY_COUNT_FIELDS.map(field => `${COUNT_COLUMNS[field]} < 0`).join(' OR ')}
    `);

    const duplicateLookupNames: Record<LookupKind, number> = { borough: 0, vehicleType: 0, factor: 0 };
    for (const kind of LOOKUP_KINDS) {
      const { table, nameColumn } = LOOKUP_TABLES[kind];
      const normalized = `LOWER(LTRIM(RTRIM(${nameColumn})))`;
      duplicateLookupNames[kind] = await this.count(`
        SELECT COUNT(*) AS cnt FROM (
          SELECT ${normalized} AS name FROM ${this.table(table)}
          GROUP BY ${normalized}
          HAVING COUNT(*) > 1
        ) d
      `);
    }

    return { tableCounts, orphanJunctionRows, negativeCountRows, duplicateLookupNames, invalidOrdinals };
  }

  async close(): Promise<void> {
    await this.pool.close();
  }
}
