import type {
  CollisionFact,
  JunctionKind,
  JunctionRow,
  LookupEntry,
  LookupKind,
} from './collision-types';

/**
 * Writes performed inside one store transaction
 */
export interface CollisionWriter {
  insertLookups(kind: LookupKind, entries: readonly LookupEntry[]): Promise<void>;

  /** Insert or overwrite by collision id */
  upsertCollision(fact: CollisionFact): Promise<'inserted' | 'updated'>;

  /** Insert unless the collision id exists; false when it already existed */
  insertCollisionIfAbsent(fact: CollisionFact): Promise<boolean>;

  /** Delete the collision's existing rows of this kind, then insert `rows` */
  replaceJunctionRows(kind: JunctionKind, collisionId: number, rows: readonly JunctionRow[]): Promise<void>;
}

export interface IntegrityReport {
  tableCounts: Record<string, number>;
  orphanJunctionRows: Record<JunctionKind, number>;
  negativeCountRows: number;
  duplicateLookupNames: Record<LookupKind, number>;
  invalidOrdinals: Record<JunctionKind, number>;
}

export interface CollisionStore {
  /** Human-readable target, for logs */
  readonly description: string;

  loadLookups(kind: LookupKind): Promise<LookupEntry[]>;

  /** Run `fn` in one transaction: committed when it resolves, rolled back when it throws */
  transaction<T>(fn: (writer: CollisionWriter) => Promise<T>): Promise<T>;

  integrityReport(): Promise<IntegrityReport>;

  close(): Promise<void>;
}
