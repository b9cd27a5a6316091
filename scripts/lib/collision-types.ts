/**
 * Collision domain types shared by the reader, loaders and stores
 */

/** Number of repeated vehicle / factor columns per source row */
export const SLOT_COUNT = 5;

/** Ordered slot values in source column order; always SLOT_COUNT long */
export type SlotValues = ReadonlyArray<string | null>;

/** Resolved lookup keys per slot; null where the source slot was empty */
export type SlotKeys = ReadonlyArray<number | null>;

export interface InjuryCounts {
  personsInjured: number;
  personsKilled: number;
  pedestriansInjured: number;
  pedestriansKilled: number;
  cyclistsInjured: number;
  cyclistsKilled: number;
  motoristsInjured: number;
  motoristsKilled: number;
}

export const INJURY_COUNT_FIELDS = [
  'personsInjured',
  'personsKilled',
  'pedestriansInjured',
  'pedestriansKilled',
  'cyclistsInjured',
  'cyclistsKilled',
  'motoristsInjured',
  'motoristsKilled',
] as const satisfies ReadonlyArray<keyof InjuryCounts>;

export interface CollisionLocation {
  zipCode: string | null;
  latitude: number | null;
  longitude: number | null;
  location: string | null;
  onStreetName: string | null;
  offStreetName: string | null;
  crossStreetName: string | null;
}

/** One normalized source row */
export interface CollisionRecord extends CollisionLocation {
  collisionId: number;
  crashDate: string | null; // YYYY-MM-DD
  crashTime: string | null; // HH:MM:SS
  borough: string | null;
  counts: InjuryCounts;
  vehicleTypes: SlotValues;
  factors: SlotValues;
}

export interface ResolvedCollision {
  record: CollisionRecord;
  boroughKey: number | null;
  vehicleTypeKeys: SlotKeys;
  factorKeys: SlotKeys;
}

/** Row written to the collisions table */
export interface CollisionFact extends CollisionLocation {
  collisionId: number;
  crashDate: string | null;
  crashTime: string | null;
  boroughKey: number | null;
  counts: InjuryCounts;
}

export type LookupKind = 'borough' | 'vehicleType' | 'factor';

export const LOOKUP_KINDS: readonly LookupKind[] = ['borough', 'vehicleType', 'factor'];

export interface LookupEntry {
  key: number;
  name: string;
}

export type JunctionKind = 'vehicle' | 'factor';

export const JUNCTION_KINDS: readonly JunctionKind[] = ['vehicle', 'factor'];

export interface JunctionRow {
  collisionId: number;
  ordinal: number;
  lookupKey: number;
}

/** Largest value an INT column holds */
export const SQL_INT_MAX = 2147483647;

/** NVARCHAR widths of the text columns in sql/schema.sql */
export const TEXT_WIDTHS = {
  zipCode: 10,
  location: 100,
  streetName: 200,
  boroughName: 50,
  lookupDescription: 200,
} as const;

export interface LookupTableInfo {
  table: string;
  idColumn: string;
  nameColumn: string;
  maxNameLength: number;
}

export interface JunctionTableInfo {
  table: string;
  ordinalColumn: string;
  keyColumn: string;
  lookup: LookupKind;
}

export const LOOKUP_TABLES: Record<LookupKind, LookupTableInfo> = {
  borough: {
    table: 'boroughs',
    idColumn: 'borough_id',
    nameColumn: 'borough_name',
    maxNameLength: TEXT_WIDTHS.boroughName,
  },
  vehicleType: {
    table: 'vehicle_types',
    idColumn: 'vehicle_type_id',
    nameColumn: 'vehicle_type_desc',
    maxNameLength: TEXT_WIDTHS.lookupDescription,
  },
  factor: {
    table: 'factors',
    idColumn: 'factor_id',
    nameColumn: 'factor_desc',
    maxNameLength: TEXT_WIDTHS.lookupDescription,
  },
};

export const JUNCTION_TABLES: Record<JunctionKind, JunctionTableInfo> = {
  vehicle: {
    table: 'collision_vehicles',
    ordinalColumn: 'vehicle_order',
    keyColumn: 'vehicle_type_id',
    lookup: 'vehicleType',
  },
  factor: {
    table: 'collision_factors',
    ordinalColumn: 'factor_order',
    keyColumn: 'factor_id',
    lookup: 'factor',
  },
};

/** Column names of the collisions table, keyed by count field */
export const COUNT_COLUMNS: Record<keyof InjuryCounts, string> = {
  personsInjured: 'number_of_persons_injured',
  personsKilled: 'number_of_persons_killed',
  pedestriansInjured: 'number_of_pedestrians_injured',
  pedestriansKilled: 'number_of_pedestrians_killed',
  cyclistsInjured: 'number_of_cyclist_injured',
  cyclistsKilled: 'number_of_cyclist_killed',
  motoristsInjured: 'number_of_motorist_injured',
  motoristsKilled: 'number_of_motorist_killed',
};

export function emptyCounts(): InjuryCounts {
  return {
    personsInjured: 0,
    personsKilled: 0,
    pedestriansInjured: 0,
    pedestriansKilled: 0,
    cyclistsInjured: 0,
    cyclistsKilled: 0,
    motoristsInjured: 0,
    motoristsKilled: 0,
  };
}
