/**
 * Unit Tests for the fact and junction loaders
 */

import { describe, expect, it, vi } from 'vitest';
import type { CollisionWriter } from '../collision-store';
import type { ResolvedCollision } from '../collision-types';
import { IntegrityError } from '../error-handler';
import { FactLoader, toCollisionFact } from '../fact-loader';
import { expandJunctionRows, JunctionLoader } from '../junction-loader';
import { collisionRecord } from './fixtures';
import { MemoryCollisionStore } from './memory-store';

function resolved(collisionId: number, fields: Partial<ResolvedCollision> = {}): ResolvedCollision {
  return {
    record: collisionRecord(collisionId),
    boroughKey: null,
    vehicleTypeKeys: [null, null, null, null, null],
    factorKeys: [null, null, null, null, null],
    ...fields,
  };
}

function fakeWriter() {
  return {
    insertLookups: vi.fn(async () => {}),
    upsertCollision: vi.fn(async () => 'inserted' as const),
    insertCollisionIfAbsent: vi.fn(async () => true),
    replaceJunctionRows: vi.fn(async () => {}),
  } satisfies CollisionWriter;
}

describe('toCollisionFact', () => {
  it('copies the record and attaches the borough key', () => {
    const record = collisionRecord(12, { crashDate: '2022-01-05', borough: 'Bronx', zipCode: '10451' });
    const fact = toCollisionFact({ ...resolved(12), record, boroughKey: 4 });

    expect(fact).toEqual({
      collisionId: 12,
      crashDate: '2022-01-05',
      crashTime: null,
      boroughKey: 4,
      zipCode: '10451',
      latitude: null,
      longitude: null,
      location: null,
      onStreetName: null,
      offStreetName: null,
      crossStreetName: null,
      counts: record.counts,
    });
    expect(fact.counts).not.toBe(record.counts);
  });
});

describe('FactLoader', () => {
  it('overwrites an existing collision by default', async () => {
    const store = new MemoryCollisionStore();
    const loader = new FactLoader();
    const first = resolved(7, { record: collisionRecord(7, { onStreetName: 'BROADWAY' }) });
    const second = resolved(7, { record: collisionRecord(7, { onStreetName: 'CANAL STREET' }) });

    const outcomes = await store.transaction(async writer => [
      await loader.load(writer, first),
      await loader.load(writer, second),
    ]);

    expect(outcomes).toEqual([
      { collisionId: 7, outcome: 'inserted' },
      { collisionId: 7, outcome: 'overwritten' },
    ]);
    expect(store.collision(7)?.onStreetName).toBe('CANAL STREET');
  });

  it('rejects a duplicate collision id under the reject policy', async () => {
    const store = new MemoryCollisionStore();
    const loader = new FactLoader('reject');
    await store.transaction(writer => loader.load(writer, resolved(7, { record: collisionRecord(7, { onStreetName: 'BROADWAY' }) })));

    const attempt = store.transaction(writer => loader.load(writer, resolved(7)));

    await expect(attempt).rejects.toThrow(new IntegrityError('duplicate collision_id 7 rejected', 7));
    expect(store.collision(7)?.onStreetName).toBe('BROADWAY');
  });

  it('rejects negative and fractional counts before writing', async () => {
    const writer = fakeWriter();
    const loader = new FactLoader();
    const negative = collisionRecord(9);
    negative.counts.personsInjured = -1;
    const fractional = collisionRecord(10);
    fractional.counts.cyclistsKilled = 1.5;

    await expect(loader.load(writer, resolved(9, { record: negative }))).rejects.toThrow(
      'collision 9 has invalid personsInjured count -1'
    );
    await expect(loader.load(writer, resolved(10, { record: fractional }))).rejects.toThrow(
      'collision 10 has invalid cyclistsKilled count 1.5'
    );
    expect(writer.upsertCollision).not.toHaveBeenCalled();
  });

  it('rejects counts beyond the INT column range', async () => {
    const writer = fakeWriter();
    const loader = new FactLoader();
    const huge = collisionRecord(11);
    huge.counts.personsInjured = 3000000000;
    const largest = collisionRecord(12);
    largest.counts.personsInjured = 2147483647;

    await expect(loader.load(writer, resolved(11, { record: huge }))).rejects.toThrow(
      'collision 11 has invalid personsInjured count 3000000000'
    );
    await expect(loader.load(writer, resolved(12, { record: largest }))).resolves.toMatchObject({ outcome: 'inserted' });
    expect(writer.upsertCollision).toHaveBeenCalledTimes(1);
  });
});

describe('expandJunctionRows', () => {
  it('keeps the source slot position as the ordinal', () => {
    expect(expandJunctionRows(9, [3, null, 5, null, null])).toEqual([
      { collisionId: 9, ordinal: 1, lookupKey: 3 },
      { collisionId: 9, ordinal: 3, lookupKey: 5 },
    ]);
  });

  it('produces no rows for empty slots', () => {
    expect(expandJunctionRows(9, [null, null, null, null, null])).toEqual([]);
  });

  it('rejects more than five slots', () => {
    expect(() => expandJunctionRows(9, [1, 2, 3, 4, 5, 6])).toThrow(IntegrityError);
  });
});

describe('JunctionLoader', () => {
  const junctions = new JunctionLoader();

  it('writes vehicle and factor rows after a new collision', async () => {
    const writer = fakeWriter();
    const plan = junctions.plan(resolved(1, { vehicleTypeKeys: [1, 2, null, null, null], factorKeys: [4, null, null, null, null] }));

    const result = await junctions.load(writer, { collisionId: 1, outcome: 'inserted' }, plan);

    expect(result).toEqual({ vehicles: 2, factors: 1 });
    expect(writer.replaceJunctionRows).toHaveBeenCalledWith('vehicle', 1, [
      { collisionId: 1, ordinal: 1, lookupKey: 1 },
      { collisionId: 1, ordinal: 2, lookupKey: 2 },
    ]);
    expect(writer.replaceJunctionRows).toHaveBeenCalledWith('factor', 1, [{ collisionId: 1, ordinal: 1, lookupKey: 4 }]);
  });

  it('skips the writer for a new collision without references', async () => {
    const writer = fakeWriter();

    const result = await junctions.load(writer, { collisionId: 2, outcome: 'inserted' }, junctions.plan(resolved(2)));

    expect(result).toEqual({ vehicles: 0, factors: 0 });
    expect(writer.replaceJunctionRows).not.toHaveBeenCalled();
  });

  it('clears stale rows when an overwritten collision lost its references', async () => {
    const writer = fakeWriter();

    await junctions.load(writer, { collisionId: 3, outcome: 'overwritten' }, junctions.plan(resolved(3)));

    expect(writer.replaceJunctionRows).toHaveBeenCalledTimes(2);
    expect(writer.replaceJunctionRows).toHaveBeenCalledWith('vehicle', 3, []);
    expect(writer.replaceJunctionRows).toHaveBeenCalledWith('factor', 3, []);
  });

  it('refuses rows planned for another collision', async () => {
    const writer = fakeWriter();

    await expect(
      junctions.load(writer, { collisionId: 4, outcome: 'inserted' }, junctions.plan(resolved(5)))
    ).rejects.toThrow('junction rows for collision 5 do not match loaded collision 4');
  });
});
