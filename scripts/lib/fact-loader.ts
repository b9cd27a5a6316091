/**
 * Fact Loader
 * Writes one collisions row per source collision id
 */

import type { DuplicatePolicy } from './config-loader';
import type { CollisionWriter } from './collision-store';
import { INJURY_COUNT_FIELDS, SQL_INT_MAX, type CollisionFact, type ResolvedCollision } from './collision-types';
import { IntegrityError } from './error-handler';

/**
 * A collision row written in the current transaction; junction rows may reference it
 */
export interface LoadedFact {
  readonly collisionId: number;
  readonly outcome: 'inserted' | 'overwritten';
}

export function toCollisionFact(resolved: ResolvedCollision): CollisionFact {
  const { record } = resolved;
  return {
    collisionId: record.collisionId,
    crashDate: record.crashDate,
    crashTime: record.crashTime,
    boroughKey: resolved.boroughKey,
    zipCode: record.zipCode,
    latitude: record.latitude,
    longitude: record.longitude,
    location: record.location,
    onStreetName: record.onStreetName,
    offStreetName: record.offStreetName,
    crossStreetName: record.crossStreetName,
    counts: { ...record.counts },
  };
}

export class FactLoader {
  constructor(private readonly policy: DuplicatePolicy = 'overwrite') {}

  async load(writer: CollisionWriter, resolved: ResolvedCollision): Promise<LoadedFact> {
    const fact = toCollisionFact(resolved);
    const { collisionId } = fact;

    for (const field of INJURY_COUNT_FIELDS) {
      const value = fact.counts[field];
      if (!Number.isInteger(value) || value < 0 || value > SQL_INT_MAX) {
        throw new IntegrityError(`collision ${collisionId} has invalid ${field} count ${value}`, collisionId);
      }
    }

    if (this.policy === 'reject') {
      const inserted = await writer.insertCollisionIfAbsent(fact);
      if (!inserted) {
        throw new IntegrityError(`duplicate collision_id ${collisionId} rejected`, collisionId);
      }
      return { collisionId, outcome: 'inserted' };
    }

    // Last write wins
    const result = await writer.upsertCollision(fact);
    return { collisionId, outcome: result === 'inserted' ? 'inserted' : 'overwritten' };
  }
}
