/**
 * Junction Loader
 * Expands the five vehicle / factor slots of a collision into ordinal child rows
 */

import type { CollisionWriter } from './collision-store';
import { SLOT_COUNT, type JunctionRow, type ResolvedCollision, type SlotKeys } from './collision-types';
import { IntegrityError } from './error-handler';
import type { LoadedFact } from './fact-loader';

export interface JunctionLoadResult {
  vehicles: number;
  factors: number;
}

/**
 * One row per non-empty slot; the ordinal is the slot's 1-based source position
 */
export function expandJunctionRows(collisionId: number, keys: SlotKeys): JunctionRow[] {
  if (keys.length > SLOT_COUNT) {
    throw new IntegrityError(
      `collision ${collisionId} has ${keys.length} slots, ordinals are limited to 1..${SLOT_COUNT}`,
      collisionId
    );
  }

  const rows: JunctionRow[] = [];
  keys.forEach((lookupKey, index) => {
    if (lookupKey !== null) {
      rows.push({ collisionId, ordinal: index + 1, lookupKey });
    }
  });
  return rows;
}

export interface JunctionPlan {
  collisionId: number;
  vehicles: JunctionRow[];
  factors: JunctionRow[];
}

export class JunctionLoader {
  /**
   * Expand a row's slots; runs before the fact is written so a bad row writes nothing
   */
  plan(resolved: ResolvedCollision): JunctionPlan {
    const { collisionId } = resolved.record;
    return {
      collisionId,
      vehicles: expandJunctionRows(collisionId, resolved.vehicleTypeKeys),
      factors: expandJunctionRows(collisionId, resolved.factorKeys),
    };
  }

  async load(writer: CollisionWriter, fact: LoadedFact, plan: JunctionPlan): Promise<JunctionLoadResult> {
    const { collisionId } = fact;
    if (plan.collisionId !== collisionId) {
      throw new IntegrityError(
        `junction rows for collision ${plan.collisionId} do not match loaded collision ${collisionId}`,
        plan.collisionId
      );
    }

    // A fresh collision has no rows to replace
    const fresh = fact.outcome === 'inserted';
    if (!fresh || plan.vehicles.length > 0) {
      await writer.replaceJunctionRows('vehicle', collisionId, plan.vehicles);
    }
    if (!fresh || plan.factors.length > 0) {
      await writer.replaceJunctionRows('factor', collisionId, plan.factors);
    }

    return { vehicles: plan.vehicles.length, factors: plan.factors.length };
  }
}
