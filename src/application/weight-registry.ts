import {
  DuplicateWeightIdError,
  WeightIdNotFoundError,
  findWeight,
  maxWeightIndex,
  orderedWeightIds,
} from '../domain/index.js';
import type { LheInit, WeightInfo } from '../domain/index.js';

/**
 * Registers a new weight in the header.
 *
 * The ID must not exist in any group. The group is created when missing
 * and the weight gets `max(index) + 1`, computed now so that earlier
 * registrations in the same chain are taken into account. On failure the
 * header is left exactly as it was.
 */
export function addWeight(init: LheInit, groupName: string, weightId: string, text: string): WeightInfo {
  const existing = findWeight(init, weightId);
  if (existing !== undefined) {
    throw new DuplicateWeightIdError(weightId, existing.group.name);
  }

  const weight: WeightInfo = { id: weightId, text, index: maxWeightIndex(init) + 1, attributes: {} };
  let group = init.weightGroups.get(groupName);
  if (group === undefined) {
    group = { name: groupName, attributes: {}, weights: new Map() };
    init.weightGroups.set(groupName, group);
  }
  group.weights.set(weightId, weight);
  return weight;
}

/**
 * Keeps only `weightId` in the header: its group keeps that one entry,
 * every other group is emptied, and empty groups are removed.
 */
export function restrictTo(init: LheInit, weightId: string): WeightInfo {
  const found = findWeight(init, weightId);
  if (found === undefined) {
    throw new WeightIdNotFoundError(weightId, orderedWeightIds(init));
  }

  for (const [name, group] of init.weightGroups) {
    const kept = group.weights.get(weightId);
    group.weights = kept === undefined ? new Map() : new Map([[weightId, kept]]);
    if (group.weights.size === 0) init.weightGroups.delete(name);
  }
  return found.weight;
}
