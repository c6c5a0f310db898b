import type { LheInit, WeightGroup, WeightInfo } from './init.js';

/** Largest weight index in the header, 0 when it defines no weights. */
export function maxWeightIndex(init: LheInit): number {
  let max = 0;
  for (const group of init.weightGroups.values()) {
    for (const weight of group.weights.values()) {
      max = Math.max(max, weight.index);
    }
  }
  return max;
}

/** Locates a weight ID in any group of the header. */
export function findWeight(
  init: LheInit,
  weightId: string,
): { group: WeightGroup; weight: WeightInfo } | undefined {
  for (const group of init.weightGroups.values()) {
    const weight = group.weights.get(weightId);
    if (weight !== undefined) return { group, weight };
  }
  return undefined;
}

/** All weight IDs of the header, ordered by index. */
export function orderedWeightIds(init: LheInit): string[] {
  const all: WeightInfo[] = [];
  for (const group of init.weightGroups.values()) {
    all.push(...group.weights.values());
  }
  return all.sort((a, b) => a.index - b.index).map((w) => w.id);
}
