// src/core/math/rod-math/part-grouping.ts

import type { PartGroup, PartInstance } from '../../common/types';

/**
 * Counts identical parts on a rod.
 * Two parts are identical when they share part type AND length.
 * Groups come out in the order their first part was placed.
 */
export function groupRodParts(parts: PartInstance[]): PartGroup[] {
  const groups = new Map<string, PartGroup>();

  for (const part of parts) {
    const key = `${part.typeIndex}:${part.length}`;
    const group = groups.get(key);
    if (group) {
      group.count += 1;
    } else {
      groups.set(key, {
        typeIndex: part.typeIndex,
        length: part.length,
        count: 1,
      });
    }
  }

  return Array.from(groups.values());
}

/**
 * "3 × 1002, 1 × 502"
 */
export function formatPartsLabel(groups: PartGroup[]): string {
  return groups
    .map((group) => `${group.count} × ${Math.trunc(group.length)}`)
    .join(', ');
}

export function formatLength(value: number): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(2);
}
