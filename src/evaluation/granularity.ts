import type { RecordStore } from '../store/record-store.js';
import type { Mask } from './context.js';

/** Location level: every selected record index, in store order. */
export function selectLocations(mask: Mask): number[] {
  const indices: number[] = [];
  mask.forEach((selected, index) => {
    if (selected) indices.push(index);
  });
  return indices;
}

/**
 * Production level: one record index per distinct (title, year), the first
 * selected occurrence in store order.
 */
export function collapseToProductions(store: RecordStore, mask: Mask): number[] {
  const seen = new Set<string>();
  const indices: number[] = [];
  mask.forEach((selected, index) => {
    if (!selected) return;
    const key = store.productionKeyAt(index);
    if (seen.has(key)) return;
    seen.add(key);
    indices.push(index);
  });
  return indices;
}
