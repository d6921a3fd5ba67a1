import type { CleaningRule } from '../types.js';
import type { RecordStore } from '../store/record-store.js';
import type { Gazetteer } from '../store/landmarks.js';

const RULE_ORDER: readonly CleaningRule[] = [
  'null_canonicalization',
  'numeric_coercion',
  'missing_geometry_excluded',
  'city_qualifier_stripped',
  'actor_slot_union',
  'production_dedup',
  'name_trim',
  'person_name_filter',
];

/** Cleaning rules exercised while evaluating one query. */
export class CleaningRuleLog {
  private readonly noted = new Set<CleaningRule>();

  note(rule: CleaningRule): void {
    this.noted.add(rule);
  }

  has(rule: CleaningRule): boolean {
    return this.noted.has(rule);
  }

  list(): CleaningRule[] {
    return RULE_ORDER.filter((rule) => this.noted.has(rule));
  }
}

export interface EvaluationContext {
  readonly store: RecordStore;
  readonly gazetteer: Gazetteer;
  readonly actorMatchesAnySlot: boolean;
  readonly stripCityQualifier: boolean;
  readonly rules: CleaningRuleLog;
}

/** Boolean selection aligned 1:1 with the store's record index. */
export type Mask = readonly boolean[];

export function fullMask(store: RecordStore): Mask {
  return new Array<boolean>(store.size).fill(true);
}

export function countSelected(mask: Mask): number {
  let count = 0;
  for (const selected of mask) if (selected) count += 1;
  return count;
}
