import pluralize from 'pluralize';
import type { PersonRole } from '../query/types.js';
import type { QueryPlan } from '../query/planner.js';
import type {
  GeoRow,
  LocationRecord,
  LocationRow,
  ProductionIdentity,
  ProductionRow,
  RankingEntry,
  ResultEnvelope,
  ResultPayload,
  SelfCheckOutcome,
} from '../types.js';
import { productionIdentity, productionKey, type RecordStore } from '../store/record-store.js';
import { canonicalizeText, coerceYear } from '../evaluation/canonicalize.js';
import { ACTOR_SLOTS } from '../evaluation/fields.js';
import { collapseToProductions, selectLocations } from '../evaluation/granularity.js';
import {
  collectCredits,
  distinctNames,
  rankByProductions,
  type NamePredicate,
} from '../evaluation/person-aggregator.js';
import { countSelected, type EvaluationContext, type Mask } from '../evaluation/context.js';

export const NO_MATCHES_SUMMARY = 'No matches were found for the given filters.';

export interface AssemblyInput {
  readonly plan: QueryPlan;
  readonly mask: Mask;
  readonly ctx: EvaluationContext;
  readonly evaluationId: string;
  /** Filter-derived test on individual names; applied by people operations. */
  readonly namePredicate?: NamePredicate;
}

export interface ExpandedProduction {
  readonly production: ProductionIdentity;
  readonly locations: readonly string[];
}

interface Assembled {
  readonly data: ResultPayload;
  readonly summary: string;
  readonly selfCheck?: SelfCheckOutcome;
}

export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

function count(n: number, noun: string): string {
  return `${n} ${pluralize(noun, n)}`;
}

function verbFor(n: number, singular: string, plural: string): string {
  return n === 1 ? singular : plural;
}

function actorsOf(record: LocationRecord): string[] {
  const names = new Set<string>();
  for (const slot of ACTOR_SLOTS) {
    const name = canonicalizeText(record[slot]);
    if (name !== null) names.add(name);
  }
  return [...names];
}

export function toLocationRow(record: LocationRecord): LocationRow {
  return {
    id: record.id,
    title: canonicalizeText(record.title),
    year: coerceYear(record.year),
    location: canonicalizeText(record.locations),
    funFacts: canonicalizeText(record.funFacts),
    director: canonicalizeText(record.director),
    writer: canonicalizeText(record.writer),
    actors: actorsOf(record),
  };
}

export function toProductionRow(record: LocationRecord): ProductionRow {
  const identity = productionIdentity(record);
  return {
    label: identity.label,
    title: identity.title,
    year: identity.year,
    director: canonicalizeText(record.director),
    writer: canonicalizeText(record.writer),
    actors: actorsOf(record),
  };
}

function distinctLocations(store: RecordStore, indices: readonly number[]): string[] {
  const column = store.column('locations');
  const seen = new Set<string>();
  for (const index of indices) {
    const location = canonicalizeText(column[index]);
    if (location !== null) seen.add(location);
  }
  return [...seen];
}

/**
 * Re-expands each selected production to every record it has in the full
 * store and groups the distinct, present location descriptions.
 */
export function expandProductions(store: RecordStore, representatives: readonly number[]): ExpandedProduction[] {
  return representatives.map((index) => {
    const production = productionIdentity(store.record(index));
    return { production, locations: distinctLocations(store, store.productionIndices(production.key)) };
  });
}

/**
 * Checks the emitted mapping against an independent scan of the unfiltered
 * store: each expanded production must appear under its own label with
 * exactly as many distinct locations as the store holds for it. A production
 * whose label was already taken by an earlier one counts as emitting nothing.
 */
export function verifyExpansion(
  store: RecordStore,
  expansion: readonly ExpandedProduction[],
  emitted: ReadonlyMap<string, readonly string[]>,
): SelfCheckOutcome {
  const expected = new Map<string, Set<string>>();
  for (const record of store.records()) {
    const location = canonicalizeText(record.locations);
    if (location === null) continue;
    const key = productionKey(record);
    const locations = expected.get(key) ?? new Set<string>();
    locations.add(location);
    expected.set(key, locations);
  }

  const claimed = new Set<string>();
  const mismatches = expansion
    .map(({ production }) => {
      const locations = claimed.has(production.label) ? [] : (emitted.get(production.label) ?? []);
      claimed.add(production.label);
      return {
        production: production.label,
        expected: expected.get(production.key)?.size ?? 0,
        actual: new Set(locations).size,
      };
    })
    .filter((entry) => entry.expected !== entry.actual);

  return { passed: mismatches.length === 0, checkedProductions: expansion.length, mismatches };
}

function rankLocations(store: RecordStore, indices: readonly number[], limit: number | null): RankingEntry[] {
  const column = store.column('locations');
  const productions = new Map<string, Set<string>>();
  for (const index of indices) {
    const location = canonicalizeText(column[index]);
    if (location === null) continue;
    const keys = productions.get(location) ?? new Set<string>();
    keys.add(store.productionKeyAt(index));
    productions.set(location, keys);
  }
  const ranked = [...productions].map(([name, keys]) => ({ name, count: keys.size }));
  ranked.sort((a, b) => b.count - a.count);
  return limit === null ? ranked : ranked.slice(0, limit);
}

function countByYear(store: RecordStore, representatives: readonly number[]): RankingEntry[] {
  const column = store.column('year');
  const counts = new Map<number, number>();
  for (const index of representatives) {
    const year = coerceYear(column[index]);
    if (year === null) continue;
    counts.set(year, (counts.get(year) ?? 0) + 1);
  }
  return [...counts]
    .sort(([a], [b]) => a - b)
    .map(([year, n]) => ({ name: String(year), count: n }));
}

function toGeoRow(record: LocationRecord): GeoRow | null {
  if (record.geometry === null) return null;
  return {
    id: record.id,
    title: canonicalizeText(record.title),
    year: coerceYear(record.year),
    location: canonicalizeText(record.locations),
    lng: record.geometry.lng,
    lat: record.geometry.lat,
  };
}

function rankingSummary(entries: readonly RankingEntry[], noun: string): string {
  const [top] = entries;
  if (top === undefined) return NO_MATCHES_SUMMARY;
  return `Ranked ${count(entries.length, noun)} by distinct productions; ${top.name} leads with ${count(top.count, 'production')}.`;
}

function isEmptyPayload(data: ResultPayload): boolean {
  switch (data.kind) {
    case 'scalar':
      return data.value === 0;
    case 'list':
      return data.items.length === 0;
    case 'ranking':
    case 'counts':
      return data.entries.length === 0;
    case 'mapping':
      return Object.keys(data.entries).length === 0;
    case 'productions':
    case 'locations':
    case 'geo_rows':
      return data.rows.length === 0;
  }
}

function assemblePayload(input: AssemblyInput, representatives: readonly number[]): Assembled {
  const { plan, mask, ctx } = input;
  const { store, rules } = ctx;
  const { operation } = plan;

  const people = (role: PersonRole, accept: NamePredicate | undefined) => {
    if (accept !== undefined) rules.note('person_name_filter');
    return collectCredits(store, representatives, role, ctx);
  };

  switch (operation.op) {
    case 'count': {
      if (operation.unit === 'production') {
        const n = representatives.length;
        return {
          data: { kind: 'scalar', value: n },
          summary: `${n} distinct ${pluralize('production', n)} ${verbFor(n, 'matches', 'match')} the filters.`,
        };
      }
      const n = countSelected(mask);
      return {
        data: { kind: 'scalar', value: n },
        summary: `${count(n, 'location record')} ${verbFor(n, 'matches', 'match')} the filters.`,
      };
    }

    case 'list': {
      if (operation.unit === 'production') {
        if (plan.resultShape === 'distinct_list') {
          const items = representatives.map((index) => productionIdentity(store.record(index)).label);
          return { data: { kind: 'list', items }, summary: `Found ${count(items.length, 'distinct production')}.` };
        }
        const rows = representatives.map((index) => toProductionRow(store.record(index)));
        return { data: { kind: 'productions', rows }, summary: `Found ${count(rows.length, 'distinct production')}.` };
      }
      const indices = selectLocations(mask);
      if (plan.resultShape === 'distinct_list') {
        const items = distinctLocations(store, indices);
        return { data: { kind: 'list', items }, summary: `Found ${count(items.length, 'distinct location')}.` };
      }
      const rows = indices.map((index) => toLocationRow(store.record(index)));
      return { data: { kind: 'locations', rows }, summary: `Found ${count(rows.length, 'location record')}.` };
    }

    case 'count_people': {
      const names = distinctNames(people(operation.role, input.namePredicate), input.namePredicate);
      const n = names.length;
      return {
        data: { kind: 'scalar', value: n },
        summary: `${n} distinct ${pluralize(operation.role, n)} ${verbFor(n, 'appears', 'appear')} in the matching productions.`,
      };
    }

    case 'list_people': {
      const accept = operation.restrictToMatchingNames ? input.namePredicate : undefined;
      const items = distinctNames(people(operation.role, accept), accept);
      return {
        data: { kind: 'list', items },
        summary: `Found ${count(items.length, `distinct ${operation.role}`)}.`,
      };
    }

    case 'rank_people': {
      const accept = operation.restrictToMatchingNames ? input.namePredicate : undefined;
      const entries = rankByProductions(people(operation.role, accept), accept, operation.limit);
      return { data: { kind: 'ranking', entries }, summary: rankingSummary(entries, operation.role) };
    }

    case 'count_by_year': {
      rules.note('numeric_coercion');
      const entries = countByYear(store, representatives);
      const total = entries.reduce((sum, entry) => sum + entry.count, 0);
      return {
        data: { kind: 'counts', entries },
        summary: `${count(total, 'distinct production')} across ${count(entries.length, 'release year')}.`,
      };
    }

    case 'rank_locations': {
      const entries = rankLocations(store, selectLocations(mask), operation.limit);
      return { data: { kind: 'ranking', entries }, summary: rankingSummary(entries, 'location') };
    }

    case 'expand_locations': {
      const expansion = expandProductions(store, representatives);
      const mapping = new Map<string, readonly string[]>();
      let total = 0;
      for (const { production, locations } of expansion) {
        // A missing title labels as "Untitled", which a real title can share.
        if (mapping.has(production.label)) continue;
        mapping.set(production.label, locations);
        total += locations.length;
      }
      return {
        data: { kind: 'mapping', entries: Object.fromEntries(mapping) },
        summary: `Expanded ${count(mapping.size, 'production')} to ${count(total, 'filming location')}.`,
        selfCheck: verifyExpansion(store, expansion, mapping),
      };
    }

    case 'geo_rows': {
      const rows: GeoRow[] = [];
      for (const index of selectLocations(mask)) {
        const row = toGeoRow(store.record(index));
        if (row === null) rules.note('missing_geometry_excluded');
        else rows.push(row);
      }
      return {
        data: { kind: 'geo_rows', rows },
        summary: `Found ${count(rows.length, 'location record')} with coordinates.`,
      };
    }
  }
}

/**
 * Packages one evaluation into a deeply frozen Result Envelope. Empty results
 * are valid envelopes whose summary says nothing matched.
 */
export function assembleResult(input: AssemblyInput): ResultEnvelope {
  const { plan, mask, ctx } = input;
  const representatives = collapseToProductions(ctx.store, mask);
  if (plan.granularity === 'production') ctx.rules.note('production_dedup');

  const assembled = assemblePayload(input, representatives);
  const empty = isEmptyPayload(assembled.data);

  return deepFreeze({
    data: assembled.data,
    summary: empty ? NO_MATCHES_SUMMARY : assembled.summary,
    metadata: {
      evaluationId: input.evaluationId,
      queryType: plan.operation.op,
      granularity: plan.granularity,
      resultShape: plan.resultShape,
      cleaningRules: ctx.rules.list(),
      matchedRecords: countSelected(mask),
      matchedProductions: representatives.length,
      empty,
      ...(assembled.selfCheck === undefined ? {} : { selfCheck: assembled.selfCheck }),
    },
  });
}
