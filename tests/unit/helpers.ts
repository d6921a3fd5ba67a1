import { readFileSync } from 'node:fs';
import type { LocationRecord } from '../../src/types.js';
import { RecordStore } from '../../src/store/record-store.js';
import { parseFeatureCollection } from '../../src/store/geojson-source.js';
import { Gazetteer } from '../../src/store/landmarks.js';
import { CleaningRuleLog, type EvaluationContext } from '../../src/evaluation/context.js';

export const FIXTURE_PATH = new URL('../fixtures/film-locations.geojson', import.meta.url);

export function fixtureRecords(): LocationRecord[] {
  return parseFeatureCollection(JSON.parse(readFileSync(FIXTURE_PATH, 'utf8')), 'fixture');
}

export function fixtureStore(): RecordStore {
  return RecordStore.from(fixtureRecords());
}

export function makeRecord(overrides: Partial<LocationRecord> = {}): LocationRecord {
  return {
    id: 1,
    title: 'Test Film',
    year: 2000,
    locations: 'Test Street',
    funFacts: null,
    director: 'Dana Test',
    writer: 'Wren Test',
    actor1: 'Ada One',
    actor2: 'Ben Two',
    actor3: 'Cy Three',
    geometry: { lng: -122.4, lat: 37.78 },
    ...overrides,
  };
}

export const testGazetteer = new Gazetteer([
  { name: 'Union Square', point: { lng: -122.4074, lat: 37.7881 } },
  { name: "Fisherman's Wharf", point: { lng: -122.4178, lat: 37.808 } },
]);

export function makeContext(
  store: RecordStore,
  overrides: Partial<Omit<EvaluationContext, 'store' | 'rules'>> = {},
): EvaluationContext {
  return {
    store,
    gazetteer: testGazetteer,
    actorMatchesAnySlot: true,
    stripCityQualifier: false,
    rules: new CleaningRuleLog(),
    ...overrides,
  };
}

/** Store ids of the selected records, in store order. */
export function selectedIds(store: RecordStore, mask: readonly boolean[]): number[] {
  return mask.flatMap((selected, index) => (selected ? [store.record(index).id] : []));
}
