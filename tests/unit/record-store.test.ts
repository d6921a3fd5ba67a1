import { describe, it, expect } from 'vitest';
import {
  RecordStore,
  describeStore,
  loadRecordStore,
  productionIdentity,
  productionKey,
} from '../../src/store/record-store.js';
import type { LocationRecord, RecordSource } from '../../src/types.js';
import { fixtureStore, makeRecord } from './helpers.js';

describe('productionKey', () => {
  it('keys on the canonical title and coerced year', () => {
    expect(productionKey(makeRecord({ title: ' Harbor Lights ', year: '1946' }))).toBe('["Harbor Lights",1946]');
  });

  it('treats a numeric year and its text form as one production', () => {
    const a = productionKey(makeRecord({ year: 1946 }));
    const b = productionKey(makeRecord({ year: '1946' }));
    expect(a).toBe(b);
  });

  it('keys titles that differ only by surrounding whitespace alike', () => {
    const a = productionKey(makeRecord({ title: 'Fog Over Market', year: 1958 }));
    const b = productionKey(makeRecord({ title: 'Fog Over Market ', year: 1958 }));
    expect(a).toBe(b);
  });

  it('keys a missing title and a non-numeric year as null', () => {
    expect(productionKey(makeRecord({ title: 'nan', year: 'unknown' }))).toBe('[null,null]');
  });
});

describe('productionIdentity', () => {
  it('labels a production as "Title (Year)"', () => {
    expect(productionIdentity(makeRecord({ title: ' Harbor Lights ', year: '1946' }))).toEqual({
      key: '["Harbor Lights",1946]',
      title: 'Harbor Lights',
      year: 1946,
      label: 'Harbor Lights (1946)',
    });
  });

  it('drops the year from the label when it is not numeric', () => {
    expect(productionIdentity(makeRecord({ title: 'Quiet Bay', year: 'unknown' })).label).toBe('Quiet Bay');
  });

  it('labels a missing title as Untitled', () => {
    const identity = productionIdentity(makeRecord({ title: 'nan', year: 1950 }));
    expect(identity.title).toBeNull();
    expect(identity.label).toBe('Untitled (1950)');
  });
});

describe('RecordStore', () => {
  it('keeps records in load order', () => {
    const store = fixtureStore();
    expect(store.size).toBe(14);
    expect(store.record(0).id).toBe(1);
    expect(store.record(13).id).toBe(14);
    expect(store.column('id')).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14]);
  });

  it('groups records by production', () => {
    const store = fixtureStore();
    expect(store.productionCount).toBe(6);
    expect(store.productionIndices('["Fog Over Market",1958]')).toEqual([0, 1, 2, 3]);
    expect(store.productionIndices('["Quiet Bay",null]')).toEqual([11]);
    expect(store.productionIndices('["Nowhere",1]')).toEqual([]);
    expect(store.productionKeyAt(12)).toBe('["Signal Hill",1944]');
  });

  it('exposes aligned columns', () => {
    const store = fixtureStore();
    expect(store.column('director').slice(0, 2)).toEqual(['Alma Reyes', 'Alma Reyes']);
    expect(store.column('geometry')[3]).toBeNull();
  });

  it('throws RangeError for indices outside the store', () => {
    const store = RecordStore.from([makeRecord()]);
    expect(() => store.record(1)).toThrow(RangeError);
    expect(() => store.productionKeyAt(-1)).toThrow(RangeError);
  });

  it('freezes records and their geometry', () => {
    const source = makeRecord();
    const store = RecordStore.from([source]);
    const stored = store.record(0);
    expect(Object.isFrozen(stored)).toBe(true);
    expect(Object.isFrozen(stored.geometry)).toBe(true);
    expect(Object.isFrozen(store.records())).toBe(true);
    expect(stored).not.toBe(source);
    expect(stored).toEqual(source);
  });
});

describe('loadRecordStore', () => {
  it('builds a store from a record source', async () => {
    const records: LocationRecord[] = [makeRecord({ id: 1 }), makeRecord({ id: 2, locations: 'Other Street' })];
    const source: RecordSource = { load: async () => records };

    const store = await loadRecordStore(source);

    expect(store.size).toBe(2);
    expect(store.productionCount).toBe(1);
  });

  it('propagates source failures', async () => {
    const source: RecordSource = {
      load: async () => {
        throw new Error('unavailable');
      },
    };
    await expect(loadRecordStore(source)).rejects.toThrow('unavailable');
  });
});

describe('describeStore', () => {
  it('summarizes the fixture dataset', () => {
    expect(describeStore(fixtureStore())).toEqual({
      records: 14,
      productions: 6,
      recordsWithGeometry: 12,
      earliestYear: 1944,
      latestYear: 2003,
    });
  });

  it('reports null years for an empty store', () => {
    expect(describeStore(RecordStore.from([]))).toEqual({
      records: 0,
      productions: 0,
      recordsWithGeometry: 0,
      earliestYear: null,
      latestYear: null,
    });
  });
});
