import { describe, it, expect } from 'vitest';
import { collapseToProductions, selectLocations } from '../../src/evaluation/granularity.js';
import { fullMask } from '../../src/evaluation/context.js';
import { fixtureStore } from './helpers.js';

const store = fixtureStore();

describe('selectLocations', () => {
  it('returns every selected index in store order', () => {
    expect(selectLocations([false, true, true, false, true])).toEqual([1, 2, 4]);
  });

  it('returns nothing for an empty selection', () => {
    expect(selectLocations(new Array(14).fill(false))).toEqual([]);
  });
});

describe('collapseToProductions', () => {
  it('keeps the first record of each production', () => {
    expect(collapseToProductions(store, fullMask(store))).toEqual([0, 4, 6, 8, 11, 12]);
  });

  it('keeps the first selected record, not the first stored one', () => {
    const mask = fullMask(store).map((_, index) => index === 2 || index === 3 || index === 13);
    expect(collapseToProductions(store, mask)).toEqual([2, 13]);
  });
});
