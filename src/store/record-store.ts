import type { LocationRecord, ProductionIdentity, RecordSource } from '../types.js';
import { canonicalizeText, coerceYear } from '../evaluation/canonicalize.js';

type ColumnSet = { readonly [K in keyof LocationRecord]: readonly LocationRecord[K][] };

function buildColumns(records: readonly LocationRecord[]): ColumnSet {
  return {
    id: records.map((r) => r.id),
    title: records.map((r) => r.title),
    year: records.map((r) => r.year),
    locations: records.map((r) => r.locations),
    funFacts: records.map((r) => r.funFacts),
    director: records.map((r) => r.director),
    writer: records.map((r) => r.writer),
    actor1: records.map((r) => r.actor1),
    actor2: records.map((r) => r.actor2),
    actor3: records.map((r) => r.actor3),
    geometry: records.map((r) => r.geometry),
  };
}

/** Key of the canonical title and coerced year, the same values the label is built from. */
export function productionKey(record: LocationRecord): string {
  return JSON.stringify([canonicalizeText(record.title), coerceYear(record.year)]);
}

export function productionIdentity(record: LocationRecord): ProductionIdentity {
  const title = canonicalizeText(record.title);
  const year = coerceYear(record.year);
  const name = title ?? 'Untitled';
  return {
    key: JSON.stringify([title, year]),
    title,
    year,
    label: year === null ? name : `${name} (${year})`,
  };
}

/**
 * Immutable, in-memory dataset. Records are addressed by their position in
 * load order; every selection mask is aligned to that index.
 */
export class RecordStore {
  private readonly rows: readonly LocationRecord[];
  private readonly columns: ColumnSet;
  private readonly keys: readonly string[];
  private readonly byProduction: ReadonlyMap<string, readonly number[]>;

  private constructor(records: readonly LocationRecord[]) {
    this.rows = records;
    this.columns = buildColumns(records);
    this.keys = records.map(productionKey);

    const byProduction = new Map<string, number[]>();
    this.keys.forEach((key, index) => {
      const indices = byProduction.get(key);
      if (indices === undefined) byProduction.set(key, [index]);
      else indices.push(index);
    });
    this.byProduction = byProduction;
  }

  static from(records: Iterable<LocationRecord>): RecordStore {
    const frozen = Array.from(records, (record) =>
      Object.freeze({
        ...record,
        geometry: record.geometry === null ? null : Object.freeze({ ...record.geometry }),
      }),
    );
    return new RecordStore(Object.freeze(frozen));
  }

  get size(): number {
    return this.rows.length;
  }

  get productionCount(): number {
    return this.byProduction.size;
  }

  record(index: number): LocationRecord {
    const record = this.rows[index];
    if (record === undefined) {
      throw new RangeError(`Record index ${index} is outside the store (size ${this.rows.length})`);
    }
    return record;
  }

  records(): readonly LocationRecord[] {
    return this.rows;
  }

  column<K extends keyof LocationRecord>(key: K): ColumnSet[K] {
    return this.columns[key];
  }

  productionKeyAt(index: number): string {
    const key = this.keys[index];
    if (key === undefined) {
      throw new RangeError(`Record index ${index} is outside the store (size ${this.rows.length})`);
    }
    return key;
  }

  /** Every record index of one production, in load order. */
  productionIndices(key: string): readonly number[] {
    return this.byProduction.get(key) ?? [];
  }
}

export async function loadRecordStore(source: RecordSource): Promise<RecordStore> {
  return RecordStore.from(await source.load());
}

export interface DatasetSummary {
  readonly records: number;
  readonly productions: number;
  readonly recordsWithGeometry: number;
  readonly earliestYear: number | null;
  readonly latestYear: number | null;
}

export function describeStore(store: RecordStore): DatasetSummary {
  let recordsWithGeometry = 0;
  let earliestYear: number | null = null;
  let latestYear: number | null = null;
  for (const record of store.records()) {
    if (record.geometry !== null) recordsWithGeometry += 1;
    const year = coerceYear(record.year);
    if (year === null) continue;
    if (earliestYear === null || year < earliestYear) earliestYear = year;
    if (latestYear === null || year > latestYear) latestYear = year;
  }
  return {
    records: store.size,
    productions: store.productionCount,
    recordsWithGeometry,
    earliestYear,
    latestYear,
  };
}
