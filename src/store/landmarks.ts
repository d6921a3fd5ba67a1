import { readFileSync } from 'node:fs';
import type { GeoPoint } from '../query/types.js';
import { RecordStoreError } from '../errors.js';
import { looseKey } from '../evaluation/canonicalize.js';

const DEFAULT_LANDMARKS_FILE = new URL('../../data/landmarks.json', import.meta.url);

export interface Landmark {
  readonly name: string;
  readonly point: GeoPoint;
}

/**
 * Named landmarks used as centers of within-distance conditions.
 * Lookups ignore case, spacing and punctuation ("fishermans wharf" finds
 * "Fisherman's Wharf").
 */
export class Gazetteer {
  private readonly byKey: Map<string, Landmark>;

  constructor(landmarks: Iterable<Landmark>) {
    this.byKey = new Map();
    for (const landmark of landmarks) {
      this.byKey.set(looseKey(landmark.name), landmark);
    }
  }

  /** Reads a JSON object of `"Name": [lng, lat]` entries. */
  static fromFile(path: string | URL): Gazetteer {
    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(path, 'utf8'));
    } catch (err) {
      throw new RecordStoreError(`Failed to read landmarks from ${String(path)}: ${String(err)}`, err);
    }
    if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
      throw new RecordStoreError(`Landmarks file ${String(path)} must contain a JSON object`);
    }
    const landmarks: Landmark[] = [];
    for (const [name, position] of Object.entries(parsed)) {
      if (
        !Array.isArray(position) ||
        position.length !== 2 ||
        typeof position[0] !== 'number' ||
        typeof position[1] !== 'number'
      ) {
        throw new RecordStoreError(`Landmark "${name}" must be a [lng, lat] pair`);
      }
      landmarks.push({ name, point: { lng: position[0], lat: position[1] } });
    }
    return new Gazetteer(landmarks);
  }

  resolve(name: string): Landmark | null {
    return this.byKey.get(looseKey(name)) ?? null;
  }

  get size(): number {
    return this.byKey.size;
  }
}

let bundled: Gazetteer | undefined;

/** Landmarks shipped in data/landmarks.json, loaded on first use. */
export function defaultGazetteer(): Gazetteer {
  if (bundled === undefined) {
    bundled = Gazetteer.fromFile(DEFAULT_LANDMARKS_FILE);
  }
  return bundled;
}
