import { readFile } from 'node:fs/promises';
import type { LocationRecord, RecordSource } from '../types.js';
import { RecordStoreError } from '../errors.js';
import { mapFeature } from './row-mapper.js';

/** Loads records from a GeoJSON FeatureCollection file, one feature per location. */
export class GeoJsonRecordSource implements RecordSource {
  constructor(private readonly path: string | URL) {}

  async load(): Promise<LocationRecord[]> {
    let text: string;
    try {
      text = await readFile(this.path, 'utf8');
    } catch (err) {
      throw new RecordStoreError(`Failed to read dataset ${String(this.path)}: ${String(err)}`, err);
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (err) {
      throw new RecordStoreError(`Dataset ${String(this.path)} is not valid JSON`, err);
    }
    return parseFeatureCollection(parsed, String(this.path));
  }
}

export function parseFeatureCollection(value: unknown, origin = 'input'): LocationRecord[] {
  if (
    value === null ||
    typeof value !== 'object' ||
    !('type' in value) ||
    value.type !== 'FeatureCollection' ||
    !('features' in value) ||
    !Array.isArray(value.features)
  ) {
    throw new RecordStoreError(`Dataset ${origin} is not a GeoJSON FeatureCollection`);
  }
  const features: unknown[] = value.features;
  return features.map((feature, index) => mapFeature(feature, index + 1));
}
