import pluralize from 'pluralize';
import type { GeoPoint } from '../query/types.js';
import type { ResultEnvelope } from '../types.js';
import { productionIdentity, type RecordStore } from '../store/record-store.js';
import { canonicalizeText } from '../evaluation/canonicalize.js';

export interface MapPoint {
  readonly location: string;
  readonly lng: number;
  readonly lat: number;
  readonly title?: string;
  readonly year?: number;
}

export interface MapAnalysis {
  readonly canMap: boolean;
  readonly reason: string;
  readonly points: readonly MapPoint[];
}

/** Lists are judged on their first few items only. */
export const LIST_PROBE_SIZE = 5;

interface Placed {
  readonly point: GeoPoint;
  readonly title: string | null;
  readonly year: number | null;
}

function toMapPoint(location: string, placed: Placed): MapPoint {
  return {
    location,
    lng: placed.point.lng,
    lat: placed.point.lat,
    ...(placed.title === null ? {} : { title: placed.title }),
    ...(placed.year === null ? {} : { year: placed.year }),
  };
}

/**
 * Finds coordinates for location names, and for (production label, location)
 * pairs, using the first record that has both the name and a geometry.
 */
class LocationIndex {
  private readonly byLocation = new Map<string, Placed>();
  private readonly byProduction = new Map<string, Placed>();
  private readonly byId = new Map<number, Placed & { readonly location: string }>();

  constructor(store: RecordStore) {
    for (const record of store.records()) {
      const location = canonicalizeText(record.locations);
      if (location === null || record.geometry === null) continue;
      const identity = productionIdentity(record);
      const placed: Placed = { point: record.geometry, title: identity.title, year: identity.year };
      if (!this.byLocation.has(location)) this.byLocation.set(location, placed);
      const pairKey = JSON.stringify([identity.label, location]);
      if (!this.byProduction.has(pairKey)) this.byProduction.set(pairKey, placed);
      this.byId.set(record.id, { ...placed, location });
    }
  }

  location(name: string): MapPoint | null {
    const placed = this.byLocation.get(name.trim());
    return placed === undefined ? null : toMapPoint(name.trim(), placed);
  }

  productionLocation(label: string, name: string): MapPoint | null {
    const placed = this.byProduction.get(JSON.stringify([label, name])) ?? this.byLocation.get(name);
    return placed === undefined ? null : toMapPoint(name, placed);
  }

  record(id: number): MapPoint | null {
    const placed = this.byId.get(id);
    return placed === undefined ? null : toMapPoint(placed.location, placed);
  }
}

function found(points: MapPoint[]): MapAnalysis {
  if (points.length === 0) {
    return { canMap: false, reason: 'No location data found in result', points };
  }
  return {
    canMap: true,
    reason: `Found ${points.length} mappable ${pluralize('location', points.length)}`,
    points,
  };
}

function resolved(points: readonly (MapPoint | null)[]): MapPoint[] {
  return points.filter((point): point is MapPoint => point !== null);
}

/**
 * Decides whether an envelope can be drawn on a map and extracts its points.
 * Geo rows carry coordinates; location rows, mappings, lists and rankings are
 * matched against the store's location names.
 */
export function analyzeMappability(store: RecordStore, envelope: ResultEnvelope): MapAnalysis {
  const { data } = envelope;
  const index = new LocationIndex(store);

  switch (data.kind) {
    case 'scalar':
    case 'counts':
      return { canMap: false, reason: `A ${data.kind} result is not mappable`, points: [] };

    case 'productions':
      return { canMap: false, reason: 'Production rows carry no location', points: [] };

    case 'geo_rows':
      return found(
        data.rows.map((row) => ({
          location: row.location ?? 'Unknown',
          lng: row.lng,
          lat: row.lat,
          ...(row.title === null ? {} : { title: row.title }),
          ...(row.year === null ? {} : { year: row.year }),
        })),
      );

    case 'locations':
      return found(resolved(data.rows.map((row) => index.record(row.id))));

    case 'mapping':
      return found(
        resolved(
          Object.entries(data.entries).flatMap(([label, locations]) =>
            locations.map((location) => index.productionLocation(label, location)),
          ),
        ),
      );

    case 'list': {
      const probe = data.items.slice(0, LIST_PROBE_SIZE);
      if (!probe.some((item) => index.location(item) !== null)) {
        return { canMap: false, reason: 'List items are not known locations', points: [] };
      }
      return found(resolved(data.items.map((item) => index.location(item))));
    }

    case 'ranking':
      return found(resolved(data.entries.map((entry) => index.location(entry.name))));
  }
}
