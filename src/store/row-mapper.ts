import type { GeoPoint } from '../query/types.js';
import type { LocationRecord, RawText } from '../types.js';

export interface LocationRow {
  id: number | string;              // pg returns BIGINT as string
  title: string | null;
  release_year: number | string | null;
  locations: string | null;
  fun_facts: string | null;
  director: string | null;
  writer: string | null;
  actor_1: string | null;
  actor_2: string | null;
  actor_3: string | null;
  longitude: number | string | null; // NUMERIC columns arrive as strings
  latitude: number | string | null;
}

function toCoordinate(value: number | string | null | undefined): number | null {
  if (value === null || value === undefined || value === '') return null;
  const parsed = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

function toPoint(lng: number | null, lat: number | null): GeoPoint | null {
  if (lng === null || lat === null) return null;
  return { lng, lat };
}

export function mapRow(row: LocationRow): LocationRecord {
  return {
    id: Number(row.id),
    title: row.title,
    year: row.release_year,
    locations: row.locations,
    funFacts: row.fun_facts,
    director: row.director,
    writer: row.writer,
    actor1: row.actor_1,
    actor2: row.actor_2,
    actor3: row.actor_3,
    geometry: toPoint(toCoordinate(row.longitude), toCoordinate(row.latitude)),
  };
}

// Dataset column names, compared after dropping case, spaces and underscores.
const PROPERTY_KEYS = {
  id: ['id'],
  title: ['title'],
  year: ['year', 'releaseyear'],
  locations: ['locations', 'location'],
  funFacts: ['funfacts'],
  director: ['director'],
  writer: ['writer'],
  actor1: ['actor1'],
  actor2: ['actor2'],
  actor3: ['actor3'],
} as const;

type PropertyKey = keyof typeof PROPERTY_KEYS;

function normalizeKey(key: string): string {
  return key.toLowerCase().replace(/[\s_]+/g, '');
}

function propertyLookup(properties: Readonly<Record<string, unknown>>): (key: PropertyKey) => unknown {
  const byKey = new Map<string, unknown>();
  for (const [key, value] of Object.entries(properties)) {
    byKey.set(normalizeKey(key), value);
  }
  return (key) => {
    for (const candidate of PROPERTY_KEYS[key]) {
      if (byKey.has(candidate)) return byKey.get(candidate);
    }
    return undefined;
  };
}

// Text columns are stored as loaded; non-string scalars become their string form.
function toRawText(value: unknown): RawText {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return null;
}

function toRawYear(value: unknown): string | number | null {
  if (typeof value === 'string' || typeof value === 'number') return value;
  return null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/** Point geometry of a GeoJSON feature; anything else is absent. */
export function mapGeometry(geometry: unknown): GeoPoint | null {
  if (!isRecord(geometry) || geometry['type'] !== 'Point') return null;
  const coordinates = geometry['coordinates'];
  if (!Array.isArray(coordinates) || coordinates.length < 2) return null;
  const lng: unknown = coordinates[0];
  const lat: unknown = coordinates[1];
  if (typeof lng !== 'number' || typeof lat !== 'number') return null;
  if (!Number.isFinite(lng) || !Number.isFinite(lat)) return null;
  return { lng, lat };
}

/**
 * Maps one GeoJSON feature. Property names follow the dataset columns
 * ("Title", "Year", "Fun_Facts", "Actor_1"...), matched case-insensitively.
 * Features without a numeric id take `fallbackId`.
 */
export function mapFeature(feature: unknown, fallbackId: number): LocationRecord {
  const body = isRecord(feature) ? feature : {};
  const properties = isRecord(body['properties']) ? body['properties'] : {};
  const read = propertyLookup(properties);

  const rawId = read('id') ?? body['id'];
  const id = typeof rawId === 'number' && Number.isFinite(rawId) ? rawId : fallbackId;

  return {
    id,
    title: toRawText(read('title')),
    year: toRawYear(read('year')),
    locations: toRawText(read('locations')),
    funFacts: toRawText(read('funFacts')),
    director: toRawText(read('director')),
    writer: toRawText(read('writer')),
    actor1: toRawText(read('actor1')),
    actor2: toRawText(read('actor2')),
    actor3: toRawText(read('actor3')),
    geometry: mapGeometry(body['geometry']),
  };
}
