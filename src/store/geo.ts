/**
 * Distance and containment helpers for spatial filter conditions.
 * Coordinates are WGS84 degrees, positions in GeoJSON [lng, lat] order.
 */

import type { BBox, DistanceUnit, GeoPoint, Region, Ring } from '../query/types.js';

export const EARTH_RADIUS_METERS = 6371008.8;

export const METERS_PER_UNIT: Readonly<Record<DistanceUnit, number>> = {
  mi: 1609.344,
  km: 1000,
  m: 1,
  ft: 0.3048,
};

/** Great-circle distance in meters (haversine formula). */
export function haversineDistance(a: GeoPoint, b: GeoPoint): number {
  const toRadians = (deg: number) => deg * (Math.PI / 180);

  const dLat = toRadians(b.lat - a.lat);
  const dLng = toRadians(b.lng - a.lng);
  const lat1 = toRadians(a.lat);
  const lat2 = toRadians(b.lat);

  const h =
    Math.sin(dLat / 2) * Math.sin(dLat / 2) +
    Math.cos(lat1) * Math.cos(lat2) * Math.sin(dLng / 2) * Math.sin(dLng / 2);

  return EARTH_RADIUS_METERS * 2 * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h));
}

export function toMeters(distance: number, unit: DistanceUnit): number {
  return distance * METERS_PER_UNIT[unit];
}

export function isBBox(region: Region | BBox): region is BBox {
  return Array.isArray(region);
}

// Even-odd ray casting; points exactly on an edge may fall either way.
function ringContains(ring: Ring, point: GeoPoint): boolean {
  let inside = false;
  for (let i = 0, j = ring.length - 1; i < ring.length; j = i++) {
    const a = ring[i];
    const b = ring[j];
    if (a === undefined || b === undefined) continue;
    const [xi, yi] = a;
    const [xj, yj] = b;
    const crosses = yi > point.lat !== yj > point.lat;
    if (crosses && point.lng < ((xj - xi) * (point.lat - yi)) / (yj - yi) + xi) {
      inside = !inside;
    }
  }
  return inside;
}

function polygonContains(rings: readonly Ring[], point: GeoPoint): boolean {
  const [outer, ...holes] = rings;
  if (outer === undefined || !ringContains(outer, point)) return false;
  return !holes.some((hole) => ringContains(hole, point));
}

export function regionContains(region: Region | BBox, point: GeoPoint): boolean {
  if (isBBox(region)) {
    const [minLng, minLat, maxLng, maxLat] = region;
    return point.lng >= minLng && point.lng <= maxLng && point.lat >= minLat && point.lat <= maxLat;
  }
  if (region.type === 'Polygon') return polygonContains(region.coordinates, point);
  return region.coordinates.some((polygon) => polygonContains(polygon, point));
}
