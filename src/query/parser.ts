import type {
  AttributeOperator,
  BBox,
  DistanceUnit,
  FilterNode,
  GeoPoint,
  Granularity,
  Logic,
  Operation,
  PersonRole,
  Position,
  QueryOptions,
  Region,
  ResultShape,
  Ring,
  Scalar,
  SpatialOperator,
  SpatialValue,
  StructuredQuery,
  TaskDescriptor,
} from './types.js';
import { ConfigurationError, ModificationRejectedError } from '../errors.js';
import { looseKey } from '../evaluation/canonicalize.js';

type Json = Record<string, unknown>;

function lookup<T>(table: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.hasOwn(table, key) ? table[key] : undefined;
}

function isObject(value: unknown): value is Json {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function asString(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

function asBoolean(value: unknown): boolean | null {
  return typeof value === 'boolean' ? value : null;
}

function asFiniteNumber(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

/** First key present on the object, so snake_case and camelCase spellings both work. */
function pick(obj: Json, ...keys: string[]): unknown {
  for (const key of keys) {
    if (obj[key] !== undefined) return obj[key];
  }
  return undefined;
}

function operatorKey(raw: string): string {
  return raw.trim().toLowerCase().replace(/[\s-]+/g, '_');
}

const ATTRIBUTE_OPERATORS: Readonly<Record<string, AttributeOperator>> = {
  '==': 'eq',
  '=': 'eq',
  eq: 'eq',
  equals: 'eq',
  is: 'eq',
  exact: 'eq',
  '!=': 'ne',
  '<>': 'ne',
  ne: 'ne',
  not_equals: 'ne',
  is_not: 'ne',
  contains: 'contains',
  includes: 'contains',
  like: 'contains',
  not_contains: 'not_contains',
  does_not_contain: 'not_contains',
  not_like: 'not_contains',
  starts_with: 'starts_with',
  startswith: 'starts_with',
  begins_with: 'starts_with',
  ends_with: 'ends_with',
  endswith: 'ends_with',
  surname_starts_with: 'surname_starts_with',
  last_name_starts_with: 'surname_starts_with',
  surname_begins_with: 'surname_starts_with',
  in: 'in',
  one_of: 'in',
  any_of: 'in',
  not_in: 'not_in',
  none_of: 'not_in',
  '>': 'gt',
  gt: 'gt',
  greater_than: 'gt',
  after: 'gt',
  '>=': 'gte',
  gte: 'gte',
  at_least: 'gte',
  '<': 'lt',
  lt: 'lt',
  less_than: 'lt',
  before: 'lt',
  '<=': 'lte',
  lte: 'lte',
  at_most: 'lte',
  between: 'between',
  range: 'between',
  in_range: 'between',
};

const SPATIAL_OPERATORS: Readonly<Record<string, SpatialOperator>> = {
  within_distance: 'within_distance',
  within: 'within_distance',
  near: 'within_distance',
  dwithin: 'within_distance',
  within_radius: 'within_distance',
  intersects: 'intersects',
  within_region: 'intersects',
  inside: 'intersects',
  in_polygon: 'intersects',
  within_bbox: 'intersects',
};

const DISTANCE_UNITS: Readonly<Record<string, DistanceUnit>> = {
  mi: 'mi',
  mile: 'mi',
  miles: 'mi',
  km: 'km',
  kilometer: 'km',
  kilometers: 'km',
  kilometre: 'km',
  kilometres: 'km',
  m: 'm',
  meter: 'm',
  meters: 'm',
  metre: 'm',
  metres: 'm',
  ft: 'ft',
  foot: 'ft',
  feet: 'ft',
};

const GEOMETRY_FIELDS = new Set(['geometry', 'geom', 'point', 'coordinates', 'locations', 'location', 'place']);

const OPERATION_NAMES: readonly Operation['op'][] = [
  'count',
  'list',
  'count_people',
  'list_people',
  'rank_people',
  'count_by_year',
  'rank_locations',
  'expand_locations',
  'geo_rows',
];

const RESULT_SHAPES = new Set<ResultShape>(['production_locations', 'distinct_list', 'table', 'geo_rows']);

function parseUnit(raw: unknown, node: unknown): DistanceUnit {
  const text = asString(raw);
  const unit = text === null ? undefined : lookup(DISTANCE_UNITS, text.trim().toLowerCase());
  if (unit === undefined) {
    throw new ConfigurationError(`Unknown distance unit "${String(raw)}"`, node);
  }
  return unit;
}

function parseScalar(raw: unknown, node: unknown): Scalar {
  if (typeof raw === 'string') return raw;
  if (typeof raw === 'number' && Number.isFinite(raw)) return raw;
  throw new ConfigurationError('Comparand must be text or a finite number', node);
}

const RANGE_TEXT = /^\s*(-?\d+(?:\.\d+)?)\s*(?:-|–|to|and|\.\.)\s*(-?\d+(?:\.\d+)?)\s*$/i;

function parseRange(raw: unknown, node: unknown): readonly Scalar[] {
  if (Array.isArray(raw)) {
    if (raw.length !== 2) {
      throw new ConfigurationError('Operator "between" takes exactly two bounds', node);
    }
    return raw.map((bound: unknown) => parseScalar(bound, node));
  }
  if (isObject(raw)) {
    const low = pick(raw, 'min', 'from', 'start', 'low');
    const high = pick(raw, 'max', 'to', 'end', 'high');
    if (low === undefined || high === undefined) {
      throw new ConfigurationError('Range object needs both bounds (min/max, from/to or start/end)', node);
    }
    return [parseScalar(low, node), parseScalar(high, node)];
  }
  const text = asString(raw);
  const match = text === null ? null : RANGE_TEXT.exec(text);
  const low = match?.[1];
  const high = match?.[2];
  if (low === undefined || high === undefined) {
    throw new ConfigurationError(`Cannot read a range from ${JSON.stringify(raw)}`, node);
  }
  return [Number(low), Number(high)];
}

function parseAttributeValue(op: AttributeOperator, raw: unknown, node: unknown): Scalar | readonly Scalar[] {
  if (op === 'between') return parseRange(raw, node);
  if (Array.isArray(raw)) return raw.map((item: unknown) => parseScalar(item, node));
  return parseScalar(raw, node);
}

function parsePosition(raw: unknown, node: unknown): Position {
  if (!Array.isArray(raw) || raw.length < 2) {
    throw new ConfigurationError('Positions are [longitude, latitude] pairs', node);
  }
  const lng = asFiniteNumber(raw[0]);
  const lat = asFiniteNumber(raw[1]);
  if (lng === null || lat === null) {
    throw new ConfigurationError('Positions are [longitude, latitude] pairs', node);
  }
  return [lng, lat];
}

function parseRing(raw: unknown, node: unknown): Ring {
  if (!Array.isArray(raw) || raw.length < 4) {
    throw new ConfigurationError('Polygon rings need at least four positions', node);
  }
  return raw.map((position: unknown) => parsePosition(position, node));
}

function parsePolygon(raw: unknown, node: unknown): readonly Ring[] {
  if (!Array.isArray(raw) || raw.length === 0) {
    throw new ConfigurationError('Polygon coordinates must be a non-empty list of rings', node);
  }
  return raw.map((ring: unknown) => parseRing(ring, node));
}

function parseRegion(raw: unknown, node: unknown): Region | BBox {
  if (Array.isArray(raw) && raw.length === 4 && raw.every((n) => asFiniteNumber(n) !== null)) {
    const [minLng, minLat, maxLng, maxLat] = raw.map(Number);
    if (minLng === undefined || minLat === undefined || maxLng === undefined || maxLat === undefined) {
      throw new ConfigurationError('Bounding boxes are [minLng, minLat, maxLng, maxLat]', node);
    }
    return [minLng, minLat, maxLng, maxLat];
  }
  if (isObject(raw)) {
    if (raw['type'] === 'Feature') return parseRegion(raw['geometry'], node);
    if (raw['type'] === 'Polygon') {
      return { type: 'Polygon', coordinates: parsePolygon(raw['coordinates'], node) };
    }
    if (raw['type'] === 'MultiPolygon') {
      const polygons = raw['coordinates'];
      if (!Array.isArray(polygons) || polygons.length === 0) {
        throw new ConfigurationError('MultiPolygon coordinates must be a non-empty list of polygons', node);
      }
      return { type: 'MultiPolygon', coordinates: polygons.map((polygon: unknown) => parsePolygon(polygon, node)) };
    }
  }
  throw new ConfigurationError('Region must be a GeoJSON Polygon, MultiPolygon or a bounding box', node);
}

function parseCenter(raw: unknown, node: unknown): GeoPoint | string {
  if (typeof raw === 'string') {
    if (raw.trim() === '') throw new ConfigurationError('Center landmark name is empty', node);
    return raw;
  }
  if (Array.isArray(raw)) {
    const [lng, lat] = parsePosition(raw, node);
    return { lng, lat };
  }
  if (isObject(raw)) {
    if (raw['type'] === 'Point') {
      const [lng, lat] = parsePosition(raw['coordinates'], node);
      return { lng, lat };
    }
    const lng = asFiniteNumber(pick(raw, 'lng', 'lon', 'longitude', 'x'));
    const lat = asFiniteNumber(pick(raw, 'lat', 'latitude', 'y'));
    if (lng !== null && lat !== null) return { lng, lat };
  }
  throw new ConfigurationError('Center must be a landmark name, [lng, lat] or {lng, lat}', node);
}

const DISTANCE_TEXT = /^\s*(\d+(?:\.\d+)?)\s*([a-z]+)?\s*$/i;

function parseRadius(raw: unknown, node: unknown): { radius: number; unit?: DistanceUnit } {
  const value = asFiniteNumber(raw);
  if (value !== null) return { radius: value };
  const match = typeof raw === 'string' ? DISTANCE_TEXT.exec(raw) : null;
  const amount = match?.[1];
  if (amount === undefined) {
    throw new ConfigurationError(`Cannot read a distance from ${JSON.stringify(raw)}`, node);
  }
  const unitText = match?.[2];
  return unitText === undefined ? { radius: Number(amount) } : { radius: Number(amount), unit: parseUnit(unitText, node) };
}

function parseSpatialValue(op: SpatialOperator, leaf: Json): SpatialValue {
  const raw = leaf['value'];
  // Parameters may sit inside `value` or directly on the leaf.
  const params: Json = isObject(raw) && raw['type'] === undefined ? { ...leaf, ...raw } : leaf;

  if (op === 'intersects') {
    const inline = (isObject(raw) && raw['type'] !== undefined) || Array.isArray(raw);
    const region = inline ? raw : pick(params, 'region', 'polygon', 'bbox', 'geometry');
    if (region === undefined) {
      throw new ConfigurationError('intersects needs a region or bounding box', leaf);
    }
    return { region: parseRegion(region, leaf) };
  }

  const centerRaw = typeof raw === 'string' ? raw : pick(params, 'center', 'point', 'landmark', 'location', 'reference');
  const radiusRaw = pick(params, 'radius', 'distance');
  const unitRaw = pick(params, 'unit', 'units');

  const parsedRadius = radiusRaw === undefined ? undefined : parseRadius(radiusRaw, leaf);
  const unit = unitRaw === undefined ? parsedRadius?.unit : parseUnit(unitRaw, leaf);
  return {
    ...(centerRaw === undefined ? {} : { center: parseCenter(centerRaw, leaf) }),
    ...(parsedRadius === undefined ? {} : { radius: parsedRadius.radius }),
    ...(unit === undefined ? {} : { unit }),
  };
}

function parseLeaf(leaf: Json): FilterNode {
  const conditionRaw = asString(pick(leaf, 'condition', 'op', 'operator'));
  if (conditionRaw === null) {
    throw new ConfigurationError('Filter condition is missing its operator', leaf);
  }
  const key = operatorKey(conditionRaw);
  const typeRaw = asString(leaf['type'])?.trim().toLowerCase();
  const field = asString(leaf['field']);

  const spatialOp = lookup(SPATIAL_OPERATORS, key);
  if (spatialOp !== undefined) {
    const target = field === null || GEOMETRY_FIELDS.has(looseKey(field)) ? 'geometry' : field;
    return { kind: 'spatial', field: target, op: spatialOp, value: parseSpatialValue(spatialOp, leaf) };
  }
  if (typeRaw === 'spatial') {
    throw new ConfigurationError(`Unknown spatial operator "${conditionRaw}"`, leaf);
  }

  const op = lookup(ATTRIBUTE_OPERATORS, key);
  if (op === undefined) {
    throw new ConfigurationError(`Unknown operator "${conditionRaw}"`, leaf);
  }
  if (field === null || field.trim() === '') {
    throw new ConfigurationError('Filter condition is missing its field', leaf);
  }
  if (leaf['value'] === undefined) {
    throw new ConfigurationError('Filter condition is missing its value', leaf);
  }
  return { kind: 'attr', field, op, value: parseAttributeValue(op, leaf['value'], leaf) };
}

function parseLogic(raw: unknown, node: unknown, fallback: Logic): Logic {
  if (raw === undefined || raw === null) return fallback;
  const text = asString(raw)?.trim().toLowerCase();
  if (text === 'and' || text === 'or') return text;
  throw new ConfigurationError(`Logic must be AND or OR, got ${JSON.stringify(raw)}`, node);
}

export function parseFilterNode(raw: unknown): FilterNode {
  if (!isObject(raw)) {
    throw new ConfigurationError('Filter nodes must be objects', raw);
  }
  const children = pick(raw, 'conditions', 'filters');
  if (children !== undefined || raw['logic'] !== undefined) {
    if (!Array.isArray(children)) {
      throw new ConfigurationError('Composite filter needs a "conditions" list', raw);
    }
    const kind = parseLogic(raw['logic'], raw, 'and');
    return { kind, filters: children.map(parseFilterNode) };
  }
  return parseLeaf(raw);
}

function parseRole(raw: unknown, node: unknown): PersonRole {
  if (raw === 'actor' || raw === 'director' || raw === 'writer') return raw;
  throw new ConfigurationError(`Role must be actor, director or writer, got ${JSON.stringify(raw)}`, node);
}

function parseUnitOption(raw: unknown, node: unknown): Granularity {
  if (raw === undefined || raw === 'production') return 'production';
  if (raw === 'location') return 'location';
  throw new ConfigurationError(`Unit must be production or location, got ${JSON.stringify(raw)}`, node);
}

function parseLimit(raw: unknown, node: unknown): number | null {
  if (raw === undefined || raw === null) return null;
  const limit = asFiniteNumber(raw);
  if (limit === null || !Number.isInteger(limit) || limit < 1) {
    throw new ConfigurationError(`Limit must be a positive integer, got ${JSON.stringify(raw)}`, node);
  }
  return limit;
}

function isOperationName(value: unknown): value is Operation['op'] {
  return typeof value === 'string' && OPERATION_NAMES.some((name) => name === value);
}

export function parseOperation(raw: Json): Operation {
  const op = raw['op'];
  if (!isOperationName(op)) {
    throw new ConfigurationError(`Unknown operation ${JSON.stringify(op)}`, raw);
  }
  const restrictToMatchingNames = asBoolean(pick(raw, 'restrictToMatchingNames', 'restrict_to_matching_names')) ?? true;
  switch (op) {
    case 'count':
      return { op, unit: parseUnitOption(raw['unit'], raw) };
    case 'list':
      return { op, unit: parseUnitOption(raw['unit'], raw) };
    case 'count_people':
      return { op, role: parseRole(raw['role'], raw) };
    case 'list_people':
      return { op, role: parseRole(raw['role'], raw), restrictToMatchingNames };
    case 'rank_people':
      return { op, role: parseRole(raw['role'], raw), limit: parseLimit(raw['limit'], raw), restrictToMatchingNames };
    case 'rank_locations':
      return { op, limit: parseLimit(raw['limit'], raw) };
    case 'count_by_year':
      return { op };
    case 'expand_locations':
      return { op };
    case 'geo_rows':
      return { op };
  }
}

function parseTask(raw: unknown): TaskDescriptor | null {
  if (typeof raw === 'string') return raw.trim() === '' ? null : raw.trim();
  if (isObject(raw)) return parseOperation(raw);
  throw new ConfigurationError('Tasks must be strings or operation objects', raw);
}

function parseOptions(obj: Json): QueryOptions {
  const granularityRaw = pick(obj, 'granularity');
  const productionLevel = asBoolean(pick(obj, 'production_level', 'productionLevel'));
  const granularity =
    granularityRaw !== undefined
      ? parseUnitOption(granularityRaw, obj)
      : productionLevel === null
        ? undefined
        : productionLevel
          ? 'production'
          : 'location';

  const shapeRaw = pick(obj, 'result_shape', 'resultShape');
  let resultShape: ResultShape | undefined;
  if (shapeRaw !== undefined && shapeRaw !== null) {
    const shape = [...RESULT_SHAPES].find((candidate) => candidate === shapeRaw);
    if (shape === undefined) {
      throw new ConfigurationError(`Unknown result shape ${JSON.stringify(shapeRaw)}`, obj);
    }
    resultShape = shape;
  }

  const expandLocations = asBoolean(pick(obj, 'expand_locations', 'expandLocations'));
  const actorMatchesAnySlot = asBoolean(pick(obj, 'actor_any_slot', 'actorAnySlot', 'actorMatchesAnySlot'));
  const stripCityQualifier = asBoolean(pick(obj, 'strip_city_qualifier', 'stripCityQualifier'));

  return {
    ...(granularity === undefined ? {} : { granularity }),
    ...(expandLocations === null ? {} : { expandLocations }),
    ...(actorMatchesAnySlot === null ? {} : { actorMatchesAnySlot }),
    ...(stripCityQualifier === null ? {} : { stripCityQualifier }),
    ...(resultShape === undefined ? {} : { resultShape }),
  };
}

/**
 * Validates the JSON produced by the translation service. A refusal object
 * (`{ "error": true, ... }`) raises ModificationRejectedError and is never
 * evaluated; anything malformed raises ConfigurationError.
 */
export function parseStructuredQuery(input: unknown): StructuredQuery {
  if (!isObject(input)) {
    throw new ConfigurationError('Structured query must be a JSON object', input);
  }
  if (input['error'] === true) {
    throw new ModificationRejectedError(
      asString(input['message']) ?? 'The request was rejected.',
      asString(pick(input, 'requested_operation', 'requestedOperation')),
    );
  }

  const tasksRaw = input['tasks'] ?? [];
  if (!Array.isArray(tasksRaw)) {
    throw new ConfigurationError('"tasks" must be a list', input);
  }
  const tasks = tasksRaw.map(parseTask).filter((task): task is TaskDescriptor => task !== null);

  const filtersRaw = input['filters'] ?? [];
  if (!Array.isArray(filtersRaw)) {
    throw new ConfigurationError('"filters" must be a list', input);
  }
  const filters = filtersRaw.map(parseFilterNode);
  const filterLogic = parseLogic(pick(input, 'filter_logic', 'filterLogic'), input, 'and');

  const nested = input['options'];
  const options = parseOptions(isObject(nested) ? { ...input, ...nested } : input);

  return { tasks, filters, filterLogic, options };
}
