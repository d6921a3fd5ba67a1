import type {
  AttributeFilter,
  AttributeOperator,
  DistanceUnit,
  FilterLeaf,
  GeoPoint,
  Scalar,
  SpatialFilter,
} from '../query/types.js';
import type { TextColumn } from '../types.js';
import { ConfigurationError } from '../errors.js';
import { haversineDistance, regionContains, toMeters } from '../store/geo.js';
import { canonicalizeText, coerceYear, isNullStandIn, stripCityQualifier } from './canonicalize.js';
import { resolveField, type FieldSpec } from './fields.js';
import type { EvaluationContext, Mask } from './context.js';

const NEGATIONS: Partial<Record<AttributeOperator, AttributeOperator>> = {
  ne: 'eq',
  not_contains: 'contains',
  not_in: 'in',
};

const TEXT_OPERATORS = new Set<AttributeOperator>([
  'eq',
  'contains',
  'starts_with',
  'ends_with',
  'surname_starts_with',
  'in',
]);

const NUMERIC_OPERATORS = new Set<AttributeOperator>(['eq', 'gt', 'gte', 'lt', 'lte', 'between', 'in']);

const DISTANCE_UNITS = new Set<DistanceUnit>(['mi', 'km', 'm', 'ft']);

/**
 * A text condition reduced to a test on one canonical, lower-cased value.
 * Negated conditions hold for a record with at least one present value
 * where no present value passes `test`.
 */
export interface TextCondition {
  readonly columns: readonly TextColumn[];
  readonly negated: boolean;
  /** True when the comparand was emptied by qualifier stripping. */
  readonly unconstrained: boolean;
  readonly test: (value: string) => boolean;
}

function positiveOperator(op: AttributeOperator): { op: AttributeOperator; negated: boolean } {
  const positive = NEGATIONS[op];
  return positive === undefined ? { op, negated: false } : { op: positive, negated: true };
}

function isScalarList(value: Scalar | readonly Scalar[]): value is readonly Scalar[] {
  return Array.isArray(value);
}

function asList(value: Scalar | readonly Scalar[]): readonly Scalar[] {
  return isScalarList(value) ? value : [value];
}

function singleScalar(leaf: AttributeFilter): Scalar {
  const { value } = leaf;
  if (isScalarList(value)) {
    if (value.length === 1 && value[0] !== undefined) return value[0];
    throw new ConfigurationError(`Operator "${leaf.op}" takes a single value`, leaf);
  }
  if (typeof value !== 'string' && typeof value !== 'number') {
    throw new ConfigurationError(`Operator "${leaf.op}" takes a text or numeric value`, leaf);
  }
  return value;
}

function lastToken(text: string): string {
  const tokens = text.split(/\s+/);
  return tokens[tokens.length - 1] ?? '';
}

export function compileTextCondition(
  leaf: AttributeFilter,
  columns: readonly TextColumn[],
  ctx: EvaluationContext,
): TextCondition {
  const { op, negated } = positiveOperator(leaf.op);
  if (!TEXT_OPERATORS.has(op)) {
    throw new ConfigurationError(`Operator "${leaf.op}" is not supported on text field "${leaf.field}"`, leaf);
  }

  const prepare = (raw: Scalar): string => {
    const text = String(raw).trim();
    if (!ctx.stripCityQualifier) return text.toLowerCase();
    const stripped = stripCityQualifier(text);
    if (stripped !== text) ctx.rules.note('city_qualifier_stripped');
    return stripped.toLowerCase();
  };

  if (op === 'in') {
    const options = asList(leaf.value).map(prepare);
    if (options.length === 0) {
      throw new ConfigurationError(`Operator "${leaf.op}" needs at least one value`, leaf);
    }
    const unconstrained = options.some((option) => option === '');
    const set = new Set(options);
    return { columns, negated, unconstrained, test: (value) => set.has(value) };
  }

  const comparand = prepare(singleScalar(leaf));
  const unconstrained = comparand === '';
  let test: (value: string) => boolean;
  switch (op) {
    case 'eq':
      test = (value) => value === comparand;
      break;
    case 'contains':
      test = (value) => value.includes(comparand);
      break;
    case 'starts_with':
      test = (value) => value.startsWith(comparand);
      break;
    case 'ends_with':
      test = (value) => value.endsWith(comparand);
      break;
    case 'surname_starts_with':
      test = (value) => lastToken(value).startsWith(comparand);
      break;
    default:
      throw new ConfigurationError(`Operator "${leaf.op}" is not supported on text field "${leaf.field}"`, leaf);
  }
  return { columns, negated, unconstrained, test };
}

/**
 * Test for one individual full name, used when a role's filter is re-applied
 * to the names produced by the person aggregator.
 */
export function nameMatches(condition: TextCondition, name: string): boolean {
  if (condition.unconstrained && !condition.negated) return true;
  const canonical = canonicalizeText(name);
  if (canonical === null) return false;
  if (condition.unconstrained) return true;
  const passed = condition.test(canonical.toLowerCase());
  return condition.negated ? !passed : passed;
}

function textMask(condition: TextCondition, ctx: EvaluationContext): Mask {
  const { store, rules } = ctx;
  if (condition.columns.length > 1) rules.note('actor_slot_union');
  if (condition.unconstrained && !condition.negated) return new Array<boolean>(store.size).fill(true);

  const columns = condition.columns.map((column) => store.column(column));
  const mask: boolean[] = [];
  for (let i = 0; i < store.size; i++) {
    let present = 0;
    let matched = false;
    for (const column of columns) {
      const raw = column[i];
      const value = canonicalizeText(raw);
      if (value === null) {
        if (isNullStandIn(raw)) rules.note('null_canonicalization');
        continue;
      }
      present += 1;
      if (!condition.unconstrained && condition.test(value.toLowerCase())) matched = true;
    }
    // An absent value satisfies neither a condition nor its negation.
    mask.push(condition.negated ? present > 0 && !matched : matched);
  }
  return mask;
}

function toYear(raw: Scalar, leaf: AttributeFilter): number {
  const year = coerceYear(raw);
  if (year === null) {
    throw new ConfigurationError(`Year comparand "${String(raw)}" is not numeric`, leaf);
  }
  return year;
}

function numericMask(leaf: AttributeFilter, ctx: EvaluationContext): Mask {
  const { op, negated } = positiveOperator(leaf.op);
  if (!NUMERIC_OPERATORS.has(op)) {
    throw new ConfigurationError(`Operator "${leaf.op}" is not supported on numeric field "${leaf.field}"`, leaf);
  }

  let test: (year: number) => boolean;
  if (op === 'between') {
    const bounds = asList(leaf.value);
    const [low, high] = bounds;
    if (bounds.length !== 2 || low === undefined || high === undefined) {
      throw new ConfigurationError('Operator "between" takes a [low, high] pair', leaf);
    }
    const lo = toYear(low, leaf);
    const hi = toYear(high, leaf);
    if (lo > hi) {
      throw new ConfigurationError(`Range ${lo}..${hi} is empty`, leaf);
    }
    test = (year) => year >= lo && year <= hi;
  } else if (op === 'in') {
    const options = new Set(asList(leaf.value).map((raw) => toYear(raw, leaf)));
    if (options.size === 0) {
      throw new ConfigurationError(`Operator "${leaf.op}" needs at least one value`, leaf);
    }
    test = (year) => options.has(year);
  } else {
    const comparand = toYear(singleScalar(leaf), leaf);
    switch (op) {
      case 'eq':
        test = (year) => year === comparand;
        break;
      case 'gt':
        test = (year) => year > comparand;
        break;
      case 'gte':
        test = (year) => year >= comparand;
        break;
      case 'lt':
        test = (year) => year < comparand;
        break;
      case 'lte':
        test = (year) => year <= comparand;
        break;
      default:
        throw new ConfigurationError(`Operator "${leaf.op}" is not supported on numeric field "${leaf.field}"`, leaf);
    }
  }

  const { store, rules } = ctx;
  rules.note('numeric_coercion');
  return store.column('year').map((raw) => {
    const year = coerceYear(raw);
    if (year === null) {
      if (raw !== null) rules.note('null_canonicalization');
      return false;
    }
    return negated ? !test(year) : test(year);
  });
}

function resolveCenter(leaf: SpatialFilter, ctx: EvaluationContext): GeoPoint {
  const { center } = leaf.value;
  if (center === undefined) {
    throw new ConfigurationError('within_distance needs a center point or landmark', leaf);
  }
  if (typeof center !== 'string') {
    if (!Number.isFinite(center.lng) || !Number.isFinite(center.lat)) {
      throw new ConfigurationError('Center coordinates must be finite numbers', leaf);
    }
    return center;
  }
  let name = center.trim();
  if (ctx.stripCityQualifier) {
    const stripped = stripCityQualifier(name);
    if (stripped !== name) ctx.rules.note('city_qualifier_stripped');
    name = stripped;
  }
  const landmark = ctx.gazetteer.resolve(name);
  if (landmark === null) {
    throw new ConfigurationError(`Unknown landmark "${center}"`, leaf);
  }
  return landmark.point;
}

function spatialMask(leaf: SpatialFilter, ctx: EvaluationContext): Mask {
  let contains: (point: GeoPoint) => boolean;
  switch (leaf.op) {
    case 'within_distance': {
      const center = resolveCenter(leaf, ctx);
      const { radius } = leaf.value;
      if (radius === undefined) {
        throw new ConfigurationError('within_distance needs a radius', leaf);
      }
      if (!Number.isFinite(radius) || radius <= 0) {
        throw new ConfigurationError(`Radius must be a positive number, got ${radius}`, leaf);
      }
      const unit = leaf.value.unit ?? 'mi';
      if (!DISTANCE_UNITS.has(unit)) {
        throw new ConfigurationError(`Unknown distance unit "${String(unit)}"`, leaf);
      }
      const limit = toMeters(radius, unit);
      contains = (point) => haversineDistance(center, point) <= limit;
      break;
    }
    case 'intersects': {
      const { region } = leaf.value;
      if (region === undefined) {
        throw new ConfigurationError('intersects needs a region or bounding box', leaf);
      }
      contains = (point) => regionContains(region, point);
      break;
    }
    default:
      throw new ConfigurationError(`Unknown spatial operator "${String(leaf.op)}"`, leaf);
  }

  const { store, rules } = ctx;
  return store.column('geometry').map((point) => {
    if (point === null) {
      rules.note('missing_geometry_excluded');
      return false;
    }
    return contains(point);
  });
}

function resolveLeafField(leaf: FilterLeaf, ctx: EvaluationContext): FieldSpec {
  try {
    return resolveField(leaf.field, ctx.actorMatchesAnySlot);
  } catch (err) {
    if (err instanceof ConfigurationError) {
      throw new ConfigurationError(err.message, leaf);
    }
    throw err;
  }
}

/**
 * Evaluates one leaf against the full, unfiltered store. The mask is always
 * built from the original columns and has one entry per stored record.
 */
export function evaluateLeaf(leaf: FilterLeaf, ctx: EvaluationContext): Mask {
  const spec = resolveLeafField(leaf, ctx);

  if (leaf.kind === 'spatial') {
    if (spec.kind !== 'geometry') {
      throw new ConfigurationError(`Spatial operator "${leaf.op}" needs the geometry field`, leaf);
    }
    return spatialMask(leaf, ctx);
  }

  switch (spec.kind) {
    case 'geometry':
      throw new ConfigurationError(`Operator "${leaf.op}" is not supported on the geometry field`, leaf);
    case 'numeric':
      return numericMask(leaf, ctx);
    case 'text':
      return textMask(compileTextCondition(leaf, spec.columns, ctx), ctx);
  }
}
