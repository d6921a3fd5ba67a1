import type { FilterLeaf, FilterNode, Logic, Scalar, SpatialValue } from './types.js';
import { isBBox } from '../store/geo.js';

const OPERATOR_SYMBOLS: Readonly<Record<string, string>> = {
  eq: '=',
  ne: '!=',
  contains: 'CONTAINS',
  not_contains: 'NOT CONTAINS',
  starts_with: 'STARTS WITH',
  ends_with: 'ENDS WITH',
  surname_starts_with: 'SURNAME STARTS WITH',
  in: 'IN',
  not_in: 'NOT IN',
  gt: '>',
  gte: '>=',
  lt: '<',
  lte: '<=',
  between: 'BETWEEN',
  within_distance: 'WITHIN',
  intersects: 'INTERSECTS',
};

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (value !== null && typeof value === 'object') {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = sortKeys(Reflect.get(value, key));
    }
    return sorted;
  }
  return value;
}

function canonicalNode(node: FilterNode): unknown {
  if (node.kind === 'attr' || node.kind === 'spatial') {
    return { kind: node.kind, field: node.field, op: node.op, value: sortKeys(node.value) };
  }
  return { kind: node.kind, filters: node.filters.map(canonicalNode) };
}

/**
 * Produces a stable canonical string for a filter node. Object keys are
 * sorted, child order is kept. Identical sub-trees share a key, which is
 * what the filter tree evaluator memoizes on.
 */
export function compileCanonicalKey(node: FilterNode): string {
  return JSON.stringify(canonicalNode(node));
}

function quote(value: Scalar): string {
  return typeof value === 'number' ? String(value) : `'${value.replace(/'/g, "''")}'`;
}

function spatialOperand(value: SpatialValue): string {
  if (value.region !== undefined) {
    return isBBox(value.region) ? `BBOX(${value.region.join(', ')})` : value.region.type.toUpperCase();
  }
  const center =
    value.center === undefined
      ? '?'
      : typeof value.center === 'string'
        ? quote(value.center)
        : `POINT(${value.center.lng} ${value.center.lat})`;
  return `${value.radius ?? '?'} ${value.unit ?? 'mi'} OF ${center}`;
}

function compileLeaf(leaf: FilterLeaf): string {
  const symbol = OPERATOR_SYMBOLS[leaf.op] ?? leaf.op.toUpperCase();
  if (leaf.kind === 'spatial') {
    return `${leaf.field} ${symbol} ${spatialOperand(leaf.value)}`;
  }
  const { value } = leaf;
  if (typeof value === 'string' || typeof value === 'number') {
    return `${leaf.field} ${symbol} ${quote(value)}`;
  }
  if (leaf.op === 'between' && value.length === 2) {
    return `${leaf.field} BETWEEN ${value.map(quote).join(' AND ')}`;
  }
  return `${leaf.field} ${symbol} (${value.map(quote).join(', ')})`;
}

/** Readable one-line form of a filter node, used in diagnostics. */
export function compileFilterExpression(node: FilterNode): string {
  if (node.kind === 'attr' || node.kind === 'spatial') {
    return compileLeaf(node);
  }
  const parts = node.filters.map(compileFilterExpression);
  return `(${parts.join(node.kind === 'and' ? ' AND ' : ' OR ')})`;
}

/** Readable form of the top-level filter list combined with its logic. */
export function compileFilterList(filters: readonly FilterNode[], logic: Logic): string {
  if (filters.length === 0) return 'TRUE';
  const [only] = filters;
  if (filters.length === 1 && only !== undefined) return compileFilterExpression(only);
  return compileFilterExpression({ kind: logic, filters });
}
