import type { FilterNode, Logic, PersonRole } from '../query/types.js';
import type { ProductionIdentity, RankingEntry, TextColumn } from '../types.js';
import type { RecordStore } from '../store/record-store.js';
import { productionIdentity } from '../store/record-store.js';
import { canonicalizeText, isNullStandIn } from './canonicalize.js';
import { ACTOR_SLOTS, isActorField, resolveField } from './fields.js';
import { compileTextCondition, nameMatches } from './predicate.js';
import type { EvaluationContext } from './context.js';

/** One person credited on one production. */
export interface Credit {
  readonly production: ProductionIdentity;
  readonly name: string;
}

export type NamePredicate = (name: string) => boolean;

export function roleColumns(role: PersonRole): readonly TextColumn[] {
  return role === 'actor' ? ACTOR_SLOTS : [role];
}

/**
 * Long-form (production, name) pairs for the given production-level records.
 * Absent values are dropped, names trimmed, and each person appears at most
 * once per production whichever slots they fill.
 */
export function collectCredits(
  store: RecordStore,
  productionIndices: readonly number[],
  role: PersonRole,
  ctx: Pick<EvaluationContext, 'rules'>,
): Credit[] {
  const columns = roleColumns(role).map((column) => store.column(column));
  if (columns.length > 1) ctx.rules.note('actor_slot_union');

  const seen = new Set<string>();
  const credits: Credit[] = [];
  for (const index of productionIndices) {
    const production = productionIdentity(store.record(index));
    for (const column of columns) {
      const raw = column[index];
      const name = canonicalizeText(raw);
      if (name === null) {
        if (isNullStandIn(raw)) ctx.rules.note('null_canonicalization');
        continue;
      }
      if (name !== raw) ctx.rules.note('name_trim');
      const key = JSON.stringify([production.key, name]);
      if (seen.has(key)) continue;
      seen.add(key);
      credits.push({ production, name });
    }
  }
  return credits;
}

/** Names in first-encountered order (production order, then slot order). */
export function distinctNames(credits: readonly Credit[], accept?: NamePredicate): string[] {
  const names = new Set<string>();
  for (const credit of credits) {
    if (accept === undefined || accept(credit.name)) names.add(credit.name);
  }
  return [...names];
}

/**
 * Counts distinct productions per name, highest first. Ties keep
 * first-encountered order; there is no alphabetical secondary key.
 */
export function rankByProductions(
  credits: readonly Credit[],
  accept?: NamePredicate,
  limit: number | null = null,
): RankingEntry[] {
  const counts = new Map<string, number>();
  for (const credit of credits) {
    if (accept !== undefined && !accept(credit.name)) continue;
    counts.set(credit.name, (counts.get(credit.name) ?? 0) + 1);
  }
  const ranked = [...counts].map(([name, count]) => ({ name, count }));
  ranked.sort((a, b) => b.count - a.count);
  return limit === null ? ranked : ranked.slice(0, limit);
}

function constrainsRole(field: string, role: PersonRole, ctx: EvaluationContext): boolean {
  const spec = resolveField(field, ctx.actorMatchesAnySlot);
  if (spec.kind !== 'text') return false;
  return role === 'actor' ? isActorField(spec) : spec.columns.length === 1 && spec.columns[0] === role;
}

function nodePredicate(node: FilterNode, role: PersonRole, ctx: EvaluationContext): NamePredicate | undefined {
  if (node.kind === 'spatial') return undefined;
  if (node.kind === 'attr') {
    if (!constrainsRole(node.field, role, ctx)) return undefined;
    const condition = compileTextCondition(node, roleColumns(role), ctx);
    return (name) => nameMatches(condition, name);
  }
  return combinedPredicate(node.filters, node.kind, role, ctx);
}

function combinedPredicate(
  filters: readonly FilterNode[],
  logic: Logic,
  role: PersonRole,
  ctx: EvaluationContext,
): NamePredicate | undefined {
  const children = filters.map((child) => nodePredicate(child, role, ctx));
  if (logic === 'and') {
    const defined = children.filter((child): child is NamePredicate => child !== undefined);
    if (defined.length === 0) return undefined;
    return (name) => defined.every((accept) => accept(name));
  }
  // One unconstrained alternative lets any name through.
  if (children.length === 0 || children.some((child) => child === undefined)) return undefined;
  const alternatives = children.filter((child): child is NamePredicate => child !== undefined);
  return (name) => alternatives.some((accept) => accept(name));
}

/**
 * The part of the filter tree that constrains the role's own field, as a test
 * on one full name. Undefined when the filters say nothing about the role.
 */
export function buildNamePredicate(
  filters: readonly FilterNode[],
  logic: Logic,
  role: PersonRole,
  ctx: EvaluationContext,
): NamePredicate | undefined {
  return combinedPredicate(filters, logic, role, ctx);
}
