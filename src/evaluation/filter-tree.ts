import type { FilterNode, Logic } from '../query/types.js';
import { ConfigurationError } from '../errors.js';
import { compileCanonicalKey } from '../query/compiler.js';
import { evaluateLeaf } from './predicate.js';
import { fullMask, type EvaluationContext, type Mask } from './context.js';

function intersect(a: Mask, b: Mask): Mask {
  return a.map((selected, i) => selected && b[i] === true);
}

function union(a: Mask, b: Mask): Mask {
  return a.map((selected, i) => selected || b[i] === true);
}

/**
 * Folds a filter tree into one mask over the full store. Results are memoized
 * per canonical sub-tree key, so a condition repeated anywhere in the tree is
 * evaluated once per query.
 */
export class FilterTreeEvaluator {
  private readonly memo = new Map<string, Mask>();

  constructor(private readonly ctx: EvaluationContext) {}

  evaluate(node: FilterNode): Mask {
    const key = compileCanonicalKey(node);
    const cached = this.memo.get(key);
    if (cached !== undefined) return cached;

    let mask: Mask;
    if (node.kind === 'attr' || node.kind === 'spatial') {
      mask = evaluateLeaf(node, this.ctx);
    } else {
      if (node.filters.length === 0) {
        throw new ConfigurationError(`Composite "${node.kind}" node has no conditions`, node);
      }
      mask = this.combine(node.filters, node.kind);
    }
    this.memo.set(key, mask);
    return mask;
  }

  /** Top-level list: combined like a composite, but an empty list selects every record. */
  evaluateAll(filters: readonly FilterNode[], logic: Logic): Mask {
    if (filters.length === 0) return fullMask(this.ctx.store);
    return this.combine(filters, logic);
  }

  private combine(filters: readonly FilterNode[], logic: Logic): Mask {
    const [first, ...rest] = filters.map((child) => this.evaluate(child));
    if (first === undefined) return fullMask(this.ctx.store);
    const fold = logic === 'and' ? intersect : union;
    return rest.reduce(fold, first);
  }
}
