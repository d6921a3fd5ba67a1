import { QueryBuilder } from './builder.js';
import type { FilterNode, TaskDescriptor } from './types.js';

/**
 * Entry point for the query DSL.
 *
 * @example
 * query.tasks('Count the number of distinct films')
 *   .where.field('Director').equals('Alma Reyes')
 *   .and.field('Year').between(1940, 1949)
 */
export const query = {
  tasks(...tasks: TaskDescriptor[]): QueryBuilder {
    return new QueryBuilder(tasks);
  },
};

/** AND group for nesting inside a builder chain via `.node()`. */
export function allOf(...filters: FilterNode[]): FilterNode {
  return { kind: 'and', filters };
}

/** OR group for nesting inside a builder chain via `.node()`. */
export function anyOf(...filters: FilterNode[]): FilterNode {
  return { kind: 'or', filters };
}
