import type {
  AttributeOperator,
  BBox,
  DistanceUnit,
  FilterNode,
  GeoPoint,
  Logic,
  QueryOptions,
  Region,
  Scalar,
  StructuredQuery,
  TaskDescriptor,
} from './types.js';

type Combinator = 'where' | 'and' | 'or';

/**
 * Combines a new node with the builder's current filter expression.
 * `where` replaces it; `and`/`or` append flat to a composite of the same
 * kind, or wrap both in a new one.
 */
function _applyFilter(builder: QueryBuilder, combinator: Combinator, newNode: FilterNode): QueryBuilder {
  const existing = builder.expression;

  if (combinator === 'where' || existing === null) {
    return builder.withExpression(newNode);
  }

  if ((existing.kind === 'and' || existing.kind === 'or') && existing.kind === combinator) {
    // Flat accumulation: append to the existing composite
    return builder.withExpression({ kind: existing.kind, filters: [...existing.filters, newNode] });
  }
  return builder.withExpression({ kind: combinator, filters: [existing, newNode] });
}

/**
 * Fluent immutable query builder. Implements StructuredQuery so it can be
 * passed directly to QueryEngine.evaluate(). Every operation returns a new
 * QueryBuilder; existing instances are never mutated.
 */
export class QueryBuilder implements StructuredQuery {
  readonly filters: readonly FilterNode[];
  readonly filterLogic: Logic = 'and';

  constructor(
    readonly tasks: readonly TaskDescriptor[],
    readonly expression: FilterNode | null = null,
    readonly options: QueryOptions = {},
  ) {
    this.filters = expression === null ? [] : [expression];
  }

  /** Start a new filter expression, replacing any existing one. */
  get where(): FieldSelector {
    return new FieldSelector(this, 'where');
  }

  /** Combine with the existing filter using AND. */
  get and(): FieldSelector {
    return new FieldSelector(this, 'and');
  }

  /** Combine with the existing filter using OR. */
  get or(): FieldSelector {
    return new FieldSelector(this, 'or');
  }

  /** Append one or more task descriptors. */
  task(...tasks: TaskDescriptor[]): QueryBuilder {
    return new QueryBuilder([...this.tasks, ...tasks], this.expression, this.options);
  }

  withOptions(options: QueryOptions): QueryBuilder {
    return new QueryBuilder(this.tasks, this.expression, { ...this.options, ...options });
  }

  withExpression(expression: FilterNode): QueryBuilder {
    return new QueryBuilder(this.tasks, expression, this.options);
  }
}

/**
 * Intermediate builder step: holds the combinator and awaits a field name,
 * or a ready-made node such as an anyOf()/allOf() group.
 */
export class FieldSelector {
  constructor(
    private readonly _builder: QueryBuilder,
    private readonly _combinator: Combinator,
  ) {}

  field(name: string): ConditionSetter {
    return new ConditionSetter(this._builder, this._combinator, name);
  }

  node(node: FilterNode): QueryBuilder {
    return _applyFilter(this._builder, this._combinator, node);
  }
}

/**
 * Intermediate builder step: holds the field and awaits the condition.
 */
export class ConditionSetter {
  constructor(
    private readonly _builder: QueryBuilder,
    private readonly _combinator: Combinator,
    private readonly _field: string,
  ) {}

  private attr(op: AttributeOperator, value: Scalar | readonly Scalar[]): QueryBuilder {
    return _applyFilter(this._builder, this._combinator, { kind: 'attr', field: this._field, op, value });
  }

  equals(value: Scalar): QueryBuilder {
    return this.attr('eq', value);
  }

  notEquals(value: Scalar): QueryBuilder {
    return this.attr('ne', value);
  }

  contains(value: string): QueryBuilder {
    return this.attr('contains', value);
  }

  notContains(value: string): QueryBuilder {
    return this.attr('not_contains', value);
  }

  startsWith(value: string): QueryBuilder {
    return this.attr('starts_with', value);
  }

  endsWith(value: string): QueryBuilder {
    return this.attr('ends_with', value);
  }

  /** Matches names whose last word starts with the fragment ("C" finds "Elena Cruz"). */
  surnameStartsWith(value: string): QueryBuilder {
    return this.attr('surname_starts_with', value);
  }

  oneOf(...values: Scalar[]): QueryBuilder {
    return this.attr('in', values);
  }

  noneOf(...values: Scalar[]): QueryBuilder {
    return this.attr('not_in', values);
  }

  greaterThan(value: number): QueryBuilder {
    return this.attr('gt', value);
  }

  atLeast(value: number): QueryBuilder {
    return this.attr('gte', value);
  }

  lessThan(value: number): QueryBuilder {
    return this.attr('lt', value);
  }

  atMost(value: number): QueryBuilder {
    return this.attr('lte', value);
  }

  /** Inclusive on both ends. */
  between(low: number, high: number): QueryBuilder {
    return this.attr('between', [low, high]);
  }

  withinDistance(center: GeoPoint | string, radius: number, unit: DistanceUnit = 'mi'): QueryBuilder {
    return _applyFilter(this._builder, this._combinator, {
      kind: 'spatial',
      field: this._field,
      op: 'within_distance',
      value: { center, radius, unit },
    });
  }

  intersects(region: Region | BBox): QueryBuilder {
    return _applyFilter(this._builder, this._combinator, {
      kind: 'spatial',
      field: this._field,
      op: 'intersects',
      value: { region },
    });
  }
}
