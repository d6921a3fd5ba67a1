export type Scalar = string | number;

export type AttributeOperator =
  | 'eq'
  | 'ne'
  | 'contains'
  | 'not_contains'
  | 'starts_with'
  | 'ends_with'
  | 'surname_starts_with'
  | 'in'
  | 'not_in'
  | 'gt'
  | 'gte'
  | 'lt'
  | 'lte'
  | 'between';

export type SpatialOperator = 'within_distance' | 'intersects';

export type DistanceUnit = 'mi' | 'km' | 'm' | 'ft';

export interface GeoPoint {
  readonly lng: number;
  readonly lat: number;
}

/** [longitude, latitude], GeoJSON order. */
export type Position = readonly [number, number];
export type Ring = readonly Position[];

export type Region =
  | { readonly type: 'Polygon'; readonly coordinates: readonly Ring[] }
  | { readonly type: 'MultiPolygon'; readonly coordinates: readonly (readonly Ring[])[] };

/** [minLng, minLat, maxLng, maxLat] */
export type BBox = readonly [number, number, number, number];

export interface SpatialValue {
  /** A point, or a landmark name resolved through the gazetteer. */
  readonly center?: GeoPoint | string;
  readonly radius?: number;
  readonly unit?: DistanceUnit;
  readonly region?: Region | BBox;
}

export interface AttributeFilter {
  readonly kind: 'attr';
  readonly field: string;
  readonly op: AttributeOperator;
  readonly value: Scalar | readonly Scalar[];
}

export interface SpatialFilter {
  readonly kind: 'spatial';
  readonly field: string;
  readonly op: SpatialOperator;
  readonly value: SpatialValue;
}

export type FilterLeaf = AttributeFilter | SpatialFilter;

export type FilterNode =
  | FilterLeaf
  | { readonly kind: 'and'; readonly filters: readonly FilterNode[] }
  | { readonly kind: 'or'; readonly filters: readonly FilterNode[] };

export type Logic = 'and' | 'or';

export type Granularity = 'production' | 'location';

export type PersonRole = 'actor' | 'director' | 'writer';

export type ResultShape = 'production_locations' | 'distinct_list' | 'table' | 'geo_rows';

export type Operation =
  | { readonly op: 'count'; readonly unit: Granularity }
  | { readonly op: 'list'; readonly unit: Granularity }
  | { readonly op: 'count_people'; readonly role: PersonRole }
  | {
      readonly op: 'list_people';
      readonly role: PersonRole;
      readonly restrictToMatchingNames: boolean;
    }
  | {
      readonly op: 'rank_people';
      readonly role: PersonRole;
      readonly limit: number | null;
      readonly restrictToMatchingNames: boolean;
    }
  | { readonly op: 'count_by_year' }
  | { readonly op: 'rank_locations'; readonly limit: number | null }
  | { readonly op: 'expand_locations' }
  | { readonly op: 'geo_rows' };

export type OperationName = Operation['op'];

/** A plain-language step, or an operation already resolved upstream. */
export type TaskDescriptor = string | Operation;

export interface QueryOptions {
  readonly granularity?: Granularity;
  readonly expandLocations?: boolean;
  /** Defaults to true: the logical actor field covers every billing slot. */
  readonly actorMatchesAnySlot?: boolean;
  readonly stripCityQualifier?: boolean;
  readonly resultShape?: ResultShape;
}

/**
 * Structured query value handed to QueryEngine.evaluate(). Build it with
 * the query DSL or parse it from wire JSON with parseStructuredQuery().
 */
export interface StructuredQuery {
  readonly tasks: readonly TaskDescriptor[];
  readonly filters: readonly FilterNode[];
  readonly filterLogic: Logic;
  readonly options?: QueryOptions;
}
