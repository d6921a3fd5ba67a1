export { query, allOf, anyOf } from './query/query-object.js';
export type { QueryBuilder, FieldSelector, ConditionSetter } from './query/builder.js';
export { parseStructuredQuery, parseFilterNode, parseOperation } from './query/parser.js';
export { planQuery } from './query/planner.js';
export type { QueryPlan } from './query/planner.js';
export { compileCanonicalKey, compileFilterExpression, compileFilterList } from './query/compiler.js';
export type {
  Scalar,
  AttributeOperator,
  SpatialOperator,
  DistanceUnit,
  GeoPoint,
  Position,
  Ring,
  Region,
  BBox,
  SpatialValue,
  AttributeFilter,
  SpatialFilter,
  FilterLeaf,
  FilterNode,
  Logic,
  Granularity,
  PersonRole,
  ResultShape,
  Operation,
  OperationName,
  TaskDescriptor,
  QueryOptions,
  StructuredQuery,
} from './query/types.js';
export type {
  LocationRecord,
  ProductionIdentity,
  RecordSource,
  Clock,
  CleaningRule,
  LocationRow,
  ProductionRow,
  GeoRow,
  RankingEntry,
  ResultPayload,
  SelfCheckMismatch,
  SelfCheckOutcome,
  ResultMetadata,
  ResultEnvelope,
  DiagnosticLevel,
  DiagnosticEvent,
  DiagnosticEntry,
  DiagnosticSink,
} from './types.js';
export { systemClock } from './types.js';
export { QueryEngine } from './engine.js';
export type { QueryEngineConfig } from './engine.js';
export { RecordStore, loadRecordStore, describeStore } from './store/record-store.js';
export type { DatasetSummary } from './store/record-store.js';
export { PostgresRecordSource, DEFAULT_RECORDS_TABLE } from './store/postgres-source.js';
export type { PostgresRecordSourceConfig } from './store/postgres-source.js';
export { GeoJsonRecordSource, parseFeatureCollection } from './store/geojson-source.js';
export { Gazetteer, defaultGazetteer } from './store/landmarks.js';
export type { Landmark } from './store/landmarks.js';
export { haversineDistance } from './store/geo.js';
export { canonicalizeText, stripCityQualifier } from './evaluation/canonicalize.js';
export { verifyExpansion, NO_MATCHES_SUMMARY } from './result/assembler.js';
export { analyzeMappability } from './result/map-points.js';
export type { MapAnalysis, MapPoint } from './result/map-points.js';
export {
  NoopDiagnosticSink,
  MemoryDiagnosticSink,
  JsonLinesDiagnosticSink,
  CompositeDiagnosticSink,
} from './diagnostics/sinks.js';
export type { SinkErrorHandler, JsonLinesSinkConfig } from './diagnostics/sinks.js';
export {
  ConfigurationError,
  ModificationRejectedError,
  AlignmentInvariantViolation,
  RecordStoreError,
} from './errors.js';
