import type { GeoPoint, Granularity, OperationName, ResultShape } from './query/types.js';

export type RawText = string | null;

/** One shooting location of one production, exactly as loaded. */
export interface LocationRecord {
  readonly id: number;
  readonly title: RawText;
  readonly year: string | number | null;
  readonly locations: RawText;
  readonly funFacts: RawText;
  readonly director: RawText;
  readonly writer: RawText;
  readonly actor1: RawText;
  readonly actor2: RawText;
  readonly actor3: RawText;
  readonly geometry: GeoPoint | null;
}

export type TextColumn =
  | 'title'
  | 'locations'
  | 'funFacts'
  | 'director'
  | 'writer'
  | 'actor1'
  | 'actor2'
  | 'actor3';

export interface ProductionIdentity {
  /** Stable key derived from the raw (title, year) pair. */
  readonly key: string;
  readonly title: string | null;
  readonly year: number | null;
  /** "Title (Year)" */
  readonly label: string;
}

export interface RecordSource {
  load(): Promise<LocationRecord[]>;
}

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = { now: () => new Date() };

export type CleaningRule =
  | 'null_canonicalization'
  | 'numeric_coercion'
  | 'missing_geometry_excluded'
  | 'city_qualifier_stripped'
  | 'actor_slot_union'
  | 'production_dedup'
  | 'name_trim'
  | 'person_name_filter';

export interface LocationRow {
  readonly id: number;
  readonly title: string | null;
  readonly year: number | null;
  readonly location: string | null;
  readonly funFacts: string | null;
  readonly director: string | null;
  readonly writer: string | null;
  readonly actors: readonly string[];
}

export interface ProductionRow {
  readonly label: string;
  readonly title: string | null;
  readonly year: number | null;
  readonly director: string | null;
  readonly writer: string | null;
  readonly actors: readonly string[];
}

export interface GeoRow {
  readonly id: number;
  readonly title: string | null;
  readonly year: number | null;
  readonly location: string | null;
  readonly lng: number;
  readonly lat: number;
}

export interface RankingEntry {
  readonly name: string;
  readonly count: number;
}

export type ResultPayload =
  | { readonly kind: 'scalar'; readonly value: number }
  | { readonly kind: 'list'; readonly items: readonly string[] }
  | { readonly kind: 'ranking'; readonly entries: readonly RankingEntry[] }
  | { readonly kind: 'counts'; readonly entries: readonly RankingEntry[] }
  | { readonly kind: 'mapping'; readonly entries: Readonly<Record<string, readonly string[]>> }
  | { readonly kind: 'productions'; readonly rows: readonly ProductionRow[] }
  | { readonly kind: 'locations'; readonly rows: readonly LocationRow[] }
  | { readonly kind: 'geo_rows'; readonly rows: readonly GeoRow[] };

export interface SelfCheckMismatch {
  readonly production: string;
  readonly expected: number;
  readonly actual: number;
}

export interface SelfCheckOutcome {
  readonly passed: boolean;
  readonly checkedProductions: number;
  readonly mismatches: readonly SelfCheckMismatch[];
}

export interface ResultMetadata {
  readonly evaluationId: string;
  readonly queryType: OperationName;
  readonly granularity: Granularity;
  readonly resultShape: ResultShape | null;
  readonly cleaningRules: readonly CleaningRule[];
  readonly matchedRecords: number;
  readonly matchedProductions: number;
  readonly empty: boolean;
  readonly selfCheck?: SelfCheckOutcome;
}

export interface ResultEnvelope {
  readonly data: ResultPayload;
  readonly summary: string;
  readonly metadata: ResultMetadata;
}

export type DiagnosticLevel = 'info' | 'warn' | 'error';

export type DiagnosticEvent = 'evaluation_completed' | 'evaluation_failed' | 'alignment_violation';

export interface DiagnosticEntry {
  readonly id: string;
  readonly evaluationId: string;
  readonly timestamp: string;
  readonly level: DiagnosticLevel;
  readonly event: DiagnosticEvent;
  readonly details: Readonly<Record<string, unknown>>;
}

/**
 * Append-only audit channel. append() must never throw into the caller;
 * implementations report their own failures through their error callback.
 */
export interface DiagnosticSink {
  append(entry: DiagnosticEntry): void;
}
