import { v4 as uuidv4 } from 'uuid';
import type { Operation, PersonRole, StructuredQuery } from './query/types.js';
import type {
  Clock,
  DiagnosticEntry,
  DiagnosticEvent,
  DiagnosticLevel,
  DiagnosticSink,
  ResultEnvelope,
} from './types.js';
import { systemClock } from './types.js';
import { AlignmentInvariantViolation } from './errors.js';
import type { RecordStore } from './store/record-store.js';
import { defaultGazetteer, type Gazetteer } from './store/landmarks.js';
import { planQuery } from './query/planner.js';
import { parseStructuredQuery } from './query/parser.js';
import { compileFilterList } from './query/compiler.js';
import { CleaningRuleLog, type EvaluationContext } from './evaluation/context.js';
import { FilterTreeEvaluator } from './evaluation/filter-tree.js';
import { buildNamePredicate } from './evaluation/person-aggregator.js';
import { assembleResult } from './result/assembler.js';
import { NoopDiagnosticSink, type SinkErrorHandler } from './diagnostics/sinks.js';

export interface QueryEngineConfig {
  store: RecordStore;
  sink?: DiagnosticSink;
  gazetteer?: Gazetteer;
  clock?: Clock;
  /** Called when the sink throws; the evaluation itself is never affected. */
  onSinkError?: SinkErrorHandler;
}

function personRole(operation: Operation): PersonRole | null {
  switch (operation.op) {
    case 'count_people':
    case 'list_people':
    case 'rank_people':
      return operation.role;
    default:
      return null;
  }
}

function describeError(err: unknown): Record<string, unknown> {
  if (err instanceof Error) return { error: err.name, message: err.message };
  return { error: 'UnknownError', message: String(err) };
}

/**
 * Evaluates structured queries against one immutable record store. Each call
 * is synchronous and independent; the diagnostic sink is the only shared
 * state and its failures never reach the caller.
 */
export class QueryEngine {
  readonly store: RecordStore;
  private readonly sink: DiagnosticSink;
  private readonly gazetteer: Gazetteer;
  private readonly clock: Clock;
  private readonly onSinkError: SinkErrorHandler | undefined;

  constructor(config: QueryEngineConfig) {
    this.store = config.store;
    this.sink = config.sink ?? new NoopDiagnosticSink();
    this.gazetteer = config.gazetteer ?? defaultGazetteer();
    this.clock = config.clock ?? systemClock;
    this.onSinkError = config.onSinkError;
  }

  evaluate(query: StructuredQuery): ResultEnvelope {
    const evaluationId = uuidv4();
    return this.run(evaluationId, () => this.evaluateWithId(query, evaluationId));
  }

  /** Parses wire JSON from the translation service, then evaluates it. */
  evaluateRequest(raw: unknown): ResultEnvelope {
    const evaluationId = uuidv4();
    return this.run(evaluationId, () => this.evaluateWithId(parseStructuredQuery(raw), evaluationId));
  }

  private run(evaluationId: string, evaluate: () => ResultEnvelope): ResultEnvelope {
    try {
      return evaluate();
    } catch (err) {
      this.record(evaluationId, 'error', 'evaluation_failed', describeError(err));
      throw err;
    }
  }

  private evaluateWithId(query: StructuredQuery, evaluationId: string): ResultEnvelope {
    const plan = planQuery(query);
    const ctx: EvaluationContext = {
      store: this.store,
      gazetteer: this.gazetteer,
      actorMatchesAnySlot: plan.actorMatchesAnySlot,
      stripCityQualifier: plan.stripCityQualifier,
      rules: new CleaningRuleLog(),
    };

    const mask = new FilterTreeEvaluator(ctx).evaluateAll(query.filters, query.filterLogic);
    const role = personRole(plan.operation);
    const namePredicate =
      role === null ? undefined : buildNamePredicate(query.filters, query.filterLogic, role, ctx);

    const envelope = assembleResult({
      plan,
      mask,
      ctx,
      evaluationId,
      ...(namePredicate === undefined ? {} : { namePredicate }),
    });

    const { metadata } = envelope;
    for (const mismatch of metadata.selfCheck?.mismatches ?? []) {
      const violation = new AlignmentInvariantViolation(mismatch.production, mismatch.expected, mismatch.actual);
      this.record(evaluationId, 'warn', 'alignment_violation', {
        production: violation.production,
        expected: violation.expected,
        actual: violation.actual,
        message: violation.message,
      });
    }
    this.record(evaluationId, 'info', 'evaluation_completed', {
      operation: plan.operation.op,
      granularity: plan.granularity,
      filters: compileFilterList(query.filters, query.filterLogic),
      matchedRecords: metadata.matchedRecords,
      matchedProductions: metadata.matchedProductions,
      empty: metadata.empty,
      cleaningRules: metadata.cleaningRules,
    });
    return envelope;
  }

  private record(
    evaluationId: string,
    level: DiagnosticLevel,
    event: DiagnosticEvent,
    details: Record<string, unknown>,
  ): void {
    const entry: DiagnosticEntry = {
      id: uuidv4(),
      evaluationId,
      timestamp: this.clock.now().toISOString(),
      level,
      event,
      details,
    };
    try {
      this.sink.append(entry);
    } catch (err) {
      if (this.onSinkError !== undefined) this.onSinkError(err, entry);
      else console.error(`Diagnostic sink failed for evaluation ${evaluationId}:`, err);
    }
  }
}
