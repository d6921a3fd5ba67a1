import type {
  Granularity,
  Operation,
  PersonRole,
  QueryOptions,
  ResultShape,
  StructuredQuery,
  TaskDescriptor,
} from './types.js';
import { ConfigurationError } from '../errors.js';

export interface QueryPlan {
  readonly operation: Operation;
  readonly granularity: Granularity;
  readonly resultShape: ResultShape | null;
  readonly actorMatchesAnySlot: boolean;
  readonly stripCityQualifier: boolean;
}

type Verb = 'expand' | 'geo' | 'count_by_year' | 'rank' | 'count' | 'list';

type Subject =
  | { readonly kind: 'unit'; readonly unit: Granularity }
  | { readonly kind: 'role'; readonly role: PersonRole };

const FILTER_STEP = /^\s*(?:filter|apply|keep|restrict|exclude|remove|drop|where)\b/i;
const SORT_STEP = /^\s*(?:sort|order|arrange|reorder)\b/i;
// "sorted by year" orders a result; it never asks for per-year counts.
const SORT_CLAUSE = /\b(?:sort(?:ed|ing)?|order(?:ed|ing)?|arrang(?:e|ed|ing))\b.*$/i;
const EXPAND =
  /\bexpand\b|\b(?:all|every) (?:of )?(?:its|their) (?:filming )?locations\b|\blocations? (?:for|of) each (?:film|movie|production)\b|\bgroup (?:the )?locations by\b|\bmapping\b.*\blocations?\b/i;
const DEDUP = /\b(?:de-?dup\w*|de-?duplicat\w*|distinct|unique|duplicates?)\b/i;
const UNION = /\b(?:union|combine|merge|stack|melt|concatenate)\b.*\bactors?\b|\bactor_?[123]\b/i;
const COSTAR = /\b(?:co-?stars?|alongside|starred with|appeared with|acted with|worked with)\b/i;

// Checked in this order; the first match decides the verb.
const VERBS: readonly (readonly [Verb, RegExp])[] = [
  ['expand', EXPAND],
  ['geo', /\b(?:map|plot|coordinates|geometr(?:y|ies)|geo[- ]?rows?|latitude|longitude)\b/i],
  ['count_by_year', /\b(?:per|by|each|every)\s+(?:release\s+)?year\b|\b(?:which|what) years?\b|\bover the years\b|\byearly\b|\bannual\b/i],
  ['rank', /\btop\b|\brank\w*|\bmost (?:frequent\w*|common\w*|popular|prolific|filmed|often|times)\b|\bthe most\b|\bhighest\b|\b(?:per|by|for each|each)\s+(?:actor|director|writer|location)s?\b/i],
  ['count', /\b(?:count|how many|number of|total)\b/i],
  ['list', /\b(?:list|show|display|return|get|find|which|what|who|name|identify|give|retrieve|select|output)\b/i],
];

const SUBJECT_NOUNS: readonly (readonly [Subject, RegExp])[] = [
  [{ kind: 'unit', unit: 'location' }, /\b(?:locations?|places?|sites?|spots?|addresses)\b/i],
  [{ kind: 'unit', unit: 'production' }, /\b(?:films?|movies?|productions?|titles?|shows?|series)\b/i],
  [{ kind: 'role', role: 'actor' }, /\b(?:actors?|actresses?|cast|stars|performers?)\b/i],
  [{ kind: 'role', role: 'director' }, /\bdirectors?\b/i],
  [{ kind: 'role', role: 'writer' }, /\b(?:writers?|screenwriters?)\b/i],
];

const NUMBER_WORDS: Readonly<Record<string, number>> = {
  one: 1,
  two: 2,
  three: 3,
  four: 4,
  five: 5,
  six: 6,
  seven: 7,
  eight: 8,
  nine: 9,
  ten: 10,
  fifteen: 15,
  twenty: 20,
};

const COUNT_TOKEN = `(\\d+|${Object.keys(NUMBER_WORDS).join('|')})`;
const LIMIT_PATTERNS = [
  new RegExp(`\\btop\\s+${COUNT_TOKEN}\\b`, 'i'),
  new RegExp(`\\b${COUNT_TOKEN}\\s+most\\b`, 'i'),
  new RegExp(`\\bfirst\\s+${COUNT_TOKEN}\\b`, 'i'),
];

function parseCount(token: string): number | null {
  const value = /^\d+$/.test(token) ? Number(token) : NUMBER_WORDS[token.toLowerCase()];
  return value !== undefined && value > 0 ? value : null;
}

export function extractLimit(task: string): number | null {
  for (const pattern of LIMIT_PATTERNS) {
    const token = pattern.exec(task)?.[1];
    if (token !== undefined) return parseCount(token);
  }
  return null;
}

/** The verb a task asks for; filter and sort steps only modify the query and have none. */
export function classifyTask(task: string): Verb | null {
  if (FILTER_STEP.test(task) || SORT_STEP.test(task)) return null;
  const request = task.replace(SORT_CLAUSE, '');
  for (const [verb, pattern] of VERBS) {
    if (pattern.test(request)) return verb;
  }
  return null;
}

/** The earliest subject noun in the task, or null when it names none. */
export function findSubject(task: string, options: { skipProductions?: boolean } = {}): Subject | null {
  let best: { subject: Subject; at: number } | null = null;
  for (const [subject, pattern] of SUBJECT_NOUNS) {
    if (options.skipProductions === true && subject.kind === 'unit' && subject.unit === 'production') continue;
    const match = pattern.exec(task);
    if (match !== null && (best === null || match.index < best.at)) {
      best = { subject, at: match.index };
    }
  }
  return best?.subject ?? null;
}

interface TaskContext {
  unit: Granularity | null;
  role: PersonRole | null;
  limit: number | null;
  restrictToMatchingNames: boolean;
  expand: boolean;
}

function readContext(tasks: readonly string[]): TaskContext {
  const context: TaskContext = { unit: null, role: null, limit: null, restrictToMatchingNames: true, expand: false };
  for (const task of tasks) {
    if (EXPAND.test(task)) context.expand = true;
    if (DEDUP.test(task)) context.unit = 'production';
    if (UNION.test(task)) context.role = 'actor';
    if (COSTAR.test(task)) context.restrictToMatchingNames = false;
    context.limit = extractLimit(task) ?? context.limit;
  }
  return context;
}

function terminalTask(tasks: readonly TaskDescriptor[]): { task: TaskDescriptor; verb: Verb | null } | null {
  for (let i = tasks.length - 1; i >= 0; i--) {
    const task = tasks[i];
    if (task === undefined) continue;
    if (typeof task !== 'string') return { task, verb: null };
    const verb = classifyTask(task);
    if (verb !== null) return { task, verb };
  }
  return null;
}

function resolveVerb(verb: Verb, task: string, context: TaskContext, options: QueryOptions): Operation {
  const fallbackUnit = context.unit ?? options.granularity ?? 'production';
  switch (verb) {
    case 'expand':
      return { op: 'expand_locations' };
    case 'geo':
      return { op: 'geo_rows' };
    case 'count_by_year':
      return { op: 'count_by_year' };
    case 'rank': {
      const subject = findSubject(task, { skipProductions: true });
      const limit = extractLimit(task) ?? context.limit;
      if (subject?.kind === 'role') {
        return { op: 'rank_people', role: subject.role, limit, restrictToMatchingNames: context.restrictToMatchingNames };
      }
      if (subject?.kind === 'unit') return { op: 'rank_locations', limit };
      if (context.role !== null) {
        return { op: 'rank_people', role: context.role, limit, restrictToMatchingNames: context.restrictToMatchingNames };
      }
      throw new ConfigurationError(`Cannot tell what to rank in task "${task}"`);
    }
    case 'count':
    case 'list': {
      const subject = findSubject(task);
      const role = subject?.kind === 'role' ? subject.role : subject === null ? context.role : null;
      if (role !== null) {
        return verb === 'count'
          ? { op: 'count_people', role }
          : { op: 'list_people', role, restrictToMatchingNames: context.restrictToMatchingNames };
      }
      const unit = subject?.kind === 'unit' ? subject.unit : fallbackUnit;
      return verb === 'count' ? { op: 'count', unit } : { op: 'list', unit };
    }
  }
}

function granularityOf(operation: Operation): Granularity {
  switch (operation.op) {
    case 'count':
    case 'list':
      return operation.unit;
    case 'rank_locations':
    case 'geo_rows':
      return 'location';
    default:
      return 'production';
  }
}

/**
 * Resolves the task list and option flags to one operation. The last task
 * carrying a recognised verb (or an explicit operation) is terminal; the
 * others only contribute context such as deduplication, the actor-column
 * union, a top-N limit, a co-star request or a request to expand a listing
 * to every filming location.
 */
export function planQuery(query: StructuredQuery): QueryPlan {
  const options: QueryOptions = query.options ?? {};
  const texts = query.tasks.filter((task): task is string => typeof task === 'string');
  const context = readContext(texts);
  const terminal = terminalTask(query.tasks);

  let operation: Operation;
  if (terminal === null) {
    operation = { op: 'list', unit: context.unit ?? options.granularity ?? 'production' };
  } else if (typeof terminal.task !== 'string') {
    operation = terminal.task;
  } else if (terminal.verb === null) {
    operation = { op: 'list', unit: context.unit ?? options.granularity ?? 'production' };
  } else {
    operation = resolveVerb(terminal.verb, terminal.task, context, options);
  }

  const resultShape = options.resultShape ?? null;
  if (
    options.expandLocations === true ||
    resultShape === 'production_locations' ||
    (context.expand && operation.op === 'list')
  ) {
    operation = { op: 'expand_locations' };
  } else if (resultShape === 'geo_rows' && operation.op === 'list') {
    operation = { op: 'geo_rows' };
  }

  return {
    operation,
    granularity: granularityOf(operation),
    resultShape,
    actorMatchesAnySlot: options.actorMatchesAnySlot ?? true,
    stripCityQualifier: options.stripCityQualifier ?? false,
  };
}
