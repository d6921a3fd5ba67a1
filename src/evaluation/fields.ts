import type { TextColumn } from '../types.js';
import { ConfigurationError } from '../errors.js';
import { looseKey } from './canonicalize.js';

export const ACTOR_SLOTS = ['actor1', 'actor2', 'actor3'] as const satisfies readonly TextColumn[];

export type FieldSpec =
  | { readonly kind: 'text'; readonly name: string; readonly columns: readonly TextColumn[] }
  | { readonly kind: 'numeric'; readonly name: 'year' }
  | { readonly kind: 'geometry'; readonly name: 'geometry' };

type FieldTarget = TextColumn | 'year' | 'geometry' | 'actor';

const FIELD_ALIASES: Readonly<Record<string, FieldTarget>> = {
  title: 'title',
  film: 'title',
  movie: 'title',
  production: 'title',
  filmtitle: 'title',
  year: 'year',
  releaseyear: 'year',
  locations: 'locations',
  location: 'locations',
  place: 'locations',
  funfacts: 'funFacts',
  funfact: 'funFacts',
  trivia: 'funFacts',
  director: 'director',
  directors: 'director',
  writer: 'writer',
  writers: 'writer',
  actor1: 'actor1',
  actor2: 'actor2',
  actor3: 'actor3',
  actor: 'actor',
  actors: 'actor',
  cast: 'actor',
  star: 'actor',
  stars: 'actor',
  geometry: 'geometry',
  geom: 'geometry',
  point: 'geometry',
  coordinates: 'geometry',
};

/**
 * Resolves a field reference from a filter ("Director", "Actor_1", "Fun Facts",
 * "actors") to the record columns it reads. The logical actor field covers every
 * billing slot unless actorMatchesAnySlot is false, in which case it is the lead slot.
 */
export function resolveField(reference: string, actorMatchesAnySlot: boolean): FieldSpec {
  const key = looseKey(reference);
  const target = Object.hasOwn(FIELD_ALIASES, key) ? FIELD_ALIASES[key] : undefined;
  if (target === undefined) {
    throw new ConfigurationError(`Unknown field "${reference}"`);
  }
  if (target === 'year') return { kind: 'numeric', name: 'year' };
  if (target === 'geometry') return { kind: 'geometry', name: 'geometry' };
  if (target === 'actor') {
    return {
      kind: 'text',
      name: 'actor',
      columns: actorMatchesAnySlot ? ACTOR_SLOTS : ['actor1'],
    };
  }
  return { kind: 'text', name: target, columns: [target] };
}

export function isActorField(spec: FieldSpec): boolean {
  return spec.kind === 'text' && spec.columns.every((column) => column.startsWith('actor'));
}
