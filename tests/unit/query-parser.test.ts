import { describe, it, expect } from 'vitest';
import { parseFilterNode, parseOperation, parseStructuredQuery } from '../../src/query/parser.js';
import { ConfigurationError, ModificationRejectedError } from '../../src/errors.js';

describe('parseStructuredQuery', () => {
  it('reads tasks, filters and logic', () => {
    const parsed = parseStructuredQuery({
      tasks: ['  Count the number of distinct films  ', ''],
      filters: [{ field: 'Director', condition: '==', value: 'Alma Reyes' }],
      filter_logic: 'OR',
    });
    expect(parsed).toEqual({
      tasks: ['Count the number of distinct films'],
      filters: [{ kind: 'attr', field: 'Director', op: 'eq', value: 'Alma Reyes' }],
      filterLogic: 'or',
      options: {},
    });
  });

  it('defaults to no tasks, no filters and AND logic', () => {
    expect(parseStructuredQuery({})).toEqual({ tasks: [], filters: [], filterLogic: 'and', options: {} });
  });

  it('raises ModificationRejectedError for a refusal object', () => {
    const refusal = { error: true, message: 'This system is read-only.', requested_operation: 'delete' };
    expect(() => parseStructuredQuery(refusal)).toThrow(ModificationRejectedError);
    try {
      parseStructuredQuery(refusal);
    } catch (err) {
      expect(err).toBeInstanceOf(ModificationRejectedError);
      expect((err as ModificationRejectedError).message).toBe('This system is read-only.');
      expect((err as ModificationRejectedError).requestedOperation).toBe('delete');
    }
  });

  it('uses a default message for a refusal without one', () => {
    expect(() => parseStructuredQuery({ error: true })).toThrow('The request was rejected.');
  });

  it('reads options at the top level or nested, in either spelling', () => {
    expect(
      parseStructuredQuery({
        production_level: false,
        options: { actorAnySlot: false, strip_city_qualifier: true, result_shape: 'distinct_list' },
      }).options,
    ).toEqual({
      granularity: 'location',
      actorMatchesAnySlot: false,
      stripCityQualifier: true,
      resultShape: 'distinct_list',
    });
    expect(parseStructuredQuery({ granularity: 'production', expandLocations: true }).options).toEqual({
      granularity: 'production',
      expandLocations: true,
    });
  });

  it('reads operation objects among the tasks', () => {
    expect(parseStructuredQuery({ tasks: [{ op: 'rank_locations', limit: 5 }] }).tasks).toEqual([
      { op: 'rank_locations', limit: 5 },
    ]);
  });

  it('rejects malformed input', () => {
    expect(() => parseStructuredQuery('count films')).toThrow('Structured query must be a JSON object');
    expect(() => parseStructuredQuery({ tasks: 'count' })).toThrow('"tasks" must be a list');
    expect(() => parseStructuredQuery({ filters: {} })).toThrow('"filters" must be a list');
    expect(() => parseStructuredQuery({ tasks: [42] })).toThrow('Tasks must be strings or operation objects');
    expect(() => parseStructuredQuery({ filter_logic: 'xor' })).toThrow('Logic must be AND or OR, got "xor"');
    expect(() => parseStructuredQuery({ result_shape: 'pie' })).toThrow('Unknown result shape "pie"');
  });
});

describe('parseFilterNode', () => {
  it.each([
    ['==', 'eq'],
    ['!=', 'ne'],
    ['does not contain', 'not_contains'],
    ['startswith', 'starts_with'],
    ['last name starts with', 'surname_starts_with'],
    ['>=', 'gte'],
    ['before', 'lt'],
  ])('maps operator %j to %s', (condition, op) => {
    expect(parseFilterNode({ field: 'Title', condition, value: 'x' })).toEqual({
      kind: 'attr',
      field: 'Title',
      op,
      value: 'x',
    });
  });

  it('reads composites with conditions and logic', () => {
    expect(
      parseFilterNode({
        logic: 'or',
        conditions: [
          { field: 'Director', op: 'eq', value: 'Hal Brenner' },
          { field: 'Year', operator: '>', value: 2000 },
        ],
      }),
    ).toEqual({
      kind: 'or',
      filters: [
        { kind: 'attr', field: 'Director', op: 'eq', value: 'Hal Brenner' },
        { kind: 'attr', field: 'Year', op: 'gt', value: 2000 },
      ],
    });
  });

  it('defaults composite logic to AND', () => {
    expect(parseFilterNode({ filters: [] })).toEqual({ kind: 'and', filters: [] });
  });

  it.each([
    [[1940, 1949]],
    [{ min: 1940, max: 1949 }],
    [{ from: 1940, to: 1949 }],
    ['1940-1949'],
    ['1940 to 1949'],
  ])('reads the range %j', (value) => {
    expect(parseFilterNode({ field: 'Year', condition: 'between', value })).toEqual({
      kind: 'attr',
      field: 'Year',
      op: 'between',
      value: [1940, 1949],
    });
  });

  it('reads list values for in', () => {
    expect(parseFilterNode({ field: 'Locations', condition: 'in', value: ['Pier 39', 'Coit Tower'] })).toEqual({
      kind: 'attr',
      field: 'Locations',
      op: 'in',
      value: ['Pier 39', 'Coit Tower'],
    });
  });

  it('reads within_distance with a landmark and a radius with units', () => {
    expect(
      parseFilterNode({
        field: 'Locations',
        condition: 'within distance',
        value: { center: 'Union Square', radius: '0.5 km' },
      }),
    ).toEqual({
      kind: 'spatial',
      field: 'geometry',
      op: 'within_distance',
      value: { center: 'Union Square', radius: 0.5, unit: 'km' },
    });
  });

  it('reads spatial parameters placed on the leaf', () => {
    expect(
      parseFilterNode({ condition: 'near', value: 'Coit Tower', radius: 2, unit: 'miles' }),
    ).toEqual({
      kind: 'spatial',
      field: 'geometry',
      op: 'within_distance',
      value: { center: 'Coit Tower', radius: 2, unit: 'mi' },
    });
  });

  it.each([
    [[-122.4, 37.8]],
    [{ lng: -122.4, lat: 37.8 }],
    [{ longitude: -122.4, latitude: 37.8 }],
    [{ type: 'Point', coordinates: [-122.4, 37.8] }],
  ])('reads the center %j', (center) => {
    expect(parseFilterNode({ condition: 'within_distance', value: { center, radius: 1 } })).toEqual({
      kind: 'spatial',
      field: 'geometry',
      op: 'within_distance',
      value: { center: { lng: -122.4, lat: 37.8 }, radius: 1 },
    });
  });

  it('reads bounding boxes and polygons for intersects', () => {
    expect(parseFilterNode({ condition: 'intersects', value: [-122.43, 37.75, -122.42, 37.77] })).toEqual({
      kind: 'spatial',
      field: 'geometry',
      op: 'intersects',
      value: { region: [-122.43, 37.75, -122.42, 37.77] },
    });

    const ring = [
      [-122.43, 37.75],
      [-122.42, 37.75],
      [-122.42, 37.77],
      [-122.43, 37.75],
    ];
    expect(
      parseFilterNode({
        condition: 'inside',
        value: { type: 'Feature', geometry: { type: 'Polygon', coordinates: [ring] } },
      }),
    ).toEqual({
      kind: 'spatial',
      field: 'geometry',
      op: 'intersects',
      value: { region: { type: 'Polygon', coordinates: [ring] } },
    });
  });

  it('rejects malformed leaves', () => {
    expect(() => parseFilterNode('Director = x')).toThrow('Filter nodes must be objects');
    expect(() => parseFilterNode({ field: 'Title', value: 'x' })).toThrow('Filter condition is missing its operator');
    expect(() => parseFilterNode({ field: 'Title', condition: 'resembles', value: 'x' })).toThrow(
      'Unknown operator "resembles"',
    );
    expect(() => parseFilterNode({ field: 'Title', condition: 'constructor', value: 'x' })).toThrow(
      'Unknown operator "constructor"',
    );
    expect(() => parseFilterNode({ condition: '==', value: 'x' })).toThrow('Filter condition is missing its field');
    expect(() => parseFilterNode({ field: 'Title', condition: '==' })).toThrow('Filter condition is missing its value');
    expect(() => parseFilterNode({ field: 'Year', condition: 'between', value: [1940] })).toThrow(
      'Operator "between" takes exactly two bounds',
    );
    expect(() => parseFilterNode({ logic: 'and' })).toThrow('Composite filter needs a "conditions" list');
  });

  it('rejects malformed spatial values', () => {
    expect(() => parseFilterNode({ condition: 'within', value: { center: 'Union Square', radius: '5 leagues' } })).toThrow(
      'Unknown distance unit "leagues"',
    );
    expect(() => parseFilterNode({ condition: 'intersects', value: {} })).toThrow(
      'intersects needs a region or bounding box',
    );
    expect(() =>
      parseFilterNode({ condition: 'intersects', value: { type: 'Polygon', coordinates: [[[0, 0], [1, 1]]] } }),
    ).toThrow('Polygon rings need at least four positions');
    expect(() => parseFilterNode({ type: 'spatial', condition: 'touches', value: {} })).toThrow(
      'Unknown spatial operator "touches"',
    );
  });

  it('reports the offending node', () => {
    const leaf = { field: 'Title', condition: 'resembles', value: 'x' };
    try {
      parseFilterNode(leaf);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError);
      expect((err as ConfigurationError).node).toBe(leaf);
    }
  });
});

describe('parseOperation', () => {
  it('reads each operation', () => {
    expect(parseOperation({ op: 'count', unit: 'location' })).toEqual({ op: 'count', unit: 'location' });
    expect(parseOperation({ op: 'list' })).toEqual({ op: 'list', unit: 'production' });
    expect(parseOperation({ op: 'list_people', role: 'writer', restrict_to_matching_names: false })).toEqual({
      op: 'list_people',
      role: 'writer',
      restrictToMatchingNames: false,
    });
    expect(parseOperation({ op: 'rank_people', role: 'actor' })).toEqual({
      op: 'rank_people',
      role: 'actor',
      limit: null,
      restrictToMatchingNames: true,
    });
    expect(parseOperation({ op: 'expand_locations' })).toEqual({ op: 'expand_locations' });
  });

  it('rejects unknown operations, roles and limits', () => {
    expect(() => parseOperation({ op: 'delete' })).toThrow('Unknown operation "delete"');
    expect(() => parseOperation({ op: 'count_people', role: 'producer' })).toThrow(
      'Role must be actor, director or writer, got "producer"',
    );
    expect(() => parseOperation({ op: 'rank_locations', limit: 0 })).toThrow('Limit must be a positive integer, got 0');
  });
});
