import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createTestServer, type TestServer } from './helpers.js';

let t: TestServer;

beforeEach(async () => {
  t = await createTestServer();
});

afterEach(async () => {
  await t.app.close();
});

const DIRECTOR_IN_1940S = {
  tasks: ['Filter rows where Director is Alma Reyes', 'Keep the 1940s', 'Count the number of distinct films'],
  filters: [
    { field: 'Director', condition: '==', value: 'Alma Reyes' },
    { field: 'Year', condition: 'between', value: '1940-1949' },
  ],
  filter_logic: 'AND',
};

// ---------------------------------------------------------------------------
// POST /api/v1/queries
// ---------------------------------------------------------------------------
describe('POST /api/v1/queries', () => {
  it('returns the result envelope', async () => {
    const res = await t.app.inject({ method: 'POST', url: '/api/v1/queries', payload: DIRECTOR_IN_1940S });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.data).toEqual({ kind: 'scalar', value: 2 });
    expect(body.summary).toBe('2 distinct productions match the filters.');
  });

  it('records one diagnostic entry per request', async () => {
    const res = await t.app.inject({ method: 'POST', url: '/api/v1/queries', payload: DIRECTOR_IN_1940S });

    expect(t.diagnostics.entries).toHaveLength(1);
    expect(t.diagnostics.entries[0]).toMatchObject({
      evaluationId: res.json().metadata.evaluationId,
      level: 'info',
      event: 'evaluation_completed',
      details: { matchedRecords: 4 },
    });
  });

  it('refusal object → 403 with the refusal message', async () => {
    const res = await t.app.inject({
      method: 'POST',
      url: '/api/v1/queries',
      payload: { error: true, message: 'This system is read-only.', requested_operation: 'update' },
    });

    expect(res.statusCode).toBe(403);
    expect(res.json()).toEqual({
      error: 'ModificationRejectedError',
      message: 'This system is read-only.',
      requestedOperation: 'update',
    });
    expect(t.diagnostics.entries[0]?.event).toBe('evaluation_failed');
  });

  it('unknown field → 422', async () => {
    const res = await t.app.inject({
      method: 'POST',
      url: '/api/v1/queries',
      payload: { tasks: ['Count the films'], filters: [{ field: 'Budget', condition: '>', value: 5 }] },
    });

    expect(res.statusCode).toBe(422);
    expect(res.json().error).toBe('ConfigurationError');
  });

  it('malformed JSON → 400', async () => {
    const res = await t.app.inject({
      method: 'POST',
      url: '/api/v1/queries',
      headers: { 'content-type': 'application/json' },
      payload: '{"tasks": [',
    });

    expect(res.statusCode).toBe(400);
  });
});

// ---------------------------------------------------------------------------
// POST /api/v1/queries/map
// ---------------------------------------------------------------------------
describe('POST /api/v1/queries/map', () => {
  it('returns the envelope with its mappable points', async () => {
    const res = await t.app.inject({
      method: 'POST',
      url: '/api/v1/queries/map',
      payload: {
        tasks: ['Show all filming locations on a map'],
        filters: [{ field: 'Director', condition: '==', value: 'Hal Brenner' }],
      },
    });

    expect(res.statusCode).toBe(200);
    const { result, map } = res.json();
    expect(result.metadata.queryType).toBe('geo_rows');
    expect(map.canMap).toBe(true);
    expect(map.reason).toBe('Found 4 mappable locations');
    expect(map.points.map((p: { location: string }) => p.location)).toEqual([
      'Lombard Street',
      'Mission Dolores Park',
      'Twin Peaks',
      'Dolores Street',
    ]);
  });

  it('reports a scalar result as not mappable', async () => {
    const res = await t.app.inject({ method: 'POST', url: '/api/v1/queries/map', payload: DIRECTOR_IN_1940S });

    expect(res.statusCode).toBe(200);
    expect(res.json().map).toEqual({ canMap: false, reason: 'A scalar result is not mappable', points: [] });
  });
});

// ---------------------------------------------------------------------------
// GET /api/v1/dataset/summary
// ---------------------------------------------------------------------------
describe('GET /api/v1/dataset/summary', () => {
  it('describes the loaded dataset', async () => {
    const res = await t.app.inject({ method: 'GET', url: '/api/v1/dataset/summary' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      records: 14,
      productions: 6,
      recordsWithGeometry: 12,
      earliestYear: 1944,
      latestYear: 2003,
    });
  });
});
