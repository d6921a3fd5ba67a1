import type { FastifyInstance } from 'fastify';
import { GeoJsonRecordSource, MemoryDiagnosticSink, loadRecordStore } from 'film-locations-query';
import { buildServer } from '../../src/api/server.js';

export const FIXTURE_PATH = new URL('../../../tests/fixtures/film-locations.geojson', import.meta.url);

export interface TestServer {
  app: FastifyInstance;
  diagnostics: MemoryDiagnosticSink;
}

export async function createTestServer(): Promise<TestServer> {
  const store = await loadRecordStore(new GeoJsonRecordSource(FIXTURE_PATH));
  const diagnostics = new MemoryDiagnosticSink();
  const app = buildServer(store, { logger: false, sinks: [diagnostics] });
  await app.ready();
  return { app, diagnostics };
}
