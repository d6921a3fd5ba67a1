import { mkdtempSync, readFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { GeoJsonRecordSource } from '../../src/store/geojson-source.js';
import { loadRecordStore } from '../../src/store/record-store.js';
import { JsonLinesDiagnosticSink } from '../../src/diagnostics/sinks.js';
import { QueryEngine } from '../../src/engine.js';
import type { DiagnosticEntry } from '../../src/types.js';

export const FIXTURE_PATH = new URL('../fixtures/film-locations.geojson', import.meta.url);

export interface TestEngine {
  engine: QueryEngine;
  sink: JsonLinesDiagnosticSink;
  readDiagnostics(): Promise<DiagnosticEntry[]>;
}

/** Engine over the GeoJSON fixture, logging to a fresh JSON Lines file. */
export async function createTestEngine(): Promise<TestEngine> {
  const store = await loadRecordStore(new GeoJsonRecordSource(FIXTURE_PATH));
  const path = join(mkdtempSync(join(tmpdir(), 'film-locations-')), 'diagnostics.jsonl');
  const sink = new JsonLinesDiagnosticSink({ path });
  const engine = new QueryEngine({ store, sink });

  return {
    engine,
    sink,
    async readDiagnostics() {
      await sink.flush();
      return readFileSync(path, 'utf8')
        .trimEnd()
        .split('\n')
        .map((line): DiagnosticEntry => JSON.parse(line));
    },
  };
}
