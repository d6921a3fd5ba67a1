import pg from 'pg';
import {
  GeoJsonRecordSource,
  PostgresRecordSource,
  loadRecordStore,
  type RecordStore,
} from 'film-locations-query';
import type { DataSourceConfig } from './config.js';

/**
 * Loads the whole dataset once. The PostgreSQL pool is kept open only until
 * the rows are read; the store itself is in memory.
 */
export async function createStore(source: DataSourceConfig): Promise<RecordStore> {
  if (source.kind === 'geojson') {
    return loadRecordStore(new GeoJsonRecordSource(source.path));
  }
  const pool = new pg.Pool({ connectionString: source.connectionString });
  try {
    return await loadRecordStore(new PostgresRecordSource({ pool, table: source.table }));
  } finally {
    await pool.end();
  }
}
