import pg from 'pg';
import type { LocationRecord, RecordSource } from '../types.js';
import { RecordStoreError } from '../errors.js';
import { mapRow, type LocationRow } from './row-mapper.js';

export const DEFAULT_RECORDS_TABLE = 'film_locations';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*(?:\.[A-Za-z_][A-Za-z0-9_]*)?$/;

export interface PostgresRecordSourceConfig {
  pool: pg.Pool;
  /** Optionally schema-qualified ("public.film_locations"). */
  table?: string;
}

export class PostgresRecordSource implements RecordSource {
  private readonly pool: pg.Pool;
  private readonly table: string;

  constructor(config: PostgresRecordSourceConfig) {
    const table = config.table ?? DEFAULT_RECORDS_TABLE;
    if (!IDENTIFIER.test(table)) {
      throw new RecordStoreError(`Invalid records table name: "${table}"`);
    }
    this.pool = config.pool;
    this.table = table;
  }

  async load(): Promise<LocationRecord[]> {
    const sql = `
      SELECT id, title, release_year, locations, fun_facts, director, writer,
             actor_1, actor_2, actor_3, longitude, latitude
      FROM ${this.table}
      ORDER BY id ASC
    `;
    let result: pg.QueryResult<LocationRow>;
    try {
      result = await this.pool.query<LocationRow>(sql);
    } catch (err) {
      throw new RecordStoreError(`Failed to load location records: ${String(err)}`, err);
    }
    return result.rows.map(mapRow);
  }
}
