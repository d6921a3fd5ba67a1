import type { FastifyInstance } from 'fastify';
import { describeStore, type RecordStore } from 'film-locations-query';

export async function registerDatasetRoutes(app: FastifyInstance, store: RecordStore): Promise<void> {
  const summary = describeStore(store);

  // GET /dataset/summary: record, production and year coverage of the loaded dataset
  app.get('/dataset/summary', async () => summary);
}
