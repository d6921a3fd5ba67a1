import type { FastifyInstance } from 'fastify';
import { analyzeMappability, type QueryEngine } from 'film-locations-query';

export async function registerQueryRoutes(app: FastifyInstance, engine: QueryEngine): Promise<void> {
  // POST /queries: evaluate one structured query from the translation service
  app.post('/queries', async (request, reply) => {
    const result = engine.evaluateRequest(request.body);
    return reply.status(200).send(result);
  });

  // POST /queries/map: evaluate, then report whether the result can be drawn on a map
  app.post('/queries/map', async (request, reply) => {
    const result = engine.evaluateRequest(request.body);
    const map = analyzeMappability(engine.store, result);
    return reply.status(200).send({ result, map });
  });
}
