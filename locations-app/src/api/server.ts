import Fastify, { type FastifyServerOptions } from 'fastify';
import {
  CompositeDiagnosticSink,
  JsonLinesDiagnosticSink,
  QueryEngine,
  type DiagnosticSink,
  type RecordStore,
  type SinkErrorHandler,
} from 'film-locations-query';
import { LoggerDiagnosticSink } from '../diagnostics/logger-sink.js';
import { registerErrorHandler } from './middleware/error-handler.js';
import { registerQueryRoutes } from '../features/queries/routes.js';
import { registerDatasetRoutes } from '../features/dataset/routes.js';

export interface ServerOptions {
  logger?: FastifyServerOptions['logger'];
  /** Extra diagnostic sinks; the server log always receives every entry. */
  sinks?: readonly DiagnosticSink[];
  /** JSON Lines file receiving every diagnostic entry; flushed when the server closes. */
  diagnosticsPath?: string | null;
}

export function buildServer(store: RecordStore, options: ServerOptions = {}) {
  const app = Fastify({ logger: options.logger ?? true });

  const reportSinkError: SinkErrorHandler = (err, entry) =>
    app.log.error({ err, evaluationId: entry.evaluationId }, 'diagnostic sink failed');

  const sinks: DiagnosticSink[] = [new LoggerDiagnosticSink(app.log), ...(options.sinks ?? [])];
  const { diagnosticsPath } = options;
  if (diagnosticsPath !== undefined && diagnosticsPath !== null) {
    const fileSink = new JsonLinesDiagnosticSink({ path: diagnosticsPath, onError: reportSinkError });
    sinks.push(fileSink);
    app.addHook('onClose', async () => {
      await fileSink.flush();
    });
  }

  const engine = new QueryEngine({
    store,
    sink: new CompositeDiagnosticSink(sinks, reportSinkError),
    onSinkError: reportSinkError,
  });

  registerErrorHandler(app);

  const prefix = '/api/v1';

  app.register(async (instance) => {
    await registerQueryRoutes(instance, engine);
    await registerDatasetRoutes(instance, engine.store);
  }, { prefix });

  return app;
}
