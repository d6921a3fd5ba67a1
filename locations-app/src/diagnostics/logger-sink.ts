import type { FastifyBaseLogger } from 'fastify';
import type { DiagnosticEntry, DiagnosticSink } from 'film-locations-query';

/** Writes each diagnostic entry to the server log at the entry's own level. */
export class LoggerDiagnosticSink implements DiagnosticSink {
  constructor(private readonly logger: FastifyBaseLogger) {}

  append(entry: DiagnosticEntry): void {
    const { event, level, ...fields } = entry;
    this.logger[level]({ ...fields, event }, `diagnostic ${event}`);
  }
}
