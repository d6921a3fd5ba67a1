import { appendFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { DiagnosticEntry, DiagnosticSink } from '../types.js';

export type SinkErrorHandler = (err: unknown, entry: DiagnosticEntry) => void;

const reportToConsole: SinkErrorHandler = (err, entry) => {
  console.error(`Diagnostic sink failed to record ${entry.event} for evaluation ${entry.evaluationId}:`, err);
};

export class NoopDiagnosticSink implements DiagnosticSink {
  append(_entry: DiagnosticEntry): void {}
}

/** Keeps entries in memory, in append order. */
export class MemoryDiagnosticSink implements DiagnosticSink {
  private readonly items: DiagnosticEntry[] = [];

  append(entry: DiagnosticEntry): void {
    this.items.push(entry);
  }

  get entries(): readonly DiagnosticEntry[] {
    return this.items;
  }

  clear(): void {
    this.items.length = 0;
  }
}

export interface JsonLinesSinkConfig {
  path: string;
  onError?: SinkErrorHandler;
}

/**
 * Appends one JSON object per line. Writes are chained on a single promise so
 * lines land in append order; a failed write is reported through onError and
 * does not stop later writes.
 */
export class JsonLinesDiagnosticSink implements DiagnosticSink {
  private readonly path: string;
  private readonly onError: SinkErrorHandler;
  private tail: Promise<void> = Promise.resolve();
  private directoryReady = false;

  constructor(config: JsonLinesSinkConfig) {
    this.path = config.path;
    this.onError = config.onError ?? reportToConsole;
  }

  append(entry: DiagnosticEntry): void {
    const line = `${JSON.stringify(entry)}\n`;
    this.tail = this.tail
      .then(() => this.write(line))
      .catch((err: unknown) => this.onError(err, entry));
  }

  private async write(line: string): Promise<void> {
    if (!this.directoryReady) {
      await mkdir(dirname(this.path), { recursive: true });
      this.directoryReady = true;
    }
    await appendFile(this.path, line, 'utf8');
  }

  /** Resolves once every entry appended so far has been written or reported. */
  flush(): Promise<void> {
    return this.tail;
  }
}

/** Fans each entry out to several sinks; one failing sink does not starve the others. */
export class CompositeDiagnosticSink implements DiagnosticSink {
  private readonly sinks: readonly DiagnosticSink[];
  private readonly onError: SinkErrorHandler;

  constructor(sinks: readonly DiagnosticSink[], onError: SinkErrorHandler = reportToConsole) {
    this.sinks = sinks;
    this.onError = onError;
  }

  append(entry: DiagnosticEntry): void {
    for (const sink of this.sinks) {
      try {
        sink.append(entry);
      } catch (err) {
        this.onError(err, entry);
      }
    }
  }
}
