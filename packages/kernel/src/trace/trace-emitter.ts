/**
 * Trace Emitter
 *
 * Appends signed TraceEvents for one run. `seq` is assigned at append time,
 * which on the single-threaded event loop gives concurrent tasks a unique,
 * monotonic order without locking.
 */

import { once } from 'events';
import { createWriteStream, type WriteStream } from 'fs';
import type { TraceEvent, TraceEventType } from '@mesh-kernel/contracts';
import { silentLogger, type Logger } from '../shared/logger.js';
import type { TraceSigner, UnsignedTraceEvent } from './trace-signer.js';

export interface TraceSink {
  write(event: TraceEvent): void;
  close(): Promise<void>;
}

export interface EmitInput {
  step_id: string;
  event_type: TraceEventType;
  data?: Record<string, unknown>;
  cost_usd?: number;
  tokens_in?: number;
  tokens_out?: number;
  citations?: string[];
}

export interface TraceEmitterOptions {
  planId: string;
  signer?: TraceSigner;
  sink?: TraceSink;
  now?: () => number;
  logger?: Logger;
}

/**
 * NDJSON sink over a writable stream, one event per line. The first stream
 * error is kept; later writes are dropped and `close()` rejects with it.
 */
export class NdjsonTraceSink implements TraceSink {
  private failure: Error | undefined;

  constructor(private readonly stream: NodeJS.WritableStream) {
    stream.on('error', (error: Error) => {
      this.failure ??= error;
    });
  }

  /**
   * Open (or truncate) a trace file. Rejects when the file cannot be opened.
   */
  static async toFile(path: string): Promise<NdjsonTraceSink> {
    const stream: WriteStream = createWriteStream(path, { flags: 'w', encoding: 'utf8' });
    await once(stream, 'open');
    return new NdjsonTraceSink(stream);
  }

  write(event: TraceEvent): void {
    if (this.failure) return;
    this.stream.write(`${JSON.stringify(event)}\n`);
  }

  close(): Promise<void> {
    const failed = this.failure;
    if (failed) return Promise.reject(failed);
    return new Promise((resolve, reject) => {
      const onError = (error: Error): void => reject(error);
      this.stream.once('error', onError);
      this.stream.end((error?: Error | null) => {
        this.stream.removeListener('error', onError);
        const failure = error ?? this.failure;
        if (failure) reject(failure);
        else resolve();
      });
    });
  }
}

export function toNdjson(events: readonly TraceEvent[]): string {
  return events.map((event) => JSON.stringify(event)).join('\n') + (events.length > 0 ? '\n' : '');
}

export class TraceEmitter {
  private readonly log: TraceEvent[] = [];
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(private readonly options: TraceEmitterOptions) {
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? silentLogger();
  }

  get planId(): string {
    return this.options.planId;
  }

  emit(input: EmitInput): TraceEvent {
    const unsigned: UnsignedTraceEvent = {
      plan_id: this.options.planId,
      seq: this.log.length + 1,
      step_id: input.step_id,
      timestamp: new Date(this.now()).toISOString(),
      event_type: input.event_type,
      ...(input.cost_usd !== undefined && { cost_usd: input.cost_usd }),
      ...(input.tokens_in !== undefined && { tokens_in: input.tokens_in }),
      ...(input.tokens_out !== undefined && { tokens_out: input.tokens_out }),
      ...(input.citations !== undefined && { citations: input.citations }),
      data: input.data ?? {},
    };

    const previous = this.log[this.log.length - 1]?.signature;
    const event: TraceEvent = this.options.signer
      ? { ...unsigned, signature: this.options.signer.sign(unsigned, previous) }
      : unsigned;

    this.log.push(event);
    this.options.sink?.write(event);
    this.logger.trace({ seq: event.seq, step_id: event.step_id, event_type: event.event_type }, 'trace event');
    return event;
  }

  events(): readonly TraceEvent[] {
    return this.log;
  }
}
