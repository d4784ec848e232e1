import type { Logger } from 'pino';
import type { ChatEvent } from '../../domain/index.js';
import { SinkFailure } from '../../domain/index.js';
import type { Sink } from './sink.js';

export const DEFAULT_FLUSH_INTERVAL_MS = 5000;

export interface BufferedSinkOptions {
  intervalMs?: number;
}

/**
 * Decorates a sink with in-memory batching.
 *
 * `log` only appends to the buffer. Every `intervalMs` the buffer is
 * swapped for an empty one and each captured event is handed to the
 * wrapped sink in order. Events the wrapped sink rejects go back into
 * the new buffer and are retried on the next flush, indefinitely and
 * without backoff: delivery is at-least-once.
 *
 * Flushes never overlap. A timer tick that lands during a flush is
 * skipped; a manual `flush()` joins the one in flight.
 */
export class BufferedSink<S extends Sink = Sink> implements Sink {
  readonly name: string;
  private buffer: ChatEvent[] = [];
  private timer: ReturnType<typeof setInterval> | null = null;
  private flushing: Promise<void> | null = null;
  private readonly intervalMs: number;

  constructor(
    readonly inner: S,
    private readonly logger: Logger,
    options: BufferedSinkOptions = {},
  ) {
    this.name = `buffered:${inner.name}`;
    this.intervalMs = options.intervalMs ?? DEFAULT_FLUSH_INTERVAL_MS;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  /** Events waiting for the next flush, oldest first. */
  pending(): readonly ChatEvent[] {
    return [...this.buffer];
  }

  async log(event: ChatEvent): Promise<void> {
    this.buffer.push(event);
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.tick(), this.intervalMs);
    this.logger.debug({ sink: this.inner.name, intervalMs: this.intervalMs }, 'Buffered sink started');
  }

  flush(): Promise<void> {
    if (this.flushing) return this.flushing;

    this.flushing = this.drain().finally(() => {
      this.flushing = null;
    });
    return this.flushing;
  }

  /** Resolves once no flush is in flight. */
  async whenIdle(): Promise<void> {
    if (this.flushing) await this.flushing;
  }

  /** Stops the timer and makes one last delivery attempt. */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    await this.whenIdle();
    await this.flush();
  }

  async close(): Promise<void> {
    await this.stop();
    await this.inner.close?.();
  }

  private tick(): void {
    if (this.flushing) {
      this.logger.debug({ sink: this.inner.name }, 'Previous flush still running, skipping tick');
      return;
    }
    void this.flush();
  }

  private async drain(): Promise<void> {
    const captured = this.buffer;
    this.buffer = [];
    if (captured.length === 0) return;

    let failed = 0;
    for (const event of captured) {
      try {
        await this.inner.log(event);
      } catch (err: unknown) {
        failed++;
        this.buffer.push(event);
        this.logger.warn(
          { err: new SinkFailure(this.inner.name, { cause: err }), channel: event.channel },
          'Buffered delivery failed, event re-queued',
        );
      }
    }

    this.logger.debug(
      { sink: this.inner.name, delivered: captured.length - failed, requeued: failed },
      'Buffer flushed',
    );
  }
}
