import type { Logger } from 'pino';
import type { ChatEvent } from '../domain/index.js';
import { SinkFailure } from '../domain/index.js';
import type { Sink } from '../infrastructure/sinks/index.js';

/**
 * Fans one event out to every configured sink.
 *
 * Sinks are started in configured order and run independently: a sink
 * that throws or rejects does not keep the event from the others.
 * Failures are logged and handed back to the caller.
 */
export class EventDispatcher {
  private readonly sinks: readonly Sink[];

  constructor(
    sinks: readonly Sink[],
    private readonly log: Logger,
  ) {
    this.sinks = [...sinks];
  }

  get sinkNames(): string[] {
    return this.sinks.map((sink) => sink.name);
  }

  async dispatch(event: ChatEvent): Promise<SinkFailure[]> {
    const results = await Promise.allSettled(
      this.sinks.map((sink) => Promise.resolve().then(() => sink.log(event))),
    );

    const failures: SinkFailure[] = [];
    results.forEach((result, i) => {
      if (result.status === 'fulfilled') return;
      const sink = this.sinks[i];
      const failure = new SinkFailure(sink?.name ?? 'unknown', { cause: result.reason });
      this.log.warn({ err: failure, kind: event.kind, channel: event.channel }, 'Sink failed to record event');
      failures.push(failure);
    });

    return failures;
  }

  /** Closes every sink that holds resources, in configured order. */
  async close(): Promise<void> {
    for (const sink of this.sinks) {
      try {
        await sink.close?.();
      } catch (err: unknown) {
        this.log.warn({ err, sink: sink.name }, 'Sink failed to close');
      }
    }
  }
}
