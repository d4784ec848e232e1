import type { ChatEvent } from '../../domain/index.js';

/**
 * A destination that records events.
 *
 * `log` resolves once the event is recorded and rejects when it was not.
 * Implementations may perform I/O.
 */
export interface Sink {
  readonly name: string;
  log(event: ChatEvent): Promise<void>;
  /** Releases files, timers or connections held by the sink. */
  close?(): Promise<void>;
}
