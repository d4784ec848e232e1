import type { Logger } from 'pino';
import type { ChatEvent } from '../../domain/index.js';
import { formatEventLine } from '../../domain/index.js';
import type { Sink } from './sink.js';

/**
 * Write-through sink that prints each event through the process logger.
 */
export class ConsoleSink implements Sink {
  readonly name = 'console';

  constructor(private readonly logger: Logger) {}

  async log(event: ChatEvent): Promise<void> {
    this.logger.info(
      { channel: event.channel, actor: event.actor, kind: event.kind },
      formatEventLine(event),
    );
  }
}
