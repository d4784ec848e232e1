import type { Logger } from 'pino';

/** Port through which the bot answers on the chat network. */
export interface ChatReplier {
  say(target: string, text: string): void;
}

export interface ChatReply {
  readonly target: string;
  readonly text: string;
}

/**
 * Holds replies until the chat bridge collects them.
 * The oldest replies are dropped once `capacity` is reached.
 */
export class ReplyOutbox implements ChatReplier {
  private queue: ChatReply[] = [];

  constructor(
    private readonly log: Logger,
    private readonly capacity = 1000,
  ) {}

  get size(): number {
    return this.queue.length;
  }

  say(target: string, text: string): void {
    this.queue.push({ target, text });
    if (this.queue.length > this.capacity) {
      const dropped = this.queue.length - this.capacity;
      this.queue.splice(0, dropped);
      this.log.warn({ dropped }, 'Reply outbox full, oldest replies dropped');
    }
    this.log.debug({ target }, 'Reply queued');
  }

  /** Removes and returns every queued reply, oldest first. */
  drain(): ChatReply[] {
    const replies = this.queue;
    this.queue = [];
    return replies;
  }
}
