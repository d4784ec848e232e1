import type { Logger } from 'pino';
import type { ChatEvent, EventKind } from '../domain/index.js';
import { EventClock, SYSTEM_ACTOR, createEvent } from '../domain/index.js';
import type { DocumentManager } from '../infrastructure/store/index.js';
import { CommandHandler } from './commands.js';
import type { EventDispatcher } from './dispatcher.js';
import { IgnoreList } from './ignore-list.js';
import type { ChatReplier } from './replier.js';

export interface ChatEventRecorderOptions {
  /** The bot's own nickname; messages sent to it are private. */
  nickname: string;
  /** Network the events were captured on, e.g. `irc.example.net:6667`. */
  origin: string;
  dispatcher: Pick<EventDispatcher, 'dispatch'>;
  log: Logger;
  ignored?: Iterable<string>;
  clock?: EventClock;
  /** Enables chat commands. Without it, addressed messages are only logged. */
  commands?: {
    search: Pick<DocumentManager, 'filter'>;
    replier: ChatReplier;
  };
}

/** `alice!alice@host.example` → `alice`. */
export function bareNick(user: string): string {
  const bang = user.indexOf('!');
  return bang === -1 ? user : user.slice(0, bang);
}

/**
 * Turns chat connection callbacks into events and hands them to the
 * dispatcher without waiting for delivery.
 */
export class ChatEventRecorder {
  readonly ignoreList: IgnoreList;
  private readonly clock: EventClock;
  private readonly commands: CommandHandler | null;
  private readonly inFlight = new Set<Promise<unknown>>();

  constructor(private readonly options: ChatEventRecorderOptions) {
    this.ignoreList = new IgnoreList(options.ignored);
    this.clock = options.clock ?? new EventClock();
    this.commands = options.commands
      ? new CommandHandler({
          nickname: options.nickname,
          search: options.commands.search,
          replier: options.commands.replier,
          ignoreList: this.ignoreList,
          log: options.log,
          record: (kind, actor, channel, target) => {
            this.record(kind, actor, channel, target);
          },
        })
      : null;
  }

  get nickname(): string {
    return this.options.nickname;
  }

  onConnect(): ChatEvent {
    return this.record('CONNECT', SYSTEM_ACTOR, null, 'CONNECTION ESTABLISHED');
  }

  onDisconnect(reason: string): ChatEvent {
    return this.record('DISCONNECT', SYSTEM_ACTOR, null, `CONNECTION LOST: ${reason}`);
  }

  /** The bot itself joined `channel`. */
  onJoin(channel: string): ChatEvent {
    return this.record('JOIN', SYSTEM_ACTOR, null, `JOINED CHANNEL (${channel})`);
  }

  /**
   * Records a channel message, then runs it through the command handler.
   * Private, ignored and bot-addressed messages are not recorded.
   * Resolves once any command reply has been sent.
   */
  async onMessage(user: string, channel: string, text: string): Promise<ChatEvent | null> {
    const actor = bareNick(user);
    const { nickname, log } = this.options;

    let event: ChatEvent | null = null;
    if (channel === nickname || this.ignoreList.has(actor) || text.startsWith(`${nickname}:`)) {
      log.debug({ actor, channel, text }, 'Message not recorded');
    } else {
      event = this.record('MESSAGE', actor, channel, text);
    }

    if (this.commands) {
      try {
        await this.commands.handle(actor, channel, text);
      } catch (err: unknown) {
        log.error({ err, actor, channel }, 'Command handling failed');
      }
    }
    return event;
  }

  onAction(user: string, channel: string, text: string): ChatEvent {
    const actor = bareNick(user);
    return this.record('ACTION', actor, channel, `* ${actor} ${text}`);
  }

  onNickChange(oldNick: string, newNick: string): ChatEvent {
    const actor = bareNick(oldNick);
    return this.record('NICK_CHANGE', actor, null, `${actor} CHANGED NICK TO ${newNick}`);
  }

  onUserJoined(user: string, channel: string): ChatEvent {
    return this.record('JOIN', bareNick(user), channel, null);
  }

  onUserLeft(user: string, channel: string): ChatEvent {
    return this.record('LEAVE', bareNick(user), channel, null);
  }

  /** Builds an event stamped with the capture clock and dispatches it. */
  record(kind: EventKind, actor: string, channel: string | null, payload: string | null): ChatEvent {
    const event = createEvent({
      time: this.clock.now(),
      actor,
      channel,
      kind,
      payload,
      origin: this.options.origin,
    });

    const delivery = this.options.dispatcher.dispatch(event).catch((err: unknown) => {
      this.options.log.error({ err, kind }, 'Event dispatch failed');
    });
    this.inFlight.add(delivery);
    void delivery.finally(() => this.inFlight.delete(delivery));

    return event;
  }

  /** Resolves once every dispatch started so far has finished. */
  async settled(): Promise<void> {
    await Promise.all([...this.inFlight]);
  }
}
