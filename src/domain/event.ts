/**
 * Core domain types for the chat event model.
 *
 * An event is the canonical record of one occurrence on the chat network.
 * It carries no framework dependencies and is frozen on construction.
 */

export const EVENT_KINDS = [
  'CONNECT',
  'DISCONNECT',
  'JOIN',
  'LEAVE',
  'MESSAGE',
  'ACTION',
  'NICK_CHANGE',
  'IGNORE',
  'UNIGNORE',
] as const;

export type EventKind = (typeof EVENT_KINDS)[number];

/** Actor recorded for occurrences produced by the connection itself. */
export const SYSTEM_ACTOR = 'SYSTEM';

/**
 * Canonical chat event.
 *
 * `time` is milliseconds since the Unix epoch, taken from an {@link EventClock}.
 * `channel` is null for events that do not belong to a channel
 * (connection state, nick changes, the bot joining a channel).
 */
export interface ChatEvent {
  readonly time: number;
  readonly actor: string;
  readonly channel: string | null;
  readonly kind: EventKind;
  readonly payload: string | null;
  readonly origin: string;
}

export function isEventKind(value: string): value is EventKind {
  return (EVENT_KINDS as readonly string[]).includes(value);
}

export function createEvent(fields: ChatEvent): ChatEvent {
  return Object.freeze({
    time: fields.time,
    actor: fields.actor,
    channel: fields.channel,
    kind: fields.kind,
    payload: fields.payload,
    origin: fields.origin,
  });
}

/**
 * Capture clock for events.
 *
 * Never goes backwards within a process, even if the wall clock does.
 * Two events may share a timestamp.
 */
export class EventClock {
  private last = 0;

  constructor(private readonly source: () => number = Date.now) {}

  now(): number {
    const current = this.source();
    if (current > this.last) {
      this.last = current;
    }
    return this.last;
  }
}
