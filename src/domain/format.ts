import type { ChatEvent } from './event.js';

/** Channel label used in log lines for events without a channel. */
export const SYSTEM_CHANNEL_LABEL = 'system';

/**
 * Human-readable text for an event.
 * Falls back to a phrase for the event kind when there is no payload.
 */
export function describeEvent(event: ChatEvent): string {
  if (event.payload !== null) return event.payload;

  switch (event.kind) {
    case 'JOIN':
      return `has joined ${event.channel ?? ''}`.trimEnd();
    case 'LEAVE':
      return `has left ${event.channel ?? ''}`.trimEnd();
    default:
      return '';
  }
}

/**
 * Formats an event as a single log line (no trailing newline):
 *
 *   [#channel] 2026-01-05T12:00:00.000Z :  <alice> hello
 */
export function formatEventLine(event: ChatEvent): string {
  const channel = event.channel ?? SYSTEM_CHANNEL_LABEL;
  const time = new Date(event.time).toISOString();
  return `[${channel}] ${time} :  <${event.actor}> ${describeEvent(event)}`;
}
