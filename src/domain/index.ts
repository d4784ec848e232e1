export type { ChatEvent, EventKind } from './event.js';
export { EVENT_KINDS, SYSTEM_ACTOR, EventClock, createEvent, isEventKind } from './event.js';
export type { FieldValue, DocumentFields } from './document.js';
export { StoredDocument, eventToDocument, documentToEvent } from './document.js';
export type { JsonPrimitive, JsonValue, JsonObject } from './json.js';
export { isJsonObject } from './json.js';
export { describeEvent, formatEventLine, SYSTEM_CHANNEL_LABEL } from './format.js';
export {
  ChatscribeError,
  TransportError,
  NoNodesAvailable,
  StoreError,
  InvalidQueryUsage,
  SinkFailure,
  DoesNotExist,
  MultipleObjectsReturned,
} from './errors.js';
