export { chatCallbackSchema } from './ingest-schema.js';
export type { ChatCallback } from './ingest-schema.js';
export { EventDispatcher } from './dispatcher.js';
export { ChatEventRecorder, bareNick } from './event-recorder.js';
export type { ChatEventRecorderOptions } from './event-recorder.js';
export { CommandHandler, DEFAULT_REPLY, INVALID_QUERY_REPLY, SEARCH_FAILED_REPLY } from './commands.js';
export type { CommandHandlerOptions, RecordIgnoreChange } from './commands.js';
export { IgnoreList } from './ignore-list.js';
export { ReplyOutbox } from './replier.js';
export type { ChatReplier, ChatReply } from './replier.js';
export { searchEvents, SEARCH_FACETS } from './search-events.js';
export type { SearchEventsParams, SearchEventsResult } from './search-events.js';
