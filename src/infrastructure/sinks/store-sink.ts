import type { ChatEvent } from '../../domain/index.js';
import { eventToDocument } from '../../domain/index.js';
import type { DocumentManager } from '../store/index.js';
import type { Sink } from './sink.js';

/**
 * Sink that indexes each event as a document in the search store.
 * A rejected index request (no nodes, store error) fails the event.
 */
export class StoreSink implements Sink {
  readonly name = 'store';

  constructor(private readonly documents: DocumentManager) {}

  async log(event: ChatEvent): Promise<void> {
    await this.documents.create(eventToDocument(event));
  }
}
