import type { JsonObject } from '../../domain/index.js';
import { DoesNotExist, MultipleObjectsReturned, StoredDocument } from '../../domain/index.js';
import type { DocumentStoreClient } from './client.js';
import type { FieldEquals } from './query.js';
import { MATCH_EVERYTHING, freeTextQuery, parseQuery, serializeFragment } from './query.js';
import type { IndexTarget } from './result-set.js';
import { LazyResultSet } from './result-set.js';

/**
 * Entry point for querying and writing documents of one index/doctype.
 *
 * The client and target are injected; nothing is discovered from the
 * document type at runtime.
 */
export class DocumentManager {
  constructor(
    readonly client: DocumentStoreClient,
    readonly target: IndexTarget,
  ) {}

  filter(freeText?: string | null, fieldEquals?: FieldEquals): LazyResultSet {
    return new LazyResultSet(this.client, this.target, parseQuery(freeText, fieldEquals));
  }

  all(): LazyResultSet {
    return this.filter(MATCH_EVERYTHING);
  }

  /** The single document matching the query. */
  async get(freeText?: string | null, fieldEquals?: FieldEquals): Promise<StoredDocument> {
    const results = this.filter(freeText, fieldEquals);
    const count = await results.count();
    if (count > 1) throw new MultipleObjectsReturned(count);
    if (count < 1) throw new DoesNotExist();
    return results.at(0);
  }

  /** Indexes a document and returns it with the id the store assigned. */
  async create(doc: StoredDocument): Promise<StoredDocument> {
    const response = await this.client.index(doc.toSource(), this.target.index, this.target.doctype, doc.id);
    const id = response['_id'];
    return new StoredDocument(typeof id === 'string' ? id : doc.id, doc.entries());
  }

  delete(id: string): Promise<JsonObject> {
    return this.client.deleteById(this.target.index, this.target.doctype, id);
  }
}

/**
 * Index-level maintenance for one target. Kept apart from the manager
 * since these calls change or drop whole indices.
 */
export class IndexAdmin {
  constructor(
    private readonly client: DocumentStoreClient,
    private readonly target: IndexTarget,
  ) {}

  createIndex(mapping?: JsonObject): Promise<JsonObject> {
    return this.client.createIndex(this.target.index, mapping);
  }

  deleteIndex(): Promise<JsonObject> {
    return this.client.deleteIndex(this.target.index);
  }

  optimize(): Promise<JsonObject> {
    return this.client.optimize(this.target.index);
  }

  refresh(): Promise<JsonObject> {
    return this.client.refresh(this.target.index);
  }

  deleteByQuery(queryString: string): Promise<JsonObject> {
    return this.client.deleteByQuery(
      this.target.index,
      this.target.doctype,
      serializeFragment(freeTextQuery(queryString)),
    );
  }

  deleteAllDocuments(): Promise<JsonObject> {
    return this.deleteByQuery(MATCH_EVERYTHING);
  }
}
