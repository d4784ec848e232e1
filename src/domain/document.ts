import { createEvent, isEventKind } from './event.js';
import type { ChatEvent } from './event.js';
import type { JsonObject, JsonValue } from './json.js';

/**
 * The closed set of value types a stored document field may hold.
 * Timestamps are written as ISO-8601 strings and come back as strings.
 */
export type FieldValue = string | number | Date | readonly string[];

/** Ordered field map of a document, keyed by field name. */
export type DocumentFields = ReadonlyMap<string, FieldValue>;

function toFieldValue(value: JsonValue): FieldValue | undefined {
  if (typeof value === 'string' || typeof value === 'number') return value;
  if (Array.isArray(value) && value.every((v): v is string => typeof v === 'string')) {
    return value;
  }
  return undefined;
}

/**
 * A document as read from or written to the store.
 *
 * Fields are read by name through typed accessors; nothing is resolved
 * through property lookup on the instance.
 */
export class StoredDocument {
  readonly id: string | null;
  private readonly fields: DocumentFields;

  constructor(id: string | null, fields: Iterable<readonly [string, FieldValue]>) {
    this.id = id;
    this.fields = new Map(fields);
  }

  /**
   * Builds a document from a hit's `_source`. Values outside the
   * supported field types (objects, booleans, nulls) are dropped.
   */
  static fromSource(id: string | null, source: JsonObject): StoredDocument {
    const entries: Array<[string, FieldValue]> = [];
    for (const [key, raw] of Object.entries(source)) {
      const value = toFieldValue(raw);
      if (value !== undefined) entries.push([key, value]);
    }
    return new StoredDocument(id, entries);
  }

  get(name: string): FieldValue | undefined {
    return this.fields.get(name);
  }

  has(name: string): boolean {
    return this.fields.has(name);
  }

  getString(name: string): string | undefined {
    const value = this.fields.get(name);
    return typeof value === 'string' ? value : undefined;
  }

  getNumber(name: string): number | undefined {
    const value = this.fields.get(name);
    return typeof value === 'number' ? value : undefined;
  }

  /** Reads a timestamp stored either as a Date, an ISO string or epoch millis. */
  getDate(name: string): Date | undefined {
    const value = this.fields.get(name);
    if (value instanceof Date) return value;
    if (typeof value === 'string' || typeof value === 'number') {
      const date = new Date(value);
      return Number.isNaN(date.getTime()) ? undefined : date;
    }
    return undefined;
  }

  entries(): IterableIterator<[string, FieldValue]> {
    return this.fields.entries();
  }

  /** JSON body to index, with dates rendered as ISO-8601. */
  toSource(): JsonObject {
    const source: JsonObject = {};
    for (const [key, value] of this.fields) {
      if (value instanceof Date) {
        source[key] = value.toISOString();
      } else if (typeof value === 'string' || typeof value === 'number') {
        source[key] = value;
      } else {
        source[key] = [...value];
      }
    }
    return source;
  }
}

/** Flattens an event into its stored form. Null fields are omitted. */
export function eventToDocument(event: ChatEvent): StoredDocument {
  const fields: Array<[string, FieldValue]> = [
    ['time', new Date(event.time)],
    ['actor', event.actor],
  ];
  if (event.channel !== null) fields.push(['channel', event.channel]);
  fields.push(['kind', event.kind]);
  if (event.payload !== null) fields.push(['payload', event.payload]);
  fields.push(['origin', event.origin]);
  return new StoredDocument(null, fields);
}

/**
 * Reads an event back out of a stored document.
 * Returns null when the document lacks a time, actor or known kind.
 */
export function documentToEvent(doc: StoredDocument): ChatEvent | null {
  const time = doc.getDate('time');
  const actor = doc.getString('actor');
  const kind = doc.getString('kind');

  if (time === undefined || actor === undefined || kind === undefined || !isEventKind(kind)) {
    return null;
  }

  return createEvent({
    time: time.getTime(),
    actor,
    channel: doc.getString('channel') ?? null,
    kind,
    payload: doc.getString('payload') ?? null,
    origin: doc.getString('origin') ?? '',
  });
}
