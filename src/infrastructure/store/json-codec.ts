import { Worker } from 'node:worker_threads';
import type { JsonValue } from '../../domain/index.js';

/** Bodies at or above this many characters are decoded off the event loop. */
export const DEFAULT_OFFLOAD_THRESHOLD = 1024 * 1024;

/*
 * Evaluated as a CommonJS script inside the worker, so it has no
 * dependency on how the host module was compiled or loaded.
 */
const WORKER_SOURCE = `
const { parentPort } = require('node:worker_threads');
parentPort.on('message', ({ id, text }) => {
  try {
    parentPort.postMessage({ id, ok: true, value: JSON.parse(text) });
  } catch (err) {
    parentPort.postMessage({ id, ok: false, message: err instanceof Error ? err.message : String(err) });
  }
});
`;

interface WorkerReply {
  id: number;
  ok: boolean;
  value?: JsonValue;
  message?: string;
}

interface PendingDecode {
  resolve: (value: JsonValue) => void;
  reject: (err: Error) => void;
}

function isWorkerReply(value: unknown): value is WorkerReply {
  return typeof value === 'object' && value !== null
    && 'id' in value && typeof value.id === 'number'
    && 'ok' in value && typeof value.ok === 'boolean';
}

/**
 * JSON decoder for store responses.
 *
 * Small bodies are parsed inline. Large ones are posted to a single
 * lazily-started worker thread so a huge search response cannot stall
 * the event loop; the parsed value comes back as a resolved promise.
 */
export class JsonCodec {
  private worker: Worker | null = null;
  private nextId = 1;
  private readonly pending = new Map<number, PendingDecode>();

  constructor(private readonly offloadThreshold: number = DEFAULT_OFFLOAD_THRESHOLD) {}

  encode(value: JsonValue): string {
    return JSON.stringify(value);
  }

  async decode(text: string): Promise<JsonValue> {
    if (text.length < this.offloadThreshold) {
      const value: JsonValue = JSON.parse(text);
      return value;
    }
    return this.decodeOffThread(text);
  }

  /** Terminates the worker, failing any decode still in flight. */
  async close(): Promise<void> {
    const worker = this.worker;
    this.worker = null;
    if (!worker) return;
    this.failPending(new Error('JSON codec closed'));
    await worker.terminate();
  }

  private decodeOffThread(text: string): Promise<JsonValue> {
    const worker = this.ensureWorker();
    const id = this.nextId++;
    return new Promise<JsonValue>((resolve, reject) => {
      this.pending.set(id, { resolve, reject });
      worker.postMessage({ id, text });
    });
  }

  private ensureWorker(): Worker {
    if (this.worker) return this.worker;

    const worker = new Worker(WORKER_SOURCE, { eval: true });
    // an idle decoder must not keep the process alive
    worker.unref();

    worker.on('message', (reply: unknown) => {
      if (!isWorkerReply(reply)) return;
      const entry = this.pending.get(reply.id);
      if (!entry) return;
      this.pending.delete(reply.id);
      if (reply.ok && reply.value !== undefined) {
        entry.resolve(reply.value);
      } else {
        entry.reject(new SyntaxError(reply.message ?? 'Invalid JSON'));
      }
    });

    worker.on('error', (err: Error) => {
      this.worker = null;
      this.failPending(err);
    });

    this.worker = worker;
    return worker;
  }

  private failPending(err: Error): void {
    for (const entry of this.pending.values()) {
      entry.reject(err);
    }
    this.pending.clear();
  }
}
