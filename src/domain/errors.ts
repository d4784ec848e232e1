/**
 * Error types raised across the recorder and the store client.
 */

/**
 * Base error class for all chatscribe errors.
 */
export class ChatscribeError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ChatscribeError';
  }
}

/**
 * A single store node could not be reached, timed out, or sent back
 * a body that is not a JSON object. Retried against the next node.
 */
export class TransportError extends ChatscribeError {
  constructor(
    readonly node: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(`${node}: ${message}`, options);
    this.name = 'TransportError';
  }
}

/**
 * Every node attempted for a request failed at the transport level.
 */
export class NoNodesAvailable extends ChatscribeError {
  constructor(
    readonly attempts: number,
    readonly lastError: TransportError | undefined,
  ) {
    super(
      `Tried ${attempts} node(s), all failed${lastError ? `. Last error: ${lastError.message}` : ''}`,
      { cause: lastError },
    );
    this.name = 'NoNodesAvailable';
  }
}

/**
 * The store answered with a well-formed body reporting an error.
 * Never retried against another node.
 */
export class StoreError extends ChatscribeError {
  constructor(
    message: string,
    readonly status: number,
    readonly body: unknown,
  ) {
    super(message);
    this.name = 'StoreError';
  }
}

/**
 * Malformed index or slice arguments on a result set.
 */
export class InvalidQueryUsage extends ChatscribeError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidQueryUsage';
  }
}

/**
 * A sink failed to record one event.
 */
export class SinkFailure extends ChatscribeError {
  constructor(
    readonly sink: string,
    options?: ErrorOptions,
  ) {
    super(`Sink "${sink}" failed to record event`, options);
    this.name = 'SinkFailure';
  }
}

/**
 * `DocumentManager.get` matched no document.
 */
export class DoesNotExist extends ChatscribeError {
  constructor(message = 'No document matches the query') {
    super(message);
    this.name = 'DoesNotExist';
  }
}

/**
 * `DocumentManager.get` matched more than one document.
 */
export class MultipleObjectsReturned extends ChatscribeError {
  constructor(readonly count: number) {
    super(`Expected exactly one document, query matched ${count}`);
    this.name = 'MultipleObjectsReturned';
  }
}
