import type { Result } from 'neverthrow';

export interface StoredObject {
  body: AsyncIterable<Uint8Array>;
  /** Size reported by the store, when it reports one. */
  contentLength: number | undefined;
  /** Releases the underlying connection. Required whether or not the body was read to the end. */
  dispose(): void;
}

/**
 * The key does not exist. Unlike a transport failure, fetching again will not help.
 */
export class ObjectNotFoundError extends Error {
  constructor(public readonly key: string) {
    super(`Object not found: ${key}`);
    this.name = 'ObjectNotFoundError';
  }
}

/**
 * Read access to uploaded files. Transport failures surface as TransientInfrastructureError.
 */
export interface ObjectStorage {
  getObject(key: string): Promise<Result<StoredObject, Error>>;
}
