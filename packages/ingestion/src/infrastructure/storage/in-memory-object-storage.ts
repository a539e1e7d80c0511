import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import type { ObjectStorage, StoredObject } from '../../app/ports/object-storage.js';
import { ObjectNotFoundError } from '../../app/ports/object-storage.js';

/**
 * Object storage held in memory, for tests and local runs. Bodies are served in
 * chunks so consumers see a stream rather than one buffer.
 */
export class InMemoryObjectStorage implements ObjectStorage {
  private readonly objects = new Map<string, Buffer>();
  private readonly failures = new Map<string, Error>();
  readonly requestedKeys: string[] = [];
  readonly disposedKeys: string[] = [];

  constructor(private readonly chunkSize = 4096) {}

  put(key: string, content: Buffer | string): void {
    this.objects.set(key, typeof content === 'string' ? Buffer.from(content, 'latin1') : content);
  }

  /** The next getObject for this key fails with the given error. */
  failNext(key: string, error: Error): void {
    this.failures.set(key, error);
  }

  getObject(key: string): Promise<Result<StoredObject, Error>> {
    this.requestedKeys.push(key);

    const failure = this.failures.get(key);
    if (failure) {
      this.failures.delete(key);
      return Promise.resolve(err(failure));
    }

    const content = this.objects.get(key);
    if (!content) {
      return Promise.resolve(err(new ObjectNotFoundError(key)));
    }

    return Promise.resolve(
      ok({
        body: this.stream(content),
        contentLength: content.length,
        dispose: () => {
          this.disposedKeys.push(key);
        },
      })
    );
  }

  private async *stream(content: Buffer): AsyncGenerator<Uint8Array> {
    for (let offset = 0; offset < content.length; offset += this.chunkSize) {
      yield content.subarray(offset, offset + this.chunkSize);
      await Promise.resolve();
    }
  }
}
