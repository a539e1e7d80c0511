import { describe, expect, it } from 'vitest';

import { ObjectNotFoundError } from '../../../app/ports/object-storage.js';
import { InMemoryObjectStorage } from '../in-memory-object-storage.js';

async function collect(body: AsyncIterable<Uint8Array>): Promise<Buffer[]> {
  const chunks: Buffer[] = [];
  for await (const chunk of body) {
    chunks.push(Buffer.from(chunk));
  }
  return chunks;
}

describe('InMemoryObjectStorage', () => {
  it('streams a stored object in chunks', async () => {
    const storage = new InMemoryObjectStorage(4);
    storage.put('uploads/a.txt', 'abcdefghij');

    const object = (await storage.getObject('uploads/a.txt'))._unsafeUnwrap();
    const chunks = await collect(object.body);

    expect(object.contentLength).toBe(10);
    expect(chunks.map((chunk) => chunk.toString('latin1'))).toEqual(['abcd', 'efgh', 'ij']);
  });

  it('reports a missing key as not found', async () => {
    const error = (await new InMemoryObjectStorage().getObject('uploads/missing.txt'))._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(ObjectNotFoundError);
    expect(error.message).toBe('Object not found: uploads/missing.txt');
  });

  it('fails once when told to', async () => {
    const storage = new InMemoryObjectStorage();
    storage.put('k', 'x');
    storage.failNext('k', new Error('socket hang up'));

    expect((await storage.getObject('k'))._unsafeUnwrapErr().message).toBe('socket hang up');
    expect((await storage.getObject('k')).isOk()).toBe(true);
    expect(storage.requestedKeys).toEqual(['k', 'k']);
  });
});
