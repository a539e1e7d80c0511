import { describe, expect, it } from 'vitest';

import { InMemoryQueueClient } from '../in-memory-queue-client.js';

const receiveOptions = { maxMessages: 10, visibilityTimeoutSeconds: 300, waitTimeSeconds: 0 };

describe('InMemoryQueueClient', () => {
  it('hides received messages until they are deleted', async () => {
    const queue = new InMemoryQueueClient();
    queue.enqueue('a');
    queue.enqueue('b');

    const [first] = (await queue.receive({ ...receiveOptions, maxMessages: 1 }))._unsafeUnwrap();
    expect(first?.body).toBe('a');
    expect(queue.visibleCount).toBe(1);

    await queue.delete(first ?? { body: undefined, messageId: '', receiptHandle: '', receiveCount: 0 });
    expect(queue.size).toBe(1);
    expect(queue.deleted.map((m) => m.body)).toEqual(['a']);
  });

  it('redelivers messages whose visibility expired', async () => {
    const queue = new InMemoryQueueClient();
    queue.enqueue('a');
    await queue.receive(receiveOptions);

    queue.expireInFlight();
    const [again] = (await queue.receive(receiveOptions))._unsafeUnwrap();

    expect(again?.receiveCount).toBe(2);
  });

  it('moves a message to the dead-letter queue after the maximum receive count', async () => {
    const dlq = new InMemoryQueueClient('dlq');
    const queue = new InMemoryQueueClient('main', { deadLetterQueue: dlq, maxReceiveCount: 2 });
    queue.enqueue('poison');

    await queue.receive(receiveOptions);
    queue.expireInFlight();
    await queue.receive(receiveOptions);
    queue.expireInFlight();

    expect(queue.size).toBe(0);
    expect(dlq.size).toBe(1);
  });

  it('makes released messages visible immediately', async () => {
    const queue = new InMemoryQueueClient();
    queue.enqueue('a');
    const [message] = (await queue.receive(receiveOptions))._unsafeUnwrap();

    if (message) await queue.release(message);

    expect(queue.visibleCount).toBe(1);
    expect(queue.released).toHaveLength(1);
  });

  it('fails the next call of an operation once', async () => {
    const queue = new InMemoryQueueClient();
    queue.failNext('receive', new Error('unavailable'));

    expect((await queue.receive(receiveOptions)).isErr()).toBe(true);
    expect((await queue.receive(receiveOptions)).isOk()).toBe(true);
  });
});
