import type { DataContext } from '@cnab-ingest/data';
import { buildNewFile, createTestDataContext } from '@cnab-ingest/data/testing';
import {
  InMemoryObjectStorage,
  IngestionOrchestrator,
  SignLookup,
  StoreBalanceService,
} from '@cnab-ingest/ingestion';
import { buildCnabFile, buildCnabLine } from '@cnab-ingest/ingestion/testing';
import { NotificationChannel, type NotificationSender } from '@cnab-ingest/notifications';
import { InMemoryQueueClient, serializeFileProcessingMessage } from '@cnab-ingest/queue';
import { ok } from 'neverthrow';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { QueueWorker } from '../queue-worker.js';

const NOW = new Date('2024-03-01T12:00:00.000Z');
const ACME = { ownerName: 'JANE', storeName: 'ACME' };

describe('QueueWorker with the ingestion pipeline', () => {
  let data: DataContext;
  let storage: InMemoryObjectStorage;
  let queue: InMemoryQueueClient;
  let send: ReturnType<typeof vi.fn>;
  let controller: AbortController;
  let worker: QueueWorker;

  async function upload(lines: string[]) {
    const file = (await data.files.create(buildNewFile()))._unsafeUnwrap();
    storage.put(file.objectKey, buildCnabFile(lines));
    queue.enqueue(
      serializeFileProcessingMessage({
        fileId: file.id,
        objectKey: file.objectKey,
        fileName: file.name,
        uploadedAt: file.uploadedAt.toISOString(),
        correlationId: `corr-${file.name}`,
      })
    );
    return file;
  }

  beforeEach(async () => {
    data = await createTestDataContext();
    storage = new InMemoryObjectStorage();
    queue = new InMemoryQueueClient('file-processing');
    controller = new AbortController();

    send = vi.fn().mockResolvedValue(ok());
    const sender: NotificationSender = { name: 'stub', send };
    const channel = new NotificationChannel(sender, new InMemoryQueueClient('notification-dlq'), {
      recipientEmail: 'ops@example.com',
      effects: { now: () => NOW },
    });
    const orchestrator = new IngestionOrchestrator(data, storage, { effects: { now: () => NOW } });
    const delay = vi.fn().mockImplementation((ms: number) => {
      if (ms === 5000) controller.abort();
      return Promise.resolve();
    });
    worker = new QueueWorker(queue, orchestrator, { notifier: channel, effects: { delay } });
  });

  afterEach(async () => {
    await data.close();
  });

  it('ingests a valid file end to end and acknowledges its message', async () => {
    const file = await upload([
      buildCnabLine({ ...ACME, typeCode: '6', amountCents: '0000050000' }),
      buildCnabLine({ ...ACME, typeCode: '1', amountCents: '0000015000' }),
      buildCnabLine({ ...ACME, typeCode: '4', amountCents: '0000030000' }),
    ]);

    await worker.run(controller.signal);

    expect((await data.files.findById(file.id))._unsafeUnwrap()?.status).toBe('Processed');
    expect(queue.size).toBe(0);

    const balances = new StoreBalanceService(data.stores, data.transactions, new SignLookup(data.transactionTypes));
    const [acme] = (await balances.listBalances())._unsafeUnwrap();
    expect(acme).toMatchObject({ name: 'ACME', ownerName: 'JANE', balance: '650.00', transactionCount: 3 });

    expect(send).toHaveBeenCalledTimes(1);
    expect(send.mock.calls[0]?.[0]).toMatchObject({
      fileId: file.id,
      notificationType: 'ProcessingCompleted',
      correlationId: `corr-${file.name}`,
      context: { status: 'Processed', details: '3 transactions across 1 stores (1 new)' },
    });
  });

  it('rejects a malformed file, persists nothing and still acknowledges', async () => {
    const file = await upload([buildCnabLine(ACME), `${buildCnabLine(ACME)}X`]);

    await worker.run(controller.signal);

    const stored = (await data.files.findById(file.id))._unsafeUnwrap();
    expect(stored?.status).toBe('Rejected');
    expect(stored?.processedAt).toEqual(NOW);
    expect((await data.transactions.countByFile(file.id))._unsafeUnwrap()).toBe(0);
    expect(queue.size).toBe(0);
    expect(send.mock.calls[0]?.[0]).toMatchObject({ notificationType: 'ProcessingFailed' });
  });

  it('reuses the store across two files', async () => {
    await upload([buildCnabLine(ACME)]);
    await upload([buildCnabLine(ACME)]);

    await worker.run(controller.signal);

    expect((await data.stores.list())._unsafeUnwrap()).toHaveLength(1);
    expect(queue.deleted).toHaveLength(2);
  });
});
