import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { delay } from '../delay.js';

describe('delay', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves after the given time', async () => {
    let done = false;
    const pending = delay(1000).then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(999);
    expect(done).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(done).toBe(true);
  });

  it('resolves early when the signal aborts', async () => {
    const controller = new AbortController();
    const pending = delay(60000, controller.signal);

    controller.abort();

    await expect(pending).resolves.toBeUndefined();
  });

  it('returns immediately for an already aborted signal', async () => {
    await expect(delay(60000, AbortSignal.abort())).resolves.toBeUndefined();
  });
});
