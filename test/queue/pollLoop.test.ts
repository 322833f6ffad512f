import { describe, it, expect, vi } from 'vitest';
import type { Message } from '@aws-sdk/client-sqs';
import { formatInvocationSummary, runPollLoop } from '../../src/queue/pollLoop';
import { DeadLetterWriteError } from '../../src/errors';
import type { BatchOutcome, RawQueueItem } from '../../src/types';
import { getRawItems } from '../factories';

const SOURCE_URL = 'https://sqs.test/source.fifo';

const sdkMessages = (count: number, offset = 0): Message[] =>
  Array.from({ length: count }, (_, i) => ({
    MessageId: `polled-${offset + i + 1}`,
    ReceiptHandle: `rh-polled-${offset + i + 1}`,
    Body: '{}',
    Attributes: { MessageGroupId: 'eskomTenderScrape' },
  }));

const setup = () => {
  const receive = vi.fn(async (): Promise<Message[]> => []);
  const processBatch = vi.fn(async (items: readonly RawQueueItem[]): Promise<BatchOutcome> => ({
    processed: items.length,
    failed: 0,
    deleted: items.length,
  }));
  const sleep = vi.fn(async (_ms: number) => {});
  const deps = {
    gateway: { receive },
    coordinator: { processBatch },
    sourceQueueUrl: SOURCE_URL,
    sleep,
  };
  return { deps, receive, processBatch, sleep };
};

describe('runPollLoop', () => {
  it('makes no fetch when less than the safety margin remains', async () => {
    const { deps, receive, processBatch } = setup();

    const summary = await runPollLoop(deps, {
      initialItems: getRawItems(3),
      getRemainingTimeMs: () => 25_000,
    });

    expect(receive).not.toHaveBeenCalled();
    expect(processBatch).toHaveBeenCalledTimes(1);
    expect(summary).toMatchObject({ batches: 1, processed: 3, failed: 0, deleted: 3 });
  });

  it('processes delivered items in batches of ten before polling', async () => {
    const { deps, receive, processBatch, sleep } = setup();

    const summary = await runPollLoop(deps, {
      initialItems: getRawItems(23),
      getRemainingTimeMs: () => 120_000,
    });

    expect(processBatch.mock.calls.map(([items]) => items.length)).toEqual([10, 10, 3]);
    expect(receive).toHaveBeenCalledTimes(1);
    expect(receive).toHaveBeenCalledWith(SOURCE_URL, 10, 1);
    expect(sleep).not.toHaveBeenCalled();
    expect(summary).toMatchObject({ batches: 3, processed: 23, deleted: 23 });
  });

  it('drains the queue until a receive returns nothing', async () => {
    const { deps, receive, processBatch, sleep } = setup();
    receive
      .mockResolvedValueOnce(sdkMessages(10))
      .mockResolvedValueOnce(sdkMessages(4, 10))
      .mockResolvedValueOnce([]);

    const summary = await runPollLoop(deps, {
      initialItems: [],
      getRemainingTimeMs: () => 120_000,
    });

    expect(receive).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[100], [100]]);
    expect(processBatch.mock.calls[1]?.[0].map(item => item.messageId)).toEqual([
      'polled-11', 'polled-12', 'polled-13', 'polled-14',
    ]);
    expect(summary).toMatchObject({ batches: 2, processed: 14, failed: 0, deleted: 14 });
  });

  it('stops fetching once the remaining time drops below the margin', async () => {
    const { deps, receive } = setup();
    receive.mockResolvedValue(sdkMessages(10));
    const getRemainingTimeMs = vi.fn().mockReturnValueOnce(60_000).mockReturnValue(29_999);

    const summary = await runPollLoop(deps, { initialItems: [], getRemainingTimeMs });

    expect(receive).toHaveBeenCalledTimes(1);
    expect(summary.batches).toBe(1);
  });

  it('fetches when exactly the safety margin remains', async () => {
    const { deps, receive } = setup();

    await runPollLoop(deps, { initialItems: [], getRemainingTimeMs: () => 30_000 });

    expect(receive).toHaveBeenCalledTimes(1);
  });

  it('skips polled messages without a receipt handle', async () => {
    const { deps, receive, processBatch } = setup();
    receive
      .mockResolvedValueOnce([{ MessageId: 'broken' }, ...sdkMessages(1)])
      .mockResolvedValueOnce([]);

    await runPollLoop(deps, { initialItems: [], getRemainingTimeMs: () => 120_000 });

    expect(processBatch.mock.calls[0]?.[0].map(item => item.messageId)).toEqual(['polled-1']);
  });

  it('propagates receive errors', async () => {
    const { deps, receive } = setup();
    receive.mockRejectedValue(new Error('AWS.SimpleQueueService.NonExistentQueue'));

    await expect(
      runPollLoop(deps, { initialItems: [], getRemainingTimeMs: () => 120_000 })
    ).rejects.toThrow('AWS.SimpleQueueService.NonExistentQueue');
  });

  it('propagates a dead-letter write failure from a batch', async () => {
    const { deps, processBatch, receive } = setup();
    processBatch.mockRejectedValue(new DeadLetterWriteError('dlq down', 1));

    await expect(
      runPollLoop(deps, { initialItems: getRawItems(2), getRemainingTimeMs: () => 120_000 })
    ).rejects.toBeInstanceOf(DeadLetterWriteError);
    expect(receive).not.toHaveBeenCalled();
  });
});

describe('formatInvocationSummary', () => {
  it('reports every count and the duration', () => {
    expect(formatInvocationSummary({
      batches: 2,
      processed: 18,
      failed: 1,
      deleted: 17,
      durationMs: 5234,
    })).toBe('Batches: 2, Processed: 18, Failed: 1, Deleted: 17, Duration: 5234ms');
  });
});
