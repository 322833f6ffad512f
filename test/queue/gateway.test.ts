import { describe, it, expect, vi } from 'vitest';
import type { SQSClient } from '@aws-sdk/client-sqs';
import { chunk, createSqsQueueGateway, isFifoQueue, toMessageGroupId } from '../../src/queue/gateway';
import type { OutgoingMessage } from '../../src/types';
import { getRawItems } from '../factories';

const FIFO_URL = 'https://sqs.af-south-1.amazonaws.com/000000000000/write.fifo';
const STANDARD_URL = 'https://sqs.af-south-1.amazonaws.com/000000000000/write';

type Entry = { Id: string };
type SentCommand = { input: { QueueUrl: string; Entries: Entry[] } & Record<string, unknown> };

/**
 * SQS stand-in that accepts every entry except the ids in `rejectIds`.
 */
const getMockSqs = (rejectIds: string[] = []) => {
  const send = vi.fn(async (command: SentCommand) => ({
    Successful: command.input.Entries
      .filter(entry => !rejectIds.includes(entry.Id))
      .map(entry => ({ Id: entry.Id })),
    Failed: command.input.Entries
      .filter(entry => rejectIds.includes(entry.Id))
      .map(entry => ({ Id: entry.Id, SenderFault: false, Code: 'InternalError', Message: 'try later' })),
  }));
  return { client: { send } as unknown as SQSClient, send };
};

const outgoing = (count: number): OutgoingMessage[] =>
  Array.from({ length: count }, (_, i) => ({
    id: `m${i + 1}`,
    body: `{"n":${i + 1}}`,
    groupId: 'eskomTenderScrape',
    deduplicationId: `m${i + 1}`,
  }));

describe('chunk', () => {
  it('splits into groups of at most ten', () => {
    expect(chunk(Array.from({ length: 23 }, (_, i) => i)).map(group => group.length)).toEqual([10, 10, 3]);
    expect(chunk([])).toEqual([]);
  });
});

describe('isFifoQueue', () => {
  it('detects the .fifo suffix', () => {
    expect(isFifoQueue(FIFO_URL)).toBe(true);
    expect(isFifoQueue(STANDARD_URL)).toBe(false);
  });
});

describe('toMessageGroupId', () => {
  it('keeps a valid key as it is', () => {
    expect(toMessageGroupId('EskomTenderScrape')).toBe('EskomTenderScrape');
    expect(toMessageGroupId('a-b_c.d:e/f')).toBe('a-b_c.d:e/f');
  });

  it('drops spaces, control and non-ASCII characters', () => {
    expect(toMessageGroupId(' eskom tender\tscrapé ')).toBe('eskomtenderscrap');
  });

  it('truncates to 128 characters', () => {
    expect(toMessageGroupId('k'.repeat(200))).toBe('k'.repeat(128));
  });

  it('falls back to Unknown when nothing valid is left', () => {
    expect(toMessageGroupId('')).toBe('Unknown');
    expect(toMessageGroupId('   ')).toBe('Unknown');
  });
});

describe('createSqsQueueGateway', () => {
  describe('sendBatch', () => {
    it('sends at most ten entries per request', async () => {
      const { client, send } = getMockSqs();
      const gateway = createSqsQueueGateway(client);

      const result = await gateway.sendBatch(STANDARD_URL, outgoing(23));

      expect(send).toHaveBeenCalledTimes(3);
      expect(send.mock.calls.map(([command]) => command.input.Entries.length)).toEqual([10, 10, 3]);
      expect(result.successful).toHaveLength(23);
      expect(result.failed).toEqual([]);
    });

    it('sets group and deduplication ids on FIFO queues', async () => {
      const { client, send } = getMockSqs();
      const gateway = createSqsQueueGateway(client);

      await gateway.sendBatch(FIFO_URL, outgoing(1));

      expect(send.mock.calls[0]?.[0].input).toEqual({
        QueueUrl: FIFO_URL,
        Entries: [{
          Id: 'm1',
          MessageBody: '{"n":1}',
          MessageGroupId: 'eskomTenderScrape',
          MessageDeduplicationId: 'm1',
        }],
      });
    });

    it('omits group and deduplication ids on standard queues', async () => {
      const { client, send } = getMockSqs();
      const gateway = createSqsQueueGateway(client);

      await gateway.sendBatch(STANDARD_URL, outgoing(1));

      expect(send.mock.calls[0]?.[0].input.Entries).toEqual([{ Id: 'm1', MessageBody: '{"n":1}' }]);
    });

    it('reports entries SQS rejected', async () => {
      const { client } = getMockSqs(['m2']);
      const gateway = createSqsQueueGateway(client);

      const result = await gateway.sendBatch(STANDARD_URL, outgoing(3));

      expect(result.successful).toEqual(['m1', 'm3']);
      expect(result.failed).toEqual([{ id: 'm2', code: 'InternalError', message: 'try later' }]);
    });

    it('reports every entry of a request that threw and sends the next chunk', async () => {
      const { client, send } = getMockSqs();
      send.mockRejectedValueOnce(new Error('socket hang up'));
      const gateway = createSqsQueueGateway(client);

      const result = await gateway.sendBatch(STANDARD_URL, outgoing(12));

      expect(send).toHaveBeenCalledTimes(2);
      expect(result.successful).toEqual(['m11', 'm12']);
      expect(result.failed).toHaveLength(10);
      expect(result.failed[0]).toEqual({ id: 'm1', code: 'RequestFailed', message: 'socket hang up' });
    });

    it('counts an entry missing from the response as failed', async () => {
      const send = vi.fn().mockResolvedValue({ Successful: [{ Id: 'm1' }] });
      const gateway = createSqsQueueGateway({ send } as unknown as SQSClient);

      const result = await gateway.sendBatch(STANDARD_URL, outgoing(2));

      expect(result.successful).toEqual(['m1']);
      expect(result.failed).toEqual([
        { id: 'm2', code: 'MissingResult', message: 'Entry missing from batch response' },
      ]);
    });

    it('maps sanitized entry ids back to the caller ids', async () => {
      const { client, send } = getMockSqs();
      const gateway = createSqsQueueGateway(client);

      const result = await gateway.sendBatch(STANDARD_URL, [
        { id: 'a.b:c', body: '{}', groupId: 'g', deduplicationId: 'd' },
      ]);

      expect(send.mock.calls[0]?.[0].input.Entries[0]?.Id).toBe('a_b_c');
      expect(result.successful).toEqual(['a.b:c']);
    });
  });

  describe('deleteBatch', () => {
    it('deletes by receipt handle and reports by message id', async () => {
      const { client, send } = getMockSqs(['msg-2']);
      const gateway = createSqsQueueGateway(client);

      const result = await gateway.deleteBatch(STANDARD_URL, getRawItems(3));

      expect(send.mock.calls[0]?.[0].input).toEqual({
        QueueUrl: STANDARD_URL,
        Entries: [
          { Id: 'msg-1', ReceiptHandle: 'rh-msg-1' },
          { Id: 'msg-2', ReceiptHandle: 'rh-msg-2' },
          { Id: 'msg-3', ReceiptHandle: 'rh-msg-3' },
        ],
      });
      expect(result.successful).toEqual(['msg-1', 'msg-3']);
      expect(result.failed).toEqual([{ id: 'msg-2', code: 'InternalError', message: 'try later' }]);
    });

    it('reports a thrown request as failed entries', async () => {
      const send = vi.fn().mockRejectedValue(new Error('expired'));
      const gateway = createSqsQueueGateway({ send } as unknown as SQSClient);

      const result = await gateway.deleteBatch(STANDARD_URL, getRawItems(2));

      expect(result.successful).toEqual([]);
      expect(result.failed.map(entry => entry.id)).toEqual(['msg-1', 'msg-2']);
    });
  });

  describe('receive', () => {
    it('requests all attributes and returns the messages', async () => {
      const messages = [{ MessageId: 'a', ReceiptHandle: 'rh', Body: '{}' }];
      const send = vi.fn().mockResolvedValue({ Messages: messages });
      const gateway = createSqsQueueGateway({ send } as unknown as SQSClient);

      await expect(gateway.receive(STANDARD_URL, 10, 1)).resolves.toEqual(messages);
      expect(send.mock.calls[0]?.[0].input).toEqual({
        QueueUrl: STANDARD_URL,
        MaxNumberOfMessages: 10,
        WaitTimeSeconds: 1,
        MessageSystemAttributeNames: ['All'],
        MessageAttributeNames: ['All'],
      });
    });

    it('returns an empty list when no messages are available', async () => {
      const send = vi.fn().mockResolvedValue({});
      const gateway = createSqsQueueGateway({ send } as unknown as SQSClient);

      await expect(gateway.receive(STANDARD_URL, 10, 1)).resolves.toEqual([]);
    });

    it('propagates receive errors', async () => {
      const send = vi.fn().mockRejectedValue(new Error('AccessDenied'));
      const gateway = createSqsQueueGateway({ send } as unknown as SQSClient);

      await expect(gateway.receive(STANDARD_URL, 10, 1)).rejects.toThrow('AccessDenied');
    });
  });
});
