/**
 * SQS access for the pipeline: receive, batch send and batch delete.
 *
 * Batch calls are split into chunks of at most 10 entries. Each chunk is
 * one request; a chunk whose request throws is reported as failed entries
 * so the remaining chunks still go out and callers see one per-entry
 * result for the whole call.
 *
 * @module queue/gateway
 */

import {
  DeleteMessageBatchCommand,
  ReceiveMessageCommand,
  SendMessageBatchCommand,
  type BatchResultErrorEntry,
  type Message,
  type SQSClient,
} from '@aws-sdk/client-sqs';
import { SQS_MAX_BATCH_SIZE, UNKNOWN_CLASSIFICATION_KEY } from '../constants';
import { errorMessage } from '../errors';
import type { BatchWriteResult, FailedEntry, OutgoingMessage, RawQueueItem } from '../types';
import { logDebug, logError } from '../utils/log';

// ============================================================================
// Types
// ============================================================================

export interface QueueGateway {
  /**
   * Long-poll the queue for up to `maxMessages` messages.
   * @throws the SDK error when the request fails
   */
  receive(queueUrl: string, maxMessages: number, waitTimeSeconds: number): Promise<Message[]>;

  /** Send messages, reporting the outcome of every entry by `id`. */
  sendBatch(queueUrl: string, messages: readonly OutgoingMessage[]): Promise<BatchWriteResult>;

  /** Delete items by receipt handle, reporting the outcome by messageId. */
  deleteBatch(queueUrl: string, items: readonly RawQueueItem[]): Promise<BatchWriteResult>;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Split entries into request-sized chunks.
 */
export function chunk<T>(items: readonly T[], size: number = SQS_MAX_BATCH_SIZE): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

/**
 * FIFO queue URLs end in `.fifo`; only those take group and deduplication ids.
 */
export function isFifoQueue(queueUrl: string): boolean {
  return queueUrl.endsWith('.fifo');
}

/**
 * SQS entry ids allow alphanumerics, hyphens and underscores, up to 80 chars.
 * Message ids are UUIDs, so this only bites for hand-made ids.
 */
function toEntryId(id: string): string {
  return id.replace(/[^A-Za-z0-9_-]/g, '_').slice(0, 80);
}

/**
 * FIFO group ids allow printable ASCII without spaces, up to 128 chars.
 * Classification keys come from producers, so anything else is dropped.
 */
export function toMessageGroupId(key: string): string {
  const cleaned = key.replace(/[^\x21-\x7E]/g, '').slice(0, 128);
  return cleaned || UNKNOWN_CLASSIFICATION_KEY;
}

function toFailedEntries(
  ids: readonly string[],
  byEntryId: ReadonlyMap<string, string>,
  failed: readonly BatchResultErrorEntry[] | undefined
): FailedEntry[] {
  return (failed ?? []).map(entry => {
    const entryId = entry.Id ?? '';
    return {
      id: byEntryId.get(entryId) ?? entryId,
      code: entry.Code ?? 'Unknown',
      message: entry.Message ?? 'No error message returned',
    };
  }).filter(entry => ids.includes(entry.id));
}

/**
 * Settle a chunk: ids SQS named as failed are failed, the rest succeeded.
 * An entry SQS reported neither way is counted as failed.
 */
function settleChunk(
  ids: readonly string[],
  byEntryId: ReadonlyMap<string, string>,
  successful: ReadonlyArray<{ Id?: string }> | undefined,
  failed: readonly BatchResultErrorEntry[] | undefined
): BatchWriteResult {
  const failedEntries = toFailedEntries(ids, byEntryId, failed);
  const succeededIds = new Set(
    (successful ?? []).map(entry => byEntryId.get(entry.Id ?? '') ?? entry.Id ?? '')
  );
  const failedIds = new Set(failedEntries.map(entry => entry.id));

  for (const id of ids) {
    if (!succeededIds.has(id) && !failedIds.has(id)) {
      failedEntries.push({ id, code: 'MissingResult', message: 'Entry missing from batch response' });
    }
  }

  return {
    successful: ids.filter(id => succeededIds.has(id) && !failedIds.has(id)),
    failed: failedEntries,
  };
}

function mergeResults(results: readonly BatchWriteResult[]): BatchWriteResult {
  return {
    successful: results.flatMap(result => result.successful),
    failed: results.flatMap(result => result.failed),
  };
}

// ============================================================================
// SQS Gateway
// ============================================================================

export function createSqsQueueGateway(client: SQSClient): QueueGateway {
  return {
    async receive(queueUrl, maxMessages, waitTimeSeconds) {
      const response = await client.send(
        new ReceiveMessageCommand({
          QueueUrl: queueUrl,
          MaxNumberOfMessages: Math.min(maxMessages, SQS_MAX_BATCH_SIZE),
          WaitTimeSeconds: waitTimeSeconds,
          MessageSystemAttributeNames: ['All'],
          MessageAttributeNames: ['All'],
        })
      );
      const messages = response.Messages ?? [];
      logDebug('queue.receive', { queueUrl, count: messages.length });
      return messages;
    },

    async sendBatch(queueUrl, messages) {
      const fifo = isFifoQueue(queueUrl);
      const results: BatchWriteResult[] = [];

      for (const entries of chunk(messages)) {
        const ids = entries.map(entry => entry.id);
        const byEntryId = new Map(ids.map(id => [toEntryId(id), id]));

        try {
          const response = await client.send(
            new SendMessageBatchCommand({
              QueueUrl: queueUrl,
              Entries: entries.map(entry => ({
                Id: toEntryId(entry.id),
                MessageBody: entry.body,
                ...(fifo && {
                  MessageGroupId: entry.groupId,
                  MessageDeduplicationId: entry.deduplicationId,
                }),
              })),
            })
          );
          results.push(settleChunk(ids, byEntryId, response.Successful, response.Failed));
        } catch (error) {
          logError('queue.send_batch.failed', error, { queueUrl, entries: ids.length });
          results.push({
            successful: [],
            failed: ids.map(id => ({ id, code: 'RequestFailed', message: errorMessage(error) })),
          });
        }
      }

      return mergeResults(results);
    },

    async deleteBatch(queueUrl, items) {
      const results: BatchWriteResult[] = [];

      for (const group of chunk(items)) {
        const ids = group.map(item => item.messageId);
        const byEntryId = new Map(ids.map(id => [toEntryId(id), id]));

        try {
          const response = await client.send(
            new DeleteMessageBatchCommand({
              QueueUrl: queueUrl,
              Entries: group.map(item => ({
                Id: toEntryId(item.messageId),
                ReceiptHandle: item.receiptHandle,
              })),
            })
          );
          results.push(settleChunk(ids, byEntryId, response.Successful, response.Failed));
        } catch (error) {
          logError('queue.delete_batch.failed', error, { queueUrl, entries: ids.length });
          results.push({
            successful: [],
            failed: ids.map(id => ({ id, code: 'RequestFailed', message: errorMessage(error) })),
          });
        }
      }

      return mergeResults(results);
    },
  };
}
