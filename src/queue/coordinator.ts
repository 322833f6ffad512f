/**
 * Batch coordinator: runs one batch of raw queue items through the pipeline.
 *
 * Phases run in order and none is rolled back:
 * 1. Classify & process every item (concurrently, bounded by the
 *    enrichment limiter). A failing item moves to the failed set alone.
 * 2. Commit success: send processed tenders to the write queue.
 * 3. Commit failure: send failure records to the dead-letter queue.
 *    A dead-letter write failure throws DeadLetterWriteError.
 * 4. Delete from the source queue the items acknowledged in phase 2.
 *    Delete failures are logged and left for redelivery.
 *
 * @module queue/coordinator
 */

import { PROCESSED_BY } from '../constants';
import { DeadLetterWriteError, errorMessage, type ErrorCategory } from '../errors';
import type { MessageProcessor } from '../services/processor';
import { getGroupKey, serializeTenderMessage } from '../tenders/model';
import type { ClassifyResult } from '../tenders/router';
import type {
  BatchOutcome,
  DeadLetterEntry,
  FailureRecord,
  OutgoingMessage,
  RawQueueItem,
  TenderMessage,
} from '../types';
import { isoNow } from '../utils/date';
import { log, logError, logWarn } from '../utils/log';
import { toMessageGroupId, type QueueGateway } from './gateway';

// ============================================================================
// Types
// ============================================================================

type BatchCoordinatorOptions = {
  readonly gateway: QueueGateway;
  readonly classify: (rawBody: string, classificationKey: string) => ClassifyResult;
  readonly processor: MessageProcessor;
  readonly queues: {
    readonly sourceQueueUrl: string;
    readonly writeQueueUrl: string;
    readonly failedQueueUrl: string;
  };
  /** Injectable clock for processedAt timestamps. */
  readonly now?: () => number;
};

type BatchCoordinator = {
  /**
   * Run one batch (at most 10 items) through all four phases.
   * @throws DeadLetterWriteError if failure records could not be written
   */
  processBatch(items: readonly RawQueueItem[]): Promise<BatchOutcome>;
};

/**
 * Result of phase 1 for one item.
 */
type ItemResult =
  | { readonly status: 'processed'; readonly item: RawQueueItem; readonly message: TenderMessage }
  | { readonly status: 'failed'; readonly record: FailureRecord };

// ============================================================================
// Helpers
// ============================================================================

function toDeadLetterEntry(record: FailureRecord): DeadLetterEntry {
  return {
    originalMessage: record.originalMessage,
    classificationKey: record.classificationKey,
    errorMessage: record.errorMessage,
    errorCategory: record.errorCategory,
    processedBy: PROCESSED_BY,
    processedAt: record.processedAt,
  };
}

function toSuccessMessage(item: RawQueueItem, message: TenderMessage): OutgoingMessage {
  return {
    id: item.messageId,
    body: serializeTenderMessage(message),
    groupId: getGroupKey(message),
    deduplicationId: item.messageId,
  };
}

function toDeadLetterMessage(record: FailureRecord): OutgoingMessage {
  return {
    id: record.messageId,
    body: JSON.stringify(toDeadLetterEntry(record)),
    groupId: toMessageGroupId(record.classificationKey),
    deduplicationId: `${record.messageId}-dlq`,
  };
}

// ============================================================================
// Coordinator
// ============================================================================

function createBatchCoordinator(options: BatchCoordinatorOptions): BatchCoordinator {
  const { gateway, classify, processor, queues } = options;
  const now = options.now ?? Date.now;

  function failureRecord(
    item: RawQueueItem,
    originalMessage: string,
    error: unknown,
    errorCategory: ErrorCategory
  ): FailureRecord {
    return {
      messageId: item.messageId,
      originalMessage,
      classificationKey: item.classificationKey,
      errorMessage: errorMessage(error),
      errorCategory,
      processedAt: isoNow(now),
    };
  }

  async function processItem(item: RawQueueItem): Promise<ItemResult> {
    let classified: ClassifyResult;
    try {
      classified = classify(item.body, item.classificationKey);
    } catch (error) {
      logError('batch.classify.threw', error, {
        messageId: item.messageId,
        classificationKey: item.classificationKey,
      });
      return {
        status: 'failed',
        record: failureRecord(item, item.body, error, 'classification'),
      };
    }

    if (!classified.ok) {
      logWarn('batch.classify.failed', {
        messageId: item.messageId,
        classificationKey: item.classificationKey,
        error: classified.error.message,
      });
      return {
        status: 'failed',
        record: failureRecord(item, item.body, classified.error, 'classification'),
      };
    }

    try {
      const message = await processor.process(classified.message);
      return { status: 'processed', item, message };
    } catch (error) {
      logError('batch.process.failed', error, {
        messageId: item.messageId,
        classificationKey: item.classificationKey,
      });
      return {
        status: 'failed',
        record: failureRecord(item, item.body, error, 'processing'),
      };
    }
  }

  return {
    async processBatch(items: readonly RawQueueItem[]): Promise<BatchOutcome> {
      const startTime = Date.now();
      log('batch.start', { size: items.length });

      // ============================================================
      // Phase 1: Classify & process
      // ============================================================
      const results = await Promise.all(items.map(processItem));

      const failures: FailureRecord[] = [];
      const processed: Array<{ item: RawQueueItem; message: TenderMessage }> = [];
      for (const result of results) {
        if (result.status === 'processed') {
          processed.push({ item: result.item, message: result.message });
        } else {
          failures.push(result.record);
        }
      }

      // ============================================================
      // Phase 2: Commit success
      // ============================================================
      const acknowledged: RawQueueItem[] = [];
      if (processed.length > 0) {
        const outgoing = processed.map(({ item, message }) => toSuccessMessage(item, message));
        const byId = new Map(processed.map(entry => [entry.item.messageId, entry]));

        try {
          const result = await gateway.sendBatch(queues.writeQueueUrl, outgoing);

          for (const id of result.successful) {
            const entry = byId.get(id);
            if (entry) acknowledged.push(entry.item);
          }
          for (const failed of result.failed) {
            const entry = byId.get(failed.id);
            if (!entry) continue;
            logWarn('batch.commit.entry_failed', {
              messageId: failed.id,
              code: failed.code,
              error: failed.message,
            });
            failures.push(
              failureRecord(
                entry.item,
                serializeTenderMessage(entry.message),
                `Write queue rejected message: ${failed.code}: ${failed.message}`,
                'commit'
              )
            );
          }
          log('batch.commit.success', {
            sent: acknowledged.length,
            rejected: result.failed.length,
          });
        } catch (error) {
          logError('batch.commit.failed', error, { count: processed.length });
          for (const { item, message } of processed) {
            failures.push(failureRecord(item, serializeTenderMessage(message), error, 'commit'));
          }
        }
      }

      // ============================================================
      // Phase 3: Commit failure (dead-letter)
      // ============================================================
      if (failures.length > 0) {
        let rejected = 0;
        try {
          const result = await gateway.sendBatch(
            queues.failedQueueUrl,
            failures.map(toDeadLetterMessage)
          );
          rejected = result.failed.length;
          if (rejected > 0) {
            logError('batch.dead_letter.entries_failed', 'Dead-letter queue rejected entries', {
              rejected,
              entries: result.failed,
            });
          }
        } catch (error) {
          logError('batch.dead_letter.failed', error, { count: failures.length });
          throw new DeadLetterWriteError(
            `Failed to write ${failures.length} message(s) to the dead-letter queue: ${errorMessage(error)}`,
            failures.length,
            { cause: error }
          );
        }
        if (rejected > 0) {
          throw new DeadLetterWriteError(
            `Dead-letter queue rejected ${rejected} of ${failures.length} message(s)`,
            rejected
          );
        }
        log('batch.dead_letter.success', { count: failures.length });
      }

      // ============================================================
      // Phase 4: Delete acknowledged
      // ============================================================
      let deleted = 0;
      if (acknowledged.length > 0) {
        try {
          const result = await gateway.deleteBatch(queues.sourceQueueUrl, acknowledged);
          deleted = result.successful.length;
          for (const failed of result.failed) {
            logWarn('batch.delete.entry_failed', {
              messageId: failed.id,
              code: failed.code,
              error: failed.message,
            });
          }
        } catch (error) {
          for (const item of acknowledged) {
            logError('batch.delete.failed', error, { messageId: item.messageId });
          }
        }
      }

      const outcome: BatchOutcome = {
        processed: acknowledged.length,
        failed: failures.length,
        deleted,
      };
      log('batch.complete', { ...outcome, durationMs: Date.now() - startTime });
      return outcome;
    },
  };
}

export { createBatchCoordinator };
export type { BatchCoordinator, BatchCoordinatorOptions };
