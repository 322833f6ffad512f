import type { ErrorCategory } from './errors';

export type {
  TenderMessage,
  ETenderMessage,
  EskomTenderMessage,
  TransnetTenderMessage,
  SupportingDocument,
  SourceType,
} from './schemas/tender';
export type { DeadLetterEntry } from './schemas/external';

// ============================================================================
// Queue Types
// ============================================================================

/**
 * A message as received from the source queue, before classification.
 * Owned by the batch coordinator for the duration of one batch.
 */
export type RawQueueItem = {
  readonly messageId: string;
  readonly body: string;
  readonly receiptHandle: string;
  readonly classificationKey: string;
  readonly attributes: Readonly<Record<string, string>>;
};

/**
 * One entry of an outgoing SendMessageBatch call.
 * `id` must be unique within the call; the gateway reports results by it.
 */
export type OutgoingMessage = {
  readonly id: string;
  readonly body: string;
  readonly groupId: string;
  readonly deduplicationId: string;
};

/**
 * Entry the queue rejected, with the reason SQS gave.
 */
export type FailedEntry = {
  readonly id: string;
  readonly code: string;
  readonly message: string;
};

/**
 * Per-entry outcome of a batch send or delete.
 */
export type BatchWriteResult = {
  readonly successful: readonly string[];
  readonly failed: readonly FailedEntry[];
};

// ============================================================================
// Pipeline Types
// ============================================================================

/**
 * A message that could not complete the pipeline. Written once to the
 * dead-letter queue, then discarded.
 */
export type FailureRecord = {
  readonly messageId: string;
  readonly originalMessage: string;
  readonly classificationKey: string;
  readonly errorMessage: string;
  readonly errorCategory: ErrorCategory;
  readonly processedAt: string;
};

/**
 * Counts for one batch.
 * `processed` counts items the success queue acknowledged; `deleted` counts
 * those also removed from the source queue.
 */
export type BatchOutcome = {
  readonly processed: number;
  readonly failed: number;
  readonly deleted: number;
};

/**
 * Totals for one invocation of the poll loop.
 */
export type InvocationSummary = BatchOutcome & {
  readonly batches: number;
  readonly durationMs: number;
};
