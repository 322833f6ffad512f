/**
 * Poll loop: the per-invocation driver.
 *
 * Items delivered with the invocation are processed first. The loop then
 * keeps pulling batches from the source queue until a receive comes back
 * empty or the remaining time drops below the safety margin. A batch that
 * has started always finishes; the margin only stops new receives.
 *
 * @module queue/pollLoop
 */

import {
  POLL_DELAY_MS,
  RECEIVE_WAIT_TIME_SECONDS,
  SAFETY_MARGIN_MS,
  SQS_MAX_BATCH_SIZE,
} from '../constants';
import type { InvocationSummary, RawQueueItem } from '../types';
import { sleep } from '../utils/backoff';
import { log, logWarn } from '../utils/log';
import type { BatchCoordinator } from './coordinator';
import { chunk, type QueueGateway } from './gateway';
import { fromSqsMessage } from './rawItem';

export type PollLoopDeps = {
  readonly gateway: Pick<QueueGateway, 'receive'>;
  readonly coordinator: BatchCoordinator;
  readonly sourceQueueUrl: string;
  readonly safetyMarginMs?: number;
  readonly pollDelayMs?: number;
  /** Injectable for tests; defaults to a real timer. */
  readonly sleep?: (ms: number) => Promise<void>;
};

export type PollLoopInput = {
  readonly initialItems: readonly RawQueueItem[];
  /** Milliseconds left before the invocation deadline. */
  readonly getRemainingTimeMs: () => number;
};

/**
 * Invocation result line, e.g.
 * `Batches: 2, Processed: 18, Failed: 1, Deleted: 18, Duration: 5234ms`
 */
export function formatInvocationSummary(summary: InvocationSummary): string {
  return (
    `Batches: ${summary.batches}, Processed: ${summary.processed}, ` +
    `Failed: ${summary.failed}, Deleted: ${summary.deleted}, ` +
    `Duration: ${summary.durationMs}ms`
  );
}

/**
 * Drain the source queue within the invocation's time budget.
 * @throws whatever the receive call or a batch throws (DeadLetterWriteError)
 */
export async function runPollLoop(deps: PollLoopDeps, input: PollLoopInput): Promise<InvocationSummary> {
  const safetyMarginMs = deps.safetyMarginMs ?? SAFETY_MARGIN_MS;
  const pollDelayMs = deps.pollDelayMs ?? POLL_DELAY_MS;
  const wait = deps.sleep ?? sleep;
  const startTime = Date.now();

  let batches = 0;
  let processed = 0;
  let failed = 0;
  let deleted = 0;

  const runBatch = async (items: readonly RawQueueItem[]): Promise<void> => {
    const outcome = await deps.coordinator.processBatch(items);
    batches++;
    processed += outcome.processed;
    failed += outcome.failed;
    deleted += outcome.deleted;
  };

  for (const items of chunk(input.initialItems, SQS_MAX_BATCH_SIZE)) {
    await runBatch(items);
  }

  let fetches = 0;
  let drained = false;
  while (input.getRemainingTimeMs() >= safetyMarginMs) {
    if (fetches > 0) {
      await wait(pollDelayMs);
    }
    fetches++;

    const messages = await deps.gateway.receive(
      deps.sourceQueueUrl,
      SQS_MAX_BATCH_SIZE,
      RECEIVE_WAIT_TIME_SECONDS
    );
    if (messages.length === 0) {
      log('poll.queue_empty', { fetches });
      drained = true;
      break;
    }

    const items: RawQueueItem[] = [];
    for (const message of messages) {
      const item = fromSqsMessage(message);
      if (item) {
        items.push(item);
      } else {
        logWarn('poll.message_skipped', { reason: 'missing MessageId or ReceiptHandle' });
      }
    }
    if (items.length > 0) {
      await runBatch(items);
    }
  }

  if (!drained) {
    log('poll.time_budget_reached', {
      remainingMs: input.getRemainingTimeMs(),
      safetyMarginMs,
      fetches,
    });
  }

  return {
    batches,
    processed,
    failed,
    deleted,
    durationMs: Date.now() - startTime,
  };
}
