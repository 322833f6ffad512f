/**
 * Queue side of the pipeline.
 *
 * - createSqsQueueGateway: SQS receive, batch send and batch delete
 * - createBatchCoordinator: four-phase commit for one batch
 * - runPollLoop: drains the source queue within the time budget
 *
 * @module queue
 */

export { createSqsQueueGateway, isFifoQueue, type QueueGateway } from './gateway';
export { createBatchCoordinator, type BatchCoordinator } from './coordinator';
export { runPollLoop, formatInvocationSummary, type PollLoopDeps, type PollLoopInput } from './pollLoop';
export { fromSqsMessage, fromSqsRecord } from './rawItem';
