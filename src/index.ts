/**
 * Lambda entry point for the tender summary pipeline.
 *
 * The function is triggered by an SQS event source on the source queue.
 * Each invocation processes the delivered records, then keeps draining the
 * queue until it is empty or the time budget runs low.
 *
 * Services are built on the first invocation and reused while the Lambda
 * container stays warm, so the prompt cache and the enrichment limiter are
 * shared by every batch the process handles.
 */

import { BedrockRuntimeClient } from '@aws-sdk/client-bedrock-runtime';
import { SQSClient } from '@aws-sdk/client-sqs';
import { SSMClient } from '@aws-sdk/client-ssm';
import type { Context, SQSEvent } from 'aws-lambda';
import { loadConfig, type AppConfig } from './config';
import {
  createBatchCoordinator,
  createSqsQueueGateway,
  formatInvocationSummary,
  fromSqsRecord,
  runPollLoop,
  type BatchCoordinator,
  type QueueGateway,
} from './queue';
import { createBedrockSummaryModel, DEFAULT_MODEL_CONFIG } from './services/bedrock';
import { createEnrichmentClient } from './services/enrichment';
import { createMessageProcessor } from './services/processor';
import { createPromptStore } from './services/prompts';
import { classify } from './tenders/router';
import { log, logError } from './utils/log';

// ============================================================================
// Service Graph
// ============================================================================

export type Services = {
  readonly config: AppConfig;
  readonly gateway: QueueGateway;
  readonly coordinator: BatchCoordinator;
};

/**
 * Wire the pipeline from validated configuration.
 * SDK clients are created here but make no request until first use.
 */
export function buildServices(config: AppConfig): Services {
  const clientConfig = config.region ? { region: config.region } : {};
  const sqs = new SQSClient(clientConfig);
  const bedrock = new BedrockRuntimeClient(clientConfig);
  const ssm = new SSMClient(clientConfig);

  const gateway = createSqsQueueGateway(sqs);
  const prompts = createPromptStore(ssm, { basePath: config.enrichment.promptBasePath });
  const model = createBedrockSummaryModel(bedrock, {
    ...DEFAULT_MODEL_CONFIG,
    modelId: config.enrichment.modelId,
  });
  const enrichment = createEnrichmentClient({
    model,
    prompts,
    maxConcurrent: config.enrichment.maxConcurrent,
    timeoutMs: config.enrichment.timeoutMs,
  });
  const processor = createMessageProcessor({ enrichment, config: config.enrichment });
  const coordinator = createBatchCoordinator({
    gateway,
    classify,
    processor,
    queues: {
      sourceQueueUrl: config.sourceQueueUrl,
      writeQueueUrl: config.writeQueueUrl,
      failedQueueUrl: config.failedQueueUrl,
    },
  });

  log('startup.services_ready', {
    enrichmentEnabled: config.enrichment.enabled,
    enrichmentSources: [...config.enrichment.sources],
    maxConcurrent: config.enrichment.maxConcurrent,
    modelId: config.enrichment.modelId,
  });

  return { config, gateway, coordinator };
}

// ============================================================================
// Handler
// ============================================================================

export type SqsHandler = (event: SQSEvent, context: Pick<Context, 'getRemainingTimeInMillis' | 'awsRequestId'>) => Promise<string>;

/**
 * Build a handler around a service factory. The factory runs once, on the
 * first invocation; a ConfigError thrown there fails that invocation and the
 * next one tries again.
 */
export function createHandler(factory: () => Services): SqsHandler {
  let services: Services | undefined;

  return async (event, context) => {
    services ??= factory();
    const { config, gateway, coordinator } = services;
    const records = event.Records;

    log('invocation.start', {
      requestId: context.awsRequestId,
      records: records.length,
      remainingMs: context.getRemainingTimeInMillis(),
    });

    try {
      const summary = await runPollLoop(
        { gateway, coordinator, sourceQueueUrl: config.sourceQueueUrl },
        {
          initialItems: records.map(fromSqsRecord),
          getRemainingTimeMs: () => context.getRemainingTimeInMillis(),
        }
      );
      const result = formatInvocationSummary(summary);
      log('invocation.complete', { requestId: context.awsRequestId, ...summary });
      return result;
    } catch (error) {
      logError('invocation.failed', error, { requestId: context.awsRequestId });
      throw error;
    }
  };
}

export const handler = createHandler(() => buildServices(loadConfig()));
