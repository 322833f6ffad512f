/**
 * Enrichment client: tender → generated summary.
 *
 * Wraps the summary model with:
 * - A p-limit limiter shared by every caller of this client instance, so at
 *   most `maxConcurrent` model requests run at once per process. A request
 *   that times out is aborted and keeps its slot until it settles.
 * - Retry with exponential backoff and jitter for throttling responses only.
 * - A fallback summary built from the tender itself when the model cannot
 *   produce one. `enrich` never rejects.
 *
 * @module services/enrichment
 */

import pLimit from 'p-limit';
import {
  ENRICHMENT_TIMEOUT_MS,
  MAX_CONCURRENT_ENRICHMENTS,
  MAX_ENRICHMENT_ATTEMPTS,
} from '../constants';
import { errorMessage } from '../errors';
import type { TenderMessage } from '../schemas/tender';
import { getSourceType } from '../tenders/model';
import { computeBackoffDelay, DEFAULT_BACKOFF, sleep, type BackoffPolicy } from '../utils/backoff';
import { log, logDebug, logError, logWarn } from '../utils/log';
import { TimeoutError, withTimeout } from '../utils/timeout';
import type { SummaryModel } from './bedrock';
import type { PromptStore } from './prompts';
import { buildCompactTender, buildFallbackSummary } from './summary';

// ============================================================================
// Types
// ============================================================================

/**
 * Outcome of a single model request.
 * The retry loop is driven by `status` alone.
 */
export type InvokeOutcome =
  | { readonly status: 'ok'; readonly summary: string }
  | { readonly status: 'retryable'; readonly error: unknown }
  | { readonly status: 'fatal'; readonly error: unknown };

export type EnrichmentClientOptions = {
  readonly model: SummaryModel;
  readonly prompts: Pick<PromptStore, 'getPrompt'>;
  readonly maxConcurrent?: number;
  readonly maxAttempts?: number;
  readonly timeoutMs?: number;
  readonly backoff?: BackoffPolicy;
  /** Injectable for tests; defaults to a real timer. */
  readonly sleep?: (ms: number) => Promise<void>;
  /** Injectable for tests; defaults to Math.random. */
  readonly random?: () => number;
};

export type EnrichmentClient = {
  /** Summary for the tender. Falls back instead of rejecting. */
  enrich(tender: TenderMessage): Promise<string>;
  /** Requests currently holding a limiter slot. */
  activeCount(): number;
  /** Requests waiting for a slot. */
  pendingCount(): number;
};

// ============================================================================
// Error Classification
// ============================================================================

const THROTTLING_ERROR_NAMES = new Set([
  'ThrottlingException',
  'TooManyRequestsException',
]);

function httpStatusOf(error: object): number | undefined {
  if (!('$metadata' in error)) return undefined;
  const metadata: unknown = error.$metadata;
  if (typeof metadata !== 'object' || metadata === null || !('httpStatusCode' in metadata)) {
    return undefined;
  }
  const status: unknown = metadata.httpStatusCode;
  return typeof status === 'number' ? status : undefined;
}

/**
 * True for throttling and rate-limit signals from Bedrock.
 * Everything else (validation, access denied, timeouts, bad bodies) is fatal.
 */
export function isThrottlingError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  if (THROTTLING_ERROR_NAMES.has(error.name)) return true;
  if (httpStatusOf(error) === 429) return true;
  return error.message.toLowerCase().includes('too many requests');
}

// ============================================================================
// Client
// ============================================================================

/**
 * Create an enrichment client. Build one per process and share it: the
 * limiter only bounds calls made through the same instance.
 */
export function createEnrichmentClient(options: EnrichmentClientOptions): EnrichmentClient {
  const maxAttempts = options.maxAttempts ?? MAX_ENRICHMENT_ATTEMPTS;
  const timeoutMs = options.timeoutMs ?? ENRICHMENT_TIMEOUT_MS;
  const backoff = options.backoff ?? DEFAULT_BACKOFF;
  const wait = options.sleep ?? sleep;
  const random = options.random ?? Math.random;
  const limit = pLimit(options.maxConcurrent ?? MAX_CONCURRENT_ENRICHMENTS);

  /**
   * One model request. A timed-out request is aborted, and the limiter slot
   * stays taken until it has actually settled.
   */
  async function invokeOnce(prompt: string, tenderJson: string): Promise<InvokeOutcome> {
    const controller = new AbortController();
    const request = options.model.generate(prompt, tenderJson, controller.signal);
    try {
      const summary = await withTimeout(request, timeoutMs, controller);
      return { status: 'ok', summary };
    } catch (error) {
      if (error instanceof TimeoutError) {
        await request.then(
          () => logDebug('enrichment.settled_after_timeout', { timeoutMs }),
          (abortError: unknown) =>
            logDebug('enrichment.aborted', { timeoutMs, error: errorMessage(abortError) })
        );
      }
      return isThrottlingError(error)
        ? { status: 'retryable', error }
        : { status: 'fatal', error };
    }
  }

  async function invokeWithRetry(
    prompt: string,
    tenderJson: string,
    tenderNumber: string
  ): Promise<InvokeOutcome> {
    let attempt = 0;
    for (;;) {
      attempt++;
      logDebug('enrichment.attempt', { attempt, maxAttempts, tenderNumber });

      const outcome = await invokeOnce(prompt, tenderJson);
      switch (outcome.status) {
        case 'ok':
          return outcome;
        case 'fatal':
          logError('enrichment.non_retryable', outcome.error, { attempt, tenderNumber });
          return outcome;
        case 'retryable': {
          if (attempt >= maxAttempts) {
            logError('enrichment.retries_exhausted', outcome.error, { attempt, tenderNumber });
            return outcome;
          }
          const delayMs = computeBackoffDelay(attempt, backoff, random);
          logWarn('enrichment.throttled', { attempt, maxAttempts, delayMs, tenderNumber });
          await wait(delayMs);
          break;
        }
      }
    }
  }

  async function summarize(tender: TenderMessage): Promise<string> {
    const startTime = Date.now();
    const sourceType = getSourceType(tender);
    const tenderNumber = tender.tenderNumber || 'Unknown';

    try {
      const prompt = await options.prompts.getPrompt(sourceType);
      const tenderJson = buildCompactTender(tender);
      const outcome = await invokeWithRetry(prompt, tenderJson, tenderNumber);

      if (outcome.status === 'ok') {
        log('enrichment.complete', {
          tenderNumber,
          sourceType,
          durationMs: Date.now() - startTime,
          summaryLength: outcome.summary.length,
        });
        return outcome.summary;
      }
    } catch (error) {
      logError('enrichment.failed', error, { tenderNumber, sourceType });
    }

    log('enrichment.fallback', { tenderNumber, sourceType, durationMs: Date.now() - startTime });
    return buildFallbackSummary(tender);
  }

  return {
    enrich(tender: TenderMessage): Promise<string> {
      return limit(() => summarize(tender));
    },
    activeCount(): number {
      return limit.activeCount;
    },
    pendingCount(): number {
      return limit.pendingCount;
    },
  };
}
