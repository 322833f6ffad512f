/**
 * Application-wide constants.
 *
 * Named constants for the limits and timings used by the poll loop, the
 * batch coordinator and the enrichment client. All durations are in
 * milliseconds unless the name says otherwise.
 */

// =============================================================================
// Queue Constants
// =============================================================================

/**
 * Maximum entries per SQS SendMessageBatch / DeleteMessageBatch call, and
 * maximum messages per ReceiveMessage call.
 */
export const SQS_MAX_BATCH_SIZE = 10;

/**
 * Long-poll wait used when pulling more work from the source queue.
 * Kept short so an empty queue ends the invocation quickly.
 */
export const RECEIVE_WAIT_TIME_SECONDS = 1;

/**
 * Pause between two receive calls on the source queue.
 */
export const POLL_DELAY_MS = 100;

/**
 * No new receive is started once the invocation has less than this much
 * time left. A batch already in progress is always allowed to finish.
 */
export const SAFETY_MARGIN_MS = 30_000;

/**
 * Classification key used when a message carries no MessageGroupId.
 * The router has no alias for it, so such messages are dead-lettered.
 */
export const UNKNOWN_CLASSIFICATION_KEY = 'Unknown';

/**
 * Value of `processedBy` on dead-letter entries.
 */
export const PROCESSED_BY = 'tender-summary-pipeline';

// =============================================================================
// Enrichment Constants
// =============================================================================

/**
 * Maximum simultaneous Bedrock calls in this process.
 */
export const MAX_CONCURRENT_ENRICHMENTS = 3;

/**
 * Total attempts (first call included) for a throttled Bedrock request.
 */
export const MAX_ENRICHMENT_ATTEMPTS = 5;

/**
 * Backoff for attempt n is BASE × 2^(n−1) × jitter, capped at MAX.
 * Sequence before jitter: 1s, 2s, 4s, 8s, 16s.
 */
export const BACKOFF_BASE_MS = 1000;
export const BACKOFF_MAX_MS = 30_000;

/**
 * Jitter multiplier bounds (±25%).
 */
export const BACKOFF_JITTER_MIN = 0.75;
export const BACKOFF_JITTER_MAX = 1.25;

/**
 * Upper bound for a single Bedrock call. A timeout is not retried.
 */
export const ENRICHMENT_TIMEOUT_MS = 60_000;

/**
 * Default Bedrock model and inference settings.
 * Low temperature keeps summaries consistent between redeliveries.
 */
export const DEFAULT_MODEL_ID = 'amazon.nova-pro-v1:0';
export const SUMMARY_MAX_TOKENS = 800;
export const SUMMARY_TEMPERATURE = 0.3;
export const SUMMARY_TOP_P = 0.9;

/**
 * Parameter Store layout for prompts: `<base><key>`.
 */
export const DEFAULT_PROMPT_BASE_PATH = '/TenderSummary/Prompts/';
export const SYSTEM_PROMPT_KEY = 'System';
