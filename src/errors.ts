/**
 * Error types shared across the pipeline.
 *
 * @module errors
 */

/**
 * Category written to `errorCategory` on dead-letter entries.
 * - classification: unknown key or body that does not fit the variant
 * - processing: tagging/enrichment step threw
 * - commit: success-queue write failed for the item
 */
export type ErrorCategory = 'classification' | 'processing' | 'commit';

/**
 * Missing or invalid configuration. Thrown at startup, never per message.
 */
export class ConfigError extends Error {
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super(message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * A raw message could not be mapped to a tender variant.
 */
export class ClassificationError extends Error {
  readonly classificationKey: string | null;

  constructor(message: string, classificationKey: string | null, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ClassificationError';
    this.classificationKey = classificationKey;
  }
}

/**
 * A prompt parameter is absent or empty in Parameter Store.
 */
export class PromptNotFoundError extends Error {
  readonly parameterName: string;

  constructor(parameterName: string, options?: { cause?: unknown }) {
    super(`Required prompt parameter '${parameterName}' not found in Parameter Store`, options);
    this.name = 'PromptNotFoundError';
    this.parameterName = parameterName;
  }
}

/**
 * Writing failure records to the dead-letter queue failed.
 *
 * Never caught inside the pipeline: it fails the invocation so the
 * Lambda retry policy redelivers the batch.
 */
export class DeadLetterWriteError extends Error {
  readonly failedCount: number;

  constructor(message: string, failedCount: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DeadLetterWriteError';
    this.failedCount = failedCount;
  }
}

/**
 * Error message of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
