import { z } from 'zod';
import {
  DEFAULT_MODEL_ID,
  DEFAULT_PROMPT_BASE_PATH,
  ENRICHMENT_TIMEOUT_MS,
  MAX_CONCURRENT_ENRICHMENTS,
} from '../constants';

const requiredUrl = (name: string) =>
  z.string({
    errorMap: () => ({ message: `${name} environment variable is required` }),
  }).trim().min(1, { message: `${name} environment variable is required` });

const positiveInt = (name: string, fallback: number) =>
  z.string()
    .trim()
    .regex(/^\d+$/, { message: `${name} must be a positive integer` })
    .transform(value => parseInt(value, 10))
    .refine(value => value > 0, { message: `${name} must be a positive integer` })
    .optional()
    .transform(value => value ?? fallback);

/**
 * Lambda environment variables. Empty strings are treated as unset for the
 * optional settings.
 */
export const EnvSchema = z.object({
  SOURCE_QUEUE_URL: requiredUrl('SOURCE_QUEUE_URL'),
  WRITE_QUEUE_URL: requiredUrl('WRITE_QUEUE_URL'),
  FAILED_QUEUE_URL: requiredUrl('FAILED_QUEUE_URL'),
  AWS_REGION: z.string().trim().min(1).optional(),
  BEDROCK_MODEL_ID: z.string().trim().min(1).optional().default(DEFAULT_MODEL_ID),
  PROMPT_BASE_PATH: z.string().trim().min(1).optional().default(DEFAULT_PROMPT_BASE_PATH),
  ENRICHMENT_ENABLED: z.string().trim().optional(),
  ENRICHMENT_SOURCES: z.string().trim().optional(),
  MAX_ENRICHMENT_CONCURRENCY: positiveInt('MAX_ENRICHMENT_CONCURRENCY', MAX_CONCURRENT_ENRICHMENTS),
  ENRICHMENT_TIMEOUT_MS: positiveInt('ENRICHMENT_TIMEOUT_MS', ENRICHMENT_TIMEOUT_MS),
});

export type EnvInput = z.input<typeof EnvSchema>;
export type ParsedEnv = z.infer<typeof EnvSchema>;
