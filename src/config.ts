/**
 * Configuration for the tender summary pipeline.
 *
 * This module contains:
 * - Classification key aliases for each tender source
 * - Environment loading and validation (fatal at startup)
 */

import { EnvSchema } from './schemas/env';
import { SOURCE_TYPES, type SourceType } from './schemas/tender';
import { ConfigError } from './errors';

// ============================================================================
// Classification Aliases
// ============================================================================

/**
 * MessageGroupId values accepted for each source, lowercase.
 * Scrapers publish as `<source>tenderscrape`, the older Lambda producers as
 * `<source>lambda`.
 */
export const CLASSIFICATION_ALIASES: ReadonlyMap<string, SourceType> = new Map([
  ['etenderscrape', 'eTenders'],
  ['etenderlambda', 'eTenders'],
  ['eskomtenderscrape', 'Eskom'],
  ['eskomlambda', 'Eskom'],
  ['transnettenderscrape', 'Transnet'],
  ['transnetlambda', 'Transnet'],
]);

/**
 * Resolve a classification key to its source, ignoring case.
 *
 * @param key - MessageGroupId of the inbound message
 * @returns The source type, or null for unknown and empty keys
 */
export function resolveSourceType(key: string | null | undefined): SourceType | null {
  if (!key) return null;
  return CLASSIFICATION_ALIASES.get(key.trim().toLowerCase()) ?? null;
}

// ============================================================================
// Runtime Configuration
// ============================================================================

export type EnrichmentConfig = {
  readonly enabled: boolean;
  readonly sources: ReadonlySet<SourceType>;
  readonly maxConcurrent: number;
  readonly timeoutMs: number;
  readonly modelId: string;
  readonly promptBasePath: string;
};

export type AppConfig = {
  readonly sourceQueueUrl: string;
  readonly writeQueueUrl: string;
  readonly failedQueueUrl: string;
  readonly region: string | undefined;
  readonly enrichment: EnrichmentConfig;
};

/**
 * Parse a comma-separated list of source types (case-insensitive).
 * An empty or missing list means every source.
 */
export function parseEnrichmentSources(value: string | undefined): Set<SourceType> {
  if (!value) return new Set(SOURCE_TYPES);

  const sources = new Set<SourceType>();
  const unknown: string[] = [];
  for (const raw of value.split(',')) {
    const name = raw.trim();
    if (!name) continue;
    const match = SOURCE_TYPES.find(source => source.toLowerCase() === name.toLowerCase());
    if (match) {
      sources.add(match);
    } else {
      unknown.push(name);
    }
  }

  if (unknown.length > 0) {
    throw new ConfigError(
      `ENRICHMENT_SOURCES contains unknown sources: ${unknown.join(', ')}`,
      unknown.map(name => `unknown source '${name}'`)
    );
  }
  return sources;
}

/**
 * Build the runtime configuration from environment variables.
 *
 * Blank values are treated as unset. `READ_QUEUE_URL` is accepted as the
 * older name of `SOURCE_QUEUE_URL`.
 *
 * @param env - Environment variables (defaults to process.env)
 * @throws ConfigError if a queue URL is missing or a setting is invalid
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      cleaned[key] = value;
    }
  }
  if (cleaned.SOURCE_QUEUE_URL === undefined && cleaned.READ_QUEUE_URL !== undefined) {
    cleaned.SOURCE_QUEUE_URL = cleaned.READ_QUEUE_URL;
  }

  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => issue.message);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  const vars = parsed.data;
  return {
    sourceQueueUrl: vars.SOURCE_QUEUE_URL,
    writeQueueUrl: vars.WRITE_QUEUE_URL,
    failedQueueUrl: vars.FAILED_QUEUE_URL,
    region: vars.AWS_REGION,
    enrichment: {
      enabled: vars.ENRICHMENT_ENABLED?.toLowerCase() !== 'false',
      sources: parseEnrichmentSources(vars.ENRICHMENT_SOURCES),
      maxConcurrent: vars.MAX_ENRICHMENT_CONCURRENCY,
      timeoutMs: vars.ENRICHMENT_TIMEOUT_MS,
      modelId: vars.BEDROCK_MODEL_ID,
      promptBasePath: vars.PROMPT_BASE_PATH,
    },
  };
}
