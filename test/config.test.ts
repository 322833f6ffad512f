import { describe, it, expect } from 'vitest';
import { loadConfig, parseEnrichmentSources, resolveSourceType } from '../src/config';
import { ConfigError } from '../src/errors';

const baseEnv = {
  SOURCE_QUEUE_URL: 'https://sqs.af-south-1.amazonaws.com/000000000000/source.fifo',
  WRITE_QUEUE_URL: 'https://sqs.af-south-1.amazonaws.com/000000000000/write.fifo',
  FAILED_QUEUE_URL: 'https://sqs.af-south-1.amazonaws.com/000000000000/failed.fifo',
};

describe('resolveSourceType', () => {
  it('ignores case and surrounding whitespace', () => {
    expect(resolveSourceType(' ESKOMTENDERSCRAPE ')).toBe('Eskom');
  });

  it('returns null for unknown, empty and missing keys', () => {
    expect(resolveSourceType('Unknown')).toBeNull();
    expect(resolveSourceType('')).toBeNull();
    expect(resolveSourceType(null)).toBeNull();
    expect(resolveSourceType(undefined)).toBeNull();
    expect(resolveSourceType('constructor')).toBeNull();
    expect(resolveSourceType('__proto__')).toBeNull();
  });
});

describe('parseEnrichmentSources', () => {
  it('defaults to every source', () => {
    expect([...parseEnrichmentSources(undefined)]).toEqual(['eTenders', 'Eskom', 'Transnet']);
  });

  it('parses a comma list case-insensitively', () => {
    expect([...parseEnrichmentSources('eskom, TRANSNET,')]).toEqual(['Eskom', 'Transnet']);
  });

  it('rejects unknown sources', () => {
    expect(() => parseEnrichmentSources('Eskom,Sanral')).toThrow(
      'ENRICHMENT_SOURCES contains unknown sources: Sanral'
    );
  });
});

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig(baseEnv);

    expect(config.sourceQueueUrl).toBe(baseEnv.SOURCE_QUEUE_URL);
    expect(config.writeQueueUrl).toBe(baseEnv.WRITE_QUEUE_URL);
    expect(config.failedQueueUrl).toBe(baseEnv.FAILED_QUEUE_URL);
    expect(config.region).toBeUndefined();
    expect(config.enrichment.enabled).toBe(true);
    expect([...config.enrichment.sources]).toEqual(['eTenders', 'Eskom', 'Transnet']);
    expect(config.enrichment.maxConcurrent).toBe(3);
    expect(config.enrichment.timeoutMs).toBe(60000);
    expect(config.enrichment.modelId).toBe('amazon.nova-pro-v1:0');
    expect(config.enrichment.promptBasePath).toBe('/TenderSummary/Prompts/');
  });

  it('reads optional settings', () => {
    const config = loadConfig({
      ...baseEnv,
      AWS_REGION: 'af-south-1',
      ENRICHMENT_ENABLED: 'FALSE',
      ENRICHMENT_SOURCES: 'Eskom',
      MAX_ENRICHMENT_CONCURRENCY: '5',
      ENRICHMENT_TIMEOUT_MS: '15000',
      BEDROCK_MODEL_ID: 'test-model',
      PROMPT_BASE_PATH: '/test/prompts/',
    });

    expect(config.region).toBe('af-south-1');
    expect(config.enrichment.enabled).toBe(false);
    expect([...config.enrichment.sources]).toEqual(['Eskom']);
    expect(config.enrichment.maxConcurrent).toBe(5);
    expect(config.enrichment.timeoutMs).toBe(15000);
    expect(config.enrichment.modelId).toBe('test-model');
    expect(config.enrichment.promptBasePath).toBe('/test/prompts/');
  });

  it('accepts READ_QUEUE_URL as the source queue', () => {
    const { SOURCE_QUEUE_URL: _unused, ...rest } = baseEnv;
    const config = loadConfig({ ...rest, READ_QUEUE_URL: 'https://example.com/read' });
    expect(config.sourceQueueUrl).toBe('https://example.com/read');
  });

  it('treats a blank value as missing', () => {
    expect(() => loadConfig({ ...baseEnv, WRITE_QUEUE_URL: '  ' })).toThrow(
      'Invalid configuration: WRITE_QUEUE_URL environment variable is required'
    );
  });

  it('throws ConfigError listing every missing queue', () => {
    let caught: unknown;
    try {
      loadConfig({});
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({
      issues: [
        'SOURCE_QUEUE_URL environment variable is required',
        'WRITE_QUEUE_URL environment variable is required',
        'FAILED_QUEUE_URL environment variable is required',
      ],
    });
  });

  it('rejects a non-numeric concurrency', () => {
    expect(() => loadConfig({ ...baseEnv, MAX_ENRICHMENT_CONCURRENCY: 'three' })).toThrow(
      'MAX_ENRICHMENT_CONCURRENCY must be a positive integer'
    );
  });

  it('rejects a zero timeout', () => {
    expect(() => loadConfig({ ...baseEnv, ENRICHMENT_TIMEOUT_MS: '0' })).toThrow(
      'ENRICHMENT_TIMEOUT_MS must be a positive integer'
    );
  });
});
