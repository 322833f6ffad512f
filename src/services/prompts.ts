/**
 * Summary prompts from AWS Systems Manager Parameter Store.
 *
 * Each source has its own instructions at `<basePath><SourceType>`, and every
 * request is prefixed by the shared `<basePath>System` prompt. Values are
 * cached for the lifetime of the store: warm Lambda invocations reuse them
 * without calling SSM again.
 *
 * @module services/prompts
 */

import { GetParameterCommand, type SSMClient } from '@aws-sdk/client-ssm';
import { DEFAULT_PROMPT_BASE_PATH, SYSTEM_PROMPT_KEY } from '../constants';
import { PromptNotFoundError } from '../errors';
import { log, logDebug, logError } from '../utils/log';

type PromptStore = {
  /**
   * Combined `<System>\n\n<source>` prompt.
   * @throws PromptNotFoundError if either parameter is missing or empty
   */
  getPrompt(sourceType: string): Promise<string>;
  /** Keys currently cached. */
  cachedKeys(): string[];
};

type PromptStoreConfig = {
  readonly basePath: string;
};

const DEFAULT_CONFIG: PromptStoreConfig = {
  basePath: DEFAULT_PROMPT_BASE_PATH,
};

function createPromptStore(ssm: SSMClient, config: PromptStoreConfig = DEFAULT_CONFIG): PromptStore {
  const cache = new Map<string, string>();

  async function fetchParameter(key: string): Promise<string> {
    const cached = cache.get(key);
    if (cached !== undefined) {
      logDebug('prompts.cache.hit', { key });
      return cached;
    }

    const parameterName = `${config.basePath}${key}`;
    log('prompts.cache.miss', { key, parameterName });

    let value: string | undefined;
    try {
      const response = await ssm.send(
        new GetParameterCommand({ Name: parameterName, WithDecryption: false })
      );
      value = response.Parameter?.Value;
    } catch (error) {
      if (error instanceof Error && error.name === 'ParameterNotFound') {
        logError('prompts.fetch.not_found', error, { parameterName });
        throw new PromptNotFoundError(parameterName, { cause: error });
      }
      logError('prompts.fetch.failed', error, { parameterName });
      throw error;
    }

    if (!value) {
      logError('prompts.fetch.empty', `Parameter ${parameterName} has no value`, { parameterName });
      throw new PromptNotFoundError(parameterName);
    }

    cache.set(key, value);
    return value;
  }

  return {
    async getPrompt(sourceType: string): Promise<string> {
      if (!sourceType.trim()) {
        throw new Error('Source type cannot be empty');
      }
      const systemPrompt = await fetchParameter(SYSTEM_PROMPT_KEY);
      const sourcePrompt = await fetchParameter(sourceType);
      return `${systemPrompt}\n\n${sourcePrompt}`;
    },

    cachedKeys(): string[] {
      return [...cache.keys()];
    },
  };
}

export { createPromptStore, DEFAULT_CONFIG as DEFAULT_PROMPT_STORE_CONFIG };
export type { PromptStore, PromptStoreConfig };
