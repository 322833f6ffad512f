/**
 * Amazon Bedrock client for tender summaries.
 *
 * Calls Amazon Nova through `InvokeModel` with the combined prompt and the
 * compact tender JSON. Errors from the SDK are passed through untouched so
 * the enrichment client can tell throttling apart from everything else.
 *
 * @module services/bedrock
 */

import { InvokeModelCommand, type BedrockRuntimeClient } from '@aws-sdk/client-bedrock-runtime';
import {
  DEFAULT_MODEL_ID,
  SUMMARY_MAX_TOKENS,
  SUMMARY_TEMPERATURE,
  SUMMARY_TOP_P,
} from '../constants';
import { NovaResponseSchema } from '../schemas/external';
import { truncateForLog } from '../utils/log';

/**
 * The model returned a body without usable summary text.
 */
export class ModelResponseError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ModelResponseError';
  }
}

export interface SummaryModel {
  /**
   * Generate a summary for one tender. The request is cancelled when
   * `signal` aborts.
   * @throws the SDK error on request failure, ModelResponseError on an unusable body
   */
  generate(prompt: string, tenderJson: string, signal?: AbortSignal): Promise<string>;
}

export type BedrockModelConfig = {
  readonly modelId: string;
  readonly maxTokens: number;
  readonly temperature: number;
  readonly topP: number;
};

export const DEFAULT_MODEL_CONFIG: BedrockModelConfig = {
  modelId: DEFAULT_MODEL_ID,
  maxTokens: SUMMARY_MAX_TOKENS,
  temperature: SUMMARY_TEMPERATURE,
  topP: SUMMARY_TOP_P,
};

/**
 * Request body for Nova's messages API.
 */
export function buildNovaRequest(
  prompt: string,
  tenderJson: string,
  config: BedrockModelConfig = DEFAULT_MODEL_CONFIG
): string {
  return JSON.stringify({
    messages: [
      {
        role: 'user',
        content: [{ text: `${prompt}\n\nTender: ${tenderJson}` }],
      },
    ],
    inferenceConfig: {
      max_new_tokens: config.maxTokens,
      temperature: config.temperature,
      top_p: config.topP,
    },
  });
}

/**
 * Extract the first text block of a Nova response.
 *
 * @throws ModelResponseError if the body is not JSON, has an unexpected
 * shape, or contains no non-empty text
 */
export function parseNovaResponse(responseText: string): string {
  let json: unknown;
  try {
    json = JSON.parse(responseText);
  } catch (error) {
    throw new ModelResponseError('Model response is not valid JSON', { cause: error });
  }

  const parsed = NovaResponseSchema.safeParse(json);
  if (!parsed.success) {
    throw new ModelResponseError(
      `Unexpected model response format: ${truncateForLog(responseText, 200)}`,
      { cause: parsed.error }
    );
  }

  const text = parsed.data.output.message.content
    .map(block => block.text?.trim())
    .find((value): value is string => Boolean(value));
  if (!text) {
    throw new ModelResponseError('Model response contained no summary text');
  }
  return text;
}

/**
 * Summary model backed by Bedrock `InvokeModel`.
 */
export function createBedrockSummaryModel(
  client: BedrockRuntimeClient,
  config: BedrockModelConfig = DEFAULT_MODEL_CONFIG
): SummaryModel {
  const decoder = new TextDecoder();

  return {
    async generate(prompt: string, tenderJson: string, signal?: AbortSignal): Promise<string> {
      const response = await client.send(
        new InvokeModelCommand({
          modelId: config.modelId,
          contentType: 'application/json',
          accept: 'application/json',
          body: buildNovaRequest(prompt, tenderJson, config),
        }),
        { abortSignal: signal }
      );
      return parseNovaResponse(response.body ? decoder.decode(response.body) : '');
    },
  };
}
