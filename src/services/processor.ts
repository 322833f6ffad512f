/**
 * Per-message processing step: tag the tender and, for sources that need
 * one, attach a generated summary.
 *
 * @module services/processor
 */

import type { EnrichmentConfig } from '../config';
import type { TenderMessage } from '../schemas/tender';
import { getSourceType } from '../tenders/model';
import { logDebug } from '../utils/log';
import type { EnrichmentClient } from './enrichment';

export const PROCESSED_TAG = 'Processed';

type MessageProcessor = {
  /**
   * Return a processed copy of the tender. The input is left untouched.
   */
  process(message: TenderMessage): Promise<TenderMessage>;
};

type MessageProcessorOptions = {
  readonly enrichment: Pick<EnrichmentClient, 'enrich'>;
  readonly config: Pick<EnrichmentConfig, 'enabled' | 'sources'>;
};

/**
 * Tag added by the handler for each source, e.g. `ProcessedByEskomHandler`.
 */
function handlerTag(message: TenderMessage): string {
  return `ProcessedBy${getSourceType(message)}Handler`;
}

function createMessageProcessor(options: MessageProcessorOptions): MessageProcessor {
  const { enrichment, config } = options;

  return {
    async process(message: TenderMessage): Promise<TenderMessage> {
      const sourceType = getSourceType(message);
      const tagged: TenderMessage = {
        ...message,
        tags: [...message.tags, PROCESSED_TAG, handlerTag(message)],
      };

      if (!config.enabled || !config.sources.has(sourceType)) {
        logDebug('processor.enrichment_skipped', {
          sourceType,
          enabled: config.enabled,
          tenderNumber: message.tenderNumber,
        });
        return tagged;
      }

      const summary = await enrichment.enrich(tagged);
      return { ...tagged, summary };
    },
  };
}

export { createMessageProcessor };
export type { MessageProcessor, MessageProcessorOptions };
