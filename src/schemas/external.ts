import { z } from 'zod';

/**
 * Amazon Nova `InvokeModel` response body. Only the path to the generated
 * text is validated; everything else is ignored.
 */
export const NovaResponseSchema = z.object({
  output: z.object({
    message: z.object({
      content: z.array(
        z.object({
          text: z.string().optional(),
        }).passthrough()
      ),
    }).passthrough(),
  }).passthrough(),
}).passthrough();

/**
 * Body written to the dead-letter queue for every message that could not
 * complete the pipeline.
 */
export const DeadLetterEntrySchema = z.object({
  originalMessage: z.string(),
  classificationKey: z.string(),
  errorMessage: z.string(),
  errorCategory: z.enum(['classification', 'processing', 'commit']),
  processedBy: z.string(),
  processedAt: z.string().datetime(),
});

export type NovaResponse = z.infer<typeof NovaResponseSchema>;
export type DeadLetterEntry = z.infer<typeof DeadLetterEntrySchema>;
