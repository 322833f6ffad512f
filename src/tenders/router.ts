/**
 * Message router: classification key + raw body → typed tender.
 *
 * The key picks exactly one variant schema. Unknown keys, bodies that are
 * not JSON objects, and bodies the schema rejects are all classification
 * errors; nothing is defaulted to a generic tender. Bodies are parsed with
 * lossless-json so long numeric tender numbers keep every digit.
 *
 * @module tenders/router
 */

import { isLosslessNumber, parse as parseJson } from 'lossless-json';
import type { z } from 'zod';
import { resolveSourceType } from '../config';
import { ClassificationError } from '../errors';
import {
  ETenderSchema,
  EskomTenderSchema,
  SupportingDocumentSchema,
  TransnetTenderSchema,
  type SourceType,
  type TenderMessage,
} from '../schemas/tender';
import { logDebug } from '../utils/log';
import { buildFieldLookup, canonicalizeKeys } from './fieldNames';
import { assertNever } from './model';

export type ClassifyResult =
  | { readonly ok: true; readonly message: TenderMessage }
  | { readonly ok: false; readonly error: ClassificationError };

const FIELD_LOOKUP = buildFieldLookup([
  ...Object.keys(ETenderSchema.shape),
  ...Object.keys(EskomTenderSchema.shape),
  ...Object.keys(TransnetTenderSchema.shape),
  ...Object.keys(SupportingDocumentSchema.shape),
]);

function describeIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 5)
    .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

type VariantParse =
  | { readonly success: true; readonly data: TenderMessage }
  | { readonly success: false; readonly error: z.ZodError };

function parseVariant(sourceType: SourceType, input: unknown): VariantParse {
  switch (sourceType) {
    case 'eTenders': {
      const parsed = ETenderSchema.safeParse(input);
      return parsed.success
        ? { success: true, data: { ...parsed.data, sourceType } }
        : { success: false, error: parsed.error };
    }
    case 'Eskom': {
      const parsed = EskomTenderSchema.safeParse(input);
      return parsed.success
        ? { success: true, data: { ...parsed.data, sourceType } }
        : { success: false, error: parsed.error };
    }
    case 'Transnet': {
      const parsed = TransnetTenderSchema.safeParse(input);
      return parsed.success
        ? { success: true, data: { ...parsed.data, sourceType } }
        : { success: false, error: parsed.error };
    }
    default:
      return assertNever(sourceType, 'parseVariant');
  }
}

/**
 * Classify and deserialize a raw queue message.
 *
 * @param rawBody - Message body as received
 * @param classificationKey - MessageGroupId (matched case-insensitively)
 * @returns The typed tender, or the classification error to dead-letter
 */
export function classify(rawBody: string, classificationKey: string | null | undefined): ClassifyResult {
  const sourceType = resolveSourceType(classificationKey);
  if (sourceType === null) {
    return {
      ok: false,
      error: new ClassificationError(
        `Unsupported MessageGroupId: ${classificationKey ?? 'null'}`,
        classificationKey ?? null
      ),
    };
  }

  let json: unknown;
  try {
    json = parseJson(rawBody);
  } catch (error) {
    return {
      ok: false,
      error: new ClassificationError(
        `Message body is not valid JSON for ${sourceType}`,
        classificationKey ?? null,
        { cause: error }
      ),
    };
  }

  if (typeof json !== 'object' || json === null || Array.isArray(json) || isLosslessNumber(json)) {
    return {
      ok: false,
      error: new ClassificationError(
        `Message body must be a JSON object for ${sourceType}`,
        classificationKey ?? null
      ),
    };
  }

  const parsed = parseVariant(sourceType, canonicalizeKeys(json, FIELD_LOOKUP));
  if (!parsed.success) {
    return {
      ok: false,
      error: new ClassificationError(
        `Message body does not match ${sourceType} schema: ${describeIssues(parsed.error)}`,
        classificationKey ?? null,
        { cause: parsed.error }
      ),
    };
  }

  logDebug('router.classified', { sourceType, classificationKey });
  return { ok: true, message: parsed.data };
}
