import { isLosslessNumber, isSafeNumber, LosslessNumber } from 'lossless-json';
import { z } from 'zod';

/** Text field: missing or null becomes an empty string. */
const text = () => z.string().nullish().transform(value => value ?? '');

/** Date field kept as the wire string; missing becomes null. */
const dateText = () => z.string().nullish().transform(value => value ?? null);

/**
 * Tender numbers arrive as "T-2024/17" from some scrapers and as 20240017
 * from others. Both are stored as text. Bodies parsed losslessly carry
 * numbers as LosslessNumber, whose source text is kept digit for digit.
 */
export const TenderNumberSchema = z
  .union([z.string(), z.number().finite(), z.instanceof(LosslessNumber)])
  .nullish()
  .transform(value => (value === null || value === undefined ? '' : value.toString()));

/**
 * Unwrap a LosslessNumber that a double holds exactly. Anything larger
 * stays wrapped and fails the number check.
 */
function toSafeNumber(value: unknown): unknown {
  return isLosslessNumber(value) && isSafeNumber(value.value) ? Number(value.value) : value;
}

export const SupportingDocumentSchema = z.object({
  name: text(),
  url: text(),
});

const TenderBaseSchema = z.object({
  title: text(),
  description: text(),
  tenderNumber: TenderNumberSchema,
  reference: text(),
  audience: text(),
  officeLocation: text(),
  email: text(),
  address: text(),
  province: text(),
  supportingDocs: z.array(SupportingDocumentSchema).nullish().transform(value => value ?? []),
  tags: z.array(z.string()).nullish().transform(value => value ?? []),
  summary: z.string().nullish().transform(value => value ?? undefined),
});

export const ETenderSchema = TenderBaseSchema.extend({
  id: z.preprocess(toSafeNumber, z.number().int().nullish()).transform(value => value ?? 0),
  status: text(),
  datePublished: dateText(),
  dateClosing: dateText(),
  url: text(),
});

export const EskomTenderSchema = TenderBaseSchema.extend({
  source: text(),
  publishedDate: dateText(),
  closingDate: dateText(),
});

export const TransnetTenderSchema = TenderBaseSchema.extend({
  institution: text(),
  category: text(),
  tenderType: text(),
  location: text(),
  contactPerson: text(),
  source: text(),
  publishedDate: dateText(),
  closingDate: dateText(),
});

export type SupportingDocument = z.infer<typeof SupportingDocumentSchema>;

export type ETenderMessage = z.infer<typeof ETenderSchema> & { readonly sourceType: 'eTenders' };
export type EskomTenderMessage = z.infer<typeof EskomTenderSchema> & { readonly sourceType: 'Eskom' };
export type TransnetTenderMessage = z.infer<typeof TransnetTenderSchema> & { readonly sourceType: 'Transnet' };

/**
 * A classified tender. The set of variants is closed; `sourceType` is the
 * discriminant every capability switches on.
 */
export type TenderMessage = ETenderMessage | EskomTenderMessage | TransnetTenderMessage;

export type SourceType = TenderMessage['sourceType'];

export const SOURCE_TYPES: readonly SourceType[] = ['eTenders', 'Eskom', 'Transnet'];
