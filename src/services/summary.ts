/**
 * Tender projections used by the enrichment client.
 *
 * - buildCompactTender: the JSON handed to the model. Only non-empty fields
 *   are included, under short keys, to keep requests small.
 * - buildFallbackSummary: the summary used when the model cannot be
 *   reached. It only restates fields already on the tender.
 *
 * @module services/summary
 */

import type { SupportingDocument, TenderMessage } from '../schemas/tender';
import { assertNever, getSourceType } from '../tenders/model';
import { formatDateTime } from '../utils/date';

export const FALLBACK_HEADER = '**AUTOMATED SUMMARY (Fallback)**';
export const FALLBACK_FOOTER = '*AI summary unavailable due to service limitations - manual review required*';

type CompactTender = Record<string, string | number | ReadonlyArray<{ name: string; url: string }>>;

function putText(target: CompactTender, key: string, value: string): void {
  if (value) target[key] = value;
}

function putDate(target: CompactTender, key: string, value: string | null): void {
  const formatted = formatDateTime(value);
  if (formatted) target[key] = formatted;
}

function compactDocs(docs: readonly SupportingDocument[]): Array<{ name: string; url: string }> {
  return docs.map(doc => ({ name: doc.name, url: doc.url }));
}

/**
 * Compact JSON projection of a tender for the summary request.
 *
 * @example
 * ```typescript
 * buildCompactTender(eskomTender);
 * // '{"number":"E-17","title":"Boiler spares","source":"Eskom","closing":"2025-03-01 10:00"}'
 * ```
 */
export function buildCompactTender(tender: TenderMessage): string {
  const compact: CompactTender = {};

  putText(compact, 'number', tender.tenderNumber);
  putText(compact, 'title', tender.title);
  putText(compact, 'description', tender.description);
  putText(compact, 'reference', tender.reference);
  putText(compact, 'audience', tender.audience);
  putText(compact, 'office', tender.officeLocation);
  putText(compact, 'address', tender.address);
  putText(compact, 'province', tender.province);
  putText(compact, 'email', tender.email);
  compact.source = getSourceType(tender);

  if (tender.supportingDocs.length > 0) {
    compact.docs = compactDocs(tender.supportingDocs);
  }

  switch (tender.sourceType) {
    case 'eTenders':
      if (tender.id > 0) compact.id = tender.id;
      putText(compact, 'status', tender.status);
      putText(compact, 'url', tender.url);
      putDate(compact, 'published', tender.datePublished);
      putDate(compact, 'closing', tender.dateClosing);
      break;
    case 'Transnet':
      putText(compact, 'institution', tender.institution);
      putText(compact, 'category', tender.category);
      putText(compact, 'type', tender.tenderType);
      putText(compact, 'location', tender.location);
      putText(compact, 'contact', tender.contactPerson);
      putText(compact, 'sourceDetail', tender.source);
      putDate(compact, 'published', tender.publishedDate);
      putDate(compact, 'closing', tender.closingDate);
      break;
    case 'Eskom':
      putText(compact, 'sourceDetail', tender.source);
      putDate(compact, 'published', tender.publishedDate);
      putDate(compact, 'closing', tender.closingDate);
      break;
    default:
      return assertNever(tender, 'buildCompactTender');
  }

  return JSON.stringify(compact);
}

/**
 * Deterministic summary for a tender the model could not summarize.
 * Always non-empty: the header and footer lines are unconditional.
 */
export function buildFallbackSummary(tender: TenderMessage): string {
  const lines: string[] = [FALLBACK_HEADER];
  const add = (label: string, value: string | null | undefined): void => {
    if (value) lines.push(`**${label}:** ${value}`);
  };

  add('Tender', tender.title);
  add('Number', tender.tenderNumber);
  add('Source', getSourceType(tender));
  add('Purpose', tender.description);

  switch (tender.sourceType) {
    case 'eTenders':
      add('Status', tender.status);
      add('Closing', formatDateTime(tender.dateClosing));
      add('URL', tender.url);
      break;
    case 'Transnet':
      add('Institution', tender.institution);
      add('Category', tender.category);
      add('Location', tender.location);
      add('Contact', tender.contactPerson);
      add('Closing', formatDateTime(tender.closingDate));
      break;
    case 'Eskom':
      add('Source Detail', tender.source);
      add('Closing', formatDateTime(tender.closingDate));
      break;
    default:
      return assertNever(tender, 'buildFallbackSummary');
  }

  add('Email', tender.email);
  add('Location', `${tender.officeLocation} ${tender.province}`.trim());
  if (tender.supportingDocs.length > 0) {
    add('Documents', `${tender.supportingDocs.length} available`);
  }

  lines.push(FALLBACK_FOOTER);
  return lines.join('\n');
}
