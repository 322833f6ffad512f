/**
 * Field name normalization for inbound tender JSON.
 *
 * Producers disagree on casing: the eTenders scraper writes `supportingDocs`,
 * the base format uses `supporting_docs`, and some feeds use PascalCase.
 * Keys are reduced to lowercase alphanumerics and mapped back to the
 * camelCase names the schemas expect.
 *
 * @module tenders/fieldNames
 */

import { isLosslessNumber } from 'lossless-json';

/**
 * Reduce a field name to lowercase alphanumerics.
 *
 * @example
 * ```typescript
 * normalizeFieldName('Supporting_Docs'); // 'supportingdocs'
 * ```
 */
export function normalizeFieldName(name: string): string {
  return name.replace(/[^a-zA-Z0-9]/g, '').toLowerCase();
}

/**
 * Build a lookup from normalized name to canonical name.
 */
export function buildFieldLookup(canonicalNames: Iterable<string>): ReadonlyMap<string, string> {
  const lookup = new Map<string, string>();
  for (const name of canonicalNames) {
    lookup.set(normalizeFieldName(name), name);
  }
  return lookup;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !isLosslessNumber(value);
}

/**
 * Recursively rename object keys to their canonical names.
 * Keys with no canonical counterpart are kept as they are (the schema
 * strips them later), except `__proto__`, which is dropped. Arrays are
 * walked element by element; LosslessNumber values are left intact.
 */
export function canonicalizeKeys(value: unknown, lookup: ReadonlyMap<string, string>): unknown {
  if (Array.isArray(value)) {
    return value.map(item => canonicalizeKeys(item, lookup));
  }
  if (!isPlainObject(value)) {
    return value;
  }

  const result: Record<string, unknown> = {};
  for (const [key, child] of Object.entries(value)) {
    const canonical = lookup.get(normalizeFieldName(key)) ?? key;
    // Assigning it would replace the prototype of `result`.
    if (canonical === '__proto__') continue;
    result[canonical] = canonicalizeKeys(child, lookup);
  }
  return result;
}
