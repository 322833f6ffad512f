/**
 * Capabilities shared by every tender variant.
 *
 * Each function switches exhaustively on `sourceType`; adding a variant to
 * the union without handling it here fails type-checking, and a value that
 * slips past the compiler throws instead of being treated as a generic
 * tender.
 *
 * @module tenders/model
 */

import type { SourceType, TenderMessage } from '../schemas/tender';

/**
 * Throw for a variant the switch does not handle.
 */
export function assertNever(value: never, context: string): never {
  throw new Error(`Unhandled tender variant in ${context}: ${JSON.stringify(value)}`);
}

/**
 * Source label used in tags, prompts and logs.
 */
export function getSourceType(message: TenderMessage): SourceType {
  return message.sourceType;
}

/**
 * MessageGroupId a tender carries when it is written back to a queue.
 * Each value resolves to the same source through the router's aliases.
 */
export function getGroupKey(message: TenderMessage): string {
  switch (message.sourceType) {
    case 'eTenders':
      return 'eTenderScrape';
    case 'Eskom':
      return 'eskomTenderScrape';
    case 'Transnet':
      return 'transnetTenderScrape';
    default:
      return assertNever(message, 'getGroupKey');
  }
}

/**
 * Wire form of a tender for the write queue: camelCase JSON of every field.
 * The discriminant stays internal; consumers route on MessageGroupId.
 */
export function serializeTenderMessage(message: TenderMessage): string {
  const { sourceType: _sourceType, ...fields } = message;
  return JSON.stringify(fields);
}
