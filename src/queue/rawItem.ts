/**
 * Adapters from the two shapes SQS messages arrive in to RawQueueItem:
 * - SQSRecord: delivered with the Lambda event
 * - Message: pulled by the poll loop through the SDK
 *
 * @module queue/rawItem
 */

import type { Message } from '@aws-sdk/client-sqs';
import type { SQSRecord } from 'aws-lambda';
import { UNKNOWN_CLASSIFICATION_KEY } from '../constants';
import type { RawQueueItem } from '../types';

const GROUP_ID_ATTRIBUTE = 'MessageGroupId';

function definedEntries(source: Readonly<Record<string, string | undefined>> | undefined): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(source ?? {})) {
    if (value !== undefined) result[key] = value;
  }
  return result;
}

/**
 * The queue's own group id wins; producers that publish to standard queues
 * set a message attribute of the same name instead.
 */
function resolveClassificationKey(
  attributes: Readonly<Record<string, string>>,
  messageAttributeValue: string | undefined
): string {
  return attributes[GROUP_ID_ATTRIBUTE] || messageAttributeValue || UNKNOWN_CLASSIFICATION_KEY;
}

export function fromSqsRecord(record: SQSRecord): RawQueueItem {
  const attributes = definedEntries({ ...record.attributes });
  return {
    messageId: record.messageId,
    body: record.body,
    receiptHandle: record.receiptHandle,
    classificationKey: resolveClassificationKey(
      attributes,
      record.messageAttributes[GROUP_ID_ATTRIBUTE]?.stringValue
    ),
    attributes,
  };
}

/**
 * @returns null when the message lacks an id or receipt handle, which SQS
 * always sets on received messages
 */
export function fromSqsMessage(message: Message): RawQueueItem | null {
  if (!message.MessageId || !message.ReceiptHandle) return null;

  const attributes = definedEntries(message.Attributes);
  return {
    messageId: message.MessageId,
    body: message.Body ?? '',
    receiptHandle: message.ReceiptHandle,
    classificationKey: resolveClassificationKey(
      attributes,
      message.MessageAttributes?.[GROUP_ID_ATTRIBUTE]?.StringValue
    ),
    attributes,
  };
}
