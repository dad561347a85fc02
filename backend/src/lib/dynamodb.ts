import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import {
  DynamoDBDocumentClient,
  GetCommand,
  PutCommand,
  type GetCommandInput,
  type PutCommandInput,
} from '@aws-sdk/lib-dynamodb';
import { config } from './config.js';

// Sessions hold optional fields; undefined ones are dropped rather than rejected
const docClient = DynamoDBDocumentClient.from(new DynamoDBClient({ region: config.region }), {
  marshallOptions: { removeUndefinedValues: true, convertEmptyValues: false },
  unmarshallOptions: { wrapNumbers: false },
});

export async function getItem(params: GetCommandInput): Promise<Record<string, unknown> | null> {
  const { Item } = await docClient.send(new GetCommand(params));
  return Item ?? null;
}

export async function putItem(params: PutCommandInput): Promise<void> {
  await docClient.send(new PutCommand(params));
}

const KEY_ATTRIBUTES = ['PK', 'SK', 'ttl'] as const;

/** Drop the table's key and expiry attributes, leaving the stored document. */
export function stripKeys(item: Record<string, unknown>): Record<string, unknown> {
  const result = { ...item };
  for (const key of KEY_ATTRIBUTES) {
    delete result[key];
  }
  return result;
}
