/**
 * Shared DynamoDB document client
 */

import { DynamoDBClient } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import { getConfig } from '../utils/config.js';
import { getLogger } from '../utils/logger.js';

let docClientInstance: DynamoDBDocumentClient | null = null;

/**
 * Get the DynamoDB Document client (auto-marshalling)
 */
export function getDocClient(): DynamoDBDocumentClient {
  if (docClientInstance === null) {
    const config = getConfig();

    getLogger().debug({ region: config.awsRegion }, 'Initializing DynamoDB document client');

    const client = new DynamoDBClient({ region: config.awsRegion });

    docClientInstance = DynamoDBDocumentClient.from(client, {
      marshallOptions: {
        convertEmptyValues: false,
        removeUndefinedValues: true,
      },
      unmarshallOptions: {
        wrapNumbers: false,
      },
    });
  }

  return docClientInstance;
}

/**
 * Query pages until `limit` items were collected or the result is exhausted
 */
export async function collectPages<T>(
  fetchPage: (startKey: Record<string, unknown> | undefined) => Promise<{
    items: T[];
    lastKey: Record<string, unknown> | undefined;
  }>,
  limit = Number.POSITIVE_INFINITY
): Promise<T[]> {
  const collected: T[] = [];
  let startKey: Record<string, unknown> | undefined;

  do {
    const page = await fetchPage(startKey);
    collected.push(...page.items);
    startKey = page.lastKey;
  } while (startKey !== undefined && collected.length < limit);

  return collected.slice(0, limit);
}

// For testing
export function resetDocClient(): void {
  docClientInstance = null;
}
