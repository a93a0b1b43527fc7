/**
 * Price table repository
 *
 * Read-only for the control plane; `put` is used by the seeding script.
 */

import { PutCommand, QueryCommand } from '@aws-sdk/lib-dynamodb';
import { getDocClient, collectPages } from './base.repository.js';
import { getConfig } from '../utils/config.js';
import { type PriceModel, type PriceRow, fromDynamoItem, toDynamoItem } from '../models/price.model.js';
import type { PriceStore } from '../types/stores.js';

export class PriceRepository implements PriceStore {
  private readonly tableName: string;

  constructor() {
    this.tableName = getConfig().dynamodb.pricesTable;
  }

  async listForModel(modelKey: string): Promise<PriceModel[]> {
    const docClient = getDocClient();

    return collectPages(async (startKey) => {
      const result = await docClient.send(
        new QueryCommand({
          TableName: this.tableName,
          KeyConditionExpression: 'model_key = :modelKey',
          FilterExpression: 'attribute_not_exists(active) OR active = :active',
          ExpressionAttributeValues: {
            ':modelKey': modelKey,
            ':active': true,
          },
          ...(startKey !== undefined ? { ExclusiveStartKey: startKey } : {}),
        })
      );

      return {
        items: (result.Items ?? []).map((item) => fromDynamoItem(item)),
        lastKey: result.LastEvaluatedKey,
      };
    });
  }

  async put(row: PriceRow): Promise<void> {
    await getDocClient().send(
      new PutCommand({
        TableName: this.tableName,
        Item: toDynamoItem(row),
      })
    );
  }
}
