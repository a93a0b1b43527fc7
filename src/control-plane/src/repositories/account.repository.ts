/**
 * Account repository for DynamoDB operations
 */

import { GetCommand, PutCommand, UpdateCommand } from '@aws-sdk/lib-dynamodb';
import { ConditionalCheckFailedException } from '@aws-sdk/client-dynamodb';
import { getDocClient } from './base.repository.js';
import { getConfig } from '../utils/config.js';
import { getLogger } from '../utils/logger.js';
import { InternalError, NotFoundError } from '../utils/errors.js';
import {
  type AccountModel,
  type CreateAccountInput,
  type UpdateAccountInput,
  fromDynamoItem,
  toDynamoItem,
} from '../models/account.model.js';
import type { AccountStore } from '../types/stores.js';

export class AccountRepository implements AccountStore {
  private readonly tableName: string;
  private readonly logger = getLogger().child({ repository: 'AccountRepository' });

  constructor() {
    this.tableName = getConfig().dynamodb.accountsTable;
  }

  async get(accountId: string): Promise<AccountModel | null> {
    const result = await getDocClient().send(
      new GetCommand({
        TableName: this.tableName,
        Key: { account_id: accountId },
      })
    );

    return result.Item !== undefined ? fromDynamoItem(result.Item) : null;
  }

  /**
   * Balance always starts at zero; credits arrive through ledger entries.
   */
  async create(input: CreateAccountInput): Promise<{ account: AccountModel; created: boolean }> {
    const account: AccountModel = {
      accountId: input.accountId,
      balance: 0,
      banned: false,
      isAdmin: input.isAdmin,
      adminFreeMode: null,
      discountPct: input.discountPct,
      createdAt: new Date(),
    };

    try {
      await getDocClient().send(
        new PutCommand({
          TableName: this.tableName,
          Item: toDynamoItem(account),
          ConditionExpression: 'attribute_not_exists(account_id)',
        })
      );
      this.logger.info({ accountId: account.accountId }, 'Account created');
      return { account, created: true };
    } catch (error) {
      if (error instanceof ConditionalCheckFailedException) {
        const existing = await this.get(input.accountId);
        if (existing === null) {
          throw new InternalError(`Account ${input.accountId} exists but could not be read`);
        }
        return { account: existing, created: false };
      }
      throw error;
    }
  }

  async update(accountId: string, patch: UpdateAccountInput): Promise<AccountModel> {
    const setExpressions: string[] = [];
    const removeExpressions: string[] = [];
    const values: Record<string, unknown> = {};

    if (patch.banned !== undefined) {
      setExpressions.push('banned = :banned');
      values[':banned'] = patch.banned;
    }
    if (patch.isAdmin !== undefined) {
      setExpressions.push('is_admin = :isAdmin');
      values[':isAdmin'] = patch.isAdmin;
    }
    if (patch.adminFreeMode === null) {
      removeExpressions.push('admin_free_mode');
    } else if (patch.adminFreeMode !== undefined) {
      setExpressions.push('admin_free_mode = :adminFreeMode');
      values[':adminFreeMode'] = patch.adminFreeMode;
    }
    if (patch.discountPct !== undefined) {
      setExpressions.push('discount_pct = :discountPct');
      values[':discountPct'] = patch.discountPct;
    }

    const clauses = [
      ...(setExpressions.length > 0 ? [`SET ${setExpressions.join(', ')}`] : []),
      ...(removeExpressions.length > 0 ? [`REMOVE ${removeExpressions.join(', ')}`] : []),
    ];

    try {
      const result = await getDocClient().send(
        new UpdateCommand({
          TableName: this.tableName,
          Key: { account_id: accountId },
          UpdateExpression: clauses.join(' '),
          ConditionExpression: 'attribute_exists(account_id)',
          ...(Object.keys(values).length > 0 ? { ExpressionAttributeValues: values } : {}),
          ReturnValues: 'ALL_NEW',
        })
      );

      if (result.Attributes === undefined) {
        throw new InternalError('Failed to update account');
      }

      return fromDynamoItem(result.Attributes);
    } catch (error) {
      if (error instanceof ConditionalCheckFailedException) {
        throw new NotFoundError(`Account not found: ${accountId}`);
      }
      throw error;
    }
  }
}
