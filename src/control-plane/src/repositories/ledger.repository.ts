/**
 * Credit ledger repository
 *
 * Entries are append-only. The account's cached balance moves in the same
 * DynamoDB transaction as the entry insert, so `balance_millis` always
 * equals the sum of the account's entries.
 */

import {
  GetCommand,
  QueryCommand,
  TransactWriteCommand,
  type TransactWriteCommandInput,
} from '@aws-sdk/lib-dynamodb';
import { TransactionCanceledException } from '@aws-sdk/client-dynamodb';
import { v4 as uuidv4 } from 'uuid';
import { getDocClient, collectPages } from './base.repository.js';
import { getConfig } from '../utils/config.js';
import { getLogger } from '../utils/logger.js';
import { InsufficientCreditsError, InternalError, NotFoundError, ValidationError } from '../utils/errors.js';
import {
  type LedgerEntryModel,
  buildEntryId,
  fromDynamoItem,
  toDynamoItem,
} from '../models/ledger.model.js';
import { LedgerReason, type PostLedgerEntryInput } from '../types/ledger.js';
import type { LedgerStore, PostLedgerResult } from '../types/stores.js';

const DAY_MS = 24 * 60 * 60 * 1000;

type TransactItem = NonNullable<TransactWriteCommandInput['TransactItems']>[number];

export class LedgerRepository implements LedgerStore {
  private readonly ledgerTable: string;
  private readonly idempotencyTable: string;
  private readonly accountsTable: string;
  private readonly logger = getLogger().child({ repository: 'LedgerRepository' });

  constructor() {
    const { dynamodb } = getConfig();
    this.ledgerTable = dynamodb.ledgerTable;
    this.idempotencyTable = dynamodb.idempotencyTable;
    this.accountsTable = dynamodb.accountsTable;
  }

  async post(input: PostLedgerEntryInput): Promise<PostLedgerResult> {
    if (!Number.isSafeInteger(input.delta)) {
      throw new ValidationError('Ledger delta must be an integer amount of millicredits', {
        delta: input.delta,
      });
    }

    const createdAt = new Date();
    const entry: LedgerEntryModel = {
      entryId: buildEntryId(createdAt, uuidv4()),
      accountId: input.accountId,
      delta: input.delta,
      reason: input.reason,
      metadata: input.metadata ?? {},
      idempotencyKey: input.idempotencyKey ?? null,
      createdAt,
    };

    const guarded = input.guardBalance === true && input.delta < 0;
    const transactItems: TransactItem[] = [];

    if (entry.idempotencyKey !== null) {
      transactItems.push({
        Put: {
          TableName: this.idempotencyTable,
          Item: {
            idempotency_key: entry.idempotencyKey,
            account_id: entry.accountId,
            entry_id: entry.entryId,
            created_at: createdAt.toISOString(),
          },
          ConditionExpression: 'attribute_not_exists(idempotency_key)',
        },
      });
    }

    transactItems.push({
      Put: {
        TableName: this.ledgerTable,
        Item: toDynamoItem(entry),
        ConditionExpression: 'attribute_not_exists(entry_id)',
      },
    });

    const accountUpdateIndex = transactItems.length;
    transactItems.push({
      Update: {
        TableName: this.accountsTable,
        Key: { account_id: entry.accountId },
        UpdateExpression: 'ADD balance_millis :delta',
        ConditionExpression: guarded
          ? 'attribute_exists(account_id) AND balance_millis >= :required'
          : 'attribute_exists(account_id)',
        ExpressionAttributeValues: {
          ':delta': entry.delta,
          ...(guarded ? { ':required': -entry.delta } : {}),
        },
      },
    });

    try {
      await getDocClient().send(new TransactWriteCommand({ TransactItems: transactItems }));
    } catch (error) {
      if (!(error instanceof TransactionCanceledException)) {
        throw error;
      }

      const reasons = error.CancellationReasons ?? [];

      if (entry.idempotencyKey !== null && reasons[0]?.Code === 'ConditionalCheckFailed') {
        const existing = await this.findByIdempotencyKey(entry.idempotencyKey);
        if (existing === null) {
          throw new InternalError(`Ledger entry for key ${entry.idempotencyKey} could not be read`);
        }
        this.logger.debug(
          { accountId: entry.accountId, idempotencyKey: entry.idempotencyKey },
          'Ledger entry already applied'
        );
        return { entry: existing, applied: false };
      }

      if (reasons[accountUpdateIndex]?.Code === 'ConditionalCheckFailed') {
        if (!guarded) {
          throw new NotFoundError(`Account not found: ${entry.accountId}`);
        }
        const balance = await this.getBalance(entry.accountId);
        throw new InsufficientCreditsError(entry.accountId, { balance, required: -entry.delta });
      }

      throw error;
    }

    this.logger.info(
      {
        accountId: entry.accountId,
        entryId: entry.entryId,
        delta: entry.delta,
        reason: entry.reason,
      },
      'Ledger entry posted'
    );

    return { entry, applied: true };
  }

  async getBalance(accountId: string): Promise<number> {
    const result = await getDocClient().send(
      new GetCommand({
        TableName: this.accountsTable,
        Key: { account_id: accountId },
        ProjectionExpression: 'balance_millis',
      })
    );

    if (result.Item === undefined) {
      throw new NotFoundError(`Account not found: ${accountId}`);
    }

    const balance: unknown = result.Item['balance_millis'];
    return typeof balance === 'number' ? balance : 0;
  }

  async getDailySpent(accountId: string, now: Date = new Date()): Promise<number> {
    const docClient = getDocClient();
    const since = new Date(now.getTime() - DAY_MS).toISOString();

    const charges = await collectPages(async (startKey) => {
      const result = await docClient.send(
        new QueryCommand({
          TableName: this.ledgerTable,
          KeyConditionExpression: 'account_id = :accountId AND entry_id >= :since',
          FilterExpression: 'reason = :reason AND delta_millis < :zero',
          ExpressionAttributeValues: {
            ':accountId': accountId,
            ':since': since,
            ':reason': LedgerReason.JOB_CHARGE,
            ':zero': 0,
          },
          ...(startKey !== undefined ? { ExclusiveStartKey: startKey } : {}),
        })
      );

      return {
        items: (result.Items ?? []).map((item) => fromDynamoItem(item)),
        lastKey: result.LastEvaluatedKey,
      };
    });

    return charges.reduce((sum, entry) => sum - entry.delta, 0);
  }

  async listEntries(accountId: string, limit: number): Promise<LedgerEntryModel[]> {
    const result = await getDocClient().send(
      new QueryCommand({
        TableName: this.ledgerTable,
        KeyConditionExpression: 'account_id = :accountId',
        ExpressionAttributeValues: { ':accountId': accountId },
        ScanIndexForward: false,
        Limit: limit,
      })
    );

    return (result.Items ?? []).map((item) => fromDynamoItem(item));
  }

  private async findByIdempotencyKey(idempotencyKey: string): Promise<LedgerEntryModel | null> {
    const docClient = getDocClient();

    const mapping = await docClient.send(
      new GetCommand({
        TableName: this.idempotencyTable,
        Key: { idempotency_key: idempotencyKey },
      })
    );

    const accountId: unknown = mapping.Item?.['account_id'];
    const entryId: unknown = mapping.Item?.['entry_id'];
    if (typeof accountId !== 'string' || typeof entryId !== 'string') {
      return null;
    }

    const result = await docClient.send(
      new GetCommand({
        TableName: this.ledgerTable,
        Key: { account_id: accountId, entry_id: entryId },
      })
    );

    return result.Item !== undefined ? fromDynamoItem(result.Item) : null;
  }
}
