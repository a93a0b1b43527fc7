/**
 * Job repository for DynamoDB operations
 */

import { GetCommand, PutCommand, UpdateCommand, QueryCommand } from '@aws-sdk/lib-dynamodb';
import { ConditionalCheckFailedException } from '@aws-sdk/client-dynamodb';
import { getDocClient, collectPages } from './base.repository.js';
import { getConfig } from '../utils/config.js';
import { getLogger } from '../utils/logger.js';
import { ConflictError, InternalError, NotFoundError } from '../utils/errors.js';
import { type JobModel, REFUND_PENDING, fromDynamoItem, toDynamoItem } from '../models/job.model.js';
import type { JobStatus } from '../types/job.js';
import type { JobStore } from '../types/stores.js';

export class JobRepository implements JobStore {
  private readonly tableName: string;
  private readonly accountIndex = 'account_id-created_at-index';
  private readonly refundIndex = 'refund_status-index';
  private readonly logger = getLogger().child({ repository: 'JobRepository' });

  constructor() {
    this.tableName = getConfig().dynamodb.jobsTable;
  }

  async create(job: JobModel): Promise<JobModel> {
    this.logger.debug({ jobId: job.jobId, accountId: job.accountId }, 'Creating job');

    try {
      await getDocClient().send(
        new PutCommand({
          TableName: this.tableName,
          Item: toDynamoItem(job),
          ConditionExpression: 'attribute_not_exists(job_id)',
        })
      );
    } catch (error) {
      if (error instanceof ConditionalCheckFailedException) {
        throw new ConflictError(`Job ${job.jobId} already exists`, { jobId: job.jobId });
      }
      throw error;
    }

    return job;
  }

  async get(jobId: string): Promise<JobModel | null> {
    const result = await getDocClient().send(
      new GetCommand({
        TableName: this.tableName,
        Key: { job_id: jobId },
      })
    );

    return result.Item !== undefined ? fromDynamoItem(result.Item) : null;
  }

  async updateStatus(jobId: string, status: JobStatus): Promise<JobModel> {
    try {
      const result = await getDocClient().send(
        new UpdateCommand({
          TableName: this.tableName,
          Key: { job_id: jobId },
          UpdateExpression: 'SET #status = :status, updated_at = :updatedAt',
          ConditionExpression: 'attribute_exists(job_id)',
          ExpressionAttributeNames: { '#status': 'status' },
          ExpressionAttributeValues: {
            ':status': status,
            ':updatedAt': new Date().toISOString(),
          },
          ReturnValues: 'ALL_NEW',
        })
      );

      if (result.Attributes === undefined) {
        throw new InternalError('Failed to update job');
      }

      return fromDynamoItem(result.Attributes);
    } catch (error) {
      if (error instanceof ConditionalCheckFailedException) {
        throw new NotFoundError(`Job not found: ${jobId}`);
      }
      throw error;
    }
  }

  async transitionStatus(jobId: string, from: JobStatus, to: JobStatus): Promise<JobModel | null> {
    try {
      const result = await getDocClient().send(
        new UpdateCommand({
          TableName: this.tableName,
          Key: { job_id: jobId },
          UpdateExpression: 'SET #status = :to, updated_at = :updatedAt',
          ConditionExpression: 'attribute_exists(job_id) AND #status = :from',
          ExpressionAttributeNames: { '#status': 'status' },
          ExpressionAttributeValues: {
            ':from': from,
            ':to': to,
            ':updatedAt': new Date().toISOString(),
          },
          ReturnValues: 'ALL_NEW',
        })
      );

      if (result.Attributes === undefined) {
        throw new InternalError('Failed to update job');
      }

      return fromDynamoItem(result.Attributes);
    } catch (error) {
      if (error instanceof ConditionalCheckFailedException) {
        this.logger.debug({ jobId, from, to }, 'Job status moved on, transition skipped');
        return null;
      }
      throw error;
    }
  }

  async markRefundPending(jobId: string): Promise<void> {
    await this.updateRefundStatus(jobId, 'SET refund_status = :pending', { ':pending': REFUND_PENDING });
  }

  async clearRefundPending(jobId: string): Promise<void> {
    await this.updateRefundStatus(jobId, 'REMOVE refund_status');
  }

  /**
   * Only jobs carrying `refund_status` appear in the sparse refund index
   */
  async listRefundPending(): Promise<JobModel[]> {
    const docClient = getDocClient();

    const items = await collectPages(async (startKey) => {
      const result = await docClient.send(
        new QueryCommand({
          TableName: this.tableName,
          IndexName: this.refundIndex,
          KeyConditionExpression: 'refund_status = :pending',
          ExpressionAttributeValues: { ':pending': REFUND_PENDING },
          ...(startKey !== undefined ? { ExclusiveStartKey: startKey } : {}),
        })
      );

      return { items: result.Items ?? [], lastKey: result.LastEvaluatedKey };
    });

    return items.map((item) => fromDynamoItem(item));
  }

  async countActive(accountId: string): Promise<number> {
    const docClient = getDocClient();

    const counts = await collectPages(async (startKey) => {
      const result = await docClient.send(
        new QueryCommand({
          TableName: this.tableName,
          IndexName: this.accountIndex,
          KeyConditionExpression: 'account_id = :accountId',
          FilterExpression: '#status IN (:queued, :running, :pending)',
          ExpressionAttributeNames: { '#status': 'status' },
          ExpressionAttributeValues: {
            ':accountId': accountId,
            ':queued': 'queued',
            ':running': 'running',
            ':pending': 'pending',
          },
          Select: 'COUNT',
          ...(startKey !== undefined ? { ExclusiveStartKey: startKey } : {}),
        })
      );

      return { items: [result.Count ?? 0], lastKey: result.LastEvaluatedKey };
    });

    return counts.reduce((sum, count) => sum + count, 0);
  }

  async listByAccount(accountId: string, limit: number): Promise<JobModel[]> {
    const result = await getDocClient().send(
      new QueryCommand({
        TableName: this.tableName,
        IndexName: this.accountIndex,
        KeyConditionExpression: 'account_id = :accountId',
        ExpressionAttributeValues: { ':accountId': accountId },
        ScanIndexForward: false,
        Limit: limit,
      })
    );

    return (result.Items ?? []).map((item) => fromDynamoItem(item));
  }

  private async updateRefundStatus(
    jobId: string,
    updateExpression: string,
    values: Record<string, unknown> = {}
  ): Promise<void> {
    try {
      await getDocClient().send(
        new UpdateCommand({
          TableName: this.tableName,
          Key: { job_id: jobId },
          UpdateExpression: updateExpression,
          ConditionExpression: 'attribute_exists(job_id)',
          ...(Object.keys(values).length > 0 ? { ExpressionAttributeValues: values } : {}),
        })
      );
    } catch (error) {
      if (error instanceof ConditionalCheckFailedException) {
        throw new NotFoundError(`Job not found: ${jobId}`);
      }
      throw error;
    }
  }
}
