/**
 * Task repository for DynamoDB operations
 *
 * Every state transition is a conditional update on the current state, so
 * concurrent pollers (in this process or another) cannot both advance the
 * same task.
 */

import {
  GetCommand,
  PutCommand,
  UpdateCommand,
  QueryCommand,
  type UpdateCommandInput,
} from '@aws-sdk/lib-dynamodb';
import { ConditionalCheckFailedException } from '@aws-sdk/client-dynamodb';
import { getDocClient, collectPages } from './base.repository.js';
import { getConfig } from '../utils/config.js';
import { getLogger } from '../utils/logger.js';
import { ConflictError } from '../utils/errors.js';
import { type TaskModel, fromDynamoItem, toDynamoItem } from '../models/task.model.js';
import type { FailInfo, TaskState } from '../types/job.js';
import type { MarkFailInput, MarkSuccessInput, TaskStore } from '../types/stores.js';

export class TaskRepository implements TaskStore {
  private readonly tableName: string;
  private readonly jobIndex = 'job_id-index';
  private readonly stateIndex = 'state-index';
  private readonly logger = getLogger().child({ repository: 'TaskRepository' });

  constructor() {
    this.tableName = getConfig().dynamodb.tasksTable;
  }

  async create(task: TaskModel): Promise<TaskModel> {
    try {
      await getDocClient().send(
        new PutCommand({
          TableName: this.tableName,
          Item: toDynamoItem(task),
          ConditionExpression: 'attribute_not_exists(task_id)',
        })
      );
    } catch (error) {
      if (error instanceof ConditionalCheckFailedException) {
        throw new ConflictError(`Task ${task.taskId} already exists`, { taskId: task.taskId });
      }
      throw error;
    }

    return task;
  }

  async get(taskId: string): Promise<TaskModel | null> {
    const result = await getDocClient().send(
      new GetCommand({
        TableName: this.tableName,
        Key: { task_id: taskId },
      })
    );

    return result.Item !== undefined ? fromDynamoItem(result.Item) : null;
  }

  async listByJob(jobId: string): Promise<TaskModel[]> {
    const docClient = getDocClient();

    const tasks = await collectPages(async (startKey) => {
      const result = await docClient.send(
        new QueryCommand({
          TableName: this.tableName,
          IndexName: this.jobIndex,
          KeyConditionExpression: 'job_id = :jobId',
          ExpressionAttributeValues: { ':jobId': jobId },
          ...(startKey !== undefined ? { ExclusiveStartKey: startKey } : {}),
        })
      );

      return {
        items: (result.Items ?? []).map((item) => fromDynamoItem(item)),
        lastKey: result.LastEvaluatedKey,
      };
    });

    return tasks.sort((a, b) => a.unitIndex - b.unitIndex);
  }

  async claim(taskId: string, now: Date, staleBefore: Date): Promise<boolean> {
    const claimed = await this.transition({
      TableName: this.tableName,
      Key: { task_id: taskId },
      UpdateExpression:
        'SET #state = :running, started_at = :now, attempts = if_not_exists(attempts, :zero) + :one',
      ConditionExpression:
        'attribute_exists(task_id) AND (#state IN (:queued, :pending) OR (#state = :running AND started_at < :staleBefore))',
      ExpressionAttributeNames: { '#state': 'state' },
      ExpressionAttributeValues: {
        ':running': 'running',
        ':queued': 'queued',
        ':pending': 'pending',
        ':now': now.toISOString(),
        ':staleBefore': staleBefore.toISOString(),
        ':zero': 0,
        ':one': 1,
      },
    });

    this.logger.debug({ taskId, claimed }, 'Task claim attempted');
    return claimed;
  }

  async setProviderTaskId(taskId: string, providerTaskId: string): Promise<void> {
    const updated = await this.transition(
      this.whileIn('running', taskId, 'SET provider_task_id = :providerTaskId', {
        ':providerTaskId': providerTaskId,
      })
    );

    if (!updated) {
      throw new ConflictError(`Task ${taskId} is no longer running`, { taskId });
    }
  }

  async markSuccess(taskId: string, input: MarkSuccessInput, now: Date): Promise<boolean> {
    return this.transition(
      this.whileIn(
        'running',
        taskId,
        'SET #state = :next, result_urls = :resultUrls, raw_response = :rawResponse, finished_at = :now',
        {
          ':next': 'success',
          ':resultUrls': [...input.resultUrls],
          ':rawResponse': input.rawResponse,
          ':now': now.toISOString(),
        }
      )
    );
  }

  async markFail(taskId: string, input: MarkFailInput, now: Date): Promise<boolean> {
    return this.transition(
      this.whileIn(
        'running',
        taskId,
        'SET #state = :next, fail_code = :failCode, fail_msg = :failMsg, raw_response = :rawResponse, finished_at = :now',
        {
          ':next': 'fail',
          ':failCode': input.code,
          ':failMsg': input.message,
          ':rawResponse': input.rawResponse ?? {},
          ':now': now.toISOString(),
        }
      )
    );
  }

  async markPending(taskId: string): Promise<boolean> {
    return this.transition(this.whileIn('running', taskId, 'SET #state = :next', { ':next': 'pending' }));
  }

  async abort(taskId: string, info: FailInfo, now: Date): Promise<boolean> {
    return this.transition(
      this.whileIn(
        'queued',
        taskId,
        'SET #state = :next, fail_code = :failCode, fail_msg = :failMsg, finished_at = :now',
        {
          ':next': 'fail',
          ':failCode': info.code,
          ':failMsg': info.message,
          ':now': now.toISOString(),
        }
      )
    );
  }

  async listRecoverable(staleBefore: Date): Promise<TaskModel[]> {
    const [queued, pending, running] = await Promise.all([
      this.listByState('queued'),
      this.listByState('pending'),
      this.listByState('running', staleBefore),
    ]);

    return [...queued, ...pending, ...running];
  }

  private async listByState(state: TaskState, startedBefore?: Date): Promise<TaskModel[]> {
    const docClient = getDocClient();

    return collectPages(async (startKey) => {
      const result = await docClient.send(
        new QueryCommand({
          TableName: this.tableName,
          IndexName: this.stateIndex,
          KeyConditionExpression: '#state = :state',
          ExpressionAttributeNames: { '#state': 'state' },
          ExpressionAttributeValues: {
            ':state': state,
            ...(startedBefore !== undefined ? { ':startedBefore': startedBefore.toISOString() } : {}),
          },
          ...(startedBefore !== undefined ? { FilterExpression: 'started_at < :startedBefore' } : {}),
          ...(startKey !== undefined ? { ExclusiveStartKey: startKey } : {}),
        })
      );

      return {
        items: (result.Items ?? []).map((item) => fromDynamoItem(item)),
        lastKey: result.LastEvaluatedKey,
      };
    });
  }

  private whileIn(
    expected: TaskState,
    taskId: string,
    updateExpression: string,
    values: Record<string, unknown>
  ): UpdateCommandInput {
    return {
      TableName: this.tableName,
      Key: { task_id: taskId },
      UpdateExpression: updateExpression,
      ConditionExpression: '#state = :expected',
      ExpressionAttributeNames: { '#state': 'state' },
      ExpressionAttributeValues: { ...values, ':expected': expected },
    };
  }

  /**
   * Run a conditional update; false when the condition did not hold
   */
  private async transition(input: UpdateCommandInput): Promise<boolean> {
    try {
      await getDocClient().send(new UpdateCommand(input));
      return true;
    } catch (error) {
      if (error instanceof ConditionalCheckFailedException) {
        return false;
      }
      throw error;
    }
  }
}
