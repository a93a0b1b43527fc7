/**
 * Task model: one provider sub-task per requested output
 */

import { z } from 'zod';

export const TaskStateSchema = z.enum(['queued', 'pending', 'running', 'success', 'fail']);

export const TaskSchema = z.object({
  taskId: z.string().uuid(),
  jobId: z.string().uuid(),
  accountId: z.string(),
  unitIndex: z.number().int().min(0),
  /** Model id on the provider side */
  providerModel: z.string(),
  /** Request payload sent to the provider on dispatch */
  input: z.record(z.unknown()),
  /** null until the provider accepted the task */
  providerTaskId: z.string().nullable(),
  state: TaskStateSchema,
  resultUrls: z.array(z.string()),
  failCode: z.string().nullable(),
  failMsg: z.string().nullable(),
  attempts: z.number().int().min(0),
  createdAt: z.coerce.date(),
  startedAt: z.coerce.date().nullable(),
  finishedAt: z.coerce.date().nullable(),
  rawResponse: z.record(z.unknown()).nullable(),
});

export type TaskModel = z.infer<typeof TaskSchema>;

export function fromDynamoItem(item: Record<string, unknown>): TaskModel {
  return TaskSchema.parse({
    taskId: item['task_id'],
    jobId: item['job_id'],
    accountId: item['account_id'],
    unitIndex: item['unit_index'],
    providerModel: item['provider_model'],
    input: item['input'] ?? {},
    providerTaskId: item['provider_task_id'] ?? null,
    state: item['state'],
    resultUrls: item['result_urls'] ?? [],
    failCode: item['fail_code'] ?? null,
    failMsg: item['fail_msg'] ?? null,
    attempts: item['attempts'] ?? 0,
    createdAt: item['created_at'],
    startedAt: item['started_at'] ?? null,
    finishedAt: item['finished_at'] ?? null,
    rawResponse: item['raw_response'] ?? null,
  });
}

export function toDynamoItem(task: TaskModel): Record<string, unknown> {
  return {
    task_id: task.taskId,
    job_id: task.jobId,
    account_id: task.accountId,
    unit_index: task.unitIndex,
    provider_model: task.providerModel,
    input: task.input,
    ...(task.providerTaskId !== null ? { provider_task_id: task.providerTaskId } : {}),
    state: task.state,
    result_urls: task.resultUrls,
    ...(task.failCode !== null ? { fail_code: task.failCode } : {}),
    ...(task.failMsg !== null ? { fail_msg: task.failMsg } : {}),
    attempts: task.attempts,
    created_at: task.createdAt.toISOString(),
    ...(task.startedAt !== null ? { started_at: task.startedAt.toISOString() } : {}),
    ...(task.finishedAt !== null ? { finished_at: task.finishedAt.toISOString() } : {}),
    ...(task.rawResponse !== null ? { raw_response: task.rawResponse } : {}),
  };
}
