/**
 * Job model and validation schemas
 */

import { z } from 'zod';
import type { JobStatus } from '../types/job.js';

/** Value of the sparse `refund_status` attribute while a refund is unsettled */
export const REFUND_PENDING = 'pending';

export const JobStatusSchema = z.enum(['queued', 'running', 'pending', 'success', 'fail', 'partial']);

export const CreateJobSchema = z.object({
  accountId: z.string().min(1).max(128),
  model: z.string().min(1).max(128),
  prompt: z.string(),
  options: z.record(z.string()).default({}),
  quantity: z.number().int().default(1),
  referenceUrls: z.array(z.string().url()).max(32).default([]),
});

export type CreateJobInput = z.input<typeof CreateJobSchema>;
export type CreateJobRequest = z.output<typeof CreateJobSchema>;

export const JobSchema = z.object({
  jobId: z.string().uuid(),
  accountId: z.string(),
  model: z.string(),
  prompt: z.string(),
  options: z.record(z.string()),
  referenceUrls: z.array(z.string()),
  outputsRequested: z.number().int().min(1),
  /** Undiscounted subtotal, millicredits */
  costTotal: z.number().int().min(0),
  discountPct: z.number().int().min(0).max(100),
  /** Discounted total, millicredits */
  finalCost: z.number().int().min(0),
  /** Amount actually debited; 0 in admin free mode */
  chargedAmount: z.number().int().min(0),
  providerCost: z.number().int().min(0).nullable(),
  status: JobStatusSchema,
  /** Set before a failure that may owe a refund, cleared once settled */
  refundPending: z.boolean(),
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
});

export type JobModel = z.infer<typeof JobSchema>;

export const ListJobsQuerySchema = z.object({
  accountId: z.string().min(1),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

export type ListJobsQuery = z.infer<typeof ListJobsQuerySchema>;

export function isActiveStatus(status: JobStatus): boolean {
  return status === 'queued' || status === 'running' || status === 'pending';
}

/**
 * Convert DynamoDB item to Job model
 * Note: DynamoDB uses snake_case attribute names, model uses camelCase
 */
export function fromDynamoItem(item: Record<string, unknown>): JobModel {
  return JobSchema.parse({
    jobId: item['job_id'],
    accountId: item['account_id'],
    model: item['model'],
    prompt: item['prompt'],
    options: item['options'] ?? {},
    referenceUrls: item['reference_urls'] ?? [],
    outputsRequested: item['outputs_requested'],
    costTotal: item['cost_total_millis'],
    discountPct: item['discount_pct'] ?? 0,
    finalCost: item['final_cost_millis'],
    chargedAmount: item['charged_millis'] ?? 0,
    providerCost: item['provider_cost_millis'] ?? null,
    status: item['status'],
    refundPending: item['refund_status'] === REFUND_PENDING,
    createdAt: item['created_at'],
    updatedAt: item['updated_at'],
  });
}

/**
 * Convert Job model to DynamoDB item
 */
export function toDynamoItem(job: JobModel): Record<string, unknown> {
  return {
    job_id: job.jobId,
    account_id: job.accountId,
    model: job.model,
    prompt: job.prompt,
    options: job.options,
    reference_urls: job.referenceUrls,
    outputs_requested: job.outputsRequested,
    cost_total_millis: job.costTotal,
    discount_pct: job.discountPct,
    final_cost_millis: job.finalCost,
    charged_millis: job.chargedAmount,
    ...(job.providerCost !== null ? { provider_cost_millis: job.providerCost } : {}),
    status: job.status,
    ...(job.refundPending ? { refund_status: REFUND_PENDING } : {}),
    created_at: job.createdAt.toISOString(),
    updated_at: job.updatedAt.toISOString(),
  };
}
