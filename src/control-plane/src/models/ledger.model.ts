/**
 * Ledger entry model and validation schemas
 */

import { z } from 'zod';

export const LedgerEntrySchema = z.object({
  entryId: z.string(),
  accountId: z.string(),
  /** Signed amount in millicredits */
  delta: z.number().int(),
  reason: z.string(),
  metadata: z.record(z.unknown()),
  idempotencyKey: z.string().nullable(),
  createdAt: z.coerce.date(),
});

export type LedgerEntryModel = z.infer<typeof LedgerEntrySchema>;

/**
 * Body of an externally requested ledger posting. Amounts are in credits.
 */
export const PostLedgerEntrySchema = z.object({
  amount: z
    .number()
    .finite()
    .refine((value) => value !== 0, 'Amount must not be zero'),
  reason: z.string().min(1).max(64),
  idempotencyKey: z.string().min(1).max(256),
  metadata: z.record(z.unknown()).default({}),
});

export type PostLedgerEntryBody = z.infer<typeof PostLedgerEntrySchema>;

export const ListLedgerQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).default(50),
});

/**
 * Entry ids sort by creation time within an account
 */
export function buildEntryId(createdAt: Date, uniqueId: string): string {
  return `${createdAt.toISOString()}#${uniqueId}`;
}

export function fromDynamoItem(item: Record<string, unknown>): LedgerEntryModel {
  return LedgerEntrySchema.parse({
    entryId: item['entry_id'],
    accountId: item['account_id'],
    delta: item['delta_millis'],
    reason: item['reason'],
    metadata: item['metadata'] ?? {},
    idempotencyKey: item['idempotency_key'] ?? null,
    createdAt: item['created_at'],
  });
}

export function toDynamoItem(entry: LedgerEntryModel): Record<string, unknown> {
  return {
    account_id: entry.accountId,
    entry_id: entry.entryId,
    delta_millis: entry.delta,
    reason: entry.reason,
    metadata: entry.metadata,
    ...(entry.idempotencyKey !== null ? { idempotency_key: entry.idempotencyKey } : {}),
    created_at: entry.createdAt.toISOString(),
  };
}
