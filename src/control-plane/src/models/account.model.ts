/**
 * Account model and validation schemas
 */

import { z } from 'zod';

export const AccountSchema = z.object({
  accountId: z.string().min(1),
  /** Cached running balance in millicredits, maintained by the ledger */
  balance: z.number().int(),
  banned: z.boolean(),
  isAdmin: z.boolean(),
  /** null falls back to the configured default */
  adminFreeMode: z.boolean().nullable(),
  discountPct: z.number().int().min(0).max(100),
  createdAt: z.coerce.date(),
});

export type AccountModel = z.infer<typeof AccountSchema>;

export const CreateAccountSchema = z.object({
  accountId: z
    .string()
    .min(1)
    .max(128)
    .regex(/^[A-Za-z0-9_:.-]+$/, 'Invalid account id'),
  isAdmin: z.boolean().default(false),
  discountPct: z.number().int().min(0).max(100).default(0),
});

export type CreateAccountInput = z.infer<typeof CreateAccountSchema>;

export const UpdateAccountSchema = z
  .object({
    banned: z.boolean().optional(),
    isAdmin: z.boolean().optional(),
    adminFreeMode: z.boolean().nullable().optional(),
    discountPct: z.number().int().min(0).max(100).optional(),
  })
  .refine((patch) => Object.keys(patch).length > 0, { message: 'No fields to update' });

export type UpdateAccountInput = z.infer<typeof UpdateAccountSchema>;

/**
 * Convert DynamoDB item to Account model
 */
export function fromDynamoItem(item: Record<string, unknown>): AccountModel {
  return AccountSchema.parse({
    accountId: item['account_id'],
    balance: item['balance_millis'] ?? 0,
    banned: item['banned'] ?? false,
    isAdmin: item['is_admin'] ?? false,
    adminFreeMode: item['admin_free_mode'] ?? null,
    discountPct: item['discount_pct'] ?? 0,
    createdAt: item['created_at'],
  });
}

/**
 * Convert Account model to DynamoDB item
 */
export function toDynamoItem(account: AccountModel): Record<string, unknown> {
  return {
    account_id: account.accountId,
    balance_millis: account.balance,
    banned: account.banned,
    is_admin: account.isAdmin,
    ...(account.adminFreeMode !== null ? { admin_free_mode: account.adminFreeMode } : {}),
    discount_pct: account.discountPct,
    created_at: account.createdAt.toISOString(),
  };
}
