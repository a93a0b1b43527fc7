/**
 * Price table model
 */

import { z } from 'zod';
import { toMillicredits } from '../utils/credits.js';

/**
 * Prices are stored in credits (up to three decimals) and exposed in
 * millicredits.
 */
export const PriceSchema = z.object({
  modelKey: z.string().min(1),
  optionKey: z.string().min(1),
  price: z.number().int().min(0),
  providerCost: z.number().int().min(0).nullable(),
  active: z.boolean(),
});

export type PriceModel = z.infer<typeof PriceSchema>;

/** Row of the price table as written by the price admin, amounts in credits */
export const PriceRowSchema = z.object({
  modelKey: z.string().min(1),
  optionKey: z.string().min(1),
  price: z.number().min(0),
  providerCost: z.number().min(0).nullable().default(null),
  active: z.boolean().default(true),
});

export type PriceRow = z.infer<typeof PriceRowSchema>;

export function fromDynamoItem(item: Record<string, unknown>): PriceModel {
  const row = PriceRowSchema.parse({
    modelKey: item['model_key'],
    optionKey: item['option_key'],
    price: item['price'],
    providerCost: item['provider_cost'] ?? null,
    active: item['active'] ?? true,
  });
  return fromPriceRow(row);
}

export function fromPriceRow(row: PriceRow): PriceModel {
  return {
    modelKey: row.modelKey,
    optionKey: row.optionKey,
    price: toMillicredits(row.price),
    providerCost: row.providerCost !== null ? toMillicredits(row.providerCost) : null,
    active: row.active,
  };
}

export function toDynamoItem(row: PriceRow): Record<string, unknown> {
  return {
    model_key: row.modelKey,
    option_key: row.optionKey,
    price: row.price,
    ...(row.providerCost !== null ? { provider_cost: row.providerCost } : {}),
    active: row.active,
  };
}
