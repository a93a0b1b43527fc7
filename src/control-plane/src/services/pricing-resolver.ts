/**
 * Pricing resolver
 *
 * Turns a model/options/quantity/discount selection into a cost breakdown
 * in millicredits. `resolvePrice` is pure over a snapshot of the price
 * table; `PricingResolver` loads the snapshot.
 */

import { getLogger } from '../utils/logger.js';
import { applyDiscount } from '../utils/credits.js';
import { ValidationError } from '../utils/errors.js';
import type { PriceStore } from '../types/stores.js';
import { findOptionValue, type ModelSpec } from './model-catalog.js';

/** optionKey -> amount in millicredits */
export type PriceMap = ReadonlyMap<string, number>;

export interface PriceModifier {
  readonly priceKey: string;
  readonly amount: number;
}

export interface PriceBreakdown {
  readonly base: number;
  readonly modifiers: readonly PriceModifier[];
  readonly perUnit: number;
  readonly quantity: number;
  readonly subtotal: number;
  readonly discountPct: number;
  readonly total: number;
  /** Set when a bundle price replaced base plus modifiers */
  readonly bundleKey: string | null;
}

export interface Quote {
  readonly price: PriceBreakdown;
  /** What the provider charges us, when the price table records it */
  readonly providerCost: number | null;
}

/**
 * First bundle rule that matches the selection and has a price
 */
export function resolveBundleKey(
  model: ModelSpec,
  options: Readonly<Record<string, string>>,
  prices: PriceMap
): string | null {
  for (const rule of model.bundles) {
    const matches = Object.entries(rule.when).every(([key, value]) => options[key] === value);
    if (!matches) {
      continue;
    }
    const priceKey = rule.priceKey.replace(/\{(\w+)\}/g, (_match, name: string) =>
      (options[name] ?? '').toLowerCase()
    );
    if (prices.has(priceKey)) {
      return priceKey;
    }
  }
  return null;
}

export function resolvePrice(
  model: ModelSpec,
  options: Readonly<Record<string, string>>,
  quantity: number,
  discountPct: number,
  prices: PriceMap
): PriceBreakdown {
  if (!Number.isInteger(quantity) || quantity < 1) {
    throw new ValidationError('Quantity must be a positive integer', { quantity });
  }
  if (discountPct < 0 || discountPct > 100) {
    throw new ValidationError('Discount must be between 0 and 100', { discountPct });
  }

  const bundleKey = resolveBundleKey(model, options, prices);
  if (bundleKey !== null) {
    const perUnit = prices.get(bundleKey) ?? 0;
    const subtotal = perUnit * quantity;
    return {
      base: perUnit,
      modifiers: [],
      perUnit,
      quantity,
      subtotal,
      discountPct,
      total: applyDiscount(subtotal, discountPct),
      bundleKey,
    };
  }

  const base = prices.get('base') ?? 0;
  const modifiers: PriceModifier[] = [];

  for (const option of model.options) {
    const selected = findOptionValue(option, options[option.key]);
    if (selected === undefined || !(selected.priced ?? option.priced)) {
      continue;
    }
    const amount = prices.get(selected.priceKey);
    if (amount !== undefined) {
      modifiers.push({ priceKey: selected.priceKey, amount });
    }
  }

  const perUnit = base + modifiers.reduce((sum, modifier) => sum + modifier.amount, 0);
  const subtotal = perUnit * quantity;

  return {
    base,
    modifiers,
    perUnit,
    quantity,
    subtotal,
    discountPct,
    total: applyDiscount(subtotal, discountPct),
    bundleKey: null,
  };
}

export class PricingResolver {
  private readonly logger = getLogger().child({ service: 'PricingResolver' });

  constructor(private readonly prices: PriceStore) {}

  async resolve(
    model: ModelSpec,
    options: Readonly<Record<string, string>>,
    quantity: number,
    discountPct: number
  ): Promise<PriceBreakdown> {
    const { price } = await this.quote(model, options, quantity, discountPct);
    return price;
  }

  /**
   * Provider cost for margin reporting: same rules over the providerCost
   * column, no discount. null when the table records no provider costs.
   */
  async resolveProviderCost(
    model: ModelSpec,
    options: Readonly<Record<string, string>>,
    quantity: number
  ): Promise<number | null> {
    const { providerCost } = await this.quote(model, options, quantity, 0);
    return providerCost;
  }

  /**
   * Customer price and provider cost from one read of the price table
   */
  async quote(
    model: ModelSpec,
    options: Readonly<Record<string, string>>,
    quantity: number,
    discountPct: number
  ): Promise<Quote> {
    const rows = await this.prices.listForModel(model.key);

    const priceMap = new Map<string, number>();
    const providerMap = new Map<string, number>();
    for (const row of rows) {
      priceMap.set(row.optionKey, row.price);
      if (row.providerCost !== null) {
        providerMap.set(row.optionKey, row.providerCost);
      }
    }

    const price = resolvePrice(model, options, quantity, discountPct, priceMap);
    const providerCost =
      providerMap.size > 0 ? resolvePrice(model, options, quantity, 0, providerMap).total : null;

    this.logger.debug(
      { model: model.key, quantity, perUnit: price.perUnit, total: price.total, bundleKey: price.bundleKey },
      'Price resolved'
    );

    return { price, providerCost };
  }
}
