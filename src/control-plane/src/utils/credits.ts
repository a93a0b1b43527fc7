/**
 * Credit amount helpers.
 *
 * All amounts inside the control plane are integer millicredits so that
 * ledger sums stay exact. Prices and config values are written in credits
 * and converted at the boundary, rounding half away from zero.
 */

export const MILLIS_PER_CREDIT = 1000;

export function toMillicredits(credits: number): number {
  if (!Number.isFinite(credits)) {
    throw new RangeError(`Credit amount must be finite, got ${credits}`);
  }
  const scaled = Math.abs(credits) * MILLIS_PER_CREDIT;
  // toFixed absorbs binary noise such as 1.005 * 1000 = 1004.9999999999999
  const rounded = Math.round(Number(scaled.toFixed(6)));
  return credits < 0 ? -rounded : rounded;
}

export function fromMillicredits(millis: number): number {
  return millis / MILLIS_PER_CREDIT;
}

/**
 * Render an amount in credits without trailing zeros: 5000 -> "5",
 * 1250 -> "1.25", -500 -> "-0.5".
 */
export function formatCredits(millis: number): string {
  const sign = millis < 0 ? '-' : '';
  const abs = Math.abs(millis);
  const whole = Math.floor(abs / MILLIS_PER_CREDIT);
  const fraction = abs % MILLIS_PER_CREDIT;
  if (fraction === 0) {
    return `${sign}${whole}`;
  }
  const digits = String(fraction).padStart(3, '0').replace(/0+$/, '');
  return `${sign}${whole}.${digits}`;
}

/**
 * Apply a percentage discount, rounding the discounted amount up so the
 * result never drops below the exact value and never exceeds the input.
 */
export function applyDiscount(millis: number, discountPct: number): number {
  if (discountPct <= 0) {
    return millis;
  }
  const pct = Math.min(discountPct, 100);
  return Math.ceil((millis * (100 - pct)) / 100);
}

/**
 * Split an amount into `parts` integer shares that sum exactly to it.
 * The first `amount % parts` shares carry one extra millicredit.
 */
export function splitEvenly(millis: number, parts: number): number[] {
  if (parts <= 0) {
    return [];
  }
  const base = Math.floor(millis / parts);
  const remainder = millis - base * parts;
  return Array.from({ length: parts }, (_, index) => base + (index < remainder ? 1 : 0));
}
