export const DEFAULT_ROUND_DIGITS = 2;

export type PriceRule = Readonly<{
  /** Marketplace commission folded out of the source price, in percent. */
  commissionPercent: number;
  roundDigits: number;
}>;

export const IDENTITY_PRICE_RULE: PriceRule = Object.freeze({
  commissionPercent: 0,
  roundDigits: DEFAULT_ROUND_DIGITS,
});

/** Amount in integer minor units at the given precision, e.g. 10.5 at 2 digits -> 1050. */
export function toMinorUnits(amount: number, roundDigits: number = DEFAULT_ROUND_DIGITS): number {
  return Math.round(amount * 10 ** roundDigits);
}

export function fromMinorUnits(units: number, roundDigits: number = DEFAULT_ROUND_DIGITS): number {
  return units / 10 ** roundDigits;
}

/** Finer comparisons than this would leave the safe integer range for realistic prices. */
export const MAX_COMPARE_DIGITS = 6;

/** Decimal places of an amount as written, e.g. 98.996 -> 3, 1e-7 -> 7. */
export function decimalPlaces(amount: number): number {
  const match = /^-?\d+(?:\.(\d+))?(?:e([+-]\d+))?$/i.exec(String(amount));
  if (!match) return 0;
  const fraction = match[1]?.length ?? 0;
  const exponent = Number(match[2] ?? 0);
  return Math.max(0, fraction - exponent);
}

export function roundPrice(amount: number, roundDigits: number = DEFAULT_ROUND_DIGITS): number {
  return fromMinorUnits(toMinorUnits(amount, roundDigits), roundDigits);
}

/**
 * Price the target should carry for a given source price:
 * `round(price / (1 + commissionPercent / 100), roundDigits)`.
 */
export function applyPriceRule(price: number, rule: PriceRule = IDENTITY_PRICE_RULE): number {
  const net = price / (1 + rule.commissionPercent / 100);
  return roundPrice(net, rule.roundDigits);
}
