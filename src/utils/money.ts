import { ValidationError } from "./errors.js";

/** Exact decimal: `units / 10^scale`. */
export interface ExactDecimal {
  units: bigint;
  scale: number;
}

const DECIMAL_PATTERN = /^([+-])?(\d+)(?:\.(\d*))?(?:e([+-]?\d+))?$/i;

function pow10(exponent: number): bigint {
  return 10n ** BigInt(exponent);
}

export function parseDecimal(value: number | string): ExactDecimal {
  if (typeof value === "number" && !Number.isFinite(value)) {
    throw new ValidationError(`Invalid decimal value: ${value}`);
  }
  const text = typeof value === "number" ? String(value) : value.trim();
  const match = DECIMAL_PATTERN.exec(text);
  if (!match) throw new ValidationError(`Invalid decimal value: ${text}`);

  const [, sign, integerPart, fractionPart = "", exponentPart = "0"] = match;
  let units = BigInt(`${integerPart}${fractionPart}`);
  let scale = fractionPart.length - Number(exponentPart);
  if (scale < 0) {
    units *= pow10(-scale);
    scale = 0;
  }
  return { units: sign === "-" ? -units : units, scale };
}

export function multiplyDecimals(...factors: ExactDecimal[]): ExactDecimal {
  return factors.reduce<ExactDecimal>(
    (product, factor) => ({ units: product.units * factor.units, scale: product.scale + factor.scale }),
    { units: 1n, scale: 0 },
  );
}

export function addDecimals(...terms: ExactDecimal[]): ExactDecimal {
  const scale = terms.reduce((max, term) => Math.max(max, term.scale), 0);
  const units = terms.reduce((sum, term) => sum + term.units * pow10(scale - term.scale), 0n);
  return { units, scale };
}

/** Half-up (away from zero) rounding to whole cents. */
export function toCents(value: ExactDecimal): bigint {
  if (value.scale <= 2) return value.units * pow10(2 - value.scale);

  const divisor = pow10(value.scale - 2);
  const magnitude = value.units < 0n ? -value.units : value.units;
  let cents = magnitude / divisor;
  if ((magnitude % divisor) * 2n >= divisor) cents += 1n;
  return value.units < 0n ? -cents : cents;
}

export function centsToNumber(cents: bigint): number {
  return Number(cents) / 100;
}

export function formatCents(cents: bigint): string {
  const negative = cents < 0n;
  const magnitude = negative ? -cents : cents;
  const whole = magnitude / 100n;
  const fraction = (magnitude % 100n).toString().padStart(2, "0");
  return `${negative ? "-" : ""}${whole.toString()}.${fraction}`;
}

export function amountToCents(amount: number | string): bigint {
  return toCents(parseDecimal(amount));
}

export function roundMoney(amount: number | string): number {
  return centsToNumber(amountToCents(amount));
}

export function isCentPrecise(amount: number): boolean {
  if (!Number.isFinite(amount)) return false;
  const exact = parseDecimal(amount);
  return exact.scale <= 2 || exact.units % pow10(exact.scale - 2) === 0n;
}

export function compareAmounts(left: number, right: number): number {
  const difference = amountToCents(left) - amountToCents(right);
  if (difference === 0n) return 0;
  return difference < 0n ? -1 : 1;
}

/** Plain decimal text with trailing fractional zeros dropped. */
export function formatDecimal(value: ExactDecimal): string {
  const negative = value.units < 0n;
  const digits = (negative ? -value.units : value.units).toString().padStart(value.scale + 1, "0");
  const whole = digits.slice(0, digits.length - value.scale);
  const fraction = digits.slice(digits.length - value.scale).replace(/0+$/, "");
  return `${negative ? "-" : ""}${whole}${fraction ? `.${fraction}` : ""}`;
}
