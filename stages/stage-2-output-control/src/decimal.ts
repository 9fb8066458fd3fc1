/**
 * Exact decimal arithmetic for money-like sums: value = coefficient / 10^scale.
 * Numbers enter through their shortest round-trip string, so 12.2 is 122/10, not
 * the nearest binary fraction.
 */

export interface Decimal {
  coefficient: bigint;
  scale: number;
}

const DECIMAL_REGEX = /^([+-])?(\d+)(?:\.(\d*))?(?:e([+-]?\d+))?$/i;

export function toDecimal(value: number | string): Decimal {
  if (typeof value === "number" && !Number.isFinite(value)) {
    throw new RangeError(`Not a finite number: ${value}`);
  }
  const text = String(value).trim();
  const match = text.match(DECIMAL_REGEX);
  if (!match) {
    throw new RangeError(`Not a decimal number: ${text}`);
  }
  const [, sign, whole, fraction = "", exponent = "0"] = match;
  let coefficient = BigInt(whole + fraction);
  let scale = fraction.length - Number.parseInt(exponent, 10);
  if (scale < 0) {
    coefficient *= 10n ** BigInt(-scale);
    scale = 0;
  }
  return { coefficient: sign === "-" ? -coefficient : coefficient, scale };
}

function rescale(value: Decimal, scale: number): bigint {
  return value.coefficient * 10n ** BigInt(scale - value.scale);
}

export function addDecimals(a: Decimal, b: Decimal): Decimal {
  const scale = Math.max(a.scale, b.scale);
  return { coefficient: rescale(a, scale) + rescale(b, scale), scale };
}

export function multiplyDecimals(a: Decimal, b: Decimal): Decimal {
  return { coefficient: a.coefficient * b.coefficient, scale: a.scale + b.scale };
}

export function compareDecimals(a: Decimal, b: Decimal): -1 | 0 | 1 {
  const scale = Math.max(a.scale, b.scale);
  const left = rescale(a, scale);
  const right = rescale(b, scale);
  return left === right ? 0 : left < right ? -1 : 1;
}

export function formatDecimal(value: Decimal): string {
  const negative = value.coefficient < 0n;
  const digits = (negative ? -value.coefficient : value.coefficient)
    .toString()
    .padStart(value.scale + 1, "0");
  const whole = digits.slice(0, digits.length - value.scale);
  const fraction = digits.slice(digits.length - value.scale).replace(/0+$/, "");
  const body = fraction ? `${whole}.${fraction}` : whole;
  return negative && body !== "0" ? `-${body}` : body;
}
