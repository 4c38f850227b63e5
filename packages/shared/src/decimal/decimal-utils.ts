/**
 * Decimal arithmetic over string amounts.
 *
 * Amounts in CFDI documents carry up to six decimal places and are kept as
 * strings (DecimalAmount). Addition is exact (bigint based); conversion to
 * number happens only when a value is written to a numeric spreadsheet cell.
 */

import type { DecimalAmount } from '@cfdi-bundle/contracts';

/**
 * Internal representation of a decimal value.
 */
interface DecimalValue {
  /** Unsigned integer representation (|value| * 10^scale) */
  value: bigint;
  /** Number of decimal places */
  scale: number;
  negative: boolean;
}

const DECIMAL_PATTERN = /^([+-])?(\d*)(?:\.(\d*))?$/;

function parseDecimal(str: string): DecimalValue {
  const match = DECIMAL_PATTERN.exec(str.trim());
  const intPart = match?.[2] ?? '';
  const fracPart = match?.[3] ?? '';
  if (!match || (intPart === '' && fracPart === '')) {
    throw new Error(`Invalid decimal format: ${str}`);
  }

  return {
    value: BigInt((intPart || '0') + fracPart),
    scale: fracPart.length,
    negative: match[1] === '-',
  };
}

function formatDecimal(decimal: DecimalValue): string {
  const { value, scale } = decimal;
  let str = value.toString();

  while (str.length <= scale) {
    str = '0' + str;
  }

  const insertPoint = str.length - scale;
  const result = scale > 0 ? `${str.slice(0, insertPoint)}.${str.slice(insertPoint)}` : str;

  return decimal.negative && value !== 0n ? `-${result}` : result;
}

/**
 * Bring both values to the larger scale and apply their signs.
 */
function align(a: DecimalValue, b: DecimalValue): [bigint, bigint, number] {
  const scale = Math.max(a.scale, b.scale);
  const aValue = a.value * 10n ** BigInt(scale - a.scale);
  const bValue = b.value * 10n ** BigInt(scale - b.scale);

  return [a.negative ? -aValue : aValue, b.negative ? -bValue : bValue, scale];
}

/**
 * Add two decimal amounts. The result keeps the larger scale of the two.
 *
 * @example add('16.00', '2.5') // => '18.50'
 */
export function add(a: DecimalAmount, b: DecimalAmount): DecimalAmount {
  const [valA, valB, scale] = align(parseDecimal(a), parseDecimal(b));
  const result = valA + valB;
  const negative = result < 0n;

  return formatDecimal({ value: negative ? -result : result, scale, negative });
}

/**
 * Sum decimal amounts, starting from "0".
 */
export function sum(amounts: readonly DecimalAmount[]): DecimalAmount {
  return amounts.reduce<DecimalAmount>((acc, amount) => add(acc, amount), '0');
}

/**
 * Check if amount is negative.
 */
export function isNegative(a: DecimalAmount): boolean {
  const dec = parseDecimal(a);
  return dec.negative && dec.value !== 0n;
}

/**
 * Validate that a string is a plain decimal amount ("12", "-3.50", ".5").
 * Exponents, thousands separators and blanks are rejected.
 */
export function isValidDecimalAmount(value: string): boolean {
  try {
    parseDecimal(value);
    return true;
  } catch {
    return false;
  }
}

const EXPONENT_PATTERN = /^([+-])?(\d*)(?:\.(\d*))?[eE]([+-]?\d{1,3})$/;

/**
 * Read a plain decimal or exponent notation ("1.6E+1") as a plain decimal
 * amount, shifting the point exactly. Returns undefined for anything else.
 *
 * @example toPlainDecimal('1.5e-3') // => '0.0015'
 */
export function toPlainDecimal(value: string): DecimalAmount | undefined {
  const trimmed = value.trim();
  if (isValidDecimalAmount(trimmed)) {
    return trimmed;
  }

  const match = EXPONENT_PATTERN.exec(trimmed);
  const intPart = match?.[2] ?? '';
  const fracPart = match?.[3] ?? '';
  if (!match || (intPart === '' && fracPart === '')) {
    return undefined;
  }

  const digits = intPart + fracPart;
  const point = intPart.length + Number(match[4]);
  let whole: string;
  let fraction: string;
  if (point <= 0) {
    whole = '0';
    fraction = '0'.repeat(-point) + digits;
  } else if (point >= digits.length) {
    whole = digits + '0'.repeat(point - digits.length);
    fraction = '';
  } else {
    whole = digits.slice(0, point);
    fraction = digits.slice(point);
  }

  const sign = match[1] === '-' ? '-' : '';
  return fraction === '' ? `${sign}${whole}` : `${sign}${whole}.${fraction}`;
}

/**
 * Convert a decimal amount to a number.
 * WARNING: This may lose precision for very large or very precise numbers.
 */
export function toNumber(amount: DecimalAmount): number {
  return Number(formatDecimal(parseDecimal(amount)));
}
