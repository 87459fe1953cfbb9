// src/format.ts - Number formatting for display

function trimZeros(digits: string): string {
  return digits.includes('.') ? digits.replace(/0+$/, '').replace(/\.$/, '') : digits;
}

function cExponent(exponent: number): string {
  const sign = exponent < 0 ? '-' : '+';
  return `e${sign}${String(Math.abs(exponent)).padStart(2, '0')}`;
}

/**
 * Formats like printf's `%.<precision>g`: `precision` significant digits,
 * trailing zeros dropped, exponent form outside [1e-4, 10^precision).
 */
export function formatNumber(value: number, precision: number = 15): string {
  if (Number.isNaN(value)) return 'nan';
  if (!Number.isFinite(value)) return value > 0 ? 'inf' : '-inf';
  if (value === 0) return Object.is(value, -0) ? '-0' : '0';
  const [mantissa, exp] = value.toExponential(precision - 1).split('e');
  const exponent = Number(exp);
  if (exponent < -4 || exponent >= precision) {
    return trimZeros(mantissa) + cExponent(exponent);
  }
  return trimZeros(value.toFixed(precision - 1 - exponent));
}

/**
 * Formats like printf's `%.<digits>e`, e.g. `1.0e-05`.
 */
export function formatExponential(value: number, digits: number = 1): string {
  const [mantissa, exp] = value.toExponential(digits).split('e');
  return mantissa + cExponent(Number(exp));
}

export function toHex(value: number): string {
  return `0x${value.toString(16).toUpperCase()}`;
}

export function toBinary(value: number): string {
  return value.toString(2);
}
