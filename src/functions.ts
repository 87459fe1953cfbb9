// src/functions.ts - Built-in function registry
import { AngleMode, FunctionName, Result, functionNames } from './types';
import { fail, ok } from './errors';

export const functionArity: Record<FunctionName, 1 | 2> = {
  sin: 1,
  cos: 1,
  tan: 1,
  asin: 1,
  acos: 1,
  atan: 1,
  sqrt: 1,
  ln: 1,
  log: 1,
  abs: 1,
  exp: 1,
  pow: 2,
};

export function lookupFunction(name: string): FunctionName | undefined {
  return functionNames.find((f) => f === name);
}

export function toRadians(x: number, mode: AngleMode): number {
  return mode === 'deg' ? (x * Math.PI) / 180 : x;
}

export function fromRadians(x: number, mode: AngleMode): number {
  return mode === 'deg' ? (x * 180) / Math.PI : x;
}

/**
 * Raises a to b. Finite operands giving a non-finite result
 * (negative base with fractional exponent, overflow, 0 to a negative power)
 * are reported rather than returned.
 */
export function power(a: number, b: number, label: string): Result<number> {
  const y = Math.pow(a, b);
  if (!Number.isFinite(y) && Number.isFinite(a) && Number.isFinite(b)) {
    return fail('DomainOrRangeError', label);
  }
  return ok(y);
}

export function applyUnary(
  name: Exclude<FunctionName, 'pow'>,
  x: number,
  mode: AngleMode
): Result<number> {
  switch (name) {
    case 'sin':
      return ok(Math.sin(toRadians(x, mode)));
    case 'cos':
      return ok(Math.cos(toRadians(x, mode)));
    case 'tan':
      return ok(Math.tan(toRadians(x, mode)));
    case 'asin':
      if (x < -1 || x > 1) return fail('DomainError', name);
      return ok(fromRadians(Math.asin(x), mode));
    case 'acos':
      if (x < -1 || x > 1) return fail('DomainError', name);
      return ok(fromRadians(Math.acos(x), mode));
    case 'atan':
      return ok(fromRadians(Math.atan(x), mode));
    case 'sqrt':
      if (x < 0) return fail('DomainError', name);
      return ok(Math.sqrt(x));
    case 'ln':
      if (x <= 0) return fail('DomainError', name);
      return ok(Math.log(x));
    case 'log':
      if (x <= 0) return fail('DomainError', name);
      return ok(Math.log10(x));
    case 'abs':
      return ok(Math.abs(x));
    case 'exp':
      return ok(Math.exp(x));
  }
}

export function applyBinary(
  name: 'pow',
  a: number,
  b: number
): Result<number> {
  return power(a, b, name);
}
