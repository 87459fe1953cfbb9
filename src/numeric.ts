// src/numeric.ts - Numeric methods built on repeated evaluation
import { Result } from './types';
import { EvaluationContext } from './context';
import { evaluateWith } from './engine';
import { fail, ok } from './errors';
import { formatNumber } from './format';

export const DEFAULT_DIFF_STEP = 1e-5;
export const NEWTON_DIFF_STEP = 1e-6;
export const DEFAULT_SEGMENTS = 200;

export interface NewtonOptions {
  maxIterations?: number;
  tolerance?: number;
}

export interface NewtonResult {
  root: number;
  iterations: number;
}

export interface IntegrationResult {
  value: number;
  segments: number;
}

/**
 * Central difference (f(x+h) - f(x-h)) / 2h. The value may be non-finite;
 * callers decide whether that matters.
 */
export function derivative(
  expr: string,
  context: EvaluationContext,
  name: string,
  x: number,
  h: number = DEFAULT_DIFF_STEP
): Result<number> {
  const ahead = evaluateWith(expr, context, name, x + h);
  if (!ahead.ok) return ahead;
  const behind = evaluateWith(expr, context, name, x - h);
  if (!behind.ok) return behind;
  return ok((ahead.value - behind.value) / (2 * h));
}

export function solveNewton(
  expr: string,
  context: EvaluationContext,
  name: string,
  x0: number,
  options: NewtonOptions = {}
): Result<NewtonResult> {
  const maxIterations = options.maxIterations ?? 30;
  const tolerance = options.tolerance ?? 1e-10;
  let x = x0;
  for (let k = 0; k < maxIterations; k++) {
    const fx = evaluateWith(expr, context, name, x);
    if (!fx.ok) return fx;
    const dfx = derivative(expr, context, name, x, NEWTON_DIFF_STEP);
    if (!dfx.ok) return dfx;
    if (!Number.isFinite(dfx.value) || dfx.value === 0) {
      return fail('ZeroOrNonFiniteDerivative', formatNumber(x));
    }
    x = x - fx.value / dfx.value;
    context.logger.debug(`newton ${k + 1}: f=${fx.value} f'=${dfx.value} x=${x}`);
    if (Math.abs(fx.value) < tolerance) {
      return ok({ root: x, iterations: k + 1 });
    }
  }
  return fail('DidNotConverge', maxIterations);
}

/**
 * Normalizes a requested Simpson segment count: non-positive means the
 * default, odd counts round up, and the total is capped.
 */
export function simpsonSegments(n: number, cap: number): number {
  let segments = Number.isFinite(n) && n > 0 ? Math.floor(n) : DEFAULT_SEGMENTS;
  if (segments % 2 !== 0) segments++;
  if (segments > cap) segments = cap % 2 === 0 ? cap : cap - 1;
  return segments;
}

export function integrateSimpson(
  expr: string,
  context: EvaluationContext,
  name: string,
  a: number,
  b: number,
  n: number = DEFAULT_SEGMENTS
): Result<IntegrationResult> {
  const cap = context.limits.maxSegments;
  const segments = simpsonSegments(n, cap);
  if (n > cap) {
    context.logger.warn(`integrate: ${n} segments requested, capped at ${segments}`);
  }
  const h = (b - a) / segments;
  const first = evaluateWith(expr, context, name, a);
  if (!first.ok) return first;
  let sum = first.value;
  for (let i = 1; i < segments; i++) {
    const fx = evaluateWith(expr, context, name, a + i * h);
    if (!fx.ok) return fx;
    sum += i % 2 === 1 ? 4 * fx.value : 2 * fx.value;
  }
  const last = evaluateWith(expr, context, name, b);
  if (!last.ok) return last;
  sum += last.value;
  return ok({ value: (sum * h) / 3, segments });
}
