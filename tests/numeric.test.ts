import { derivative, solveNewton, integrateSimpson, simpsonSegments } from '../src/numeric';
import { createContext } from '../src/context';
import { Logger } from '../src/logger';

const quiet = new Logger({ level: 'silent' });

describe('derivative', () => {
  it('should use a central difference', () => {
    const context = createContext({ logger: quiet });
    const result = derivative('x^2', context, 'x', 3);
    expect(result.ok).toBe(true);
    if (result.ok) expect(result.value).toBeCloseTo(6, 6);
  });

  it('should be exact for linear expressions', () => {
    const context = createContext({ logger: quiet });
    expect(derivative('2*x', context, 'x', 1, 0.5)).toEqual({ ok: true, value: 2 });
  });

  it('should propagate evaluation failures', () => {
    const context = createContext({ logger: quiet });
    expect(derivative('sqrt(x)', context, 'x', 0)).toMatchObject({
      ok: false,
      error: { kind: 'DomainError' },
    });
  });
});

describe('solveNewton', () => {
  it('should find the square root of two', () => {
    const context = createContext({ logger: quiet });
    const result = solveNewton('x^2-2', context, 'x', 1);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(Math.abs(result.value.root - Math.SQRT2)).toBeLessThan(1e-9);
      expect(result.value.iterations).toBeLessThanOrEqual(30);
    }
  });

  it('should accept an upper-case variable name', () => {
    const context = createContext({ logger: quiet });
    const result = solveNewton('X^2-2', context, 'X', 1);
    expect(result.ok).toBe(true);
    if (result.ok) expect(Math.abs(result.value.root - Math.SQRT2)).toBeLessThan(1e-9);
  });

  it('should stop on a zero derivative', () => {
    const context = createContext({ logger: quiet });
    expect(solveNewton('x^2+1', context, 'x', 0)).toMatchObject({
      ok: false,
      error: { kind: 'ZeroOrNonFiniteDerivative', message: 'Derivative is zero or not finite at x=0' },
    });
  });

  it('should give up after the iteration budget', () => {
    const context = createContext({ logger: quiet });
    expect(solveNewton('exp(x)', context, 'x', 0, { maxIterations: 5 })).toMatchObject({
      ok: false,
      error: { kind: 'DidNotConverge', message: 'Did not converge (maxit=5)' },
    });
  });

  it('should propagate evaluation failures', () => {
    const context = createContext({ logger: quiet });
    expect(solveNewton('ln(x)', context, 'x', -1)).toMatchObject({
      ok: false,
      error: { kind: 'DomainError' },
    });
  });

  it('should leave the variable store as it was', () => {
    const context = createContext({ logger: quiet });
    context.store.set('x', 42);
    solveNewton('x^2-2', context, 'x', 1);
    solveNewton('ln(x)', context, 'x', -1);
    expect(context.store.get('x')).toBe(42);
    expect(context.store.entries()).toHaveLength(3);
  });
});

describe('simpsonSegments', () => {
  it('should normalize the segment count', () => {
    expect(simpsonSegments(3, 100)).toBe(4);
    expect(simpsonSegments(10, 100)).toBe(10);
    expect(simpsonSegments(0, 1000)).toBe(200);
    expect(simpsonSegments(-5, 1000)).toBe(200);
    expect(simpsonSegments(NaN, 1000)).toBe(200);
    expect(simpsonSegments(0, 100)).toBe(100);
    expect(simpsonSegments(1000, 11)).toBe(10);
    expect(simpsonSegments(1000, 10)).toBe(10);
  });
});

describe('integrateSimpson', () => {
  it('should integrate x^2 over [0,1]', () => {
    const context = createContext({ logger: quiet });
    const result = integrateSimpson('x^2', context, 'x', 0, 1, 2);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.value).toBeCloseTo(1 / 3, 14);
      expect(result.value.segments).toBe(2);
    }
  });

  it('should round odd segment counts up', () => {
    const context = createContext({ logger: quiet });
    const result = integrateSimpson('x^2', context, 'x', 0, 1, 3);
    expect(result).toMatchObject({ ok: true, value: { segments: 4 } });
  });

  it('should integrate sin over [0,pi] with the default segments', () => {
    const context = createContext({ logger: quiet });
    const result = integrateSimpson('sin(x)', context, 'x', 0, Math.PI);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.value).toBeCloseTo(2, 7);
      expect(result.value.segments).toBe(200);
    }
  });

  it('should cap the segment count', () => {
    const context = createContext({ logger: quiet, limits: { maxSegments: 10 } });
    const result = integrateSimpson('x^2', context, 'x', 0, 1, 1000);
    expect(result).toMatchObject({ ok: true, value: { segments: 10 } });
  });

  it('should fail when a sample fails', () => {
    const context = createContext({ logger: quiet });
    expect(integrateSimpson('1/x', context, 'x', -1, 1, 2)).toMatchObject({
      ok: false,
      error: { kind: 'DivisionByZero' },
    });
  });
});
