// src/selftest.ts - Built-in sanity check of the engine
import { createContext, EvaluationContext } from './context';
import { evaluate } from './engine';

export interface SelfTestCase {
  expr: string;
  expect: number;
  tolerance: number;
}

export const selfTestCases: SelfTestCase[] = [
  { expr: '1+2*3', expect: 7, tolerance: 1e-12 },
  { expr: '(2+3)*4', expect: 20, tolerance: 1e-12 },
  { expr: '-3^2', expect: -9, tolerance: 1e-12 },
  { expr: '(-3)^2', expect: 9, tolerance: 1e-12 },
  { expr: '5!', expect: 120, tolerance: 1e-12 },
  { expr: '50%', expect: 0.5, tolerance: 1e-12 },
  { expr: 'sqrt(2)^2', expect: 2, tolerance: 1e-12 },
  { expr: 'ln(exp(1))', expect: 1, tolerance: 1e-12 },
  { expr: 'log(1000)', expect: 3, tolerance: 1e-12 },
  { expr: 'pow(2,10)', expect: 1024, tolerance: 1e-12 },
];

export interface SelfTestReport {
  passed: number;
  total: number;
  failures: string[];
  summary: string;
}

export function runSelfTest(
  context: EvaluationContext = createContext(),
  cases: SelfTestCase[] = selfTestCases
): SelfTestReport {
  const saved = context.angleMode;
  context.angleMode = 'rad';
  const failures: string[] = [];
  try {
    for (const c of cases) {
      const result = evaluate(c.expr, context);
      if (!result.ok) {
        failures.push(`${c.expr}: ${result.error.message}`);
      } else if (Math.abs(result.value - c.expect) > c.tolerance) {
        failures.push(`${c.expr}: expected ${c.expect}, got ${result.value}`);
      }
    }
  } finally {
    context.angleMode = saved;
  }
  const passed = cases.length - failures.length;
  return {
    passed,
    total: cases.length,
    failures,
    summary: `SelfTest basic: ${passed}/${cases.length}`,
  };
}
