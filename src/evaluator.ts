// src/evaluator.ts - Postfix evaluation on an operand stack
import { AngleMode, OperatorKind, Result, Token } from './types';
import { applyBinary, applyUnary, power } from './functions';
import { fail, ok } from './errors';

export const DEFAULT_MAX_STACK = 1024;

export type VariableLookup = (name: string) => number | undefined;

export interface EvalOptions {
  angleMode: AngleMode;
  maxStack?: number;
}

/**
 * Growable operand stack with an explicit capacity.
 */
export class OperandStack {
  private values: number[] = [];
  constructor(private readonly capacity: number) {}
  get size(): number {
    return this.values.length;
  }
  push(value: number): boolean {
    if (this.values.length >= this.capacity) return false;
    this.values.push(value);
    return true;
  }
  pop(): number | undefined {
    return this.values.pop();
  }
  peek(): number | undefined {
    return this.values[this.values.length - 1];
  }
  replaceTop(value: number) {
    this.values[this.values.length - 1] = value;
  }
}

function nearlyInteger(x: number): boolean {
  return Math.abs(x - Math.round(x)) < 1e-9;
}

export function factorial(x: number): Result<number> {
  if (!nearlyInteger(x) || x < 0 || x > 170) {
    return fail('FactorialDomainError');
  }
  const n = Math.round(x);
  let result = 1;
  for (let i = 2; i <= n; i++) result *= i;
  return ok(result);
}

function withColumn(result: Result<number>, column: number): Result<number> {
  return result.ok ? result : { ok: false, error: { ...result.error, column } };
}

function applyOperator(op: OperatorKind, a: number, b: number): Result<number> {
  switch (op) {
    case 'add':
      return ok(a + b);
    case 'sub':
      return ok(a - b);
    case 'mul':
      return ok(a * b);
    case 'div':
      if (b === 0) return fail('DivisionByZero');
      return ok(a / b);
    case 'pow':
      return power(a, b, '^');
    default:
      return fail('MalformedExpression', `unexpected operator '${op}'`);
  }
}

export function evalPostfix(
  tokens: Token[],
  lookup: VariableLookup,
  options: EvalOptions
): Result<number> {
  const capacity = options.maxStack ?? DEFAULT_MAX_STACK;
  const stack = new OperandStack(capacity);
  const overflow = (column: number): Result<number> =>
    fail('StackOverflow', capacity, column);

  for (const token of tokens) {
    switch (token.type) {
      case 'number':
        if (!stack.push(token.value)) return overflow(token.column);
        break;
      case 'identifier': {
        const value = lookup(token.name);
        if (value === undefined) {
          return fail('UndefinedVariable', token.name, token.column);
        }
        if (!stack.push(value)) return overflow(token.column);
        break;
      }
      case 'operator': {
        if (token.op === 'factorial' || token.op === 'percent') {
          const a = stack.pop();
          if (a === undefined) return fail('MissingOperand', `'${token.op}'`, token.column);
          const result = token.op === 'factorial' ? factorial(a) : ok(a * 0.01);
          if (!result.ok) return withColumn(result, token.column);
          stack.push(result.value);
          break;
        }
        if (token.op === 'neg') {
          const a = stack.peek();
          if (a === undefined) return fail('MissingOperand', 'unary minus', token.column);
          stack.replaceTop(-a);
          break;
        }
        const b = stack.pop();
        const a = stack.pop();
        if (a === undefined || b === undefined) {
          return fail('MissingOperand', `binary '${token.op}'`, token.column);
        }
        const result = applyOperator(token.op, a, b);
        if (!result.ok) return withColumn(result, token.column);
        stack.push(result.value);
        break;
      }
      case 'function': {
        let result: Result<number>;
        if (token.name === 'pow') {
          const b = stack.pop();
          const a = stack.pop();
          if (a === undefined || b === undefined) {
            return fail('MissingOperand', 'pow (needs 2 arguments)', token.column);
          }
          result = applyBinary(token.name, a, b);
        } else {
          const x = stack.pop();
          if (x === undefined) return fail('MissingOperand', token.name, token.column);
          result = applyUnary(token.name, x, options.angleMode);
        }
        if (!result.ok) return withColumn(result, token.column);
        stack.push(result.value);
        break;
      }
      default:
        return fail('MalformedExpression', `stray ${token.type}`, token.column);
    }
  }
  const value = stack.pop();
  if (value === undefined) {
    return fail('MalformedExpression', 'empty expression');
  }
  if (stack.size > 0) {
    return fail('MalformedExpression', `${stack.size + 1} values left on the stack`);
  }
  return ok(value);
}
