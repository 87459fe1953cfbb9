// src/errors.ts - Error construction and messages
import { CalcError, ErrorKind, Result } from './types';

const messages: Record<ErrorKind, (detail: string) => string> = {
  InvalidNumber: (d) => `Invalid number '${d}'`,
  NumberOutOfRange: (d) => `Number out of range '${d}'`,
  UnrecognizedCharacter: (d) => `Unrecognized character '${d}'`,
  IdentifierTooLong: (d) => `Identifier too long '${d}' (max 15 characters)`,
  ExpressionTooLong: (d) => `Expression too long (limit ${d})`,
  MismatchedParen: () => 'Mismatched parentheses',
  MismatchedComma: () => 'Misplaced comma or mismatched parentheses',
  UndefinedVariable: (d) => `Undefined variable: ${d}`,
  MissingOperand: (d) => `Missing operand for ${d}`,
  DivisionByZero: () => 'Division by zero',
  DomainError: (d) => `${d}: argument out of domain`,
  DomainOrRangeError: (d) => `${d}: domain or range error`,
  FactorialDomainError: () => 'Factorial argument must be an integer in [0, 170]',
  MalformedExpression: (d) => (d ? `Malformed expression (${d})` : 'Malformed expression'),
  StackOverflow: (d) => `Stack overflow (limit ${d})`,
  NonFiniteResult: () => 'Result is not a finite number',
  VariableStoreFull: (d) => `Variable store is full, cannot bind '${d}'`,
  ZeroOrNonFiniteDerivative: (d) => `Derivative is zero or not finite at x=${d}`,
  DidNotConverge: (d) => `Did not converge (maxit=${d})`,
  InvalidArgument: (d) => d,
};

const fixes: Partial<Record<ErrorKind, string>> = {
  MismatchedParen: 'Check that every ( has a matching )',
  MismatchedComma: 'Commas may only separate function arguments, as in pow(2,10)',
  UndefinedVariable: 'Define it first with /let <name>=<expr>',
  MalformedExpression: 'Put an operator between adjacent values',
  ZeroOrNonFiniteDerivative: 'Try a different starting point',
  DidNotConverge: 'Raise maxit or try a different starting point',
};

export function calcError(
  kind: ErrorKind,
  detail: string | number = '',
  column?: number
): CalcError {
  const error: CalcError = { kind, message: messages[kind](String(detail)) };
  if (column !== undefined) error.column = column;
  const suggestedFix = fixes[kind];
  if (suggestedFix) error.suggestedFix = suggestedFix;
  return error;
}

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T>(
  kind: ErrorKind,
  detail?: string | number,
  column?: number
): Result<T> {
  return { ok: false, error: calcError(kind, detail, column) };
}

/**
 * Formats an error as one line, with its column when known.
 */
export function describeError(error: CalcError): string {
  return error.column !== undefined
    ? `${error.message} at column ${error.column}`
    : error.message;
}
