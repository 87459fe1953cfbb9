// src/types.ts - Core interfaces and types for the termcalc engine

/**
 * Built-in functions: a closed registry resolved once, during lexing.
 */
export const functionNames = [
  'sin',
  'cos',
  'tan',
  'asin',
  'acos',
  'atan',
  'sqrt',
  'ln',
  'log',
  'abs',
  'exp',
  'pow',
] as const;
export type FunctionName = (typeof functionNames)[number];

/**
 * Operator kinds produced by the lexer.
 */
export type OperatorKind =
  | 'add'
  | 'sub'
  | 'mul'
  | 'div'
  | 'pow'
  | 'neg' // Prefix minus
  | 'factorial'
  | 'percent';

export type Associativity = 'left' | 'right';
export type Fixity = 'prefix' | 'infix' | 'postfix';

/**
 * Operator Info: One row of the fixed precedence table.
 */
export interface OperatorInfo {
  symbol: string;
  precedence: number; // Higher binds tighter
  associativity: Associativity;
  fixity: Fixity;
}

/**
 * Token: Basic unit from lexing. `column` is 1-based, for error reporting.
 */
export type Token =
  | { type: 'number'; value: number; column: number }
  | { type: 'identifier'; name: string; column: number }
  | { type: 'function'; name: FunctionName; arity: 1 | 2; column: number }
  | { type: 'operator'; op: OperatorKind; column: number }
  | { type: 'leftParen'; column: number }
  | { type: 'rightParen'; column: number }
  | { type: 'comma'; column: number };

export type TokenType = Token['type'];

/**
 * Error kinds: Every way an evaluation can fail.
 */
export const errorKinds = [
  'InvalidNumber',
  'NumberOutOfRange',
  'UnrecognizedCharacter',
  'IdentifierTooLong',
  'ExpressionTooLong',
  'MismatchedParen',
  'MismatchedComma',
  'UndefinedVariable',
  'MissingOperand',
  'DivisionByZero',
  'DomainError',
  'DomainOrRangeError',
  'FactorialDomainError',
  'MalformedExpression',
  'StackOverflow',
  'NonFiniteResult',
  'VariableStoreFull',
  'ZeroOrNonFiniteDerivative',
  'DidNotConverge',
  'InvalidArgument',
] as const;
export type ErrorKind = (typeof errorKinds)[number];

/**
 * Calc Error: Structured error details.
 */
export interface CalcError {
  kind: ErrorKind;
  message: string;
  column?: number;
  suggestedFix?: string;
}

/**
 * Result: Either a value or the first error met.
 */
export type Result<T> = { ok: true; value: T } | { ok: false; error: CalcError };

export type AngleMode = 'rad' | 'deg';

/**
 * Engine Limits: Caps that bound the work done for one input.
 */
export interface EngineLimits {
  maxInputLength: number;
  maxTokens: number;
  maxStack: number;
  maxSegments: number; // Simpson segment cap
}
