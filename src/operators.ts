// src/operators.ts - Fixed operator table
import { OperatorInfo, OperatorKind } from './types';

export const operatorTable: Record<OperatorKind, OperatorInfo> = {
  factorial: { symbol: '!', precedence: 5, associativity: 'left', fixity: 'postfix' },
  percent: { symbol: '%', precedence: 5, associativity: 'left', fixity: 'postfix' },
  neg: { symbol: '-', precedence: 4, associativity: 'right', fixity: 'prefix' },
  pow: { symbol: '^', precedence: 3, associativity: 'right', fixity: 'infix' },
  mul: { symbol: '*', precedence: 2, associativity: 'left', fixity: 'infix' },
  div: { symbol: '/', precedence: 2, associativity: 'left', fixity: 'infix' },
  add: { symbol: '+', precedence: 1, associativity: 'left', fixity: 'infix' },
  sub: { symbol: '-', precedence: 1, associativity: 'left', fixity: 'infix' },
};

// Single-character operators; '-' is resolved to 'sub' or 'neg' by the lexer
export const operatorChars: Record<string, OperatorKind> = {
  '+': 'add',
  '-': 'sub',
  '*': 'mul',
  '/': 'div',
  '^': 'pow',
  '!': 'factorial',
  '%': 'percent',
};

export function isPrefix(op: OperatorKind): boolean {
  return operatorTable[op].fixity === 'prefix';
}
