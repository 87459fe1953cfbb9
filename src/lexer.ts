// src/lexer.ts - Expression tokenizer
import { OperatorKind, Result, Token } from './types';
import { operatorChars } from './operators';
import { functionArity, lookupFunction } from './functions';
import { fail, ok } from './errors';

export const MAX_IDENTIFIER_LENGTH = 15;
export const DEFAULT_MAX_TOKENS = 1024;

const NUMBER_PATTERN = /^(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?/;

function isDigit(char: string): boolean {
  return char >= '0' && char <= '9';
}

function isIdentifierChar(char: string): boolean {
  return /[A-Za-z_]/.test(char);
}

// A '-' is prefix minus at the start and after any operator (postfix ones included), ( or ,
function endsOperand(prev: Token | undefined): boolean {
  if (!prev) return false;
  switch (prev.type) {
    case 'number':
    case 'identifier':
    case 'function':
    case 'rightParen':
      return true;
    default:
      return false;
  }
}

export function lex(
  input: string,
  maxTokens: number = DEFAULT_MAX_TOKENS
): Result<Token[]> {
  const tokens: Token[] = [];
  let pos = 0;
  while (pos < input.length) {
    const char = input[pos];
    const column = pos + 1;
    // Skip whitespace and control bytes
    if (char.charCodeAt(0) <= 0x20) {
      pos++;
      continue;
    }
    if (tokens.length >= maxTokens) {
      return fail('ExpressionTooLong', `${maxTokens} tokens`, column);
    }
    // Number
    if (isDigit(char) || char === '.') {
      const match = NUMBER_PATTERN.exec(input.slice(pos));
      if (!match) {
        return fail('InvalidNumber', char, column);
      }
      const text = match[0];
      const value = Number(text);
      if (!Number.isFinite(value)) {
        return fail('NumberOutOfRange', text, column);
      }
      tokens.push({ type: 'number', value, column });
      pos += text.length;
      continue;
    }
    // Identifier or function name
    if (isIdentifierChar(char)) {
      let name = '';
      while (pos < input.length && isIdentifierChar(input[pos])) {
        name += input[pos];
        pos++;
      }
      if (name.length > MAX_IDENTIFIER_LENGTH) {
        return fail('IdentifierTooLong', name, column);
      }
      name = name.toLowerCase();
      const func = lookupFunction(name);
      if (func) {
        tokens.push({ type: 'function', name: func, arity: functionArity[func], column });
      } else {
        tokens.push({ type: 'identifier', name, column });
      }
      continue;
    }
    if (char === '(') {
      tokens.push({ type: 'leftParen', column });
      pos++;
      continue;
    }
    if (char === ')') {
      tokens.push({ type: 'rightParen', column });
      pos++;
      continue;
    }
    if (char === ',') {
      tokens.push({ type: 'comma', column });
      pos++;
      continue;
    }
    const op: OperatorKind | undefined = operatorChars[char];
    if (op) {
      const resolved: OperatorKind =
        op === 'sub' && !endsOperand(tokens[tokens.length - 1]) ? 'neg' : op;
      tokens.push({ type: 'operator', op: resolved, column });
      pos++;
      continue;
    }
    return fail('UnrecognizedCharacter', char, column);
  }
  return ok(tokens);
}
