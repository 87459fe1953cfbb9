// src/parser.ts - Shunting-yard conversion from infix to postfix order
import { OperatorKind, Result, Token } from './types';
import { operatorTable, isPrefix } from './operators';
import { fail, ok } from './errors';

type StackEntry = Extract<Token, { type: 'function' | 'operator' | 'leftParen' }>;

class Parser {
  private tokens: Token[];
  private output: Token[] = [];
  private stack: StackEntry[] = [];
  constructor(tokens: Token[]) {
    this.tokens = tokens;
  }
  parse(): Result<Token[]> {
    for (const token of this.tokens) {
      switch (token.type) {
        case 'number':
        case 'identifier':
          this.output.push(token);
          break;
        case 'function':
        case 'leftParen':
          this.stack.push(token);
          break;
        case 'operator':
          this.reduceBefore(token.op);
          this.stack.push(token);
          break;
        case 'comma':
          if (!this.popUntilParen()) {
            return fail('MismatchedComma', '', token.column);
          }
          break;
        case 'rightParen': {
          if (!this.popUntilParen()) {
            return fail('MismatchedParen', '', token.column);
          }
          this.stack.pop(); // Discard (
          const top = this.peek();
          if (top?.type === 'function') {
            this.output.push(top);
            this.stack.pop();
          }
          break;
        }
      }
    }
    while (this.stack.length > 0) {
      const top = this.stack.pop();
      if (!top) break;
      if (top.type === 'leftParen') {
        return fail('MismatchedParen', '', top.column);
      }
      this.output.push(top);
    }
    return ok(this.output);
  }
  // Moves operators that bind at least as tightly as `op` to the output
  private reduceBefore(op: OperatorKind) {
    const current = operatorTable[op];
    while (this.stack.length > 0) {
      const top = this.peek();
      if (top?.type !== 'operator') break;
      // -a^b negates the whole power
      if (current.associativity === 'right' && current.fixity === 'infix' && isPrefix(top.op)) {
        break;
      }
      const other = operatorTable[top.op];
      const popLeft = current.associativity === 'left' && current.precedence <= other.precedence;
      const popRight = current.associativity === 'right' && current.precedence < other.precedence;
      if (!popLeft && !popRight) break;
      this.output.push(top);
      this.stack.pop();
    }
  }
  // Pops to the nearest (, leaving it on the stack; false if there is none
  private popUntilParen(): boolean {
    while (this.stack.length > 0) {
      const top = this.peek();
      if (!top) return false;
      if (top.type === 'leftParen') return true;
      this.output.push(top);
      this.stack.pop();
    }
    return false;
  }
  private peek(): StackEntry | undefined {
    return this.stack[this.stack.length - 1];
  }
}

export function toPostfix(tokens: Token[]): Result<Token[]> {
  const parser = new Parser(tokens);
  return parser.parse();
}

/**
 * Renders a postfix sequence as space-separated text, e.g. `2 3 4 * +`.
 */
export function formatPostfix(tokens: Token[]): string {
  return tokens
    .map((token) => {
      switch (token.type) {
        case 'number':
          return String(token.value);
        case 'identifier':
        case 'function':
          return token.name;
        case 'operator':
          return token.op === 'neg' ? 'neg' : operatorTable[token.op].symbol;
        case 'leftParen':
          return '(';
        case 'rightParen':
          return ')';
        case 'comma':
          return ',';
      }
    })
    .join(' ');
}
