import { toPostfix, formatPostfix } from '../src/parser';
import { lex } from '../src/lexer';
import { CalcError } from '../src/types';

function postfix(input: string): string {
  const tokens = lex(input);
  if (!tokens.ok) throw new Error(tokens.error.message);
  const result = toPostfix(tokens.value);
  if (!result.ok) throw new Error(result.error.message);
  return formatPostfix(result.value);
}

function parseError(input: string): CalcError | undefined {
  const tokens = lex(input);
  if (!tokens.ok) throw new Error(tokens.error.message);
  const result = toPostfix(tokens.value);
  return result.ok ? undefined : result.error;
}

describe('Parser (infix to postfix)', () => {
  it('should order by precedence', () => {
    expect(postfix('1+2*3')).toBe('1 2 3 * +');
    expect(postfix('(1+2)*3')).toBe('1 2 + 3 *');
  });

  it('should keep left-associative operators in order', () => {
    expect(postfix('8-4-2')).toBe('8 4 - 2 -');
    expect(postfix('8/4*2')).toBe('8 4 / 2 *');
  });

  it('should group power from the right', () => {
    expect(postfix('2^3^2')).toBe('2 3 2 ^ ^');
  });

  it('should negate a whole power', () => {
    expect(postfix('-3^2')).toBe('3 2 ^ neg');
    expect(postfix('(-3)^2')).toBe('3 neg 2 ^');
    expect(postfix('2^-3')).toBe('2 3 neg ^');
  });

  it('should apply prefix minus before multiplication', () => {
    expect(postfix('-2*3')).toBe('2 neg 3 *');
  });

  it('should place postfix operators after their operand', () => {
    expect(postfix('5!+3')).toBe('5 ! 3 +');
    expect(postfix('-3!')).toBe('3 ! neg');
    expect(postfix('50%*2')).toBe('50 % 2 *');
  });

  it('should attach functions after their arguments', () => {
    expect(postfix('pow(2,10)')).toBe('2 10 pow');
    expect(postfix('sin(x)+1')).toBe('x sin 1 +');
    expect(postfix('pow(1+1,sqrt(4))')).toBe('1 1 + 4 sqrt pow');
  });

  it('should report an unclosed parenthesis', () => {
    expect(parseError('(1+2')).toMatchObject({ kind: 'MismatchedParen', column: 1 });
  });

  it('should report an unopened parenthesis', () => {
    expect(parseError('1+2)')).toMatchObject({ kind: 'MismatchedParen', column: 4 });
  });

  it('should reject commas outside an argument list', () => {
    expect(parseError('1,2')).toMatchObject({ kind: 'MismatchedComma', column: 2 });
    expect(parseError(',')).toMatchObject({
      kind: 'MismatchedComma',
      message: 'Misplaced comma or mismatched parentheses',
    });
  });
});
