import { lex } from '../src/lexer';
import { Token } from '../src/types';

function tokensOf(input: string): Token[] {
  const result = lex(input);
  if (!result.ok) throw new Error(result.error.message);
  return result.value;
}

describe('Lexer', () => {
  it('should lex numbers and binary operators', () => {
    const tokens = tokensOf('1+2*3');
    expect(tokens).toHaveLength(5);
    expect(tokens[0]).toEqual({ type: 'number', value: 1, column: 1 });
    expect(tokens[1]).toEqual({ type: 'operator', op: 'add', column: 2 });
    expect(tokens[3]).toEqual({ type: 'operator', op: 'mul', column: 4 });
  });

  it('should skip whitespace and control characters', () => {
    const tokens = tokensOf(' 1 \t+\n2 ');
    expect(tokens.map((t) => t.column)).toEqual([2, 5, 7]);
  });

  it('should read decimal and exponent forms', () => {
    const values = tokensOf('1.5e3 .5 2. 4E-2').map((t) => (t.type === 'number' ? t.value : NaN));
    expect(values).toEqual([1500, 0.5, 2, 0.04]);
  });

  it('should mark minus as prefix at the start, after operators, ( and ,', () => {
    expect(tokensOf('-3')[0]).toMatchObject({ type: 'operator', op: 'neg' });
    expect(tokensOf('2*-3')[2]).toMatchObject({ op: 'neg' });
    expect(tokensOf('(-2)')[1]).toMatchObject({ op: 'neg' });
    expect(tokensOf('pow(2,-3)')[4]).toMatchObject({ op: 'neg' });
  });

  it('should mark minus as prefix after postfix operators', () => {
    expect(tokensOf('5!-3')[2]).toMatchObject({ type: 'operator', op: 'neg', column: 3 });
    expect(tokensOf('50%-1')[2]).toMatchObject({ op: 'neg' });
  });

  it('should mark minus as subtraction after an operand', () => {
    expect(tokensOf('2-3')[1]).toMatchObject({ op: 'sub' });
    expect(tokensOf('x-1')[1]).toMatchObject({ op: 'sub' });
    expect(tokensOf('(1)-1')[3]).toMatchObject({ op: 'sub' });
  });

  it('should fold identifiers to lower case and resolve function names', () => {
    const tokens = tokensOf('SIN(X)+Pow(2,3)');
    expect(tokens[0]).toEqual({ type: 'function', name: 'sin', arity: 1, column: 1 });
    expect(tokens[2]).toEqual({ type: 'identifier', name: 'x', column: 5 });
    expect(tokens[5]).toMatchObject({ type: 'function', name: 'pow', arity: 2 });
  });

  it('should accept underscores in identifiers', () => {
    expect(tokensOf('my_var')).toEqual([{ type: 'identifier', name: 'my_var', column: 1 }]);
  });

  it('should reject unknown characters', () => {
    const result = lex('1 # 2');
    expect(result).toEqual({
      ok: false,
      error: { kind: 'UnrecognizedCharacter', message: "Unrecognized character '#'", column: 3 },
    });
  });

  it('should reject numbers beyond double range', () => {
    const result = lex('1e999');
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe('NumberOutOfRange');
  });

  it('should reject a lone decimal point', () => {
    const result = lex('.');
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe("Invalid number '.'");
  });

  it('should reject identifiers longer than 15 characters', () => {
    expect(lex('abcdefghijklmno').ok).toBe(true);
    const result = lex('abcdefghijklmnop+1');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('IdentifierTooLong');
      expect(result.error.column).toBe(1);
    }
  });

  it('should cap the number of tokens', () => {
    const result = lex('1+1+1', 3);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('ExpressionTooLong');
      expect(result.error.column).toBe(4);
    }
  });

  it('should return no tokens for blank input', () => {
    expect(tokensOf('   ')).toEqual([]);
  });
});
