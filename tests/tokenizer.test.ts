import { describe, it, expect } from 'vitest';
import { describeTok, tokenize, type Tok } from '../src/dsl/tokenizer';
import { DslSyntaxError } from '../src/dsl/errors';

const kinds = (src: string) => [...tokenize(src)].map((tok) => ('v' in tok ? `${tok.t}:${tok.v}` : tok.t));

describe('tokenize', () => {
  it('splits a function header and body', () => {
    expect(kinds('main() { x = 1; }')).toEqual([
      'IDENT:main',
      'LPAREN',
      'RPAREN',
      'LBRACE',
      'IDENT:x',
      'ASSIGN:=',
      'NUM:1',
      'SEMI',
      'RBRACE',
      'EOF',
    ]);
  });

  it('reads == as one operator and = as assignment', () => {
    expect(kinds('a == b = c')).toEqual(['IDENT:a', 'OP:==', 'IDENT:b', 'ASSIGN:=', 'IDENT:c', 'EOF']);
  });

  it('reads arithmetic and comparison operators', () => {
    expect(kinds('1+2-3*4/5^6<7>8')).toEqual([
      'NUM:1', 'OP:+', 'NUM:2', 'OP:-', 'NUM:3', 'OP:*', 'NUM:4',
      'OP:/', 'NUM:5', 'OP:^', 'NUM:6', 'OP:<', 'NUM:7', 'OP:>', 'NUM:8', 'EOF',
    ]);
  });

  it('allows a single decimal point in a number', () => {
    expect(kinds('3.14.5')).toEqual(['NUM:3.14', 'OP:.', 'NUM:5', 'EOF']);
  });

  it('keeps identifiers to letters', () => {
    expect(kinds('ab1 [x, y]')).toEqual([
      'IDENT:ab', 'NUM:1', 'LBRACKET', 'IDENT:x', 'COMMA', 'IDENT:y', 'RBRACKET', 'EOF',
    ]);
  });

  it('reads string contents without the quotes', () => {
    const toks = [...tokenize('"hello world"')];
    expect(toks[0]).toEqual({ t: 'STR', v: 'hello world', line: 1 });
  });

  it('skips comments and counts lines', () => {
    const toks = [...tokenize('# heading\nx\n  "s" # trailing\n')];
    expect(toks).toEqual([
      { t: 'IDENT', v: 'x', line: 2 },
      { t: 'STR', v: 's', line: 3 },
      { t: 'EOF', line: 4 },
    ]);
  });

  it('rejects a string that runs into a newline', () => {
    expect(() => [...tokenize('x = "abc\n";')]).toThrow(DslSyntaxError);
    expect(() => [...tokenize('\n"abc')]).toThrow('Unterminated string (line 2)');
  });

  it('yields lazily', () => {
    const gen = tokenize('a "unterminated');
    expect(gen.next().value).toEqual({ t: 'IDENT', v: 'a', line: 1 });
    expect(() => gen.next()).toThrow('Unterminated string');
  });
});

describe('describeTok', () => {
  it('formats valued, punctuation and end tokens', () => {
    const ident: Tok = { t: 'IDENT', v: 'foo', line: 1 };
    const brace: Tok = { t: 'RBRACE', line: 1 };
    const eof: Tok = { t: 'EOF', line: 1 };
    expect(describeTok(ident)).toBe('IDENT(foo)');
    expect(describeTok(brace)).toBe('"}"');
    expect(describeTok(eof)).toBe('end of input');
  });
});
