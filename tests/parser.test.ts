import { describe, it, expect } from 'vitest';
import { parse, parseSource } from '../src/dsl/parser';
import { tokenize } from '../src/dsl/tokenizer';
import { DslSyntaxError } from '../src/dsl/errors';
import type { Stmt } from '../src/dsl/ast';

const num = (value: number) => ({ type: 'NumberLiteral', value });
const id = (name: string) => ({ type: 'Identifier', name });

function firstStmt(body: string): Stmt {
  const program = parseSource(`main() { ${body} }`);
  const stmt = program.functions[0]?.body.statements[0];
  if (!stmt) throw new Error('no statement parsed');
  return stmt;
}

describe('parse: program structure', () => {
  it('reads functions with and without a parameter', () => {
    const program = parseSource('double(n) { return n * 2; }\nmain() { print(double(4)); }');
    expect(program.functions.map((f) => [f.name, f.param, f.line])).toEqual([
      ['double', 'n', 1],
      ['main', null, 2],
    ]);
  });

  it('accepts any iterable of tokens', () => {
    const program = parse([...tokenize('main() { }')]);
    expect(program).toEqual({
      type: 'Program',
      functions: [
        { type: 'Function', name: 'main', param: null, body: { type: 'Block', statements: [], line: 1 }, line: 1 },
      ],
    });
  });

  it('builds while and if/else statements', () => {
    const stmt = firstStmt('while (i) { if (i) { x = 1; } else { x = 2; } }');
    expect(stmt).toMatchObject({
      type: 'WhileLoop',
      cond: id('i'),
      body: {
        statements: [
          {
            type: 'IfElse',
            cond: id('i'),
            then: { statements: [{ op: '=', left: id('x'), right: num(1) }] },
            else: { statements: [{ op: '=', left: id('x'), right: num(2) }] },
          },
        ],
      },
    });
  });
});

describe('parse: expressions', () => {
  it('gives * tighter binding than +', () => {
    expect(firstStmt('x = 1 + 2 * 3;')).toMatchObject({
      op: '=',
      left: id('x'),
      right: { op: '+', left: num(1), right: { op: '*', left: num(2), right: num(3) } },
    });
  });

  it('groups ^ from the right', () => {
    expect(firstStmt('2 ^ 3 ^ 2;')).toMatchObject({
      op: '^',
      left: num(2),
      right: { op: '^', left: num(3), right: num(2) },
    });
  });

  it('groups - from the left', () => {
    expect(firstStmt('a - b - c;')).toMatchObject({
      op: '-',
      left: { op: '-', left: id('a'), right: id('b') },
      right: id('c'),
    });
  });

  it('chains assignment from the right', () => {
    expect(firstStmt('a = b = 1;')).toMatchObject({
      op: '=',
      left: id('a'),
      right: { op: '=', left: id('b'), right: num(1) },
    });
  });

  it('binds comparison tighter than +', () => {
    expect(firstStmt('i < n + 1;')).toMatchObject({
      op: '+',
      left: { op: '<', left: id('i'), right: id('n') },
      right: num(1),
    });
  });

  it('rewrites a parenthesised sign as multiplication', () => {
    expect(firstStmt('x = (-y);')).toMatchObject({
      op: '=',
      right: { type: 'Expression', op: '*', left: num(-1), right: id('y') },
    });
    expect(firstStmt('(+ 2);')).toMatchObject({ op: '*', left: num(1), right: num(2) });
  });

  it('reads array literals with nested and trailing items', () => {
    expect(firstStmt('[1, "a", [2], ];')).toMatchObject({
      type: 'Array',
      items: [num(1), { type: 'StringLiteral', value: 'a' }, { type: 'Array', items: [num(2)] }],
    });
    expect(firstStmt('[];')).toMatchObject({ type: 'Array', items: [] });
  });

  it('reads calls and indexing', () => {
    expect(firstStmt('f(a[i + 1]);')).toMatchObject({
      type: 'FunctionCall',
      name: 'f',
      arg: { type: 'ArrAcc', array: id('a'), index: { op: '+', left: id('i'), right: num(1) } },
    });
    expect(firstStmt('g();')).toMatchObject({ type: 'FunctionCall', name: 'g', arg: null });
  });

  it('reads return with and without a value', () => {
    expect(firstStmt('return;')).toMatchObject({ type: 'Return', value: null });
    expect(firstStmt('return x + 1;')).toMatchObject({
      type: 'Return',
      value: { op: '+', left: id('x'), right: num(1) },
    });
  });

  it('parses decimal literals as numbers', () => {
    expect(firstStmt('2.5;')).toMatchObject(num(2.5));
  });
});

describe('parse: errors', () => {
  it('reports the expected and offending tokens with the line', () => {
    expect(() => parseSource('main() {\n  x = 1\n}')).toThrow('Parse error: expected ";" got "}" (line 3)');
  });

  it('rejects a bare negative literal', () => {
    expect(() => parseSource('main() { x = -1; }')).toThrow('Parse error: expected expression got OP(-) (line 1)');
  });

  it('requires an else branch', () => {
    expect(() => parseSource('main() { if (1) { } }')).toThrow('Parse error: expected "else" got "}" (line 1)');
  });

  it('reports an unclosed block at end of input', () => {
    expect(() => parseSource('main() { x = 1;')).toThrow('Parse error: expected "}" got end of input (line 1)');
  });

  it('requires a main function', () => {
    expect(() => parseSource('helper() { }')).toThrow("No 'main' function defined (line 1)");
  });

  it('rejects duplicate function names', () => {
    expect(() => parseSource('main() { }\nmain() { }')).toThrow("Duplicate function 'main' (line 2)");
  });

  it('throws DslSyntaxError with kind and line', () => {
    try {
      parseSource('main() {\n\n  print(1;\n}');
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(DslSyntaxError);
      if (!(e instanceof DslSyntaxError)) return;
      expect(e.kind).toBe('syntax');
      expect(e.line).toBe(3);
      expect(e.detail).toBe('Parse error: expected ")" got ";"');
    }
  });
});
