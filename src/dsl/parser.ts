import type { BinaryOp, Block, Expr, FunctionDef, Program, Stmt } from "./ast";
import { isBinaryOp } from "./ast";
import { DslSyntaxError } from "./errors";
import { describeTok, tokenize, type Tok } from "./tokenizer";

// Higher binds tighter.
const PRECEDENCE: Record<BinaryOp, number> = {
  "<": 5,
  ">": 5,
  "==": 5,
  "=": 1,
  "+": 1,
  "-": 1,
  "*": 10,
  "/": 10,
  "^": 30,
};

// Recursing at the operator's own level makes these bind right to left.
const RIGHT_ASSOC = new Set<BinaryOp>(["^", "="]);

// Tokens that end an expression; `return` directly before one carries no value.
const EXPR_END = new Set<Tok["t"]>(["SEMI", "RPAREN", "RBRACE", "RBRACKET", "COMMA", "EOF"]);

export function parse(tokens: Iterable<Tok>): Program {
  const iter = tokens[Symbol.iterator]();
  let current: Tok | null = null;

  const pull = (): Tok => {
    const r = iter.next();
    if (r.done) return { t: "EOF", line: current?.line ?? 1 };
    return r.value;
  };

  let next: Tok = pull();

  const advance = (): Tok => {
    current = next;
    next = next.t === "EOF" ? next : pull();
    return current;
  };

  const at = (t: Tok["t"], v?: string): boolean => {
    if (next.t !== t) return false;
    if (v === undefined) return true;
    return "v" in next && next.v === v;
  };

  const fail = (expected: string): never => {
    throw new DslSyntaxError(`Parse error: expected ${expected} got ${describeTok(next)}`, next.line);
  };

  const eat = (t: Tok["t"], expected: string, v?: string): Tok => {
    if (!at(t, v)) fail(expected);
    return advance();
  };

  const eatIdent = (): { name: string; line: number } => {
    const tok = next;
    if (tok.t !== "IDENT") return fail("identifier");
    advance();
    return { name: tok.v, line: tok.line };
  };

  const parseProgram = (): Program => {
    const functions: FunctionDef[] = [];
    const seen = new Set<string>();
    while (!at("EOF")) {
      const fn = parseFunction();
      if (seen.has(fn.name)) {
        throw new DslSyntaxError(`Duplicate function '${fn.name}'`, fn.line);
      }
      seen.add(fn.name);
      functions.push(fn);
    }
    if (!seen.has("main")) {
      throw new DslSyntaxError("No 'main' function defined", next.line);
    }
    return { type: "Program", functions };
  };

  const parseFunction = (): FunctionDef => {
    const { name, line } = eatIdent();
    eat("LPAREN", '"("');
    const param = at("IDENT") ? eatIdent().name : null;
    eat("RPAREN", '")"');
    const body = parseBlock();
    return { type: "Function", name, param, body, line };
  };

  const parseBlock = (): Block => {
    const open = eat("LBRACE", '"{"');
    const statements: Stmt[] = [];
    while (!at("RBRACE")) {
      if (at("EOF")) fail('"}"');
      statements.push(parseStmt());
    }
    eat("RBRACE", '"}"');
    return { type: "Block", statements, line: open.line };
  };

  const parseStmt = (): Stmt => {
    if (at("IDENT", "while")) return parseWhile();
    if (at("IDENT", "if")) return parseIf();
    const expr = parseExpr();
    eat("SEMI", '";"');
    return expr;
  };

  const parseWhile = (): Stmt => {
    const kw = eat("IDENT", '"while"', "while");
    eat("LPAREN", '"("');
    const cond = parseExpr();
    eat("RPAREN", '")"');
    const body = parseBlock();
    return { type: "WhileLoop", cond, body, line: kw.line };
  };

  const parseIf = (): Stmt => {
    const kw = eat("IDENT", '"if"', "if");
    eat("LPAREN", '"("');
    const cond = parseExpr();
    eat("RPAREN", '")"');
    const thenB = parseBlock();
    eat("IDENT", '"else"', "else");
    const elseB = parseBlock();
    return { type: "IfElse", cond, then: thenB, else: elseB, line: kw.line };
  };

  // -------- Expressions (precedence climbing) --------

  const binaryOpAt = (): BinaryOp | null => {
    if (next.t === "ASSIGN") return "=";
    if (next.t === "OP" && isBinaryOp(next.v)) return next.v;
    return null;
  };

  const parseExpr = (minPrec = 1): Expr => {
    let left = parseAtom();
    while (true) {
      const op = binaryOpAt();
      if (op === null || PRECEDENCE[op] < minPrec) break;
      advance();
      const prec = PRECEDENCE[op];
      const right = parseExpr(RIGHT_ASSOC.has(op) ? prec : prec + 1);
      left = { type: "Expression", op, left, right, line: left.line };
    }
    return left;
  };

  const parseAtom = (): Expr => {
    const tok = next;

    if (tok.t === "LBRACKET") {
      advance();
      const items: Expr[] = [];
      while (!at("RBRACKET")) {
        items.push(parseExpr());
        if (!at("COMMA")) break;
        advance();
      }
      eat("RBRACKET", '"]"');
      return { type: "Array", items, line: tok.line };
    }

    if (tok.t === "IDENT") {
      advance();
      if (tok.v === "return") {
        const value = EXPR_END.has(next.t) ? null : parseExpr();
        return { type: "Return", value, line: tok.line };
      }
      if (at("LPAREN")) {
        advance();
        const arg = at("RPAREN") ? null : parseExpr();
        eat("RPAREN", '")"');
        return { type: "FunctionCall", name: tok.v, arg, line: tok.line };
      }
      if (at("LBRACKET")) {
        advance();
        const index = parseExpr();
        eat("RBRACKET", '"]"');
        return {
          type: "ArrAcc",
          array: { type: "Identifier", name: tok.v, line: tok.line },
          index,
          line: tok.line,
        };
      }
      return { type: "Identifier", name: tok.v, line: tok.line };
    }

    if (tok.t === "NUM") {
      advance();
      return { type: "NumberLiteral", value: Number.parseFloat(tok.v), line: tok.line };
    }

    if (tok.t === "STR") {
      advance();
      return { type: "StringLiteral", value: tok.v, line: tok.line };
    }

    if (tok.t === "LPAREN") {
      advance();
      const sign = next;
      if (sign.t === "OP" && (sign.v === "+" || sign.v === "-")) {
        // unary sign: (-x) becomes (-1 * x)
        advance();
        const operand = parseExpr();
        eat("RPAREN", '")"');
        return {
          type: "Expression",
          op: "*",
          left: { type: "NumberLiteral", value: sign.v === "-" ? -1.0 : 1.0, line: sign.line },
          right: operand,
          line: tok.line,
        };
      }
      const inner = parseExpr();
      eat("RPAREN", '")"');
      return inner;
    }

    return fail("expression");
  };

  return parseProgram();
}

export function parseSource(src: string): Program {
  return parse(tokenize(src));
}
