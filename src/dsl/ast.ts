export type Program = { readonly type: "Program"; readonly functions: readonly FunctionDef[] };

export type FunctionDef = {
  readonly type: "Function";
  readonly name: string;
  readonly param: string | null;
  readonly body: Block;
  readonly line: number;
};

export type Block = { readonly type: "Block"; readonly statements: readonly Stmt[]; readonly line: number };

export type Stmt =
  | { readonly type: "WhileLoop"; readonly cond: Expr; readonly body: Block; readonly line: number }
  | {
      readonly type: "IfElse";
      readonly cond: Expr;
      readonly then: Block;
      readonly else: Block;
      readonly line: number;
    }
  | Expr;

export type BinaryOp = "=" | "+" | "-" | "*" | "/" | "^" | "<" | ">" | "==";

export type Expr =
  | { readonly type: "Identifier"; readonly name: string; readonly line: number }
  | { readonly type: "NumberLiteral"; readonly value: number; readonly line: number }
  | { readonly type: "StringLiteral"; readonly value: string; readonly line: number }
  | { readonly type: "Array"; readonly items: readonly Expr[]; readonly line: number }
  | {
      readonly type: "Expression";
      readonly op: BinaryOp;
      readonly left: Expr;
      readonly right: Expr;
      readonly line: number;
    }
  | { readonly type: "FunctionCall"; readonly name: string; readonly arg: Expr | null; readonly line: number }
  | { readonly type: "ArrAcc"; readonly array: Expr; readonly index: Expr; readonly line: number }
  | { readonly type: "Return"; readonly value: Expr | null; readonly line: number };

export type WhileLoop = Extract<Stmt, { type: "WhileLoop" }>;
export type IfElse = Extract<Stmt, { type: "IfElse" }>;
export type Identifier = Extract<Expr, { type: "Identifier" }>;
export type BinaryExpr = Extract<Expr, { type: "Expression" }>;
export type ArrAcc = Extract<Expr, { type: "ArrAcc" }>;

export const BINARY_OPS: readonly BinaryOp[] = ["=", "+", "-", "*", "/", "^", "<", ">", "=="];

export function isBinaryOp(op: string): op is BinaryOp {
  const ops: readonly string[] = BINARY_OPS;
  return ops.includes(op);
}
