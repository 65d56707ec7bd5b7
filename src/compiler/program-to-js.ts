import type { BinaryExpr, Block, Expr, FunctionDef, Program, Stmt } from "../dsl/ast";
import { DslRenderError } from "../dsl/errors";
import { DECIMAL_TEXT, SPECIAL_TEXT, type RuntimeValue } from "../dsl/values";
import { DEFAULT_BUILTIN_NAMES } from "../runtime/builtins";

export interface EmitOptions {
  /**
   * `standalone`: an ES module with Node implementations of the default
   * builtins and a closing `main(entry)` call.
   * `embedded`: helpers and functions only; the host binds builtin names.
   */
  mode?: "standalone" | "embedded";
  entry?: RuntimeValue;
  /** Parameter name given to a `main` that declares none. */
  entryName?: string;
  /** Shown in the header comment of standalone output. */
  sourceName?: string;
  /** Extra host builtin names, so variables do not shadow them. */
  builtins?: readonly string[];
}

const INDENT = "  ";

// Words a generated name may not be, plus the globals the output relies on.
const RESERVED = new Set([
  "await", "break", "case", "catch", "class", "const", "continue", "debugger", "default", "delete",
  "do", "else", "enum", "export", "extends", "false", "finally", "for", "function", "if", "implements",
  "import", "in", "instanceof", "interface", "let", "new", "null", "package", "private", "protected",
  "public", "return", "static", "super", "switch", "this", "throw", "true", "try", "typeof", "var",
  "void", "while", "with", "yield", "arguments", "eval", "undefined", "NaN", "Infinity",
  "Math", "Array", "Boolean", "Number", "String", "JSON", "Error", "Buffer", "TextDecoder", "console", "process",
  "globalThis", "Symbol",
]);

// Runtime checks shared by both modes; messages match the evaluator's.
const HELPERS = [
  'const $unset = Symbol("unset");',
  "const $fail = (detail, line) => {",
  "  throw new Error(`${detail} (line ${line})`);",
  "};",
  'const $typeName = (v) => (v === null || v === undefined ? "none" : Array.isArray(v) ? "array" : typeof v);',
  "const $truthy = (v) => (Array.isArray(v) ? v.length > 0 : Boolean(v));",
  'const $toNumber = (v) => (typeof v === "number" ? v : typeof v === "boolean" ? (v ? 1 : 0) : null);',
  "const $equal = (l, r) => {",
  "  if (Array.isArray(l) || Array.isArray(r)) {",
  "    return Array.isArray(l) && Array.isArray(r) && l.length === r.length && l.every((item, i) => $equal(item, r[i]));",
  "  }",
  "  const a = $toNumber(l);",
  "  const b = $toNumber(r);",
  "  if (a !== null && b !== null) return a === b;",
  "  return l === r || (l == null && r == null);",
  "};",
  "const $binary = (op, l, r, line) => {",
  '  if (op === "==") return $equal(l, r);',
  '  if (typeof l === "string" && typeof r === "string") {',
  '    if (op === "+") return l + r;',
  '    if (op === "<") return l < r;',
  '    if (op === ">") return l > r;',
  "  }",
  "  const a = $toNumber(l);",
  "  const b = $toNumber(r);",
  "  if (a === null || b === null) {",
  "    $fail(`Unsupported operand types for ${op}: ${$typeName(l)} and ${$typeName(r)}`, line);",
  "  }",
  "  switch (op) {",
  '    case "+":',
  "      return a + b;",
  '    case "-":',
  "      return a - b;",
  '    case "*":',
  "      return a * b;",
  '    case "/":',
  '      if (b === 0) $fail("Division by zero", line);',
  "      return Math.floor(a / b);",
  '    case "^":',
  "      return a ** b;",
  '    case "<":',
  "      return a < b;",
  '    case ">":',
  "      return a > b;",
  "  }",
  "};",
  "const $slot = (idx, length, line) => {",
  "  const n = $toNumber(idx);",
  "  if (n === null) $fail(`Index must be a number, got ${$typeName(idx)}`, line);",
  "  const i = Math.trunc(n);",
  "  const resolved = i < 0 ? i + length : i;",
  "  if (!(resolved >= 0 && resolved < length)) $fail(`Index ${idx} out of range for length ${length}`, line);",
  "  return resolved;",
  "};",
  "const $index = (target, idx, line) => {",
  "  if (Array.isArray(target)) return target[$slot(idx, target.length, line)] ?? null;",
  '  if (typeof target === "string") return target.charAt($slot(idx, target.length, line));',
  "  return $fail(`Cannot index a value of type ${$typeName(target)}`, line);",
  "};",
  "const $store = (target, idx, value, line) => {",
  "  if (!Array.isArray(target)) $fail(`Cannot assign into a value of type ${$typeName(target)}`, line);",
  "  target[$slot(idx, target.length, line)] = value;",
  "  return value;",
  "};",
  "const $read = (value, name, fn, line) =>",
  "  value === $unset ? $fail(`Undefined variable '${name}' in function ${fn}`, line) : value;",
];

const STANDALONE_PRELUDE = [
  'import { readSync as $readSync } from "node:fs";',
  "",
  "const $format = (v, nested = false) => {",
  '  if (v === null || v === undefined) return "none";',
  '  if (Array.isArray(v)) return `[${v.map((item) => $format(item, true)).join(", ")}]`;',
  '  if (typeof v === "string") return nested ? JSON.stringify(v) : v;',
  "  return String(v);",
  "};",
  "",
  `const $decimalText = ${String(DECIMAL_TEXT)};`,
  `const $specialText = ${String(SPECIAL_TEXT)};`,
  "const $parseNumber = (text) => {",
  "  const t = text.trim();",
  "  if ($decimalText.test(t)) return Number.parseFloat(t);",
  "  const special = $specialText.exec(t);",
  "  if (!special) return null;",
  '  if (special[2].toLowerCase() === "nan") return NaN;',
  '  return special[1] === "-" ? -Infinity : Infinity;',
  "};",
  "",
  "const $readLine = (() => {",
  "  const decoder = new TextDecoder();",
  "  const chunk = Buffer.alloc(4096);",
  '  let buffered = "";',
  "  let eof = false;",
  "  return () => {",
  '    while (!eof && !buffered.includes("\\n")) {',
  "      let n;",
  "      try {",
  "        n = $readSync(0, chunk, 0, chunk.length, null);",
  "      } catch (err) {",
  '        if (err.code === "EAGAIN") continue;',
  "        throw err;",
  "      }",
  "      if (n === 0) {",
  "        eof = true;",
  "        buffered += decoder.decode();",
  "      } else {",
  "        buffered += decoder.decode(chunk.subarray(0, n), { stream: true });",
  "      }",
  "    }",
  "    if (buffered.length === 0 && eof) return null;",
  '    const idx = buffered.indexOf("\\n");',
  "    const line = idx === -1 ? buffered : buffered.slice(0, idx);",
  '    buffered = idx === -1 ? "" : buffered.slice(idx + 1);',
  '    return line.endsWith("\\r") ? line.slice(0, -1) : line;',
  "  };",
  "})();",
];

const STANDALONE_BUILTINS: Record<string, string[]> = {
  print: ["function print(value) {", "  console.log($format(value));", "  return null;", "}"],
  inpstr: [
    "function inpstr() {",
    "  const line = $readLine();",
    '  if (line === null) throw new Error("inpstr: end of input");',
    "  return line;",
    "}",
  ],
  inpnum: [
    "function inpnum() {",
    "  const line = $readLine();",
    '  if (line === null) throw new Error("inpnum: end of input");',
    "  const n = $parseNumber(line);",
    "  if (n === null) throw new Error(`inpnum: could not convert input to a number: ${JSON.stringify(line)}`);",
    "  return n;",
    "}",
  ],
  sqrt: [
    "function sqrt(x) {",
    '  if (typeof x !== "number") {',
    '    const got = x === null ? "null" : Array.isArray(x) ? "array" : typeof x;',
    "    throw new Error(`Invalid argument for builtin 'sqrt': Expected number, received ${got}`);",
    "  }",
    "  return Math.sqrt(x);",
    "}",
  ],
};

type Names = {
  fn: (name: string) => string;
  variable: (name: string) => string;
  /** User functions plus every builtin the output may call. */
  callable: (name: string) => boolean;
};

// What an identifier resolves to inside one function.
type Scope = {
  fn: string;
  param: string | null;
  locals: ReadonlySet<string>;
  names: Names;
};

function createNames(program: Program, extraBuiltins: readonly string[]): Names {
  const callables = new Set<string>([...DEFAULT_BUILTIN_NAMES, ...extraBuiltins]);
  for (const f of program.functions) callables.add(f.name);
  return {
    fn: (name) => (RESERVED.has(name) ? `${name}$` : name),
    // `$v` keeps a variable apart from a function whose own name needed `$`
    variable: (name) => {
      if (callables.has(name)) return `${name}$v`;
      if (RESERVED.has(name)) return `${name}$`;
      return name;
    },
    callable: (name) => callables.has(name),
  };
}

/**
 * Render a program as JavaScript that behaves like the evaluator in frame
 * mode: the same operator, index and variable checks with the same messages.
 * Step budgets and shared stores are not carried over.
 */
export function programToJavaScript(program: Program, options: EmitOptions = {}): string {
  const mode = options.mode ?? "standalone";
  const entryName = options.entryName ?? "env";
  const names = createNames(program, options.builtins ?? []);
  const lines: string[] = [];

  if (mode === "standalone") {
    lines.push(`// Generated by sprig${options.sourceName ? ` from ${options.sourceName}` : ""}`);
    lines.push(...STANDALONE_PRELUDE);
    lines.push("");
  }
  lines.push(...HELPERS);
  lines.push("");

  if (mode === "standalone") {
    const userNames = new Set(program.functions.map((f) => f.name));
    for (const [name, body] of Object.entries(STANDALONE_BUILTINS)) {
      if (userNames.has(name)) continue;
      lines.push(...body);
      lines.push("");
    }
  }

  for (const fn of program.functions) {
    lines.push(...compileFunction(fn, names, entryName));
    lines.push("");
  }

  if (mode === "standalone") {
    lines.push(`${names.fn("main")}(${renderValue(options.entry ?? 0)});`);
  } else {
    lines.pop();
  }

  return lines.join("\n") + "\n";
}

function compileFunction(fn: FunctionDef, names: Names, entryName: string): string[] {
  const lines: string[] = [];
  const param = fn.param ?? (fn.name === "main" ? entryName : null);
  lines.push(`function ${names.fn(fn.name)}(${param === null ? "" : `${names.variable(param)} = null`}) {`);

  const locals = new Set<string>();
  collectAssigned(fn.body, locals);
  if (param !== null) locals.delete(param);
  if (locals.size > 0) {
    lines.push(`${INDENT}let ${[...locals].map((name) => `${names.variable(name)} = $unset`).join(", ")};`);
  }

  const scope: Scope = { fn: fn.name, param, locals, names };
  lines.push(...compileBlock(fn.body, scope, INDENT));
  lines.push("}");
  return lines;
}

function compileBlock(block: Block, scope: Scope, indent: string): string[] {
  const lines: string[] = [];
  for (const s of block.statements) lines.push(...compileStmt(s, scope, indent));
  return lines;
}

function compileStmt(s: Stmt, scope: Scope, indent: string): string[] {
  switch (s.type) {
    case "WhileLoop":
      return [
        `${indent}while ($truthy(${renderExpr(s.cond, scope)})) {`,
        ...compileBlock(s.body, scope, indent + INDENT),
        `${indent}}`,
      ];
    case "IfElse":
      return [
        `${indent}if ($truthy(${renderExpr(s.cond, scope)})) {`,
        ...compileBlock(s.then, scope, indent + INDENT),
        `${indent}} else {`,
        ...compileBlock(s.else, scope, indent + INDENT),
        `${indent}}`,
      ];
    case "Return":
      return [s.value ? `${indent}return ${renderExpr(s.value, scope)};` : `${indent}return null;`];
    case "Expression":
      if (s.op === "=") return [`${indent}${renderAssign(s, scope)};`];
      return [`${indent}${renderExpr(s, scope)};`];
    default:
      return [`${indent}${renderExpr(s, scope)};`];
  }
}

function renderAssign(e: BinaryExpr, scope: Scope): string {
  const target = e.left;
  if (target.type === "Identifier") {
    return `${scope.names.variable(target.name)} = ${renderExpr(e.right, scope)}`;
  }
  if (target.type === "ArrAcc") {
    const container = renderExpr(target.array, scope);
    const idx = renderExpr(target.index, scope);
    return `$store(${container}, ${idx}, ${renderExpr(e.right, scope)}, ${e.line})`;
  }
  throw new DslRenderError(`Invalid assignment target: ${target.type}`, e.line);
}

function renderRead(name: string, line: number, scope: Scope): string {
  const variable = scope.names.variable(name);
  if (name === scope.param) return variable;
  if (scope.locals.has(name)) return `$read(${variable}, ${JSON.stringify(name)}, ${JSON.stringify(scope.fn)}, ${line})`;
  // never assigned in this function, so every read fails
  return `$fail(${JSON.stringify(`Undefined variable '${name}' in function ${scope.fn}`)}, ${line})`;
}

function renderExpr(e: Expr, scope: Scope): string {
  switch (e.type) {
    case "NumberLiteral":
      return e.value < 0 || Object.is(e.value, -0) ? `(${e.value})` : String(e.value);
    case "StringLiteral":
      return JSON.stringify(e.value);
    case "Identifier":
      return renderRead(e.name, e.line, scope);
    case "Array":
      return `[${e.items.map((item) => renderExpr(item, scope)).join(", ")}]`;
    case "Expression": {
      if (e.op === "=") return `(${renderAssign(e, scope)})`;
      const l = renderExpr(e.left, scope);
      const r = renderExpr(e.right, scope);
      return `$binary(${JSON.stringify(e.op)}, ${l}, ${r}, ${e.line})`;
    }
    case "FunctionCall":
      if (!scope.names.callable(e.name)) {
        return `$fail(${JSON.stringify(`Unknown function '${e.name}'`)}, ${e.line})`;
      }
      return `${scope.names.fn(e.name)}(${e.arg ? renderExpr(e.arg, scope) : ""})`;
    case "ArrAcc":
      return `$index(${renderExpr(e.array, scope)}, ${renderExpr(e.index, scope)}, ${e.line})`;
    case "Return":
      throw new DslRenderError("'return' cannot be used as a value", e.line);
    default: {
      const unreachable: never = e;
      throw new Error(`Unknown expression: ${JSON.stringify(unreachable)}`);
    }
  }
}

function renderValue(v: RuntimeValue): string {
  if (Array.isArray(v)) return `[${v.map(renderValue).join(", ")}]`;
  if (typeof v === "number") return v < 0 ? `(${v})` : String(v);
  return JSON.stringify(v);
}

function collectAssigned(node: Block | Stmt, out: Set<string>): void {
  switch (node.type) {
    case "Block":
      for (const s of node.statements) collectAssigned(s, out);
      return;
    case "WhileLoop":
      collectAssigned(node.cond, out);
      collectAssigned(node.body, out);
      return;
    case "IfElse":
      collectAssigned(node.cond, out);
      collectAssigned(node.then, out);
      collectAssigned(node.else, out);
      return;
    case "Expression":
      if (node.op === "=" && node.left.type === "Identifier") out.add(node.left.name);
      collectAssigned(node.left, out);
      collectAssigned(node.right, out);
      return;
    case "Array":
      for (const item of node.items) collectAssigned(item, out);
      return;
    case "FunctionCall":
      if (node.arg) collectAssigned(node.arg, out);
      return;
    case "ArrAcc":
      collectAssigned(node.array, out);
      collectAssigned(node.index, out);
      return;
    case "Return":
      if (node.value) collectAssigned(node.value, out);
      return;
    case "Identifier":
    case "NumberLiteral":
    case "StringLiteral":
      return;
  }
}
