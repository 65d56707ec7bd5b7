import type { BinaryOp, BinaryExpr, Block, Expr, FunctionDef, Program, Stmt } from "./ast";
import { BudgetExceededError, DslNameError, DslRuntimeError, DslTypeError } from "./errors";
import { isTruthy, toNumber, typeName, valuesEqual, type RuntimeValue } from "./values";
import type { BuiltinRegistry } from "../runtime/builtins";
import type { RunLogger } from "../runtime/logger";

/**
 * `frame`: every activation gets a private store, so recursion works.
 * `shared`: one store per function name, reused by every activation of that
 * function; a recursive call overwrites the caller's parameter and locals.
 */
export type StoreMode = "frame" | "shared";

export interface VMConfig {
  storeMode: StoreMode;
  /** Variable that receives the entry value when `main` declares no parameter. */
  entryName: string;
}

const DEFAULT_VM_CONFIG: VMConfig = {
  storeMode: "frame",
  entryName: "env",
};

type Store = Map<string, RuntimeValue>;

type Activation = { fn: string; store: Store };

type Completion = { kind: "continue" } | { kind: "return"; value: RuntimeValue };

const CONTINUE: Completion = { kind: "continue" };

export class VM {
  private config: VMConfig;
  private stores = new Map<string, Store>();

  constructor(
    private registry: BuiltinRegistry,
    private logger: RunLogger,
    config: Partial<VMConfig> = {},
  ) {
    this.config = { ...DEFAULT_VM_CONFIG, ...config };
  }

  run(program: Program, entry: RuntimeValue = 0): RuntimeValue {
    const funcs = new Map<string, FunctionDef>();
    for (const fn of program.functions) funcs.set(fn.name, fn);
    this.stores.clear();

    const tracker = this.logger.budgetTracker;

    const step = (detail: string, fn: string, line: number) => {
      tracker.incrementStep();
      this.logger.append({ step: tracker.steps, type: "stmt", detail, fn, line, ts: new Date().toISOString() });
      const budget = tracker.checkBudget();
      if (budget.exceeded) throw new BudgetExceededError(budget.reason ?? "maxSteps", line);
    };

    const storeFor = (fn: FunctionDef): Store => {
      if (this.config.storeMode === "frame") return new Map();
      let store = this.stores.get(fn.name);
      if (!store) {
        store = new Map();
        this.stores.set(fn.name, store);
      }
      return store;
    };

    const readVar = (name: string, act: Activation, line: number): RuntimeValue => {
      if (!act.store.has(name)) {
        throw new DslNameError(`Undefined variable '${name}' in function ${act.fn}`, line);
      }
      return act.store.get(name) ?? null;
    };

    const evalExpr = (e: Expr, act: Activation): RuntimeValue => {
      switch (e.type) {
        case "NumberLiteral":
        case "StringLiteral":
          return e.value;
        case "Identifier":
          return readVar(e.name, act, e.line);
        case "Array": {
          const out: RuntimeValue[] = [];
          for (const item of e.items) out.push(evalExpr(item, act));
          return out;
        }
        case "Expression": {
          if (e.op === "=") return assign(e, act);
          const l = evalExpr(e.left, act);
          const r = evalExpr(e.right, act);
          return applyBinary(e.op, l, r, e.line);
        }
        case "ArrAcc": {
          const target = evalExpr(e.array, act);
          const idx = evalExpr(e.index, act);
          return readIndex(target, idx, e.line);
        }
        case "FunctionCall":
          return call(e, act);
        case "Return":
          throw new DslRuntimeError("'return' cannot be used as a value", e.line);
        default: {
          const unreachable: never = e;
          throw new Error(`Unknown expression: ${JSON.stringify(unreachable)}`);
        }
      }
    };

    const assign = (e: BinaryExpr, act: Activation): RuntimeValue => {
      const target = e.left;
      if (target.type === "Identifier") {
        const value = evalExpr(e.right, act);
        act.store.set(target.name, value);
        return value;
      }
      if (target.type === "ArrAcc") {
        const container = evalExpr(target.array, act);
        const idx = evalExpr(target.index, act);
        const value = evalExpr(e.right, act);
        writeIndex(container, idx, value, e.line);
        return value;
      }
      throw new DslRuntimeError(`Invalid assignment target: ${target.type}`, e.line);
    };

    const call = (e: Extract<Expr, { type: "FunctionCall" }>, act: Activation): RuntimeValue => {
      const fn = funcs.get(e.name);
      if (fn) {
        const arg = e.arg ? evalExpr(e.arg, act) : undefined;
        tracker.recordCall("user");
        this.logger.append({
          step: tracker.steps,
          type: "call",
          name: e.name,
          kind: "user",
          line: e.line,
          ts: new Date().toISOString(),
        });
        return invoke(fn, arg);
      }

      const builtin = this.registry.get(e.name);
      if (builtin) {
        const arg = e.arg ? evalExpr(e.arg, act) : undefined;
        tracker.recordCall("builtin");
        this.logger.append({
          step: tracker.steps,
          type: "call",
          name: e.name,
          kind: "builtin",
          line: e.line,
          ts: new Date().toISOString(),
        });
        return builtin.invoke(arg, e.line);
      }

      throw new DslNameError(`Unknown function '${e.name}'`, e.line);
    };

    const invoke = (fn: FunctionDef, arg: RuntimeValue | undefined): RuntimeValue => {
      const act: Activation = { fn: fn.name, store: storeFor(fn) };
      // a shared store keeps the previous parameter value when no argument is passed
      if (fn.param !== null && (arg !== undefined || this.config.storeMode === "frame")) {
        act.store.set(fn.param, arg ?? null);
      }
      const done = execBlock(fn.body, act);
      return done.kind === "return" ? done.value : null;
    };

    const execStmt = (s: Stmt, act: Activation): Completion => {
      step(s.type, act.fn, s.line);
      switch (s.type) {
        case "WhileLoop":
          while (isTruthy(evalExpr(s.cond, act))) {
            // an iteration is a step even when the body is empty
            step(s.type, act.fn, s.line);
            const done = execBlock(s.body, act);
            if (done.kind === "return") return done;
          }
          return CONTINUE;
        case "IfElse":
          return execBlock(isTruthy(evalExpr(s.cond, act)) ? s.then : s.else, act);
        case "Return":
          return { kind: "return", value: s.value ? evalExpr(s.value, act) : null };
        default:
          evalExpr(s, act);
          return CONTINUE;
      }
    };

    const execBlock = (block: Block, act: Activation): Completion => {
      for (const s of block.statements) {
        const done = execStmt(s, act);
        if (done.kind === "return") return done;
      }
      return CONTINUE;
    };

    try {
      const main = funcs.get("main");
      if (!main) throw new DslNameError("No 'main' function defined");
      const store = storeFor(main);
      // frame mode keeps the top-level activation of main for getStores()
      this.stores.set(main.name, store);
      store.set(main.param ?? this.config.entryName, entry);
      const done = execBlock(main.body, { fn: main.name, store });
      this.logger.finalize();
      return done.kind === "return" ? done.value : null;
    } catch (e: unknown) {
      const errorMessage = e instanceof Error ? e.message : String(e);
      this.logger.append({ step: tracker.steps, type: "error", error: errorMessage, ts: new Date().toISOString() });
      this.logger.finalize();
      throw e;
    }
  }

  /** Variable stores left by the last run, keyed by function name. */
  getStores(): Record<string, Record<string, RuntimeValue>> {
    const out: Record<string, Record<string, RuntimeValue>> = {};
    for (const [name, store] of this.stores) out[name] = Object.fromEntries(store);
    return out;
  }
}

// ---------- Operators ----------

function numbers(op: BinaryOp, l: RuntimeValue, r: RuntimeValue, line: number): [number, number] {
  const a = toNumber(l);
  const b = toNumber(r);
  if (a !== null && b !== null) return [a, b];
  throw new DslTypeError(`Unsupported operand types for ${op}: ${typeName(l)} and ${typeName(r)}`, line);
}

function applyBinary(op: Exclude<BinaryOp, "=">, l: RuntimeValue, r: RuntimeValue, line: number): RuntimeValue {
  if (op === "==") return valuesEqual(l, r);
  if (typeof l === "string" && typeof r === "string") {
    if (op === "+") return l + r;
    if (op === "<") return l < r;
    if (op === ">") return l > r;
  }
  const [a, b] = numbers(op, l, r, line);
  switch (op) {
    case "+":
      return a + b;
    case "-":
      return a - b;
    case "*":
      return a * b;
    case "/":
      if (b === 0) throw new DslRuntimeError("Division by zero", line);
      return Math.floor(a / b);
    case "^":
      return a ** b;
    case "<":
      return a < b;
    case ">":
      return a > b;
  }
}

// Negative indexes count from the end.
function resolveIndex(idx: RuntimeValue, length: number, line: number): number {
  const n = toNumber(idx);
  if (n === null) {
    throw new DslTypeError(`Index must be a number, got ${typeName(idx)}`, line);
  }
  const i = Math.trunc(n);
  const resolved = i < 0 ? i + length : i;
  if (!(resolved >= 0 && resolved < length)) {
    throw new DslRuntimeError(`Index ${idx} out of range for length ${length}`, line);
  }
  return resolved;
}

function readIndex(target: RuntimeValue, idx: RuntimeValue, line: number): RuntimeValue {
  if (Array.isArray(target)) return target[resolveIndex(idx, target.length, line)] ?? null;
  if (typeof target === "string") return target.charAt(resolveIndex(idx, target.length, line));
  throw new DslTypeError(`Cannot index a value of type ${typeName(target)}`, line);
}

function writeIndex(target: RuntimeValue, idx: RuntimeValue, value: RuntimeValue, line: number): void {
  if (!Array.isArray(target)) {
    throw new DslTypeError(`Cannot assign into a value of type ${typeName(target)}`, line);
  }
  target[resolveIndex(idx, target.length, line)] = value;
}
