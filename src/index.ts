import { parseSource } from "./dsl/parser";
import type { RuntimeValue } from "./dsl/values";
import { VM, type StoreMode } from "./dsl/vm";
import { createDefaultRegistry, type BuiltinTable } from "./runtime/builtins";
import { createNodeIO, type ConsoleIO } from "./runtime/io";
import { RunLogger } from "./runtime/logger";

export * from "./dsl/ast";
export * from "./dsl/errors";
export { tokenize, describeTok, type Tok } from "./dsl/tokenizer";
export { parse, parseSource } from "./dsl/parser";
export { VM, type StoreMode, type VMConfig } from "./dsl/vm";
export {
  formatValue,
  isTruthy,
  parseNumber,
  toNumber,
  typeName,
  valuesEqual,
  RuntimeValueSchema,
  type RuntimeValue,
} from "./dsl/values";
export {
  BuiltinRegistry,
  createDefaultRegistry,
  type Builtin,
  type BuiltinTable,
  type HostFunction,
} from "./runtime/builtins";
export { createMemoryIO, createNodeIO, type ConsoleIO, type MemoryIO } from "./runtime/io";
export { BudgetTracker, RunLogger, StepEventSchema, type StepEvent } from "./runtime/logger";
export { programToJavaScript, type EmitOptions } from "./compiler/program-to-js";

export interface EvaluateOptions {
  io?: ConsoleIO;
  storeMode?: StoreMode;
  maxSteps?: number | null;
  /** Supply one to keep or persist the step events. */
  logger?: RunLogger;
}

/**
 * Parse and run `source`, passing `entry` to `main`. Entries in `builtins`
 * are callable by name and replace a default builtin of the same name.
 */
export function evaluate(
  source: string,
  entry: RuntimeValue = 0,
  builtins: BuiltinTable = {},
  options: EvaluateOptions = {},
): RuntimeValue {
  const program = parseSource(source);
  const registry = createDefaultRegistry(options.io ?? createNodeIO(), builtins);
  const logger = options.logger ?? new RunLogger({ budget: { maxSteps: options.maxSteps ?? null } });
  logger.init();
  const vm = new VM(registry, logger, { storeMode: options.storeMode ?? "frame" });
  return vm.run(program, entry);
}
