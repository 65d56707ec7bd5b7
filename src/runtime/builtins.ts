import { z } from "zod";
import { DslTypeError } from "../dsl/errors";
import { formatValue, parseNumber, RuntimeValueSchema, type RuntimeValue } from "../dsl/values";
import type { ConsoleIO } from "./io";

export type BuiltinContext = {
  io: ConsoleIO;
};

export type Builtin<Arg> = {
  name: string;
  description: string;
  schema: z.ZodType<Arg>;
  run: (ctx: BuiltinContext, arg: Arg) => RuntimeValue;
};

/** A callable supplied by the embedding host. Returning nothing means `none`. */
export type HostFunction = (arg?: RuntimeValue) => RuntimeValue | void;

function isValue(out: RuntimeValue | void): out is RuntimeValue {
  return out !== undefined;
}

export type BuiltinTable = Record<string, HostFunction>;

export type RegisteredBuiltin = {
  name: string;
  description: string;
  invoke: (arg: RuntimeValue | undefined, line: number) => RuntimeValue;
};

export class BuiltinRegistry {
  private map = new Map<string, RegisteredBuiltin>();
  private frozen = false;

  constructor(private ctx: BuiltinContext) {}

  register<T>(b: Builtin<T>): void {
    this.assertWritable(b.name);
    this.map.set(b.name, {
      name: b.name,
      description: b.description,
      invoke: (arg, line) => {
        const parsed = b.schema.safeParse(arg);
        if (!parsed.success) {
          const issue = parsed.error.issues[0]?.message ?? "invalid argument";
          throw new DslTypeError(`Invalid argument for builtin '${b.name}': ${issue}`, line);
        }
        return b.run(this.ctx, parsed.data);
      },
    });
  }

  registerHost(name: string, fn: HostFunction, description = "Host function"): void {
    this.assertWritable(name);
    // host callables see the caller's value itself so arrays stay aliased
    this.map.set(name, {
      name,
      description,
      invoke: (arg) => {
        const out = fn(arg);
        return isValue(out) ? out : null;
      },
    });
  }

  /** After this the table is fixed for the rest of the run. */
  freeze(): this {
    this.frozen = true;
    return this;
  }

  get(name: string): RegisteredBuiltin | undefined {
    return this.map.get(name);
  }

  has(name: string): boolean {
    return this.map.has(name);
  }

  names(): string[] {
    return [...this.map.keys()];
  }

  private assertWritable(name: string): void {
    if (this.frozen) throw new Error(`Builtin registry is frozen; cannot register: ${name}`);
    if (this.map.has(name)) throw new Error(`Builtin already registered: ${name}`);
  }
}

// ---------- Builtins ----------

export const PRINT: Builtin<RuntimeValue | undefined> = {
  name: "print",
  description: "Write a value to the console.",
  schema: RuntimeValueSchema.optional(),
  run(ctx, arg) {
    ctx.io.write(formatValue(arg));
    return null;
  },
};

export const INPSTR: Builtin<unknown> = {
  name: "inpstr",
  description: "Read one line of console input as text.",
  schema: z.unknown(),
  run(ctx) {
    const line = ctx.io.readLine();
    if (line === null) throw new Error("inpstr: end of input");
    return line;
  },
};

export const INPNUM: Builtin<unknown> = {
  name: "inpnum",
  description: "Read one line of console input as a number.",
  schema: z.unknown(),
  run(ctx) {
    const line = ctx.io.readLine();
    if (line === null) throw new Error("inpnum: end of input");
    const n = parseNumber(line);
    if (n === null) {
      throw new Error(`inpnum: could not convert input to a number: ${JSON.stringify(line)}`);
    }
    return n;
  },
};

export const SQRT: Builtin<number> = {
  name: "sqrt",
  description: "Square root of a number.",
  schema: z.number(),
  run(_ctx, arg) {
    return Math.sqrt(arg);
  },
};

export const DEFAULT_BUILTIN_NAMES: readonly string[] = [PRINT.name, INPSTR.name, INPNUM.name, SQRT.name];

/**
 * Default builtins plus the host's own. A host entry with a default's name
 * replaces the default.
 */
export function createDefaultRegistry(io: ConsoleIO, host: BuiltinTable = {}): BuiltinRegistry {
  const registry = new BuiltinRegistry({ io });
  const hostNames = new Set(Object.keys(host));
  if (!hostNames.has(PRINT.name)) registry.register(PRINT);
  if (!hostNames.has(INPSTR.name)) registry.register(INPSTR);
  if (!hostNames.has(INPNUM.name)) registry.register(INPNUM);
  if (!hostNames.has(SQRT.name)) registry.register(SQRT);
  for (const [name, fn] of Object.entries(host)) {
    registry.registerHost(name, fn);
  }
  return registry.freeze();
}
