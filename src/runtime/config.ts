import path from "node:path";
import { z } from "zod";
import { parseNumber, type RuntimeValue } from "../dsl/values";

export const RUNS_DIR = ".sprig-runs";

// Numeric text becomes a number; anything else is passed as a string.
const EntrySchema = z
  .string()
  .transform((raw): RuntimeValue => parseNumber(raw) ?? raw);

export const CliOptionsSchema = z.object({
  entry: EntrySchema.nullable().transform((v): RuntimeValue => v ?? 0),
  maxSteps: z.coerce.number().int().positive().nullable(),
  sharedStores: z.boolean(),
  trace: z.boolean(),
  dumpStores: z.boolean(),
  embedded: z.boolean(),
  verbose: z.boolean(),
  format: z.enum(["json", "toon"]),
  out: z.string().nullable(),
  project: z.string().transform((p) => path.resolve(p)),
});

export type CliOptions = z.output<typeof CliOptionsSchema>;

export type ArgReader = {
  argValue: (flag: string) => string | null;
  hasFlag: (flag: string) => boolean;
};

export function createArgReader(argv: readonly string[]): ArgReader {
  return {
    argValue(flag) {
      const idx = argv.indexOf(flag);
      if (idx === -1) return null;
      const nextArg = argv[idx + 1];
      if (!nextArg || nextArg.startsWith("--")) return null;
      return nextArg;
    },
    hasFlag(flag) {
      return argv.includes(flag);
    },
  };
}

export function readCliOptions(argv: readonly string[], cwd: string): CliOptions {
  const { argValue, hasFlag } = createArgReader(argv);
  const parsed = CliOptionsSchema.safeParse({
    entry: argValue("--entry"),
    maxSteps: argValue("--max-steps"),
    sharedStores: hasFlag("--shared-stores"),
    trace: hasFlag("--trace"),
    dumpStores: hasFlag("--dump-stores"),
    embedded: hasFlag("--embedded"),
    verbose: hasFlag("--verbose"),
    format: argValue("--format") ?? "json",
    out: argValue("--out"),
    project: argValue("--project") ?? cwd,
  });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.join(".") ?? "options";
    throw new Error(`Invalid option ${where}: ${issue?.message ?? "invalid value"}`);
  }
  return parsed.data;
}
