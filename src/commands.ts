import fs from "node:fs/promises";
import path from "node:path";
import { programToJavaScript } from "./compiler/program-to-js";
import type { Program } from "./dsl/ast";
import { DslSyntaxError } from "./dsl/errors";
import { parseSource } from "./dsl/parser";
import { formatValue } from "./dsl/values";
import { VM } from "./dsl/vm";
import { createDefaultRegistry } from "./runtime/builtins";
import { readCliOptions, RUNS_DIR, type CliOptions } from "./runtime/config";
import type { ConsoleIO } from "./runtime/io";
import { RunLogger, RunSummarySchema, StepEventSchema, type StepEvent } from "./runtime/logger";
import { serialize } from "./runtime/serialize";

export interface CommandContext {
  cwd: string;
  /** Console the running program reads and prints through. */
  io: ConsoleIO;
  out: (line: string) => void;
  err: (line: string) => void;
}

export const USAGE = `
Sprig CLI

Usage:
  sprig run <file.sp> [options]             Run a Sprig program
  sprig emit <file.sp> [--out <file.js>]    Render a program as JavaScript
  sprig <file.sp> --emit-source             Same as emit
  sprig ast <file.sp> [--format json|toon]  Print the parsed syntax tree
  sprig replay <runId> [--project <dir>]    Show the timeline of a traced run

Options:
  --entry <value>       Value passed to main (numeric text becomes a number; default: 0)
  --shared-stores       One variable store per function name instead of per call
  --max-steps <n>       Maximum executed statements (default: unlimited)
  --trace               Write step events under <project>/${RUNS_DIR}/<runId>/
  --project <dir>       Project root directory (default: cwd)
  --dump-stores         Print the variable stores after the run
  --format <fmt>        Dump format: json or toon (default: json)
  --embedded            Emit functions only; the host binds the builtins
  --out <file>          Output file path
  --verbose             Enable verbose output

Examples:
  sprig run examples/countdown.sp --entry 5
  sprig emit examples/fib.sp --out dist/fib.js
  sprig ast examples/fib.sp --format toon
  sprig replay 1234567890-abc123
`;

// ============================================================================
// Dispatch
// ============================================================================

const COMMANDS = new Set(["run", "emit", "ast", "replay", "help"]);

export async function dispatch(argv: readonly string[], ctx: CommandContext): Promise<number> {
  const cmd = argv[0];

  if (!cmd || cmd === "help" || cmd === "--help" || cmd === "-h") {
    ctx.out(USAGE);
    return 0;
  }

  if (argv.includes("--emit-source") && !COMMANDS.has(cmd)) {
    return guard(ctx, () => handleEmit(cmd, argv.slice(1), ctx));
  }

  switch (cmd) {
    case "run":
    case "emit":
    case "ast":
    case "replay": {
      const target = argv[1];
      if (!target || target.startsWith("--")) {
        ctx.err(`Error: Missing ${cmd === "replay" ? "<runId>" : "<file.sp>"}`);
        ctx.err(USAGE);
        return 1;
      }
      const rest = argv.slice(2);
      if (cmd === "run") return guard(ctx, () => handleRun(target, rest, ctx));
      if (cmd === "emit") return guard(ctx, () => handleEmit(target, rest, ctx));
      if (cmd === "ast") return guard(ctx, () => handleAst(target, rest, ctx));
      return guard(ctx, () => handleReplay(target, rest, ctx));
    }
    default:
      ctx.err(`Unknown command: ${cmd}`);
      ctx.err(USAGE);
      return 1;
  }
}

async function guard(ctx: CommandContext, handler: () => Promise<number>): Promise<number> {
  try {
    return await handler();
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    ctx.err(`[sprig] Error: ${message}`);
    return 1;
  }
}

async function loadProgram(file: string, ctx: CommandContext): Promise<Program | null> {
  const src = await fs.readFile(path.resolve(ctx.cwd, file), "utf8");
  try {
    return parseSource(src);
  } catch (error: unknown) {
    if (!(error instanceof DslSyntaxError)) throw error;
    ctx.err(`Syntax error: ${error.message}`);
    ctx.err(`File: ${file}`);
    return null;
  }
}

// ============================================================================
// Handlers
// ============================================================================

export async function handleRun(file: string, argv: readonly string[], ctx: CommandContext): Promise<number> {
  const options = readCliOptions(argv, ctx.cwd);
  const program = await loadProgram(file, ctx);
  if (!program) return 1;

  if (options.verbose) printConfiguration(file, options, ctx);

  const logger = new RunLogger({
    baseDir: options.trace ? path.join(options.project, RUNS_DIR) : undefined,
    budget: { maxSteps: options.maxSteps },
  });
  logger.init();

  const registry = createDefaultRegistry(ctx.io);
  const vm = new VM(registry, logger, { storeMode: options.sharedStores ? "shared" : "frame" });

  try {
    const result = vm.run(program, options.entry);
    if (options.dumpStores) ctx.out(serialize(vm.getStores(), { format: options.format }));
    if (options.verbose) {
      ctx.err(`[sprig] Result: ${formatValue(result)}`);
      ctx.err(`[sprig] Budget: ${logger.budgetTracker.getSummary()}`);
    }
    if (logger.dir) ctx.err(`[sprig] Run complete. Logs: ${logger.dir}`);
    return 0;
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    ctx.err(`[sprig] Error: ${message}`);
    if (logger.dir) ctx.err(`[sprig] Logs: ${logger.dir}`);
    return 1;
  }
}

function printConfiguration(file: string, options: CliOptions, ctx: CommandContext): void {
  ctx.err("[sprig] Configuration:");
  ctx.err(`     File: ${file}`);
  ctx.err(`     Project: ${options.project}`);
  ctx.err(`     Entry: ${formatValue(options.entry)}`);
  ctx.err(`     Stores: ${options.sharedStores ? "shared" : "frame"}`);
  ctx.err(`     Max steps: ${options.maxSteps ?? "unlimited"}`);
  ctx.err(`     Trace: ${options.trace}`);
  ctx.err("");
}

export async function handleEmit(file: string, argv: readonly string[], ctx: CommandContext): Promise<number> {
  const options = readCliOptions(argv, ctx.cwd);
  const program = await loadProgram(file, ctx);
  if (!program) return 1;

  const code = programToJavaScript(program, {
    mode: options.embedded ? "embedded" : "standalone",
    entry: options.entry,
    sourceName: path.basename(file),
  });

  if (!options.out) {
    ctx.out(code.trimEnd());
    return 0;
  }

  const outputFile = path.resolve(ctx.cwd, options.out);
  await fs.mkdir(path.dirname(outputFile), { recursive: true });
  await fs.writeFile(outputFile, code, "utf8");
  ctx.out(`[sprig] Compiled: ${file} → ${options.out}`);
  ctx.out(`[sprig] Functions: ${program.functions.length}`);
  return 0;
}

export async function handleAst(file: string, argv: readonly string[], ctx: CommandContext): Promise<number> {
  const options = readCliOptions(argv, ctx.cwd);
  const program = await loadProgram(file, ctx);
  if (!program) return 1;
  ctx.out(serialize(program, { format: options.format }));
  return 0;
}

export async function handleReplay(runId: string, argv: readonly string[], ctx: CommandContext): Promise<number> {
  const options = readCliOptions(argv, ctx.cwd);
  const runDir = path.join(options.project, RUNS_DIR, runId);
  const eventsFile = path.join(runDir, "events.jsonl");
  const summaryFile = path.join(runDir, "summary.json");

  const eventsContent = await fs.readFile(eventsFile, "utf8");
  const events = eventsContent
    .split("\n")
    .map((line, idx) => ({ line, lineNo: idx + 1 }))
    .filter(({ line }) => line.trim())
    .map(({ line, lineNo }) => {
      const parsed = StepEventSchema.safeParse(JSON.parse(line));
      if (!parsed.success) {
        throw new Error(`Invalid event at ${eventsFile}:${lineNo}: ${parsed.error.issues[0]?.message ?? "unknown"}`);
      }
      return parsed.data;
    });

  ctx.out(`=== Replay: ${runId} ===`);
  ctx.out("");

  const summaryText = await fs.readFile(summaryFile, "utf8").catch((error: unknown) => {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") return null;
    throw error;
  });
  if (summaryText !== null) {
    const summary = RunSummarySchema.parse(JSON.parse(summaryText));
    ctx.out(`Finished: ${summary.finishedAt}`);
    ctx.out(`Events: ${summary.eventCount}`);
    ctx.out(`Steps: ${summary.budget.steps.current}`);
    ctx.out("");
  }

  ctx.out("Timeline:");
  for (const event of events) ctx.out(describeEvent(event));
  ctx.out("");
  ctx.out("=== End Replay ===");
  return 0;
}

export function describeEvent(event: StepEvent): string {
  switch (event.type) {
    case "stmt":
      return `[${event.step}] ${event.detail} in ${event.fn} (line ${event.line})`;
    case "call":
      return `[${event.step}] CALL ${event.name} (${event.kind}, line ${event.line})`;
    case "error":
      return `[${event.step}] ERROR: ${event.error}`;
    case "budget_update":
      return `[${event.step}] BUDGET: steps ${event.budget.steps.current}, calls ${event.budget.userCalls}/${event.budget.builtinCalls}`;
  }
}
