import fs from "node:fs";
import path from "node:path";
import { z } from "zod";

// ============================================================================
// Event Types
// ============================================================================

const CounterSchema = z.object({ current: z.number(), max: z.number().nullable() });

export const BudgetSnapshotSchema = z.object({
  steps: CounterSchema,
  userCalls: z.number().int(),
  builtinCalls: z.number().int(),
  elapsedMs: z.number(),
});

export const StepEventSchema = z.discriminatedUnion("type", [
  z.object({
    step: z.number().int(),
    type: z.literal("stmt"),
    detail: z.string(),
    fn: z.string(),
    line: z.number().int(),
    ts: z.string(),
  }),
  z.object({
    step: z.number().int(),
    type: z.literal("call"),
    name: z.string(),
    kind: z.enum(["user", "builtin"]),
    line: z.number().int(),
    ts: z.string(),
  }),
  z.object({ step: z.number().int(), type: z.literal("error"), error: z.string(), ts: z.string() }),
  z.object({ step: z.number().int(), type: z.literal("budget_update"), budget: BudgetSnapshotSchema, ts: z.string() }),
]);

export const RunSummarySchema = z.object({
  runId: z.string(),
  finishedAt: z.string(),
  budget: BudgetSnapshotSchema,
  eventCount: z.number().int(),
});

export type StepEvent = z.infer<typeof StepEventSchema>;
export type RunSummary = z.infer<typeof RunSummarySchema>;
export type BudgetSnapshot = z.infer<typeof BudgetSnapshotSchema>;

// ============================================================================
// Budget Tracking
// ============================================================================

export interface BudgetConfig {
  /** null means unlimited */
  maxSteps: number | null;
}

interface BudgetState {
  steps: number;
  startTime: number;
  userCalls: number;
  builtinCalls: number;
}

const DEFAULT_BUDGET: BudgetConfig = {
  maxSteps: null,
};

export class BudgetTracker {
  private config: BudgetConfig;
  private state: BudgetState;

  constructor(config: Partial<BudgetConfig> = {}) {
    this.config = { ...DEFAULT_BUDGET, ...config };
    this.state = {
      steps: 0,
      startTime: Date.now(),
      userCalls: 0,
      builtinCalls: 0,
    };
  }

  get steps(): number {
    return this.state.steps;
  }

  incrementStep(): void {
    this.state.steps++;
  }

  recordCall(kind: "user" | "builtin"): void {
    if (kind === "user") this.state.userCalls++;
    else this.state.builtinCalls++;
  }

  getSnapshot(): BudgetSnapshot {
    return {
      steps: { current: this.state.steps, max: this.config.maxSteps },
      userCalls: this.state.userCalls,
      builtinCalls: this.state.builtinCalls,
      elapsedMs: Date.now() - this.state.startTime,
    };
  }

  checkBudget(): { exceeded: boolean; reason: string | null } {
    const max = this.config.maxSteps;
    if (max !== null && this.state.steps > max) {
      return { exceeded: true, reason: `maxSteps exceeded: ${this.state.steps}/${max}` };
    }
    return { exceeded: false, reason: null };
  }

  getSummary(): string {
    const snapshot = this.getSnapshot();
    const max = snapshot.steps.max === null ? "unlimited" : String(snapshot.steps.max);
    return [
      `Steps: ${snapshot.steps.current}/${max}`,
      `User calls: ${snapshot.userCalls}`,
      `Builtin calls: ${snapshot.builtinCalls}`,
      `Time: ${(snapshot.elapsedMs / 1000).toFixed(3)}s`,
    ].join(" | ");
  }
}

// ============================================================================
// Run Logger
// ============================================================================

export interface RunLoggerOptions {
  /** Directory that receives `<runId>/events.jsonl`; nothing is written without it. */
  baseDir?: string;
  /** Keep every event in `events` as well. */
  retainEvents?: boolean;
  budget?: Partial<BudgetConfig>;
}

export class RunLogger {
  runId: string;
  dir: string | null;
  file: string | null;
  budgetTracker: BudgetTracker;
  readonly events: StepEvent[] = [];
  private eventCount: number = 0;
  private retainEvents: boolean;

  constructor(options: RunLoggerOptions = {}) {
    this.runId = `${Date.now()}-${Math.random().toString(16).slice(2)}`;
    this.dir = options.baseDir ? path.join(options.baseDir, this.runId) : null;
    this.file = this.dir ? path.join(this.dir, "events.jsonl") : null;
    this.retainEvents = options.retainEvents ?? false;
    this.budgetTracker = new BudgetTracker(options.budget);
  }

  init(): void {
    if (!this.dir || !this.file) return;
    fs.mkdirSync(this.dir, { recursive: true });
    fs.writeFileSync(this.file, "", "utf8");

    const meta = {
      runId: this.runId,
      startedAt: new Date().toISOString(),
      pid: process.pid,
      cwd: process.cwd(),
    };
    fs.writeFileSync(path.join(this.dir, "meta.json"), JSON.stringify(meta, null, 2), "utf8");
  }

  append(ev: StepEvent): void {
    this.eventCount++;
    this.write(ev);

    // budget snapshot every 50 events
    if (this.eventCount % 50 === 0) {
      this.logBudgetUpdate(ev.step);
    }
  }

  logBudgetUpdate(step: number): void {
    this.write({
      step,
      type: "budget_update",
      budget: this.budgetTracker.getSnapshot(),
      ts: new Date().toISOString(),
    });
  }

  finalize(): void {
    if (!this.dir) return;
    const summary: RunSummary = {
      runId: this.runId,
      finishedAt: new Date().toISOString(),
      budget: this.budgetTracker.getSnapshot(),
      eventCount: this.eventCount,
    };
    fs.writeFileSync(path.join(this.dir, "summary.json"), JSON.stringify(summary, null, 2), "utf8");
  }

  private write(ev: StepEvent): void {
    if (this.retainEvents) this.events.push(ev);
    if (this.file) fs.appendFileSync(this.file, JSON.stringify(ev) + "\n", "utf8");
  }
}
