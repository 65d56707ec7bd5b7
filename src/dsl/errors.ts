export type DslErrorKind = "syntax" | "name" | "type" | "runtime" | "budget" | "render";

export class DslError extends Error {
  readonly kind: DslErrorKind;
  readonly line: number | null;
  /** Message without the line suffix. */
  readonly detail: string;

  constructor(kind: DslErrorKind, detail: string, line: number | null = null) {
    super(line === null ? detail : `${detail} (line ${line})`);
    this.name = new.target.name;
    this.kind = kind;
    this.detail = detail;
    this.line = line;
  }
}

export class DslSyntaxError extends DslError {
  constructor(detail: string, line: number | null = null) {
    super("syntax", detail, line);
  }
}

export class DslNameError extends DslError {
  constructor(detail: string, line: number | null = null) {
    super("name", detail, line);
  }
}

export class DslTypeError extends DslError {
  constructor(detail: string, line: number | null = null) {
    super("type", detail, line);
  }
}

export class DslRuntimeError extends DslError {
  constructor(detail: string, line: number | null = null) {
    super("runtime", detail, line);
  }
}

export class BudgetExceededError extends DslError {
  constructor(detail: string, line: number | null = null) {
    super("budget", `BudgetExceeded: ${detail}`, line);
  }
}

/** A tree the source backend has no rendering for. */
export class DslRenderError extends DslError {
  constructor(detail: string, line: number | null = null) {
    super("render", detail, line);
  }
}
