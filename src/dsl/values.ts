import { z } from "zod";

export type RuntimeValue = number | string | boolean | null | RuntimeValue[];

export const RuntimeValueSchema: z.ZodType<RuntimeValue> = z.lazy(() =>
  z.union([z.number(), z.string(), z.boolean(), z.null(), z.array(RuntimeValueSchema)]),
);

export function isTruthy(v: RuntimeValue): boolean {
  if (Array.isArray(v)) return v.length > 0;
  return Boolean(v);
}

export function typeName(v: RuntimeValue): string {
  if (v === null) return "none";
  if (Array.isArray(v)) return "array";
  return typeof v;
}

/**
 * Console form of a value. Strings print bare at the top level and quoted
 * inside arrays; `null` prints as `none`.
 */
export function formatValue(v: RuntimeValue | undefined, nested = false): string {
  if (v === null || v === undefined) return "none";
  if (Array.isArray(v)) return `[${v.map((item) => formatValue(item, true)).join(", ")}]`;
  if (typeof v === "string") return nested ? JSON.stringify(v) : v;
  return String(v);
}

/** Numeric view used by arithmetic: booleans count as 1 and 0. */
export function toNumber(v: RuntimeValue): number | null {
  if (typeof v === "number") return v;
  if (typeof v === "boolean") return v ? 1 : 0;
  return null;
}

/** `==`: arrays compare element by element, booleans equal their numeric value. */
export function valuesEqual(l: RuntimeValue, r: RuntimeValue): boolean {
  if (Array.isArray(l) || Array.isArray(r)) {
    return (
      Array.isArray(l) &&
      Array.isArray(r) &&
      l.length === r.length &&
      l.every((item, i) => valuesEqual(item, r[i] ?? null))
    );
  }
  const a = toNumber(l);
  const b = toNumber(r);
  if (a !== null && b !== null) return a === b;
  return l === r;
}

export const DECIMAL_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
export const SPECIAL_TEXT = /^([+-]?)(inf|infinity|nan)$/i;

/**
 * Number written as decimal text (surrounding whitespace allowed), or null.
 * Hex, binary and octal prefixes are not numbers here.
 */
export function parseNumber(text: string): number | null {
  const t = text.trim();
  if (DECIMAL_TEXT.test(t)) return Number.parseFloat(t);
  const special = SPECIAL_TEXT.exec(t);
  if (!special) return null;
  if (special[2]?.toLowerCase() === "nan") return Number.NaN;
  return special[1] === "-" ? -Infinity : Infinity;
}
