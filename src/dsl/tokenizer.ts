import { DslSyntaxError } from "./errors";

type PunctKind = "SEMI" | "LBRACE" | "RBRACE" | "LPAREN" | "RPAREN" | "LBRACKET" | "RBRACKET" | "COMMA";

export type Tok =
  | { t: "OP"; v: string; line: number }
  | { t: "IDENT"; v: string; line: number }
  | { t: "STR"; v: string; line: number }
  | { t: "NUM"; v: string; line: number }
  | { t: "ASSIGN"; v: "="; line: number }
  | { t: PunctKind; line: number }
  | { t: "EOF"; line: number };

const PUNCT = new Map<string, PunctKind>([
  [";", "SEMI"],
  ["{", "LBRACE"],
  ["}", "RBRACE"],
  ["(", "LPAREN"],
  [")", "RPAREN"],
  ["[", "LBRACKET"],
  ["]", "RBRACKET"],
  [",", "COMMA"],
]);

const PUNCT_TEXT: Record<PunctKind, string> = {
  SEMI: ";",
  LBRACE: "{",
  RBRACE: "}",
  LPAREN: "(",
  RPAREN: ")",
  LBRACKET: "[",
  RBRACKET: "]",
  COMMA: ",",
};

function isWhitespace(c: string): boolean {
  return /\s/.test(c);
}

function isLetter(c: string): boolean {
  return /^[A-Za-z]$/.test(c);
}

function isDigit(c: string): boolean {
  return /^[0-9]$/.test(c);
}

/** Human-readable form used in parse errors, e.g. `IDENT(foo)` or `"}"`. */
export function describeTok(tok: Tok): string {
  if (tok.t === "EOF") return "end of input";
  if ("v" in tok) return `${tok.t}(${tok.v})`;
  return `"${PUNCT_TEXT[tok.t]}"`;
}

export function* tokenize(src: string): Generator<Tok, void, undefined> {
  let line = 1;
  let i = 0;

  while (i < src.length) {
    const c = src[i] ?? "";

    if (c === "\n") {
      line++;
      i++;
      continue;
    }

    if (isWhitespace(c)) {
      i++;
      continue;
    }

    // comment runs up to (not including) the newline so the line count stays right
    if (c === "#") {
      while (i < src.length && src[i] !== "\n") i++;
      continue;
    }

    const punct = PUNCT.get(c);
    if (punct) {
      yield { t: punct, line };
      i++;
      continue;
    }

    if (c === '"') {
      let j = i + 1;
      while (j < src.length && src[j] !== '"' && src[j] !== "\n") j++;
      if (src[j] !== '"') {
        throw new DslSyntaxError("Unterminated string", line);
      }
      yield { t: "STR", v: src.slice(i + 1, j), line };
      i = j + 1;
      continue;
    }

    if (c === "=") {
      if (src[i + 1] === "=") {
        yield { t: "OP", v: "==", line };
        i += 2;
      } else {
        yield { t: "ASSIGN", v: "=", line };
        i++;
      }
      continue;
    }

    if (isDigit(c)) {
      let j = i;
      let seenDot = false;
      while (j < src.length) {
        const d = src[j] ?? "";
        if (isDigit(d)) {
          j++;
        } else if (d === "." && !seenDot) {
          seenDot = true;
          j++;
        } else {
          break;
        }
      }
      yield { t: "NUM", v: src.slice(i, j), line };
      i = j;
      continue;
    }

    if (isLetter(c)) {
      let j = i;
      while (j < src.length && isLetter(src[j] ?? "")) j++;
      yield { t: "IDENT", v: src.slice(i, j), line };
      i = j;
      continue;
    }

    // + - * / ^ < > and anything unrecognised; the parser rejects the latter
    yield { t: "OP", v: c, line };
    i++;
  }

  yield { t: "EOF", line };
}
