import { readSync } from "node:fs";
import { StringDecoder } from "node:string_decoder";

/** Console the builtins talk to. Reads block the whole run. */
export interface ConsoleIO {
  write(line: string): void;
  /** Next input line without its terminator, or null once input is exhausted. */
  readLine(): string | null;
}

export type MemoryIO = ConsoleIO & { readonly output: string[]; readonly pending: string[] };

export function createMemoryIO(inputs: readonly string[] = []): MemoryIO {
  const output: string[] = [];
  const pending = [...inputs];
  return {
    output,
    pending,
    write(line) {
      output.push(line);
    },
    readLine() {
      return pending.shift() ?? null;
    },
  };
}

const STDIN_FD = 0;

function isRetryable(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "EAGAIN";
}

export function createNodeIO(): ConsoleIO {
  const decoder = new StringDecoder("utf8");
  const chunk = Buffer.alloc(4096);
  let buffered = "";
  let eof = false;

  const fill = (): void => {
    while (!eof && !buffered.includes("\n")) {
      let n: number;
      try {
        n = readSync(STDIN_FD, chunk, 0, chunk.length, null);
      } catch (err: unknown) {
        // non-blocking stdin (e.g. a pipe opened by a parent process)
        if (isRetryable(err)) continue;
        throw err;
      }
      if (n === 0) {
        eof = true;
        buffered += decoder.end();
      } else {
        buffered += decoder.write(chunk.subarray(0, n));
      }
    }
  };

  return {
    write(line) {
      process.stdout.write(`${line}\n`);
    },
    readLine() {
      fill();
      if (buffered.length === 0 && eof) return null;
      const idx = buffered.indexOf("\n");
      const line = idx === -1 ? buffered : buffered.slice(0, idx);
      buffered = idx === -1 ? "" : buffered.slice(idx + 1);
      return line.endsWith("\r") ? line.slice(0, -1) : line;
    },
  };
}
