import { encode } from "@toon-format/toon";

export type DumpFormat = "json" | "toon";

export interface SerializationOptions {
  format?: DumpFormat;
  pretty?: boolean;
}

/** Text form of an AST or store dump. */
export function serialize(obj: unknown, options: SerializationOptions = {}): string {
  const format = options.format ?? "json";

  switch (format) {
    case "toon":
      return encode(obj);

    case "json":
      return options.pretty === false ? JSON.stringify(obj) : JSON.stringify(obj, null, 2);
  }
}
