export type SequenceFormat = "debug" | "joined" | "json";

export const SEQUENCE_FORMATS: readonly SequenceFormat[] = ["debug", "joined", "json"];

export function isSequenceFormat(s: string): s is SequenceFormat {
  return SEQUENCE_FORMATS.some((f) => f === s);
}

function debugSymbol(symbol: unknown): string {
  if (typeof symbol === "string") return `'${symbol}'`;
  if (typeof symbol === "number" || typeof symbol === "boolean" || typeof symbol === "bigint") return String(symbol);
  return JSON.stringify(symbol) ?? String(symbol);
}

/**
 * Render a sequence as text.
 *
 * - `debug`: `['A', 'B']`
 * - `joined`: symbols stringified and joined by `separator`
 * - `json`: `["A","B"]`
 */
export function formatSequence(seq: readonly unknown[], format: SequenceFormat = "debug", separator = ""): string {
  switch (format) {
    case "debug":
      return `[${seq.map(debugSymbol).join(", ")}]`;
    case "joined":
      return seq.map((s) => (typeof s === "string" ? s : debugSymbol(s))).join(separator);
    case "json":
      return JSON.stringify(seq);
  }
}
