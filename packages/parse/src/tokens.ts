// packages/parse/src/tokens.ts
// Token level helpers shared by the parser and the serializer.

const NUMBER_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

export function isNumericToken(token: string): boolean {
  return NUMBER_RE.test(token);
}

/** `undefined` for a blank token, `null` for a token that is not a number. */
export function coerceNumber(token: string): number | null | undefined {
  const t = token.trim();
  if (t === "") return undefined;
  return isNumericToken(t) ? Number(t) : null;
}

/** Split at the first `=`; keys keep inner spaces but lose the padding around them. */
export function splitKeyValue(line: string): { key: string; value: string } | null {
  const at = line.indexOf("=");
  if (at <= 0) return null;
  return { key: line.slice(0, at).trim(), value: line.slice(at + 1) };
}

export function splitCommas(value: string): string[] {
  return value.split(",").map((t) => t.trim());
}

/**
 * Tokens of one table row. Fixed-width columns are the native layout; a row
 * written with free spacing is accepted when every whitespace token is a
 * number and the fixed-width reading is not.
 */
export function rowTokens(line: string, width: number): string[] {
  const text = line.replace(/\s+$/, "");
  const columns: string[] = [];
  for (let i = 0; i < text.length; i += width) {
    const chunk = text.slice(i, i + width).trim();
    if (chunk !== "") columns.push(chunk);
  }
  if (columns.every(isNumericToken)) return columns;

  const words = text.trim().split(/\s+/).filter((w) => w !== "");
  if (words.length > 0 && words.every(isNumericToken)) return words;
  return columns;
}

export function formatNumber(n: number): string {
  return String(n);
}

/** Fixed-width rows; falls back to single-space separation when a value does not fit its column. */
export function formatRows(values: readonly (number | null)[], width: number, perLine: number): string[] {
  const cells = values.map((v) => (v === null ? "" : formatNumber(v)));
  const fits = cells.every((c) => c.length > 0 && c.length <= width);
  const lines: string[] = [];
  for (let i = 0; i < cells.length; i += perLine) {
    const row = cells.slice(i, i + perLine);
    lines.push(fits ? row.map((c) => c.padStart(width)).join("") : row.join(" "));
  }
  return lines;
}
