// packages/rules/src/lexer.ts

export type Punctuator = "(" | ")" | "[" | "]" | "," | "+" | "-" | "*" | "/" | "%" | "==" | "!=" | "<" | "<=" | ">" | ">=";

export type Token =
  | { kind: "number"; value: number; pos: number }
  | { kind: "string"; value: string; pos: number }
  | { kind: "ident"; name: string; pos: number }
  | { kind: "symbol"; symbol: Punctuator; pos: number }
  | { kind: "eof"; pos: number };

export type SyntaxFailure = { ok: false; code: "SYNTAX"; message: string };

export type LexResult = { ok: true; tokens: Token[] } | SyntaxFailure;

const NUMBER = /(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?/y;
const IDENT = /[A-Za-z_][A-Za-z0-9_]*(?:\.[A-Za-z_][A-Za-z0-9_]*)*/y;
const SYMBOLS: readonly Punctuator[] = ["==", "!=", "<=", ">=", "(", ")", "[", "]", ",", "+", "-", "*", "/", "%", "<", ">"];

export const syntaxError = (message: string): SyntaxFailure => ({ ok: false, code: "SYNTAX", message });

function readString(src: string, start: number): { value: string; end: number } | null {
  const quote = src[start];
  let out = "";
  for (let i = start + 1; i < src.length; i++) {
    const c = src[i];
    if (c === quote) return { value: out, end: i + 1 };
    if (c === "\\" && i + 1 < src.length) {
      out += src[i + 1];
      i++;
      continue;
    }
    out += c;
  }
  return null;
}

export function tokenize(src: string): LexResult {
  const tokens: Token[] = [];
  let i = 0;
  while (i < src.length) {
    const c = src[i] ?? "";
    if (/\s/.test(c)) {
      i++;
      continue;
    }

    if (c === '"' || c === "'") {
      const s = readString(src, i);
      if (!s) return syntaxError(`unterminated string at column ${i + 1}`);
      tokens.push({ kind: "string", value: s.value, pos: i });
      i = s.end;
      continue;
    }

    NUMBER.lastIndex = i;
    const n = NUMBER.exec(src);
    if (n) {
      tokens.push({ kind: "number", value: Number(n[0]), pos: i });
      i += n[0].length;
      continue;
    }

    IDENT.lastIndex = i;
    const id = IDENT.exec(src);
    if (id) {
      tokens.push({ kind: "ident", name: id[0], pos: i });
      i += id[0].length;
      continue;
    }

    const symbol = SYMBOLS.find((s) => src.startsWith(s, i));
    if (!symbol) return syntaxError(`unexpected character "${c}" at column ${i + 1}`);
    tokens.push({ kind: "symbol", symbol, pos: i });
    i += symbol.length;
  }
  tokens.push({ kind: "eof", pos: src.length });
  return { ok: true, tokens };
}
