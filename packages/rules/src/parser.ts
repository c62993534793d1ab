// packages/rules/src/parser.ts
// Recursive descent over the token stream. Precedence, loosest first:
// or, and, not, comparison (non-associative), + -, * / %, unary -, indexing.
import { bool, num, str, type Value } from "../../model/src/index.js";

import { syntaxError, tokenize, type Punctuator, type SyntaxFailure, type Token } from "./lexer.js";

export type ArithmeticOp = "+" | "-" | "*" | "/" | "%";
export type ComparisonOp = "==" | "!=" | "<" | "<=" | ">" | ">=";

export const FUNCTION_ARITY = {
  exists: [1, 1],
  coalesce: [1, Infinity],
  abs: [1, 1],
  min: [1, Infinity],
  max: [1, Infinity],
  sum: [1, Infinity],
  avg: [1, Infinity],
  count: [1, 1],
  len: [1, 1],
  contains: [2, 2],
  lower: [1, 1],
  upper: [1, 1],
  round: [1, 2],
  between: [3, 3],
  all: [1, Infinity],
  any: [1, Infinity],
} as const satisfies Record<string, readonly [number, number]>;

export type FunctionName = keyof typeof FUNCTION_ARITY;

const isFunctionName = (name: string): name is FunctionName => Object.hasOwn(FUNCTION_ARITY, name);

export type Expr =
  | { kind: "literal"; value: Value }
  | { kind: "list"; items: Expr[] }
  | { kind: "ident"; name: string }
  | { kind: "negate"; operand: Expr }
  | { kind: "not"; operand: Expr }
  | { kind: "arithmetic"; op: ArithmeticOp; left: Expr; right: Expr }
  | { kind: "compare"; op: ComparisonOp; left: Expr; right: Expr }
  | { kind: "logical"; op: "and" | "or"; left: Expr; right: Expr }
  | { kind: "index"; target: Expr; index: Expr }
  | { kind: "call"; name: FunctionName; args: Expr[] };

export type ParseResult = { ok: true; expr: Expr } | SyntaxFailure;

const KEYWORDS = new Set(["and", "or", "not", "true", "false"]);
const COMPARISONS: readonly ComparisonOp[] = ["==", "!=", "<", "<=", ">", ">="];

/** Thrown inside the parser only; `parseExpression` turns it into a result. */
class SyntaxProblem extends Error {}

function describe(t: Token): string {
  switch (t.kind) {
    case "eof":
      return "end of expression";
    case "number":
      return `number ${t.value} at column ${t.pos + 1}`;
    case "string":
      return `string ${JSON.stringify(t.value)} at column ${t.pos + 1}`;
    case "ident":
      return `"${t.name}" at column ${t.pos + 1}`;
    case "symbol":
      return `"${t.symbol}" at column ${t.pos + 1}`;
  }
}

class Parser {
  private i = 0;

  constructor(private readonly tokens: readonly Token[]) {}

  private peek(): Token {
    return this.tokens[this.i] ?? { kind: "eof", pos: 0 };
  }

  private next(): Token {
    const t = this.peek();
    if (t.kind !== "eof") this.i++;
    return t;
  }

  private isSymbol(s: Punctuator): boolean {
    const t = this.peek();
    return t.kind === "symbol" && t.symbol === s;
  }

  private isKeyword(k: string): boolean {
    const t = this.peek();
    return t.kind === "ident" && t.name === k;
  }

  private expect(s: Punctuator): void {
    if (!this.isSymbol(s)) throw new SyntaxProblem(`expected "${s}" but found ${describe(this.peek())}`);
    this.next();
  }

  parse(): Expr {
    const e = this.or();
    const t = this.peek();
    if (t.kind !== "eof") throw new SyntaxProblem(`unexpected ${describe(t)}`);
    return e;
  }

  private or(): Expr {
    let left = this.and();
    while (this.isKeyword("or")) {
      this.next();
      left = { kind: "logical", op: "or", left, right: this.and() };
    }
    return left;
  }

  private and(): Expr {
    let left = this.not();
    while (this.isKeyword("and")) {
      this.next();
      left = { kind: "logical", op: "and", left, right: this.not() };
    }
    return left;
  }

  private not(): Expr {
    if (this.isKeyword("not")) {
      this.next();
      return { kind: "not", operand: this.not() };
    }
    return this.comparison();
  }

  private comparisonOp(): ComparisonOp | undefined {
    const t = this.peek();
    return t.kind === "symbol" ? COMPARISONS.find((c) => c === t.symbol) : undefined;
  }

  private comparison(): Expr {
    const left = this.additive();
    const op = this.comparisonOp();
    if (!op) return left;
    this.next();
    const right = this.additive();
    if (this.comparisonOp()) {
      throw new SyntaxProblem(`comparisons do not chain; use "and" (${describe(this.peek())})`);
    }
    return { kind: "compare", op, left, right };
  }

  private additive(): Expr {
    let left = this.multiplicative();
    for (;;) {
      const op = this.isSymbol("+") ? "+" : this.isSymbol("-") ? "-" : undefined;
      if (!op) return left;
      this.next();
      left = { kind: "arithmetic", op, left, right: this.multiplicative() };
    }
  }

  private multiplicative(): Expr {
    let left = this.unary();
    for (;;) {
      const op = this.isSymbol("*") ? "*" : this.isSymbol("/") ? "/" : this.isSymbol("%") ? "%" : undefined;
      if (!op) return left;
      this.next();
      left = { kind: "arithmetic", op, left, right: this.unary() };
    }
  }

  private unary(): Expr {
    if (this.isSymbol("-")) {
      this.next();
      return { kind: "negate", operand: this.unary() };
    }
    return this.postfix();
  }

  private postfix(): Expr {
    let target = this.primary();
    while (this.isSymbol("[")) {
      this.next();
      const index = this.or();
      this.expect("]");
      target = { kind: "index", target, index };
    }
    return target;
  }

  private arguments(): Expr[] {
    const args: Expr[] = [];
    this.expect("(");
    if (this.isSymbol(")")) {
      this.next();
      return args;
    }
    for (;;) {
      args.push(this.or());
      if (this.isSymbol(",")) {
        this.next();
        continue;
      }
      this.expect(")");
      return args;
    }
  }

  private primary(): Expr {
    const t = this.next();
    switch (t.kind) {
      case "number":
        return { kind: "literal", value: num(t.value) };
      case "string":
        return { kind: "literal", value: str(t.value) };
      case "ident": {
        if (t.name === "true" || t.name === "false") return { kind: "literal", value: bool(t.name === "true") };
        if (KEYWORDS.has(t.name)) throw new SyntaxProblem(`unexpected ${describe(t)}`);
        if (!this.isSymbol("(")) return { kind: "ident", name: t.name };

        if (!isFunctionName(t.name)) throw new SyntaxProblem(`unknown function "${t.name}" at column ${t.pos + 1}`);
        const args = this.arguments();
        const [min, max] = FUNCTION_ARITY[t.name];
        if (args.length < min || args.length > max) {
          const expected = min === max ? `${min}` : max === Infinity ? `at least ${min}` : `${min} to ${max}`;
          throw new SyntaxProblem(`${t.name} expects ${expected} argument(s), got ${args.length}`);
        }
        return { kind: "call", name: t.name, args };
      }
      case "symbol":
        if (t.symbol === "(") {
          const inner = this.or();
          this.expect(")");
          return inner;
        }
        if (t.symbol === "[") {
          const items: Expr[] = [];
          if (this.isSymbol("]")) {
            this.next();
            return { kind: "list", items };
          }
          for (;;) {
            items.push(this.or());
            if (this.isSymbol(",")) {
              this.next();
              continue;
            }
            this.expect("]");
            return { kind: "list", items };
          }
        }
        throw new SyntaxProblem(`unexpected ${describe(t)}`);
      case "eof":
        throw new SyntaxProblem("unexpected end of expression");
    }
  }
}

export function parseExpression(source: string): ParseResult {
  const lexed = tokenize(source);
  if (!lexed.ok) return lexed;
  if (lexed.tokens.length === 1) return syntaxError("empty expression");
  try {
    return { ok: true, expr: new Parser(lexed.tokens).parse() };
  } catch (e) {
    if (e instanceof SyntaxProblem) return syntaxError(e.message);
    throw e;
  }
}

/** Identifiers an expression reads, in first-occurrence order. */
export function identifiersOf(expr: Expr): string[] {
  const out: string[] = [];
  const walk = (e: Expr): void => {
    switch (e.kind) {
      case "literal":
        return;
      case "ident":
        if (!out.includes(e.name)) out.push(e.name);
        return;
      case "list":
        e.items.forEach(walk);
        return;
      case "negate":
      case "not":
        walk(e.operand);
        return;
      case "arithmetic":
      case "compare":
      case "logical":
        walk(e.left);
        walk(e.right);
        return;
      case "index":
        walk(e.target);
        walk(e.index);
        return;
      case "call":
        e.args.forEach(walk);
        return;
    }
  };
  walk(expr);
  return out;
}
