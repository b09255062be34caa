import { ParseError, UnsupportedOperationError } from "../../errors.js";
import type { BinaryOperator, ExpressionNode } from "./ast.js";
import { tokenize, type Token } from "./lexer.js";

// ── Recursive-descent parser ─────────────────────────────
//
//   expr    := term (("+" | "-") term)*
//   term    := unary (("*" | "/") unary)*
//   unary   := "-" unary | power
//   power   := primary ("^" unary)?        right-associative
//   primary := NUMBER | "(" expr ")"
//
// `-2 ^ 2` is -(2 ^ 2) and `2 ^ -1` is 0.5, as in most calculators.

export function parseExpression(input: string): ExpressionNode {
  const tokens = tokenize(input);
  if (tokens.length === 0) {
    throw new ParseError("empty expression");
  }

  const parser = new Parser(tokens);
  const node = parser.expr();
  parser.expectEnd();
  return node;
}

class Parser {
  private index = 0;

  constructor(private readonly tokens: Token[]) {}

  expr(): ExpressionNode {
    let node = this.term();
    for (;;) {
      const op = this.matchOp("+", "-");
      if (!op) return node;
      node = { kind: "binary", op, left: node, right: this.term() };
    }
  }

  expectEnd(): void {
    const token = this.peek();
    if (token) {
      throw new ParseError(`unexpected ${describe(token)} at ${token.pos}`);
    }
  }

  private term(): ExpressionNode {
    let node = this.unary();
    for (;;) {
      const op = this.matchOp("*", "/");
      if (!op) return node;
      node = { kind: "binary", op, left: node, right: this.unary() };
    }
  }

  private unary(): ExpressionNode {
    if (this.matchOp("-")) {
      return { kind: "unary", op: "-", operand: this.unary() };
    }
    const token = this.peek();
    if (token?.type === "op" && token.op === "+") {
      throw new UnsupportedOperationError("unary '+' is not supported");
    }
    return this.power();
  }

  private power(): ExpressionNode {
    const base = this.primary();
    if (this.matchOp("^")) {
      return { kind: "binary", op: "^", left: base, right: this.unary() };
    }
    return base;
  }

  private primary(): ExpressionNode {
    const token = this.next();
    if (!token) {
      throw new ParseError("unexpected end of expression");
    }
    if (token.type === "number") {
      return { kind: "number", value: token.value };
    }
    if (token.type === "lparen") {
      const inner = this.expr();
      const close = this.next();
      if (close?.type !== "rparen") {
        throw new ParseError(`missing ')' for '(' at ${token.pos}`);
      }
      return inner;
    }
    throw new ParseError(`unexpected ${describe(token)} at ${token.pos}`);
  }

  // ── Token helpers ──────────────────────────────────────

  private peek(): Token | undefined {
    return this.tokens[this.index];
  }

  private next(): Token | undefined {
    const token = this.tokens[this.index];
    if (token) this.index++;
    return token;
  }

  private matchOp<T extends BinaryOperator>(...ops: T[]): T | undefined {
    const token = this.peek();
    if (token?.type !== "op") return undefined;
    const op = ops.find((candidate) => candidate === token.op);
    if (op) this.index++;
    return op;
  }
}

function describe(token: Token): string {
  switch (token.type) {
    case "number":
      return `number ${token.value}`;
    case "op":
      return `operator '${token.op}'`;
    case "lparen":
      return "'('";
    case "rparen":
      return "')'";
  }
}
