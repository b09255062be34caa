// ── Expression AST ───────────────────────────────────────
// The only node kinds an arithmetic expression may contain. Anything the
// lexer or parser cannot express with these is rejected before evaluation.

/** Integer literals and integer results are exact; anything else is a float. */
export type Numeric = bigint | number;

export type BinaryOperator = "+" | "-" | "*" | "/" | "^";
export type UnaryOperator = "-";

export interface NumberNode {
  kind: "number";
  value: Numeric;
}

export interface UnaryNode {
  kind: "unary";
  op: UnaryOperator;
  operand: ExpressionNode;
}

export interface BinaryNode {
  kind: "binary";
  op: BinaryOperator;
  left: ExpressionNode;
  right: ExpressionNode;
}

export type ExpressionNode = NumberNode | UnaryNode | BinaryNode;

export const ALLOWED_NODE_KINDS: ReadonlySet<string> = new Set([
  "number",
  "unary",
  "binary",
]);
export const ALLOWED_UNARY_OPS: ReadonlySet<string> = new Set(["-"]);
export const ALLOWED_BINARY_OPS: ReadonlySet<string> = new Set([
  "+",
  "-",
  "*",
  "/",
  "^",
]);
