import {
  DivisionByZeroError,
  ParseError,
  UnsupportedOperationError,
} from "../../errors.js";
import {
  ALLOWED_BINARY_OPS,
  ALLOWED_NODE_KINDS,
  ALLOWED_UNARY_OPS,
  type BinaryOperator,
  type ExpressionNode,
  type Numeric,
} from "./ast.js";

// ── Evaluation ───────────────────────────────────────────

/**
 * Walk the tree and reject any node or operator outside the whitelist.
 * Runs before evaluation so nothing is computed for a rejected tree.
 */
export function assertWhitelisted(node: ExpressionNode): void {
  if (!ALLOWED_NODE_KINDS.has(node.kind)) {
    throw new UnsupportedOperationError(`unsupported node '${node.kind}'`);
  }

  switch (node.kind) {
    case "number":
      if (typeof node.value === "number" && !Number.isFinite(node.value)) {
        throw new ParseError(`invalid number literal '${node.value}'`);
      }
      return;
    case "unary":
      if (!ALLOWED_UNARY_OPS.has(node.op)) {
        throw new UnsupportedOperationError(`unary '${node.op}' is not supported`);
      }
      assertWhitelisted(node.operand);
      return;
    case "binary":
      if (!ALLOWED_BINARY_OPS.has(node.op)) {
        throw new UnsupportedOperationError(`'${node.op}' is not a supported operator`);
      }
      assertWhitelisted(node.left);
      assertWhitelisted(node.right);
      return;
  }
}

/** Largest power result, in bits, computed exactly. */
const MAX_POWER_BITS = 100_000n;

/**
 * Evaluate a whitelisted tree. Integers stay exact (`bigint`) through
 * `+ - *` and non-negative powers; `/`, float literals and negative
 * exponents give a float.
 *
 * @throws DivisionByZeroError on `x / 0` and `0 ^ negative`.
 * @throws ParseError when a float result is not finite and real, or a
 *   power is too large to compute.
 */
export function evaluateNode(node: ExpressionNode): Numeric {
  switch (node.kind) {
    case "number":
      return node.value;
    case "unary":
      return -evaluateNode(node.operand);
    case "binary":
      return applyBinary(
        node.op,
        evaluateNode(node.left),
        evaluateNode(node.right),
      );
  }
}

function applyBinary(op: BinaryOperator, left: Numeric, right: Numeric): Numeric {
  if (op === "/") {
    const divisor = Number(right);
    if (divisor === 0) throw new DivisionByZeroError();
    return checked(Number(left) / divisor);
  }

  if (typeof left === "bigint" && typeof right === "bigint") {
    switch (op) {
      case "+":
        return left + right;
      case "-":
        return left - right;
      case "*":
        return left * right;
      case "^":
        if (right >= 0n) return exactPower(left, right);
        if (left === 0n) throw new DivisionByZeroError();
        return checked(Number(left) ** Number(right));
    }
  }

  const a = Number(left);
  const b = Number(right);
  switch (op) {
    case "+":
      return checked(a + b);
    case "-":
      return checked(a - b);
    case "*":
      return checked(a * b);
    case "^":
      if (a === 0 && b < 0) throw new DivisionByZeroError();
      return checked(a ** b);
  }
}

function exactPower(base: bigint, exponent: bigint): bigint {
  const magnitude = base < 0n ? -base : base;
  if (magnitude > 1n) {
    const bits = BigInt(magnitude.toString(2).length - 1);
    if (bits * exponent > MAX_POWER_BITS) {
      throw new ParseError("numeric overflow");
    }
  }
  return base ** exponent;
}

function checked(result: number): number {
  if (Number.isNaN(result)) {
    throw new ParseError("result is not a real number");
  }
  if (!Number.isFinite(result)) {
    throw new ParseError("numeric overflow");
  }
  return result;
}
