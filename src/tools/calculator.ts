import {
  DivisionByZeroError,
  UnsupportedOperationError,
  errorMessage,
} from "../errors.js";
import { fillTemplate, type Persona } from "../persona/persona.js";
import type { Numeric } from "./expression/ast.js";
import { assertWhitelisted, evaluateNode } from "./expression/evaluate.js";
import { parseExpression } from "./expression/parser.js";

// ── Calculator Tool ──────────────────────────────────────

export type CalculationFailure =
  | "ParseError"
  | "DivisionByZero"
  | "UnsupportedOperation";

export type CalculationResult =
  | { success: true; value: Numeric }
  | { success: false; error: string; reason: CalculationFailure };

/** Trigger phrase followed by a run of arithmetic characters. Checked in order. */
const TRIGGERS: RegExp[] = [
  /calculate\s+([0-9+\-*/().^ ]+)/,
  /what\s+is\s+([0-9+\-*/().^ ]+)/,
  /compute\s+([0-9+\-*/().^ ]+)/,
];

/**
 * Pull an arithmetic expression out of free text, e.g.
 * "Can you calculate 25 * 4 for me?" → "25 * 4".
 *
 * The first trigger (in list order) that matches anywhere wins, and only
 * its first run is used, even when that run is not a valid expression.
 * `^` is rewritten to `**`.
 */
export function extractExpression(text: string): string | undefined {
  const lowered = text.toLowerCase();
  for (const trigger of TRIGGERS) {
    const match = trigger.exec(lowered);
    if (match) {
      return (match[1] ?? "").trim().replace(/\^/g, "**");
    }
  }
  return undefined;
}

/** Parse and evaluate an arithmetic expression. Never throws. */
export function evaluate(expression: string): CalculationResult {
  try {
    const tree = parseExpression(expression.trim());
    assertWhitelisted(tree);
    return { success: true, value: evaluateNode(tree) };
  } catch (err) {
    if (err instanceof DivisionByZeroError) {
      return { success: false, error: "division by zero", reason: "DivisionByZero" };
    }
    return {
      success: false,
      error: `invalid expression: ${errorMessage(err)}`,
      reason:
        err instanceof UnsupportedOperationError
          ? "UnsupportedOperation"
          : "ParseError",
    };
  }
}

/** Extract and evaluate. `undefined` when the text asks for no calculation. */
export function calculate(text: string): CalculationResult | undefined {
  const expression = extractExpression(text);
  return expression === undefined ? undefined : evaluate(expression);
}

/** Render a result in the persona's voice. */
export function formatCalculation(
  result: CalculationResult,
  persona: Persona,
): string {
  return result.success
    ? fillTemplate(persona.calculation.success, { value: String(result.value) })
    : fillTemplate(persona.calculation.failure, { error: result.error });
}
