import { ParseError, UnsupportedOperationError } from "../../errors.js";
import type { Numeric } from "./ast.js";

// ── Lexer ────────────────────────────────────────────────

type OperatorSymbol = "+" | "-" | "*" | "/" | "^";

export type Token =
  | { type: "number"; value: Numeric; pos: number }
  | { type: "op"; op: OperatorSymbol; pos: number }
  | { type: "lparen"; pos: number }
  | { type: "rparen"; pos: number };

const OPERATORS: Record<string, OperatorSymbol> = {
  "+": "+",
  "-": "-",
  "*": "*",
  "/": "/",
  "^": "^",
};

const NUMBER_RE = /\d+(?:\.\d*)?|\.\d+/y;
const IDENTIFIER_RE = /[A-Za-z_][A-Za-z0-9_]*/y;

/** Operators and syntax that exist in general-purpose languages but not here. */
const DISALLOWED_SYMBOLS = [
  "//", "<<", ">>", "%", "&", "|", "~", "<", ">", "=", "!",
  ",", "[", "]", "{", "}", "'", '"', "@", ":", ";",
];

/**
 * Split an arithmetic expression into tokens. `**` and `^` both lex to the
 * power operator. Literals without a decimal point lex to `bigint`.
 *
 * @throws UnsupportedOperationError for identifiers, calls and operators
 *   outside `+ - * / ^`.
 * @throws ParseError for anything else that is not a token.
 */
export function tokenize(input: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  while (pos < input.length) {
    const ch = input.charAt(pos);

    if (/\s/.test(ch)) {
      pos++;
      continue;
    }

    const num = matchAt(NUMBER_RE, input, pos);
    if (num) {
      tokens.push({
        type: "number",
        value: num.includes(".") ? parseFloat(num) : BigInt(num),
        pos,
      });
      pos += num.length;
      continue;
    }

    const ident = matchAt(IDENTIFIER_RE, input, pos);
    if (ident) {
      const rest = input.slice(pos + ident.length).trimStart();
      if (rest.startsWith("(")) {
        throw new UnsupportedOperationError(
          `function calls are not allowed: '${ident}(...)'`,
        );
      }
      throw new UnsupportedOperationError(
        `identifiers are not allowed: '${ident}'`,
      );
    }

    if (input.startsWith("**", pos)) {
      tokens.push({ type: "op", op: "^", pos });
      pos += 2;
      continue;
    }

    const disallowed = DISALLOWED_SYMBOLS.find((s) => input.startsWith(s, pos));
    if (disallowed) {
      throw new UnsupportedOperationError(
        `'${disallowed}' is not a supported operator`,
      );
    }

    const op = OPERATORS[ch];
    if (op) {
      tokens.push({ type: "op", op, pos });
    } else if (ch === "(") {
      tokens.push({ type: "lparen", pos });
    } else if (ch === ")") {
      tokens.push({ type: "rparen", pos });
    } else if (ch === ".") {
      throw new UnsupportedOperationError("attribute access is not allowed");
    } else {
      throw new ParseError(`unexpected character '${ch}' at ${pos}`);
    }
    pos++;
  }

  return tokens;
}

function matchAt(re: RegExp, input: string, pos: number): string | undefined {
  re.lastIndex = pos;
  return re.exec(input)?.[0];
}
