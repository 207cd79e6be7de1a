import { FilterSyntaxError } from "../../errors.js";

import type { SourceRow } from "../../types/index.js";

// ============================================================================
// Types
// ============================================================================

export type FilterExpression =
  | { kind: "compare"; field: string; operator: "==" | "!="; value: string }
  | { kind: "membership"; field: string; negated: boolean; values: string[] }
  | { kind: "and" | "or"; left: FilterExpression; right: FilterExpression }
  | { kind: "not"; operand: FilterExpression };

export type RowPredicate = (row: SourceRow) => boolean;

type Token =
  | { type: "field"; value: string; position: number }
  | { type: "string"; value: string; position: number }
  | { type: "operator"; value: string; position: number }
  | { type: "punct"; value: "(" | ")" | "[" | "]" | ","; position: number }
  | { type: "end"; value: ""; position: number };

const WORD_OPERATORS = new Set(["and", "or", "not", "in"]);
const IDENTIFIER_CHAR = /[\p{L}\p{N}_#+.]/u;
const NUMBER_PATTERN = /^-?\d+(?:\.\d+)?$/;

// ============================================================================
// Tokenizer
// ============================================================================

function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < text.length) {
    const char = text.charAt(i);

    if (/\s/.test(char)) {
      i++;
      continue;
    }

    if (char === '"' || char === "'" || char === "`") {
      const start = i;
      let value = "";
      i++;
      while (i < text.length && text.charAt(i) !== char) {
        if (text.charAt(i) === "\\" && i + 1 < text.length) i++;
        value += text.charAt(i);
        i++;
      }
      if (i >= text.length) {
        throw new FilterSyntaxError("Unterminated quote", start);
      }
      i++;
      tokens.push({
        type: char === "`" ? "field" : "string",
        value,
        position: start,
      });
      continue;
    }

    const twoChars = text.slice(i, i + 2);
    if (["==", "!=", "&&", "||"].includes(twoChars)) {
      tokens.push({ type: "operator", value: twoChars, position: i });
      i += 2;
      continue;
    }
    if (char === "!") {
      tokens.push({ type: "operator", value: "!", position: i });
      i++;
      continue;
    }
    if (
      char === "(" ||
      char === ")" ||
      char === "[" ||
      char === "]" ||
      char === ","
    ) {
      tokens.push({ type: "punct", value: char, position: i });
      i++;
      continue;
    }

    if (IDENTIFIER_CHAR.test(char) || char === "-") {
      const start = i;
      let word = "";
      while (
        i < text.length &&
        (IDENTIFIER_CHAR.test(text.charAt(i)) ||
          (word === "" && text.charAt(i) === "-"))
      ) {
        word += text.charAt(i);
        i++;
      }
      const lower = word.toLowerCase();
      if (WORD_OPERATORS.has(lower)) {
        tokens.push({ type: "operator", value: lower, position: start });
      } else if (NUMBER_PATTERN.test(word)) {
        tokens.push({ type: "string", value: word, position: start });
      } else {
        tokens.push({ type: "field", value: word, position: start });
      }
      continue;
    }

    throw new FilterSyntaxError(`Unexpected character '${char}'`, i);
  }

  tokens.push({ type: "end", value: "", position: text.length });
  return tokens;
}

// ============================================================================
// Parser
// ============================================================================

class FilterParser {
  private index = 0;

  constructor(private tokens: Token[]) {}

  parse(): FilterExpression {
    const expression = this.parseOr();
    const next = this.peek();
    if (next.type !== "end") {
      throw new FilterSyntaxError(
        `Unexpected '${next.value}'`,
        next.position
      );
    }
    return expression;
  }

  private peek(): Token {
    const token = this.tokens[this.index] ?? this.tokens.at(-1);
    if (!token) throw new FilterSyntaxError("Empty filter", 0);
    return token;
  }

  private next(): Token {
    const token = this.peek();
    if (token.type !== "end") this.index++;
    return token;
  }

  private isOperator(...values: string[]): boolean {
    const token = this.peek();
    return token.type === "operator" && values.includes(token.value);
  }

  private expectPunct(value: string): void {
    const token = this.next();
    if (token.type !== "punct" || token.value !== value) {
      throw new FilterSyntaxError(`Expected '${value}'`, token.position);
    }
  }

  private parseOr(): FilterExpression {
    let left = this.parseAnd();
    while (this.isOperator("||", "or")) {
      this.next();
      left = { kind: "or", left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): FilterExpression {
    let left = this.parseUnary();
    while (this.isOperator("&&", "and")) {
      this.next();
      left = { kind: "and", left, right: this.parseUnary() };
    }
    return left;
  }

  private parseUnary(): FilterExpression {
    if (this.isOperator("!", "not")) {
      this.next();
      return { kind: "not", operand: this.parseUnary() };
    }
    const token = this.peek();
    if (token.type === "punct" && token.value === "(") {
      this.next();
      const inner = this.parseOr();
      this.expectPunct(")");
      return inner;
    }
    return this.parseComparison();
  }

  private parseComparison(): FilterExpression {
    const fieldToken = this.next();
    if (fieldToken.type !== "field") {
      throw new FilterSyntaxError("Expected a column name", fieldToken.position);
    }
    const field = fieldToken.value;

    const operator = this.next();
    if (operator.type !== "operator") {
      throw new FilterSyntaxError("Expected an operator", operator.position);
    }

    if (operator.value === "==" || operator.value === "!=") {
      const value = this.next();
      if (value.type !== "string") {
        throw new FilterSyntaxError("Expected a literal", value.position);
      }
      return {
        kind: "compare",
        field,
        operator: operator.value,
        value: value.value,
      };
    }

    let negated = false;
    if (operator.value === "not" && this.isOperator("in")) {
      this.next();
      negated = true;
    } else if (operator.value !== "in") {
      throw new FilterSyntaxError(
        `Unexpected operator '${operator.value}'`,
        operator.position
      );
    }
    return { kind: "membership", field, negated, values: this.parseList() };
  }

  private parseList(): string[] {
    this.expectPunct("[");
    const values: string[] = [];
    for (;;) {
      const token = this.next();
      if (token.type !== "string") {
        throw new FilterSyntaxError("Expected a literal", token.position);
      }
      values.push(token.value);
      const separator = this.next();
      if (separator.type === "punct" && separator.value === "]") break;
      if (separator.type !== "punct" || separator.value !== ",") {
        throw new FilterSyntaxError("Expected ',' or ']'", separator.position);
      }
    }
    return values;
  }
}

/**
 * Parse a row filter such as `Status == "Active" && Cluster not in ["Logistics"]`
 */
export function parseFilter(text: string): FilterExpression {
  return new FilterParser(tokenize(text)).parse();
}

// ============================================================================
// Evaluation
// ============================================================================

export function evaluateFilter(
  expression: FilterExpression,
  row: SourceRow,
  columnOf: (field: string) => string = (field) => field
): boolean {
  switch (expression.kind) {
    case "compare": {
      const actual = (row[columnOf(expression.field)] ?? "").trim();
      return expression.operator === "=="
        ? actual === expression.value
        : actual !== expression.value;
    }
    case "membership": {
      const actual = (row[columnOf(expression.field)] ?? "").trim();
      return expression.values.includes(actual) !== expression.negated;
    }
    case "and":
      return (
        evaluateFilter(expression.left, row, columnOf) &&
        evaluateFilter(expression.right, row, columnOf)
      );
    case "or":
      return (
        evaluateFilter(expression.left, row, columnOf) ||
        evaluateFilter(expression.right, row, columnOf)
      );
    case "not":
      return !evaluateFilter(expression.operand, row, columnOf);
  }
}

/**
 * Compile a filter string into a row predicate. Blank filters keep every row.
 * @param columnOf maps a field in the expression to a source column
 */
export function compileFilter(
  text: string,
  columnOf?: (field: string) => string
): RowPredicate {
  if (text.trim() === "") return () => true;
  const expression = parseFilter(text);
  return (row) => evaluateFilter(expression, row, columnOf);
}
