import { describe, it, expect } from "vitest";

import { FilterSyntaxError } from "../../../../src/errors.js";
import {
  compileFilter,
  parseFilter,
} from "../../../../src/services/pipeline/filter.js";

describe("services/pipeline/filter", () => {
  // ============================================================================
  // Parsing
  // ============================================================================

  describe("parseFilter", () => {
    it("should bind && tighter than ||", () => {
      expect(parseFilter('a == "1" || b == "2" && c == "3"')).toEqual({
        kind: "or",
        left: { kind: "compare", field: "a", operator: "==", value: "1" },
        right: {
          kind: "and",
          left: { kind: "compare", field: "b", operator: "==", value: "2" },
          right: { kind: "compare", field: "c", operator: "==", value: "3" },
        },
      });
    });

    it("should parse membership lists", () => {
      expect(parseFilter("Cluster not in ['Logistics', 'ETC']")).toEqual({
        kind: "membership",
        field: "Cluster",
        negated: true,
        values: ["Logistics", "ETC"],
      });
    });

    it("should report the position of syntax errors", () => {
      expect(() => parseFilter("Status == ")).toThrow(
        "Expected a literal at position 10"
      );
      expect(() => parseFilter('Status == "Active')).toThrow(
        "Unterminated quote at position 10"
      );
      expect(() => parseFilter('Status ~ "x"')).toThrow(
        "Unexpected character '~' at position 7"
      );
      expect(() => parseFilter('Status in "x"')).toThrow(
        "Expected '[' at position 10"
      );
      expect(() => parseFilter('A == "1" B')).toThrow(
        "Unexpected 'B' at position 9"
      );
    });

    it("should throw FilterSyntaxError", () => {
      expect(() => parseFilter("(")).toThrow(FilterSyntaxError);
    });
  });

  // ============================================================================
  // Evaluation
  // ============================================================================

  describe("compileFilter", () => {
    it("should compare trimmed values", () => {
      const active = compileFilter('Status == "Active"');

      expect(active({ Status: "Active" })).toBe(true);
      expect(active({ Status: " Active " })).toBe(true);
      expect(active({ Status: "Closed" })).toBe(false);
      expect(active({})).toBe(false);
    });

    it("should combine conditions", () => {
      const predicate = compileFilter(
        'Status != "Closed" && Cluster in ["Health", "WASH"]'
      );

      expect(predicate({ Status: "Active", Cluster: "WASH" })).toBe(true);
      expect(predicate({ Status: "Closed", Cluster: "WASH" })).toBe(false);
      expect(predicate({ Status: "Active", Cluster: "Education" })).toBe(false);
    });

    it("should support word operators and parentheses", () => {
      const predicate = compileFilter(
        'not (Status == "Closed" or Status == "Suspended")'
      );

      expect(predicate({ Status: "Active" })).toBe(true);
      expect(predicate({ Status: "Suspended" })).toBe(false);
    });

    it("should read quoted column names and bare numbers", () => {
      const predicate = compileFilter(
        "`Implementing Partner` == 'Yes' and Year == 2024"
      );

      expect(predicate({ "Implementing Partner": "Yes", Year: "2024" })).toBe(
        true
      );
      expect(predicate({ "Implementing Partner": "Yes", Year: "2023" })).toBe(
        false
      );
    });

    it("should map fields through columnOf", () => {
      const predicate = compileFilter('#status == "Active"', (field) =>
        field === "#status" ? "Status" : field
      );
      expect(predicate({ Status: "Active" })).toBe(true);
    });

    it("should keep every row for a blank filter", () => {
      expect(compileFilter("  ")({})).toBe(true);
    });
  });
});
