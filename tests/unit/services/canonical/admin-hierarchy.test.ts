import { describe, it, expect, beforeEach } from "vitest";

import { AdminHierarchyResolver } from "../../../../src/services/canonical/admin-hierarchy.js";

import type { AdminReferenceRow } from "../../../../src/types/index.js";

const PCODES: AdminReferenceRow[] = [
  { countryCode: "AAA", level: 1, pcode: "AA01", name: "Northland", parentPcode: "" },
  { countryCode: "AAA", level: 1, pcode: "AA02", name: "Southmoor", parentPcode: "" },
  { countryCode: "AAA", level: 2, pcode: "AA0101", name: "Riverbend", parentPcode: "AA01" },
  { countryCode: "AAA", level: 2, pcode: "AA0102", name: "Hillcrest", parentPcode: "AA01" },
  { countryCode: "AAA", level: 2, pcode: "AA0201", name: "Lakeside", parentPcode: "AA02" },
  { countryCode: "AAA", level: 3, pcode: "AA010101", name: "Mill Town", parentPcode: "AA0101" },
  { countryCode: "BBB", level: 1, pcode: "BB01", name: "Northland", parentPcode: "" },
];

const NONE = ["", "", ""];

describe("services/canonical/admin-hierarchy", () => {
  let admins: AdminHierarchyResolver;

  beforeEach(() => {
    admins = new AdminHierarchyResolver();
    admins.populate(PCODES);
  });

  // ============================================================================
  // Codes
  // ============================================================================

  describe("provided codes", () => {
    it("should derive parent codes from a deeper code", () => {
      expect(admins.resolve("AAA", NONE, ["", "AA0101", ""])).toEqual({
        codes: ["AA01", "AA0101", ""],
        names: ["Northland", "Riverbend", ""],
        level: 2,
        warnings: [],
      });
    });

    it("should walk up from admin 3", () => {
      const resolution = admins.resolve("AAA", NONE, ["", "", "AA010101"]);
      expect(resolution.codes).toEqual(["AA01", "AA0101", "AA010101"]);
      expect(resolution.names).toEqual(["Northland", "Riverbend", "Mill Town"]);
      expect(resolution.level).toBe(3);
    });

    it("should accept codes with different case and spacing", () => {
      expect(admins.resolve("AAA", NONE, [" aa01 ", "", ""]).codes).toEqual([
        "AA01",
        "",
        "",
      ]);
    });

    it("should fall back to the name when a code is not valid", () => {
      expect(admins.resolve("AAA", ["Northland", "", ""], ["XX99", "", ""])).toEqual({
        codes: ["AA01", "", ""],
        names: ["Northland", "", ""],
        level: 1,
        warnings: ["admin 1 code XX99 not found in AAA"],
      });
    });

    it("should reject codes of another country", () => {
      expect(admins.resolve("BBB", NONE, ["AA01", "", ""])).toEqual({
        codes: ["", "", ""],
        names: ["", "", ""],
        level: 0,
        warnings: ["admin 1 code AA01 not found in BBB"],
      });
    });
  });

  // ============================================================================
  // Names
  // ============================================================================

  describe("provider names", () => {
    it("should match names within the resolved parent", () => {
      const resolution = admins.resolve("AAA", ["Southmoor", "Lakeside", ""], NONE);
      expect(resolution.codes).toEqual(["AA02", "AA0201", ""]);
      expect(resolution.level).toBe(2);
    });

    it("should not match names outside the parent", () => {
      expect(admins.resolve("AAA", ["Southmoor", "Riverbend", ""], NONE)).toEqual({
        codes: ["AA02", "", ""],
        names: ["Southmoor", "", ""],
        level: 2,
        warnings: ["admin 2 name Riverbend could not be matched in AAA"],
      });
    });

    it("should match names case-insensitively", () => {
      expect(admins.resolve("AAA", ["NORTHLAND", "", ""], NONE).codes[0]).toBe(
        "AA01"
      );
    });

    it("should match misspelled names phonetically", () => {
      const resolution = admins.resolve("AAA", ["Northlund", "", ""], NONE);
      expect(resolution.codes[0]).toBe("AA01");
      expect(resolution.names[0]).toBe("Northland");
    });

    it("should keep countries apart", () => {
      expect(admins.resolve("BBB", ["Northland", "", ""], NONE).codes[0]).toBe(
        "BB01"
      );
    });
  });

  describe("maxLevel", () => {
    it("should ignore levels below the configured maximum", () => {
      const shallow = new AdminHierarchyResolver({ maxLevel: 1 });
      shallow.populate(PCODES);

      expect(shallow.resolve("AAA", ["Northland", "Riverbend", ""], NONE)).toEqual({
        codes: ["AA01", "", ""],
        names: ["Northland", "", ""],
        level: 1,
        warnings: [],
      });
    });
  });
});
