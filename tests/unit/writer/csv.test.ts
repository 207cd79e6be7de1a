import { describe, it, expect } from "vitest";

import { formatCsvTable } from "../../../src/writer/csv.js";

describe("writer/csv", () => {
  it("should write headers, tags and quoted rows", () => {
    expect(
      formatCsvTable({
        headers: ["Name", "Note"],
        hxlTags: ["#org+name", "#meta"],
        rows: [["Water, Sanitation", "x"]],
      })
    ).toBe('Name,Note\n#org+name,#meta\n"Water, Sanitation",x\n');
  });
});
