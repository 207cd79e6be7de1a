import { describe, it, expect } from "vitest";

import { ConfigurationError } from "../../../../src/errors.js";
import {
  buildTagLookup,
  columnForTag,
  normalizeHxlTag,
  translateColumns,
} from "../../../../src/services/pipeline/hxl.js";

const TAG_ROW = {
  Partner: "#org+name",
  "Partner Type": "#org +type",
  Sector: "#sector",
  Region: "#adm1+name",
  Note: "",
};

describe("services/pipeline/hxl", () => {
  it("should normalize tags", () => {
    expect(normalizeHxlTag(" #Org +Name ")).toBe("#org+name");
  });

  it("should invert the tag row", () => {
    expect([...buildTagLookup(TAG_ROW)]).toEqual([
      ["#org+name", "Partner"],
      ["#org+type", "Partner Type"],
      ["#sector", "Sector"],
      ["#adm1+name", "Region"],
    ]);
  });

  describe("columnForTag", () => {
    const lookup = buildTagLookup(TAG_ROW);

    it("should find the header of a tag", () => {
      expect(columnForTag(lookup, "#ORG +name")).toBe("Partner");
    });

    it("should pass plain column names through", () => {
      expect(columnForTag(lookup, "Partner")).toBe("Partner");
      expect(columnForTag(lookup, "")).toBe("");
    });

    it("should throw for tags missing from the source", () => {
      expect(() => columnForTag(lookup, "#adm2+name")).toThrow(
        ConfigurationError
      );
      expect(() => columnForTag(lookup, "#adm2+name")).toThrow(
        "HXL tag #adm2+name not found in source"
      );
    });
  });

  it("should translate a column mapping", () => {
    expect(
      translateColumns(
        {
          orgName: "#org+name",
          orgAcronym: "#org+name",
          orgType: "#org+type",
          sector: "#sector",
          admCodes: ["", "", ""],
          admNames: ["#adm1+name", "", ""],
          startDate: "",
          endDate: "",
        },
        TAG_ROW
      )
    ).toEqual({
      orgName: "Partner",
      orgAcronym: "Partner",
      orgType: "Partner Type",
      sector: "Sector",
      admCodes: ["", "", ""],
      admNames: ["Region", "", ""],
      startDate: "",
      endDate: "",
    });
  });
});
