import { versionCompare } from "../lib/version-compare";

describe("Version aware ordering", () => {
  it("compares positions numerically", () => {
    expect(versionCompare("chr2:100", "chr10:50")).toBeLessThan(0);
    expect(versionCompare("chr10:50", "chr2:100")).toBeGreaterThan(0);
    expect(versionCompare("chr1:900", "chr1:1000")).toBeLessThan(0);
  });

  it("sorts a mix of chromosomes the way people read them", () => {
    const keys = ["chrX:1", "chr10:50", "chr2:100", "chr1:5", "chr2:20"];

    expect(keys.sort(versionCompare)).toEqual([
      "chr1:5",
      "chr2:20",
      "chr2:100",
      "chr10:50",
      "chrX:1",
    ]);
  });

  it("treats identical strings as equal", () => {
    expect(versionCompare("chr7:55086714:EGFR", "chr7:55086714:EGFR")).toBe(0);
  });

  it("puts a shorter prefix first", () => {
    expect(versionCompare("chr7:100", "chr7:100:EGFR")).toBeLessThan(0);
  });
});
