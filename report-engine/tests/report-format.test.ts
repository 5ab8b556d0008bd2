import { ConfigurationError } from "../lib/errors";
import {
  paddedWidth,
  parseOutputFormat,
  prettyTable,
  renderRaw,
  renderSections,
  renderTable,
  sortedSamples,
} from "../lib/report-format";

describe("Output formats", () => {
  it("accepts the known formats", () => {
    expect(parseOutputFormat("csv")).toBe("csv");
    expect(parseOutputFormat("tsv")).toBe("tsv");
    expect(parseOutputFormat("pp")).toBe("pp");
  });

  it("rejects anything else", () => {
    expect(() => parseOutputFormat("json")).toThrow(ConfigurationError);
    expect(() => parseOutputFormat("json")).toThrow("'json' is not a valid option as a delimiter!");
  });
});

describe("Tables", () => {
  it("sizes a column to its longest value plus padding", () => {
    expect(paddedWidth(["A", "GATTACA"], 4)).toBe(9);
    expect(paddedWidth(["A"], 4)).toBe(4);
    expect(paddedWidth([], 4)).toBe(4);
  });

  it("pads pretty printed columns to their width", () => {
    expect(prettyTable(["A", "Bee"], [["x", "yy"]], [3, 2])).toBe("A   Bee\nx   yy\n");
  });

  it("widens a column rather than wrap a long value", () => {
    expect(prettyTable(["Gene", "CN"], [["CDKN2A", "0.5"]], [4, 4])).toBe(
      "Gene   CN\nCDKN2A 0.5\n"
    );
  });

  it("widens a column to fit wide characters", () => {
    // each of these characters takes two columns on a terminal
    expect(prettyTable(["A", "B"], [["日本語テキスト", "x"]], [4, 4])).toBe(
      "A              B\n日本語テキスト x\n"
    );
  });

  it("delimits with tabs or commas", () => {
    const layout = { header: ["Gene", "Note"], widths: [8, 8] };

    expect(renderTable(layout, [["ALK", "a,b"]], "tsv")).toBe("Gene\tNote\nALK\ta,b\n");
    expect(renderTable(layout, [["ALK", "a,b"]], "csv")).toBe('Gene,Note\nALK,"a,b"\n');
  });

  it("exports raw rows with one header", () => {
    expect(renderRaw(["Sample", "Gene"], [["S1", "ALK"], ["S2", "RET"]])).toBe(
      "Sample,Gene\nS1,ALK\nS2,RET\n"
    );
  });
});

describe("Sections", () => {
  const layout = { header: ["Gene"], widths: [6] };

  it("prints a banner, the table and a blank line per sample", () => {
    const text = renderSections(
      [
        { banner: "::: S1 :::", layout, rows: [["ALK"]], emptyMarker: "none" },
        { banner: "::: S2 :::", layout, rows: [], emptyMarker: "none" },
      ],
      "csv"
    );

    expect(text).toBe("::: S1 :::\nGene\nALK\n\n::: S2 :::\nnone\n\n");
  });

  it("follows the table with any trailer", () => {
    const text = renderSections(
      [{ banner: "B", layout, rows: [["ALK"]], emptyMarker: "none", trailer: "T\n" }],
      "csv"
    );

    expect(text).toBe("B\nGene\nALK\nT\n\n");
  });

  it("orders samples by their keys", () => {
    const results = new Map([
      ["S10", { key: "S10" }],
      ["S2", { key: "S2" }],
      ["S1", { key: "S1" }],
    ]);

    expect(sortedSamples(results).map((s) => s.key)).toEqual(["S1", "S2", "S10"]);
  });
});
