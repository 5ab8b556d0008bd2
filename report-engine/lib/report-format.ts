import { stringify } from "csv/sync";
import stringWidth from "string-width";
import { getBorderCharacters, table } from "table";
import { ConfigurationError } from "./errors";
import { OutputFormat, ReportRow } from "./report-types";
import { versionCompare } from "./version-compare";

const DELIMITERS: Record<Exclude<OutputFormat, "pp">, string> = {
  csv: ",",
  tsv: "\t",
};

export type ReportLayout = {
  header: readonly string[];
  // pretty print widths (one per header column)
  widths: readonly number[];
};

export type ReportSection = {
  banner: string;
  layout: ReportLayout;
  rows: readonly ReportRow[];
  // printed instead of the table when there are no rows
  emptyMarker: string;
  // anything extra to print after the table
  trailer?: string;
};

export function parseOutputFormat(value: string): OutputFormat {
  if (value === "csv" || value === "tsv" || value === "pp") return value;

  throw new ConfigurationError(`'${value}' is not a valid option as a delimiter!`);
}

/**
 * A column width for values of varying length - the longest value plus a two
 * character pad, but never less than the floor.
 */
export function paddedWidth(values: readonly string[], floor: number): number {
  let longest = 0;

  for (const v of values) longest = Math.max(longest, v.length);

  return Math.max(floor, longest + 2);
}

/**
 * Fixed width columns with no borders - each column is padded to its width
 * and followed by a single space. A width is only ever exceeded (rather than
 * wrapping the value) when a value is longer than it. Values are measured by
 * their display width, as `table` measures them.
 *
 * @param header the column headings
 * @param rows the data rows
 * @param widths the declared width of each column
 */
export function prettyTable(
  header: readonly string[],
  rows: readonly ReportRow[],
  widths: readonly number[]
): string {
  const tableData: string[][] = [[...header], ...rows.map((r) => [...r])];

  const columnWidths = widths.map((w, i) =>
    Math.max(w, ...tableData.map((row) => stringWidth(row[i] ?? "")), 1)
  );

  const text = table(tableData, {
    border: getBorderCharacters("void"),
    columnDefault: { paddingLeft: 0, paddingRight: 1 },
    columns: columnWidths.map((w) => ({ alignment: "left" as const, width: w })),
    drawHorizontalLine: () => false,
  });

  return (
    text
      .split("\n")
      .filter((l) => l.length > 0)
      .map((l) => l.trimEnd())
      .join("\n") + "\n"
  );
}

/**
 * A header plus rows in the given output format.
 */
export function renderTable(
  layout: ReportLayout,
  rows: readonly ReportRow[],
  format: OutputFormat
): string {
  if (format === "pp") return prettyTable(layout.header, rows, layout.widths);

  return stringify([[...layout.header], ...rows.map((r) => [...r])], {
    delimiter: DELIMITERS[format],
  });
}

/**
 * Render one section per sample - banner, table (or the empty marker) and a
 * trailing blank line.
 */
export function renderSections(
  sections: readonly ReportSection[],
  format: OutputFormat
): string {
  // we build this report string
  let reportText = "";

  for (const s of sections) {
    reportText += `${s.banner}\n`;

    if (s.rows.length === 0) reportText += `${s.emptyMarker}\n`;
    else reportText += renderTable(s.layout, s.rows, format);

    if (s.trailer) reportText += s.trailer;

    reportText += "\n";
  }

  return reportText;
}

/**
 * The spreadsheet friendly export - always comma delimited, one global header and
 * the sample metadata repeated on every row.
 */
export function renderRaw(header: readonly string[], rows: readonly ReportRow[]): string {
  return stringify([[...header], ...rows.map((r) => [...r])]);
}

/**
 * The samples of a result set in version order of their keys.
 */
export function sortedSamples<S extends { key: string }>(
  results: ReadonlyMap<string, S>
): S[] {
  return [...results.values()].sort((a, b) => versionCompare(a.key, b.key));
}
