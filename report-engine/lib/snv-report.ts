import { renderRaw, renderSections, paddedWidth, ReportLayout, sortedSamples } from "./report-format";
import { ReportOptions, ReportRow, ResultSet } from "./report-types";
import { SnvCall } from "./snv-call";
import { SnvSampleIdentity } from "./snv-extract";
import { filterSnvSample, SnvFilterCriteria } from "./snv-filter";

export const SNV_HEADER = [
  "Chr:Position",
  "Ref",
  "Alt",
  "VAF",
  "LOD",
  "AmpCov",
  "MolRefCov",
  "MolAltCov",
  "VarID",
  "Gene",
  "Transcript",
  "CDS",
  "AA",
  "Location",
  "Function",
];

// 0 for the columns that are sized to fit the data
const SNV_STATIC_WIDTHS = [17, 0, 0, 9, 7, 8, 11, 11, 0, 10, 15, 0, 0, 12, 9];

// ref, alt, variant id, cds and amino acid change can be anything from a
// couple of characters to very long indels
const SNV_SIZED_COLUMNS = [1, 2, 8, 11, 12];

const SNV_MIN_SIZED_WIDTH = 4;

export type SnvResultSet = ResultSet<SnvSampleIdentity, SnvCall>;

/**
 * The pretty print layout, with the variable columns sized across every row
 * of every sample (so all samples line up the same).
 */
export function snvLayout(allRows: readonly ReportRow[]): ReportLayout {
  const widths = [...SNV_STATIC_WIDTHS];

  for (const c of SNV_SIZED_COLUMNS)
    widths[c] = paddedWidth(
      allRows.map((r) => r[c]),
      SNV_MIN_SIZED_WIDTH
    );

  return { header: SNV_HEADER, widths };
}

export function snvBanner(identity: SnvSampleIdentity): string {
  return `::: SNV/Indel Data For ${identity.name} (${identity.timestamp}) :::`;
}

/**
 * Filter and render the SNVs/indels of every sample.
 *
 * @param results the merged per-sample calls
 * @param criteria the filters for this run
 * @param options output format
 */
export function snvReport(
  results: SnvResultSet,
  criteria: SnvFilterCriteria,
  options: ReportOptions
): string {
  const samples = sortedSamples(results).map((s) => ({
    identity: s.identity,
    rows: filterSnvSample(s.records, criteria),
  }));

  if (options.raw)
    return renderRaw(
      ["Sample", ...SNV_HEADER],
      samples.flatMap((s) => s.rows.map((r) => [s.identity.name, ...r]))
    );

  const layout = snvLayout(samples.flatMap((s) => s.rows));

  return renderSections(
    samples.map((s) => ({
      banner: snvBanner(s.identity),
      layout,
      rows: s.rows,
      emptyMarker: ">>>>  No Reportable SNVs or Indels Found in Sample  <<<<",
    })),
    options.format
  );
}
