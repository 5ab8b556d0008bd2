import { FusionRecord, FusionSampleIdentity } from "./fusion-extract";
import {
  filterFusionSample,
  FusionFilterCriteria,
  fusionName,
  fusionReportRow,
} from "./fusion-filter";
import {
  paddedWidth,
  renderRaw,
  renderSections,
  renderTable,
  sortedSamples,
} from "./report-format";
import { OutputFormat, ReportOptions, ResultSet } from "./report-types";
import { versionCompare } from "./version-compare";

export const FUSION_HEADER = ["Fusion", "ID", "Read_Count", "Driver_Gene", "Partner_Gene"];

const FUSION_RAW_HEADER = ["Sample", ...FUSION_HEADER];

export type FusionResultSet = ResultSet<FusionSampleIdentity, FusionRecord>;

export type FusionReportOptions = ReportOptions & {
  // print the control read counts after each sample's fusions
  showControls?: boolean;
};

export function fusionBanner(name: string, genes: ReadonlySet<string>): string {
  if (genes.size === 0) return `::: Fusions in ${name} :::`;

  return `::: ${[...genes].join(",")} Fusions in ${name} :::`;
}

function controlsTable(controls: ReadonlyMap<string, number>, format: OutputFormat): string {
  const names = [...controls.keys()].sort(versionCompare);

  return (
    "Controls:\n" +
    renderTable(
      { header: ["Control", "Read_Count"], widths: [paddedWidth(names, 9), 12] },
      names.map((n) => [n, (controls.get(n) ?? 0).toString()]),
      format
    )
  );
}

/**
 * Filter and render the fusions of every sample.
 *
 * @param results the merged per-sample fusions
 * @param criteria the filters for this run
 * @param options output format
 */
export function fusionReport(
  results: FusionResultSet,
  criteria: FusionFilterCriteria,
  options: FusionReportOptions
): string {
  const samples = sortedSamples(results);

  if (options.raw) {
    const rows = samples.flatMap((s) =>
      filterFusionSample(s.records, criteria).map((f) => [
        s.identity.name,
        ...fusionReportRow(f),
      ])
    );

    return renderRaw(FUSION_RAW_HEADER, rows);
  }

  return renderSections(
    samples.map((s) => {
      const fusions = filterFusionSample(s.records, criteria);

      return {
        banner: fusionBanner(s.identity.name, criteria.genes),
        layout: {
          header: FUSION_HEADER,
          // the fusion names vary wildly in length so that column is sized to fit
          widths: [paddedWidth(fusions.map(fusionName), 8), 12, 12, 15, 15],
        },
        rows: fusions.map(fusionReportRow),
        emptyMarker: "<<< No Fusions Detected >>>",
        trailer:
          options.showControls && s.controls.size > 0
            ? controlsTable(s.controls, options.format)
            : undefined,
      };
    }),
    options.format
  );
}
