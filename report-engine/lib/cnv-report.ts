import { CnvRecord, CnvSampleIdentity } from "./cnv-extract";
import { CnvFilterCriteria, filterCnvSample } from "./cnv-filter";
import { renderRaw, renderSections, ReportLayout, sortedSamples } from "./report-format";
import { ReportOptions, ResultSet } from "./report-types";

export const CNV_HEADER = [
  "Chr",
  "Gene",
  "Start",
  "End",
  "Length",
  "Tiles",
  "CN",
  "FD",
  "p-val",
  "Med_Mol_Cov",
  "Med_Read_Cov",
];

const CNV_LAYOUT: ReportLayout = {
  header: CNV_HEADER,
  widths: [8, 8, 11, 11, 11, 8, 8, 8, 8, 14, 14],
};

const CNV_RAW_HEADER = ["Sample", "Gender", "MAPD", "Cellularity", ...CNV_HEADER];

export type CnvResultSet = ResultSet<CnvSampleIdentity, CnvRecord>;

export function cnvBanner(identity: CnvSampleIdentity): string {
  return `::: CNV Data For ${identity.name} (Gender: ${identity.gender}, Cellularity: ${identity.cellularity}, MAPD: ${identity.mapd}) :::`;
}

/**
 * Filter and render the CNVs of every sample.
 *
 * @param results the merged per-sample CNVs
 * @param criteria the filters for this run
 * @param options output format
 */
export function cnvReport(
  results: CnvResultSet,
  criteria: CnvFilterCriteria,
  options: ReportOptions
): string {
  const samples = sortedSamples(results);

  if (options.raw) {
    const rows = samples.flatMap((s) => {
      const { name, gender, mapd, cellularity } = s.identity;

      return filterCnvSample(s.records, criteria).map((r) => [
        name,
        gender,
        mapd,
        cellularity,
        ...r,
      ]);
    });

    return renderRaw(CNV_RAW_HEADER, rows);
  }

  return renderSections(
    samples.map((s) => ({
      banner: cnvBanner(s.identity),
      layout: CNV_LAYOUT,
      rows: filterCnvSample(s.records, criteria),
      emptyMarker: ">>>>  No Reportable CNVs Found in Sample  <<<<",
    })),
    options.format
  );
}
