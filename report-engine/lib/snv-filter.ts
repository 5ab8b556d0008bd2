import { ReportRow } from "./report-types";
import { SNV_CALL_COLUMNS, SnvCall } from "./snv-call";
import { versionCompare } from "./version-compare";

export type SnvFilterCriteria = {
  // empty means every gene
  genes: ReadonlySet<string>;
};

export function buildSnvCriteria(options: { genes?: readonly string[] }): SnvFilterCriteria {
  return { genes: new Set(options.genes ?? []) };
}

export function snvReportRow(call: SnvCall): ReportRow {
  return SNV_CALL_COLUMNS.map((c) => call[c]);
}

/**
 * The reportable calls of one sample, in position order.
 *
 * @param records call key -> call for a single sample
 * @param criteria the filters for this run
 */
export function filterSnvSample(
  records: ReadonlyMap<string, SnvCall>,
  criteria: SnvFilterCriteria
): ReportRow[] {
  return [...records.keys()]
    .sort(versionCompare)
    .map((k) => records.get(k))
    .filter(
      (c): c is SnvCall =>
        c !== undefined && (criteria.genes.size === 0 || criteria.genes.has(c.gene))
    )
    .map(snvReportRow);
}
