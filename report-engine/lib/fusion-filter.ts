import { FusionRecord } from "./fusion-extract";
import { DEFAULT_FUSION_READ_THRESHOLD } from "./limits";
import { ReportRow } from "./report-types";
import { versionCompare } from "./version-compare";

// ids given to fusions that are not part of the panel design
const NOVEL_IDS = ["Non-Targeted", "Novel"];

export type FusionFilterCriteria = {
  // driver genes to report (upper case) - empty means all
  genes: ReadonlySet<string>;
  // minimum molecular read count
  readThreshold: number;
  // include reference calls (zero reads / FAIL)
  includeReference: boolean;
  // include NOCALL (and FAIL) calls
  includeNocall: boolean;
  // include non-targeted/novel fusions
  includeNovel: boolean;
};

export type FusionCriteriaOptions = Partial<Omit<FusionFilterCriteria, "genes">> & {
  genes?: readonly string[];
};

export function buildFusionCriteria(options: FusionCriteriaOptions): FusionFilterCriteria {
  return {
    genes: new Set((options.genes ?? []).map((g) => g.toUpperCase())),
    readThreshold: options.readThreshold ?? DEFAULT_FUSION_READ_THRESHOLD,
    includeReference: options.includeReference ?? false,
    includeNocall: options.includeNocall ?? false,
    includeNovel: options.includeNovel ?? false,
  };
}

export function fusionIsReportable(
  record: FusionRecord,
  criteria: FusionFilterCriteria
): boolean {
  if (record.count === 0 && !criteria.includeReference) return false;

  if (
    record.filter === "FAIL" &&
    !criteria.includeReference &&
    !criteria.includeNocall
  )
    return false;

  if (record.filter === "NOCALL" && !criteria.includeNocall) return false;

  if (NOVEL_IDS.includes(record.id) && !criteria.includeNovel) return false;

  if (criteria.genes.size > 0 && !criteria.genes.has(record.driver)) return false;

  return record.count >= criteria.readThreshold;
}

export function fusionName(record: FusionRecord): string {
  return `${record.pair}.${record.junction}`;
}

export function fusionReportRow(record: FusionRecord): ReportRow {
  return [
    fusionName(record),
    record.id,
    record.count.toString(),
    record.driver,
    record.partner,
  ];
}

/**
 * The reportable fusions of one sample, in key order.
 *
 * @param records fusion key -> fusion for a single sample
 * @param criteria the filters for this run
 */
export function filterFusionSample(
  records: ReadonlyMap<string, FusionRecord>,
  criteria: FusionFilterCriteria
): FusionRecord[] {
  return [...records.keys()]
    .sort(versionCompare)
    .map((k) => records.get(k))
    .filter(
      (r): r is FusionRecord => r !== undefined && fusionIsReportable(r, criteria)
    );
}
