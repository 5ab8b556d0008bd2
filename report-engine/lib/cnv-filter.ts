import { ConfigurationError } from "./errors";
import { CNV_PVALUE_CUTOFF } from "./limits";
import { CnvRecord } from "./cnv-extract";
import { ReportRow } from "./report-types";
import { versionCompare } from "./version-compare";

/**
 * How numeric thresholds are applied to CNVs - chosen once per run.
 */
export type CnvThresholdMode =
  | { mode: "None" }
  | { mode: "ByFoldDifference"; amp: number; loss: number }
  | { mode: "ByCopyNumber"; amp: number; loss: number };

export type CnvThresholdOptions = {
  copyAmp?: number;
  copyLoss?: number;
  foldAmp?: number;
  foldLoss?: number;
};

export type CnvFilterCriteria = {
  // empty means every gene
  genes: ReadonlySet<string>;
  thresholds: CnvThresholdMode;
  // records with fewer tiles than this are dropped
  minTiles?: number;
  excludeNocall: boolean;
};

export type CnvCriteriaOptions = CnvThresholdOptions & {
  genes?: readonly string[];
  minTiles?: number;
  excludeNocall?: boolean;
};

// a threshold of 0 (or none at all) means "not set"
function isSet(n: number | undefined): n is number {
  return n !== undefined && n !== 0;
}

/**
 * Pick the threshold mode from the thresholds the user gave us. A threshold
 * pair only counts when *both* halves are set.
 *
 * @throws ConfigurationError when both a fold difference and a copy number pair are given
 */
export function selectThresholdMode(options: CnvThresholdOptions): CnvThresholdMode {
  const { copyAmp, copyLoss, foldAmp, foldLoss } = options;

  const foldPair = isSet(foldAmp) && isSet(foldLoss);
  const copyPair = isSet(copyAmp) && isSet(copyLoss);

  if (foldPair && copyPair)
    throw new ConfigurationError(
      "You can not use both the fold difference and copy number threshold for filtering. Please use just one or the other."
    );

  if (isSet(foldAmp) && isSet(foldLoss))
    return { mode: "ByFoldDifference", amp: foldAmp, loss: foldLoss };

  if (isSet(copyAmp) && isSet(copyLoss))
    return { mode: "ByCopyNumber", amp: copyAmp, loss: copyLoss };

  return { mode: "None" };
}

export function buildCnvCriteria(options: CnvCriteriaOptions): CnvFilterCriteria {
  return {
    genes: new Set(options.genes ?? []),
    thresholds: selectThresholdMode(options),
    minTiles: options.minTiles,
    excludeNocall: options.excludeNocall ?? false,
  };
}

// anything we can't read as a number (i.e. ".") is treated as zero
function numeric(value: string): number {
  const n = parseFloat(value);

  return Number.isFinite(n) ? n : 0;
}

/**
 * The p-value gate and the amplification/loss thresholds - in that order, first
 * match wins.
 *
 * @param record the CNV under consideration
 * @param thresholds the threshold mode selected for this run
 */
export function passesThresholds(record: CnvRecord, thresholds: CnvThresholdMode): boolean {
  if (numeric(record.fields.PVAL) > CNV_PVALUE_CUTOFF) return false;

  switch (thresholds.mode) {
    case "ByFoldDifference": {
      const fd = numeric(record.fields.FD);
      return fd > thresholds.amp || fd < thresholds.loss;
    }
    case "ByCopyNumber": {
      const cn = numeric(record.fields.CN);
      return cn > thresholds.amp || cn < thresholds.loss;
    }
    case "None":
      return true;
  }
}

export function cnvIsReportable(record: CnvRecord, criteria: CnvFilterCriteria): boolean {
  if (criteria.genes.size > 0 && !criteria.genes.has(record.gene)) return false;

  if (criteria.excludeNocall && record.filter === "NOCALL") return false;

  if (
    criteria.minTiles !== undefined &&
    numeric(record.fields.NUMTILES) < criteria.minTiles
  )
    return false;

  return passesThresholds(record, criteria.thresholds);
}

/**
 * Project a CNV into the fixed order of report columns.
 */
export function cnvReportRow(record: CnvRecord): ReportRow {
  const f = record.fields;

  return [
    record.chr,
    record.gene,
    record.start,
    f.END,
    f.LEN,
    f.NUMTILES,
    f.CN,
    f.FD,
    f.PVAL,
    f.RMMDP,
    f.MMDP,
  ];
}

/**
 * The reportable rows of one sample, in chromosome/position order.
 *
 * @param records variant key -> CNV for a single sample
 * @param criteria the filters for this run
 */
export function filterCnvSample(
  records: ReadonlyMap<string, CnvRecord>,
  criteria: CnvFilterCriteria
): ReportRow[] {
  return [...records.keys()]
    .sort(versionCompare)
    .map((k) => records.get(k))
    .filter((r): r is CnvRecord => r !== undefined && cnvIsReportable(r, criteria))
    .map(cnvReportRow);
}
