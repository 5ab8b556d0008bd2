import { basename } from "path";
import fusionDrivers from "./fusion-drivers.json";
import { Extraction, FileExtractor } from "./report-types";
import { splitColumns, splitLines } from "./vcf-lines";

/**
 * Known driver genes across all versions of the fusion panel. Not all exist in
 * the current panel but we keep them all for older data.
 */
export const FUSION_DRIVERS: ReadonlySet<string> = new Set(fusionDrivers);

export type FusionRecord = {
  // i.e. EML4-ALK
  pair: string;
  // i.e. E13A20
  junction: string;
  // disambiguating id (COSF.., Non-Targeted, Novel) or "-"
  id: string;

  driver: string;
  partner: string;

  // molecular read count
  count: number;

  // the VCF FILTER column (PASS, FAIL, NOCALL)
  filter: string;
};

export type FusionSampleIdentity = {
  name: string;
};

// CHROM POS ID REF ALT QUAL FILTER INFO
const FUSION_MIN_COLUMNS = 8;

/**
 * Fusion VCFs carry no sample metadata, so the sample is named after the file.
 */
export function fusionSampleName(vcfPath: string): string {
  return basename(vcfPath)
    .replace(/(?:_Fusion_filtered)?\.vcf$/i, "")
    .replace("_RNA", "");
}

/**
 * Break a fusion identifier like "EML4-ALK.E13A20.COSF408_2" into its parts.
 * The first "_<digit>" (a per-record suffix) is stripped from every part.
 *
 * @param identifier the ID column of the fusion record
 */
export function parseFusionIdentifier(
  identifier: string
): { pair: string; junction: string; id: string } | undefined {
  const parts = identifier.split(/[.|]/).map((p) => p.replace(/_\d/, ""));

  if (parts.length < 2 || parts[0].length === 0 || parts[1].length === 0)
    return undefined;

  return {
    pair: parts[0],
    junction: parts[1],
    id: parts.length > 2 && parts[2].length > 0 ? parts[2] : "-",
  };
}

/**
 * Decide which gene of a fusion pair is the driver.
 *
 * - both genes the same: that gene is both driver and partner
 * - otherwise the first gene (in pair order) that is a known driver is the driver
 * - neither known: the driver is "UNKNOWN" and the partner lists both genes
 *
 * @param gene1 the 5' gene
 * @param gene2 the 3' gene
 * @param drivers the reference list of known drivers
 */
export function assignDriver(
  gene1: string,
  gene2: string,
  drivers: ReadonlySet<string> = FUSION_DRIVERS
): { driver: string; partner: string } {
  if (gene1 === gene2) return { driver: gene1, partner: gene1 };

  if (drivers.has(gene1)) return { driver: gene1, partner: gene2 };

  if (drivers.has(gene2)) return { driver: gene2, partner: gene1 };

  return { driver: "UNKNOWN", partner: `${gene1},${gene2}` };
}

/**
 * Extract the fusion (and control) records from a fusion VCF.
 *
 * Wild type RNAExonVariant records and process controls are put aside as
 * controls and never become fusion records.
 *
 * @param text the VCF content
 * @param vcfPath the path of the VCF (from which the sample is named)
 */
export function extractFusionRecords(
  text: string,
  vcfPath: string
): Extraction<FusionSampleIdentity, FusionRecord> {
  const records = new Map<string, FusionRecord>();
  const controls = new Map<string, number>();

  for (const line of splitLines(text)) {
    if (line.startsWith("#")) continue;

    const columns = splitColumns(line);

    if (columns.length < FUSION_MIN_COLUMNS) continue;

    const identifier = columns[2];
    const info = columns[7];

    if (/SVTYPE=(Fusion|RNAExonVariant)/.test(info)) {
      const countMatch = /MOL_COUNT=(\d+)/.exec(info);
      const count = countMatch ? parseInt(countMatch[1], 10) : 0;

      if (/WT$/.test(identifier)) {
        controls.set(identifier, count);
        continue;
      }

      const parsed = parseFusionIdentifier(identifier);
      if (!parsed) continue;

      const [gene1, gene2] = parsed.pair.split("-");
      if (!gene1 || !gene2) continue;

      records.set(`${parsed.pair}|${parsed.junction}|${parsed.id}`, {
        ...parsed,
        ...assignDriver(gene1, gene2),
        count: count,
        filter: columns[6],
      });
    } else if (/SVTYPE=ProcControl/.test(info)) {
      const m = /GENE_NAME=(.*?);.*?MOL_COUNT=(\d+)/.exec(info);

      if (m) controls.set(m[1], parseInt(m[2], 10));
    }
  }

  return {
    identity: { name: fusionSampleName(vcfPath) },
    records,
    controls,
  };
}

export const fusionExtractor: FileExtractor<FusionSampleIdentity, FusionRecord> = {
  extract: (text, vcfPath) => extractFusionRecords(text, vcfPath),
  identityKey: (identity) => identity.name,
  fallbackIdentity: (fileBaseName) => ({ name: fileBaseName }),
};
