import { DEFAULT_ALT_MOLECULAR_COVERAGE } from "./limits";
import { Extraction, FileExtractor } from "./report-types";
import { SnvCall } from "./snv-call";
import { SnvCallSource, SnvExtractOptions } from "./vcf-extractor";
import { headerValue, sampleColumnName, splitLines } from "./vcf-lines";

export type SnvSampleIdentity = {
  name: string;
  timestamp: string;
};

export type SnvQualityThresholds = {
  // calls need strictly more alt molecules than this
  altCoverageThreshold: number;
  // if present, calls need at least this VAF
  minVaf?: number;
};

export const DEFAULT_SNV_QUALITY: SnvQualityThresholds = {
  altCoverageThreshold: DEFAULT_ALT_MOLECULAR_COVERAGE,
};

/**
 * The sample name (last #CHROM column) and the file timestamp of an SNV VCF.
 * Returns undefined if there is no column header to name the sample.
 *
 * @param text the VCF content
 */
export function snvSampleIdentity(text: string): SnvSampleIdentity | undefined {
  let sample: string | undefined;
  let timestamp: string | undefined;

  for (const line of splitLines(text)) {
    if (!line.startsWith("#")) break;

    if (line.startsWith("#CHROM")) sample = sampleColumnName(line) ?? sample;
    else timestamp = headerValue(line, /^##fileUTCtime=(.*?)$/) ?? timestamp;
  }

  if (sample === undefined) return undefined;

  return { name: sample, timestamp: timestamp ?? "NA" };
}

/**
 * The basic cfDNA pipeline quality rules - VAF must beat the LOD, there
 * must be enough alt molecules, and de novo calls (no variant id) are dropped.
 */
export function passesCallQuality(
  call: SnvCall,
  thresholds: SnvQualityThresholds
): boolean {
  const vaf = parseFloat(call.vaf);

  if (!(vaf > parseFloat(call.lod))) return false;

  if (!(parseFloat(call.molAltCov) > thresholds.altCoverageThreshold)) return false;

  if (thresholds.minVaf !== undefined && vaf < thresholds.minVaf) return false;

  return call.varId !== ".";
}

/**
 * The key for a call - its position and alleles.
 */
export function snvCallKey(call: SnvCall): string {
  return `${call.position}:${call.ref}:${call.alt}`;
}

/**
 * Build the SNV/indel extractor. The sample identity comes from the VCF
 * header, the candidate calls from the call source.
 *
 * @param source where the candidate calls come from
 * @param extractOptions passed through to the call source
 * @param thresholds the local quality rules
 */
export function createSnvExtractor(
  source: SnvCallSource,
  extractOptions: SnvExtractOptions,
  thresholds: SnvQualityThresholds = DEFAULT_SNV_QUALITY
): FileExtractor<SnvSampleIdentity, SnvCall> {
  return {
    extract: async (
      text: string,
      vcfPath: string
    ): Promise<Extraction<SnvSampleIdentity, SnvCall>> => {
      const records = new Map<string, SnvCall>();

      for (const call of await source.extractCalls(vcfPath, extractOptions)) {
        if (passesCallQuality(call, thresholds)) records.set(snvCallKey(call), call);
      }

      return { identity: snvSampleIdentity(text), records };
    },
    identityKey: (identity) => `${identity.name}|${identity.timestamp}`,
    fallbackIdentity: (fileBaseName) => ({ name: fileBaseName, timestamp: "NA" }),
  };
}
