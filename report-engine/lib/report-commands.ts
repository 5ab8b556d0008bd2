import { readFile, writeFile } from "fs/promises";
import { cnvExtractor } from "./cnv-extract";
import { buildCnvCriteria, CnvFilterCriteria } from "./cnv-filter";
import { cnvReport } from "./cnv-report";
import { dispatchFiles } from "./dispatch";
import { fusionExtractor } from "./fusion-extract";
import { buildFusionCriteria } from "./fusion-filter";
import { fusionReport } from "./fusion-report";
import { parseOutputFormat } from "./report-format";
import { createSnvExtractor } from "./snv-extract";
import { buildSnvCriteria } from "./snv-filter";
import { snvReport } from "./snv-report";
import { SnvCallSource, VcfExtractorTool } from "./vcf-extractor";
import { fixedVcfPath, fixVcfHeader } from "./vcf-header-fix";
import { DEFAULT_ALT_MOLECULAR_COVERAGE } from "./limits";

export type CommonReportOptions = {
  genes?: string[];
  // csv, tsv or pp
  format: string;
  raw?: boolean;
  debug?: boolean;
  // override of the concurrent file limit (--concurrency)
  concurrency?: number;
};

export type CnvCommandOptions = CommonReportOptions & {
  copyAmp?: number;
  copyLoss?: number;
  foldAmp?: number;
  foldLoss?: number;
  tiles?: number;
  excludeNocall?: boolean;
};

export type FusionCommandOptions = CommonReportOptions & {
  threshold?: number;
  includeReference?: boolean;
  includeNovel?: boolean;
  includeNocall?: boolean;
  showControls?: boolean;
};

export type SnvCommandOptions = CommonReportOptions & {
  includeNocall?: boolean;
  minAltCov?: number;
  minVaf?: number;
};

function debugBlock(title: string, entries: Record<string, unknown>) {
  console.error(`${"=".repeat(35)}  DEBUG  ${"=".repeat(35)}`);
  console.error(title);

  for (const [k, v] of Object.entries(entries)) {
    const display =
      v instanceof Set ? [...v].join(",") : typeof v === "object" ? JSON.stringify(v) : String(v);
    console.error(`\t${k.padEnd(16)} => ${display}`);
  }

  console.error("=".repeat(79));
}

function debugCnvCriteria(criteria: CnvFilterCriteria) {
  debugBlock("Filters being employed", {
    gene: criteria.genes,
    thresholds: criteria.thresholds,
    tiles: criteria.minTiles,
    excludeNocall: criteria.excludeNocall,
  });
}

/**
 * The CNV report for a set of CNV VCFs.
 *
 * @param vcfPaths the CNV VCFs
 * @param options filters and output settings
 * @throws ConfigurationError (before any file is read) for bad options
 */
export async function cnvReportCommand(
  vcfPaths: readonly string[],
  options: CnvCommandOptions
): Promise<string> {
  const format = parseOutputFormat(options.format);
  const criteria = buildCnvCriteria({
    genes: options.genes,
    copyAmp: options.copyAmp,
    copyLoss: options.copyLoss,
    foldAmp: options.foldAmp,
    foldLoss: options.foldLoss,
    minTiles: options.tiles,
    excludeNocall: options.excludeNocall,
  });

  if (options.debug) debugCnvCriteria(criteria);

  const results = await dispatchFiles(vcfPaths, cnvExtractor, options.concurrency);

  if (options.debug)
    for (const s of results.values())
      debugBlock(`Sample from ${s.source}`, {
        "Sample Name": s.identity.name,
        Cellularity: s.identity.cellularity,
        Gender: s.identity.gender,
        MAPD: s.identity.mapd,
      });

  return cnvReport(results, criteria, { format, raw: options.raw ?? false });
}

/**
 * The fusion report for a set of fusion VCFs.
 *
 * @param vcfPaths the fusion VCFs
 * @param options filters and output settings
 * @throws ConfigurationError (before any file is read) for bad options
 */
export async function fusionReportCommand(
  vcfPaths: readonly string[],
  options: FusionCommandOptions
): Promise<string> {
  const format = parseOutputFormat(options.format);
  const criteria = buildFusionCriteria({
    genes: options.genes,
    readThreshold: options.threshold,
    includeReference: options.includeReference,
    includeNocall: options.includeNocall,
    includeNovel: options.includeNovel,
  });

  if (options.debug)
    debugBlock("Thresholds as passed", {
      "Molecular Counts": criteria.readThreshold,
      "Reference Calls": criteria.includeReference,
      "Novel Calls": criteria.includeNovel,
      NOCALLs: criteria.includeNocall,
      gene: criteria.genes,
    });

  const results = await dispatchFiles(vcfPaths, fusionExtractor, options.concurrency);

  return fusionReport(results, criteria, {
    format,
    raw: options.raw ?? false,
    showControls: options.showControls,
  });
}

/**
 * The SNV/indel report for a set of VCFs. The candidate calls come from the
 * call source, which must be ready before any VCF is looked at.
 *
 * @param vcfPaths the VCFs
 * @param options filters and output settings
 * @param source where candidate calls come from (the vcfExtractor utility by default)
 * @throws ConfigurationError (before any file is read) for bad options or an unusable call source
 */
export async function snvReportCommand(
  vcfPaths: readonly string[],
  options: SnvCommandOptions,
  source: SnvCallSource = new VcfExtractorTool()
): Promise<string> {
  const format = parseOutputFormat(options.format);
  const criteria = buildSnvCriteria({ genes: options.genes });
  const extractOptions = {
    genes: options.genes ?? [],
    includeNocall: options.includeNocall ?? false,
  };
  const thresholds = {
    altCoverageThreshold: options.minAltCov ?? DEFAULT_ALT_MOLECULAR_COVERAGE,
    minVaf: options.minVaf,
  };

  if (options.debug)
    debugBlock("Filters being employed", {
      gene: criteria.genes,
      altCoverage: thresholds.altCoverageThreshold,
      minVaf: thresholds.minVaf,
      includeNocall: extractOptions.includeNocall,
    });

  await source.ensureReady();

  const results = await dispatchFiles(
    vcfPaths,
    createSnvExtractor(source, extractOptions, thresholds),
    options.concurrency
  );

  return snvReport(results, criteria, { format, raw: options.raw ?? false });
}

/**
 * Write a copy of the VCF with its header fixed up.
 *
 * @param vcfPath the VCF to fix
 * @param outputPath where to write it (defaults to <vcf>_fixed.vcf)
 * @return the path written to
 */
export async function fixHeaderCommand(vcfPath: string, outputPath?: string): Promise<string> {
  const target = outputPath || fixedVcfPath(vcfPath);

  const { text, fixedLines } = fixVcfHeader(await readFile(vcfPath, "utf8"));

  console.warn(`Rewrote ${fixedLines} header line(s) of ${vcfPath}; writing new VCF file to ${target}`);

  await writeFile(target, text, "utf8");

  return target;
}
