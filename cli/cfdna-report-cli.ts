#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import { ConfigurationError } from "../report-engine/lib/errors";
import {
  cnvReportCommand,
  fixHeaderCommand,
  fusionReportCommand,
  snvReportCommand,
} from "../report-engine/lib/report-commands";
import { openReportTarget } from "../report-engine/lib/report-output";
import { DEFAULT_FUSION_READ_THRESHOLD } from "../report-engine/lib/limits";

type OutputCliOptions = {
  gene?: string;
  output?: string;
  format: string;
  raw?: boolean;
  debug?: boolean;
  concurrency?: number;
};

type CnvCliOptions = OutputCliOptions & {
  copyAmp?: number;
  copyLoss?: number;
  foldAmp?: number;
  foldLoss?: number;
  tiles?: number;
  NOCALL?: boolean;
};

type FusionCliOptions = OutputCliOptions & {
  threshold: number;
  Ref?: boolean;
  novel?: boolean;
  NOCALL?: boolean;
  controls?: boolean;
};

type SnvCliOptions = OutputCliOptions & {
  NOCALL?: boolean;
  minAltCov?: number;
  minVaf?: number;
};

function parseNumber(value: string): number {
  const n = Number(value);

  if (value.trim() === "" || !Number.isFinite(n))
    throw new InvalidArgumentError("Not a number.");

  return n;
}

function parseInteger(value: string): number {
  const n = parseNumber(value);

  if (!Number.isInteger(n)) throw new InvalidArgumentError("Not an integer.");

  return n;
}

function parsePositiveInteger(value: string): number {
  const n = parseInteger(value);

  if (n < 1) throw new InvalidArgumentError("Must be at least 1.");

  return n;
}

function geneList(gene?: string): string[] | undefined {
  return gene ? gene.split(",").filter((g) => g.length > 0) : undefined;
}

const program = new Command();

/**
 * Run a report, sending configuration problems back through commander so they
 * are reported with exit code 1 like any other bad usage.
 */
async function runReport(output: string | undefined, report: () => Promise<string>) {
  try {
    const target = await openReportTarget(output);

    try {
      await target.write(await report());
    } finally {
      await target.close();
    }
  } catch (e) {
    if (e instanceof ConfigurationError)
      program.error(`ERROR: ${e.message}`, { exitCode: 1 });

    throw e;
  }
}

function addOutputOptions(command: Command): Command {
  return command
    .option("-g, --gene <genes>", "only report this gene (or comma separated list of genes)")
    .option("-o, --output <file>", "send output to a file rather than stdout")
    .option("-f, --format <format>", "output format: 'csv', 'tsv', or pretty print ('pp')", "pp")
    .option("-r, --raw", "raw CSV output (sample data on every row) for importing into a spreadsheet")
    .option("--debug", "print the filters and sample metadata to stderr")
    .option(
      "-j, --concurrency <n>",
      "maximum number of VCFs processed at once (default $CFDNA_REPORT_CONCURRENCY or 48)",
      parsePositiveInteger
    );
}

program
  .name("cfdna-report")
  .description("Reports of CNV, fusion and SNV/indel calls from cfDNA panel VCF files")
  .version("0.8.0", "-v, --version");

addOutputOptions(
  program
    .command("cnv")
    .description("Report the copy number variants of one or more CNV VCFs")
    .argument("<vcf...>", "CNV VCF file(s)")
    .option("--copy-amp <n>", "only report copy gain above this copy number", parseNumber)
    .option("--copy-loss <n>", "only report copy loss below this copy number", parseNumber)
    .option("--fold-amp <n>", "only report fold amplification above this threshold", parseNumber)
    .option("--fold-loss <n>", "only report fold loss below this threshold", parseNumber)
    .option("-t, --tiles <n>", "only report CNVs covering at least this many tiles", parseInteger)
    .option("-N, --NOCALL", "do not output NOCALL results")
).action(async (vcfs: string[], options: CnvCliOptions) => {
  await runReport(options.output, () =>
    cnvReportCommand(vcfs, {
      genes: geneList(options.gene),
      format: options.format,
      raw: options.raw,
      debug: options.debug,
      concurrency: options.concurrency,
      copyAmp: options.copyAmp,
      copyLoss: options.copyLoss,
      foldAmp: options.foldAmp,
      foldLoss: options.foldLoss,
      tiles: options.tiles,
      excludeNocall: options.NOCALL,
    })
  );
});

addOutputOptions(
  program
    .command("fusion")
    .description("Report the gene fusions of one or more fusion VCFs")
    .argument("<vcf...>", "fusion VCF file(s)")
    .option(
      "-t, --threshold <n>",
      "only report fusions with at least this many reads",
      parseInteger,
      DEFAULT_FUSION_READ_THRESHOLD
    )
    .option("-R, --Ref", "include reference calls too")
    .option("-n, --novel", "include 'Non-Targeted' and novel fusions")
    .option("-N, --NOCALL", "include NOCALL or FAIL fusions")
    .option("--controls", "print the control read counts for each sample")
).action(async (vcfs: string[], options: FusionCliOptions) => {
  await runReport(options.output, () =>
    fusionReportCommand(vcfs, {
      genes: geneList(options.gene),
      format: options.format,
      raw: options.raw,
      debug: options.debug,
      concurrency: options.concurrency,
      threshold: options.threshold,
      includeReference: options.Ref,
      includeNovel: options.novel,
      includeNocall: options.NOCALL,
      showControls: options.controls,
    })
  );
});

addOutputOptions(
  program
    .command("snv")
    .description(
      "Report the SNVs and indels of one or more VCFs (candidate calls come from vcfExtractor)"
    )
    .argument("<vcf...>", "VCF file(s)")
    .option("-N, --NOCALL", "include NOCALL results")
    .option("--min-alt-cov <n>", "report calls with more alt molecules than this", parseInteger)
    .option("--min-vaf <n>", "only report calls with at least this VAF", parseNumber)
).action(async (vcfs: string[], options: SnvCliOptions) => {
  await runReport(options.output, () =>
    snvReportCommand(vcfs, {
      genes: geneList(options.gene),
      format: options.format,
      raw: options.raw,
      debug: options.debug,
      concurrency: options.concurrency,
      includeNocall: options.NOCALL,
      minAltCov: options.minAltCov,
      minVaf: options.minVaf,
    })
  );
});

program
  .command("fix-header")
  .description("Fix the INFO header lines of a cfDNA VCF so standard VCF tools accept it")
  .argument("<vcf>", "the VCF to fix")
  .option("-o, --output <file>", "where to write the fixed VCF (default <vcf>_fixed.vcf)")
  .action(async (vcf: string, options: { output?: string }) => {
    await fixHeaderCommand(vcf, options.output);
  });

program.parseAsync().catch((e) => {
  console.error(e);
  process.exitCode = 1;
});
