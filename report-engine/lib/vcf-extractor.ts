import { execFile } from "child_process";
import { promisify } from "util";
import { vcfExtractorBinary } from "./env";
import { ConfigurationError, ExtractorToolError } from "./errors";
import { MINIMUM_VCF_EXTRACTOR_VERSION } from "./limits";
import { decodeSnvCall, SnvCall } from "./snv-call";
import { splitColumns, splitLines } from "./vcf-lines";

const execFilePromise = promisify(execFile);

export type SnvExtractOptions = {
  // restrict the calls to these genes (empty for all)
  genes: readonly string[];
  // ask the tool to keep NOCALL calls
  includeNocall: boolean;
};

/**
 * Where candidate SNV/indel calls come from. The real thing shells out to
 * vcfExtractor - tests use an in-process fake.
 */
export interface SnvCallSource {
  /**
   * Check the source can be used at all. Must be called (and succeed) before
   * any file is processed.
   *
   * @throws ConfigurationError
   */
  ensureReady(): Promise<void>;

  extractCalls(vcfPath: string, options: SnvExtractOptions): Promise<SnvCall[]>;
}

/**
 * The arguments we invoke the extractor with - no-call exclusion, novel
 * exclusion, all alleles, cfDNA mode (and optionally a gene restriction).
 */
export function extractorArgs(vcfPath: string, options: SnvExtractOptions): string[] {
  const args: string[] = [];

  if (!options.includeNocall) args.push("-N");

  args.push("-n", "-a", "-c");

  if (options.genes.length > 0) args.push("-g", options.genes.join(","));

  args.push(vcfPath);

  return args;
}

/**
 * Find the "major.minor" version in the output of `vcfExtractor.pl -v`
 * (which looks like "vcfExtractor.pl - v8.1.2_061518").
 */
export function parseExtractorVersion(output: string): string | undefined {
  const m = /v(\d+)\.(\d+)\.(?:\d+_)?\d{6}/.exec(output);

  return m ? `${m[1]}.${m[2]}` : undefined;
}

/**
 * Numeric comparison of dotted versions.
 */
export function versionAtLeast(version: string, minimum: string): boolean {
  const v = version.split(".").map((n) => parseInt(n, 10));
  const m = minimum.split(".").map((n) => parseInt(n, 10));

  for (let i = 0; i < Math.max(v.length, m.length); i++) {
    const a = v[i] ?? 0;
    const b = m[i] ?? 0;
    if (a !== b) return a > b;
  }

  return true;
}

/**
 * Decode the call lines (those for a chromosome position) out of the
 * extractor output. Anything else (headers, blank lines, junk) is skipped.
 */
export function parseExtractorOutput(stdout: string): SnvCall[] {
  const calls: SnvCall[] = [];

  for (const line of splitLines(stdout)) {
    if (!line.startsWith("chr")) continue;

    const call = decodeSnvCall(splitColumns(line));

    if (call) calls.push(call);
  }

  return calls;
}

export class VcfExtractorTool implements SnvCallSource {
  constructor(
    private readonly binary: string = vcfExtractorBinary,
    private readonly minimumVersion: string = MINIMUM_VCF_EXTRACTOR_VERSION
  ) {}

  async ensureReady(): Promise<void> {
    let output: string;

    try {
      const { stdout, stderr } = await execFilePromise(this.binary, ["-v"]);
      output = stdout + stderr;
    } catch (e) {
      throw new ConfigurationError(
        `'${this.binary}' could not be run (${e instanceof Error ? e.message : String(e)}). Please install this required utility and try again.`
      );
    }

    const version = parseExtractorVersion(output);

    if (!version)
      throw new ConfigurationError(
        `Could not determine the version of '${this.binary}' from its version output`
      );

    if (!versionAtLeast(version, this.minimumVersion))
      throw new ConfigurationError(
        `'${this.binary}' version (v${version}) is too old and does not have the necessary components to run cfDNA data analysis. Version v${this.minimumVersion} or later is required.`
      );
  }

  async extractCalls(vcfPath: string, options: SnvExtractOptions): Promise<SnvCall[]> {
    const args = extractorArgs(vcfPath, options);

    try {
      const { stdout } = await execFilePromise(this.binary, args, {
        maxBuffer: 1024 * 1024 * 64,
      });

      return parseExtractorOutput(stdout);
    } catch (e) {
      // an execFile failure message includes whatever the tool wrote to stderr
      throw new ExtractorToolError(
        `${this.binary} ${args.join(" ")} failed: ${e instanceof Error ? e.message : String(e)}`
      );
    }
  }
}
