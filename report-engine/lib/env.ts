import { env as envDict } from "process";
import { MAX_CONCURRENT_FILES } from "./limits";

// by default, we expect the annotation utility to just be on the PATH
// HOWEVER, it is useful to be able to point at a specific install for local testing
export const vcfExtractorBinary = envDict["VCF_EXTRACTOR"] || "vcfExtractor.pl";

/**
 * The concurrency cap for per-file workers. Can be lowered (or raised) via
 * CFDNA_REPORT_CONCURRENCY - anything that isn't a positive integer is ignored.
 *
 * @param envValue the raw env value (defaults to the live process env)
 */
export function concurrencyLimit(
  envValue: string | undefined = envDict["CFDNA_REPORT_CONCURRENCY"]
): number {
  if (!envValue) return MAX_CONCURRENT_FILES;

  const n = parseInt(envValue, 10);

  if (!Number.isInteger(n) || n < 1) return MAX_CONCURRENT_FILES;

  return n;
}
