import pLimit from "p-limit";
import { processFile } from "./file-worker";
import { concurrencyLimit } from "./env";
import { FileExtractor, ResultSet, SampleResult } from "./report-types";

/**
 * Run a worker for every VCF (at most `concurrency` at a time) and
 * merge the results by sample identity once every worker has finished.
 *
 * A worker that fails is logged and left out - the other samples still make
 * it into the result set.
 *
 * @param vcfPaths the VCFs to process
 * @param extractor the record type specific extractor
 * @param concurrency maximum number of files in flight
 */
export async function dispatchFiles<I, R>(
  vcfPaths: readonly string[],
  extractor: FileExtractor<I, R>,
  concurrency: number = concurrencyLimit()
): Promise<ResultSet<I, R>> {
  const limit = pLimit(concurrency);

  const outcomes = await Promise.allSettled(
    vcfPaths.map((vcfPath) => limit(() => processFile(vcfPath, extractor)))
  );

  return mergeResults(vcfPaths, outcomes);
}

/**
 * Fold the worker outcomes into a single result set. This happens strictly
 * after all workers have joined and in input file order - so where two files
 * resolve to the same sample identity the later *file* wins (with a warning).
 *
 * @param vcfPaths the VCFs in the order they were given to us
 * @param outcomes the settled worker promises (same order as vcfPaths)
 */
export function mergeResults<I, R>(
  vcfPaths: readonly string[],
  outcomes: readonly PromiseSettledResult<SampleResult<I, R>>[]
): ResultSet<I, R> {
  const merged = new Map<string, SampleResult<I, R>>();

  outcomes.forEach((outcome, i) => {
    if (outcome.status === "rejected") {
      const reason =
        outcome.reason instanceof Error
          ? outcome.reason.message
          : String(outcome.reason);

      console.warn(`WARN: Skipping '${vcfPaths[i]}' - ${reason}`);

      return;
    }

    const result = outcome.value;
    const existing = merged.get(result.key);

    if (existing)
      console.warn(
        `WARN: Sample identity '${result.key}' produced by both '${existing.source}' and '${result.source}'; keeping '${result.source}'`
      );

    merged.set(result.key, result);
  });

  return merged;
}
