import { readFile } from "fs/promises";
import { basename } from "path";
import { FileExtractor, SampleResult } from "./report-types";

/**
 * The unit of parallel work - read one VCF, extract its records and decide
 * on the identity of the sample it belongs to.
 *
 * A file we can't read rejects the returned promise - it is up to the caller
 * to keep that from affecting any other file.
 *
 * @param vcfPath the VCF to process
 * @param extractor the record type specific extractor
 */
export async function processFile<I, R>(
  vcfPath: string,
  extractor: FileExtractor<I, R>
): Promise<SampleResult<I, R>> {
  const text = await readFile(vcfPath, "utf8");

  const extraction = await extractor.extract(text, vcfPath);

  const controls = extraction.controls ?? new Map<string, number>();

  if (extraction.identity !== undefined) {
    return {
      key: extractor.identityKey(extraction.identity),
      identity: extraction.identity,
      source: vcfPath,
      records: extraction.records,
      controls: controls,
    };
  }

  // no usable metadata in the file so the file name is the best we can do
  const fileBaseName = basename(vcfPath);

  return {
    key: fileBaseName,
    identity: extractor.fallbackIdentity(fileBaseName),
    source: vcfPath,
    records: extraction.records,
    controls: controls,
  };
}
