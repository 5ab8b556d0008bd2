/**
 * The output formats the reports can be rendered in. "pp" is a pretty
 * printed fixed width table.
 */
export type OutputFormat = "csv" | "tsv" | "pp";

/**
 * How a report is to be rendered.
 */
export type ReportOptions = {
  format: OutputFormat;
  // the flattened spreadsheet export (ignores format)
  raw: boolean;
};

/**
 * One final, filtered, ordered row of output fields ready for rendering.
 */
export type ReportRow = readonly string[];

/**
 * What an extractor pulls out of the content of a single VCF.
 */
export type Extraction<I, R> = {
  // undefined when the file did not carry enough metadata to identify the sample
  identity: I | undefined;

  // variant key -> fields for that variant
  records: ReadonlyMap<string, R>;

  // control/reference probe read counts (only fusion files have these)
  controls?: ReadonlyMap<string, number>;
};

/**
 * A record type specific extractor - the parsing half of a per-file worker.
 */
export interface FileExtractor<I, R> {
  extract(text: string, vcfPath: string): Extraction<I, R> | Promise<Extraction<I, R>>;

  // the grouping key used for a sample everywhere downstream
  identityKey(identity: I): string;

  // an identity to use when the file itself doesn't give us one
  fallbackIdentity(fileBaseName: string): I;
}

/**
 * The owned result of a single per-file worker.
 */
export type SampleResult<I, R> = {
  key: string;
  identity: I;

  // the VCF the result came from
  source: string;

  records: ReadonlyMap<string, R>;
  controls: ReadonlyMap<string, number>;
};

/**
 * Sample key -> the result for that sample. Built once by the dispatcher merge
 * and read-only thereafter.
 */
export type ResultSet<I, R> = ReadonlyMap<string, SampleResult<I, R>>;
