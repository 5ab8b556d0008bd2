/**
 * The columns (in order) of a candidate call line as written by the variant
 * annotation utility.
 */
export const SNV_CALL_COLUMNS = [
  "position",
  "ref",
  "alt",
  "vaf",
  "lod",
  "ampCov",
  "molRefCov",
  "molAltCov",
  "varId",
  "gene",
  "transcript",
  "cds",
  "aa",
  "location",
  "function",
] as const;

export type SnvCallColumn = (typeof SNV_CALL_COLUMNS)[number];

/**
 * One candidate SNV/indel call. Values are kept as the text we were given so
 * they are reported exactly as the caller wrote them.
 */
export type SnvCall = Readonly<Record<SnvCallColumn, string>>;

// these must parse as numbers for the line to be usable at all
const NUMERIC_COLUMNS: readonly SnvCallColumn[] = ["vaf", "lod", "molAltCov"];

/**
 * Decode the whitespace split columns of a call line. Returns undefined when the
 * line is too short or its numeric columns aren't numbers.
 *
 * @param columns the split line
 */
export function decodeSnvCall(columns: readonly string[]): SnvCall | undefined {
  if (columns.length < SNV_CALL_COLUMNS.length) return undefined;

  const [
    position,
    ref,
    alt,
    vaf,
    lod,
    ampCov,
    molRefCov,
    molAltCov,
    varId,
    gene,
    transcript,
    cds,
    aa,
    location,
    func,
  ] = columns;

  const call: SnvCall = {
    position,
    ref,
    alt,
    vaf,
    lod,
    ampCov,
    molRefCov,
    molAltCov,
    varId,
    gene,
    transcript,
    cds,
    aa,
    location,
    function: func,
  };

  for (const c of NUMERIC_COLUMNS) {
    if (!Number.isFinite(parseFloat(call[c]))) return undefined;
  }

  return call;
}
