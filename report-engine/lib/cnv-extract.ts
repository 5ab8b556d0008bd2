import { Extraction, FileExtractor } from "./report-types";
import { headerValue, sampleColumnName, splitColumns, splitLines } from "./vcf-lines";

/**
 * The INFO fields we carry for every CNV (plus CN which we inject from the
 * sample column).
 */
export const CNV_FIELDS = [
  "END",
  "LEN",
  "NUMTILES",
  "CN",
  "FD",
  "HS",
  "FUNC",
  "PVAL",
  "RMMDP",
  "MMDP",
] as const;

export type CnvField = (typeof CNV_FIELDS)[number];

export type CnvFieldSet = Readonly<Record<CnvField, string>>;

export type CnvRecord = {
  chr: string;
  start: string;
  gene: string;

  // the VCF FILTER column (i.e. PASS or NOCALL)
  filter: string;

  fields: CnvFieldSet;
};

export type CnvSampleIdentity = {
  name: string;
  gender: string;
  mapd: string;
  cellularity: string;
};

// what we show for sample metadata that was never found in the header
export const MISSING_METADATA = "NA";

// the alt allele that marks a record as a CNV call
const CNV_ALT = "<CNV>";

// CHROM POS ID REF ALT QUAL FILTER INFO FORMAT <sample>
const CNV_MIN_COLUMNS = 10;

/**
 * Turn the INFO column of a CNV record into a field map. Some tokens come
 * through with no value at all - HS is a flag meaning hotspot (so gets "Yes") and
 * anything else (SD is the usual one) gets an explicit "NA".
 *
 * @param info the raw INFO column
 */
export function normaliseCnvInfo(info: string): Map<string, string> {
  const result = new Map<string, string>();

  for (const token of info.split(";")) {
    if (token.length === 0) continue;

    const eq = token.indexOf("=");

    if (eq < 0) result.set(token, token === "HS" ? "Yes" : "NA");
    else result.set(token.slice(0, eq), token.slice(eq + 1));
  }

  return result;
}

function cnvFieldSet(info: ReadonlyMap<string, string>): CnvFieldSet {
  const v = (k: CnvField) => info.get(k) ?? ".";

  return {
    END: v("END"),
    LEN: v("LEN"),
    NUMTILES: v("NUMTILES"),
    CN: v("CN"),
    FD: v("FD"),
    HS: info.get("HS") ?? "No",
    FUNC: v("FUNC"),
    PVAL: v("PVAL"),
    RMMDP: v("RMMDP"),
    MMDP: v("MMDP"),
  };
}

/**
 * Extract every <CNV> record of a single sample CNV VCF, along with the sample
 * metadata that lives in its meta header lines.
 *
 * Lines that don't look like a CNV record are skipped.
 *
 * @param text the VCF content
 */
export function extractCnvRecords(
  text: string
): Extraction<CnvSampleIdentity, CnvRecord> {
  const records = new Map<string, CnvRecord>();

  let sampleName: string | undefined;
  let gender: string | undefined;
  let mapd: string | undefined;
  let cellularity: string | undefined;

  for (const line of splitLines(text)) {
    if (line.startsWith("##")) {
      // the newer CNV plugin reports gender differently to the normal IR data
      const assumed = headerValue(line, /AssumedGender=([mf])/);
      const sampleGender = headerValue(line, /sampleGender=(\w+)/);

      if (assumed) gender = assumed === "m" ? "Male" : "Female";
      else if (sampleGender) gender = sampleGender;

      mapd = headerValue(line, /mapd=(\d\.\d+)/) ?? mapd;
      cellularity =
        headerValue(line, /CellularityAsAFractionBetween0-1=(.*)$/) ?? cellularity;

      continue;
    }

    if (line.startsWith("#")) {
      sampleName = sampleColumnName(line) ?? sampleName;
      continue;
    }

    const columns = splitColumns(line);

    if (columns.length < CNV_MIN_COLUMNS || columns[4] !== CNV_ALT) continue;

    const [chr, start, gene] = columns;

    const info = normaliseCnvInfo(columns[7]);

    // the copy number itself is the last subfield of the sample column
    const cn = /:([^:]+)$/.exec(columns[9]);
    if (cn) info.set("CN", cn[1]);

    records.set(`${chr}:${start}:${gene}`, {
      chr,
      start,
      gene,
      filter: columns[6],
      fields: cnvFieldSet(info),
    });
  }

  if (sampleName === undefined) return { identity: undefined, records };

  return {
    identity: {
      name: sampleName,
      gender: gender ?? MISSING_METADATA,
      mapd: mapd ?? MISSING_METADATA,
      cellularity: cellularity ?? MISSING_METADATA,
    },
    records,
  };
}

export const cnvExtractor: FileExtractor<CnvSampleIdentity, CnvRecord> = {
  extract: (text) => extractCnvRecords(text),
  identityKey: (identity) =>
    [identity.name, identity.gender, identity.mapd, identity.cellularity].join(":"),
  fallbackIdentity: (fileBaseName) => ({
    name: fileBaseName,
    gender: MISSING_METADATA,
    mapd: MISSING_METADATA,
    cellularity: MISSING_METADATA,
  }),
};
