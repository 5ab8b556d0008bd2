// INFO definitions that the cfDNA pipeline writes in a way standard VCF tools choke on
export const BAD_INFO_FIELDS = [
  "MOL_RATIO_TO_WILD_TYPE",
  "NORM_COUNT_WITHIN_GENE",
  "RATIO_TO_WILD_TYPE",
  "NORM_MOL_COUNT_WITHIN_GENE",
];

/**
 * Rebuild a broken ##INFO header line from just its key=value pairs, fixing the
 * dangling ` "` that ends the description.
 *
 * @param line the header line (without line ending)
 */
export function fixInfoLine(line: string): string {
  const trimmed = line.replace(/##INFO=<(.*)>/, "$1");

  const pairs = trimmed.match(/\w+=[^,]+/g) ?? [];

  if (pairs.length > 0)
    pairs[pairs.length - 1] = pairs[pairs.length - 1].replace(/ "$/, '."');

  return `##INFO=<${pairs.join(",")}>`;
}

/**
 * Fix the header of a cfDNA VCF so it passes standard VCF tools. Records and
 * all other header lines are passed through untouched.
 *
 * @param text the VCF content
 * @return the fixed content and the number of header lines that were rewritten
 */
export function fixVcfHeader(text: string): { text: string; fixedLines: number } {
  let fixedLines = 0;

  const lines = text.split("\n").map((line) => {
    if (!line.startsWith("#")) return line;

    if (!BAD_INFO_FIELDS.some((f) => line.includes(f))) return line;

    fixedLines++;

    const crlf = line.endsWith("\r");
    const fixed = fixInfoLine(crlf ? line.slice(0, -1) : line);

    return crlf ? `${fixed}\r` : fixed;
  });

  return { text: lines.join("\n"), fixedLines };
}

/**
 * Where the fixed VCF goes when no output is given - beside the input with
 * _fixed added.
 */
export function fixedVcfPath(vcfPath: string): string {
  if (vcfPath.includes(".vcf")) return vcfPath.replace(".vcf", "_fixed.vcf");

  return `${vcfPath}_fixed.vcf`;
}
