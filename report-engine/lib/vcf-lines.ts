/**
 * Split file content into lines, coping with both unix and windows line endings.
 * A trailing empty line (from the final newline) is dropped.
 */
export function splitLines(text: string): string[] {
  const lines = text.split(/\r?\n/);

  if (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();

  return lines;
}

/**
 * Split a data line into its whitespace delimited columns (leading whitespace
 * is ignored so we never produce an empty first column).
 */
export function splitColumns(line: string): string[] {
  const trimmed = line.trim();

  if (trimmed.length === 0) return [];

  return trimmed.split(/\s+/);
}

/**
 * For a "##" meta header line, return the first capture group of the
 * pattern if it matches.
 *
 * @param line the header line
 * @param pattern a regex with (at least) one capture group
 */
export function headerValue(line: string, pattern: RegExp): string | undefined {
  const m = pattern.exec(line);

  return m ? m[1] : undefined;
}

/**
 * The sample column name from a "#CHROM" column header line - which for our
 * single sample VCFs is always the last column.
 */
export function sampleColumnName(line: string): string | undefined {
  const columns = splitColumns(line);

  return columns.length > 0 ? columns[columns.length - 1] : undefined;
}
