const SEGMENT_REGEX = /\d+|[A-Za-z]+/g;

/**
 * Compare two strings the way version numbers are compared - runs of digits
 * are compared numerically and runs of letters lexically, so that
 * "chr2:100" sorts before "chr10:50".
 *
 * Letters compare case-insensitively, and where a numeric segment meets an
 * alphabetic one the numeric segment sorts first (so "chr10" < "chrX").
 * Strings that are equal segment by segment fall back to a plain comparison
 * so the ordering is total.
 */
export function versionCompare(a: string, b: string): number {
  const aSegments = a.match(SEGMENT_REGEX) ?? [];
  const bSegments = b.match(SEGMENT_REGEX) ?? [];

  const common = Math.min(aSegments.length, bSegments.length);

  for (let i = 0; i < common; i++) {
    const aSeg = aSegments[i];
    const bSeg = bSegments[i];

    const aNumeric = /^\d/.test(aSeg);
    const bNumeric = /^\d/.test(bSeg);

    if (aNumeric && bNumeric) {
      const diff = parseInt(aSeg, 10) - parseInt(bSeg, 10);
      if (diff !== 0) return diff < 0 ? -1 : 1;
    } else if (aNumeric !== bNumeric) {
      return aNumeric ? -1 : 1;
    } else if (aSeg.toUpperCase() !== bSeg.toUpperCase()) {
      return aSeg.toUpperCase() < bSeg.toUpperCase() ? -1 : 1;
    }
  }

  if (aSegments.length !== bSegments.length)
    return aSegments.length < bSegments.length ? -1 : 1;

  if (a === b) return 0;

  return a < b ? -1 : 1;
}
