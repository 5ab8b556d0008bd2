import { fixedVcfPath, fixInfoLine, fixVcfHeader } from "../lib/vcf-header-fix";

const BROKEN =
  '##INFO=<ID=MOL_RATIO_TO_WILD_TYPE,Number=1,Type=Float,Description="Molecular ratio to wild type ">';
const FIXED =
  '##INFO=<ID=MOL_RATIO_TO_WILD_TYPE,Number=1,Type=Float,Description="Molecular ratio to wild type.">';

describe("VCF header fix", () => {
  it("closes off the dangling description", () => {
    expect(fixInfoLine(BROKEN)).toBe(FIXED);
  });

  it("only rewrites the broken INFO definitions", () => {
    const vcf = [
      "##fileformat=VCFv4.1",
      BROKEN,
      '##INFO=<ID=DP,Number=1,Type=Integer,Description="Depth">',
      "#CHROM\tPOS\tID\tREF\tALT\tQUAL\tFILTER\tINFO",
      "chr1\t100\t.\tA\tG\t50\tPASS\tMOL_RATIO_TO_WILD_TYPE=0.5 ",
      "",
    ].join("\n");

    const { text, fixedLines } = fixVcfHeader(vcf);

    expect(fixedLines).toBe(1);
    expect(text.split("\n")).toEqual([
      "##fileformat=VCFv4.1",
      FIXED,
      '##INFO=<ID=DP,Number=1,Type=Integer,Description="Depth">',
      "#CHROM\tPOS\tID\tREF\tALT\tQUAL\tFILTER\tINFO",
      "chr1\t100\t.\tA\tG\t50\tPASS\tMOL_RATIO_TO_WILD_TYPE=0.5 ",
      "",
    ]);
  });

  it("keeps windows line endings", () => {
    const { text } = fixVcfHeader(`${BROKEN}\r\n#CHROM\r\n`);

    expect(text).toBe(`${FIXED}\r\n#CHROM\r\n`);
  });

  it("writes the fixed VCF beside the original", () => {
    expect(fixedVcfPath("/data/S1.vcf")).toBe("/data/S1_fixed.vcf");
    expect(fixedVcfPath("/data/S1.vcf.gz")).toBe("/data/S1_fixed.vcf.gz");
    expect(fixedVcfPath("/data/S1")).toBe("/data/S1_fixed.vcf");
  });
});
