import { join } from "path";
import { readFile } from "fs/promises";
import { cnvExtractor, extractCnvRecords, normaliseCnvInfo } from "../lib/cnv-extract";

const CNV_SAMPLE_PATH = join(__dirname, "cnv-sample.vcf");

describe("CNV INFO normalisation", () => {
  it("gives the value-less HS flag a value of Yes", () => {
    const info = normaliseCnvInfo("HS;LEN=3000;END=25361180");

    expect(info.get("HS")).toBe("Yes");
    expect(info.get("LEN")).toBe("3000");
    expect(info.get("END")).toBe("25361180");
  });

  it("gives any other value-less token a placeholder", () => {
    const info = normaliseCnvInfo("FD=2.10;SD;PVAL=1e-4");

    expect(info.get("SD")).toBe("NA");
    expect(info.get("PVAL")).toBe("1e-4");
  });

  it("keeps everything after the first = as the value", () => {
    const info = normaliseCnvInfo("FUNC=[{'gene':'MYC'}];PRECISION=a=b");

    expect(info.get("FUNC")).toBe("[{'gene':'MYC'}]");
    expect(info.get("PRECISION")).toBe("a=b");
  });
});

describe("CNV extraction", () => {
  it("extracts the CNV records and sample metadata of a VCF", async () => {
    const { identity, records } = extractCnvRecords(await readFile(CNV_SAMPLE_PATH, "utf8"));

    expect(identity).toEqual({
      name: "CFDNA-001",
      gender: "Female",
      mapd: "0.243",
      cellularity: "0.85",
    });

    // the non <CNV> record is not included
    expect([...records.keys()].sort()).toEqual([
      "chr12:25358180:KRAS",
      "chr2:29415640:ALK",
      "chr7:55086714:EGFR",
    ]);

    const kras = records.get("chr12:25358180:KRAS");

    expect(kras).toEqual({
      chr: "chr12",
      start: "25358180",
      gene: "KRAS",
      filter: "PASS",
      fields: {
        END: "25361180",
        LEN: "3000",
        NUMTILES: "8",
        CN: "5.0",
        FD: "2.50",
        HS: "Yes",
        FUNC: ".",
        PVAL: "1e-6",
        RMMDP: "700",
        MMDP: "1400",
      },
    });

    // no HS flag means not a hotspot
    expect(records.get("chr2:29415640:ALK")?.fields.HS).toBe("No");
  });

  it("maps the CNV plugin assumed gender and uses the last value seen", () => {
    const { identity } = extractCnvRecords(
      [
        "##sampleGender=Male",
        "##AssumedGender=f",
        "##mapd=0.100",
        "##mapd=0.200",
        "#CHROM\tPOS\tID\tREF\tALT\tQUAL\tFILTER\tINFO\tFORMAT\tS2",
      ].join("\n")
    );

    expect(identity).toEqual({
      name: "S2",
      gender: "Female",
      mapd: "0.200",
      cellularity: "NA",
    });
  });

  it("skips short and malformed lines", () => {
    const { records } = extractCnvRecords(
      [
        "#CHROM\tPOS\tID\tREF\tALT\tQUAL\tFILTER\tINFO\tFORMAT\tS3",
        "chr1\t100\tMYC\tA\t<CNV>",
        "",
        "garbage",
        "chr8\t128748315\tMYC\tA\t<CNV>\t100\tNOCALL\tPVAL=0.5\tGT:CN\t./.:3.2",
      ].join("\n")
    );

    expect([...records.keys()]).toEqual(["chr8:128748315:MYC"]);
    expect(records.get("chr8:128748315:MYC")?.filter).toBe("NOCALL");
    expect(records.get("chr8:128748315:MYC")?.fields.CN).toBe("3.2");
  });

  it("has no identity when there is no column header", () => {
    const { identity } = extractCnvRecords("##mapd=0.1\n");

    expect(identity).toBeUndefined();
  });

  it("keys samples on name and metadata", () => {
    expect(
      cnvExtractor.identityKey({
        name: "CFDNA-001",
        gender: "Female",
        mapd: "0.243",
        cellularity: "0.85",
      })
    ).toBe("CFDNA-001:Female:0.243:0.85");
  });
});
