import { join } from "path";
import { FusionRecord } from "../lib/fusion-extract";
import { buildFusionCriteria, fusionIsReportable } from "../lib/fusion-filter";
import { fusionReportCommand } from "../lib/report-commands";

const FUSION_SAMPLE_PATH = join(__dirname, "FUS-001_RNA_Fusion_filtered.vcf");

function fusion(overrides: Partial<FusionRecord> = {}): FusionRecord {
  return {
    pair: "EML4-ALK",
    junction: "E13A20",
    id: "COSF408",
    driver: "ALK",
    partner: "EML4",
    count: 25,
    filter: "PASS",
    ...overrides,
  };
}

describe("Fusion filtering", () => {
  const defaults = buildFusionCriteria({});

  it("needs at least the read threshold", () => {
    expect(fusionIsReportable(fusion({ count: 2 }), defaults)).toBe(true);
    expect(fusionIsReportable(fusion({ count: 1 }), defaults)).toBe(false);
  });

  it("drops reference calls unless asked for", () => {
    const reference = fusion({ count: 0, filter: "FAIL" });

    expect(fusionIsReportable(reference, defaults)).toBe(false);
    expect(
      fusionIsReportable(reference, buildFusionCriteria({ includeReference: true, readThreshold: 0 }))
    ).toBe(true);
  });

  it("keeps FAIL calls for the NOCALL option too", () => {
    const failed = fusion({ filter: "FAIL" });

    expect(fusionIsReportable(failed, defaults)).toBe(false);
    expect(fusionIsReportable(failed, buildFusionCriteria({ includeNocall: true }))).toBe(true);
  });

  it("drops NOCALL calls unless asked for", () => {
    const nocall = fusion({ filter: "NOCALL" });

    expect(fusionIsReportable(nocall, defaults)).toBe(false);
    expect(fusionIsReportable(nocall, buildFusionCriteria({ includeReference: true }))).toBe(false);
    expect(fusionIsReportable(nocall, buildFusionCriteria({ includeNocall: true }))).toBe(true);
  });

  it("drops non-targeted and novel fusions unless asked for", () => {
    expect(fusionIsReportable(fusion({ id: "Novel" }), defaults)).toBe(false);
    expect(fusionIsReportable(fusion({ id: "Non-Targeted" }), defaults)).toBe(false);
    expect(
      fusionIsReportable(fusion({ id: "Novel" }), buildFusionCriteria({ includeNovel: true }))
    ).toBe(true);
  });

  it("matches genes against the driver regardless of case given", () => {
    const criteria = buildFusionCriteria({ genes: ["alk"] });

    expect(fusionIsReportable(fusion(), criteria)).toBe(true);
    expect(fusionIsReportable(fusion({ driver: "RET" }), criteria)).toBe(false);
  });
});

describe("Fusion report", () => {
  it("exports the reportable fusions raw", async () => {
    const report = await fusionReportCommand([FUSION_SAMPLE_PATH], {
      format: "pp",
      raw: true,
    });

    expect(report).toBe(
      "Sample,Fusion,ID,Read_Count,Driver_Gene,Partner_Gene\n" +
        "FUS-001,EML4-ALK.E13A20,COSF408,25,ALK,EML4\n"
    );
  });

  it("reports everything in key order when every filter is relaxed", async () => {
    const report = await fusionReportCommand([FUSION_SAMPLE_PATH], {
      format: "csv",
      threshold: 1,
      includeNovel: true,
      includeNocall: true,
    });

    expect(report.split("\n")).toEqual([
      "::: Fusions in FUS-001 :::",
      "Fusion,ID,Read_Count,Driver_Gene,Partner_Gene",
      "CCDC6-RET.C1R12,COSF1271,1,RET,CCDC6",
      "EML4-ALK.E13A20,COSF408,25,ALK,EML4",
      'LMNA-XYZ1.L2X3,-,10,UNKNOWN,"LMNA,XYZ1"',
      "TPM3-NTRK1.T7N10,Non-Targeted,40,NTRK1,TPM3",
      "",
      "",
    ]);
  });

  it("names the genes in the banner and marks an empty sample", async () => {
    const report = await fusionReportCommand([FUSION_SAMPLE_PATH], {
      format: "csv",
      genes: ["ros1", "met"],
    });

    expect(report).toBe("::: ROS1,MET Fusions in FUS-001 :::\n<<< No Fusions Detected >>>\n\n");
  });

  it("pretty prints the fusions and controls", async () => {
    const report = await fusionReportCommand([FUSION_SAMPLE_PATH], {
      format: "pp",
      showControls: true,
    });

    const line = (values: string[], widths: number[]) =>
      values.map((v, i) => v.padEnd(widths[i])).join(" ").trimEnd();
    const fusionWidths = [17, 12, 12, 15, 15];
    const controlWidths = [14, 12];

    expect(report.split("\n")).toEqual([
      "::: Fusions in FUS-001 :::",
      line(["Fusion", "ID", "Read_Count", "Driver_Gene", "Partner_Gene"], fusionWidths),
      line(["EML4-ALK.E13A20", "COSF408", "25", "ALK", "EML4"], fusionWidths),
      "Controls:",
      line(["Control", "Read_Count"], controlWidths),
      line(["EGFR.E1E2.WT", "300"], controlWidths),
      line(["TBP", "45"], controlWidths),
      "",
      "",
    ]);
  });
});
