import { mkdtemp, readFile, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { ConfigurationError } from "../lib/errors";
import { openReportTarget } from "../lib/report-output";

describe("Report output", () => {
  let workDir: string;
  let warn: jest.SpyInstance;

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), "cfdna-report-"));
    warn = jest.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(async () => {
    warn.mockRestore();
    await rm(workDir, { recursive: true, force: true });
  });

  it("writes the report to the output file", async () => {
    const outputPath = join(workDir, "report.csv");

    const target = await openReportTarget(outputPath);
    await target.write("Sample,Gene\nS1,ALK\n");
    await target.close();

    expect(await readFile(outputPath, "utf8")).toBe("Sample,Gene\nS1,ALK\n");
    expect(warn).toHaveBeenCalledWith(`Writing data to ${outputPath}.`);
  });

  it("refuses an output file that can't be written before any report is made", async () => {
    const outputPath = join(workDir, "no-such-dir", "report.csv");

    await expect(openReportTarget(outputPath)).rejects.toThrow(ConfigurationError);
    await expect(openReportTarget(outputPath)).rejects.toThrow(
      `Can not open '${outputPath}' for writing`
    );
  });
});
