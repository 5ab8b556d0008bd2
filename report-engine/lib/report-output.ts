import { FileHandle, open } from "fs/promises";
import { ConfigurationError } from "./errors";

/**
 * Where a finished report goes - a file or stdout.
 */
export type ReportTarget = {
  write(reportText: string): Promise<void>;
  close(): Promise<void>;
};

function stdoutTarget(): ReportTarget {
  return {
    write: (reportText) =>
      new Promise<void>((resolve, reject) =>
        process.stdout.write(reportText, (err) => (err ? reject(err) : resolve()))
      ),
    close: async () => {},
  };
}

/**
 * Open the report destination. This happens before any VCF is processed so
 * that an output file we can't write is reported straight away.
 *
 * @param outputPath optional path of the file to write (stdout otherwise)
 * @throws ConfigurationError if the output file can't be opened for writing
 */
export async function openReportTarget(outputPath?: string): Promise<ReportTarget> {
  if (!outputPath) return stdoutTarget();

  let handle: FileHandle;

  try {
    handle = await open(outputPath, "w");
  } catch (e) {
    throw new ConfigurationError(
      `Can not open '${outputPath}' for writing (${e instanceof Error ? e.message : String(e)})`
    );
  }

  return {
    write: async (reportText) => {
      console.warn(`Writing data to ${outputPath}.`);

      await handle.writeFile(reportText, "utf8");
    },
    close: () => handle.close(),
  };
}
