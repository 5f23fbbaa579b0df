import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";

export function reportFileName(date: Date = new Date()): string {
  const stamp =
    `${date.getFullYear()}${pad2(date.getMonth() + 1)}${pad2(date.getDate())}` +
    `${pad2(date.getHours())}${pad2(date.getMinutes())}`;
  return `mpie_report_${stamp}.txt`;
}

/** Writes the raw analyzer output verbatim and returns the file path. */
export async function writeReportArtifact(
  outDir: string,
  rawReport: string,
  date: Date = new Date(),
): Promise<string> {
  await mkdir(outDir, { recursive: true });
  const path = join(outDir, reportFileName(date));
  await writeFile(path, rawReport, "utf8");
  return path;
}

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}
