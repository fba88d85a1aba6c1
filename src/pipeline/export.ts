import fs from "fs-extra";
import path from "path";
import { info } from "./log";

export const HEADER_SEPARATOR = "\n\n---\n\n";

export function formatDocument(merged: string, header?: string): string {
  return header ? `${header}${HEADER_SEPARATOR}${merged}` : merged;
}

/**
 * Write the final document, replacing whatever is at outputFile
 */
export async function writeTranscript(
  outputFile: string,
  merged: string,
  header?: string
): Promise<string> {
  const outPath = path.resolve(outputFile);
  await fs.outputFile(outPath, formatDocument(merged, header), "utf8");
  info("export.write", { path: outPath, chars: merged.length, header: Boolean(header) });
  return outPath;
}
