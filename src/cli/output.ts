import type { RunResult } from "../pipeline/types";

export const INTERRUPT_MESSAGE =
  "\nInterrupted. Aborting; completed chunk transcripts are kept. Press Ctrl-C again to exit immediately.";
export const ABORTED_MESSAGE = "Aborted. Completed chunk transcripts were kept; re-run to resume.";

export function summaryLines(result: RunResult): string[] {
  return [
    `Transcript written to ${result.outputFile}`,
    ` - chunks: ${result.chunkCount} (${result.transcribedChunks} transcribed, ${result.resumedChunks} from checkpoints)`,
  ];
}

/**
 * Final summary on stdout; quiet mode prints nothing
 */
export function printSummary(result: RunResult, quiet: boolean): void {
  if (quiet) return;
  for (const line of summaryLines(result)) console.log(line);
}
