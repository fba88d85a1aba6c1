import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import path from "path";
import { TranscribeError } from "../errors";
import { ENV } from "../pipeline/env";
import { FfmpegAudioTool, mimeTypeFor, planChunks, splitAudio } from "../pipeline/chunk";

/*
 * chunk.ts - split an audio file into overlapping chunks without transcribing.
 *   --plan : probe and print the chunk windows only, write nothing
 */
async function main() {
  const argv = await yargs(hideBin(process.argv))
    .usage("$0 <audio_file> [options]")
    .demandCommand(1, 1, "An audio file is required", "Only one audio file can be given")
    .option("chunk-duration", { type: "number", default: ENV.chunkSec })
    .option("overlap", { type: "number", default: ENV.overlapSec })
    .option("chunks-dir", { type: "string", default: ENV.chunksDir })
    .option("plan", { type: "boolean", default: false, describe: "Print the windows without writing chunks" })
    .help()
    .strict()
    .parse();

  const audioFile = String(argv._[0]);
  mimeTypeFor(audioFile);
  const tool = new FfmpegAudioTool();

  const chunks = argv.plan
    ? planChunks({
        totalDuration: await tool.probeDuration(audioFile),
        chunkDuration: argv["chunk-duration"],
        overlap: argv.overlap,
        chunksDir: argv["chunks-dir"],
        extension: path.extname(audioFile).toLowerCase(),
      })
    : await splitAudio(audioFile, tool, {
        chunkDuration: argv["chunk-duration"],
        overlap: argv.overlap,
        chunksDir: argv["chunks-dir"],
      });

  console.log(argv.plan ? "Planned chunks:" : "Chunks:");
  for (const c of chunks) {
    console.log(` - #${c.index} ${c.start.toFixed(1)}s..${c.end.toFixed(1)}s ${path.resolve(c.filePath)}`);
  }
}

main().catch((e) => {
  console.error(e instanceof TranscribeError ? `Error: ${e.message}` : e);
  process.exit(1);
});
