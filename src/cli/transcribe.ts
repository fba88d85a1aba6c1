import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { GeminiClient } from "../client";
import { ConfigurationError, RemoteTransportError, ResponseShapeError, TranscribeError } from "../errors";
import { ENV } from "../pipeline/env";
import { FfmpegAudioTool, validateChunkSettings } from "../pipeline/chunk";
import { buildChunkPrompt, parseSpeakers, readInstructions, readMergePrompt } from "../pipeline/prompts";
import { createPipelineConfig, TranscriptionPipeline } from "../pipeline/run";
import { closeLogFile, info, setLogFile, setLogLevel } from "../pipeline/log";
import { ABORTED_MESSAGE, INTERRUPT_MESSAGE, printSummary } from "./output";
import { packageVersion } from "./version";

const EXIT_FAILURE = 1;
const EXIT_INTERRUPTED = 130;

const controller = new AbortController();

function onSigint() {
  if (controller.signal.aborted) {
    // Second Ctrl-C: stop waiting for in-flight work
    closeLogFile();
    process.exit(EXIT_INTERRUPTED);
  }
  console.error(INTERRUPT_MESSAGE);
  controller.abort();
}

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .scriptName("gemini-chunked-transcribe")
    .usage("$0 <audio_file> [options]\n\nTranscribe a long recording in overlapping chunks")
    .demandCommand(1, 1, "An audio file is required", "Only one audio file can be given")
    .option("output", { alias: "o", type: "string", default: "transcript.md", describe: "Output file" })
    .option("api-key", { alias: "k", type: "string", describe: "Gemini API key (default: GEMINI_API_KEY)" })
    .option("model", { alias: "m", type: "string", default: ENV.geminiModel, describe: "Gemini model name" })
    .option("chunk-duration", { type: "number", default: ENV.chunkSec, describe: "Chunk length in seconds" })
    .option("overlap", { type: "number", default: ENV.overlapSec, describe: "Overlap between chunks in seconds" })
    .option("instructions", {
      alias: "i",
      type: "string",
      describe: "Extra transcription instructions file (default: transcription_instructions.md if present)",
    })
    .option("merge-prompt", { type: "string", describe: "Merge prompt template file; must contain {transcript} once" })
    .option("speakers", { type: "string", describe: "Comma-separated speaker names" })
    .option("header", { type: "string", describe: "Text placed above the transcript" })
    .option("chunks-dir", { type: "string", default: ENV.chunksDir, describe: "Directory for chunk audio" })
    .option("checkpoint-dir", { type: "string", describe: "Directory for chunk transcripts (default: chunks dir)" })
    .option("concurrency", { type: "number", default: ENV.transcribeConcurrency, describe: "Chunks in flight at once" })
    .option("reuse-uploads", { type: "boolean", default: true, describe: "Reuse identical files already uploaded" })
    .option("retries", { type: "number", default: ENV.geminiMaxRetries, describe: "Retries for transient HTTP failures" })
    .option("log-file", { type: "string", describe: "Append JSON log lines to this file" })
    .option("quiet", { alias: "q", type: "boolean", default: false, describe: "Only print warnings and errors" })
    .version(await packageVersion())
    .alias("version", "v")
    .help()
    .alias("help", "h")
    .strict()
    .parse();

  if (argv.quiet) setLogLevel("warn");
  if (argv["log-file"]) setLogFile(argv["log-file"]);

  const audioFile = String(argv._[0]);
  validateChunkSettings(argv["chunk-duration"], argv.overlap);

  const apiKey = argv["api-key"] || ENV.geminiApiKey;
  if (!apiKey) {
    throw new ConfigurationError("No API key. Pass --api-key or set GEMINI_API_KEY.");
  }
  const client = new GeminiClient({
    apiKey,
    model: argv.model,
    baseUrl: ENV.geminiBaseUrl,
    maxRetries: argv.retries,
  });

  const instructions = await readInstructions(argv.instructions);
  if (instructions) info("cli.instructions", { path: instructions.path });
  const mergePrompt = argv["merge-prompt"] ? await readMergePrompt(argv["merge-prompt"]) : undefined;

  const config = createPipelineConfig({
    chunkDuration: argv["chunk-duration"],
    overlap: argv.overlap,
    chunksDir: argv["chunks-dir"],
    checkpointDir: argv["checkpoint-dir"],
    chunkPrompt: buildChunkPrompt({ speakers: parseSpeakers(argv.speakers), instructions: instructions?.text }),
    mergePrompt,
    concurrency: argv.concurrency,
    reuseUploads: argv["reuse-uploads"],
    pollIntervalMs: ENV.filePollIntervalMs,
    fileReadyTimeoutMs: ENV.fileReadyTimeoutSec * 1000,
  });
  const pipeline = new TranscriptionPipeline(config, { service: client, audio: new FfmpegAudioTool() });

  process.on("SIGINT", onSigint);
  try {
    const result = await pipeline.run({
      audioFile,
      outputFile: argv.output,
      header: argv.header,
      signal: controller.signal,
    });
    printSummary(result, argv.quiet);
  } finally {
    process.off("SIGINT", onSigint);
  }
}

function report(e: unknown) {
  if (e instanceof TranscribeError) {
    console.error(`Error: ${e.message}`);
    if (e instanceof ResponseShapeError && e.raw) console.error(`Raw response: ${e.raw}`);
    if (e instanceof RemoteTransportError && e.body) console.error(`Response body: ${e.body}`);
    return;
  }
  console.error(e instanceof Error ? e.stack ?? e.message : e);
}

main()
  .then(() => closeLogFile())
  .catch((e) => {
    if (controller.signal.aborted) {
      console.error(ABORTED_MESSAGE);
      closeLogFile();
      process.exit(EXIT_INTERRUPTED);
    }
    report(e);
    closeLogFile();
    process.exit(EXIT_FAILURE);
  });
