import fs from "fs-extra";
import type { GenerationSettings, TranscriptionService } from "../client/types";
import { ConfigurationError, TranscribeError } from "../errors";
import { AudioTool, mimeTypeFor, splitAudio, validateChunkSettings } from "./chunk";
import { CheckpointStore } from "./checkpoint";
import { transcribeChunks } from "./transcribe";
import { assertCompleteTranscripts, mergeTranscripts, validateMergeTemplate } from "./merge";
import { writeTranscript } from "./export";
import { buildChunkPrompt, DEFAULT_MERGE_PROMPT } from "./prompts";
import { PipelineConfig, PipelineStage, RunOptions, RunResult } from "./types";
import { debug, info, startStep } from "./log";

export const DEFAULT_CHUNK_GENERATION: GenerationSettings = {
  temperature: 0.2,
  maxOutputTokens: 30000,
  timeoutMs: 600_000,
};

// Merge output can be far larger than any single chunk
export const DEFAULT_MERGE_GENERATION: GenerationSettings = {
  temperature: 0.3,
  maxOutputTokens: 100000,
  timeoutMs: 900_000,
};

const STAGE_ORDER: PipelineStage[] = ["start", "split", "transcribe", "merge", "write", "done"];

/**
 * Defaults for every field; undefined overrides are ignored
 */
export function createPipelineConfig(overrides: Partial<PipelineConfig> = {}): PipelineConfig {
  const chunksDir = overrides.chunksDir ?? "audio_chunks";
  return {
    chunkDuration: overrides.chunkDuration ?? 1200,
    overlap: overrides.overlap ?? 10,
    chunksDir,
    checkpointDir: overrides.checkpointDir ?? chunksDir,
    chunkPrompt: overrides.chunkPrompt ?? buildChunkPrompt(),
    mergePrompt: overrides.mergePrompt ?? DEFAULT_MERGE_PROMPT,
    chunkGeneration: overrides.chunkGeneration ?? DEFAULT_CHUNK_GENERATION,
    mergeGeneration: overrides.mergeGeneration ?? DEFAULT_MERGE_GENERATION,
    concurrency: overrides.concurrency ?? 1,
    reuseUploads: overrides.reuseUploads ?? true,
    pollIntervalMs: overrides.pollIntervalMs ?? 3000,
    fileReadyTimeoutMs: overrides.fileReadyTimeoutMs ?? 900_000,
  };
}

export interface PipelineDeps {
  service: TranscriptionService;
  audio: AudioTool;
  /** Defaults to a store rooted at config.checkpointDir */
  store?: CheckpointStore;
}

/**
 * split -> transcribe (or resume) each chunk -> merge -> write
 */
export class TranscriptionPipeline {
  readonly config: PipelineConfig;
  readonly store: CheckpointStore;
  private readonly service: TranscriptionService;
  private readonly audio: AudioTool;
  private currentStage: PipelineStage = "start";

  constructor(config: PipelineConfig, deps: PipelineDeps) {
    // Everything that can be rejected up front is, before any file or network access
    validateChunkSettings(config.chunkDuration, config.overlap);
    validateMergeTemplate(config.mergePrompt);
    if (!Number.isInteger(config.concurrency) || config.concurrency < 1) {
      throw new ConfigurationError(`Concurrency must be a positive integer (got ${config.concurrency})`);
    }

    this.config = config;
    this.service = deps.service;
    this.audio = deps.audio;
    this.store = deps.store ?? new CheckpointStore(config.checkpointDir);
  }

  get stage(): PipelineStage {
    return this.currentStage;
  }

  private advance(next: PipelineStage) {
    const from = STAGE_ORDER.indexOf(this.currentStage);
    const to = STAGE_ORDER.indexOf(next);
    if (from < 0 || to <= from) {
      throw new TranscribeError(`Invalid pipeline transition ${this.currentStage} -> ${next}`);
    }
    debug("run.stage", { from: this.currentStage, to: next });
    this.currentStage = next;
  }

  async run(opts: RunOptions): Promise<RunResult> {
    if (!["start", "done", "failed"].includes(this.currentStage)) {
      throw new TranscribeError(`Pipeline is already running (stage: ${this.currentStage})`);
    }
    this.currentStage = "start";
    const { signal } = opts;
    const timer = startStep("run", { audioFile: opts.audioFile, outputFile: opts.outputFile });

    try {
      if (!(await fs.pathExists(opts.audioFile))) {
        throw new ConfigurationError(`Audio file not found: ${opts.audioFile}`);
      }
      // Reject formats the service cannot take before slicing anything
      mimeTypeFor(opts.audioFile);

      this.advance("split");
      const chunks = await splitAudio(opts.audioFile, this.audio, {
        chunkDuration: this.config.chunkDuration,
        overlap: this.config.overlap,
        chunksDir: this.config.chunksDir,
        signal,
      });

      this.advance("transcribe");
      const { transcripts, resumed, transcribed } = await transcribeChunks(chunks, this.service, this.store, {
        prompt: this.config.chunkPrompt,
        generation: this.config.chunkGeneration,
        reuseUploads: this.config.reuseUploads,
        pollIntervalMs: this.config.pollIntervalMs,
        fileReadyTimeoutMs: this.config.fileReadyTimeoutMs,
        concurrency: this.config.concurrency,
        signal,
      });

      this.advance("merge");
      assertCompleteTranscripts(transcripts, chunks.length);
      signal?.throwIfAborted();
      const merged = await mergeTranscripts(
        transcripts,
        this.service,
        this.config.mergePrompt,
        this.config.mergeGeneration,
        signal
      );

      this.advance("write");
      const outputFile = await writeTranscript(opts.outputFile, merged, opts.header);

      this.advance("done");
      timer.end();
      info("run.complete", {
        outputFile,
        chunks: chunks.length,
        resumed,
        transcribed,
        chars: merged.length,
      });
      return {
        outputFile,
        transcript: merged,
        chunkCount: chunks.length,
        resumedChunks: resumed,
        transcribedChunks: transcribed,
      };
    } catch (e) {
      debug("run.fail", { stage: this.currentStage, error: e instanceof Error ? e.message : String(e) });
      this.currentStage = "failed";
      throw e;
    }
  }
}
