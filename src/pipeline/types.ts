import type { GenerationSettings } from '../client/types';

export interface ChunkDescriptor {
  /** 1-based, contiguous */
  readonly index: number;
  /** Seconds from the start of the source */
  readonly start: number;
  readonly end: number;
  readonly filePath: string;
}

export interface ChunkTranscript {
  chunkIndex: number;
  text: string;
}

export type PipelineStage = 'start' | 'split' | 'transcribe' | 'merge' | 'write' | 'done' | 'failed';

export interface PipelineConfig {
  chunkDuration: number;
  overlap: number;
  chunksDir: string;
  checkpointDir: string;
  chunkPrompt: string;
  /** Must contain exactly one `{transcript}` placeholder */
  mergePrompt: string;
  chunkGeneration: GenerationSettings;
  mergeGeneration: GenerationSettings;
  /** Chunks transcribed in parallel */
  concurrency: number;
  reuseUploads: boolean;
  pollIntervalMs: number;
  /** Max wait for an upload to become ACTIVE; 0 waits forever */
  fileReadyTimeoutMs: number;
}

export interface RunOptions {
  audioFile: string;
  outputFile: string;
  header?: string;
  signal?: AbortSignal;
}

export interface RunResult {
  outputFile: string;
  transcript: string;
  chunkCount: number;
  resumedChunks: number;
  transcribedChunks: number;
}
