import type { GenerationSettings, TranscriptionService } from '../client/types';
import { ConfigurationError, TranscribeError } from '../errors';
import { MERGE_PLACEHOLDER } from './prompts';
import { ChunkTranscript } from './types';
import { info, startStep } from './log';

export const CHUNK_SEPARATOR = '\n\n---\n\n';

export function validateMergeTemplate(template: string): void {
  const count = template.split(MERGE_PLACEHOLDER).length - 1;
  if (count === 0) {
    throw new ConfigurationError(`Merge prompt must contain the ${MERGE_PLACEHOLDER} placeholder`);
  }
  if (count > 1) {
    throw new ConfigurationError(
      `Merge prompt must contain exactly one ${MERGE_PLACEHOLDER} placeholder (found ${count})`
    );
  }
}

/**
 * `[Chunk N]` blocks in index order, separated by horizontal rules
 */
export function buildMergeInput(transcripts: ChunkTranscript[]): string {
  return [...transcripts]
    .sort((a, b) => a.chunkIndex - b.chunkIndex)
    .map((t) => `[Chunk ${t.chunkIndex}]\n\n${t.text}`)
    .join(CHUNK_SEPARATOR);
}

export function renderMergePrompt(template: string, combined: string): string {
  validateMergeTemplate(template);
  // Function replacer: transcript text may contain `$&` and friends
  return template.replace(MERGE_PLACEHOLDER, () => combined);
}

/**
 * Merge needs exactly the indices 1..expected, once each
 */
export function assertCompleteTranscripts(transcripts: ChunkTranscript[], expected: number): void {
  const seen = new Set(transcripts.map((t) => t.chunkIndex));
  const missing: number[] = [];
  for (let i = 1; i <= expected; i++) {
    if (!seen.has(i)) missing.push(i);
  }
  if (missing.length > 0 || seen.size !== transcripts.length || transcripts.length !== expected) {
    throw new TranscribeError(
      `Cannot merge: expected chunk transcripts 1..${expected}, got [${transcripts
        .map((t) => t.chunkIndex)
        .join(', ')}]` + (missing.length ? ` (missing ${missing.join(', ')})` : '')
    );
  }
}

export async function mergeTranscripts(
  transcripts: ChunkTranscript[],
  service: TranscriptionService,
  template: string,
  settings: GenerationSettings,
  signal?: AbortSignal
): Promise<string> {
  const combined = buildMergeInput(transcripts);
  const prompt = renderMergePrompt(template, combined);
  const timer = startStep('merge', { chunks: transcripts.length, chars: combined.length });
  const merged = await service.generate(prompt, { ...settings, signal });
  timer.end();
  info('merge.done', { chars: merged.length });
  return merged;
}
