import fs from 'fs-extra';
import path from 'path';
import { ConfigurationError } from '../errors';

export const MERGE_PLACEHOLDER = '{transcript}';
export const DEFAULT_INSTRUCTIONS_FILE = 'transcription_instructions.md';

const GENERIC_SPEAKERS = '**Speaker 1:** and **Speaker 2:** (or use actual names if identifiable)';

/**
 * Bold labels for two or more named speakers, otherwise a generic pair
 */
export function formatSpeakerLabels(speakers?: readonly string[]): string {
  const names = (speakers ?? []).map((s) => s.trim()).filter(Boolean);
  if (names.length < 2) {
    return GENERIC_SPEAKERS;
  }
  return names.map((name) => `**${name}:**`).join(', ');
}

export function parseSpeakers(value?: string): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

export interface ChunkPromptOptions {
  speakers?: readonly string[];
  /** Appended verbatim under an ADDITIONAL INSTRUCTIONS heading */
  instructions?: string;
}

export function buildChunkPrompt(opts: ChunkPromptOptions = {}): string {
  const prompt = `Please transcribe this audio interview/conversation segment.

FORMAT:
- Speaker names in bold: ${formatSpeakerLabels(opts.speakers)}
- Use proper paragraphing for longer responses

CLEANING INSTRUCTIONS:
1. Remove filler words: "um", "uh", "like", "you know", "sort of", "kind of" (when used as fillers)
2. Remove pure backchanneling: "right", "yeah", "uh-huh", "mm-hmm", "okay", "sure", "interesting" when they're just acknowledgments (not substantive responses)
3. Keep "right" or "yeah" only when part of making a substantive point
4. Clean up false starts, stutters, and repetitions for readability
5. Preserve all intellectual content and nuance
6. Keep substantive questions and responses only

Provide the complete transcript for this segment.`;

  if (!opts.instructions || !opts.instructions.trim()) {
    return prompt;
  }
  return `${prompt}\n\nADDITIONAL INSTRUCTIONS:\n${opts.instructions}`;
}

export const DEFAULT_MERGE_PROMPT = `Below is a transcript assembled from multiple audio chunks. Please:

1. Clean up any duplicate text at chunk boundaries (there was overlap between chunks)
2. Add section headers (## Header) every 15-20 minutes of conversation
   - Section headers should be 5-6 words capturing that section's main topic
   - Example: "## Discussion of Main Research Goals" or "## Addressing Common Misconceptions"
3. Ensure consistent formatting throughout
4. Fix any obvious transcription errors you can identify from context
5. Maintain speaker labels in bold format

Here is the raw transcript to clean up:

---

${MERGE_PLACEHOLDER}

---

Please output the cleaned, formatted transcript with section headers.`;

export interface InstructionsFile {
  path: string;
  text: string;
}

/**
 * Resolve custom instructions: an explicit path must exist; otherwise
 * transcription_instructions.md in cwd is used when present.
 */
export async function readInstructions(
  explicitPath?: string,
  cwd: string = process.cwd()
): Promise<InstructionsFile | null> {
  if (explicitPath) {
    const resolved = path.resolve(cwd, explicitPath);
    if (!(await fs.pathExists(resolved))) {
      throw new ConfigurationError(`Instructions file not found: ${explicitPath}`);
    }
    return { path: resolved, text: await fs.readFile(resolved, 'utf8') };
  }

  const fallback = path.join(cwd, DEFAULT_INSTRUCTIONS_FILE);
  if (await fs.pathExists(fallback)) {
    return { path: fallback, text: await fs.readFile(fallback, 'utf8') };
  }
  return null;
}

export async function readMergePrompt(filePath: string, cwd: string = process.cwd()): Promise<string> {
  const resolved = path.resolve(cwd, filePath);
  if (!(await fs.pathExists(resolved))) {
    throw new ConfigurationError(`Merge prompt file not found: ${filePath}`);
  }
  return fs.readFile(resolved, 'utf8');
}
