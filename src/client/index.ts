/**
 * Gemini client used by the transcription pipeline
 */

export { GeminiClient, DEFAULT_BASE_URL, DEFAULT_MODEL, extractText, parseRemoteFile, pickLatest } from './gemini';

export type * from './types';
export * from './retry';
