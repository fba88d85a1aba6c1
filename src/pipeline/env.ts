import * as dotenv from 'dotenv';
dotenv.config();

function num(value: string | undefined, fallback: number): number {
    if (value === undefined || value.trim() === '') return fallback;
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : fallback;
}

export const ENV = {
    // Falls back to the --api-key flag; the client refuses to start without one
    geminiApiKey: process.env.GEMINI_API_KEY || '',
    geminiModel: process.env.GEMINI_MODEL || 'gemini-3-pro-preview',
    geminiBaseUrl: process.env.GEMINI_BASE_URL || 'https://generativelanguage.googleapis.com',
    chunkSec: num(process.env.CHUNK_SEC, 1200),
    overlapSec: num(process.env.OVERLAP_SEC, 10),
    chunksDir: process.env.CHUNKS_DIR || 'audio_chunks',
    // Parallel chunk transcriptions. 1 keeps the run strictly sequential.
    transcribeConcurrency: num(process.env.TRANSCRIBE_CONCURRENCY, 1),
    // Opt-in retries for transient remote failures (429/5xx/network). 0 disables.
    geminiMaxRetries: num(process.env.GEMINI_MAX_RETRIES, 0),
    filePollIntervalMs: num(process.env.FILE_POLL_INTERVAL_MS, 3000),
    // Max wait for an uploaded file to become ACTIVE. 0 disables the bound.
    fileReadyTimeoutSec: num(process.env.FILE_READY_TIMEOUT_SEC, 900),
    // Optional: override ffmpeg / ffprobe binary name/path
    ffmpegBin: process.env.FFMPEG_BIN || 'ffmpeg',
    ffprobeBin: process.env.FFPROBE_BIN || 'ffprobe',
};
