import { execa } from 'execa';
import fs from 'fs-extra';
import path from 'path';
import { ConfigurationError, ExternalToolError } from '../errors';
import { ENV } from './env';
import { ChunkDescriptor } from './types';
import { info, startStep } from './log';

/**
 * Probes and slices audio files. ffmpeg in production, a fake in tests.
 */
export interface AudioTool {
    probeDuration(filePath: string, signal?: AbortSignal): Promise<number>;
    extractSegment(
        source: string,
        target: string,
        start: number,
        duration: number,
        signal?: AbortSignal
    ): Promise<void>;
}

export interface FfmpegBinaries {
    ffmpeg: string;
    ffprobe: string;
}

function stderrTail(stderr: string): string {
    return stderr.trim().slice(-800);
}

/** stderr tail, or execa's summary when the process never wrote any (e.g. ENOENT on spawn) */
function failureDetail(result: { stderr: string }): string {
    const tail = stderrTail(result.stderr);
    if (tail) return tail;
    if ('shortMessage' in result && typeof result.shortMessage === 'string' && result.shortMessage) {
        return result.shortMessage;
    }
    return 'no output';
}

export class FfmpegAudioTool implements AudioTool {
    constructor(
        private readonly bins: FfmpegBinaries = { ffmpeg: ENV.ffmpegBin, ffprobe: ENV.ffprobeBin }
    ) {}

    async probeDuration(filePath: string, signal?: AbortSignal): Promise<number> {
        const probe = await execa(
            this.bins.ffprobe,
            [
                '-v',
                'error',
                '-show_entries',
                'format=duration',
                '-of',
                'default=noprint_wrappers=1:nokey=1',
                filePath,
            ],
            { reject: false, signal }
        );
        signal?.throwIfAborted();
        if (probe.failed) {
            throw new ExternalToolError(
                `ffprobe failed for ${filePath}: ${failureDetail(probe)}`,
                probe.command,
                probe.exitCode,
                probe.stderr
            );
        }
        const parsed = parseFloat(probe.stdout);
        if (!Number.isFinite(parsed)) {
            throw new ExternalToolError(
                `ffprobe could not determine duration for ${filePath}. Raw output: ${probe.stdout}`,
                probe.command,
                probe.exitCode,
                probe.stderr
            );
        }
        return parsed;
    }

    async extractSegment(
        source: string,
        target: string,
        start: number,
        duration: number,
        signal?: AbortSignal
    ): Promise<void> {
        // -ss after -i for accurate seeking; stream copy, no re-encode
        const res = await execa(
            this.bins.ffmpeg,
            [
                '-y',
                '-loglevel',
                'error',
                '-hide_banner',
                '-nostdin',
                '-i',
                source,
                '-ss',
                String(start),
                '-t',
                String(duration),
                '-vn',
                '-acodec',
                'copy',
                target,
            ],
            { reject: false, signal }
        );
        signal?.throwIfAborted();
        if (res.failed) {
            throw new ExternalToolError(
                `ffmpeg failed while extracting start=${start} dur=${duration} from ${source}: ${failureDetail(res)}`,
                res.command,
                res.exitCode,
                res.stderr
            );
        }
    }
}

const MIME_TYPES = new Map<string, string>([
    ['.wav', 'audio/wav'],
    ['.mp3', 'audio/mpeg'],
    ['.m4a', 'audio/mp4'],
    ['.aac', 'audio/aac'],
    ['.flac', 'audio/flac'],
    ['.ogg', 'audio/ogg'],
    ['.oga', 'audio/ogg'],
    ['.opus', 'audio/ogg'],
    ['.aiff', 'audio/aiff'],
    ['.aif', 'audio/aiff'],
    ['.webm', 'audio/webm'],
]);

export function mimeTypeFor(filePath: string): string {
    const ext = path.extname(filePath).toLowerCase();
    const mime = MIME_TYPES.get(ext);
    if (!mime) {
        throw new ConfigurationError(
            `Unsupported audio format "${ext || path.basename(filePath)}". ` +
                `Supported: ${[...MIME_TYPES.keys()].join(', ')}`
        );
    }
    return mime;
}

export function padIndex(index: number): string {
    return String(index).padStart(2, '0');
}

export function chunkFilePath(chunksDir: string, index: number, extension: string): string {
    return path.join(chunksDir, `chunk_${padIndex(index)}${extension}`);
}

/**
 * Reject chunk/overlap combinations that would stall or regress the window
 */
export function validateChunkSettings(chunkDuration: number, overlap: number): void {
    if (!Number.isFinite(chunkDuration) || chunkDuration <= 0) {
        throw new ConfigurationError(`Chunk duration must be a positive number of seconds (got ${chunkDuration})`);
    }
    if (!Number.isFinite(overlap) || overlap < 0) {
        throw new ConfigurationError(`Overlap must be zero or a positive number of seconds (got ${overlap})`);
    }
    if (overlap >= chunkDuration) {
        throw new ConfigurationError(
            `Overlap (${overlap}s) must be smaller than the chunk duration (${chunkDuration}s)`
        );
    }
}

export interface PlanOptions {
    totalDuration: number;
    chunkDuration: number;
    overlap: number;
    chunksDir: string;
    /** Extension of the chunk files, including the dot */
    extension: string;
}

/**
 * Compute chunk windows. Pure: no files are touched.
 */
export function planChunks(opts: PlanOptions): ChunkDescriptor[] {
    const { totalDuration, chunkDuration, overlap } = opts;
    validateChunkSettings(chunkDuration, overlap);
    if (!Number.isFinite(totalDuration) || totalDuration <= 0) {
        throw new ConfigurationError(`Audio duration must be positive (got ${totalDuration})`);
    }

    const chunks: ChunkDescriptor[] = [];
    let start = 0;
    let index = 1;
    while (true) {
        const end = Math.min(start + chunkDuration, totalDuration);
        chunks.push({
            index,
            start,
            end,
            filePath: chunkFilePath(opts.chunksDir, index, opts.extension),
        });
        // The chunk reaching the end is the last one; >= avoids a zero-length tail
        if (end >= totalDuration) {
            break;
        }
        // Advance with overlap for the next window
        start = end - overlap;
        index += 1;
    }
    return chunks;
}

function partialPath(filePath: string): string {
    const ext = path.extname(filePath);
    const base = ext ? filePath.slice(0, -ext.length) : filePath;
    return `${base}.part${ext}`;
}

/**
 * Slice one chunk into place. The final name only ever holds a complete file.
 */
export async function materializeChunk(
    chunk: ChunkDescriptor,
    source: string,
    tool: AudioTool,
    signal?: AbortSignal
): Promise<string> {
    const partial = partialPath(chunk.filePath);
    await fs.remove(partial);
    try {
        await tool.extractSegment(source, partial, chunk.start, chunk.end - chunk.start, signal);
        const stat = await fs.stat(partial);
        if (stat.size === 0) {
            throw new ExternalToolError(
                `Created empty chunk ${chunk.index} at ${partial}. The source had no audio in [${chunk.start}, ${chunk.end}).`,
                'ffmpeg'
            );
        }
        await fs.move(partial, chunk.filePath, { overwrite: true });
    } catch (e) {
        await fs.remove(partial);
        throw e;
    }
    return chunk.filePath;
}

export interface SplitOptions {
    chunkDuration: number;
    overlap: number;
    chunksDir: string;
    signal?: AbortSignal;
}

/**
 * Probe, plan and materialize every chunk up front (fail-fast)
 */
export async function splitAudio(
    audioPath: string,
    tool: AudioTool,
    opts: SplitOptions
): Promise<ChunkDescriptor[]> {
    validateChunkSettings(opts.chunkDuration, opts.overlap);

    const durationSec = await tool.probeDuration(audioPath, opts.signal);
    info('chunk.probe', { audioPath, durationSec, minutes: Number((durationSec / 60).toFixed(1)) });

    const chunks = planChunks({
        totalDuration: durationSec,
        chunkDuration: opts.chunkDuration,
        overlap: opts.overlap,
        chunksDir: opts.chunksDir,
        extension: path.extname(audioPath).toLowerCase(),
    });

    await fs.ensureDir(opts.chunksDir);
    const timer = startStep('chunk.split', {
        durationSec,
        chunkSec: opts.chunkDuration,
        overlapSec: opts.overlap,
        count: chunks.length,
    });
    for (const chunk of chunks) {
        opts.signal?.throwIfAborted();
        await materializeChunk(chunk, audioPath, tool, opts.signal);
        info('chunk.created', {
            idx: chunk.index,
            startMin: Number((chunk.start / 60).toFixed(1)),
            endMin: Number((chunk.end / 60).toFixed(1)),
            path: chunk.filePath,
        });
        timer.eta(chunk.index, chunks.length);
    }
    timer.end();
    info('chunk.complete', { count: chunks.length, durationSec });
    return chunks;
}

const CHUNK_FILE_PATTERN = /^chunk_\d+(\.part)?\.[A-Za-z0-9]+$/;

/**
 * Delete chunk audio (including leftover partials); returns the removed names
 */
export async function removeChunkFiles(chunksDir: string): Promise<string[]> {
    if (!(await fs.pathExists(chunksDir))) return [];
    const removed: string[] = [];
    for (const name of (await fs.readdir(chunksDir)).sort()) {
        if (!CHUNK_FILE_PATTERN.test(name)) continue;
        await fs.remove(path.join(chunksDir, name));
        removed.push(name);
    }
    return removed;
}
