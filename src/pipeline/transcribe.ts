import crypto from 'crypto';
import fs from 'fs-extra';
import path from 'path';
import type { GenerationSettings, TranscriptionService } from '../client/types';
import { CheckpointStore } from './checkpoint';
import { mimeTypeFor } from './chunk';
import { ChunkDescriptor, ChunkTranscript } from './types';
import { info, warn, startStep } from './log';

export interface TranscribeOptions {
    prompt: string;
    generation: GenerationSettings;
    reuseUploads: boolean;
    pollIntervalMs: number;
    fileReadyTimeoutMs: number;
    /** Chunks in flight at once (default 1) */
    concurrency?: number;
    signal?: AbortSignal;
}

export interface TranscribeChunksResult {
    /** Ordered by chunk index */
    transcripts: ChunkTranscript[];
    resumed: number;
    transcribed: number;
}

/**
 * Display name for an upload: chunk stem plus a content hash, so reuse only
 * ever matches byte-identical audio.
 */
export async function uploadDisplayName(filePath: string): Promise<string> {
    const hash = crypto
        .createHash('sha256')
        .update(await fs.readFile(filePath))
        .digest('hex')
        .slice(0, 12);
    return `${path.basename(filePath, path.extname(filePath))}-${hash}`;
}

/**
 * upload -> wait for ACTIVE -> generate
 */
export async function transcribeChunk(
    chunk: ChunkDescriptor,
    service: TranscriptionService,
    opts: TranscribeOptions
): Promise<string> {
    const mimeType = mimeTypeFor(chunk.filePath);
    const displayName = await uploadDisplayName(chunk.filePath);
    const uploaded = await service.uploadFile(chunk.filePath, {
        displayName,
        mimeType,
        reuseExisting: opts.reuseUploads,
        signal: opts.signal,
    });
    const ready = await service.waitForFile(uploaded, {
        pollIntervalMs: opts.pollIntervalMs,
        timeoutMs: opts.fileReadyTimeoutMs,
        signal: opts.signal,
    });
    info('transcribe.chunk.generate', { idx: chunk.index, file: ready.name });
    return service.generate(opts.prompt, {
        ...opts.generation,
        file: { uri: ready.uri, mimeType: ready.mimeType ?? mimeType },
        signal: opts.signal,
    });
}

/**
 * Transcribe every chunk, loading checkpoints instead of calling the service
 * where one exists. The first failure stops new work; chunks already in
 * flight finish and keep their checkpoints, then the failure is rethrown.
 */
export async function transcribeChunks(
    chunks: ChunkDescriptor[],
    service: TranscriptionService,
    store: CheckpointStore,
    opts: TranscribeOptions
): Promise<TranscribeChunksResult> {
    const total = chunks.length;
    const concurrency = Math.max(1, Math.floor(opts.concurrency ?? 1));
    const results = new Map<number, ChunkTranscript>();
    let resumed = 0;
    let transcribed = 0;
    let processed = 0;

    const runTimer = startStep('transcribe.chunks', { total, concurrency });

    async function runOne(chunk: ChunkDescriptor) {
        let text: string;
        if (await store.has(chunk.index)) {
            text = await store.load(chunk.index);
            info('transcribe.chunk.resume', {
                idx: chunk.index,
                total,
                path: store.pathFor(chunk.index),
                chars: text.length,
            });
            resumed += 1;
        } else {
            info('transcribe.chunk.start', {
                idx: chunk.index,
                total,
                startMin: Math.round(chunk.start / 60),
                endMin: Math.round(chunk.end / 60),
            });
            text = await transcribeChunk(chunk, service, opts);
            const saved = await store.save(chunk.index, text);
            info('transcribe.chunk.done', { idx: chunk.index, chars: text.length, path: saved });
            transcribed += 1;
        }
        results.set(chunk.index, { chunkIndex: chunk.index, text });
        processed += 1;
        runTimer.eta(processed, total);
    }

    const queue = [...chunks];
    // Every failure is logged; the first one is rethrown
    const failures: unknown[] = [];

    async function worker() {
        while (failures.length === 0) {
            const chunk = queue.shift();
            if (!chunk) return;
            try {
                opts.signal?.throwIfAborted();
                await runOne(chunk);
            } catch (e) {
                failures.push(e);
                warn('transcribe.chunk.fail', {
                    idx: chunk.index,
                    error: e instanceof Error ? e.message : String(e),
                });
                return;
            }
        }
    }

    await Promise.all(Array.from({ length: Math.min(concurrency, total) }, () => worker()));
    runTimer.end();
    if (failures.length > 0) {
        throw failures[0];
    }

    const transcripts = [...results.values()].sort((a, b) => a.chunkIndex - b.chunkIndex);
    return { transcripts, resumed, transcribed };
}
