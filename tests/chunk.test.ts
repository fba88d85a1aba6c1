import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import {
  AudioTool,
  FfmpegAudioTool,
  chunkFilePath,
  materializeChunk,
  mimeTypeFor,
  planChunks,
  removeChunkFiles,
  splitAudio,
  validateChunkSettings,
} from '../src/pipeline/chunk';
import { ConfigurationError, ExternalToolError } from '../src/errors';

const execaMock = vi.hoisted(() => vi.fn());
vi.mock('execa', () => ({ execa: execaMock }));

/** Writes a small marker file for every extracted segment */
class FakeAudioTool implements AudioTool {
  readonly extracted: Array<{ target: string; start: number; duration: number }> = [];

  constructor(private readonly duration: number, private readonly emptyAt?: number) {}

  async probeDuration(): Promise<number> {
    return this.duration;
  }

  async extractSegment(_source: string, target: string, start: number, duration: number): Promise<void> {
    this.extracted.push({ target, start, duration });
    await fs.writeFile(target, start === this.emptyAt ? '' : `audio ${start}-${start + duration}`);
  }
}

function windows(chunks: Array<{ start: number; end: number }>) {
  return chunks.map((c) => [c.start, c.end]);
}

describe('chunk', () => {
  let tmp: string;

  beforeEach(async () => {
    tmp = await fs.mkdtemp(path.join(os.tmpdir(), 'chunk-test-'));
    execaMock.mockReset();
  });

  afterEach(async () => {
    await fs.remove(tmp);
  });

  describe('planChunks', () => {
    const base = { chunksDir: 'audio_chunks', extension: '.mp3' };

    it('should overlap consecutive windows', () => {
      const chunks = planChunks({ ...base, totalDuration: 2500, chunkDuration: 1200, overlap: 10 });
      expect(windows(chunks)).toEqual([
        [0, 1200],
        [1190, 2390],
        [2380, 2500],
      ]);
      expect(chunks.map((c) => c.index)).toEqual([1, 2, 3]);
      expect(chunks[1].filePath).toBe(path.join('audio_chunks', 'chunk_02.mp3'));
    });

    it('should produce a single chunk for short audio', () => {
      expect(windows(planChunks({ ...base, totalDuration: 900, chunkDuration: 1200, overlap: 10 }))).toEqual([
        [0, 900],
      ]);
    });

    it('should not emit an empty tail when the duration is an exact multiple', () => {
      expect(windows(planChunks({ ...base, totalDuration: 1200, chunkDuration: 1200, overlap: 0 }))).toEqual([
        [0, 1200],
      ]);
      expect(windows(planChunks({ ...base, totalDuration: 2400, chunkDuration: 1200, overlap: 0 }))).toEqual([
        [0, 1200],
        [1200, 2400],
      ]);
    });

    it('should cover the whole recording with the configured overlap', () => {
      const totalDuration = 7777.5;
      const chunks = planChunks({ ...base, totalDuration, chunkDuration: 600, overlap: 15 });
      expect(chunks[0].start).toBe(0);
      expect(chunks[chunks.length - 1].end).toBe(totalDuration);
      for (let i = 1; i < chunks.length; i++) {
        expect(chunks[i].start).toBe(chunks[i - 1].end - 15);
        expect(chunks[i].end).toBeGreaterThan(chunks[i].start);
        expect(chunks[i].end - chunks[i].start).toBeLessThanOrEqual(600);
      }
    });

    it('should reject a non-positive duration', () => {
      expect(() => planChunks({ ...base, totalDuration: 0, chunkDuration: 1200, overlap: 10 })).toThrow(
        ConfigurationError
      );
    });
  });

  describe('validateChunkSettings', () => {
    it('should accept overlap smaller than the chunk', () => {
      expect(() => validateChunkSettings(1200, 10)).not.toThrow();
      expect(() => validateChunkSettings(30, 0)).not.toThrow();
    });

    it('should reject invalid combinations', () => {
      expect(() => validateChunkSettings(0, 0)).toThrow(ConfigurationError);
      expect(() => validateChunkSettings(-5, 0)).toThrow(ConfigurationError);
      expect(() => validateChunkSettings(60, -1)).toThrow(ConfigurationError);
      expect(() => validateChunkSettings(60, 60)).toThrow('Overlap (60s) must be smaller than the chunk duration (60s)');
      expect(() => validateChunkSettings(Number.NaN, 0)).toThrow(ConfigurationError);
    });
  });

  describe('mimeTypeFor', () => {
    it('should map known extensions case-insensitively', () => {
      expect(mimeTypeFor('talk.mp3')).toBe('audio/mpeg');
      expect(mimeTypeFor('talk.M4A')).toBe('audio/mp4');
      expect(mimeTypeFor('/x/y/talk.wav')).toBe('audio/wav');
      expect(mimeTypeFor('talk.flac')).toBe('audio/flac');
    });

    it('should reject unsupported formats', () => {
      expect(() => mimeTypeFor('notes.txt')).toThrow(ConfigurationError);
      expect(() => mimeTypeFor('noext')).toThrow(ConfigurationError);
    });
  });

  it('should name chunk files with a two-digit index', () => {
    expect(chunkFilePath('d', 3, '.wav')).toBe(path.join('d', 'chunk_03.wav'));
    expect(chunkFilePath('d', 120, '.wav')).toBe(path.join('d', 'chunk_120.wav'));
  });

  describe('splitAudio', () => {
    it('should materialize every planned chunk', async () => {
      const chunksDir = path.join(tmp, 'chunks');
      const tool = new FakeAudioTool(2500);
      const chunks = await splitAudio(path.join(tmp, 'Talk.MP3'), tool, { chunkDuration: 1200, overlap: 10, chunksDir });

      expect(chunks.map((c) => path.basename(c.filePath))).toEqual(['chunk_01.mp3', 'chunk_02.mp3', 'chunk_03.mp3']);
      expect(tool.extracted.map((e) => [e.start, e.duration])).toEqual([
        [0, 1200],
        [1190, 1200],
        [2380, 120],
      ]);
      expect(await fs.readFile(chunks[2].filePath, 'utf8')).toBe('audio 2380-2500');
      expect((await fs.readdir(chunksDir)).sort()).toEqual(['chunk_01.mp3', 'chunk_02.mp3', 'chunk_03.mp3']);
    });

    it('should reject bad settings before probing', async () => {
      const tool = new FakeAudioTool(100);
      const probe = vi.spyOn(tool, 'probeDuration');
      await expect(
        splitAudio('a.wav', tool, { chunkDuration: 10, overlap: 10, chunksDir: path.join(tmp, 'c') })
      ).rejects.toThrow(ConfigurationError);
      expect(probe).not.toHaveBeenCalled();
      expect(await fs.pathExists(path.join(tmp, 'c'))).toBe(false);
    });
  });

  describe('materializeChunk', () => {
    it('should reject an empty extraction and leave nothing behind', async () => {
      const chunk = { index: 1, start: 0, end: 5, filePath: path.join(tmp, 'chunk_01.wav') };
      await expect(materializeChunk(chunk, 'src.wav', new FakeAudioTool(5, 0))).rejects.toThrow(ExternalToolError);
      expect(await fs.readdir(tmp)).toEqual([]);
    });

    it('should replace a stale chunk file', async () => {
      const chunk = { index: 1, start: 0, end: 5, filePath: path.join(tmp, 'chunk_01.wav') };
      await fs.writeFile(chunk.filePath, 'stale');
      await materializeChunk(chunk, 'src.wav', new FakeAudioTool(5));
      expect(await fs.readFile(chunk.filePath, 'utf8')).toBe('audio 0-5');
      expect(await fs.readdir(tmp)).toEqual(['chunk_01.wav']);
    });
  });

  describe('removeChunkFiles', () => {
    it('should delete chunk audio and partials only', async () => {
      for (const name of ['chunk_01.mp3', 'chunk_02.part.mp3', 'transcript_chunk_01.md', 'notes.txt']) {
        await fs.writeFile(path.join(tmp, name), 'x');
      }
      expect(await removeChunkFiles(tmp)).toEqual(['chunk_01.mp3', 'chunk_02.part.mp3']);
      expect((await fs.readdir(tmp)).sort()).toEqual(['notes.txt', 'transcript_chunk_01.md']);
    });

    it('should return nothing for a missing directory', async () => {
      expect(await removeChunkFiles(path.join(tmp, 'missing'))).toEqual([]);
    });
  });

  describe('FfmpegAudioTool', () => {
    const tool = new FfmpegAudioTool({ ffmpeg: 'ffmpeg-test', ffprobe: 'ffprobe-test' });

    it('should parse the probed duration', async () => {
      execaMock.mockResolvedValue({ failed: false, exitCode: 0, stdout: '2500.25\n', stderr: '', command: 'ffprobe-test' });
      await expect(tool.probeDuration('talk.wav')).resolves.toBe(2500.25);
      expect(execaMock).toHaveBeenCalledWith(
        'ffprobe-test',
        ['-v', 'error', '-show_entries', 'format=duration', '-of', 'default=noprint_wrappers=1:nokey=1', 'talk.wav'],
        { reject: false, signal: undefined }
      );
    });

    it('should fail on unparseable probe output', async () => {
      execaMock.mockResolvedValue({ failed: false, exitCode: 0, stdout: 'N/A', stderr: '', command: 'ffprobe-test' });
      await expect(tool.probeDuration('talk.wav')).rejects.toThrow(
        'ffprobe could not determine duration for talk.wav. Raw output: N/A'
      );
    });

    it('should surface stderr when ffprobe fails', async () => {
      execaMock.mockResolvedValue({
        failed: true,
        exitCode: 1,
        stdout: '',
        stderr: 'talk.wav: No such file or directory\n',
        command: 'ffprobe-test talk.wav',
      });
      const error = await tool.probeDuration('talk.wav').catch((e: unknown) => e);
      expect(error).toBeInstanceOf(ExternalToolError);
      if (error instanceof ExternalToolError) {
        expect(error.message).toBe('ffprobe failed for talk.wav: talk.wav: No such file or directory');
        expect(error.exitCode).toBe(1);
        expect(error.command).toBe('ffprobe-test talk.wav');
      }
    });

    it('should report the spawn error when the binary is missing', async () => {
      execaMock.mockResolvedValue({
        failed: true,
        exitCode: undefined,
        stdout: '',
        stderr: '',
        command: 'ffprobe-test talk.wav',
        shortMessage: 'Command failed with ENOENT: ffprobe-test talk.wav',
      });
      await expect(tool.probeDuration('talk.wav')).rejects.toThrow(
        'ffprobe failed for talk.wav: Command failed with ENOENT: ffprobe-test talk.wav'
      );
    });

    it('should stream-copy the requested window', async () => {
      execaMock.mockResolvedValue({ failed: false, exitCode: 0, stdout: '', stderr: '', command: 'ffmpeg-test' });
      await tool.extractSegment('in.mp3', 'out.mp3', 1190, 1200);
      expect(execaMock).toHaveBeenCalledWith(
        'ffmpeg-test',
        [
          '-y',
          '-loglevel',
          'error',
          '-hide_banner',
          '-nostdin',
          '-i',
          'in.mp3',
          '-ss',
          '1190',
          '-t',
          '1200',
          '-vn',
          '-acodec',
          'copy',
          'out.mp3',
        ],
        { reject: false, signal: undefined }
      );
    });

    it('should fall back to execa\'s summary when ffmpeg cannot start', async () => {
      execaMock.mockResolvedValue({
        failed: true,
        exitCode: undefined,
        stdout: '',
        stderr: '',
        command: 'ffmpeg-test',
        shortMessage: 'Command failed with ENOENT: ffmpeg-test -y',
      });
      await expect(tool.extractSegment('in.mp3', 'out.mp3', 0, 10)).rejects.toThrow(
        'ffmpeg failed while extracting start=0 dur=10 from in.mp3: Command failed with ENOENT: ffmpeg-test -y'
      );
    });

    it('should throw when ffmpeg fails', async () => {
      execaMock.mockResolvedValue({ failed: true, exitCode: 1, stdout: '', stderr: 'Invalid data', command: 'ffmpeg-test' });
      await expect(tool.extractSegment('in.mp3', 'out.mp3', 0, 10)).rejects.toThrow(
        'ffmpeg failed while extracting start=0 dur=10 from in.mp3: Invalid data'
      );
    });
  });
});
