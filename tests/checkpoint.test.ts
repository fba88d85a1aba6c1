import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { CheckpointStore } from '../src/pipeline/checkpoint';

describe('CheckpointStore', () => {
  let tmp: string;
  let store: CheckpointStore;

  beforeEach(async () => {
    tmp = await fs.mkdtemp(path.join(os.tmpdir(), 'checkpoint-test-'));
    store = new CheckpointStore(path.join(tmp, 'checkpoints'));
  });

  afterEach(async () => {
    await fs.remove(tmp);
  });

  it('should name files by padded chunk index', () => {
    expect(store.pathFor(1)).toBe(path.join(tmp, 'checkpoints', 'transcript_chunk_01.md'));
    expect(store.pathFor(12)).toBe(path.join(tmp, 'checkpoints', 'transcript_chunk_12.md'));
    expect(store.pathFor(100)).toBe(path.join(tmp, 'checkpoints', 'transcript_chunk_100.md'));
  });

  it('should report missing checkpoints without creating the directory', async () => {
    expect(await store.has(1)).toBe(false);
    expect(await store.list()).toEqual([]);
    expect(await fs.pathExists(store.dir)).toBe(false);
  });

  it('should save and load text unchanged', async () => {
    const text = '**Ana:** Hello.\n\n**Ben:** Café, naïve, 東京.\n';
    const saved = await store.save(2, text);
    expect(saved).toBe(store.pathFor(2));
    expect(await store.has(2)).toBe(true);
    expect(await store.load(2)).toBe(text);
  });

  it('should keep an empty transcript as a valid checkpoint', async () => {
    await store.save(1, '');
    expect(await store.has(1)).toBe(true);
    expect(await store.load(1)).toBe('');
  });

  it('should overwrite and leave no temp files', async () => {
    await store.save(1, 'first');
    await store.save(1, 'second');
    expect(await store.load(1)).toBe('second');
    expect(await fs.readdir(store.dir)).toEqual(['transcript_chunk_01.md']);
  });

  it('should list and clear only checkpoint files', async () => {
    await store.save(3, 'c');
    await store.save(1, 'a');
    await store.save(10, 'j');
    await fs.writeFile(path.join(store.dir, 'chunk_01.mp3'), 'audio');
    await fs.writeFile(path.join(store.dir, 'transcript_chunk_xx.md'), 'other');

    expect(await store.list()).toEqual([1, 3, 10]);
    expect(await store.clear()).toBe(3);
    expect((await fs.readdir(store.dir)).sort()).toEqual(['chunk_01.mp3', 'transcript_chunk_xx.md']);
  });

  it('should not treat a directory as a checkpoint', async () => {
    await fs.ensureDir(store.pathFor(4));
    expect(await store.has(4)).toBe(false);
  });
});
