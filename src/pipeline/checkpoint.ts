import fs from 'fs-extra';
import path from 'path';
import { padIndex } from './chunk';
import { debug } from './log';

const CHECKPOINT_PATTERN = /^transcript_chunk_(\d+)\.md$/;

/**
 * One plain-text transcript file per chunk index. The file's presence is the
 * resume signal; nothing here ever expires.
 */
export class CheckpointStore {
  constructor(readonly dir: string) {}

  pathFor(index: number): string {
    return path.join(this.dir, `transcript_chunk_${padIndex(index)}.md`);
  }

  async has(index: number): Promise<boolean> {
    try {
      const stat = await fs.stat(this.pathFor(index));
      return stat.isFile();
    } catch (e) {
      if (e instanceof Error && 'code' in e && e.code === 'ENOENT') return false;
      throw e;
    }
  }

  async load(index: number): Promise<string> {
    return fs.readFile(this.pathFor(index), 'utf8');
  }

  /**
   * Write to a temp sibling, then rename over the final name
   */
  async save(index: number, text: string): Promise<string> {
    await fs.ensureDir(this.dir);
    const target = this.pathFor(index);
    const tmp = `${target}.${process.pid}.tmp`;
    await fs.writeFile(tmp, text, 'utf8');
    await fs.move(tmp, target, { overwrite: true });
    debug('checkpoint.save', { idx: index, path: target, chars: text.length });
    return target;
  }

  private async checkpointFiles(): Promise<Array<{ index: number; name: string }>> {
    if (!(await fs.pathExists(this.dir))) return [];
    const entries: Array<{ index: number; name: string }> = [];
    for (const name of await fs.readdir(this.dir)) {
      const match = CHECKPOINT_PATTERN.exec(name);
      if (match) entries.push({ index: Number(match[1]), name });
    }
    return entries.sort((a, b) => a.index - b.index);
  }

  /** Indices with a checkpoint on disk, ascending */
  async list(): Promise<number[]> {
    return (await this.checkpointFiles()).map((entry) => entry.index);
  }

  /** Delete every checkpoint; returns how many were removed */
  async clear(): Promise<number> {
    const entries = await this.checkpointFiles();
    for (const entry of entries) {
      await fs.remove(path.join(this.dir, entry.name));
    }
    return entries.length;
  }
}
