import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { formatDocument, writeTranscript } from '../src/pipeline/export';

describe('export', () => {
  let tmp: string;

  beforeEach(async () => {
    tmp = await fs.mkdtemp(path.join(os.tmpdir(), 'export-test-'));
  });

  afterEach(async () => {
    await fs.remove(tmp);
  });

  it('should put the header above a separator', () => {
    expect(formatDocument('body', '# Episode 12')).toBe('# Episode 12\n\n---\n\nbody');
    expect(formatDocument('body')).toBe('body');
    expect(formatDocument('body', '')).toBe('body');
  });

  it('should write the document and create parent directories', async () => {
    const out = path.join(tmp, 'nested', 'transcript.md');
    const written = await writeTranscript(out, '## Intro\n\n**Ana:** Hi.', 'Header');
    expect(written).toBe(path.resolve(out));
    expect(await fs.readFile(out, 'utf8')).toBe('Header\n\n---\n\n## Intro\n\n**Ana:** Hi.');
  });

  it('should replace an existing file', async () => {
    const out = path.join(tmp, 'transcript.md');
    await fs.writeFile(out, 'old contents that are longer');
    await writeTranscript(out, 'new');
    expect(await fs.readFile(out, 'utf8')).toBe('new');
  });
});
