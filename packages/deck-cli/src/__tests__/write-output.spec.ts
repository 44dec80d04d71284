import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import path from 'node:path';
import os from 'node:os';
import fs from 'fs-extra';
import { writeOutputFile } from '../output/write-output.js';

describe('writeOutputFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'deck-write-'));
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('should create missing parent directories', async () => {
    const target = path.join(dir, 'a', 'b', 'out.html');

    await writeOutputFile(target, '<html></html>');

    expect(await fs.readFile(target, 'utf8')).toBe('<html></html>');
    expect(await fs.readdir(path.join(dir, 'a', 'b'))).toEqual(['out.html']);
  });

  it('should replace an existing file', async () => {
    const target = path.join(dir, 'out.html');
    await fs.writeFile(target, 'old');

    await writeOutputFile(target, 'new');

    expect(await fs.readFile(target, 'utf8')).toBe('new');
  });

  it('should fail with DECK_WRITE_ERROR and leave no temp file', async () => {
    const target = path.join(dir, 'out.html');
    await fs.ensureDir(target);

    await expect(writeOutputFile(target, 'content')).rejects.toMatchObject({
      code: 'DECK_WRITE_ERROR',
      meta: { path: target },
    });
    expect(await fs.readdir(dir)).toEqual(['out.html']);
  });
});
