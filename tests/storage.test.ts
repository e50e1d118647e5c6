import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ensureDir, fileExists, tempPathFor, writeFileAtomic, writeJson } from '../src/storage.js';
import { FilesystemError } from '../src/errors.js';

let dir: string;

beforeEach(async () => {
  dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'order-images-storage-'));
});

afterEach(async () => {
  await fs.promises.rm(dir, { recursive: true, force: true });
});

describe('writeFileAtomic', () => {
  it('writes bytes under the final name only', async () => {
    const target = path.join(dir, 'a.jpg');
    await writeFileAtomic(target, Buffer.from('jpeg-bytes'));
    expect(await fs.promises.readFile(target, 'utf-8')).toBe('jpeg-bytes');
    expect(await fs.promises.readdir(dir)).toEqual(['a.jpg']);
  });

  it('writes streamed chunks', async () => {
    const target = path.join(dir, 'b.png');
    async function* chunks() {
      yield Buffer.from('part-1;');
      yield Buffer.from('part-2');
    }
    await writeFileAtomic(target, chunks());
    expect(await fs.promises.readFile(target, 'utf-8')).toBe('part-1;part-2');
  });

  it('replaces an existing file', async () => {
    const target = path.join(dir, 'a.jpg');
    await fs.promises.writeFile(target, 'old');
    await writeFileAtomic(target, Buffer.from('new'));
    expect(await fs.promises.readFile(target, 'utf-8')).toBe('new');
    expect(await fs.promises.readdir(dir)).toEqual(['a.jpg']);
  });

  it('leaves nothing behind when the stream breaks midway', async () => {
    const target = path.join(dir, 'c.jpg');
    async function* broken() {
      yield Buffer.from('first half');
      throw new Error('connection reset');
    }
    const err = await writeFileAtomic(target, broken()).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(FilesystemError);
    expect(err).toMatchObject({ path: target });
    expect(await fs.promises.readdir(dir)).toEqual([]);
  });

  it('fails with FilesystemError when the directory is missing', async () => {
    const target = path.join(dir, 'missing', 'd.jpg');
    await expect(writeFileAtomic(target, Buffer.from('x'))).rejects.toBeInstanceOf(FilesystemError);
    expect(await fileExists(path.join(dir, 'missing'))).toBe(false);
  });
});

describe('tempPathFor', () => {
  it('names a hidden, unique sibling', () => {
    const a = tempPathFor('/out/photo.jpg');
    const b = tempPathFor('/out/photo.jpg');
    expect(path.dirname(a)).toBe('/out');
    expect(path.basename(a)).toMatch(/^\.photo\.jpg\.[0-9a-f]{12}\.part$/);
    expect(a).not.toBe(b);
  });
});

describe('writeJson / ensureDir', () => {
  it('creates parent directories', async () => {
    const target = path.join(dir, 'reports', 'run.json');
    await writeJson(target, { total: 2 });
    expect(JSON.parse(await fs.promises.readFile(target, 'utf-8'))).toEqual({ total: 2 });
  });

  it('is fine with an existing directory', async () => {
    await ensureDir(dir);
    await ensureDir(path.join(dir, 'x', 'y'));
    expect(await fileExists(path.join(dir, 'x', 'y'))).toBe(true);
  });
});
