import fs from 'node:fs';
import path from 'node:path';
import { randomBytes } from 'node:crypto';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { FilesystemError, describeError } from './errors.js';

export type FileData = Uint8Array | Iterable<Uint8Array> | AsyncIterable<Uint8Array>;

export async function ensureDir(dir: string) {
  try {
    await fs.promises.mkdir(dir, { recursive: true });
  } catch (err) {
    throw new FilesystemError(dir, `Cannot create directory ${dir}: ${describeError(err)}`, { cause: err });
  }
}

export async function writeJson(filePath: string, data: unknown) {
  await ensureDir(path.dirname(filePath));
  await writeFileAtomic(filePath, Buffer.from(JSON.stringify(data, null, 2), 'utf-8'));
}

export function tempPathFor(filePath: string): string {
  const dir = path.dirname(filePath);
  return path.join(dir, `.${path.basename(filePath)}.${randomBytes(6).toString('hex')}.part`);
}

/**
 * Writes into a hidden temp file beside `filePath` and renames it into place,
 * so the final name only ever holds a complete file. On failure the temp
 * file is removed and a FilesystemError is thrown.
 */
export async function writeFileAtomic(filePath: string, data: FileData): Promise<void> {
  const tmp = tempPathFor(filePath);
  try {
    if (data instanceof Uint8Array) {
      await fs.promises.writeFile(tmp, data, { flag: 'wx' });
    } else {
      const handle = await fs.promises.open(tmp, 'wx');
      await pipeline(Readable.from(data), handle.createWriteStream());
    }
    await fs.promises.rename(tmp, filePath);
  } catch (err) {
    let message = `Failed to write ${filePath}: ${describeError(err)}`;
    try {
      await fs.promises.rm(tmp, { force: true });
    } catch (cleanupErr) {
      message += ` (temp file ${tmp} left behind: ${describeError(cleanupErr)})`;
    }
    throw new FilesystemError(filePath, message, { cause: err });
  }
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath);
    return true;
  } catch {
    return false;
  }
}
