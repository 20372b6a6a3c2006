/**
 * Corpus File Utilities
 * Atomic replacement, torn-line repair and line streaming for append-only files
 */

import { createReadStream } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as readline from 'readline';
import { isNotFoundError } from './corpus-errors';

const TAIL_BLOCK_SIZE = 64 * 1024;
const NEWLINE = 0x0a;

/**
 * Replace a file's content atomically (temp file in the same directory + rename)
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const tmpPath = path.join(path.dirname(filePath), `.${path.basename(filePath)}.${process.pid}.tmp`);
  await fs.writeFile(tmpPath, content, 'utf8');
  await fs.rename(tmpPath, filePath);
}

/**
 * Truncate a file after its last newline so the next append starts on a
 * fresh line. Returns the number of bytes removed (0 when intact or missing).
 */
export async function repairTrailingLine(filePath: string): Promise<number> {
  let handle: fs.FileHandle;
  try {
    handle = await fs.open(filePath, 'r+');
  } catch (error) {
    if (isNotFoundError(error)) {
      return 0;
    }
    throw error;
  }

  try {
    const { size } = await handle.stat();
    if (size === 0) {
      return 0;
    }

    let end = size;
    while (end > 0) {
      const start = Math.max(0, end - TAIL_BLOCK_SIZE);
      const buffer = Buffer.alloc(end - start);
      await handle.read(buffer, 0, buffer.length, start);

      if (end === size && buffer[buffer.length - 1] === NEWLINE) {
        return 0;
      }

      const index = buffer.lastIndexOf(NEWLINE);
      if (index >= 0) {
        const keep = start + index + 1;
        await handle.truncate(keep);
        return size - keep;
      }
      end = start;
    }

    await handle.truncate(0);
    return size;
  } finally {
    await handle.close();
  }
}

/**
 * Stream a file line by line; a missing file yields nothing.
 */
export async function forEachLine(filePath: string, onLine: (line: string) => void): Promise<boolean> {
  try {
    await fs.access(filePath);
  } catch (error) {
    if (isNotFoundError(error)) {
      return false;
    }
    throw error;
  }

  const input = createReadStream(filePath, { encoding: 'utf8' });
  const lines = readline.createInterface({ input, crlfDelay: Infinity });
  try {
    for await (const line of lines) {
      onLine(line);
    }
  } finally {
    lines.close();
    input.destroy();
  }
  return true;
}

/**
 * Read and parse a JSON file; null when the file does not exist
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (isNotFoundError(error)) {
      return null;
    }
    throw error;
  }
  return JSON.parse(raw);
}

/**
 * Relative file path for a page URL: directory-like URLs map to index.html
 */
export function urlToRelativePath(url: string): string {
  const urlObj = new URL(url);
  let rel = decodeURIComponent(urlObj.pathname).replace(/^\/+/, '');
  const lastSegment = rel.slice(rel.lastIndexOf('/') + 1);

  if (!rel || rel.endsWith('/') || !lastSegment.includes('.')) {
    rel = `${rel.replace(/\/+$/, '')}/index.html`.replace(/^\/+/, '');
  }

  const safe = rel
    .split('/')
    .filter((segment) => segment && segment !== '.' && segment !== '..')
    .map((segment) => segment.replace(/[<>:"\\|?*\x00-\x1f]/g, '_'))
    .join('/');

  return path.join(urlObj.host.replace(/[:]/g, '_'), safe || 'index.html');
}
