import { mkdir, readFile, rename, stat, unlink, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { ulid } from 'ulid';
import { logger } from './logger.js';

export type JsonReadResult =
  | { status: 'missing' }
  | { status: 'ok'; data: unknown }
  | { status: 'unreadable'; reason: 'oversized' | 'corrupt' | 'io_error'; detail: string };

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Read and parse a JSON file, checking its size before reading.
 * Never throws: absence, oversize and parse failures come back as a result.
 */
export async function readJsonFile(filePath: string, maxBytes: number): Promise<JsonReadResult> {
  let size: number;
  try {
    size = (await stat(filePath)).size;
  } catch (error) {
    if (errorCode(error) === 'ENOENT') return { status: 'missing' };
    return { status: 'unreadable', reason: 'io_error', detail: describe(error) };
  }

  if (size > maxBytes) {
    return {
      status: 'unreadable',
      reason: 'oversized',
      detail: `${size} bytes exceeds limit of ${maxBytes}`,
    };
  }

  let text: string;
  try {
    text = await readFile(filePath, 'utf-8');
  } catch (error) {
    if (errorCode(error) === 'ENOENT') return { status: 'missing' };
    return { status: 'unreadable', reason: 'io_error', detail: describe(error) };
  }

  try {
    return { status: 'ok', data: JSON.parse(text) };
  } catch (error) {
    return { status: 'unreadable', reason: 'corrupt', detail: describe(error) };
  }
}

/**
 * Write JSON via a sibling temp file and rename, so readers see either the
 * old file or the new one, never a partial write.
 */
export async function atomicWriteJson(filePath: string, data: unknown): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });

  const tempPath = `${filePath}.${ulid()}.tmp`;
  try {
    await writeFile(tempPath, `${JSON.stringify(data, null, 2)}\n`, 'utf-8');
    await rename(tempPath, filePath);
  } catch (error) {
    await unlink(tempPath).catch((cleanupError: unknown) => {
      if (errorCode(cleanupError) !== 'ENOENT') {
        logger.warn({ tempPath, err: cleanupError }, 'Failed to remove temp file');
      }
    });
    throw error;
  }
}
