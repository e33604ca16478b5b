import * as fs from 'fs';
import * as path from 'path';
import { CacheDeserializationError } from '../errors.js';
import { isErrnoException, normalizeError } from '../utils.js';

/**
 * Synchronous snapshot file I/O.
 *
 * Synchronous: the exit registry saves caches from a process
 * `exit` listener, where pending promises never settle.
 */

const MISSING_PATH_CODES = new Set(['ENOENT', 'ENOTDIR']);

/**
 * Read a snapshot file
 *
 * @returns File contents, or undefined if the path does not exist (including
 *   a path whose parent is a regular file)
 * @throws {CacheDeserializationError} If the file exists but cannot be read
 */
export function readSnapshot(filePath: string): Uint8Array | undefined {
  try {
    const buffer = fs.readFileSync(filePath);
    // Plain Uint8Array view, so decoded binary values are not Buffers
    return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);
  } catch (error) {
    if (isErrnoException(error) && MISSING_PATH_CODES.has(error.code ?? '')) {
      return undefined;
    }
    const err = normalizeError(error);
    throw new CacheDeserializationError(filePath, err.message, { cause: error });
  }
}

/**
 * Write a snapshot file, replacing any previous one
 *
 * Creates parent directories as needed. Bytes go to a temporary sibling
 * first and are renamed into place, so a crash mid-write leaves the old
 * snapshot intact.
 */
export function writeSnapshot(filePath: string, bytes: Uint8Array): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });

  const tempPath = `${filePath}.${process.pid}.tmp`;
  try {
    fs.writeFileSync(tempPath, bytes);
    fs.renameSync(tempPath, filePath);
  } catch (error) {
    fs.rmSync(tempPath, { force: true });
    throw error;
  }
}
