/**
 * Atomic File Writer
 *
 * Writes go to a temporary sibling file which is fsynced and then renamed over
 * the target, so a concurrent reader sees either the old or the new content and
 * never a partially written file.
 *
 * Provides:
 * - temp file + rename
 * - Retry mechanism (max 3 retries)
 */

import * as fs from 'fs';
import * as path from 'path';

export const DEFAULT_MAX_RETRIES = 3;

/**
 * Write options for atomic file operations
 */
export interface AtomicWriteOptions {
  /** Maximum retry attempts (default: 3) */
  maxRetries?: number;
  /** File permissions (default: 0o644) */
  mode?: number;
  /** Encoding (default: 'utf-8') */
  encoding?: BufferEncoding;
}

/**
 * Write result
 */
export interface AtomicWriteResult {
  success: boolean;
  retryCount: number;
  error?: Error;
}

function tempPathFor(filePath: string): string {
  return path.join(
    path.dirname(filePath),
    `.${path.basename(filePath)}.${process.pid}.${Date.now()}.tmp`
  );
}

/**
 * Single attempt: write temp, fsync, rename
 */
function writeViaRename(filePath: string, content: string, options: AtomicWriteOptions): void {
  const encoding = options.encoding || 'utf-8';
  const mode = options.mode || 0o644;

  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  const tempPath = tempPathFor(filePath);
  try {
    const fd = fs.openSync(tempPath, 'w', mode);
    try {
      fs.writeFileSync(fd, content, { encoding });
      fs.fsyncSync(fd);
    } finally {
      fs.closeSync(fd);
    }
    fs.renameSync(tempPath, filePath);
  } catch (error) {
    if (fs.existsSync(tempPath)) {
      fs.unlinkSync(tempPath);
    }
    throw error;
  }
}

/**
 * Atomic file write with retry mechanism
 *
 * @returns Result with success status and retry count
 */
export function atomicWriteFileSync(
  filePath: string,
  content: string,
  options: AtomicWriteOptions = {}
): AtomicWriteResult {
  const maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;

  let lastError: Error | undefined;
  let retryCount = 0;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      writeViaRename(filePath, content, options);
      return { success: true, retryCount };
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));
      retryCount = attempt;
    }
  }

  return {
    success: false,
    retryCount: maxRetries,
    error: lastError,
  };
}
