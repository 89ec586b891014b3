/**
 * Reads configuration files from disk with an upper bound on their size.
 */

import { readFileSync, statSync } from 'node:fs';
import { readFile, stat } from 'node:fs/promises';
import { isAbsolute, resolve } from 'node:path';
import { ConfIOError } from './errors.js';

export interface LoadOptions {
  /** Directory that relative paths resolve against (default: working directory) */
  baseDir?: string;
  /** Max file size in bytes (default 1 MiB) */
  maxSize?: number;
}

export const DEFAULT_MAX_SIZE = 1024 * 1024;

export function resolvePath(path: string, baseDir?: string): string {
  if (isAbsolute(path) || baseDir === undefined) return resolve(path);
  return resolve(baseDir, path);
}

function checkSize(file: string, size: number, isFile: boolean, maxSize: number): void {
  if (!isFile) throw new ConfIOError(`Not a regular file: ${file}`);
  if (size > maxSize) {
    throw new ConfIOError(`File exceeds maximum size (${size} > ${maxSize}): ${file}`);
  }
}

function wrap(file: string, err: unknown): ConfIOError {
  if (err instanceof ConfIOError) return err;
  const reason = err instanceof Error ? err.message : String(err);
  return new ConfIOError(`Cannot read ${file}: ${reason}`, { cause: err });
}

export async function loadFile(path: string, options: LoadOptions = {}): Promise<Uint8Array> {
  const file = resolvePath(path, options.baseDir);
  const maxSize = options.maxSize ?? DEFAULT_MAX_SIZE;
  try {
    const info = await stat(file);
    checkSize(file, info.size, info.isFile(), maxSize);
    const data = await readFile(file);
    // The file may have grown between stat and read.
    checkSize(file, data.byteLength, true, maxSize);
    return data;
  } catch (err) {
    throw wrap(file, err);
  }
}

export function loadFileSync(path: string, options: LoadOptions = {}): Uint8Array {
  const file = resolvePath(path, options.baseDir);
  const maxSize = options.maxSize ?? DEFAULT_MAX_SIZE;
  try {
    const info = statSync(file);
    checkSize(file, info.size, info.isFile(), maxSize);
    const data = readFileSync(file);
    checkSize(file, data.byteLength, true, maxSize);
    return data;
  } catch (err) {
    throw wrap(file, err);
  }
}
