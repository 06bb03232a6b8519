import type { Stats } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';
import { RunInputError } from '../errors.js';

export const DEFAULT_LOG_EXTENSIONS: readonly string[] = ['.txt'];
export const DEFAULT_CONFIG_EXTENSIONS: readonly string[] = ['.ini', '.cfg'];

function byName(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function isErrnoCode(err: unknown, ...codes: string[]): boolean {
  return err !== null && typeof err === 'object' && 'code' in err && typeof err.code === 'string' && codes.includes(err.code);
}

/**
 * @throws RunInputError when the directory is missing or is not a directory
 */
export async function assertDirectory(dirPath: string, label: string): Promise<void> {
  let stat: Stats;
  try {
    stat = await fs.stat(dirPath);
  } catch (err) {
    if (isErrnoCode(err, 'ENOENT', 'ENOTDIR')) {
      throw new RunInputError(`${label} not found: ${dirPath}`, { path: dirPath, cause: err });
    }
    throw new RunInputError(`${label} is not readable: ${dirPath}`, { path: dirPath, cause: err });
  }
  if (!stat.isDirectory()) {
    throw new RunInputError(`${label} is not a directory: ${dirPath}`, { path: dirPath });
  }
}

/**
 * Files directly inside `dirPath` whose extension is one of `extensions`,
 * sorted by name. Subdirectories are not searched.
 */
export async function listFilesWithExtensions(
  dirPath: string,
  extensions: readonly string[]
): Promise<string[]> {
  const entries = await fs.readdir(dirPath, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && extensions.includes(path.extname(entry.name)))
    .map((entry) => entry.name)
    .sort(byName);
}

/**
 * Names of the run directories under a data or output root, sorted
 */
export async function listRunDirectories(root: string): Promise<string[]> {
  await assertDirectory(root, 'Directory');
  const entries = await fs.readdir(root, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort(byName);
}
