/**
 * File system helpers for preparing plugin working directories.
 *
 * Every failure is surfaced as an FsError; nothing here retries or swallows
 * an error from the file system.
 */

import { copyFile, readFile, readdir, rm, stat } from 'node:fs/promises';
import { join } from 'node:path';

/**
 * Error thrown when a file system operation fails.
 */
export class FsError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'FsError';
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Reads and parses a JSON file with proper typing.
 *
 * @throws {FsError} If the file cannot be read or parsed
 */
export async function atomicReadJson<T>(filePath: string): Promise<T> {
  try {
    const content = await readFile(filePath, 'utf-8');
    return JSON.parse(content) as T;
  } catch (error) {
    throw new FsError(
      `Failed to read JSON from ${filePath}: ${errorMessage(error)}`,
      filePath,
      error instanceof Error ? error : undefined
    );
  }
}

/**
 * Reads a text file and splits it into lines.
 *
 * @throws {FsError} If the file cannot be read
 */
export async function readLines(filePath: string): Promise<string[]> {
  try {
    const content = await readFile(filePath, 'utf-8');
    return content.split(/\r?\n/);
  } catch (error) {
    throw new FsError(
      `Failed to read ${filePath}: ${errorMessage(error)}`,
      filePath,
      error instanceof Error ? error : undefined
    );
  }
}

/**
 * Recursively deletes a directory if one exists at the given path.
 *
 * A missing path, or a path that is a regular file, is left alone.
 *
 * @returns true if a directory was removed
 * @throws {FsError} If the directory exists but cannot be removed
 */
export async function removeDirectoryIfPresent(dirPath: string): Promise<boolean> {
  try {
    const stats = await stat(dirPath);
    if (!stats.isDirectory()) {
      return false;
    }
  } catch (error) {
    if (isNotFound(error)) {
      return false;
    }
    throw new FsError(
      `Failed to inspect ${dirPath}: ${errorMessage(error)}`,
      dirPath,
      error instanceof Error ? error : undefined
    );
  }

  try {
    await rm(dirPath, { recursive: true });
    return true;
  } catch (error) {
    throw new FsError(
      `Failed to delete directory ${dirPath}: ${errorMessage(error)}`,
      dirPath,
      error instanceof Error ? error : undefined
    );
  }
}

/**
 * Copies a file, replacing the destination if it already exists.
 *
 * @throws {FsError} If the copy fails
 */
export async function copyFileReplacing(source: string, destination: string): Promise<void> {
  try {
    await copyFile(source, destination);
  } catch (error) {
    throw new FsError(
      `Unable to copy ${source} to ${destination}: ${errorMessage(error)}`,
      source,
      error instanceof Error ? error : undefined
    );
  }
}

/**
 * Finds regular files with an exact name under a root directory.
 *
 * Depth 1 means the root's immediate children; each extra level descends
 * one more directory. Results are sorted for stable ordering.
 *
 * @throws {FsError} If a directory cannot be listed
 *
 * @example
 * ```typescript
 * // Look for .eslintrc directly inside /src/checkout
 * const found = await findFilesByName('/src/checkout', '.eslintrc', 1);
 * ```
 */
export async function findFilesByName(
  root: string,
  fileName: string,
  maxDepth: number
): Promise<string[]> {
  if (maxDepth < 1) {
    return [];
  }

  let entries;
  try {
    entries = await readdir(root, { withFileTypes: true });
  } catch (error) {
    throw new FsError(
      `Failed to list ${root}: ${errorMessage(error)}`,
      root,
      error instanceof Error ? error : undefined
    );
  }

  const found: string[] = [];
  const sorted = [...entries].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  for (const entry of sorted) {
    const entryPath = join(root, entry.name);
    if (entry.isFile() && entry.name === fileName) {
      found.push(entryPath);
    } else if (entry.isDirectory() && maxDepth > 1) {
      found.push(...(await findFilesByName(entryPath, fileName, maxDepth - 1)));
    }
  }
  return found;
}
