/**
 * File system test utilities
 */

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

/**
 * Create a unique temporary directory for testing
 * @param prefix - Prefix for the temp directory (default: "microdm-test-")
 * @returns Absolute path to temp directory
 */
export async function createTempDir(prefix = "microdm-test-"): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

/**
 * Remove a directory recursively
 */
export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Write a value as pretty JSON and return the file path
 */
export async function writeJsonFile(dir: string, fileName: string, value: unknown): Promise<string> {
  const filePath = join(dir, fileName);
  await writeFile(filePath, JSON.stringify(value, null, 2), "utf-8");
  return filePath;
}

/**
 * Execute a function with a clean temp directory
 * @returns Result of fn
 */
export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await createTempDir();
  try {
    return await fn(dir);
  } finally {
    await removeDir(dir);
  }
}
