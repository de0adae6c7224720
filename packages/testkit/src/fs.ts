/**
 * File system test utilities
 */

import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";

/**
 * Create a unique temporary directory for testing
 * @param prefix - Prefix for the temp directory (default: "autojson-test-")
 * @returns Absolute path to temp directory
 */
export async function createTempDir(prefix = "autojson-test-"): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

/**
 * Remove a directory recursively
 * @param path - Path to remove
 */
export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Write raw text under a directory, creating parent directories
 * @param root - Base directory
 * @param relPath - Path relative to root
 * @param content - Text to write verbatim
 * @returns Absolute path of the written file
 */
export async function writeFixture(root: string, relPath: string, content: string): Promise<string> {
  const filePath = join(root, relPath);
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, content, "utf-8");
  return filePath;
}

/**
 * Read a file under a directory as UTF-8 text
 */
export async function readFixture(root: string, relPath: string): Promise<string> {
  return await readFile(join(root, relPath), "utf-8");
}
