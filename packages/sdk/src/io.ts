/**
 * File I/O primitives for the JSON file store
 *
 * Invariants:
 * - Reads and writes are UTF-8 only; malformed input is a read failure
 * - Every failure surfaces as JSONFileError carrying the target path and the errno error as cause
 * - Missing targets are reported with `notFound: true`
 * - Writes go straight to the target (no temp file, no rename)
 */

import type { Dirent } from "node:fs";
import * as fs from "node:fs/promises";
import { join } from "node:path";
import { JSONFileError, describeCause, errnoCode, type Operation } from "./errors.js";

const JSON_EXTENSION = ".json";

// Malformed bytes throw; a leading BOM stays in the text
const UTF8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

/**
 * ENOENT, or ENOTDIR when a path component is a regular file
 */
function isMissing(err: unknown): boolean {
  const code = errnoCode(err);
  return code === "ENOENT" || code === "ENOTDIR";
}

/**
 * Kind of filesystem entry found at a path
 */
export type EntryKind = "file" | "directory" | "other" | "missing";

/**
 * Determine what lives at a path, following symlinks
 * @throws JSONFileError for failures other than a missing entry
 */
export async function statPath(filePath: string, operation?: Operation): Promise<EntryKind> {
  try {
    const stats = await fs.stat(filePath);
    if (stats.isFile()) return "file";
    if (stats.isDirectory()) return "directory";
    return "other";
  } catch (err) {
    if (isMissing(err)) {
      return "missing";
    }
    throw new JSONFileError(`Cannot access ${filePath}: ${describeCause(err)}`, {
      path: filePath,
      operation,
      cause: err,
    });
  }
}

/**
 * Check whether anything exists at a path
 */
export async function pathExists(filePath: string, operation?: Operation): Promise<boolean> {
  return (await statPath(filePath, operation)) !== "missing";
}

/**
 * Ensure a directory exists, creating it and parent directories as needed
 * @param dirPath - Directory path to create
 */
export async function ensureDirectory(dirPath: string, operation?: Operation): Promise<void> {
  try {
    await fs.mkdir(dirPath, { recursive: true });
  } catch (err) {
    throw new JSONFileError(`Error creating directory ${dirPath}: ${describeCause(err)}`, {
      path: dirPath,
      operation,
      cause: err,
    });
  }
}

/**
 * Read a file as UTF-8 text
 * @throws JSONFileError with notFound set if the file doesn't exist,
 *   and without it for other failures including malformed UTF-8
 */
export async function readText(filePath: string, operation?: Operation): Promise<string> {
  try {
    return UTF8.decode(await fs.readFile(filePath));
  } catch (err) {
    if (isMissing(err)) {
      throw new JSONFileError(`File not found: ${filePath}`, {
        path: filePath,
        operation,
        cause: err,
        notFound: true,
      });
    }
    throw new JSONFileError(`Error reading file ${filePath}: ${describeCause(err)}`, {
      path: filePath,
      operation,
      cause: err,
    });
  }
}

/**
 * Write UTF-8 text to a file, truncating existing content
 */
export async function writeText(
  filePath: string,
  content: string,
  operation?: Operation
): Promise<void> {
  try {
    await fs.writeFile(filePath, content, "utf-8");
  } catch (err) {
    throw new JSONFileError(`Error writing to file ${filePath}: ${describeCause(err)}`, {
      path: filePath,
      operation,
      cause: err,
    });
  }
}

/**
 * Remove a file
 * @returns false if the file didn't exist
 * @throws JSONFileError if removal fails for reasons other than file not found
 */
export async function removeFile(filePath: string, operation?: Operation): Promise<boolean> {
  try {
    await fs.unlink(filePath);
    return true;
  } catch (err) {
    if (isMissing(err)) {
      return false;
    }
    throw new JSONFileError(`Error deleting file ${filePath}: ${describeCause(err)}`, {
      path: filePath,
      operation,
      cause: err,
    });
  }
}

async function isFileEntry(dir: string, entry: Dirent): Promise<boolean> {
  if (entry.isFile()) return true;
  if (!entry.isSymbolicLink()) return false;
  // Symlinks count when they resolve to a regular file; dangling links are skipped
  try {
    return (await fs.stat(join(dir, entry.name))).isFile();
  } catch {
    return false;
  }
}

/**
 * List .json files under a directory
 *
 * Order: the directory's own files sorted by name, then each subdirectory (sorted)
 * depth-first when recursive. Symlinked directories are not followed.
 *
 * @param dirPath - Directory to scan
 * @param recursive - Descend into subdirectories
 * @returns Full paths of matching files; empty if dirPath is not a directory
 */
export async function listJsonFiles(
  dirPath: string,
  recursive: boolean,
  operation?: Operation
): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dirPath, { withFileTypes: true });
  } catch (err) {
    if (errnoCode(err) === "ENOTDIR") {
      return [];
    }
    throw new JSONFileError(`Error listing directory ${dirPath}: ${describeCause(err)}`, {
      path: dirPath,
      operation,
      cause: err,
    });
  }

  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  const files: string[] = [];
  for (const entry of entries) {
    if (entry.name.endsWith(JSON_EXTENSION) && (await isFileEntry(dirPath, entry))) {
      files.push(join(dirPath, entry.name));
    }
  }

  if (recursive) {
    for (const entry of entries) {
      if (entry.isDirectory()) {
        files.push(...(await listJsonFiles(join(dirPath, entry.name), true, operation)));
      }
    }
  }

  return files;
}
