/**
 * JSON file store implementation
 */

import * as path from "node:path";
import { z } from "zod";
import type {
  AutoOptions,
  CreateOptions,
  JSONFileStore,
  JsonFileMap,
  JsonObject,
  JsonValue,
  StoreOptions,
  UpdateOptions,
  WriteOptions,
} from "./types.js";
import {
  findInexactInteger,
  isJsonObject,
  parse,
  serialize,
  UnserializableValueError,
} from "./format.js";
import {
  ensureDirectory,
  listJsonFiles,
  pathExists,
  readText,
  removeFile,
  statPath,
  writeText,
} from "./io.js";
import {
  JSONError,
  JSONFileError,
  JSONValidationError,
  describeCause,
  type Operation,
} from "./errors.js";
import { logger } from "./observability/logs.js";

const StoreOptionsSchema = z
  .object({
    cwd: z.string().min(1, "cwd must be a non-empty string").optional(),
    indent: z.number().int().min(0).max(10).optional(),
    escapeNonAscii: z.boolean().optional(),
  })
  .strict();

/**
 * Parse file content, mapping syntax errors to JSONValidationError
 */
function decode(text: string, filePath: string, operation: Operation): JsonValue {
  try {
    return parse(text);
  } catch (err) {
    throw new JSONValidationError(`Invalid JSON in file ${filePath}: ${describeCause(err)}`, {
      path: filePath,
      operation,
      cause: err,
      reason: "syntax",
    });
  }
}

/**
 * File stem: the name without its final extension
 */
function stem(filePath: string): string {
  return path.basename(filePath, path.extname(filePath));
}

/**
 * JSON file store
 *
 * Stateless beyond its options: every call resolves the path again and
 * reads or writes the filesystem directly.
 *
 * @example
 * ```typescript
 * const store = openStore({ cwd: "./config", indent: 2 });
 *
 * await store.create("settings.json", { theme: "dark" });
 * await store.update("settings.json", { fontSize: 14 });
 *
 * const all = await store.auto(".");
 * // { settings: { theme: "dark", fontSize: 14 } }
 * ```
 */
class FileStore implements JSONFileStore {
  #cwd?: string;
  #indent: number;
  #escapeNonAscii: boolean;

  constructor(options: StoreOptions) {
    this.#cwd = options.cwd;
    this.#indent = options.indent ?? 4;
    this.#escapeNonAscii = options.escapeNonAscii ?? false;
  }

  /**
   * Resolve a target path against the configured base directory
   */
  resolve(target: string): string {
    return path.resolve(this.#cwd ?? process.cwd(), target);
  }

  async auto(directory = ".", options: AutoOptions = {}): Promise<JsonFileMap> {
    const { recursive = true, createIfNotExists = false } = options;
    const dirPath = this.resolve(directory);

    if (!(await pathExists(dirPath, "auto"))) {
      if (createIfNotExists) {
        await ensureDirectory(dirPath, "auto");
        logger.debug("auto.created", { op: "auto", path: dirPath });
        return {};
      }
      throw new JSONFileError(`Directory not found: ${dirPath}`, {
        path: dirPath,
        operation: "auto",
        notFound: true,
      });
    }

    const files = await listJsonFiles(dirPath, recursive, "auto");
    const result: JsonFileMap = {};

    for (const file of files) {
      const text = await readText(file, "auto");
      result[stem(file)] = decode(text, file, "auto");
    }

    logger.debug("auto.loaded", {
      op: "auto",
      path: dirPath,
      details: { files: files.length, keys: Object.keys(result).length, recursive },
    });

    return result;
  }

  async read(target: string): Promise<JsonValue> {
    const filePath = this.resolve(target);
    const text = await readText(filePath, "read");
    const value = decode(text, filePath, "read");
    logger.debug("read", { op: "read", path: filePath, details: { bytes: text.length } });
    return value;
  }

  async write(target: string, data: unknown, options: WriteOptions = {}): Promise<void> {
    const {
      indent = this.#indent,
      escapeNonAscii = this.#escapeNonAscii,
      createDirs = true,
    } = options;
    const filePath = this.resolve(target);

    let text: string;
    try {
      text = serialize(data, { indent, escapeNonAscii });
    } catch (err) {
      if (err instanceof UnserializableValueError) {
        throw new JSONError(`Data is not JSON-serializable: ${err.message}`, {
          path: filePath,
          operation: "write",
          cause: err,
        });
      }
      throw err;
    }

    if (createDirs) {
      const parent = path.dirname(filePath);
      if (!(await pathExists(parent, "write"))) {
        await ensureDirectory(parent, "write");
      }
    }

    await writeText(filePath, text, "write");
    logger.debug("write", { op: "write", path: filePath, details: { bytes: text.length } });
  }

  async update(
    target: string,
    updates: JsonObject,
    options: UpdateOptions = {}
  ): Promise<JsonObject> {
    const filePath = this.resolve(target);
    let data: JsonObject;

    if (await pathExists(filePath, "update")) {
      const text = await readText(filePath, "update");
      const current = decode(text, filePath, "update");

      // Rewriting would round untouched integers beyond 2^53
      const inexact = findInexactInteger(text);
      if (inexact !== undefined) {
        throw new JSONValidationError(
          `Cannot update ${filePath}: integer ${inexact} cannot be represented exactly`,
          { path: filePath, operation: "update", reason: "precision" }
        );
      }

      if (isJsonObject(current)) {
        data = current;
      } else {
        logger.debug("update.discard", {
          op: "update",
          path: filePath,
          message: "existing content is not an object",
        });
        data = {};
      }
    } else if (options.createIfNotExists) {
      data = {};
    } else {
      throw new JSONFileError(`File not found: ${filePath}`, {
        path: filePath,
        operation: "update",
        notFound: true,
      });
    }

    const merged: JsonObject = { ...data, ...updates };
    await this.write(filePath, merged);
    return merged;
  }

  async delete(target: string): Promise<boolean> {
    const filePath = this.resolve(target);
    // A dangling symlink counts as missing and is left in place
    const removed =
      (await pathExists(filePath, "delete")) && (await removeFile(filePath, "delete"));
    logger.debug("delete", { op: "delete", path: filePath, details: { removed } });
    return removed;
  }

  async create(target: string, data?: unknown, options: CreateOptions = {}): Promise<boolean> {
    const { overwrite = false, indent, escapeNonAscii } = options;
    const filePath = this.resolve(target);

    if (!overwrite && (await pathExists(filePath, "create"))) {
      logger.debug("create.skipped", { op: "create", path: filePath });
      return false;
    }

    await this.write(filePath, data ?? {}, { indent, escapeNonAscii, createDirs: true });
    return true;
  }

  async exists(target: string): Promise<boolean> {
    const filePath = this.resolve(target);
    try {
      if ((await statPath(filePath, "exists")) !== "file") {
        return false;
      }
      parse(await readText(filePath, "exists"));
      return true;
    } catch (err) {
      logger.debug("exists.false", { op: "exists", path: filePath, message: describeCause(err) });
      return false;
    }
  }
}

/**
 * Open a JSON file store
 * @param options - Base directory and default formatting
 * @throws JSONError if options are invalid
 */
export function openStore(options: StoreOptions = {}): JSONFileStore {
  const parsed = StoreOptionsSchema.safeParse(options);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "options"}: ${issue.message}`)
      .join("; ");
    throw new JSONError(`Invalid store options: ${detail}`, {
      operation: "open",
      cause: parsed.error,
    });
  }
  return new FileStore(parsed.data);
}
