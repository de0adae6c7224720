/**
 * autojson SDK
 *
 * Read, write, update, create, delete and bulk-load JSON files
 */

import { openStore } from "./store.js";
import type {
  AutoOptions,
  CreateOptions,
  JsonFileMap,
  JsonObject,
  JsonValue,
  UpdateOptions,
  WriteOptions,
} from "./types.js";

export const VERSION = "0.1.0";

// Re-export types
export type {
  JsonValue,
  JsonObject,
  JsonFileMap,
  StoreOptions,
  AutoOptions,
  WriteOptions,
  UpdateOptions,
  CreateOptions,
  JSONFileStore,
} from "./types.js";

// Re-export utilities
export { serialize, parse, isJsonObject, toJsonValue, UnserializableValueError } from "./format.js";
export type { SerializeOptions } from "./format.js";
export { logger, Logger } from "./observability/logs.js";
export type { LogLevel, LogEntry, LogSink } from "./observability/logs.js";

// Re-export errors
export { JSONError, JSONFileError, JSONValidationError } from "./errors.js";
export type { JSONErrorKind, JSONErrorOptions, Operation, ValidationReason } from "./errors.js";

export { openStore } from "./store.js";

// Operations on a default store resolving paths against process.cwd()
const defaultStore = openStore();

/**
 * Load every .json file in a directory, keyed by file stem
 */
export function auto(directory?: string, options?: AutoOptions): Promise<JsonFileMap> {
  return defaultStore.auto(directory, options);
}

/**
 * Read and parse a JSON file
 */
export function read(path: string): Promise<JsonValue> {
  return defaultStore.read(path);
}

/**
 * Write data to a JSON file
 */
export function write(path: string, data: unknown, options?: WriteOptions): Promise<void> {
  return defaultStore.write(path, data, options);
}

/**
 * Shallow-merge updates into a JSON file
 */
export function update(
  path: string,
  updates: JsonObject,
  options?: UpdateOptions
): Promise<JsonObject> {
  return defaultStore.update(path, updates, options);
}

/**
 * Delete a JSON file; resolves false if it did not exist.
 * Also exported as `delete`.
 */
export function remove(path: string): Promise<boolean> {
  return defaultStore.delete(path);
}

export { remove as delete };

/**
 * Create a JSON file unless it already exists
 */
export function create(path: string, data?: unknown, options?: CreateOptions): Promise<boolean> {
  return defaultStore.create(path, data, options);
}

/**
 * Check that a file exists and holds valid JSON; never rejects
 */
export function exists(path: string): Promise<boolean> {
  return defaultStore.exists(path);
}
