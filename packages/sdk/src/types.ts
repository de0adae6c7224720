/**
 * Core types for autojson
 */

/**
 * Any value JSON can represent
 */
export type JsonValue = null | boolean | number | string | JsonValue[] | JsonObject;

/**
 * A JSON object (mapping of string keys to JSON values)
 */
export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * Result of a bulk directory load: file stem → parsed document
 */
export type JsonFileMap = Record<string, JsonValue>;

/**
 * Configuration options for opening a store
 */
export interface StoreOptions {
  /** Base directory for relative paths (default: process.cwd() at call time) */
  cwd?: string;
  /** Number of spaces for JSON indentation (default: 4) */
  indent?: number;
  /** Escape non-ASCII characters as \uXXXX when writing (default: false) */
  escapeNonAscii?: boolean;
}

/**
 * Options for bulk loading a directory
 */
export interface AutoOptions {
  /** Descend into subdirectories (default: true) */
  recursive?: boolean;
  /** Create the directory when missing and return an empty map (default: false) */
  createIfNotExists?: boolean;
}

/**
 * Options for write operations
 */
export interface WriteOptions {
  /** Number of spaces for indentation; 0 for compact output (default: store indent) */
  indent?: number;
  /** Escape non-ASCII characters (default: store setting) */
  escapeNonAscii?: boolean;
  /** Create missing parent directories (default: true) */
  createDirs?: boolean;
}

/**
 * Options for update operations
 */
export interface UpdateOptions {
  /** Start from an empty object when the file is missing (default: false) */
  createIfNotExists?: boolean;
}

/**
 * Options for create operations
 */
export interface CreateOptions {
  /** Replace an existing file (default: false) */
  overwrite?: boolean;
  /** Number of spaces for indentation (default: store indent) */
  indent?: number;
  /** Escape non-ASCII characters (default: store setting) */
  escapeNonAscii?: boolean;
}

/**
 * JSON file store
 *
 * Every operation resolves its path afresh and keeps no state between calls.
 */
export interface JSONFileStore {
  /**
   * Load every .json file in a directory, keyed by file stem
   * @param directory - Directory to scan (default: ".")
   * @throws JSONFileError if the directory is missing and createIfNotExists is not set,
   *   or a file cannot be read
   * @throws JSONValidationError if a file is not valid JSON
   */
  auto(directory?: string, options?: AutoOptions): Promise<JsonFileMap>;

  /**
   * Read and parse a JSON file
   * @throws JSONFileError if the file is missing or unreadable
   * @throws JSONValidationError if the content is not valid JSON
   */
  read(path: string): Promise<JsonValue>;

  /**
   * Serialize data and write it to a file, replacing any existing content
   * @throws JSONError if data is not JSON-serializable
   * @throws JSONFileError on I/O failure
   */
  write(path: string, data: unknown, options?: WriteOptions): Promise<void>;

  /**
   * Shallow-merge updates into the object stored at path.
   * Existing content that is not a JSON object is discarded.
   * @returns The merged object as written
   */
  update(path: string, updates: JsonObject, options?: UpdateOptions): Promise<JsonObject>;

  /**
   * Delete a file
   * @returns true if the file was deleted, false if it did not exist
   */
  delete(path: string): Promise<boolean>;

  /**
   * Create a file holding data (default: {})
   * @returns false without writing if the file exists and overwrite is not set
   */
  create(path: string, data?: unknown, options?: CreateOptions): Promise<boolean>;

  /**
   * Check that a file exists and holds valid JSON. Never rejects:
   * not-found, permission-denied and parse failures all yield false.
   */
  exists(path: string): Promise<boolean>;
}
