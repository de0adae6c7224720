/**
 * JSON serialization with strict representability checks
 */

import type { JsonObject, JsonValue } from "./types.js";

export interface SerializeOptions {
  /** Spaces per indentation level; 0 produces compact output (default: 4) */
  indent?: number;
  /** Escape every non-ASCII code unit as \uXXXX (default: false) */
  escapeNonAscii?: boolean;
}

/**
 * Thrown by toJsonValue when a value has no JSON representation.
 * `pointer` is a JSON Pointer to the offending value.
 */
export class UnserializableValueError extends TypeError {
  constructor(
    readonly pointer: string,
    reason: string
  ) {
    super(`${reason} at ${pointer === "" ? "<root>" : pointer}`);
    this.name = "UnserializableValueError";
  }
}

const NON_ASCII = /[\u0080-\uffff]/g;

function escapeSegment(segment: string): string {
  return segment.replace(/~/g, "~0").replace(/\//g, "~1");
}

function hasToJSON(value: object): value is { toJSON(key: string): unknown } {
  return "toJSON" in value && typeof value.toJSON === "function";
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Type guard for plain JSON objects (not arrays, not null)
 */
export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value) && isPlainObject(value);
}

/**
 * Convert an arbitrary value into a JsonValue, rejecting anything JSON cannot represent
 * @throws UnserializableValueError for non-finite numbers, bigint, symbols, functions,
 *   undefined outside object properties, cycles and non-plain objects without toJSON
 */
export function toJsonValue(data: unknown): JsonValue {
  const seen = new WeakSet<object>();

  const normalize = (input: unknown, pointer: string, key: string): JsonValue => {
    const value =
      input !== null && typeof input === "object" && hasToJSON(input) ? input.toJSON(key) : input;

    switch (typeof value) {
      case "string":
      case "boolean":
        return value;
      case "number":
        if (!Number.isFinite(value)) {
          throw new UnserializableValueError(pointer, `Non-finite number ${value}`);
        }
        return value;
      case "bigint":
        throw new UnserializableValueError(pointer, "BigInt value");
      case "symbol":
        throw new UnserializableValueError(pointer, "Symbol value");
      case "function":
        throw new UnserializableValueError(pointer, "Function value");
    }

    if (typeof value !== "object") {
      throw new UnserializableValueError(pointer, "Undefined value");
    }
    if (value === null) {
      return null;
    }

    if (seen.has(value)) {
      throw new UnserializableValueError(pointer, "Circular reference");
    }
    seen.add(value);

    try {
      if (Array.isArray(value)) {
        const items: unknown[] = value;
        return items.map((item, i) => normalize(item, `${pointer}/${i}`, String(i)));
      }

      if (!isPlainObject(value)) {
        const name = value.constructor?.name ?? "Object";
        throw new UnserializableValueError(pointer, `Unsupported object type ${name}`);
      }

      const out: JsonObject = {};
      for (const [k, v] of Object.entries(value)) {
        // Absent optional keys are dropped, as JSON.stringify does
        if (v === undefined) continue;
        // defineProperty keeps an own "__proto__" key as data
        Object.defineProperty(out, k, {
          value: normalize(v, `${pointer}/${escapeSegment(k)}`, k),
          enumerable: true,
          writable: true,
          configurable: true,
        });
      }
      return out;
    } finally {
      seen.delete(value);
    }
  };

  return normalize(data, "", "");
}

/**
 * Serialize a value to JSON text with a trailing newline
 * @throws UnserializableValueError if the value is not JSON-representable
 */
export function serialize(data: unknown, options: SerializeOptions = {}): string {
  const { indent = 4, escapeNonAscii = false } = options;
  const text = JSON.stringify(toJsonValue(data), null, indent);

  if (!escapeNonAscii) {
    return text + "\n";
  }

  // Non-ASCII characters can only occur inside string literals
  return (
    text.replace(NON_ASCII, (ch) => `\\u${ch.charCodeAt(0).toString(16).padStart(4, "0")}`) + "\n"
  );
}

const TOKEN = /"(?:[^"\\]|\\.)*"|-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?/g;

/**
 * Find the first integer literal in valid JSON text that does not survive
 * conversion to a number (beyond 2^53, or too large to be finite)
 * @returns The literal as written, or undefined if every integer is exact
 */
export function findInexactInteger(text: string): string | undefined {
  for (const [token] of text.matchAll(TOKEN)) {
    if (token.startsWith('"') || /[.eE]/.test(token)) continue;
    const value = Number(token);
    if (!Number.isFinite(value) || BigInt(value) !== BigInt(token)) {
      return token;
    }
  }
  return undefined;
}

/**
 * Parse JSON text
 * @throws SyntaxError from JSON.parse
 */
export function parse(text: string): JsonValue {
  const value: JsonValue = JSON.parse(text);
  return value;
}
