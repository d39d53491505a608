/**
 * Core type definitions for stance-github
 *
 * @module types
 */

/**
 * Utility type representing a value that may be null
 */
export type Maybe<T> = T | null;

/**
 * Any value the JSON codec can produce
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | JsonObject;

/**
 * A decoded JSON object, as returned by most GitHub endpoints
 */
export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * Relation name to URL, taken from the `*_url` fields of an API object
 *
 * The object's own canonical `url` is stored under `main`; every other entry
 * is the field name with its `_url` suffix removed (`repos_url` → `repos`).
 * URLs may still carry RFC 6570 template fragments such as `{/number}`.
 */
export type RelationMap = Record<string, string>;

/**
 * Boolean capability flags of a repository, keyed by the `has_` suffix
 * (`has_issues` → `issues`)
 */
export type FlagMap = Record<string, boolean>;

/**
 * Fetch-compatible transport used by the client
 *
 * Defaults to the global `fetch`; tests substitute a double.
 */
export type Transport = (input: string, init: RequestInit) => Promise<Response>;

/**
 * Sink for request/response traces written in debug mode
 */
export type TraceSink = (chunk: string) => void;

/**
 * Type guard for a decoded JSON object (not an array, not null)
 */
export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
