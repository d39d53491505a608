import { isJsonObject, type FlagMap, type JsonObject, type JsonValue, type RelationMap } from '../../types';

const URL_SUFFIX = /_url$/;
const FLAG_PREFIX = /^has_/;

/**
 * Builds the relation map of an API object
 *
 * `main` holds the object's own canonical `url`; every `*_url` field is added
 * under its name with the suffix removed. Non-string values (GitHub sends
 * `null` for some optional links) are skipped.
 *
 * @example
 * ```typescript
 * buildRelations({ url: 'https://api.github.com/orgs/acme', repos_url: '.../repos' });
 * // → { main: 'https://api.github.com/orgs/acme', repos: '.../repos' }
 * ```
 */
export function buildRelations(object: JsonObject): RelationMap {
  const urls: RelationMap = {};
  if (typeof object.url === 'string') {
    urls.main = object.url;
  }
  for (const [key, value] of Object.entries(object)) {
    if (URL_SUFFIX.test(key) && typeof value === 'string') {
      urls[key.replace(URL_SUFFIX, '')] = value;
    }
  }
  return urls;
}

/**
 * Splits a repository object into plain fields and `has_*` flags
 *
 * `*_url` fields belong to the relation map and `has_*` fields to the flags,
 * so neither is kept among the plain fields. Flag values are coerced with
 * JavaScript truthiness.
 */
export function splitFlags(object: JsonObject): { fields: JsonObject; has: FlagMap } {
  const fields: JsonObject = {};
  const has: FlagMap = {};
  for (const [key, value] of Object.entries(object)) {
    if (FLAG_PREFIX.test(key)) {
      has[key.replace(FLAG_PREFIX, '')] = Boolean(value);
    } else if (!URL_SUFFIX.test(key)) {
      fields[key] = value;
    }
  }
  return { fields, has };
}

/**
 * Keeps the elements of a collection response that are objects
 *
 * Anything other than an array (including `null` from a failed request)
 * yields an empty list.
 */
export function objectElements(body: JsonValue): JsonObject[] {
  if (!Array.isArray(body)) return [];
  return body.filter(isJsonObject);
}
