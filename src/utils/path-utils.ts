import type { Path, PathSegment } from '../differ/types';

/**
 * Appends a keyed-container key to a path.
 *
 * String mode:
 * - empty prefix → the bare key (`"a"`)
 * - otherwise    → `prefix + delimiter + key` (`"a.b"`)
 *
 * Token mode:
 * - a new array with the key appended as a raw token. The key keeps its
 *   native type, so `Map` keys such as `1` or `true` can be used to index back
 *   into the original structure.
 *
 * The mode is decided by the prefix itself; option validation guarantees the
 * prefix of a run matches `arrayPath`.
 *
 * @param prefix - Path of the parent container.
 * @param key - The record or `Map` key.
 * @param delimiter - Separator used in string mode.
 * @returns The path of the child.
 */
export function appendKey(
  prefix: Path,
  key: PathSegment,
  delimiter: string
): Path {
  if (typeof prefix !== 'string') return [...prefix, key];

  const segment = String(key);
  return prefix === '' ? segment : `${prefix}${delimiter}${segment}`;
}

/**
 * Appends a sequence index to a path.
 *
 * String mode never puts the delimiter before the bracket: `"a[2]"`, and a
 * root-level index is just `"[2]"`.
 */
export function appendIndex(prefix: Path, index: number): Path {
  return typeof prefix === 'string' ? `${prefix}[${index}]` : [...prefix, index];
}

/**
 * Formats a path for messages and debug output.
 *
 * - string paths are returned as-is; the root (`""`) reads `<root>`.
 * - token paths render as a bracketed token list, quoting string keys so
 *   `"1"` and `1` stay distinguishable (e.g. `["items", 1, "id"]`).
 *
 * @param path - The path to format.
 * @returns A human-readable rendering of `path`.
 */
export function describePath(path: Path): string {
  if (typeof path === 'string') return path === '' ? '<root>' : path;

  const tokens = path.map(segment =>
    typeof segment === 'string' ? JSON.stringify(segment) : String(segment)
  );
  return `[${tokens.join(', ')}]`;
}
