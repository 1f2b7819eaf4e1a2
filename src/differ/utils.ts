import type { ChangeEntry, Expansion, Path } from './types';

/**
 * Factory function to construct a `ChangeModify` entry.
 *
 * @param path - The location of the changed value.
 * @param oldValue - The value in the previous state.
 * @param value - The value in the current state.
 * @returns A structured modification entry.
 */
export function createModify(
  path: Path,
  oldValue: unknown,
  value: unknown
): ChangeEntry {
  return { op: 'modify', path, oldValue, value };
}

/**
 * Factory function to construct a `ChangeAdd` entry.
 *
 * @param path - The location of the new value.
 * @param value - The value that was added.
 * @returns A structured addition entry.
 */
export function createAdd(path: Path, value: unknown): ChangeEntry {
  return { op: 'add', path, value };
}

/**
 * Factory function to construct a `ChangeRemove` entry.
 *
 * @param path - The location of the removed value.
 * @param oldValue - The value that was removed.
 * @returns A structured removal entry.
 */
export function createRemove(path: Path, oldValue: unknown): ChangeEntry {
  return { op: 'remove', path, oldValue };
}

/**
 * Wraps final entries as a completed {@link Expansion}.
 */
export function done(changes: ChangeEntry[]): Expansion {
  return { kind: 'done', changes };
}
