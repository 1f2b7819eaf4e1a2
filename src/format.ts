import type { ChangeEntry, ChangeTuple } from './differ/types';
import { isPath } from './guards';

export type { ChangeTuple };

/**
 * Converts a change entry into its tuple form.
 */
export function toChangeTuple(change: ChangeEntry): ChangeTuple {
  switch (change.op) {
    case 'add':
      return ['+', change.path, change.value];
    case 'remove':
      return ['-', change.path, change.oldValue];
    case 'modify':
      return ['~', change.path, change.oldValue, change.value];
  }
}

export function toChangeTuples(
  changes: readonly ChangeEntry[]
): ChangeTuple[] {
  return changes.map(toChangeTuple);
}

/**
 * Converts a tuple back into a change entry.
 */
export function fromChangeTuple(tuple: ChangeTuple): ChangeEntry {
  switch (tuple[0]) {
    case '+':
      return { op: 'add', path: tuple[1], value: tuple[2] };
    case '-':
      return { op: 'remove', path: tuple[1], oldValue: tuple[2] };
    case '~':
      return { op: 'modify', path: tuple[1], oldValue: tuple[2], value: tuple[3] };
  }
}

/**
 * Type guard for tuples read from an untyped source (e.g. `JSON.parse`).
 *
 * @param value
 *   Unknown value to validate.
 * @returns
 *   `true` if `value` has a known opcode, a valid path, and the arity that
 *   opcode requires (3 for `+` / `-`, 4 for `~`).
 */
export function isChangeTuple(value: unknown): value is ChangeTuple {
  if (!Array.isArray(value) || !isPath(value[1])) return false;

  switch (value[0]) {
    case '+':
    case '-':
      return value.length === 3;
    case '~':
      return value.length === 4;
    default:
      return false;
  }
}
