import type { ComparisonOptions } from '../../options';
import { type ChangeTuple, toChangeTuples } from '../../format';
import type { ChangeEntry, Comparator } from '../types';
import { diff } from '..';

/**
 * A scenario payload, or a builder for rows that need fresh references
 * (cycles, `Map`s, deep nests).
 */
export type ScenarioInput<T> = T | (() => T);

/**
 * One row of a table-driven suite, named by `id` and `description` in the
 * test title.
 */
export type TestScenario<TInput = unknown, TExpected = unknown> = {
  id: string;
  description: string;
  input: ScenarioInput<TInput>;
  expected: TExpected;
};

/**
 * Calls a builder input; returns any other input unchanged.
 */
export function resolveScenarioInput<T>(input: ScenarioInput<T>): T {
  if (typeof input === 'function') {
    return (input as () => T)();
  }
  return input;
}

/**
 * Diff Input
 * Represents the input payload for a diff test.
 */
export type DiffInput = {
  /**
   * The base structure (previous state).
   */
  previous: unknown;

  /**
   * The updated structure (current state).
   */
  current: unknown;

  /**
   * Optional per-scenario overrides for diff configuration.
   */
  options?: ComparisonOptions;

  /**
   * Optional custom comparator for the scenario.
   */
  comparator?: Comparator;
};

/**
 * Diff Runner
 * Represents a configured diff execution function used in tests.
 */
export type DiffRunner = (input: DiffInput) => ChangeEntry[];

/**
 * Tuple Runner
 * Same as {@link DiffRunner}, returning the `['+' | '-' | '~', ...]` form.
 */
export type TupleRunner = (input: DiffInput) => ChangeTuple[];

/**
 * Creates a diff runner with a fixed set of base options.
 *
 * Per-scenario options (if provided) are merged first, so the base options win.
 * This ensures each suite can enforce its intended configuration explicitly.
 *
 * @param baseOptions - The configuration to apply for all runs of this runner.
 * @returns A diff runner that applies the base options on every call.
 */
export function createDiffRunner(
  baseOptions: ComparisonOptions = {}
): DiffRunner {
  return (input: DiffInput) =>
    diff(
      input.previous,
      input.current,
      { ...input.options, ...baseOptions },
      input.comparator
    );
}

/**
 * Creates a runner that reports results as change tuples.
 */
export function createTupleRunner(
  baseOptions: ComparisonOptions = {}
): TupleRunner {
  const run = createDiffRunner(baseOptions);
  return (input: DiffInput) => toChangeTuples(run(input));
}

/**
 * Creates a tuple runner for sequences compared with the subsequence matcher.
 *
 * @returns A runner configured with `useLcs: true`.
 */
export function createLcsRunner(): TupleRunner {
  return createTupleRunner({ useLcs: true });
}

/**
 * Creates a tuple runner for sequences compared position by position.
 *
 * @returns A runner configured with `useLcs: false`.
 */
export function createLinearRunner(): TupleRunner {
  return createTupleRunner({ useLcs: false });
}
