import type { Descriptor, Path } from '@dpcheck/schema';
import type { IssueContext } from '../types/issue.js';
import { parsePathPattern, select } from './path-pattern.js';
import type { Match } from './path-pattern.js';

/** What a custom check reports; the registry turns each finding into an issue. */
export interface CustomFinding {
  readonly path: Path;
  readonly message: string;
  readonly context?: IssueContext;
}

export interface CustomCheck {
  /** Unique among the configured checks; also the issue type used by exclusions. */
  readonly name: string;
  apply(descriptor: Descriptor): readonly CustomFinding[];
}

export interface FieldCheckOptions {
  name: string;
  /** Path pattern of the values to test, e.g. `$.resources[*].name`. */
  target: string;
  message: string | ((match: Match) => string);
  /** Returns true when the value is acceptable. */
  check: (value: unknown, match: Match) => boolean;
}

/**
 * Build a check that tests every value the target pattern selects and
 * reports the ones the predicate rejects.
 */
export function fieldCheck(options: FieldCheckOptions): CustomCheck {
  const pattern = parsePathPattern(options.target);
  const describe = (match: Match) =>
    typeof options.message === 'function' ? options.message(match) : options.message;

  return Object.freeze({
    name: options.name,
    apply(descriptor: Descriptor): CustomFinding[] {
      return select(pattern, descriptor)
        .filter((match) => !options.check(match.value, match))
        .map((match) => ({
          path: match.path,
          message: describe(match),
          context: { target: options.target, value: match.value },
        }));
    },
  });
}
