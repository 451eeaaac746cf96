import { isRecord } from '@dpcheck/schema';
import type { Descriptor } from '@dpcheck/schema';
import type { Issue } from '../types/issue.js';
import { ConfigError } from './errors.js';
import { createIssue } from './issue.js';
import { parsePathPattern, select } from './path-pattern.js';
import type { PathPattern, SegmentMatcher } from './path-pattern.js';

export interface RequiredCheckOptions {
  /**
   * Properties to require. The last segment names them; `|` separates
   * alternative sets, e.g. `$.resources[*]['path', 'format'] | $.resources[*].data`.
   */
  target: string;
  message?: string;
}

export interface RequiredCheck {
  readonly target: string;
  readonly message?: string;
  readonly base: PathPattern;
  /** Property sets; the check passes when any one of them is fully present. */
  readonly alternatives: readonly (readonly string[])[];
}

function sameMatchers(a: readonly SegmentMatcher[], b: readonly SegmentMatcher[]): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}

function propertyNames(target: string, matchers: readonly SegmentMatcher[]): string[] {
  const last = matchers[matchers.length - 1];
  if (matchers[matchers.length - 2]?.kind === 'descendants') {
    throw new ConfigError(
      `Cannot use the path "${target}" in a required check because it ends in the recursive descent (\`..\`) operator.`,
    );
  }
  const names = last.kind === 'keys' ? last.keys : [];
  if (names.length === 0 || names.some((key) => typeof key !== 'string')) {
    throw new ConfigError(
      `Cannot use the path "${target}" in a required check because it doesn't end in a property name.`,
    );
  }
  return names.map(String);
}

export function createRequiredCheck(options: RequiredCheckOptions): RequiredCheck {
  const pattern = parsePathPattern(options.target);

  // `$` on its own names the descriptor itself, which is always present
  if (pattern.alternatives.some((matchers) => matchers.length === 0)) {
    return Object.freeze({
      target: options.target,
      message: options.message,
      base: parsePathPattern('$'),
      alternatives: [],
    });
  }

  const bases = pattern.alternatives.map((matchers) => matchers.slice(0, -1));
  if (bases.some((base) => !sameMatchers(base, bases[0]))) {
    throw new ConfigError(
      `The alternatives in the required check "${options.target}" must all point into the same parent location.`,
    );
  }

  const alternatives = pattern.alternatives.map((matchers) =>
    Object.freeze(propertyNames(options.target, matchers)),
  );

  return Object.freeze({
    target: options.target,
    message: options.message,
    base: Object.freeze({ source: options.target, alternatives: [bases[0]] }),
    alternatives: Object.freeze(alternatives),
  });
}

function isPresent(record: Readonly<Record<string, unknown>>, name: string): boolean {
  return Object.hasOwn(record, name) && record[name] !== undefined && record[name] !== null;
}

function formatSet(names: readonly string[]): string {
  return `{${names.join(', ')}}`;
}

function formatNames(names: readonly string[]): string {
  return names.map((name) => `\`${name}\``).join(', ');
}

function compareMissing(a: readonly string[], b: readonly string[]): number {
  if (a.length !== b.length) return a.length - b.length;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return a[i] < b[i] ? -1 : 1;
  }
  return 0;
}

export function applyRequiredCheck(check: RequiredCheck, descriptor: Descriptor): Issue[] {
  if (check.alternatives.length === 0) return [];

  const issues: Issue[] = [];
  for (const base of select(check.base, descriptor)) {
    const { value } = base;
    if (!isRecord(value)) continue;

    const results = check.alternatives.map((names) => ({
      names,
      missing: names.filter((name) => !isPresent(value, name)).sort(),
    }));
    if (results.some((result) => result.missing.length === 0)) continue;

    if (results.length === 1) {
      for (const name of results[0].missing) {
        issues.push(
          createIssue(
            [...base.path, name],
            check.message ?? `The \`${name}\` property is required but missing.`,
            { type: 'required' },
            { target: check.target, missing: [name] },
          ),
        );
      }
      continue;
    }

    const closest = [...results].sort((a, b) => compareMissing(a.missing, b.missing))[0];
    const options = check.alternatives.map(formatSet).join(' or ');
    issues.push(
      createIssue(
        base.path,
        check.message ??
          `None of the required property sets ${options} is complete; the closest one is missing ${formatNames(closest.missing)}.`,
        { type: 'required' },
        {
          target: check.target,
          missing: closest.missing,
          alternatives: check.alternatives,
        },
      ),
    );
  }
  return issues;
}
