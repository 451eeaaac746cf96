import { isRecord } from '@dpcheck/schema';
import type { Descriptor } from '@dpcheck/schema';
import type { Issue } from '../types/issue.js';
import type { CustomCheck, CustomFinding } from './custom-check.js';
import { CheckExecutionError, ConfigError } from './errors.js';
import { createIssue } from './issue.js';
import { formatPath, isReachable } from './path.js';

/** Issue types produced by the built-in rules; custom checks can't take these names. */
export const RESERVED_CHECK_NAMES: readonly string[] = [
  'required',
  'primary-key',
  'foreign-key',
  'enum',
  'license',
  'check-failure',
];

/**
 * `isolate` replaces the findings of a failing check with one
 * `check-failure` issue and keeps going; `abort` rethrows the failure as a
 * CheckExecutionError.
 */
export type CheckFailurePolicy = 'isolate' | 'abort';

export interface Registry {
  readonly checks: readonly CustomCheck[];
  run(descriptor: Descriptor, policy?: CheckFailurePolicy): Issue[];
}

function failureIssue(error: CheckExecutionError): Issue {
  return createIssue([], error.message, { type: 'check-failure', name: error.checkName }, {
    error: error.cause instanceof Error ? error.cause.message : String(error.cause),
  });
}

function isPathSegment(value: unknown): value is string | number {
  return typeof value === 'string' || (typeof value === 'number' && Number.isInteger(value) && value >= 0);
}

function isFinding(value: unknown): value is CustomFinding {
  return (
    isRecord(value) &&
    Array.isArray(value.path) &&
    value.path.every(isPathSegment) &&
    typeof value.message === 'string' &&
    (value.context === undefined || isRecord(value.context))
  );
}

/** The reason a check's output can't be used, or undefined when every finding is sound. */
function findingsProblem(descriptor: Descriptor, findings: unknown): Error | undefined {
  if (!Array.isArray(findings)) {
    return new TypeError('it did not return a list of findings');
  }
  for (const [index, finding] of findings.entries()) {
    if (!isFinding(finding)) {
      return new TypeError(`finding ${index} is not a {path, message} object`);
    }
    if (!isReachable(descriptor, finding.path)) {
      return new RangeError(`it reported ${formatPath(finding.path)}, which is not in the descriptor`);
    }
  }
  return undefined;
}

function findingIssue(check: CustomCheck, finding: CustomFinding): Issue {
  return createIssue(finding.path, finding.message, { type: 'custom', name: check.name }, finding.context);
}

export function createRegistry(checks: readonly CustomCheck[]): Registry {
  const seen = new Set<string>();
  for (const check of checks) {
    if (typeof check.name !== 'string' || check.name.length === 0) {
      throw new ConfigError('Every custom check needs a non-empty name.');
    }
    if (RESERVED_CHECK_NAMES.includes(check.name)) {
      throw new ConfigError(`The custom check name "${check.name}" is reserved for a built-in rule.`);
    }
    if (seen.has(check.name)) {
      throw new ConfigError(`The custom check name "${check.name}" is used more than once.`);
    }
    seen.add(check.name);
  }

  const frozen = Object.freeze([...checks]);

  return Object.freeze({
    checks: frozen,
    run(descriptor: Descriptor, policy: CheckFailurePolicy = 'isolate'): Issue[] {
      const issues: Issue[] = [];
      const fail = (error: CheckExecutionError) => {
        if (policy === 'abort') throw error;
        issues.push(failureIssue(error));
      };

      for (const check of frozen) {
        let findings: readonly CustomFinding[];
        try {
          findings = check.apply(descriptor);
        } catch (err) {
          fail(new CheckExecutionError(check.name, err));
          continue;
        }

        const problem = findingsProblem(descriptor, findings);
        if (problem) {
          fail(new CheckExecutionError(check.name, problem));
          continue;
        }
        for (const finding of findings) {
          issues.push(findingIssue(check, finding));
        }
      }
      return issues;
    },
  });
}
