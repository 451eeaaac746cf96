import type { Issue } from '../types/issue.js';
import { ConfigError } from './errors.js';
import { isRequiredIssue, issueType } from './issue.js';
import { matches, parsePathPattern } from './path-pattern.js';
import type { PathPattern } from './path-pattern.js';

/** `whole` drops every issue at a matching path; `required` only missing-property issues. */
export type ExclusionScope = 'whole' | 'required';

export interface ExclusionOptions {
  /** Path pattern of the issues to drop, e.g. `$.resources[*].description`. */
  pattern?: string;
  scope?: ExclusionScope;
  /** Issue type to drop (a schema keyword such as `format`, a rule name, or a custom check name). */
  type?: string;
}

export interface Exclusion {
  readonly pattern?: PathPattern;
  readonly scope: ExclusionScope;
  readonly type?: string;
}

export function createExclusion(options: ExclusionOptions): Exclusion {
  if (options.pattern === undefined && options.type === undefined) {
    throw new ConfigError('An exclusion needs a pattern, a type, or both.');
  }
  const scope = options.scope ?? 'whole';
  if (scope !== 'whole' && scope !== 'required') {
    throw new ConfigError(`Unknown exclusion scope "${String(scope)}"; use "whole" or "required".`);
  }
  return Object.freeze({
    pattern: options.pattern === undefined ? undefined : parsePathPattern(options.pattern),
    scope,
    type: options.type,
  });
}

/** Every condition the exclusion sets must hold for the issue to be dropped. */
export function isExcludedBy(issue: Issue, exclusion: Exclusion): boolean {
  if (exclusion.pattern && !matches(exclusion.pattern, issue.path)) return false;
  if (exclusion.scope === 'required' && !isRequiredIssue(issue)) return false;
  if (exclusion.type !== undefined && issueType(issue) !== exclusion.type) return false;
  return true;
}

export function applyExclusions(issues: readonly Issue[], exclusions: readonly Exclusion[]): Issue[] {
  if (exclusions.length === 0) return [...issues];
  return issues.filter((issue) => !exclusions.some((exclusion) => isExcludedBy(issue, exclusion)));
}
