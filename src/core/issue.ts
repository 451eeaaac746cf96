import type { Path } from '@dpcheck/schema';
import type { Issue, IssueContext, IssueSource, IssueSourceType } from '../types/issue.js';
import { comparePaths } from './path.js';

export function createIssue(
  path: Path,
  message: string,
  source: IssueSource,
  context: IssueContext = {},
): Issue {
  return Object.freeze({
    path: Object.freeze([...path]),
    message,
    source: Object.freeze({ ...source }),
    context: Object.freeze({ ...context }),
  });
}

/**
 * Short name of the rule behind an issue, as used by `Exclusion.type`:
 * the schema keyword, the built-in rule name, or the custom check name.
 */
export function issueType(issue: Issue): string {
  switch (issue.source.type) {
    case 'standard':
    case 'recommendation':
      return issue.source.keyword;
    case 'custom':
      return issue.source.name;
    default:
      return issue.source.type;
  }
}

/** Missing-property findings, whether from the standard schema or a RequiredCheck. */
export function isRequiredIssue(issue: Issue): boolean {
  return issueType(issue) === 'required';
}

const SOURCE_RANK: Record<IssueSourceType, number> = {
  standard: 0,
  enum: 1,
  license: 2,
  recommendation: 3,
  required: 4,
  'primary-key': 5,
  'foreign-key': 6,
  custom: 7,
  'check-failure': 8,
};

function sourceName(source: IssueSource): string {
  switch (source.type) {
    case 'standard':
    case 'recommendation':
      return source.keyword;
    case 'custom':
    case 'check-failure':
      return source.name;
    default:
      return '';
  }
}

export function compareIssues(a: Issue, b: Issue): number {
  const byPath = comparePaths(a.path, b.path);
  if (byPath !== 0) return byPath;
  if (a.message !== b.message) return a.message < b.message ? -1 : 1;
  const byRank = SOURCE_RANK[a.source.type] - SOURCE_RANK[b.source.type];
  if (byRank !== 0) return byRank;
  const aName = sourceName(a.source);
  const bName = sourceName(b.source);
  if (aName === bName) return 0;
  return aName < bName ? -1 : 1;
}

export function isSameIssue(a: Issue, b: Issue): boolean {
  return comparePaths(a.path, b.path) === 0 && a.message === b.message;
}

/**
 * Sort and drop issues repeating an earlier `(path, message)`. Sorting
 * first makes the surviving duplicate independent of evaluator order.
 */
export function dedupeAndSort(issues: readonly Issue[]): Issue[] {
  const sorted = [...issues].sort(compareIssues);
  const result: Issue[] = [];
  for (const issue of sorted) {
    const previous = result[result.length - 1];
    if (previous && isSameIssue(previous, issue)) continue;
    result.push(issue);
  }
  return result;
}
