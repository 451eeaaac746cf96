import { describe, it, expect } from 'vitest';
import {
  compareIssues,
  createIssue,
  dedupeAndSort,
  isRequiredIssue,
  issueType,
} from '../../src/core/issue.js';

describe('createIssue', () => {
  it('freezes the issue and its parts', () => {
    const issue = createIssue(['name'], 'Bad name.', { type: 'custom', name: 'naming' }, { value: 'X' });
    expect(Object.isFrozen(issue)).toBe(true);
    expect(Object.isFrozen(issue.path)).toBe(true);
    expect(Object.isFrozen(issue.context)).toBe(true);
  });

  it('copies the path it was given', () => {
    const path = ['resources', 0];
    const issue = createIssue(path, 'Bad.', { type: 'license' });
    path.push('name');
    expect(issue.path).toEqual(['resources', 0]);
  });
});

describe('issueType', () => {
  it('uses the keyword, check name or rule name', () => {
    expect(issueType(createIssue([], 'a', { type: 'standard', keyword: 'format' }))).toBe('format');
    expect(issueType(createIssue([], 'a', { type: 'recommendation', keyword: 'pattern' }))).toBe('pattern');
    expect(issueType(createIssue([], 'a', { type: 'custom', name: 'naming' }))).toBe('naming');
    expect(issueType(createIssue([], 'a', { type: 'primary-key' }))).toBe('primary-key');
    expect(issueType(createIssue([], 'a', { type: 'check-failure', name: 'naming' }))).toBe('check-failure');
  });
});

describe('isRequiredIssue', () => {
  it('covers required checks and the required keyword', () => {
    expect(isRequiredIssue(createIssue([], 'a', { type: 'required' }))).toBe(true);
    expect(isRequiredIssue(createIssue([], 'a', { type: 'standard', keyword: 'required' }))).toBe(true);
    expect(isRequiredIssue(createIssue([], 'a', { type: 'standard', keyword: 'type' }))).toBe(false);
  });
});

describe('dedupeAndSort', () => {
  it('sorts by path, then message', () => {
    const issues = [
      createIssue(['resources', 10], 'b', { type: 'license' }),
      createIssue(['resources', 2], 'z', { type: 'license' }),
      createIssue(['resources', 2], 'a', { type: 'license' }),
      createIssue([], 'root', { type: 'license' }),
    ];
    expect(dedupeAndSort(issues).map((issue) => [issue.path, issue.message])).toEqual([
      [[], 'root'],
      [['resources', 2], 'a'],
      [['resources', 2], 'z'],
      [['resources', 10], 'b'],
    ]);
  });

  it('keeps one issue per path and message, preferring the standard', () => {
    const custom = createIssue(['name'], 'Same.', { type: 'custom', name: 'naming' });
    const standard = createIssue(['name'], 'Same.', { type: 'standard', keyword: 'pattern' });
    const result = dedupeAndSort([custom, standard]);
    expect(result).toEqual([standard]);
    expect(dedupeAndSort([standard, custom])).toEqual([standard]);
  });

  it('is idempotent', () => {
    const issues = [
      createIssue(['b'], 'x', { type: 'enum' }),
      createIssue(['a'], 'x', { type: 'enum' }),
      createIssue(['a'], 'x', { type: 'enum' }),
    ];
    const once = dedupeAndSort(issues);
    expect(dedupeAndSort(once)).toEqual(once);
    expect(once).toHaveLength(2);
  });

  it('orders ties by source', () => {
    const a = createIssue([], 'm', { type: 'custom', name: 'alpha' });
    const b = createIssue([], 'm', { type: 'custom', name: 'beta' });
    expect(compareIssues(a, b)).toBeLessThan(0);
    expect(compareIssues(b, a)).toBeGreaterThan(0);
  });
});
