import { describe, it, expect } from 'vitest';
import { ConfigError } from '../../src/core/errors.js';
import { applyExclusions, createExclusion, isExcludedBy } from '../../src/core/exclusion.js';
import { createIssue } from '../../src/core/issue.js';

const missingTitle = createIssue(['resources', 0, 'title'], 'The `title` property is required but missing.', {
  type: 'required',
});
const badFormat = createIssue(['resources', 0, 'path'], 'Wrong format.', { type: 'standard', keyword: 'format' });
const badHomepage = createIssue(['homepage'], 'Wrong format.', { type: 'standard', keyword: 'format' });

describe('createExclusion', () => {
  it('needs a pattern or a type', () => {
    expect(() => createExclusion({})).toThrow(ConfigError);
  });

  it('rejects invalid patterns when created', () => {
    expect(() => createExclusion({ pattern: '$.a & $.b' })).toThrow(ConfigError);
  });

  it('defaults to the whole scope', () => {
    expect(createExclusion({ type: 'format' }).scope).toBe('whole');
  });
});

describe('isExcludedBy', () => {
  it('drops any issue at a matching path with the whole scope', () => {
    const exclusion = createExclusion({ pattern: '$.resources[*].*' });
    expect(isExcludedBy(missingTitle, exclusion)).toBe(true);
    expect(isExcludedBy(badFormat, exclusion)).toBe(true);
    expect(isExcludedBy(badHomepage, exclusion)).toBe(false);
  });

  it('drops only missing properties with the required scope', () => {
    const exclusion = createExclusion({ pattern: '$.resources[*].*', scope: 'required' });
    expect(isExcludedBy(missingTitle, exclusion)).toBe(true);
    expect(isExcludedBy(badFormat, exclusion)).toBe(false);
  });

  it('drops issues by type', () => {
    const exclusion = createExclusion({ type: 'format' });
    expect(isExcludedBy(badFormat, exclusion)).toBe(true);
    expect(isExcludedBy(badHomepage, exclusion)).toBe(true);
    expect(isExcludedBy(missingTitle, exclusion)).toBe(false);
  });

  it('requires both pattern and type when both are given', () => {
    const exclusion = createExclusion({ pattern: '$.homepage', type: 'format' });
    expect(isExcludedBy(badHomepage, exclusion)).toBe(true);
    expect(isExcludedBy(badFormat, exclusion)).toBe(false);
  });
});

describe('applyExclusions', () => {
  it('keeps the order of the remaining issues', () => {
    const issues = [badHomepage, missingTitle, badFormat];
    expect(applyExclusions(issues, [createExclusion({ pattern: '$.homepage' })])).toEqual([
      missingTitle,
      badFormat,
    ]);
    expect(applyExclusions(issues, [])).toEqual(issues);
  });
});
