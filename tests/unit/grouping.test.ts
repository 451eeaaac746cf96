import { describe, it, expect } from 'vitest';
import { validateAgainstStandard } from '@dpcheck/schema';
import type { Descriptor } from '@dpcheck/schema';
import { groupViolations } from '../../src/core/grouping.js';

function standardIssues(descriptor: Descriptor) {
  return groupViolations(validateAgainstStandard(descriptor, 'v2'), { origin: 'standard', version: 'v2' });
}

function summary(descriptor: Descriptor) {
  return standardIssues(descriptor).map((issue) => ({
    path: issue.path,
    message: issue.message,
    source: issue.source,
  }));
}

const birds = { name: 'birds', path: 'birds.csv' };

function withField(field: unknown): Descriptor {
  return { resources: [{ ...birds, schema: { fields: [field] } }] };
}

describe('groupViolations', () => {
  it('describes plain keyword failures', () => {
    expect(summary({ resources: [] })).toEqual([
      { path: ['resources'], message: 'The list must have at least 1 item.', source: { type: 'standard', keyword: 'minItems' } },
    ]);
    expect(summary({ resources: [birds], homepage: 5 })).toEqual([
      { path: ['homepage'], message: 'The value must be of type string.', source: { type: 'standard', keyword: 'type' } },
    ]);
    expect(summary({ resources: [{ ...birds, bytes: -1 }] })).toEqual([
      { path: ['resources', 0, 'bytes'], message: 'The value must be >= 0.', source: { type: 'standard', keyword: 'minimum' } },
    ]);
  });

  it('places missing properties at the property itself', () => {
    expect(summary({ resources: [{ path: 'birds.csv' }] })).toEqual([
      {
        path: ['resources', 0, 'name'],
        message: 'The `name` property is required but missing.',
        source: { type: 'standard', keyword: 'required' },
      },
    ]);
  });

  it('names every accepted type', () => {
    expect(summary({ resources: [{ name: 'birds', path: 5 }] })).toEqual([
      {
        path: ['resources', 0, 'path'],
        message: 'The value must be of type string or array.',
        source: { type: 'standard', keyword: 'type' },
      },
    ]);
  });

  it('quotes the value and pattern of pattern failures', () => {
    expect(summary({ resources: [birds], licenses: [{ name: 'CC BY' }] })).toEqual([
      {
        path: ['licenses', 0, 'name'],
        message: 'The value `CC BY` does not match the pattern `^([-a-zA-Z0-9._])+$`.',
        source: { type: 'standard', keyword: 'pattern' },
      },
    ]);
  });

  it('collapses a license without name or path into one license issue', () => {
    const issues = standardIssues({ resources: [birds], licenses: [{ title: 'Open' }, { title: 'Closed' }] });
    expect(issues.map((issue) => [issue.path, issue.message, issue.source.type])).toEqual([
      [['licenses', 0], 'A license must have at least one of `name` or `path`.', 'license'],
      [['licenses', 1], 'A license must have at least one of `name` or `path`.', 'license'],
    ]);
    expect(issues[0].context.missing).toEqual(['name', 'path']);
  });

  it('collapses missing alternatives into one required issue', () => {
    expect(summary({ resources: [{ name: 'birds' }] })).toEqual([
      {
        path: ['resources', 0],
        message: 'At least one of `data` or `path` is required.',
        source: { type: 'standard', keyword: 'required' },
      },
    ]);
  });

  it('reports alternatives that must not appear together', () => {
    expect(summary({ resources: [{ ...birds, data: [] }] })).toEqual([
      {
        path: ['resources', 0],
        message: 'Only one of `data` or `path` may be present.',
        source: { type: 'standard', keyword: 'oneOf' },
      },
    ]);
  });

  it('collapses an unknown field type into one enum issue', () => {
    const issues = standardIssues(withField({ name: 'x', type: 'text' }));
    expect(issues).toHaveLength(1);
    expect(issues[0].path).toEqual(['resources', 0, 'schema', 'fields', 0, 'type']);
    expect(issues[0].source).toEqual({ type: 'enum' });
    expect(issues[0].message).toBe(
      'The value `text` is not one of the allowed values: `any`, `array`, `boolean`, `date`, `datetime`, ' +
        '`duration`, `geojson`, `geopoint`, `integer`, `list`, `number`, `object`, `string`, `time`, `year`, `yearmonth`.',
    );
    expect(issues[0].context.discriminator).toBe('type');
  });

  it('reports only the failures of the field type that was given', () => {
    expect(summary(withField({ name: 'n', type: 'integer', format: 'email' }))).toEqual([
      {
        path: ['resources', 0, 'schema', 'fields', 0, 'format'],
        message: 'The value `email` is not one of the allowed values: `default`.',
        source: { type: 'enum' },
      },
    ]);
  });

  it('summarizes a value no alternative accepts the type of', () => {
    expect(summary(withField('id'))).toEqual([
      {
        path: ['resources', 0, 'schema', 'fields', 0],
        message: 'The value must be of type object.',
        source: { type: 'standard', keyword: 'type' },
      },
    ]);
  });

  it('keeps the origin of recommendation failures', () => {
    const issues = groupViolations(validateAgainstStandard({ resources: [birds] }, 'v2', 'recommended'), {
      origin: 'recommendation',
      version: 'v2',
    });
    expect(issues.map((issue) => [issue.path, issue.source])).toEqual([
      [['name'], { type: 'recommendation', keyword: 'required' }],
      [['id'], { type: 'recommendation', keyword: 'required' }],
      [['licenses'], { type: 'recommendation', keyword: 'required' }],
    ]);
  });

  it('records the standard version in the context', () => {
    const [issue] = standardIssues({ resources: [] });
    expect(issue.context).toMatchObject({ keyword: 'minItems', schemaPath: '#/properties/resources/minItems', version: 'v2' });
  });
});
