import { describe, it, expect } from 'vitest';
import { checkForeignKeys, checkPrimaryKeys } from '../../src/core/key-checks.js';

function resource(name: string, fields: string[], extra: Record<string, unknown> = {}) {
  return {
    name,
    path: `${name}.csv`,
    schema: { fields: fields.map((field) => ({ name: field })), ...extra },
  };
}

describe('checkPrimaryKeys', () => {
  it('accepts keys naming declared fields', () => {
    const descriptor = {
      resources: [resource('sites', ['id'], { primaryKey: 'id' }), resource('counts', ['a', 'b'], { primaryKey: ['a', 'b'] })],
    };
    expect(checkPrimaryKeys(descriptor)).toEqual([]);
  });

  it('reports undeclared key fields once per resource', () => {
    const descriptor = {
      resources: [resource('people', ['name'], { primaryKey: ['id', 'name', 'code'] })],
    };
    const issues = checkPrimaryKeys(descriptor);
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatchObject({
      path: ['resources', 0, 'schema', 'primaryKey'],
      message: 'The primary key references fields not declared in the schema: `id`, `code`.',
      source: { type: 'primary-key' },
    });
  });

  it('skips resources whose schema is a path', () => {
    const descriptor = { resources: [{ name: 'people', path: 'people.csv', schema: 'people.schema.json' }] };
    expect(checkPrimaryKeys(descriptor)).toEqual([]);
  });
});

describe('checkForeignKeys', () => {
  it('accepts references to declared fields', () => {
    const descriptor = {
      resources: [
        resource('sites', ['id']),
        resource('counts', ['site_id', 'parent'], {
          foreignKeys: [
            { fields: 'site_id', reference: { resource: 'sites', fields: 'id' } },
            { fields: ['parent'], reference: { fields: ['site_id'] } },
          ],
        }),
      ],
    };
    expect(checkForeignKeys(descriptor)).toEqual([]);
  });

  it('collects missing local and remote fields into one issue', () => {
    const descriptor = {
      resources: [
        resource('sites', ['id']),
        resource('counts', ['site_id'], {
          foreignKeys: [
            { fields: 'site', reference: { resource: 'sites', fields: 'code' } },
            { fields: 'site_id', reference: { resource: '', fields: 'parent' } },
          ],
        }),
      ],
    };
    const issues = checkForeignKeys(descriptor);
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatchObject({
      path: ['resources', 1, 'schema', 'foreignKeys'],
      message: 'Foreign keys reference fields that are not declared: `site`, `sites.code`, `parent`.',
      source: { type: 'foreign-key' },
    });
  });

  it('reports unknown resources separately', () => {
    const descriptor = {
      resources: [
        resource('counts', ['site_id', 'x'], {
          foreignKeys: [
            { fields: 'site_id', reference: { resource: 'sites', fields: 'id' } },
            { fields: 'x', reference: { resource: 'species', fields: 'id' } },
          ],
        }),
      ],
    };
    const issues = checkForeignKeys(descriptor);
    expect(issues.map((issue) => issue.message)).toEqual([
      'Foreign keys reference resources that are not in the package: `sites`, `species`.',
    ]);
    expect(issues[0].path).toEqual(['resources', 0, 'schema', 'foreignKeys']);
  });
});
