import type { Descriptor } from '@dpcheck/schema';

type JsonObject = Record<string, unknown>;

/** A field definition, e.g. `exampleField('count', 'integer')`. */
export function exampleField(name: string, type = 'string', extra: JsonObject = {}): JsonObject {
  return { name, type, ...extra };
}

/** A tabular resource with inline schema, backed by a CSV path. */
export function exampleResource(name: string, extra: JsonObject = {}): JsonObject {
  return {
    name,
    path: `data/${name}.csv`,
    format: 'csv',
    mediatype: 'text/csv',
    schema: {
      fields: [exampleField('id', 'integer'), exampleField('site'), exampleField('observed_on', 'date')],
      primaryKey: ['id'],
    },
    ...extra,
  };
}

/** A complete descriptor that passes both the standard and strict checks. */
export function exampleDescriptor(extra: JsonObject = {}): Descriptor {
  return {
    $schema: 'https://datapackage.org/profiles/2.0/datapackage.json',
    name: 'coastal-bird-survey',
    id: 'urn:example:coastal-bird-survey',
    title: 'Coastal bird survey',
    description: 'Monthly counts of shorebirds at three estuary sites.',
    version: '1.2.0',
    created: '2024-05-01T09:30:00Z',
    homepage: 'https://example.org/coastal-bird-survey',
    licenses: [{ name: 'CC-BY-4.0', path: 'https://creativecommons.org/licenses/by/4.0/', title: 'Creative Commons Attribution 4.0' }],
    contributors: [{ title: 'Field Team North', roles: ['creator'] }],
    sources: [{ title: 'Estuary monitoring programme' }],
    resources: [
      exampleResource('sites', {
        schema: {
          fields: [exampleField('id', 'integer'), exampleField('site'), exampleField('latitude', 'number')],
          primaryKey: 'id',
        },
      }),
      exampleResource('counts', {
        schema: {
          fields: [
            exampleField('id', 'integer'),
            exampleField('site_id', 'integer'),
            exampleField('species'),
            exampleField('count', 'integer', { constraints: { minimum: 0 } }),
          ],
          primaryKey: ['id'],
          foreignKeys: [{ fields: 'site_id', reference: { resource: 'sites', fields: 'id' } }],
        },
      }),
    ],
    ...extra,
  };
}
