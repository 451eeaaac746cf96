import { isRecord } from '@dpcheck/schema';
import type { Descriptor } from '@dpcheck/schema';
import type { Issue } from '../types/issue.js';
import { createIssue } from './issue.js';

interface ResourceEntry {
  index: number;
  name?: string;
  schema?: Readonly<Record<string, unknown>>;
}

function resourcesOf(descriptor: Descriptor): ResourceEntry[] {
  const { resources } = descriptor;
  if (!Array.isArray(resources)) return [];
  const entries: ResourceEntry[] = [];
  resources.forEach((resource: unknown, index) => {
    if (!isRecord(resource)) return;
    entries.push({
      index,
      name: typeof resource.name === 'string' ? resource.name : undefined,
      // A string schema points at an external file we don't read
      schema: isRecord(resource.schema) ? resource.schema : undefined,
    });
  });
  return entries;
}

/** `primaryKey` and foreign key `fields` may be one name or a list of names. */
function keyNames(value: unknown): string[] {
  const names = typeof value === 'string' ? [value] : Array.isArray(value) ? value : [];
  return [...new Set(names.filter((name): name is string => typeof name === 'string'))];
}

function declaredFields(schema: Readonly<Record<string, unknown>> | undefined): Set<string> | undefined {
  if (!schema || !Array.isArray(schema.fields)) return undefined;
  const names = new Set<string>();
  for (const field of schema.fields) {
    if (isRecord(field) && typeof field.name === 'string') names.add(field.name);
  }
  return names;
}

function formatNames(names: readonly string[]): string {
  return names.map((name) => `\`${name}\``).join(', ');
}

export function checkPrimaryKeys(descriptor: Descriptor): Issue[] {
  const issues: Issue[] = [];
  for (const resource of resourcesOf(descriptor)) {
    const fields = declaredFields(resource.schema);
    if (!resource.schema || !fields) continue;

    const missing = keyNames(resource.schema.primaryKey).filter((name) => !fields.has(name));
    if (missing.length === 0) continue;

    issues.push(
      createIssue(
        ['resources', resource.index, 'schema', 'primaryKey'],
        `The primary key references fields not declared in the schema: ${formatNames(missing)}.`,
        { type: 'primary-key' },
        { missing, declared: [...fields] },
      ),
    );
  }
  return issues;
}

export function checkForeignKeys(descriptor: Descriptor): Issue[] {
  const resources = resourcesOf(descriptor);
  const issues: Issue[] = [];

  for (const resource of resources) {
    const { schema } = resource;
    if (!schema || !Array.isArray(schema.foreignKeys)) continue;

    const localFields = declaredFields(schema);
    const missing = new Set<string>();
    const unknownResources = new Set<string>();

    for (const foreignKey of schema.foreignKeys) {
      if (!isRecord(foreignKey)) continue;

      for (const name of keyNames(foreignKey.fields)) {
        if (localFields && !localFields.has(name)) missing.add(name);
      }

      const { reference } = foreignKey;
      if (!isRecord(reference)) continue;

      // An empty or absent resource name refers to the resource itself
      const targetName =
        typeof reference.resource === 'string' && reference.resource !== ''
          ? reference.resource
          : undefined;
      const target =
        targetName === undefined ? resource : resources.find((other) => other.name === targetName);
      if (!target) {
        if (targetName !== undefined) unknownResources.add(targetName);
        continue;
      }

      const targetFields = declaredFields(target.schema);
      if (!targetFields) continue;
      for (const name of keyNames(reference.fields)) {
        if (!targetFields.has(name)) missing.add(targetName ? `${targetName}.${name}` : name);
      }
    }

    const path = ['resources', resource.index, 'schema', 'foreignKeys'];
    if (missing.size > 0) {
      issues.push(
        createIssue(
          path,
          `Foreign keys reference fields that are not declared: ${formatNames([...missing])}.`,
          { type: 'foreign-key' },
          { missing: [...missing] },
        ),
      );
    }
    if (unknownResources.size > 0) {
      issues.push(
        createIssue(
          path,
          `Foreign keys reference resources that are not in the package: ${formatNames([...unknownResources])}.`,
          { type: 'foreign-key' },
          { resources: [...unknownResources] },
        ),
      );
    }
  }
  return issues;
}
