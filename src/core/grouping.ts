import { isRecord } from '@dpcheck/schema';
import type { Path, RawViolation, StandardVersion } from '@dpcheck/schema';
import type { Issue, IssueContext } from '../types/issue.js';
import { createIssue } from './issue.js';
import { isPathPrefix, pathsEqual } from './path.js';

/** Whether violations come from the standard schema or the strict-mode recommendations. */
export type ViolationOrigin = 'standard' | 'recommendation';

export interface GroupingOptions {
  origin: ViolationOrigin;
  version: StandardVersion;
}

/** A violation, or a summary of an inner group, waiting to be grouped. */
interface Entry {
  schemaPath: string;
  path: Path;
  keyword: string;
  params: Readonly<Record<string, unknown>>;
  issue: Issue;
}

interface Group {
  marker: RawViolation;
  members: readonly Entry[];
  /** Members by the index of the alternative they failed in. */
  branches: ReadonlyMap<number, readonly Entry[]>;
  options: GroupingOptions;
}

/** Returns the representative issues, or undefined when the group isn't its kind. */
type GroupHandler = (group: Group) => Issue[] | undefined;

function formatValue(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

function code(value: unknown): string {
  return `\`${formatValue(value)}\``;
}

function listAlternatives(items: readonly string[]): string {
  if (items.length <= 1) return items.join('');
  return `${items.slice(0, -1).join(', ')} or ${items[items.length - 1]}`;
}

function uniqueSorted(items: Iterable<string>): string[] {
  return [...new Set(items)].sort();
}

function baseContext(violation: RawViolation, options: GroupingOptions): IssueContext {
  return {
    keyword: violation.keyword,
    schemaPath: violation.schemaPath,
    params: violation.params,
    version: options.version,
  };
}

function sameValue(a: unknown, b: unknown): boolean {
  return a === b || JSON.stringify(a) === JSON.stringify(b);
}

function enumIssue(path: Path, value: unknown, allowed: readonly unknown[], context: IssueContext): Issue {
  const distinct: unknown[] = [];
  for (const candidate of allowed) {
    if (!distinct.some((seen) => sameValue(seen, candidate))) distinct.push(candidate);
  }
  distinct.sort((a, b) => {
    const left = formatValue(a);
    const right = formatValue(b);
    return left < right ? -1 : left > right ? 1 : 0;
  });
  return createIssue(
    path,
    `The value ${code(value)} is not one of the allowed values: ${distinct.map(code).join(', ')}.`,
    { type: 'enum' },
    { ...context, value, allowedValues: distinct },
  );
}

function typeNames(params: Readonly<Record<string, unknown>>): string[] {
  return String(params.type).split(',');
}

function describeViolation(violation: RawViolation, options: GroupingOptions): Issue {
  const { path, params, value } = violation;
  const source = { type: options.origin, keyword: violation.keyword };
  const context = baseContext(violation, options);

  switch (violation.keyword) {
    case 'required': {
      const property = String(params.missingProperty);
      return createIssue(
        [...path, property],
        `The \`${property}\` property is required but missing.`,
        source,
        context,
      );
    }
    case 'type':
      return createIssue(
        path,
        `The value must be of type ${listAlternatives(typeNames(params))}.`,
        source,
        { ...context, value },
      );
    case 'enum':
      return enumIssue(
        path,
        value,
        Array.isArray(params.allowedValues) ? params.allowedValues : [],
        context,
      );
    case 'const':
      return enumIssue(path, value, [params.allowedValue], context);
    case 'format':
      return createIssue(
        path,
        `The value ${code(value)} does not match the \`${String(params.format)}\` format.`,
        source,
        { ...context, value },
      );
    case 'pattern':
      return createIssue(
        path,
        `The value ${code(value)} does not match the pattern \`${String(params.pattern)}\`.`,
        source,
        { ...context, value },
      );
    case 'minItems': {
      const limit = Number(params.limit);
      return createIssue(
        path,
        `The list must have at least ${limit} ${limit === 1 ? 'item' : 'items'}.`,
        source,
        context,
      );
    }
    default:
      return createIssue(path, `The value ${violation.message}.`, source, { ...context, value });
  }
}

function toEntry(violation: RawViolation, options: GroupingOptions): Entry {
  return {
    schemaPath: violation.schemaPath,
    path: violation.path,
    keyword: violation.keyword,
    params: violation.params,
    issue: describeViolation(violation, options),
  };
}

function summaryEntry(issue: Issue, marker: RawViolation): Entry {
  const { source, context } = issue;
  return {
    schemaPath: marker.schemaPath,
    path: issue.path,
    keyword: source.type === 'standard' || source.type === 'recommendation' ? source.keyword : source.type,
    params: isRecord(context.params) ? context.params : {},
    issue,
  };
}

function branchSchemas(marker: RawViolation): unknown[] {
  return Array.isArray(marker.schema) ? marker.schema : [];
}

/** The property names a branch consisting only of `required` demands, if that is all it does. */
function requiredOnly(schema: unknown): string[] | undefined {
  if (!isRecord(schema) || !Array.isArray(schema.required)) return undefined;
  if (Object.keys(schema).some((key) => key !== 'required')) return undefined;
  return schema.required.filter((name): name is string => typeof name === 'string');
}

function missingProperties(entries: readonly Entry[]): string[] {
  return uniqueSorted(
    entries.flatMap((entry) =>
      typeof entry.params.missingProperty === 'string' ? [entry.params.missingProperty] : [],
    ),
  );
}

function formatSet(names: readonly string[]): string {
  return names.map((name) => `\`${name}\``).join(' and ');
}

const licenseEntry: GroupHandler = ({ marker, members }) => {
  const { path } = marker;
  const isLicense =
    path.length >= 2 && path[path.length - 2] === 'licenses' && typeof path[path.length - 1] === 'number';
  if (!isLicense || members.length === 0) return undefined;
  if (!members.every((member) => member.keyword === 'required')) return undefined;

  const names = missingProperties(members);
  return [
    createIssue(
      path,
      `A license must have at least one of ${listAlternatives(names.map((name) => `\`${name}\``))}.`,
      { type: 'license' },
      { schemaPath: marker.schemaPath, missing: names },
    ),
  ];
};

/** `oneOf` failing because several alternatives matched at once. */
const exclusiveAlternatives: GroupHandler = ({ marker, members, options }) => {
  if (members.length > 0) return undefined;
  const passing = Array.isArray(marker.params.passingSchemas)
    ? marker.params.passingSchemas.filter((index): index is number => typeof index === 'number')
    : [];
  if (passing.length === 0) return undefined;

  const schemas = branchSchemas(marker);
  const sets = passing.map((index) => requiredOnly(schemas[index]));
  const message = sets.every((set): set is string[] => set !== undefined)
    ? `Only one of ${listAlternatives(uniqueSorted(sets.map(formatSet)))} may be present.`
    : `The value matches ${passing.length} of the allowed alternatives but must match exactly one.`;

  return [
    createIssue(
      marker.path,
      message,
      { type: options.origin, keyword: marker.keyword },
      { ...baseContext(marker, options), passingSchemas: passing },
    ),
  ];
};

function allowedValuesOf(schema: unknown, property: string): unknown[] | undefined {
  if (!isRecord(schema) || !isRecord(schema.properties)) return undefined;
  const definition = schema.properties[property];
  if (!isRecord(definition)) return undefined;
  if (Array.isArray(definition.enum)) return definition.enum;
  if ('const' in definition) return [definition.const];
  return undefined;
}

/**
 * A property every alternative restricts to its own, non-overlapping set
 * of values (like a field's `type`), which tells the alternatives apart.
 */
function findDiscriminator(schemas: readonly unknown[]): string | undefined {
  const first = schemas[0];
  if (!isRecord(first) || !isRecord(first.properties)) return undefined;

  for (const property of Object.keys(first.properties).sort()) {
    const sets = schemas.map((schema) => allowedValuesOf(schema, property));
    if (sets.some((set) => set === undefined)) continue;
    const seen = new Set<string>();
    let disjoint = true;
    for (const set of sets) {
      for (const value of set ?? []) {
        const key = JSON.stringify(value);
        if (seen.has(key)) disjoint = false;
        seen.add(key);
      }
    }
    if (disjoint) return property;
  }
  return undefined;
}

const discriminator: GroupHandler = ({ marker, branches, options }) => {
  const schemas = branchSchemas(marker);
  if (schemas.length < 2 || !isRecord(marker.value)) return undefined;
  const property = findDiscriminator(schemas);
  if (property === undefined) return undefined;
  const value = marker.value[property];
  if (value === undefined) return undefined;

  const selected = schemas.flatMap((schema, index) =>
    (allowedValuesOf(schema, property) ?? []).some((allowed) => sameValue(allowed, value)) ? [index] : [],
  );

  if (selected.length === 0) {
    return [
      enumIssue(
        [...marker.path, property],
        value,
        schemas.flatMap((schema) => allowedValuesOf(schema, property) ?? []),
        { ...baseContext(marker, options), discriminator: property },
      ),
    ];
  }

  const chosen = branches.get(selected[0]) ?? [];
  return chosen.length > 0 ? chosen.map((entry) => entry.issue) : undefined;
};

/** Every alternative failed only because properties are missing from the object itself. */
const requiredAlternatives: GroupHandler = ({ marker, members, branches, options }) => {
  if (members.length === 0) return undefined;
  const onlyMissing = members.every(
    (member) => member.keyword === 'required' && pathsEqual(member.path, marker.path),
  );
  if (!onlyMissing) return undefined;

  const sets = [...branches.values()].map(missingProperties);
  return [
    createIssue(
      marker.path,
      `At least one of ${listAlternatives(uniqueSorted(sets.map(formatSet)))} is required.`,
      { type: options.origin, keyword: 'required' },
      { ...baseContext(marker, options), alternatives: sets },
    ),
  ];
};

/**
 * Report the alternative that came closest: among the ones whose basic
 * type matched, the one with the fewest failures. When no alternative
 * accepted the value's type, summarize the accepted types instead.
 */
const closestBranch: GroupHandler = ({ marker, members, branches, options }) => {
  if (members.length === 0) {
    return [
      createIssue(
        marker.path,
        `The value ${marker.message}.`,
        { type: options.origin, keyword: marker.keyword },
        baseContext(marker, options),
      ),
    ];
  }

  const isShapeMismatch = (entries: readonly Entry[]) =>
    entries.some((entry) => entry.keyword === 'type' && pathsEqual(entry.path, marker.path));
  const candidates = [...branches.keys()]
    .sort((a, b) => a - b)
    .filter((index) => !isShapeMismatch(branches.get(index) ?? []));

  if (candidates.length === 0) {
    const types = uniqueSorted(
      members.flatMap((entry) =>
        entry.keyword === 'type' && pathsEqual(entry.path, marker.path) ? typeNames(entry.params) : [],
      ),
    );
    return [
      createIssue(
        marker.path,
        `The value must be of type ${listAlternatives(types)}.`,
        { type: options.origin, keyword: 'type' },
        { ...baseContext(marker, options), keyword: 'type', params: { type: types.join(',') }, value: marker.value },
      ),
    ];
  }

  let best = candidates[0];
  for (const index of candidates) {
    if ((branches.get(index) ?? []).length < (branches.get(best) ?? []).length) best = index;
  }
  return (branches.get(best) ?? []).map((entry) => entry.issue);
};

/**
 * Summaries per compound keyword, tried in order; the first handler
 * that recognizes the group decides its representative issues.
 */
const GROUPING_TABLE: Readonly<Record<string, readonly GroupHandler[]>> = {
  oneOf: [licenseEntry, exclusiveAlternatives, discriminator, requiredAlternatives, closestBranch],
  anyOf: [licenseEntry, discriminator, requiredAlternatives, closestBranch],
};

function branchIndex(entry: Entry, prefix: string): number {
  return Number(entry.schemaPath.slice(prefix.length).split('/')[0]);
}

function collapse(group: Group): Issue[] {
  for (const handler of GROUPING_TABLE[group.marker.keyword] ?? []) {
    const issues = handler(group);
    if (issues) return issues;
  }
  return group.members.map((entry) => entry.issue);
}

/**
 * Turn raw keyword violations into issues, collapsing each failed
 * `anyOf`/`oneOf` and the failures of its alternatives into the issues
 * that describe it. Inner groups collapse before the groups holding them.
 */
export function groupViolations(
  violations: readonly RawViolation[],
  options: GroupingOptions,
): Issue[] {
  const isMarker = (violation: RawViolation) => Object.hasOwn(GROUPING_TABLE, violation.keyword);
  const markers = violations
    .filter(isMarker)
    .sort((a, b) => b.schemaPath.length - a.schemaPath.length || b.path.length - a.path.length);
  let entries = violations
    .filter((violation) => !isMarker(violation))
    .map((violation) => toEntry(violation, options));

  for (const marker of markers) {
    const prefix = `${marker.schemaPath}/`;
    const members: Entry[] = [];
    const rest: Entry[] = [];
    for (const entry of entries) {
      const inGroup = entry.schemaPath.startsWith(prefix) && isPathPrefix(marker.path, entry.path);
      (inGroup ? members : rest).push(entry);
    }

    const branches = new Map<number, Entry[]>();
    for (const member of members) {
      const index = branchIndex(member, prefix);
      branches.set(index, [...(branches.get(index) ?? []), member]);
    }

    const summary = collapse({ marker, members, branches, options });
    entries = [...rest, ...summary.map((issue) => summaryEntry(issue, marker))];
  }

  return entries.map((entry) => entry.issue);
}
