import { isRecord } from '@dpcheck/schema';
import type { Path, PathSegment } from '@dpcheck/schema';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_-]*$/;

function quoteName(name: string): string {
  return `'${name.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}

/** Render a path as JSONPath: `$.resources[0]['$schema']`. */
export function formatPath(path: Path): string {
  let result = '$';
  for (const segment of path) {
    if (typeof segment === 'number') {
      result += `[${segment}]`;
    } else if (IDENTIFIER.test(segment)) {
      result += `.${segment}`;
    } else {
      result += `[${quoteName(segment)}]`;
    }
  }
  return result;
}

function compareSegments(a: PathSegment, b: PathSegment): number {
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  if (typeof a === 'number') return -1;
  if (typeof b === 'number') return 1;
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Segment-wise order; indices sort numerically and before keys; a prefix sorts first. */
export function comparePaths(a: Path, b: Path): number {
  const shared = Math.min(a.length, b.length);
  for (let i = 0; i < shared; i++) {
    const order = compareSegments(a[i], b[i]);
    if (order !== 0) return order;
  }
  return a.length - b.length;
}

export function pathsEqual(a: Path, b: Path): boolean {
  return a.length === b.length && a.every((segment, i) => segment === b[i]);
}

export function isPathPrefix(prefix: Path, path: Path): boolean {
  return prefix.length <= path.length && prefix.every((segment, i) => segment === path[i]);
}

function child(container: unknown, segment: PathSegment): { found: boolean; value: unknown } {
  if (typeof segment === 'number') {
    if (Array.isArray(container) && segment < container.length) {
      return { found: true, value: container[segment] };
    }
    return { found: false, value: undefined };
  }
  if (isRecord(container) && Object.hasOwn(container, segment)) {
    return { found: true, value: container[segment] };
  }
  return { found: false, value: undefined };
}

export function valueAt(root: unknown, path: Path): { found: boolean; value: unknown } {
  let current: { found: boolean; value: unknown } = { found: true, value: root };
  for (const segment of path) {
    current = child(current.value, segment);
    if (!current.found) return current;
  }
  return current;
}

/**
 * A path is reachable when every segment but the last exists and the last
 * either exists or names a property of an object that could hold it.
 */
export function isReachable(root: unknown, path: Path): boolean {
  if (path.length === 0) return true;
  const parent = valueAt(root, path.slice(0, -1));
  if (!parent.found) return false;
  const last = path[path.length - 1];
  if (typeof last === 'string') return isRecord(parent.value);
  return child(parent.value, last).found;
}
