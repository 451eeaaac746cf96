import { isRecord } from './descriptor.js';
import type { Path, PathSegment } from './descriptor.js';

function unescapeToken(token: string): string {
  return token.replace(/~1/g, '/').replace(/~0/g, '~');
}

/**
 * Convert a JSON Pointer reported by the validator (`/resources/0/name`)
 * into a Path. Tokens are read as array indices only where the descriptor
 * actually holds an array at that point, so an object key such as `"0"`
 * stays a string.
 */
export function pointerToPath(pointer: string, root: unknown): Path {
  if (pointer === '') return [];

  const tokens = pointer.slice(1).split('/').map(unescapeToken);
  const path: PathSegment[] = [];
  let current: unknown = root;

  for (const token of tokens) {
    if (Array.isArray(current) && /^(0|[1-9]\d*)$/.test(token)) {
      const index = Number(token);
      path.push(index);
      current = current[index];
    } else {
      path.push(token);
      current = isRecord(current) ? current[token] : undefined;
    }
  }

  return path;
}

function escapeToken(token: string): string {
  return token.replace(/~/g, '~0').replace(/\//g, '~1');
}

/**
 * Map every object in a schema to its `#/...` location, so a keyword can be
 * located from the schema object that holds it wherever the validator
 * reached it from.
 */
export function indexSchemaLocations(schema: unknown): WeakMap<object, string> {
  const locations = new WeakMap<object, string>();
  const visit = (node: unknown, location: string): void => {
    if (Array.isArray(node)) {
      node.forEach((item, index) => visit(item, `${location}/${index}`));
    } else if (isRecord(node)) {
      locations.set(node, location);
      for (const [key, child] of Object.entries(node)) {
        visit(child, `${location}/${escapeToken(key)}`);
      }
    }
  };
  visit(schema, '#');
  return locations;
}
