import { isRecord } from '@dpcheck/schema';
import type { Path, PathSegment } from '@dpcheck/schema';
import { ConfigError } from './errors.js';
import { formatPath, valueAt } from './path.js';

/**
 * One step of a compiled pattern: a set of literal keys or indices,
 * `*` (exactly one segment), or `..` (zero or more segments).
 */
export type SegmentMatcher =
  | { readonly kind: 'keys'; readonly keys: readonly PathSegment[] }
  | { readonly kind: 'wildcard' }
  | { readonly kind: 'descendants' };

export interface PathPattern {
  readonly source: string;
  /** Alternatives joined with `|`; a path matches when any of them does. */
  readonly alternatives: readonly (readonly SegmentMatcher[])[];
}

export interface Match {
  readonly path: Path;
  readonly value: unknown;
}

function splitAlternatives(source: string): string[] {
  const parts: string[] = [];
  let quote: string | null = null;
  let depth = 0;
  let start = 0;

  for (let i = 0; i < source.length; i++) {
    const char = source[i];
    if (quote) {
      if (char === '\\') i++;
      else if (char === quote) quote = null;
      continue;
    }
    if (char === "'" || char === '"') {
      quote = char;
    } else if (char === '[') {
      depth++;
    } else if (char === ']') {
      depth--;
    } else if (depth === 0 && char === '&') {
      throw new ConfigError(
        `The intersection operator (\`&\`) in the path "${source}" is not supported.`,
      );
    } else if (depth === 0 && char === '|') {
      parts.push(source.slice(start, i));
      start = i + 1;
    }
  }
  parts.push(source.slice(start));
  return parts;
}

const NAME = /[^.[\]*'"\s|&]+/y;
const INDEX = /\d+/y;

class AlternativeParser {
  private pos = 0;

  constructor(
    private readonly text: string,
    private readonly source: string,
  ) {}

  parse(): SegmentMatcher[] {
    const { text } = this;
    const matchers: SegmentMatcher[] = [];
    if (text === '') this.fail('an alternative is empty');

    if (text[0] === '$') {
      this.pos = 1;
    } else if (text[0] !== '.' && text[0] !== '[') {
      // A bare name is rooted: `created` means `$.created`
      matchers.push(this.readDotted());
    }

    while (this.pos < text.length) {
      if (text.startsWith('..', this.pos)) {
        this.pos += 2;
        matchers.push({ kind: 'descendants' });
        matchers.push(text[this.pos] === '[' ? this.readBracket() : this.readDotted());
      } else if (text[this.pos] === '.') {
        this.pos += 1;
        matchers.push(this.readDotted());
      } else if (text[this.pos] === '[') {
        matchers.push(this.readBracket());
      } else {
        this.fail(`unexpected "${text[this.pos]}" at position ${this.pos}`);
      }
    }
    return matchers;
  }

  private fail(reason: string): never {
    throw new ConfigError(`"${this.source}" is not a valid path: ${reason}.`);
  }

  private readDotted(): SegmentMatcher {
    if (this.text[this.pos] === '*') {
      this.pos += 1;
      return { kind: 'wildcard' };
    }
    NAME.lastIndex = this.pos;
    const match = NAME.exec(this.text);
    if (!match) this.fail(`expected a property name at position ${this.pos}`);
    this.pos = NAME.lastIndex;
    return { kind: 'keys', keys: [match[0]] };
  }

  private skipSpace(): void {
    while (this.text[this.pos] === ' ') this.pos++;
  }

  private readBracket(): SegmentMatcher {
    this.pos += 1;
    this.skipSpace();
    if (this.text[this.pos] === '*') {
      this.pos += 1;
      this.skipSpace();
      this.expect(']');
      return { kind: 'wildcard' };
    }

    const keys: PathSegment[] = [];
    for (;;) {
      this.skipSpace();
      const char = this.text[this.pos];
      if (char === "'" || char === '"') {
        keys.push(this.readQuoted(char));
      } else if (char === '-') {
        this.fail('negative indices are not supported');
      } else {
        INDEX.lastIndex = this.pos;
        const match = INDEX.exec(this.text);
        if (!match) this.fail(`expected a quoted name or an index at position ${this.pos}`);
        this.pos = INDEX.lastIndex;
        keys.push(Number(match[0]));
      }
      this.skipSpace();
      if (this.text[this.pos] === ',') {
        this.pos += 1;
        continue;
      }
      this.expect(']');
      return { kind: 'keys', keys };
    }
  }

  private readQuoted(quote: string): string {
    let value = '';
    this.pos += 1;
    while (this.pos < this.text.length) {
      const char = this.text[this.pos];
      if (char === '\\') {
        value += this.text[this.pos + 1] ?? '';
        this.pos += 2;
      } else if (char === quote) {
        this.pos += 1;
        return value;
      } else {
        value += char;
        this.pos += 1;
      }
    }
    return this.fail('a quoted name is not terminated');
  }

  private expect(char: string): void {
    if (this.text[this.pos] !== char) {
      this.fail(`expected "${char}" at position ${this.pos}`);
    }
    this.pos += 1;
  }
}

/**
 * Compile a JSONPath-style pattern. Supports `$`, `.name`, `['a', 'b']`,
 * `[0]`, `*`, `..` and `|`; throws ConfigError for anything else,
 * including the intersection operator `&`.
 */
export function parsePathPattern(source: string): PathPattern {
  const alternatives = splitAlternatives(source).map((part) =>
    Object.freeze(new AlternativeParser(part.trim(), source).parse()),
  );
  return Object.freeze({ source, alternatives: Object.freeze(alternatives) });
}

function matchFrom(
  matchers: readonly SegmentMatcher[],
  index: number,
  path: Path,
  offset: number,
): boolean {
  if (index === matchers.length) return offset === path.length;

  const matcher = matchers[index];
  if (matcher.kind === 'descendants') {
    for (let next = offset; next <= path.length; next++) {
      if (matchFrom(matchers, index + 1, path, next)) return true;
    }
    return false;
  }

  if (offset === path.length) return false;
  if (matcher.kind === 'keys' && !matcher.keys.includes(path[offset])) return false;
  return matchFrom(matchers, index + 1, path, offset + 1);
}

/** Structural match of a path against a pattern; the descriptor is not consulted. */
export function matches(pattern: PathPattern, path: Path): boolean {
  return pattern.alternatives.some((matchers) => matchFrom(matchers, 0, path, 0));
}

function children(value: unknown): [PathSegment, unknown][] {
  if (Array.isArray(value)) return value.map((item, index): [PathSegment, unknown] => [index, item]);
  if (isRecord(value)) return Object.entries(value);
  return [];
}

function* walk(
  matchers: readonly SegmentMatcher[],
  index: number,
  value: unknown,
  path: Path,
): Generator<Match> {
  if (index === matchers.length) {
    yield { path, value };
    return;
  }

  const matcher = matchers[index];
  switch (matcher.kind) {
    case 'descendants':
      yield* walk(matchers, index + 1, value, path);
      for (const [key, item] of children(value)) {
        yield* walk(matchers, index, item, [...path, key]);
      }
      return;
    case 'wildcard':
      for (const [key, item] of children(value)) {
        yield* walk(matchers, index + 1, item, [...path, key]);
      }
      return;
    case 'keys':
      for (const key of matcher.keys) {
        const next = valueAt(value, [key]);
        if (next.found) yield* walk(matchers, index + 1, next.value, [...path, key]);
      }
  }
}

/** Every location in the descriptor that the pattern matches, without repeats. */
export function select(pattern: PathPattern, root: unknown): Match[] {
  const seen = new Set<string>();
  const result: Match[] = [];
  for (const matchers of pattern.alternatives) {
    for (const match of walk(matchers, 0, root, [])) {
      const key = formatPath(match.path);
      if (seen.has(key)) continue;
      seen.add(key);
      result.push(match);
    }
  }
  return result;
}
