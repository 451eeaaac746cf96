/** A Data Package descriptor as parsed from `datapackage.json`. */
export type Descriptor = Readonly<Record<string, unknown>>;

export type PathSegment = string | number;

/** Location inside a descriptor: object keys and array indices, root first. */
export type Path = readonly PathSegment[];

export function isRecord(value: unknown): value is Readonly<Record<string, unknown>> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
