export const STANDARD_VERSIONS = ['v1', 'v2'] as const;

export type StandardVersion = (typeof STANDARD_VERSIONS)[number];

/**
 * `required` is the schema every descriptor must satisfy; `recommended`
 * holds the extra constraints only checked in strict mode.
 */
export type SchemaProfile = 'required' | 'recommended';

export const DEFAULT_STANDARD_VERSION: StandardVersion = 'v2';

export function isStandardVersion(value: unknown): value is StandardVersion {
  return STANDARD_VERSIONS.some((version) => version === value);
}

export function schemaFileName(version: StandardVersion, profile: SchemaProfile): string {
  return profile === 'recommended'
    ? 'recommendations.schema.json'
    : `data-package-${version}.schema.json`;
}
