import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, resolve } from 'node:path';
import Ajv2020Module from 'ajv/dist/2020.js';
import addFormatsModule from 'ajv-formats';
import type { ErrorObject, SchemaObject, ValidateFunction } from 'ajv';
import { isRecord } from './descriptor.js';
import type { Descriptor, Path } from './descriptor.js';
import { indexSchemaLocations, pointerToPath } from './pointer.js';
import { schemaFileName } from './standard.js';
import type { SchemaProfile, StandardVersion } from './standard.js';

// Both packages are CommonJS; loaded from ESM the classes sit under `.default`
const Ajv2020 = Ajv2020Module.default;
const addFormats = addFormatsModule.default;

/** One keyword-level failure reported by the schema validator. */
export interface RawViolation {
  /** Location of the offending value. For `required`, the object missing the property. */
  path: Path;
  keyword: string;
  /**
   * Schema location of the failing keyword from the schema root, e.g.
   * `#/$defs/resource/oneOf`, including inside referenced definitions.
   */
  schemaPath: string;
  params: Readonly<Record<string, unknown>>;
  message: string;
  /** Value of the failing keyword in the schema (the branch list for `anyOf`/`oneOf`). */
  schema: unknown;
  value: unknown;
}

export class StandardSchemaError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'StandardSchemaError';
  }
}

interface CompiledStandard {
  validate: ValidateFunction;
  locations: WeakMap<object, string>;
}

const compiled = new Map<string, CompiledStandard>();

function getPackageRoot(): string {
  const currentFile = fileURLToPath(import.meta.url);
  return resolve(dirname(currentFile), '..');
}

export function getSchemaPath(version: StandardVersion, profile: SchemaProfile): string {
  return resolve(getPackageRoot(), schemaFileName(version, profile));
}

function isSchemaObject(value: unknown): value is SchemaObject {
  return isRecord(value);
}

function loadSchema(schemaPath: string): SchemaObject {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(schemaPath, 'utf-8'));
  } catch (err) {
    throw new StandardSchemaError(`Cannot load standard schema: ${schemaPath}`, err);
  }
  if (!isSchemaObject(parsed)) {
    throw new StandardSchemaError(`Standard schema is not a JSON object: ${schemaPath}`);
  }
  return parsed;
}

/**
 * Compiled validator for a standard version and profile. Each one is
 * compiled on first use and shared by every later call.
 */
function getCompiled(version: StandardVersion, profile: SchemaProfile): CompiledStandard {
  const key = `${version}:${profile}`;
  const cached = compiled.get(key);
  if (cached) return cached;

  const ajv = new Ajv2020({ allErrors: true, strict: false, verbose: true });
  addFormats(ajv);

  const schema = loadSchema(getSchemaPath(version, profile));
  const entry = { validate: ajv.compile(schema), locations: indexSchemaLocations(schema) };
  compiled.set(key, entry);
  return entry;
}

export function getStandardValidator(
  version: StandardVersion,
  profile: SchemaProfile,
): ValidateFunction {
  return getCompiled(version, profile).validate;
}

// ajv reports paths inside a separately compiled `$ref` target relative to
// that target; `parentSchema` is the schema object itself, so look it up.
function absoluteSchemaPath(err: ErrorObject, locations: WeakMap<object, string>): string {
  const suffix = `/${err.keyword}`;
  const parent = err.parentSchema;
  if (!isRecord(parent) || !err.schemaPath.endsWith(suffix)) return err.schemaPath;
  const location = locations.get(parent);
  return location === undefined ? err.schemaPath : `${location}${suffix}`;
}

function toViolation(
  err: ErrorObject,
  root: Descriptor,
  locations: WeakMap<object, string>,
): RawViolation {
  return {
    path: pointerToPath(err.instancePath, root),
    keyword: err.keyword,
    schemaPath: absoluteSchemaPath(err, locations),
    params: { ...err.params },
    message: err.message ?? 'is invalid',
    schema: err.schema,
    value: err.data,
  };
}

export function validateAgainstStandard(
  descriptor: Descriptor,
  version: StandardVersion,
  profile: SchemaProfile = 'required',
): RawViolation[] {
  const { validate, locations } = getCompiled(version, profile);
  if (validate(descriptor)) return [];
  return (validate.errors ?? []).map((err) => toViolation(err, descriptor, locations));
}
