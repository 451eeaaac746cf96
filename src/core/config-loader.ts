import { readFile } from 'node:fs/promises';
import JSON5 from 'json5';
import { isRecord, isStandardVersion } from '@dpcheck/schema';
import type { ConfigOptions } from './config.js';
import { ConfigError } from './errors.js';
import type { ExclusionOptions, ExclusionScope } from './exclusion.js';
import type { RequiredCheckOptions } from './required-check.js';
import type { CheckFailurePolicy } from './registry.js';

/**
 * Shape of a configuration file. Custom checks are code, so they can
 * only be passed through the API.
 */
export type FileConfig = Omit<ConfigOptions, 'customChecks'>;

function isScope(value: unknown): value is ExclusionScope {
  return value === 'whole' || value === 'required';
}

function isFailurePolicy(value: unknown): value is CheckFailurePolicy {
  return value === 'isolate' || value === 'abort';
}

function optionalString(entry: Readonly<Record<string, unknown>>, key: string, where: string): string | undefined {
  const value = entry[key];
  if (value === undefined || typeof value === 'string') return value;
  throw new ConfigError(`${where}.${key} must be a string`);
}

function parseExclusion(entry: unknown, index: number): ExclusionOptions {
  const where = `excludes[${index}]`;
  // A bare string is shorthand for a pattern
  if (typeof entry === 'string') return { pattern: entry };
  if (!isRecord(entry)) throw new ConfigError(`${where} must be a string or an object`);

  const { scope } = entry;
  if (scope !== undefined && !isScope(scope)) {
    throw new ConfigError(`${where}.scope must be "whole" or "required"`);
  }
  return {
    pattern: optionalString(entry, 'pattern', where),
    type: optionalString(entry, 'type', where),
    scope,
  };
}

function parseRequiredCheck(entry: unknown, index: number): RequiredCheckOptions {
  const where = `requiredChecks[${index}]`;
  if (typeof entry === 'string') return { target: entry };
  if (!isRecord(entry)) throw new ConfigError(`${where} must be a string or an object`);

  const target = optionalString(entry, 'target', where);
  if (target === undefined) throw new ConfigError(`${where}.target is required`);
  return { target, message: optionalString(entry, 'message', where) };
}

function parseList<T>(value: unknown, key: string, parse: (entry: unknown, index: number) => T): T[] | undefined {
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) throw new ConfigError(`${key} must be a list`);
  return value.map(parse);
}

/** Validate the parsed content of a configuration file. */
export function parseFileConfig(value: unknown): FileConfig {
  if (!isRecord(value)) throw new ConfigError('The configuration must be an object');

  const { strict, version, onCheckFailure } = value;
  if (strict !== undefined && typeof strict !== 'boolean') {
    throw new ConfigError('strict must be true or false');
  }
  if (version !== undefined && !isStandardVersion(version)) {
    throw new ConfigError('version must be "v1" or "v2"');
  }
  if (onCheckFailure !== undefined && !isFailurePolicy(onCheckFailure)) {
    throw new ConfigError('onCheckFailure must be "isolate" or "abort"');
  }

  return {
    strict,
    version,
    onCheckFailure,
    excludes: parseList(value.excludes, 'excludes', parseExclusion),
    requiredChecks: parseList(value.requiredChecks, 'requiredChecks', parseRequiredCheck),
  };
}

/** Read a JSON5 configuration file (comments and trailing commas allowed). */
export async function loadConfigFile(path: string): Promise<FileConfig> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read configuration file: ${path}`, err);
  }

  let parsed: unknown;
  try {
    parsed = JSON5.parse(raw);
  } catch (err) {
    throw new ConfigError(`Invalid JSON5 in configuration file: ${path}`, err);
  }

  try {
    return parseFileConfig(parsed);
  } catch (err) {
    if (err instanceof ConfigError) {
      throw new ConfigError(`Invalid configuration file ${path}: ${err.message}`, err);
    }
    throw err;
  }
}
