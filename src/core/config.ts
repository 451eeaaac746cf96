import { DEFAULT_STANDARD_VERSION, isStandardVersion } from '@dpcheck/schema';
import type { StandardVersion } from '@dpcheck/schema';
import type { CustomCheck } from './custom-check.js';
import { ConfigError } from './errors.js';
import { createExclusion } from './exclusion.js';
import type { Exclusion, ExclusionOptions } from './exclusion.js';
import { createRegistry } from './registry.js';
import type { CheckFailurePolicy, Registry } from './registry.js';
import { createRequiredCheck } from './required-check.js';
import type { RequiredCheck, RequiredCheckOptions } from './required-check.js';

export interface ConfigOptions {
  excludes?: readonly ExclusionOptions[];
  customChecks?: readonly CustomCheck[];
  requiredChecks?: readonly RequiredCheckOptions[];
  /** Also check the recommendations (package name, id, licenses, lowercase names). */
  strict?: boolean;
  version?: StandardVersion;
  onCheckFailure?: CheckFailurePolicy;
}

export interface Config {
  readonly excludes: readonly Exclusion[];
  readonly customChecks: readonly CustomCheck[];
  readonly requiredChecks: readonly RequiredCheck[];
  readonly strict: boolean;
  readonly version: StandardVersion;
  readonly onCheckFailure: CheckFailurePolicy;
  readonly registry: Registry;
}

/**
 * Compile and freeze a configuration. Every problem with it (bad path
 * patterns, duplicate or reserved check names, unknown versions) is a
 * ConfigError thrown here, before anything is checked.
 */
export function createConfig(options: ConfigOptions = {}): Config {
  const version = options.version ?? DEFAULT_STANDARD_VERSION;
  if (!isStandardVersion(version)) {
    throw new ConfigError(`Unknown Data Package standard version "${String(version)}"; use "v1" or "v2".`);
  }

  const onCheckFailure = options.onCheckFailure ?? 'isolate';
  if (onCheckFailure !== 'isolate' && onCheckFailure !== 'abort') {
    throw new ConfigError(
      `Unknown check failure policy "${String(onCheckFailure)}"; use "isolate" or "abort".`,
    );
  }

  const registry = createRegistry(options.customChecks ?? []);

  return Object.freeze({
    excludes: Object.freeze((options.excludes ?? []).map(createExclusion)),
    customChecks: registry.checks,
    requiredChecks: Object.freeze((options.requiredChecks ?? []).map(createRequiredCheck)),
    strict: options.strict ?? false,
    version,
    onCheckFailure,
    registry,
  });
}

export const DEFAULT_CONFIG: Config = createConfig();
