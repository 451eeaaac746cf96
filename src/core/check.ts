import { validateAgainstStandard } from '@dpcheck/schema';
import type { Descriptor, StandardVersion } from '@dpcheck/schema';
import type { Issue } from '../types/issue.js';
import { DEFAULT_CONFIG } from './config.js';
import type { Config } from './config.js';
import { DescriptorCheckError } from './errors.js';
import { applyExclusions } from './exclusion.js';
import { groupViolations } from './grouping.js';
import { dedupeAndSort } from './issue.js';
import { checkForeignKeys, checkPrimaryKeys } from './key-checks.js';
import { applyRequiredCheck } from './required-check.js';

export interface CheckOptions {
  /** Throw a DescriptorCheckError instead of returning a non-empty result. */
  error?: boolean;
}

type Evaluator = (descriptor: Descriptor, config: Config) => Issue[];

function standardIssues(descriptor: Descriptor, version: StandardVersion): Issue[] {
  return groupViolations(validateAgainstStandard(descriptor, version, 'required'), {
    origin: 'standard',
    version,
  });
}

function recommendationIssues(descriptor: Descriptor, version: StandardVersion): Issue[] {
  return groupViolations(validateAgainstStandard(descriptor, version, 'recommended'), {
    origin: 'recommendation',
    version,
  });
}

const EVALUATORS: readonly Evaluator[] = [
  (descriptor, config) => standardIssues(descriptor, config.version),
  (descriptor, config) => (config.strict ? recommendationIssues(descriptor, config.version) : []),
  (descriptor) => checkPrimaryKeys(descriptor),
  (descriptor) => checkForeignKeys(descriptor),
  (descriptor, config) =>
    config.requiredChecks.flatMap((requiredCheck) => applyRequiredCheck(requiredCheck, descriptor)),
  (descriptor, config) => config.registry.run(descriptor, config.onCheckFailure),
];

/**
 * Check a Data Package descriptor against the standard and the configured
 * rules. Returns the issues sorted by path, without duplicates and without
 * the excluded ones; the descriptor is only read.
 */
export function check(
  descriptor: Descriptor,
  config: Config = DEFAULT_CONFIG,
  options: CheckOptions = {},
): Issue[] {
  const found = EVALUATORS.flatMap((evaluate) => evaluate(descriptor, config));
  const issues = applyExclusions(dedupeAndSort(found), config.excludes);

  if (options.error && issues.length > 0) {
    throw new DescriptorCheckError(issues);
  }
  return issues;
}
