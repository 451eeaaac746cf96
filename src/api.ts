export { check } from './core/check.js';
export type { CheckOptions } from './core/check.js';
export { explain } from './core/explain.js';
export { createConfig, DEFAULT_CONFIG } from './core/config.js';
export type { Config, ConfigOptions } from './core/config.js';
export { ConfigError, CheckExecutionError, DescriptorCheckError } from './core/errors.js';
export { createExclusion, applyExclusions } from './core/exclusion.js';
export type { Exclusion, ExclusionOptions, ExclusionScope } from './core/exclusion.js';
export { createRequiredCheck } from './core/required-check.js';
export type { RequiredCheck, RequiredCheckOptions } from './core/required-check.js';
export { fieldCheck } from './core/custom-check.js';
export type { CustomCheck, CustomFinding, FieldCheckOptions } from './core/custom-check.js';
export { createRegistry, RESERVED_CHECK_NAMES } from './core/registry.js';
export type { CheckFailurePolicy, Registry } from './core/registry.js';
export { parsePathPattern, matches, select } from './core/path-pattern.js';
export type { Match, PathPattern } from './core/path-pattern.js';
export { formatPath } from './core/path.js';
export { issueType } from './core/issue.js';
export { loadDescriptor, DescriptorLoadError } from './core/descriptor-loader.js';
export { loadConfigFile } from './core/config-loader.js';
export { exampleDescriptor, exampleResource, exampleField } from './core/examples.js';
export type { ExplainedIssue, Issue, IssueContext, IssueSource } from './types/issue.js';
export type { Descriptor, Path, StandardVersion } from '@dpcheck/schema';
