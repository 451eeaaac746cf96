import { isStandardVersion } from '@dpcheck/schema';
import { check } from '../core/check.js';
import { createConfig } from '../core/config.js';
import type { Config } from '../core/config.js';
import { loadConfigFile } from '../core/config-loader.js';
import type { FileConfig } from '../core/config-loader.js';
import { DescriptorLoadError, loadDescriptor } from '../core/descriptor-loader.js';
import { ConfigError } from '../core/errors.js';
import type { ExclusionOptions } from '../core/exclusion.js';
import { explain } from '../core/explain.js';
import type { ExplainedIssue } from '../types/issue.js';
import { icons, label, plural, value } from '../utils/output.js';

export interface CheckCommandOptions {
  strict?: boolean;
  standard?: string;
  exclude?: string[];
  excludeRequired?: string[];
  excludeType?: string[];
  config?: string;
  explain?: boolean;
  json?: boolean;
  quiet?: boolean;
}

export interface CheckCommandResult {
  valid: boolean;
  issues: ExplainedIssue[];
  /** Set when the descriptor couldn't be loaded. */
  error?: string;
}

/** Merge the configuration file with the command-line flags; flags win, exclusions add up. */
export async function buildConfig(options: CheckCommandOptions): Promise<Config> {
  const file: FileConfig = options.config ? await loadConfigFile(options.config) : {};

  const version = options.standard ?? file.version;
  if (version !== undefined && !isStandardVersion(version)) {
    throw new ConfigError(`Unknown Data Package standard version "${version}"; use "v1" or "v2".`);
  }

  const excludes: ExclusionOptions[] = [
    ...(file.excludes ?? []),
    ...(options.exclude ?? []).map((pattern) => ({ pattern })),
    ...(options.excludeRequired ?? []).map((pattern): ExclusionOptions => ({ pattern, scope: 'required' })),
    ...(options.excludeType ?? []).map((type) => ({ type })),
  ];

  return createConfig({
    ...file,
    version,
    strict: options.strict ?? file.strict,
    excludes,
  });
}

function reportResult(path: string, result: CheckCommandResult, options: CheckCommandOptions): void {
  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  if (options.quiet) return;

  if (result.valid) {
    console.log(`${icons.success} ${path} is a valid Data Package descriptor`);
    return;
  }

  console.log(`${icons.error} ${path} has ${plural(result.issues.length, 'issue')}`);
  for (const issue of result.issues) {
    console.log(`  ${icons.error} ${value(issue.location)} ${issue.message}`);
    if (options.explain) {
      console.log(`    ${label(issue.explanation)}`);
    }
  }
}

export async function checkCommand(
  path: string,
  options: CheckCommandOptions = {},
): Promise<CheckCommandResult> {
  const config = await buildConfig(options);

  let descriptor;
  try {
    descriptor = await loadDescriptor(path);
  } catch (err) {
    if (err instanceof DescriptorLoadError) {
      const result: CheckCommandResult = { valid: false, issues: [], error: err.message };
      if (options.json) {
        console.log(JSON.stringify(result, null, 2));
      } else if (!options.quiet) {
        console.error(`${icons.error} ${err.message}`);
      }
      return result;
    }
    throw err;
  }

  const issues = check(descriptor, config).map(explain);
  const result: CheckCommandResult = { valid: issues.length === 0, issues };
  reportResult(path, result, options);
  return result;
}
