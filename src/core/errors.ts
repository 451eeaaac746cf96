import type { Issue } from '../types/issue.js';
import { explain } from './explain.js';

/** Invalid exclusions, required checks, custom checks or config files. Always fatal. */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Thrown instead of a `check-failure` issue when the config asks to abort. */
export class CheckExecutionError extends Error {
  readonly checkName: string;
  constructor(checkName: string, cause: unknown) {
    super(
      `Custom check "${checkName}" failed to run: ${cause instanceof Error ? cause.message : String(cause)}`,
    );
    this.name = 'CheckExecutionError';
    this.checkName = checkName;
    this.cause = cause;
  }
}

function summarize(issues: readonly Issue[]): string {
  const count = issues.length === 1 ? '1 issue' : `${issues.length} issues`;
  const details = issues.map((issue) => {
    const explained = explain(issue);
    return `${explained.location}: ${explained.message}\n  ${explained.explanation}`;
  });
  return [`Found ${count} in the Data Package descriptor:`, ...details].join('\n\n');
}

/** All issues of one `check` call, in the order `check` returned them. */
export class DescriptorCheckError extends Error {
  readonly issues: readonly Issue[];
  constructor(issues: readonly Issue[]) {
    super(summarize(issues));
    this.name = 'DescriptorCheckError';
    this.issues = issues;
  }
}
