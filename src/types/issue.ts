import type { Path } from '@dpcheck/schema';

/**
 * What produced an issue. Schema findings keep the failing JSON Schema
 * keyword; custom checks and their failures keep the check name.
 */
export type IssueSource =
  | { type: 'standard'; keyword: string }
  | { type: 'recommendation'; keyword: string }
  | { type: 'required' }
  | { type: 'primary-key' }
  | { type: 'foreign-key' }
  | { type: 'enum' }
  | { type: 'license' }
  | { type: 'custom'; name: string }
  | { type: 'check-failure'; name: string };

export type IssueSourceType = IssueSource['type'];

export type IssueContext = Readonly<Record<string, unknown>>;

export interface Issue {
  readonly path: Path;
  readonly message: string;
  readonly source: IssueSource;
  readonly context: IssueContext;
}

export interface ExplainedIssue extends Issue {
  /** The path rendered as JSONPath, e.g. `$.resources[0].name`. */
  readonly location: string;
  readonly explanation: string;
}
