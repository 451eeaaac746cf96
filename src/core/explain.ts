import { isRecord } from '@dpcheck/schema';
import type { ExplainedIssue, Issue, IssueContext } from '../types/issue.js';
import { formatPath } from './path.js';

function text(context: IssueContext, key: string): string | undefined {
  const value = context[key];
  return typeof value === 'string' ? value : undefined;
}

function list(context: IssueContext, key: string): unknown[] {
  const value = context[key];
  return Array.isArray(value) ? value : [];
}

function param(context: IssueContext, key: string): string | undefined {
  const { params } = context;
  if (!isRecord(params) || params[key] === undefined) return undefined;
  return String(params[key]);
}

function capitalize(sentence: string): string {
  return sentence.charAt(0).toUpperCase() + sentence.slice(1);
}

function code(value: unknown): string {
  return `\`${typeof value === 'string' ? value : JSON.stringify(value)}\``;
}

function standardName(context: IssueContext): string {
  const version = text(context, 'version');
  return version ? `the Data Package ${version} standard` : 'the Data Package standard';
}

function explainKeyword(keyword: string, context: IssueContext): string {
  return capitalize(describeKeyword(keyword, context));
}

function describeKeyword(keyword: string, context: IssueContext): string {
  const standard = standardName(context);
  switch (keyword) {
    case 'required':
      return `This property is required by ${standard}.`;
    case 'type': {
      const types = param(context, 'type');
      return types
        ? `${standard} only accepts values of type ${types.split(',').map(code).join(' or ')} here.`
        : `${standard} expects a different type of value here.`;
    }
    case 'format':
      return `${standard} expects a valid \`${param(context, 'format') ?? 'formatted'}\` value here.`;
    case 'pattern':
      return `Values here must match the regular expression \`${param(context, 'pattern') ?? ''}\` set by ${standard}.`;
    case 'minItems':
      return `${standard} does not allow an empty list here.`;
    case 'oneOf':
      return `${standard} accepts exactly one of several alternative forms here.`;
    case 'anyOf':
      return `${standard} accepts one of several alternative forms here.`;
    default: {
      const schemaPath = text(context, 'schemaPath');
      return schemaPath
        ? `The value breaks the \`${keyword}\` rule at ${schemaPath} in ${standard}.`
        : `The value breaks the \`${keyword}\` rule of ${standard}.`;
    }
  }
}

function explanationFor(issue: Issue): string {
  const { source, context } = issue;
  switch (source.type) {
    case 'standard':
      return explainKeyword(source.keyword, context);
    case 'recommendation':
      return `Strict mode recommends this. ${explainKeyword(source.keyword, context)} Exclude the \`${source.keyword}\` type or turn strict mode off to skip it.`;
    case 'required': {
      const target = text(context, 'target');
      return target
        ? `The required check \`${target}\` expects these properties to be present and not null.`
        : 'A required check expects these properties to be present and not null.';
    }
    case 'primary-key': {
      const declared = list(context, 'declared');
      const fields = declared.length > 0 ? declared.map(code).join(', ') : 'none';
      return `Every name in \`primaryKey\` must be a field in \`schema.fields\`. Declared fields: ${fields}.`;
    }
    case 'foreign-key':
      return 'Foreign keys must list fields declared in this resource and refer to resources and fields of the same package.';
    case 'enum': {
      const allowed = list(context, 'allowedValues');
      return allowed.length > 0
        ? `The value must be exactly one of: ${allowed.map(code).join(', ')}.`
        : 'The value must be one of a fixed set of values.';
    }
    case 'license':
      return 'Each license names an Open Definition license ID in `name`, links the license text with `path`, or does both.';
    case 'custom':
      return `Reported by the custom check "${source.name}".`;
    case 'check-failure':
      return `The custom check "${source.name}" failed to run or reported something unusable, so this result has none of its findings. Fix the check or remove it from the configuration.`;
  }
}

/** Add a JSONPath location and a longer explanation to an issue. */
export function explain(issue: Issue): ExplainedIssue {
  return Object.freeze({
    path: issue.path,
    message: issue.message,
    source: issue.source,
    context: issue.context,
    location: formatPath(issue.path),
    explanation: explanationFor(issue),
  });
}
