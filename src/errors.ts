import { ValidationIssue } from './types';

export class ParameterValidationError extends Error {
  readonly field: string;
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    const [first] = issues;
    const field = first?.field ?? 'unknown';
    const summary = issues
      .map((issue) => `${issue.field}: ${issue.message}`)
      .join('; ');
    super(`Invalid deployment parameters (${summary || field})`);
    this.name = 'ParameterValidationError';
    this.field = field;
    this.issues = issues;
  }
}
