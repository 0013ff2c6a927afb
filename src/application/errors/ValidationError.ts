import type { ZodIssue } from 'zod';

export interface ValidationIssue {
  field?: string;
  message: string;
}

export class ValidationError extends Error {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    super(issues.map((issue) => (issue.field ? `${issue.field}: ${issue.message}` : issue.message)).join('; '));
    this.name = 'ValidationError';
    this.issues = issues;
  }

  static fromZodIssues(issues: ZodIssue[]): ValidationError {
    return new ValidationError(
      issues.map((issue) => ({
        field: issue.path.length > 0 ? issue.path.join('.') : undefined,
        message: issue.message,
      })),
    );
  }
}
