import type { z } from 'zod';

export class ContentSchemaError extends Error {
  readonly issues: readonly z.ZodIssue[];

  constructor(
    message = 'Content schema validation failed',
    issues: readonly z.ZodIssue[] = [],
  ) {
    super(message);
    this.name = 'ContentSchemaError';
    this.issues = issues;
  }
}

export type ContentSchemaWarningSeverity = 'error' | 'warning' | 'info';

export interface ContentSchemaWarning {
  readonly code: string;
  readonly message: string;
  readonly path: readonly (string | number)[];
  readonly severity: ContentSchemaWarningSeverity;
  readonly suggestion?: string;
}
