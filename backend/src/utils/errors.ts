/**
 * Server-side error taxonomy.
 *
 * ValidationError rejects a single request before the store is touched.
 * StorageFailure means the store could not complete an operation; rows
 * committed before it stay intact.
 */

export interface ValidationIssue {
  field: string;
  code: string;
  message: string;
}

export class ValidationError extends Error {
  public readonly reason: string;
  public readonly issues: ValidationIssue[];

  constructor(reason: string, issues: ValidationIssue[] = [], message?: string) {
    super(message ?? `Validation failed: ${reason}`);
    this.name = 'ValidationError';
    this.reason = reason;
    this.issues = issues;
  }
}

export class StorageFailure extends Error {
  public readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super(`Storage ${operation} failed: ${errorMessage(cause)}`, { cause });
    this.name = 'StorageFailure';
    this.operation = operation;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
