/**
 * Typed failures raised by the safety core.
 *
 * Policy outcomes (a rejected crisis transition, a suppressed aggregate group)
 * are returned as values and never use these classes.
 */

export type SafetyCoreErrorCode =
  | 'CONFIGURATION_INVALID'
  | 'AUDIT_SEQUENCE_CONFLICT'
  | 'AGGREGATION_FAILED'
  | 'VERSION_CONFLICT';

export class SafetyCoreError extends Error {
  readonly code: SafetyCoreErrorCode;

  constructor(code: SafetyCoreErrorCode, message: string) {
    super(message);
    this.name = 'SafetyCoreError';
    this.code = code;
  }
}

export class ConfigurationError extends SafetyCoreError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('CONFIGURATION_INVALID', message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * Raised when an append names a previous_hash that is no longer the ledger head.
 */
export class AuditSequenceError extends SafetyCoreError {
  readonly expectedPreviousHash: string;
  readonly suppliedPreviousHash: string;

  constructor(expected: string, supplied: string) {
    super(
      'AUDIT_SEQUENCE_CONFLICT',
      `previous_hash ${supplied.slice(0, 16)} does not match ledger head ${expected.slice(0, 16)}`
    );
    this.name = 'AuditSequenceError';
    this.expectedPreviousHash = expected;
    this.suppliedPreviousHash = supplied;
  }
}

export class AggregationError extends SafetyCoreError {
  constructor(message: string) {
    super('AGGREGATION_FAILED', message);
    this.name = 'AggregationError';
  }
}

export class VersionConflictError extends SafetyCoreError {
  readonly crisisId: string;

  constructor(crisisId: string, expected: number, actual: number) {
    super('VERSION_CONFLICT', `Crisis ${crisisId} is at version ${actual}, expected ${expected}`);
    this.name = 'VersionConflictError';
    this.crisisId = crisisId;
  }
}

/**
 * Zod issues flattened to "path: message" strings for error payloads.
 */
export function formatIssues(issues: ReadonlyArray<{ path: (string | number)[]; message: string }>): string[] {
  return issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message));
}
