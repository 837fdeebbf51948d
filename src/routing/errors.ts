export type AssignmentErrorCode =
  | 'INVALID_CONFIGURATION'
  | 'DATASET_ERROR'
  | 'ASSIGNMENT_INTEGRITY';

export class AssignmentError extends Error {
  readonly code: AssignmentErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: AssignmentErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

/** Raised before any ticket is processed */
export class InvalidConfigurationError extends AssignmentError {
  readonly problems: string[];

  constructor(problems: string[]) {
    super('INVALID_CONFIGURATION', `Invalid assignment configuration: ${problems.join('; ')}`, { problems });
    this.problems = problems;
  }
}

export class DatasetError extends AssignmentError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('DATASET_ERROR', message, details);
  }
}

export class AssignmentIntegrityError extends AssignmentError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('ASSIGNMENT_INTEGRITY', message, details);
  }
}
