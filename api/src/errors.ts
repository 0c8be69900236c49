export class GradingError extends Error {
  readonly statusCode: number;
  readonly code: string;

  constructor(message: string, statusCode: number, code: string) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
  }
}

/** Bad static definitions: ranges, missing references, malformed input fields. */
export class ValidationError extends GradingError {
  constructor(message: string, code = 'VALIDATION_ERROR') {
    super(message, 400, code);
  }
}

export class InvalidRangeError extends ValidationError {
  constructor(message: string) {
    super(message, 'INVALID_RANGE');
  }
}

export class DuplicateNameError extends GradingError {
  constructor(name: string) {
    super(`Grade key name already exists: ${name}`, 409, 'DUPLICATE_NAME');
  }
}

export class NotFoundError extends GradingError {
  constructor(resource: string, id: string) {
    super(`${resource} not found: ${id}`, 404, 'NOT_FOUND');
  }
}

export class UnknownStudentError extends GradingError {
  constructor(identifier: string) {
    super(`Unknown student: ${identifier}`, 404, 'UNKNOWN_STUDENT');
  }
}

export class StudentNotEnrolledError extends GradingError {
  constructor(identifier: string, assessmentId: string) {
    super(`Student ${identifier} is not enrolled for assessment ${assessmentId}`, 422, 'NOT_ENROLLED');
  }
}

export class ScoreOutOfRangeError extends GradingError {
  constructor(rawScore: number, maxScore: number) {
    super(`Score ${rawScore} is outside 0..${maxScore}`, 422, 'SCORE_OUT_OF_RANGE');
  }
}

export class AssessmentArchivedError extends GradingError {
  constructor(assessmentId: string) {
    super(`Assessment ${assessmentId} is archived`, 409, 'ASSESSMENT_ARCHIVED');
  }
}

export class AssessmentHasResultsError extends GradingError {
  constructor(assessmentId: string, resultCount: number) {
    super(`Assessment ${assessmentId} has ${resultCount} results`, 409, 'ASSESSMENT_HAS_RESULTS');
  }
}

export class GradeKeyInUseError extends GradingError {
  constructor(gradeKeyId: string, reason: string) {
    super(`Grade key ${gradeKeyId} is in use: ${reason}`, 409, 'GRADE_KEY_IN_USE');
  }
}

export class ImportInProgressError extends GradingError {
  constructor(assessmentId: string) {
    super(`An import or change for assessment ${assessmentId} is already running`, 409, 'IMPORT_IN_PROGRESS');
  }
}

/** Whole-file failure: the upload cannot be read as a delimited file. */
export class UnrecognizedFormatError extends GradingError {
  constructor(message: string) {
    super(message, 422, 'UNRECOGNIZED_FORMAT');
  }
}

/**
 * A normalized score fell outside every band of a grade key. Construction
 * rules make this unreachable, so it is reported as an internal failure.
 */
export class OutOfRangeError extends GradingError {
  constructor(value: number, gradeKeyName: string) {
    super(`Normalized score ${value} is not covered by grade key "${gradeKeyName}"`, 500, 'OUT_OF_RANGE');
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
