export interface GradeBand {
  lower_bound: number;
  upper_bound: number | null;
  label: string;
}

export interface GradeKey {
  id: string;
  name: string;
  domain_max: number;
  bands: GradeBand[];
  created_at: string;
  updated_at: string;
}

export interface CourseRef {
  kind: 'class' | 'course';
  id: string;
}

export interface Assessment {
  id: string;
  title: string;
  course_ref: CourseRef;
  max_score: number;
  weight: number;
  grade_key_id: string;
  held_on: string | null;
  archived_at: string | null;
  created_at: string;
  updated_at: string;
}

export interface Student {
  id: string;
  identifier: string;
  first_name: string;
  last_name: string;
  class_id: string | null;
  course_id: string | null;
}

export interface ResultRecord {
  id: string;
  assessment_id: string;
  student_id: string;
  raw_score: number;
  derived_grade: string;
  comment: string | null;
  import_batch_id: string | null;
  created_at: string;
  updated_at: string;
}

export type ResultChange = 'created' | 'updated' | 'unchanged';

export type ChangeAction = 'create' | 'update' | 'delete' | 'archive' | 'import';
export type ChangeEntity = 'grade_key' | 'assessment' | 'result';

export interface ChangeLogEntry {
  id: string;
  created_at: string;
  action: ChangeAction;
  entity: ChangeEntity;
  record_id: string | null;
  field_name: string | null;
  old_value: string | null;
  new_value: string | null;
  comment: string | null;
}

export type NewChangeLogEntry = Omit<ChangeLogEntry, 'id' | 'created_at'>;

export type CsvDelimiter = ',' | ';';

/** Header name (case-insensitive) or 0-based column index. */
export type ColumnSelector = string | number;

export interface ColumnMapping {
  student: ColumnSelector;
  score: ColumnSelector;
  comment: ColumnSelector;
}

export type RowRejectionType =
  | 'MalformedRowError'
  | 'UnknownStudentError'
  | 'DuplicateRowError'
  | 'ParseError'
  | 'ScoreOutOfRangeError'
  | 'StudentNotEnrolledError'
  | 'OutOfRangeError'
  | 'PersistenceError';

export interface RowRejection {
  type: RowRejectionType;
  message: string;
}

export type RowOutcome =
  | {
    row_number: number;
    status: 'accepted';
    student_identifier: string;
    raw_score: number;
    derived_grade: string;
    change: ResultChange;
  }
  | {
    row_number: number;
    status: 'rejected';
    reason: RowRejection;
    raw: string;
  };

export type ImportStatus = 'fully_accepted' | 'partially_accepted' | 'nothing_accepted';

export interface ImportCounts {
  total: number;
  accepted: number;
  rejected: number;
  created: number;
  updated: number;
  unchanged: number;
}

export interface ImportReport {
  batch_id: string;
  assessment_id: string;
  delimiter: CsvDelimiter;
  status: ImportStatus;
  counts: ImportCounts;
  rows: RowOutcome[];
  started_at: string;
  finished_at: string;
}

export interface PaginationResult {
  has_more: boolean;
  next_cursor: string | null;
  total_count: number;
}
