import type {
  Assessment,
  ChangeLogEntry,
  CourseRef,
  GradeBand,
  GradeKey,
  NewChangeLogEntry,
  ResultRecord,
  Student,
} from '../types';

export interface NewGradeKey {
  name: string;
  domain_max: number;
  bands: GradeBand[];
}

export interface NewAssessment {
  title: string;
  course_ref: CourseRef;
  max_score: number;
  weight: number;
  grade_key_id: string;
  held_on: string | null;
}

export type AssessmentPatch = Partial<Pick<Assessment, 'grade_key_id' | 'archived_at'>>;

export interface ResultWrite {
  assessment_id: string;
  student_id: string;
  raw_score: number;
  derived_grade: string;
  comment: string | null;
  import_batch_id: string | null;
}

export interface UpsertResult {
  record: ResultRecord;
  created: boolean;
}

export interface ChangeCursor {
  id: string;
  created_at: string;
}

export interface ChangePage {
  rows: ChangeLogEntry[];
  totalCount: number;
}

/**
 * Persistence boundary of the grading engine. Every service receives an
 * instance explicitly; nothing reaches for a shared connection.
 */
export interface GradingStore {
  insertGradeKey(input: NewGradeKey): Promise<GradeKey>;
  getGradeKey(id: string): Promise<GradeKey | null>;
  findGradeKeyByName(name: string): Promise<GradeKey | null>;
  listGradeKeys(): Promise<GradeKey[]>;
  updateGradeKeyBands(id: string, bands: GradeBand[]): Promise<GradeKey | null>;
  deleteGradeKey(id: string): Promise<boolean>;
  countAssessmentsForGradeKey(gradeKeyId: string): Promise<number>;
  countResultsForGradeKey(gradeKeyId: string): Promise<number>;

  insertAssessment(input: NewAssessment): Promise<Assessment>;
  getAssessment(id: string): Promise<Assessment | null>;
  listAssessments(includeArchived: boolean): Promise<Assessment[]>;
  updateAssessment(id: string, patch: AssessmentPatch): Promise<Assessment | null>;
  deleteAssessment(id: string): Promise<boolean>;

  getStudent(id: string): Promise<Student | null>;
  findStudentByIdentifier(identifier: string): Promise<Student | null>;
  /** Students of the class or course, sorted by last then first name. */
  listRoster(courseRef: CourseRef): Promise<Student[]>;

  /** Single-row insert-or-update keyed by (assessment_id, student_id). */
  upsertResult(input: ResultWrite): Promise<UpsertResult>;
  getResult(assessmentId: string, studentId: string): Promise<ResultRecord | null>;
  listResults(assessmentId: string): Promise<ResultRecord[]>;
  countResults(assessmentId: string): Promise<number>;
  deleteResult(assessmentId: string, studentId: string): Promise<boolean>;

  appendChange(entry: NewChangeLogEntry): Promise<ChangeLogEntry>;
  /** Newest first; rows strictly older than the cursor. */
  listChanges(limit: number, cursor: ChangeCursor | null): Promise<ChangePage>;
}
