/**
 * In-process store. Used by the test suite and by `STORE=memory` for local
 * runs without PostgreSQL; seed data is passed in, nothing is fixed here.
 */

import { v4 as uuidv4 } from 'uuid';
import { DuplicateNameError } from '../errors';
import { compareByName, isEnrolled } from '../utils/roster';
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
import type {
  AssessmentPatch,
  ChangeCursor,
  ChangePage,
  GradingStore,
  NewAssessment,
  NewGradeKey,
  ResultWrite,
  UpsertResult,
} from './types';

export interface MemoryStoreSeed {
  students?: Student[];
  now?: () => Date;
}

function resultKey(assessmentId: string, studentId: string): string {
  return `${assessmentId}:${studentId}`;
}

export class MemoryGradingStore implements GradingStore {
  private gradeKeys = new Map<string, GradeKey>();
  private assessments = new Map<string, Assessment>();
  private students = new Map<string, Student>();
  private results = new Map<string, ResultRecord>();
  private changes: ChangeLogEntry[] = [];
  private readonly now: () => Date;

  constructor(seed: MemoryStoreSeed = {}) {
    this.now = seed.now ?? (() => new Date());
    for (const student of seed.students ?? []) {
      this.students.set(student.id, structuredClone(student));
    }
  }

  private timestamp(): string {
    return this.now().toISOString();
  }

  addStudent(student: Student): void {
    this.students.set(student.id, structuredClone(student));
  }

  async insertGradeKey(input: NewGradeKey): Promise<GradeKey> {
    if (await this.findGradeKeyByName(input.name)) {
      throw new DuplicateNameError(input.name);
    }
    const ts = this.timestamp();
    const key: GradeKey = {
      id: uuidv4(),
      name: input.name,
      domain_max: input.domain_max,
      bands: structuredClone(input.bands),
      created_at: ts,
      updated_at: ts,
    };
    this.gradeKeys.set(key.id, key);
    return structuredClone(key);
  }

  async getGradeKey(id: string): Promise<GradeKey | null> {
    const key = this.gradeKeys.get(id);
    return key ? structuredClone(key) : null;
  }

  async findGradeKeyByName(name: string): Promise<GradeKey | null> {
    for (const key of this.gradeKeys.values()) {
      if (key.name === name) return structuredClone(key);
    }
    return null;
  }

  async listGradeKeys(): Promise<GradeKey[]> {
    return [...this.gradeKeys.values()]
      .sort((a, b) => a.created_at.localeCompare(b.created_at))
      .map((k) => structuredClone(k));
  }

  async updateGradeKeyBands(id: string, bands: GradeBand[]): Promise<GradeKey | null> {
    const key = this.gradeKeys.get(id);
    if (!key) return null;
    key.bands = structuredClone(bands);
    key.updated_at = this.timestamp();
    return structuredClone(key);
  }

  async deleteGradeKey(id: string): Promise<boolean> {
    return this.gradeKeys.delete(id);
  }

  async countAssessmentsForGradeKey(gradeKeyId: string): Promise<number> {
    return [...this.assessments.values()].filter((a) => a.grade_key_id === gradeKeyId).length;
  }

  async countResultsForGradeKey(gradeKeyId: string): Promise<number> {
    let count = 0;
    for (const result of this.results.values()) {
      if (this.assessments.get(result.assessment_id)?.grade_key_id === gradeKeyId) count++;
    }
    return count;
  }

  async insertAssessment(input: NewAssessment): Promise<Assessment> {
    const ts = this.timestamp();
    const assessment: Assessment = {
      id: uuidv4(),
      ...structuredClone(input),
      archived_at: null,
      created_at: ts,
      updated_at: ts,
    };
    this.assessments.set(assessment.id, assessment);
    return structuredClone(assessment);
  }

  async getAssessment(id: string): Promise<Assessment | null> {
    const assessment = this.assessments.get(id);
    return assessment ? structuredClone(assessment) : null;
  }

  async listAssessments(includeArchived: boolean): Promise<Assessment[]> {
    return [...this.assessments.values()]
      .filter((a) => includeArchived || a.archived_at === null)
      .sort((a, b) => b.created_at.localeCompare(a.created_at))
      .map((a) => structuredClone(a));
  }

  async updateAssessment(id: string, patch: AssessmentPatch): Promise<Assessment | null> {
    const assessment = this.assessments.get(id);
    if (!assessment) return null;
    if (patch.grade_key_id !== undefined) assessment.grade_key_id = patch.grade_key_id;
    if (patch.archived_at !== undefined) assessment.archived_at = patch.archived_at;
    assessment.updated_at = this.timestamp();
    return structuredClone(assessment);
  }

  async deleteAssessment(id: string): Promise<boolean> {
    return this.assessments.delete(id);
  }

  async getStudent(id: string): Promise<Student | null> {
    const student = this.students.get(id);
    return student ? structuredClone(student) : null;
  }

  async findStudentByIdentifier(identifier: string): Promise<Student | null> {
    for (const student of this.students.values()) {
      if (student.identifier === identifier) return structuredClone(student);
    }
    return null;
  }

  async listRoster(courseRef: CourseRef): Promise<Student[]> {
    return [...this.students.values()]
      .filter((s) => isEnrolled(s, courseRef))
      .sort(compareByName)
      .map((s) => structuredClone(s));
  }

  async upsertResult(input: ResultWrite): Promise<UpsertResult> {
    const key = resultKey(input.assessment_id, input.student_id);
    const ts = this.timestamp();
    const existing = this.results.get(key);
    if (existing) {
      existing.raw_score = input.raw_score;
      existing.derived_grade = input.derived_grade;
      existing.comment = input.comment;
      existing.import_batch_id = input.import_batch_id;
      existing.updated_at = ts;
      return { record: structuredClone(existing), created: false };
    }
    const record: ResultRecord = {
      id: uuidv4(),
      ...input,
      created_at: ts,
      updated_at: ts,
    };
    this.results.set(key, record);
    return { record: structuredClone(record), created: true };
  }

  async getResult(assessmentId: string, studentId: string): Promise<ResultRecord | null> {
    const record = this.results.get(resultKey(assessmentId, studentId));
    return record ? structuredClone(record) : null;
  }

  async listResults(assessmentId: string): Promise<ResultRecord[]> {
    return [...this.results.values()]
      .filter((r) => r.assessment_id === assessmentId)
      .map((r) => structuredClone(r));
  }

  async countResults(assessmentId: string): Promise<number> {
    return [...this.results.values()].filter((r) => r.assessment_id === assessmentId).length;
  }

  async deleteResult(assessmentId: string, studentId: string): Promise<boolean> {
    return this.results.delete(resultKey(assessmentId, studentId));
  }

  async appendChange(entry: NewChangeLogEntry): Promise<ChangeLogEntry> {
    const row: ChangeLogEntry = { id: uuidv4(), created_at: this.timestamp(), ...entry };
    this.changes.push(row);
    return { ...row };
  }

  async listChanges(limit: number, cursor: ChangeCursor | null): Promise<ChangePage> {
    // insertion order breaks created_at ties
    const ordered = this.changes
      .map((row, seq) => ({ row, seq }))
      .sort((a, b) => b.row.created_at.localeCompare(a.row.created_at) || b.seq - a.seq);

    let start = 0;
    if (cursor) {
      const idx = ordered.findIndex((e) => e.row.id === cursor.id);
      start = idx === -1
        ? ordered.findIndex((e) => e.row.created_at < cursor.created_at)
        : idx + 1;
      if (start === -1) start = ordered.length;
    }

    return {
      rows: ordered.slice(start, start + limit).map((e) => ({ ...e.row })),
      totalCount: this.changes.length,
    };
  }
}

export function createMemoryStore(seed: MemoryStoreSeed = {}): MemoryGradingStore {
  return new MemoryGradingStore(seed);
}
