import type { Pool } from 'pg';
import { validate as isUuid } from 'uuid';
import { DuplicateNameError } from '../errors';
import type {
  Assessment,
  ChangeAction,
  ChangeEntity,
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

interface GradeKeyRow {
  id: string;
  name: string;
  domain_max: number;
  bands: GradeBand[];
  created_at: Date;
  updated_at: Date;
}

interface AssessmentRow {
  id: string;
  title: string;
  course_kind: CourseRef['kind'];
  course_id: string;
  max_score: number;
  weight: number;
  grade_key_id: string;
  held_on: string | null;
  archived_at: Date | null;
  created_at: Date;
  updated_at: Date;
}

interface ResultRow {
  id: string;
  assessment_id: string;
  student_id: string;
  raw_score: number;
  derived_grade: string;
  comment: string | null;
  import_batch_id: string | null;
  created_at: Date;
  updated_at: Date;
}

interface ChangeRow {
  id: string;
  created_at: Date;
  action: ChangeAction;
  entity: ChangeEntity;
  record_id: string | null;
  field_name: string | null;
  old_value: string | null;
  new_value: string | null;
  comment: string | null;
}

const ASSESSMENT_COLUMNS = `id, title, course_kind, course_id, max_score, weight, grade_key_id,
  to_char(held_on, 'YYYY-MM-DD') AS held_on, archived_at, created_at, updated_at`;

const STUDENT_COLUMNS = 'id, identifier, first_name, last_name, class_id, course_id';

const UNIQUE_VIOLATION = '23505';

function toGradeKey(row: GradeKeyRow): GradeKey {
  return {
    id: row.id,
    name: row.name,
    domain_max: row.domain_max,
    bands: row.bands,
    created_at: row.created_at.toISOString(),
    updated_at: row.updated_at.toISOString(),
  };
}

function toAssessment(row: AssessmentRow): Assessment {
  return {
    id: row.id,
    title: row.title,
    course_ref: { kind: row.course_kind, id: row.course_id },
    max_score: row.max_score,
    weight: row.weight,
    grade_key_id: row.grade_key_id,
    held_on: row.held_on,
    archived_at: row.archived_at ? row.archived_at.toISOString() : null,
    created_at: row.created_at.toISOString(),
    updated_at: row.updated_at.toISOString(),
  };
}

function toResult(row: ResultRow): ResultRecord {
  return {
    ...row,
    created_at: row.created_at.toISOString(),
    updated_at: row.updated_at.toISOString(),
  };
}

function toChange(row: ChangeRow): ChangeLogEntry {
  return { ...row, created_at: row.created_at.toISOString() };
}

function isUniqueViolation(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === UNIQUE_VIOLATION;
}

export class PgGradingStore implements GradingStore {
  constructor(private readonly pool: Pool) {}

  async insertGradeKey(input: NewGradeKey): Promise<GradeKey> {
    try {
      const result = await this.pool.query<GradeKeyRow>(
        `INSERT INTO grade_key (name, domain_max, bands) VALUES ($1, $2, $3) RETURNING *`,
        [input.name, input.domain_max, JSON.stringify(input.bands)],
      );
      return toGradeKey(result.rows[0]);
    } catch (err) {
      if (isUniqueViolation(err)) throw new DuplicateNameError(input.name);
      throw err;
    }
  }

  async getGradeKey(id: string): Promise<GradeKey | null> {
    if (!isUuid(id)) return null;
    const result = await this.pool.query<GradeKeyRow>('SELECT * FROM grade_key WHERE id = $1', [id]);
    return result.rows[0] ? toGradeKey(result.rows[0]) : null;
  }

  async findGradeKeyByName(name: string): Promise<GradeKey | null> {
    const result = await this.pool.query<GradeKeyRow>('SELECT * FROM grade_key WHERE name = $1', [name]);
    return result.rows[0] ? toGradeKey(result.rows[0]) : null;
  }

  async listGradeKeys(): Promise<GradeKey[]> {
    const result = await this.pool.query<GradeKeyRow>('SELECT * FROM grade_key ORDER BY created_at ASC, id ASC');
    return result.rows.map(toGradeKey);
  }

  async updateGradeKeyBands(id: string, bands: GradeBand[]): Promise<GradeKey | null> {
    const result = await this.pool.query<GradeKeyRow>(
      `UPDATE grade_key SET bands = $1, updated_at = now() WHERE id = $2 RETURNING *`,
      [JSON.stringify(bands), id],
    );
    return result.rows[0] ? toGradeKey(result.rows[0]) : null;
  }

  async deleteGradeKey(id: string): Promise<boolean> {
    const result = await this.pool.query('DELETE FROM grade_key WHERE id = $1 RETURNING id', [id]);
    return result.rows.length > 0;
  }

  async countAssessmentsForGradeKey(gradeKeyId: string): Promise<number> {
    const result = await this.pool.query<{ count: string }>(
      'SELECT COUNT(*) FROM assessment WHERE grade_key_id = $1',
      [gradeKeyId],
    );
    return parseInt(result.rows[0].count, 10);
  }

  async countResultsForGradeKey(gradeKeyId: string): Promise<number> {
    const result = await this.pool.query<{ count: string }>(
      `SELECT COUNT(*) FROM result_record r
       JOIN assessment a ON r.assessment_id = a.id
       WHERE a.grade_key_id = $1`,
      [gradeKeyId],
    );
    return parseInt(result.rows[0].count, 10);
  }

  async insertAssessment(input: NewAssessment): Promise<Assessment> {
    const result = await this.pool.query<AssessmentRow>(
      `INSERT INTO assessment (title, course_kind, course_id, max_score, weight, grade_key_id, held_on)
       VALUES ($1, $2, $3, $4, $5, $6, $7)
       RETURNING ${ASSESSMENT_COLUMNS}`,
      [input.title, input.course_ref.kind, input.course_ref.id, input.max_score, input.weight, input.grade_key_id, input.held_on],
    );
    return toAssessment(result.rows[0]);
  }

  async getAssessment(id: string): Promise<Assessment | null> {
    if (!isUuid(id)) return null;
    const result = await this.pool.query<AssessmentRow>(
      `SELECT ${ASSESSMENT_COLUMNS} FROM assessment WHERE id = $1`,
      [id],
    );
    return result.rows[0] ? toAssessment(result.rows[0]) : null;
  }

  async listAssessments(includeArchived: boolean): Promise<Assessment[]> {
    const where = includeArchived ? '' : 'WHERE archived_at IS NULL';
    const result = await this.pool.query<AssessmentRow>(
      `SELECT ${ASSESSMENT_COLUMNS} FROM assessment ${where} ORDER BY created_at DESC, id DESC`,
    );
    return result.rows.map(toAssessment);
  }

  async updateAssessment(id: string, patch: AssessmentPatch): Promise<Assessment | null> {
    const fields: string[] = [];
    const values: unknown[] = [];
    let idx = 1;

    if (patch.grade_key_id !== undefined) { fields.push(`grade_key_id = $${idx++}`); values.push(patch.grade_key_id); }
    if (patch.archived_at !== undefined) { fields.push(`archived_at = $${idx++}`); values.push(patch.archived_at); }

    fields.push('updated_at = now()');
    values.push(id);

    const result = await this.pool.query<AssessmentRow>(
      `UPDATE assessment SET ${fields.join(', ')} WHERE id = $${idx} RETURNING ${ASSESSMENT_COLUMNS}`,
      values,
    );
    return result.rows[0] ? toAssessment(result.rows[0]) : null;
  }

  async deleteAssessment(id: string): Promise<boolean> {
    const result = await this.pool.query('DELETE FROM assessment WHERE id = $1 RETURNING id', [id]);
    return result.rows.length > 0;
  }

  async getStudent(id: string): Promise<Student | null> {
    if (!isUuid(id)) return null;
    const result = await this.pool.query<Student>(`SELECT ${STUDENT_COLUMNS} FROM students WHERE id = $1`, [id]);
    return result.rows[0] ?? null;
  }

  async findStudentByIdentifier(identifier: string): Promise<Student | null> {
    const result = await this.pool.query<Student>(
      `SELECT ${STUDENT_COLUMNS} FROM students WHERE identifier = $1`,
      [identifier],
    );
    return result.rows[0] ?? null;
  }

  async listRoster(courseRef: CourseRef): Promise<Student[]> {
    const column = courseRef.kind === 'class' ? 'class_id' : 'course_id';
    const result = await this.pool.query<Student>(
      `SELECT ${STUDENT_COLUMNS} FROM students WHERE ${column} = $1 ORDER BY last_name, first_name`,
      [courseRef.id],
    );
    return result.rows;
  }

  async upsertResult(input: ResultWrite): Promise<UpsertResult> {
    // xmax is 0 only for a freshly inserted tuple
    const result = await this.pool.query<ResultRow & { inserted: boolean }>(
      `INSERT INTO result_record (assessment_id, student_id, raw_score, derived_grade, comment, import_batch_id)
       VALUES ($1, $2, $3, $4, $5, $6)
       ON CONFLICT (assessment_id, student_id) DO UPDATE SET
         raw_score = EXCLUDED.raw_score,
         derived_grade = EXCLUDED.derived_grade,
         comment = EXCLUDED.comment,
         import_batch_id = EXCLUDED.import_batch_id,
         updated_at = now()
       RETURNING *, (xmax = 0) AS inserted`,
      [input.assessment_id, input.student_id, input.raw_score, input.derived_grade, input.comment, input.import_batch_id],
    );
    const { inserted, ...row } = result.rows[0];
    return { record: toResult(row), created: inserted };
  }

  async getResult(assessmentId: string, studentId: string): Promise<ResultRecord | null> {
    if (!isUuid(assessmentId) || !isUuid(studentId)) return null;
    const result = await this.pool.query<ResultRow>(
      'SELECT * FROM result_record WHERE assessment_id = $1 AND student_id = $2',
      [assessmentId, studentId],
    );
    return result.rows[0] ? toResult(result.rows[0]) : null;
  }

  async listResults(assessmentId: string): Promise<ResultRecord[]> {
    if (!isUuid(assessmentId)) return [];
    const result = await this.pool.query<ResultRow>(
      'SELECT * FROM result_record WHERE assessment_id = $1 ORDER BY created_at, id',
      [assessmentId],
    );
    return result.rows.map(toResult);
  }

  async countResults(assessmentId: string): Promise<number> {
    if (!isUuid(assessmentId)) return 0;
    const result = await this.pool.query<{ count: string }>(
      'SELECT COUNT(*) FROM result_record WHERE assessment_id = $1',
      [assessmentId],
    );
    return parseInt(result.rows[0].count, 10);
  }

  async deleteResult(assessmentId: string, studentId: string): Promise<boolean> {
    if (!isUuid(assessmentId) || !isUuid(studentId)) return false;
    const result = await this.pool.query(
      'DELETE FROM result_record WHERE assessment_id = $1 AND student_id = $2 RETURNING id',
      [assessmentId, studentId],
    );
    return result.rows.length > 0;
  }

  async appendChange(entry: NewChangeLogEntry): Promise<ChangeLogEntry> {
    const result = await this.pool.query<ChangeRow>(
      `INSERT INTO change_log (action, entity, record_id, field_name, old_value, new_value, comment)
       VALUES ($1, $2, $3, $4, $5, $6, $7)
       RETURNING *`,
      [entry.action, entry.entity, entry.record_id, entry.field_name, entry.old_value, entry.new_value, entry.comment],
    );
    return toChange(result.rows[0]);
  }

  async listChanges(limit: number, cursor: ChangeCursor | null): Promise<ChangePage> {
    const countResult = await this.pool.query<{ count: string }>('SELECT COUNT(*) FROM change_log');
    const totalCount = parseInt(countResult.rows[0].count, 10);

    let query: string;
    let params: unknown[];

    if (cursor) {
      query = `SELECT * FROM change_log WHERE (created_at, id) < ($1, $2) ORDER BY created_at DESC, id DESC LIMIT $3`;
      params = [cursor.created_at, cursor.id, limit];
    } else {
      query = `SELECT * FROM change_log ORDER BY created_at DESC, id DESC LIMIT $1`;
      params = [limit];
    }

    const result = await this.pool.query<ChangeRow>(query, params);
    return { rows: result.rows.map(toChange), totalCount };
  }
}
