import Papa from 'papaparse';
import {
  ScoreOutOfRangeError,
  StudentNotEnrolledError,
  UnknownStudentError,
} from '../errors';
import type { Assessment, CsvDelimiter, GradeKey, ResultChange, ResultRecord, Student } from '../types';
import { isEnrolled } from '../utils/roster';
import { getActiveAssessment, getAssessment } from './assessmentService';
import { recordChange } from './changeLog';
import type { ServiceContext } from './context';
import { resolveGrade } from './gradeKeyService';

export interface RecordInput {
  assessmentId: string;
  studentId: string;
  rawScore: number;
  comment?: string | null;
  importBatchId?: string | null;
}

export interface RecordOutcome {
  record: ResultRecord;
  change: ResultChange;
}

/** Preloaded assessment and grade key, so an import does not refetch them per row. */
export interface RecordTarget {
  assessment: Assessment;
  gradeKey: GradeKey;
}

export function normalizeComment(comment: string | null | undefined): string | null {
  const trimmed = (comment ?? '').trim();
  return trimmed.length > 0 ? trimmed : null;
}

export function checkScore(rawScore: number, maxScore: number): void {
  if (!Number.isFinite(rawScore) || rawScore < 0 || rawScore > maxScore) {
    throw new ScoreOutOfRangeError(rawScore, maxScore);
  }
}

/**
 * Validates and upserts one result. A write whose score, comment and grade
 * equal the stored record is skipped and reported as `unchanged`.
 */
export async function recordResult(
  ctx: ServiceContext,
  input: RecordInput,
  target?: RecordTarget,
): Promise<RecordOutcome> {
  const { assessment, gradeKey } = target ?? await getActiveAssessment(ctx, input.assessmentId);

  const student = await ctx.store.getStudent(input.studentId);
  if (!student) {
    throw new UnknownStudentError(input.studentId);
  }
  if (!isEnrolled(student, assessment.course_ref)) {
    throw new StudentNotEnrolledError(student.identifier, assessment.id);
  }

  checkScore(input.rawScore, assessment.max_score);
  const grade = resolveGrade(gradeKey, input.rawScore, assessment.max_score);
  const comment = normalizeComment(input.comment);

  const existing = await ctx.store.getResult(assessment.id, student.id);
  if (existing
    && existing.raw_score === input.rawScore
    && existing.comment === comment
    && existing.derived_grade === grade) {
    return { record: existing, change: 'unchanged' };
  }

  const { record, created } = await ctx.store.upsertResult({
    assessment_id: assessment.id,
    student_id: student.id,
    raw_score: input.rawScore,
    derived_grade: grade,
    comment,
    import_batch_id: input.importBatchId ?? null,
  });
  return { record, change: created ? 'created' : 'updated' };
}

async function requireStudent(ctx: ServiceContext, identifier: string): Promise<Student> {
  const student = await ctx.store.findStudentByIdentifier(identifier);
  if (!student) throw new UnknownStudentError(identifier);
  return student;
}

/** Manual entry from the results page, addressed by student identifier. */
export async function recordManualResult(
  ctx: ServiceContext,
  assessmentId: string,
  studentIdentifier: string,
  rawScore: number,
  comment: string | null,
): Promise<RecordOutcome> {
  const target = await getActiveAssessment(ctx, assessmentId);
  const student = await requireStudent(ctx, studentIdentifier);
  const before = await ctx.store.getResult(assessmentId, student.id);
  const outcome = await recordResult(ctx, { assessmentId, studentId: student.id, rawScore, comment }, target);

  if (outcome.change !== 'unchanged') {
    await recordChange(ctx, {
      action: outcome.change === 'created' ? 'create' : 'update',
      entity: 'result',
      recordId: outcome.record.id,
      fieldName: 'raw_score',
      oldValue: before ? String(before.raw_score) : null,
      newValue: String(outcome.record.raw_score),
      comment: outcome.record.comment,
    });
  }
  ctx.logger.info({
    module: 'services.result',
    assessment_id: assessmentId,
    student_id: student.id,
    change: outcome.change,
    derived_grade: outcome.record.derived_grade,
  }, 'Result recorded');
  return outcome;
}

export async function listResults(ctx: ServiceContext, assessmentId: string): Promise<ResultRecord[]> {
  await getAssessment(ctx, assessmentId);
  return ctx.store.listResults(assessmentId);
}

export async function deleteResult(ctx: ServiceContext, assessmentId: string, studentIdentifier: string): Promise<boolean> {
  await getAssessment(ctx, assessmentId);
  const student = await requireStudent(ctx, studentIdentifier);
  const before = await ctx.store.getResult(assessmentId, student.id);
  if (!before) return false;

  await ctx.store.deleteResult(assessmentId, student.id);
  await recordChange(ctx, {
    action: 'delete',
    entity: 'result',
    recordId: before.id,
    fieldName: 'raw_score',
    oldValue: String(before.raw_score),
    comment: studentIdentifier,
  });
  ctx.logger.info({ module: 'services.result', assessment_id: assessmentId, student_id: student.id }, 'Result deleted');
  return true;
}

/** Stored results joined with the roster, in roster order. */
export async function exportResultsCsv(ctx: ServiceContext, assessmentId: string, delimiter: CsvDelimiter): Promise<string> {
  const assessment = await getAssessment(ctx, assessmentId);
  const roster = await ctx.store.listRoster(assessment.course_ref);
  const results = new Map((await ctx.store.listResults(assessmentId)).map((r) => [r.student_id, r]));

  const data = roster.flatMap((s) => {
    const r = results.get(s.id);
    return r ? [[s.identifier, s.last_name, s.first_name, r.raw_score, r.derived_grade, r.comment ?? '']] : [];
  });
  if (data.length === 0) {
    ctx.logger.warn({ module: 'services.result', assessment_id: assessmentId, format: 'csv' }, 'Export with zero results');
  }

  return Papa.unparse({
    fields: ['student', 'last_name', 'first_name', 'score', 'grade', 'comment'],
    data,
  }, { delimiter, newline: '\n' });
}
