import Papa from 'papaparse';
import {
  AssessmentArchivedError,
  AssessmentHasResultsError,
  NotFoundError,
  ValidationError,
} from '../errors';
import type { Assessment, CourseRef, CsvDelimiter, GradeKey } from '../types';
import { recordChange } from './changeLog';
import type { ServiceContext } from './context';

export interface AssessmentInput {
  title: string;
  courseRef: CourseRef;
  maxScore: number;
  weight: number;
  gradeKeyId: string;
  heldOn?: string | null;
}

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export const TEMPLATE_HEADER = ['student', 'last_name', 'first_name', 'score', 'comment'];

export function readCourseRef(value: unknown): CourseRef {
  if (typeof value !== 'object' || value === null) {
    throw new ValidationError('course_ref must be an object with kind and id');
  }
  const kind = 'kind' in value ? value.kind : undefined;
  const id = 'id' in value ? value.id : undefined;
  if (kind !== 'class' && kind !== 'course') {
    throw new ValidationError('course_ref.kind must be "class" or "course"');
  }
  if (typeof id !== 'string' || id.trim().length === 0) {
    throw new ValidationError('course_ref.id is required');
  }
  return { kind, id: id.trim() };
}

export async function createAssessment(ctx: ServiceContext, input: AssessmentInput): Promise<Assessment> {
  const title = input.title.trim();
  const errors: string[] = [];
  if (!title) errors.push('title is required');
  if (!Number.isFinite(input.maxScore) || input.maxScore <= 0) errors.push('max_score must be greater than 0');
  if (!Number.isFinite(input.weight) || input.weight <= 0) errors.push('weight must be greater than 0');
  if (input.heldOn && !ISO_DATE.test(input.heldOn)) errors.push('held_on must be a YYYY-MM-DD date');
  if (errors.length > 0) {
    ctx.logger.warn({ module: 'services.assessment', validation_errors: errors }, 'Validation error');
    throw new ValidationError(errors.join('; '));
  }

  const gradeKey = await ctx.store.getGradeKey(input.gradeKeyId);
  if (!gradeKey) {
    throw new ValidationError(`Unknown grade key: ${input.gradeKeyId}`);
  }

  const assessment = await ctx.store.insertAssessment({
    title,
    course_ref: input.courseRef,
    max_score: input.maxScore,
    weight: input.weight,
    grade_key_id: gradeKey.id,
    held_on: input.heldOn || null,
  });

  await recordChange(ctx, {
    action: 'create',
    entity: 'assessment',
    recordId: assessment.id,
    newValue: assessment.title,
    comment: `${assessment.course_ref.kind} ${assessment.course_ref.id}`,
  });
  ctx.logger.info({
    module: 'services.assessment',
    assessment_id: assessment.id,
    grade_key_id: gradeKey.id,
    max_score: assessment.max_score,
  }, 'Assessment created');
  return assessment;
}

export async function getAssessment(ctx: ServiceContext, id: string): Promise<Assessment> {
  const assessment = await ctx.store.getAssessment(id);
  if (!assessment) throw new NotFoundError('Assessment', id);
  return assessment;
}

export async function listAssessments(ctx: ServiceContext, includeArchived = false): Promise<Assessment[]> {
  return ctx.store.listAssessments(includeArchived);
}

/**
 * Loads an assessment that may still receive results, together with its
 * grade key.
 */
export async function getActiveAssessment(
  ctx: ServiceContext,
  id: string,
): Promise<{ assessment: Assessment; gradeKey: GradeKey }> {
  const assessment = await getAssessment(ctx, id);
  if (assessment.archived_at !== null) {
    throw new AssessmentArchivedError(id);
  }
  const gradeKey = await ctx.store.getGradeKey(assessment.grade_key_id);
  if (!gradeKey) {
    throw new ValidationError(`Grade key ${assessment.grade_key_id} of assessment ${id} no longer exists`);
  }
  return { assessment, gradeKey };
}

export async function archiveAssessment(ctx: ServiceContext, id: string): Promise<Assessment> {
  return ctx.locks.withLock(id, async () => {
    const assessment = await getAssessment(ctx, id);
    if (assessment.archived_at !== null) return assessment;

    const archived = await ctx.store.updateAssessment(id, { archived_at: new Date().toISOString() });
    if (!archived) throw new NotFoundError('Assessment', id);
    await recordChange(ctx, { action: 'archive', entity: 'assessment', recordId: id, oldValue: assessment.title });
    ctx.logger.info({ module: 'services.assessment', assessment_id: id }, 'Assessment archived');
    return archived;
  });
}

export async function deleteAssessment(ctx: ServiceContext, id: string): Promise<void> {
  return ctx.locks.withLock(id, async () => {
    const assessment = await getAssessment(ctx, id);
    const resultCount = await ctx.store.countResults(id);
    if (resultCount > 0) {
      throw new AssessmentHasResultsError(id, resultCount);
    }
    await ctx.store.deleteAssessment(id);
    await recordChange(ctx, { action: 'delete', entity: 'assessment', recordId: id, oldValue: assessment.title });
    ctx.logger.info({ module: 'services.assessment', assessment_id: id }, 'Assessment deleted');
  });
}

export async function assignGradeKey(ctx: ServiceContext, id: string, gradeKeyId: string): Promise<Assessment> {
  return ctx.locks.withLock(id, async () => {
    const assessment = await getAssessment(ctx, id);
    if (assessment.grade_key_id === gradeKeyId) return assessment;

    const resultCount = await ctx.store.countResults(id);
    if (resultCount > 0) {
      throw new AssessmentHasResultsError(id, resultCount);
    }
    if (!(await ctx.store.getGradeKey(gradeKeyId))) {
      throw new ValidationError(`Unknown grade key: ${gradeKeyId}`);
    }

    const updated = await ctx.store.updateAssessment(id, { grade_key_id: gradeKeyId });
    if (!updated) throw new NotFoundError('Assessment', id);
    await recordChange(ctx, {
      action: 'update',
      entity: 'assessment',
      recordId: id,
      fieldName: 'grade_key_id',
      oldValue: assessment.grade_key_id,
      newValue: gradeKeyId,
    });
    return updated;
  });
}

/** Empty score sheet for the roster, importable once filled in. */
export async function buildTemplate(ctx: ServiceContext, id: string, delimiter: CsvDelimiter): Promise<string> {
  const assessment = await getAssessment(ctx, id);
  const roster = await ctx.store.listRoster(assessment.course_ref);
  if (roster.length === 0) {
    ctx.logger.warn({ module: 'services.assessment', assessment_id: id }, 'Template with empty roster');
  }
  return Papa.unparse({
    fields: TEMPLATE_HEADER,
    data: roster.map((s) => [s.identifier, s.last_name, s.first_name, '', '']),
  }, { delimiter, newline: '\n' });
}
