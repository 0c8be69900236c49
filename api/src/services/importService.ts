import { v4 as uuidv4 } from 'uuid';
import {
  OutOfRangeError,
  ScoreOutOfRangeError,
  StudentNotEnrolledError,
  UnknownStudentError,
  errorMessage,
} from '../errors';
import type {
  ColumnMapping,
  ImportCounts,
  ImportReport,
  ImportStatus,
  RowOutcome,
  RowRejectionType,
} from '../types';
import { parseDecimal } from '../utils/numbers';
import { getActiveAssessment } from './assessmentService';
import { recordChange } from './changeLog';
import type { ServiceContext } from './context';
import {
  DEFAULT_MAPPING,
  type CsvRow,
  type ImportSource,
  type ResolvedColumns,
  isBlankRow,
  parseCsv,
  readSource,
  resolveColumns,
} from './csvFormat';
import { recordResult, type RecordTarget } from './resultService';

interface BatchState {
  batchId: string;
  target: RecordTarget;
  columns: ResolvedColumns;
  width: number;
  /** student id -> row that first named the student */
  seen: Map<string, number>;
}

function rejected(row: CsvRow, type: RowRejectionType, message: string): RowOutcome {
  return { row_number: row.rowNumber, status: 'rejected', reason: { type, message }, raw: row.raw };
}

function rejectionType(err: unknown): RowRejectionType {
  if (err instanceof UnknownStudentError) return 'UnknownStudentError';
  if (err instanceof StudentNotEnrolledError) return 'StudentNotEnrolledError';
  if (err instanceof ScoreOutOfRangeError) return 'ScoreOutOfRangeError';
  if (err instanceof OutOfRangeError) return 'OutOfRangeError';
  return 'PersistenceError';
}

async function processRow(ctx: ServiceContext, state: BatchState, row: CsvRow): Promise<RowOutcome> {
  if (row.quoteError) {
    return rejected(row, 'MalformedRowError', 'Unbalanced quotes');
  }
  if (row.fields.length !== state.width) {
    return rejected(row, 'MalformedRowError', `Expected ${state.width} columns, found ${row.fields.length}`);
  }

  const identifier = row.fields[state.columns.student].trim();
  if (!identifier) {
    return rejected(row, 'UnknownStudentError', 'Student identifier is empty');
  }
  const student = await ctx.store.findStudentByIdentifier(identifier);
  if (!student) {
    return rejected(row, 'UnknownStudentError', `Unknown student: ${identifier}`);
  }
  const firstRow = state.seen.get(student.id);
  if (firstRow !== undefined) {
    return rejected(row, 'DuplicateRowError', `Student ${identifier} already appears in row ${firstRow}`);
  }
  state.seen.set(student.id, row.rowNumber);

  const scoreRaw = row.fields[state.columns.score];
  const rawScore = parseDecimal(scoreRaw);
  if (rawScore === null) {
    return rejected(row, 'ParseError', `Score "${scoreRaw.trim()}" is not a number`);
  }
  const { assessment } = state.target;
  if (rawScore < 0 || rawScore > assessment.max_score) {
    return rejected(row, 'ScoreOutOfRangeError', new ScoreOutOfRangeError(rawScore, assessment.max_score).message);
  }

  const comment = state.columns.comment === null ? null : row.fields[state.columns.comment];
  const { record, change } = await recordResult(ctx, {
    assessmentId: assessment.id,
    studentId: student.id,
    rawScore,
    comment,
    importBatchId: state.batchId,
  }, state.target);
  return {
    row_number: row.rowNumber,
    status: 'accepted',
    student_identifier: identifier,
    raw_score: record.raw_score,
    derived_grade: record.derived_grade,
    change,
  };
}

/** Turns anything thrown while handling a row into that row's rejection. */
async function settleRow(ctx: ServiceContext, state: BatchState, row: CsvRow): Promise<RowOutcome> {
  try {
    return await processRow(ctx, state, row);
  } catch (err) {
    const type = rejectionType(err);
    if (type === 'OutOfRangeError' || type === 'PersistenceError') {
      ctx.logger.error({
        module: 'services.import',
        batch_id: state.batchId,
        row_number: row.rowNumber,
        error_type: type,
        error_detail: errorMessage(err),
      }, 'Row write fail');
    }
    return rejected(row, type, errorMessage(err));
  }
}

export function summarize(rows: RowOutcome[]): { counts: ImportCounts; status: ImportStatus } {
  const counts: ImportCounts = { total: rows.length, accepted: 0, rejected: 0, created: 0, updated: 0, unchanged: 0 };
  for (const row of rows) {
    if (row.status === 'accepted') {
      counts.accepted++;
      counts[row.change]++;
    } else {
      counts.rejected++;
    }
  }

  let status: ImportStatus = 'partially_accepted';
  if (counts.rejected === 0) status = 'fully_accepted';
  else if (counts.accepted === 0) status = 'nothing_accepted';
  return { counts, status };
}

/**
 * Imports one assessment's results from a delimited file. Each row is
 * committed on its own; row failures end up in the report and never abort
 * the batch. Only file-level and definitional problems throw, before any
 * row is written.
 */
export async function runImport(
  ctx: ServiceContext,
  assessmentId: string,
  source: ImportSource,
  mapping: ColumnMapping = DEFAULT_MAPPING,
): Promise<ImportReport> {
  return ctx.locks.withLock(assessmentId, async () => {
    const startedAt = new Date().toISOString();
    const target = await getActiveAssessment(ctx, assessmentId);

    const csv = parseCsv(await readSource(source));
    const state: BatchState = {
      batchId: uuidv4(),
      target,
      columns: resolveColumns(csv.header, mapping),
      width: csv.header.length,
      seen: new Map(),
    };

    ctx.logger.info({
      module: 'services.import',
      batch_id: state.batchId,
      assessment_id: assessmentId,
      delimiter: csv.delimiter,
      row_count: csv.rows.length,
    }, 'Import started');

    const rows: RowOutcome[] = [];
    for (const row of csv.rows) {
      if (isBlankRow(row)) continue;
      rows.push(await settleRow(ctx, state, row));
    }

    const { counts, status } = summarize(rows);
    await recordChange(ctx, {
      action: 'import',
      entity: 'result',
      recordId: assessmentId,
      newValue: `${counts.accepted}/${counts.total}`,
      comment: `batch ${state.batchId}`,
    });

    const report: ImportReport = {
      batch_id: state.batchId,
      assessment_id: assessmentId,
      delimiter: csv.delimiter,
      status,
      counts,
      rows,
      started_at: startedAt,
      finished_at: new Date().toISOString(),
    };

    const level = counts.rejected > 0 ? 'warn' : 'info';
    ctx.logger[level]({
      module: 'services.import',
      batch_id: state.batchId,
      assessment_id: assessmentId,
      status,
      ...counts,
    }, 'Import finished');
    return report;
  });
}
