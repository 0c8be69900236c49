import pino from 'pino';
import type { ServiceContext } from '../src/services/context';
import { createAssessment } from '../src/services/assessmentService';
import { createGradeKey } from '../src/services/gradeKeyService';
import { ImportLockRegistry } from '../src/services/importLock';
import { MemoryGradingStore } from '../src/store/memoryStore';
import type { Assessment, GradeBand, GradeKey, Student } from '../src/types';

export const CLASS_10A = 'class-10a';
export const CLASS_9B = 'class-9b';

export const STANDARD_BANDS: GradeBand[] = [
  { lower_bound: 0, upper_bound: 0.6, label: 'nicht bestanden' },
  { lower_bound: 0.6, upper_bound: 0.75, label: 'befriedigend' },
  { lower_bound: 0.75, upper_bound: 1, label: 'gut' },
];

const LAST_NAMES = ['Adler', 'Becker', 'Schulz', 'Fischer', 'Weber', 'Meyer', 'Wagner', 'Koch', 'Richter'];

/** stud_1..stud_9 and stud_42 in class 10a, stud_77 in class 9b. */
export function makeStudents(): Student[] {
  const students: Student[] = LAST_NAMES.map((lastName, i) => ({
    id: `s${i + 1}`,
    identifier: `stud_${i + 1}`,
    first_name: `Kind${i + 1}`,
    last_name: lastName,
    class_id: CLASS_10A,
    course_id: null,
  }));
  students.push({
    id: 's42',
    identifier: 'stud_42',
    first_name: 'Lena',
    last_name: 'Zimmermann',
    class_id: CLASS_10A,
    course_id: 'course-inf',
  });
  students.push({
    id: 's77',
    identifier: 'stud_77',
    first_name: 'Tom',
    last_name: 'Hoffmann',
    class_id: CLASS_9B,
    course_id: null,
  });
  return students;
}

export function makeContext(students: Student[] = makeStudents()): { ctx: ServiceContext; store: MemoryGradingStore } {
  const store = new MemoryGradingStore({ students });
  const ctx: ServiceContext = {
    store,
    logger: pino({ level: 'silent' }),
    locks: new ImportLockRegistry(),
  };
  return { ctx, store };
}

export async function setupAssessment(
  ctx: ServiceContext,
  maxScore = 20,
): Promise<{ gradeKey: GradeKey; assessment: Assessment }> {
  const gradeKey = await createGradeKey(ctx, 'standard', STANDARD_BANDS);
  const assessment = await createAssessment(ctx, {
    title: 'Klassenarbeit 1',
    courseRef: { kind: 'class', id: CLASS_10A },
    maxScore,
    weight: 2,
    gradeKeyId: gradeKey.id,
  });
  return { gradeKey, assessment };
}
