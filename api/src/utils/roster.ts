import type { CourseRef, Student } from '../types';

export function isEnrolled(student: Student, courseRef: CourseRef): boolean {
  return courseRef.kind === 'class'
    ? student.class_id === courseRef.id
    : student.course_id === courseRef.id;
}

export function compareByName(a: Student, b: Student): number {
  return a.last_name.localeCompare(b.last_name) || a.first_name.localeCompare(b.first_name);
}
