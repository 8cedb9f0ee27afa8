/**
 * Student records
 *
 * Partner students are treated as values. Immersion students carry an
 * `assigned` sequence that the engine mutates in place, so callers keep one
 * array of students across staged solves (week 1 now, the rest later) and
 * reset it only through `unassign`.
 */

import type { ImmersionStudent, NamedStudent, PartnerStudent } from './types';

export function createPartnerStudent(firstName: string, lastName: string, score: number): PartnerStudent {
  return { firstName, lastName, score };
}

export function createImmersionStudent(
  firstName: string,
  lastName: string,
  program: string,
  assigned: number[] = []
): ImmersionStudent {
  return { firstName, lastName, program, assigned: [...assigned] };
}

/**
 * Equality by name only; scores and assignments are ignored
 */
export function sameStudent(a: NamedStudent, b: NamedStudent): boolean {
  return a.firstName === b.firstName && a.lastName === b.lastName;
}

/** "First Last" - the form used in partner requests */
export function displayName(student: NamedStudent): string {
  return `${student.firstName} ${student.lastName}`;
}

/** "Last, First" - the form used in collision keys */
export function sortName(student: NamedStudent): string {
  return `${student.lastName}, ${student.firstName}`;
}

/**
 * Clear every student's assignment sequence.
 * The only sanctioned way to reset accumulated immersion state.
 */
export function unassign(students: ImmersionStudent[]): void {
  for (const student of students) {
    student.assigned.length = 0;
  }
}
