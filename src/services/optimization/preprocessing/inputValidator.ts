/**
 * Input Validator
 *
 * Rejects malformed inputs before any model is built:
 * - Shape errors: holes in the student list, matrix dimensions, option indices
 * - Domain errors: non-finite values, non-positive preferences, asymmetry
 */

import type {
  ImmersionStudent,
  PartnerPreferences,
  PartnerStudent,
  WeeklyPreferences
} from '../types';
import { InputDomainError, InputShapeError } from '../errors';
import { buildOptionLayout, isSentinelWeek, type OptionLayout } from './optionLayout';
import { NOT_PARTICIPATING, SYMMETRY_TOLERANCE } from '@/_domain';

/**
 * Students must form a dense list: index i of every matrix is students[i]
 */
function validateStudentList(students: readonly unknown[]): void {
  if (students.length === 0) {
    throw new InputShapeError('At least one student is required');
  }
  for (let i = 0; i < students.length; i++) {
    if (!(i in students) || students[i] === undefined) {
      throw new InputShapeError(`\`students\` must be a dense list indexed from 0 (no entry at index ${i})`);
    }
  }
}

function validateMatrixShape(matrix: number[][], rows: number, cols: number, label: string): void {
  if (matrix.length !== rows) {
    throw new InputShapeError(`${label} has ${matrix.length} rows, expected ${rows} (one per student)`);
  }
  matrix.forEach((row, i) => {
    if (row.length !== cols) {
      throw new InputShapeError(`${label} row ${i} has ${row.length} columns, expected ${cols}`);
    }
  });
}

/**
 * Validate partner inputs: dense students, finite scores, 1 ≤ g ≤ n,
 * n×n finite symmetric preferences
 */
export function validatePartnerInputs(
  students: PartnerStudent[],
  numGroups: number,
  preferences: PartnerPreferences
): void {
  validateStudentList(students);
  const n = students.length;

  if (!Number.isInteger(numGroups) || numGroups < 1 || numGroups > n) {
    throw new InputShapeError(`Number of groups must be an integer between 1 and ${n}, got ${numGroups}`);
  }

  students.forEach((s, i) => {
    if (!Number.isFinite(s.score)) {
      throw new InputDomainError(`Score of student ${i} (${s.firstName} ${s.lastName}) is not a finite number`);
    }
  });

  validateMatrixShape(preferences, n, n, 'Partner preference matrix');

  for (let i = 0; i < n; i++) {
    for (let j = 0; j < n; j++) {
      const value = preferences[i][j];
      if (!Number.isFinite(value)) {
        throw new InputDomainError(`Partner preference [${i}][${j}] is not a finite number`);
      }
      if (j > i && Math.abs(value - preferences[j][i]) > SYMMETRY_TOLERANCE) {
        throw new InputDomainError(
          `Partner preferences must be symmetric: [${i}][${j}]=${value} but [${j}][${i}]=${preferences[j][i]}`
        );
      }
    }
  }
}

/**
 * Validate immersion inputs and return the option layout.
 *
 * - every week has one row per student, all rows the same width ≥ 1
 * - regular weeks: strictly positive, finite entries
 * - sentinel weeks: all zero
 * - stored assignments: at most one per week, integer in [0, options]
 */
export function validateImmersionInputs(
  students: ImmersionStudent[],
  preferences: WeeklyPreferences
): OptionLayout {
  validateStudentList(students);
  const n = students.length;

  if (preferences.length === 0) {
    throw new InputShapeError('At least one week of preferences is required');
  }

  preferences.forEach((week, w) => {
    if (week.length !== n) {
      throw new InputShapeError(
        `All weeks must have the same number of students: week ${w + 1} has ${week.length} rows, expected ${n}`
      );
    }
    const width = week[0].length;
    if (width < 1) {
      throw new InputShapeError(`Week ${w + 1} has no options`);
    }
    validateMatrixShape(week, n, width, `Week ${w + 1} preferences`);

    if (isSentinelWeek(week)) return;

    week.forEach((row, i) => {
      row.forEach((value, k) => {
        if (!Number.isFinite(value) || value <= 0) {
          throw new InputDomainError(
            `Week ${w + 1} preference for student ${i}, option ${k + 1} must be a positive number (got ${value}); ` +
            'use an all-zero matrix to mark a week as externally assigned'
          );
        }
      });
    });
  });

  const layout = buildOptionLayout(preferences);

  students.forEach((student, i) => {
    if (student.assigned.length > layout.numWeeks) {
      throw new InputShapeError(
        `Student ${i} (${student.firstName} ${student.lastName}) has ${student.assigned.length} assigned weeks but only ${layout.numWeeks} weeks exist`
      );
    }
    student.assigned.forEach((option, w) => {
      const valid = Number.isInteger(option) &&
        (option === NOT_PARTICIPATING || (option >= 1 && option <= layout.numOptions[w]));
      if (!valid) {
        throw new InputShapeError(
          `Student ${i} week ${w + 1}: option ${option} outside 1..${layout.numOptions[w]}`
        );
      }
    });
  });

  return layout;
}
