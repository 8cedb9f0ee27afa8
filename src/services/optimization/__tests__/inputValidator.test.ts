import { describe, it, expect } from 'vitest';
import { validateImmersionInputs, validatePartnerInputs } from '../preprocessing/inputValidator';
import { InputDomainError, InputShapeError } from '../errors';
import { createImmersionStudent, createPartnerStudent } from '../students';
import type { PartnerStudent } from '../types';
import { immersionStudents, partnerStudents, zeros } from './fixtures';

describe('validatePartnerInputs', () => {
  it('accepts a symmetric matrix and a valid group count', () => {
    const prefs = zeros(6, 6);
    prefs[0][3] = -1;
    prefs[3][0] = -1;
    expect(() => validatePartnerInputs(partnerStudents(), 2, prefs)).not.toThrow();
  });

  it('rejects an empty roster', () => {
    expect(() => validatePartnerInputs([], 1, [])).toThrow(InputShapeError);
  });

  it('rejects holes in the student list', () => {
    const students = new Array<PartnerStudent>(2);
    students[0] = createPartnerStudent('Ada', 'Byron', 1);
    expect(() => validatePartnerInputs(students, 1, zeros(2, 2))).toThrow(
      '`students` must be a dense list indexed from 0 (no entry at index 1)'
    );
  });

  it('rejects group counts outside 1..n', () => {
    expect(() => validatePartnerInputs(partnerStudents(), 0, zeros(6, 6))).toThrow(InputShapeError);
    expect(() => validatePartnerInputs(partnerStudents(), 7, zeros(6, 6))).toThrow(InputShapeError);
    expect(() => validatePartnerInputs(partnerStudents(), 1.5, zeros(6, 6))).toThrow(InputShapeError);
  });

  it('rejects a matrix of the wrong size', () => {
    expect(() => validatePartnerInputs(partnerStudents(), 2, zeros(5, 6))).toThrow(
      'Partner preference matrix has 5 rows, expected 6 (one per student)'
    );
    expect(() => validatePartnerInputs(partnerStudents(), 2, zeros(6, 5))).toThrow(InputShapeError);
  });

  it('rejects an asymmetric matrix', () => {
    const prefs = zeros(6, 6);
    prefs[1][2] = -1;
    expect(() => validatePartnerInputs(partnerStudents(), 2, prefs)).toThrow(InputDomainError);
  });

  it('tolerates tiny asymmetry', () => {
    const prefs = zeros(6, 6);
    prefs[1][2] = -1;
    prefs[2][1] = -1 + 1e-12;
    expect(() => validatePartnerInputs(partnerStudents(), 2, prefs)).not.toThrow();
  });

  it('rejects non-finite entries and scores', () => {
    const prefs = zeros(6, 6);
    prefs[0][0] = Number.NaN;
    expect(() => validatePartnerInputs(partnerStudents(), 2, prefs)).toThrow(InputDomainError);

    const students = partnerStudents();
    students[4].score = Number.POSITIVE_INFINITY;
    expect(() => validatePartnerInputs(students, 2, zeros(6, 6))).toThrow(InputDomainError);
  });
});

describe('validateImmersionInputs', () => {
  const week1 = [[1, 4], [1, 4], [1, 4], [4, 1], [4, 1], [4, 1]];

  it('returns the option layout', () => {
    const week2 = [[1, 2, 3], [1, 2, 3], [1, 2, 3], [1, 2, 3], [1, 2, 3], [1, 2, 3]];
    const layout = validateImmersionInputs(immersionStudents(), [week1, week2]);
    expect(layout).toEqual({ numWeeks: 2, numOptions: [2, 3], offsets: [0, 2, 5], totalOptions: 5 });
  });

  it('requires at least one week', () => {
    expect(() => validateImmersionInputs(immersionStudents(), [])).toThrow(InputShapeError);
  });

  it('rejects a week with the wrong number of students', () => {
    expect(() => validateImmersionInputs(immersionStudents(), [week1.slice(0, 5)])).toThrow(
      'All weeks must have the same number of students: week 1 has 5 rows, expected 6'
    );
  });

  it('rejects ragged rows', () => {
    const ragged = week1.map(row => [...row]);
    ragged[3] = [4, 1, 2];
    expect(() => validateImmersionInputs(immersionStudents(), [ragged])).toThrow(InputShapeError);
  });

  it('rejects non-positive preferences in a regular week', () => {
    const bad = week1.map(row => [...row]);
    bad[2][1] = 0;
    expect(() => validateImmersionInputs(immersionStudents(), [bad])).toThrow(InputDomainError);
  });

  it('accepts an all-zero sentinel week', () => {
    expect(() => validateImmersionInputs(immersionStudents(), [zeros(6, 2), week1])).not.toThrow();
  });

  it('rejects more stored weeks than exist', () => {
    const students = immersionStudents();
    students[0].assigned.push(1, 2);
    expect(() => validateImmersionInputs(students, [week1])).toThrow(InputShapeError);
  });

  it('rejects stored options out of range, accepts the non-participation sentinel', () => {
    const outOfRange = [createImmersionStudent('Ada', 'Byron', 'Math', [3])];
    expect(() => validateImmersionInputs(outOfRange, [[[1, 2]]])).toThrow(
      'Student 0 week 1: option 3 outside 1..2'
    );

    const fractional = [createImmersionStudent('Ada', 'Byron', 'Math', [1.5])];
    expect(() => validateImmersionInputs(fractional, [[[1, 2]]])).toThrow(InputShapeError);

    const sittingOut = [createImmersionStudent('Ada', 'Byron', 'Math', [0])];
    expect(() => validateImmersionInputs(sittingOut, [[[1, 2]]])).not.toThrow();
  });
});
