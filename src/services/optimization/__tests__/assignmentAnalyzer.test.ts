import { describe, it, expect } from 'vitest';
import {
  analyzeAssignments,
  analyzePartnerGroups,
  getPairCollisions,
  getProgramCollisions,
  pairKey,
  programCollisionKey
} from '../postprocessing/assignmentAnalyzer';
import { formatImmersionReport, formatImmersionReportLines } from '../postprocessing/statsReport';
import type { ImmersionStudent } from '../types';
import { immersionStudents, partnerStudents, zeros } from './fixtures';

function withAssignments(weeks: number[][]): ImmersionStudent[] {
  const students = immersionStudents();
  students.forEach((student, i) => {
    student.assigned.push(...weeks.map(week => week[i]));
  });
  return students;
}

describe('pairKey / programCollisionKey', () => {
  it('orders names so the key is symmetric', () => {
    const [a, b] = immersionStudents();
    expect(pairKey(a, b)).toBe('Last, StudentA | Last, StudentB');
    expect(pairKey(b, a)).toBe('Last, StudentA | Last, StudentB');
  });

  it('uses 1-based week and option', () => {
    expect(programCollisionKey(2, 3, 'Program1')).toBe('2:3:Program1');
  });
});

describe('analyzeAssignments', () => {
  const week1 = [[1, 4], [1, 4], [1, 4], [4, 1], [4, 1], [4, 1]];
  const week2 = [[1, 4, 4], [4, 1, 4], [4, 4, 1], [4, 1, 4], [4, 4, 1], [1, 4, 4]];

  it('summarizes a collision-free schedule', () => {
    const students = withAssignments([[1, 1, 1, 2, 2, 2], [1, 2, 3, 2, 3, 1]]);
    const stats = analyzeAssignments(students, [week1, week2]);

    expect(stats.meanPreferenceScore).toBe(1);
    expect(stats.maxImbalance).toBe(0);
    expect(stats.programCollisions.size).toBe(0);
    expect(stats.pairCollisions.size).toBe(9);
    expect(Array.from(stats.pairCollisions.values()).every(count => count === 1)).toBe(true);

    const [a, b, , d, , f] = students;
    expect(getPairCollisions(stats, a, b)).toBe(1);
    expect(getPairCollisions(stats, f, a)).toBe(1);
    expect(getPairCollisions(stats, a, d)).toBe(0);
  });

  it('skips sentinel weeks in the mean and counts collisions', () => {
    const sentinel = zeros(6, 2);
    const prefs = [[1, 3], [2, 2], [5, 1], [1, 4], [3, 3], [2, 1]];
    // StudentF sits out the sentinel week
    const students = withAssignments([[1, 1, 1, 1, 2, 0], [1, 1, 2, 1, 2, 2]]);
    const stats = analyzeAssignments(students, [sentinel, prefs]);

    expect(stats.meanPreferenceScore).toBe(1.5);
    expect(stats.maxImbalance).toBe(3);

    const [a, b, c, d, e, f] = students;
    expect(getPairCollisions(stats, d, a)).toBe(2);
    expect(getPairCollisions(stats, a, b)).toBe(2);
    expect(getPairCollisions(stats, b, d)).toBe(2);
    expect(getPairCollisions(stats, a, c)).toBe(1);
    expect(getPairCollisions(stats, e, f)).toBe(1);
    expect(getPairCollisions(stats, a, f)).toBe(0);

    expect(Object.fromEntries(stats.programCollisions)).toEqual({
      '1:1:Program1': 1,
      '2:1:Program1': 1,
      '2:2:Program3': 1,
    });
    expect(getProgramCollisions(stats, 1, 2, 'Program2')).toBe(0);
    expect(Object.fromEntries(stats.programCollisionTotals)).toEqual({ Program1: 2, Program3: 1 });
  });

  it('returns zeros before anything is assigned', () => {
    const stats = analyzeAssignments(immersionStudents(), [week1]);
    expect(stats.meanPreferenceScore).toBe(0);
    expect(stats.maxImbalance).toBe(0);
    expect(stats.pairCollisions.size).toBe(0);
  });
});

describe('formatImmersionReport', () => {
  it('prints the collision-free summary', () => {
    const students = withAssignments([[1, 1, 1, 2, 2, 2], [1, 2, 3, 2, 3, 1]]);
    const week1 = [[1, 4], [1, 4], [1, 4], [4, 1], [4, 1], [4, 1]];
    const week2 = [[1, 4, 4], [4, 1, 4], [4, 4, 1], [4, 1, 4], [4, 4, 1], [1, 4, 4]];

    expect(formatImmersionReportLines(analyzeAssignments(students, [week1, week2]))).toEqual([
      'Mean preference score: 1.0',
      'Maximum imbalance in group size: 0',
      'Two or more students from the same program assigned to the same group ("program collisions"):',
      '  Total number of program collisions: 0',
      '  Maximum number of collisions in a single group: 0',
      '  Number of times each program appears in a collision: {}',
      'Two or more students sharing a group in more than one week ("student collisions"):',
      '  Total number of student collisions: 0',
      '  Maximum number of collisions for a single pair: 1',
    ]);
  });

  it('prints collision counts', () => {
    const prefs = [[1, 3], [2, 2], [5, 1], [1, 4], [3, 3], [2, 1]];
    const students = withAssignments([[1, 1, 1, 1, 2, 0], [1, 1, 2, 1, 2, 2]]);
    const report = formatImmersionReport(analyzeAssignments(students, [zeros(6, 2), prefs]));

    expect(report.split('\n')).toEqual([
      'Mean preference score: 1.5',
      'Maximum imbalance in group size: 3',
      'Two or more students from the same program assigned to the same group ("program collisions"):',
      '  Total number of program collisions: 3',
      '  Maximum number of collisions in a single group: 1',
      '  Number of times each program appears in a collision: {Program1: 2, Program3: 1}',
      'Two or more students sharing a group in more than one week ("student collisions"):',
      '  Total number of student collisions: 3',
      '  Maximum number of collisions for a single pair: 2',
    ]);
  });
});

describe('analyzePartnerGroups', () => {
  it('reports sizes, means and bonus pairs', () => {
    const students = partnerStudents();
    const [a, b, c, d, e, f] = students;
    const prefs = zeros(6, 6);
    prefs[0][1] = prefs[1][0] = -1;
    prefs[0][3] = prefs[3][0] = -2;
    prefs[2][4] = prefs[4][2] = 1;

    expect(analyzePartnerGroups([[a, b, c], [d, e, f]], students, prefs)).toEqual({
      groupSizes: [3, 3],
      groupMeanScores: [2, 2],
      sizeSpread: 0,
      honoredBonusPairs: 1,
      splitBonusPairs: 1,
    });
  });

  it('counts no pairs without preferences', () => {
    const students = partnerStudents();
    const stats = analyzePartnerGroups([students.slice(0, 4), students.slice(4)], students);
    expect(stats.groupSizes).toEqual([4, 2]);
    expect(stats.sizeSpread).toBe(2);
    expect(stats.honoredBonusPairs).toBe(0);
  });
});
