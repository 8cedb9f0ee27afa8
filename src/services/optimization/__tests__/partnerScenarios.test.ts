import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { assignPartners } from '../partnerEngine';
import { analyzePartnerGroups } from '../postprocessing/assignmentAnalyzer';
import { glpkSolver } from '../solver/glpkWrapper';
import { partnerStudents, zeros } from './fixtures';

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

function bonus(value: number): number[][] {
  const prefs = zeros(6, 6);
  prefs[0][3] = prefs[3][0] = value;
  return prefs;
}

describe('assignPartners with HiGHS', () => {
  it('balances scores across two groups', async () => {
    const students = partnerStudents();
    const result = await assignPartners(students, 2, zeros(6, 6));
    const stats = analyzePartnerGroups(result.groups, students);

    expect(result.solverStatus).toBe('OPTIMAL');
    expect(stats.groupSizes).toEqual([3, 3]);
    expect(stats.groupMeanScores).toEqual([2, 2]);
    expect(result.objectiveValue).toBeCloseTo(0, 6);
  });

  it('balances scores across three groups', async () => {
    const students = partnerStudents();
    const result = await assignPartners(students, 3, zeros(6, 6));
    const stats = analyzePartnerGroups(result.groups, students);

    expect(stats.groupSizes).toEqual([2, 2, 2]);
    expect(stats.groupMeanScores).toEqual([2, 2, 2]);
  });

  it('keeps a strongly requested pair together at the cost of balance', async () => {
    const students = partnerStudents();
    const prefs = bonus(-1000);
    const result = await assignPartners(students, 2, prefs);
    const stats = analyzePartnerGroups(result.groups, students, prefs);

    expect(stats.honoredBonusPairs).toBe(1);
    expect(stats.groupSizes).toEqual([3, 3]);
    // StudentA + StudentD + a 3: totals 5 and 7
    expect(result.objectiveValue).toBeCloseTo(2 - 1000, 6);
  });

  it('lets balance win over a weak request', async () => {
    const students = partnerStudents();
    const prefs = bonus(-0.1);
    const result = await assignPartners(students, 2, prefs);
    const stats = analyzePartnerGroups(result.groups, students, prefs);

    expect(stats.groupMeanScores).toEqual([2, 2]);
    expect(stats.honoredBonusPairs).toBe(0);
  });

  it('keeps a strongly requested pair together across three groups', async () => {
    const students = partnerStudents();
    const prefs = bonus(-1000);
    const result = await assignPartners(students, 3, prefs);
    const stats = analyzePartnerGroups(result.groups, students, prefs);

    expect(stats.honoredBonusPairs).toBe(1);
    expect(stats.groupSizes).toEqual([2, 2, 2]);
    const together = result.groups.find(group => group.includes(students[0]));
    expect(together).toEqual([students[0], students[3]]);
  });

  it('lets balance win over a weak request across three groups', async () => {
    const students = partnerStudents();
    const prefs = bonus(-0.1);
    const result = await assignPartners(students, 3, prefs);
    const stats = analyzePartnerGroups(result.groups, students, prefs);

    expect(stats.groupMeanScores).toEqual([2, 2, 2]);
    expect(stats.honoredBonusPairs).toBe(0);
  });

  it('keeps a penalized pair apart', async () => {
    const students = partnerStudents();
    // StudentB and StudentE both score 2; together they would still balance
    const prefs = zeros(6, 6);
    prefs[1][4] = prefs[4][1] = 5;
    const result = await assignPartners(students, 2, prefs);

    const groupOf = (index: number) => result.groups.findIndex(group => group.includes(students[index]));
    expect(groupOf(1)).not.toBe(groupOf(4));
    expect(result.objectiveValue).toBeCloseTo(0, 6);
  });
});

describe('assignPartners with GLPK', () => {
  it('finds the same balanced split', async () => {
    const students = partnerStudents();
    const result = await assignPartners(students, 2, zeros(6, 6), { solver: glpkSolver });
    const stats = analyzePartnerGroups(result.groups, students);

    expect(result.solverStatus).toBe('OPTIMAL');
    expect(stats.groupSizes).toEqual([3, 3]);
    expect(stats.groupMeanScores).toEqual([2, 2]);
  });
});
