import { describe, it, expect } from 'vitest';
import { extractImmersionChoices, extractPartnerGroups } from '../postprocessing/solutionExtractor';
import { buildOptionLayout } from '../preprocessing/optionLayout';
import { createImmersionStudent, createPartnerStudent } from '../students';
import type { SolverSolution } from '../types';

function solution(values: Record<string, number>): SolverSolution {
  return {
    status: 'OPTIMAL',
    objectiveValue: 0,
    values: new Map(Object.entries(values)),
    relativeGap: 0,
    solveTimeMs: 0,
    solverName: 'Test',
  };
}

describe('extractPartnerGroups', () => {
  const students = [
    createPartnerStudent('Ada', 'Byron', 1),
    createPartnerStudent('Alan', 'Turing', 2),
    createPartnerStudent('Grace', 'Hopper', 3),
  ];
  const vars = [['a00', 'a01'], ['a10', 'a11'], ['a20', 'a21']];

  it('uses a strict 0.5 threshold and tolerates inexact values', () => {
    const { groups, unassigned } = extractPartnerGroups(
      solution({ a00: 0.9999997, a01: 1e-9, a11: 1, a20: 0.5, a21: 0.4 }),
      students,
      vars,
      2
    );
    expect(groups).toEqual([[students[0]], [students[1]]]);
    expect(unassigned).toEqual([students[2]]);
  });
});

describe('extractImmersionChoices', () => {
  const preferences = [[[1, 2], [2, 1]], [[1, 2, 3], [3, 2, 1]]];
  const layout = buildOptionLayout(preferences);
  const vars = [0, 1].map(i => [0, 1, 2, 3, 4].map(c => `assign_${i}_${c}`));

  it('appends free weeks without touching stored ones', () => {
    const students = [createImmersionStudent('Ada', 'Byron', 'P', [2]), createImmersionStudent('Alan', 'Turing', 'Q')];
    const result = extractImmersionChoices(
      solution({ assign_0_0: 1, assign_0_4: 1, assign_1_0: 1e-9, assign_1_1: 0.99 }),
      students,
      vars,
      layout
    );

    expect(students[0].assigned).toEqual([2, 3]);
    // No indicator in week 2 for the second student: the sequence stops there
    expect(students[1].assigned).toEqual([2]);
    expect(result.appended).toBe(2);
    expect(result.incomplete).toEqual([students[1]]);
  });

  it('extracts nothing from an empty solution', () => {
    const students = [createImmersionStudent('Ada', 'Byron', 'P', [2]), createImmersionStudent('Alan', 'Turing', 'Q')];
    const result = extractImmersionChoices(solution({}), students, vars, layout);

    expect(students.map(s => s.assigned)).toEqual([[2], []]);
    expect(result.appended).toBe(0);
    expect(result.incomplete).toHaveLength(2);
  });
});
