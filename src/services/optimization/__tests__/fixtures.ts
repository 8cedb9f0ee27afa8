import type { ImmersionStudent, LPProblem, LPSolver, LPSolverParams, PartnerStudent, SolverSolution, SolverStatus } from '../types';
import { createImmersionStudent, createPartnerStudent } from '../students';

const LETTERS = ['A', 'B', 'C', 'D', 'E', 'F'];
const PROGRAMS = ['Program1', 'Program2', 'Program3', 'Program1', 'Program2', 'Program3'];
const SCORES = [1, 2, 3, 1, 2, 3];

/** StudentA..StudentF, last name "Last", scores 1,2,3,1,2,3 */
export function partnerStudents(): PartnerStudent[] {
  return LETTERS.map((letter, i) => createPartnerStudent(`Student${letter}`, 'Last', SCORES[i]));
}

/** StudentA..StudentF, programs 1,2,3,1,2,3 */
export function immersionStudents(): ImmersionStudent[] {
  return LETTERS.map((letter, i) => createImmersionStudent(`Student${letter}`, 'Last', PROGRAMS[i]));
}

export function zeros(rows: number, cols: number): number[][] {
  return Array.from({ length: rows }, () => Array.from({ length: cols }, () => 0));
}

export interface FakeSolver extends LPSolver {
  problems: LPProblem[];
  params: LPSolverParams[];
}

/**
 * Solver stand-in returning fixed values.
 * `values` may be a function of the problem to pick names after building.
 */
export function fakeSolver(
  values: Record<string, number> | ((problem: LPProblem) => Record<string, number>),
  status: SolverStatus = 'OPTIMAL',
  overrides: Partial<SolverSolution> = {}
): FakeSolver {
  const problems: LPProblem[] = [];
  const params: LPSolverParams[] = [];
  return {
    name: 'Fake',
    problems,
    params,
    async solve(problem: LPProblem, solveParams: LPSolverParams): Promise<SolverSolution> {
      problems.push(problem);
      params.push(solveParams);
      const raw = typeof values === 'function' ? values(problem) : values;
      return {
        status,
        objectiveValue: 0,
        values: new Map(Object.entries(raw)),
        relativeGap: status === 'OPTIMAL' ? 0 : null,
        solveTimeMs: 1,
        solverName: 'Fake',
        ...overrides,
      };
    },
  };
}

/** A solver that fails the test if it is ever called */
export const throwingSolver: LPSolver = {
  name: 'Throwing',
  async solve(): Promise<SolverSolution> {
    throw new Error('solver must not be called');
  },
};
