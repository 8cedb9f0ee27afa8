/**
 * Solve the LP problem
 *
 * Layer 1: injected solver (tests, callers with their own backend)
 * Layer 2: HiGHS WASM
 * Layer 3: GLPK fallback when HiGHS fails to load or throws
 */

import type { LPProblem, LPSolver, LPSolverParams, SolverSolution } from '../types';
import { highsSolver } from './highsWrapper';
import { glpkSolver } from './glpkWrapper';
import { LP_SCALE_LIMITS } from '@/_domain';

export async function solveProblem(
  problem: LPProblem,
  params: LPSolverParams,
  solver?: LPSolver
): Promise<SolverSolution> {
  const binaryCount = problem.variables.filter(v => v.kind === 'binary').length;
  console.log(`[Solver] Problem "${problem.name}": ${problem.numVariables} vars (${binaryCount} binary), ${problem.numConstraints} constraints`);

  if (problem.numVariables > LP_SCALE_LIMITS.WARN_VARIABLES_THRESHOLD) {
    console.warn(`[Solver] Large model (${problem.numVariables} > ${LP_SCALE_LIMITS.WARN_VARIABLES_THRESHOLD} variables), expect a long solve`);
  }

  if (solver) {
    console.log(`[Solver] Using injected solver: ${solver.name}`);
    return solver.solve(problem, params);
  }

  try {
    return await highsSolver.solve(problem, params);
  } catch (error) {
    console.warn('[Solver] HiGHS failed, falling back to GLPK:', error instanceof Error ? error.message : error);
    try {
      return await glpkSolver.solve(problem, params);
    } catch (glpkError) {
      console.error('[Solver] GLPK also failed:', glpkError instanceof Error ? glpkError.message : glpkError);
      throw glpkError;
    }
  }
}
