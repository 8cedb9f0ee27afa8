/**
 * LP Solver Wrapper using HiGHS
 *
 * Uses the HiGHS WebAssembly build for LP/MIP optimization.
 *
 * Handles:
 * - Lazy loading of the solver module
 * - Problem conversion to LP format
 * - Status mapping and solution extraction
 * - Relative gap on time-limited runs (bound from the LP relaxation)
 */

import highsLoader from 'highs';
import type { LPProblem, LPSolver, LPSolverParams, SolverSolution, SolverStatus } from '../types';
import { problemToLPFormat } from './lpFormat';
import { SOLVER_DEFAULTS } from '@/_domain';

/**
 * The part of the HiGHS module this wrapper relies on.
 * Results are parsed from `unknown` below.
 */
interface HighsInstance {
  solve(problem: string, options?: object): unknown;
}

interface ParsedHighsSolution {
  status: string;
  objectiveValue: number | null;
  /** compact column name → primal value */
  columns: Map<string, number>;
}

// Solver instance (lazy loaded)
let highsInstance: HighsInstance | null = null;
let highsLoadPromise: Promise<HighsInstance> | null = null;

/**
 * Get or load HiGHS instance
 */
async function getHiGHS(): Promise<HighsInstance> {
  if (highsInstance) return highsInstance;

  if (!highsLoadPromise) {
    highsLoadPromise = (async () => {
      try {
        console.log('[HiGHS] Loading HiGHS WebAssembly...');
        const instance: HighsInstance = await highsLoader();
        highsInstance = instance;
        console.log('[HiGHS] HiGHS loaded successfully');
        return instance;
      } catch (error) {
        highsLoadPromise = null;
        throw error;
      }
    })();
  }

  return highsLoadPromise;
}

/**
 * Reset HiGHS instance after critical error
 * This forces a fresh WASM module load on next solve
 */
export function resetHiGHSInstance(): void {
  console.log('[HiGHS] Resetting HiGHS instance');
  highsInstance = null;
  highsLoadPromise = null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Parse the raw result of highs.solve()
 */
export function parseHighsSolution(raw: unknown): ParsedHighsSolution {
  if (!isRecord(raw) || typeof raw.Status !== 'string') {
    throw new Error('[HiGHS] Unexpected solution shape (no Status)');
  }

  const columns = new Map<string, number>();
  if (isRecord(raw.Columns)) {
    for (const [name, column] of Object.entries(raw.Columns)) {
      if (isRecord(column) && typeof column.Primal === 'number') {
        columns.set(name, column.Primal);
      }
    }
  }

  const objectiveValue = typeof raw.ObjectiveValue === 'number' && Number.isFinite(raw.ObjectiveValue)
    ? raw.ObjectiveValue
    : null;

  return { status: raw.Status, objectiveValue, columns };
}

/**
 * Map HiGHS model status text to SolverStatus
 */
export function mapHighsStatus(status: string): SolverStatus {
  switch (status) {
    case 'Optimal':
      return 'OPTIMAL';
    case 'Time limit reached':
      return 'TIME_LIMIT';
    case 'Infeasible':
      return 'INFEASIBLE';
    default:
      return 'OTHER';
  }
}

/**
 * Relative gap between an incumbent and a bound
 */
export function relativeGap(objective: number, bound: number): number {
  return Math.abs(objective - bound) / Math.max(Math.abs(objective), SOLVER_DEFAULTS.GAP_EPSILON);
}

/**
 * Time limit for the MIP itself. A share of the budget is held back so a
 * time-limited run can still solve the relaxation for its gap.
 */
export function mipTimeLimit(params: LPSolverParams): number | null {
  if (params.timeLimitSeconds === null) return null;
  return params.timeLimitSeconds * (1 - SOLVER_DEFAULTS.RELAXATION_BUDGET_SHARE);
}

/**
 * What is left of the budget after the MIP ran for `elapsedSeconds`
 */
export function relaxationTimeLimit(params: LPSolverParams, elapsedSeconds: number): number | null {
  if (params.timeLimitSeconds === null) return null;
  return params.timeLimitSeconds - elapsedSeconds;
}

export function buildHighsOptions(
  params: LPSolverParams,
  timeLimitSeconds: number | null = mipTimeLimit(params)
): Record<string, string | number | boolean> {
  const options: Record<string, string | number | boolean> = { output_flag: !params.silent };
  if (timeLimitSeconds !== null) {
    options.time_limit = timeLimitSeconds;
  }
  return { ...options, ...params.attributes };
}

/**
 * Lower bound from the LP relaxation, used to report a gap when the MIP
 * stopped on the time limit. Null when the relaxation cannot be solved
 * within what is left of the budget.
 */
function solveRelaxationBound(
  highs: HighsInstance,
  problem: LPProblem,
  params: LPSolverParams,
  elapsedSeconds: number
): number | null {
  const timeLimit = relaxationTimeLimit(params, elapsedSeconds);
  if (timeLimit !== null && timeLimit <= 0) {
    console.warn('[HiGHS] Time budget spent, gap unavailable');
    return null;
  }

  try {
    const { lpString } = problemToLPFormat(problem, { relaxIntegrality: true });
    const relaxed = parseHighsSolution(highs.solve(lpString, buildHighsOptions(params, timeLimit)));
    return mapHighsStatus(relaxed.status) === 'OPTIMAL' ? relaxed.objectiveValue : null;
  } catch (error) {
    console.warn('[HiGHS] LP relaxation failed, gap unavailable:', error instanceof Error ? error.message : error);
    return null;
  }
}

/**
 * Solve using HiGHS
 */
async function solveWithHiGHS(problem: LPProblem, params: LPSolverParams): Promise<SolverSolution> {
  const startTime = Date.now();
  const highs = await getHiGHS();

  const { lpString, varMapping } = problemToLPFormat(problem);
  const lpLines = lpString.split('\n');

  if (!params.silent) {
    console.log(`[HiGHS] LP format: ${Math.round(lpString.length / 1024)}KB, ${lpLines.length} lines, ${problem.numVariables} vars`);
    console.log('[HiGHS] LP format preview:');
    console.log(lpLines.slice(0, 5).join('\n'));
    console.log('...');
    console.log(lpLines.slice(-5).join('\n'));

    const coefficients = Array.from(problem.objectiveCoefficients.values()).filter(c => c !== 0);
    const numNonZeros = problem.constraints.reduce((sum, c) => sum + c.variables.length, 0);
    console.log('[HiGHS] Problem diagnostics:', {
      objectiveTerms: coefficients.length,
      min: coefficients.length > 0 ? Math.min(...coefficients) : 0,
      max: coefficients.length > 0 ? Math.max(...coefficients) : 0,
      constraints: problem.numConstraints,
      nonZeros: numNonZeros,
    });
  }

  const solveStart = Date.now();
  let parsed: ParsedHighsSolution;
  try {
    parsed = parseHighsSolution(highs.solve(lpString, buildHighsOptions(params)));
  } catch (error) {
    // A failed solve can leave the WASM heap unusable
    resetHiGHSInstance();
    throw error;
  }

  const status = mapHighsStatus(parsed.status);
  console.log(`[HiGHS] Solve completed in ${Date.now() - startTime}ms, status: ${parsed.status}`);

  const values = new Map<string, number>();
  for (const [compactName, value] of parsed.columns) {
    const name = varMapping.get(compactName);
    if (name !== undefined) values.set(name, value);
  }

  let gap: number | null = status === 'OPTIMAL' && parsed.objectiveValue !== null ? 0 : null;
  if (status === 'TIME_LIMIT' && parsed.objectiveValue !== null) {
    const bound = solveRelaxationBound(highs, problem, params, (Date.now() - solveStart) / 1000);
    gap = bound === null ? null : relativeGap(parsed.objectiveValue, bound);
  }

  return {
    status,
    objectiveValue: values.size > 0 ? parsed.objectiveValue : null,
    values,
    relativeGap: gap,
    solveTimeMs: Date.now() - startTime,
    solverName: 'HiGHS',
    error: status === 'OTHER' ? `HiGHS status: ${parsed.status}` : undefined,
  };
}

export const highsSolver: LPSolver = {
  name: 'HiGHS',
  solve: solveWithHiGHS,
};
