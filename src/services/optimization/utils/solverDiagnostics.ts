/**
 * Solver parameters and diagnostics shared by both engines
 */

import type {
  LPSolverParams,
  OptimizationErrorCategory,
  SolveOptions,
  SolverSolution,
  SolverStatus
} from '../types';
import { DEFAULT_LP_SOLVER_PARAMS } from '../types';
import { InputDomainError } from '../errors';

/**
 * Merge engine options over DEFAULT_LP_SOLVER_PARAMS.
 * `timeLimitSeconds: null` disables the limit.
 */
export function resolveSolverParams(options: SolveOptions): LPSolverParams {
  const timeLimitSeconds = options.timeLimitSeconds === undefined
    ? DEFAULT_LP_SOLVER_PARAMS.timeLimitSeconds
    : options.timeLimitSeconds;

  if (timeLimitSeconds !== null && (!Number.isFinite(timeLimitSeconds) || timeLimitSeconds <= 0)) {
    throw new InputDomainError(`timeLimitSeconds must be a positive number or null, got ${timeLimitSeconds}`);
  }

  return {
    silent: options.silent ?? DEFAULT_LP_SOLVER_PARAMS.silent,
    timeLimitSeconds,
    attributes: { ...DEFAULT_LP_SOLVER_PARAMS.attributes, ...options.attributes },
  };
}

export function errorCategoryFor(status: SolverStatus): OptimizationErrorCategory | undefined {
  switch (status) {
    case 'OPTIMAL':
      return undefined;
    case 'TIME_LIMIT':
      return 'solver_timeout';
    case 'INFEASIBLE':
      return 'solver_infeasible';
    default:
      return 'solver_error';
  }
}

/**
 * Warnings for a non-optimal solve, each also logged with console.error.
 * Empty for OPTIMAL.
 *
 * @param tag - log prefix, e.g. "[PartnerEngine]"
 * @param timeLimitHint - remediation appended to time-limit reports
 */
export function nonOptimalWarnings(
  solution: SolverSolution,
  params: LPSolverParams,
  tag: string,
  timeLimitHint: string
): string[] {
  if (solution.status === 'OPTIMAL') return [];

  const warnings: string[] = [];

  if (solution.status === 'TIME_LIMIT') {
    const gap = solution.relativeGap === null
      ? 'relative gap unavailable'
      : `relative gap ${(solution.relativeGap * 100).toFixed(2)}%`;
    warnings.push(`${solution.solverName} stopped at the time limit (${params.timeLimitSeconds}s) before proving optimality; ${gap}`);
    warnings.push(timeLimitHint);
  } else {
    warnings.push(
      `${solution.solverName} finished with status ${solution.status}${solution.error ? ` (${solution.error})` : ''}`
    );
  }

  if (solution.values.size === 0) {
    warnings.push('No solution values were returned; nothing was assigned');
  }

  for (const warning of warnings) {
    console.error(`${tag} ${warning}`);
  }
  return warnings;
}
