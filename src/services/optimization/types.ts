/**
 * Group Assignment Engine - Type Definitions
 *
 * Students, preference matrices, the abstract LP model handed to a solver,
 * and the results/statistics produced after the solve.
 */

import { SOLVER_DEFAULTS } from '@/_domain';

// =============================================================================
// Entity Types
// =============================================================================

/**
 * Student in the partner (single round) problem.
 * `score` is an external performance measure used only for balancing.
 */
export interface PartnerStudent {
  firstName: string;
  lastName: string;
  score: number;
}

/**
 * Student in the immersion (multi-week) problem.
 *
 * `assigned` is owned by the caller and mutated in place by
 * `assignImmersion` (appends) and `unassign` (clears).
 * `assigned[w]` is the 1-based option for week w, or NOT_PARTICIPATING.
 */
export interface ImmersionStudent {
  firstName: string;
  lastName: string;
  program: string;
  assigned: number[];
}

/** Anything with a first and last name */
export type NamedStudent = Pick<PartnerStudent, 'firstName' | 'lastName'>;

/**
 * n×n symmetric matrix. Negative entry = bonus for grouping the pair.
 */
export type PartnerPreferences = number[][];

/**
 * One n×options[w] matrix per week. An all-zero matrix marks a week whose
 * choices are supplied externally (sentinel week).
 */
export type WeeklyPreferences = number[][][];

// =============================================================================
// LP Model Types
// =============================================================================

export type VariableKind = 'binary' | 'integer' | 'continuous';

/**
 * Decision variable. `null` bounds mean unbounded on that side.
 * Binary variables always live in [0, 1]; their bounds are ignored.
 */
export interface DecisionVariable {
  name: string;
  kind: VariableKind;
  lower: number | null;
  upper: number | null;
}

export interface ConstraintTerm {
  name: string;
  coefficient: number;
}

/**
 * Linear constraint: Σ coefficient·variable (type) rhs
 */
export interface LPConstraint {
  name: string;
  type: 'eq' | 'le' | 'ge';
  variables: ConstraintTerm[];
  rhs: number;
}

/**
 * Complete minimization problem as handed to a solver
 */
export interface LPProblem {
  name: string;
  variables: DecisionVariable[];
  constraints: LPConstraint[];
  objectiveCoefficients: Map<string, number>;
  numVariables: number;
  numConstraints: number;
}

// =============================================================================
// Solver Types
// =============================================================================

export type SolverStatus = 'OPTIMAL' | 'TIME_LIMIT' | 'INFEASIBLE' | 'OTHER';

/**
 * Solver configuration
 *
 * `attributes` are solver-specific options (e.g. HiGHS `mip_rel_gap`,
 * GLPK `mipgap`). They are passed through uninterpreted; only the solver
 * validates them.
 */
export interface LPSolverParams {
  silent: boolean;
  timeLimitSeconds: number | null;
  attributes: Record<string, string | number | boolean>;
}

export const DEFAULT_LP_SOLVER_PARAMS: LPSolverParams = {
  silent: true,
  timeLimitSeconds: SOLVER_DEFAULTS.TIME_LIMIT_SECONDS,
  attributes: {},
};

export interface SolverSolution {
  status: SolverStatus;
  /** null when the solver produced no incumbent */
  objectiveValue: number | null;
  /** Variable name (as in the LPProblem) → value */
  values: Map<string, number>;
  /** Relative optimality gap, when the solver can report one */
  relativeGap: number | null;
  solveTimeMs: number;
  solverName: string;
  error?: string;
}

/**
 * Narrow solver capability: takes a model, returns values and a status.
 * Implementations: HiGHS (solver/highsWrapper.ts), GLPK (solver/glpkWrapper.ts).
 */
export interface LPSolver {
  readonly name: string;
  solve(problem: LPProblem, params: LPSolverParams): Promise<SolverSolution>;
}

/**
 * Error categories for non-optimal runs
 */
export type OptimizationErrorCategory =
  | 'solver_timeout'     // Time budget hit, best incumbent returned
  | 'solver_infeasible'  // No solution exists
  | 'solver_error';      // Anything else the solver reported

// =============================================================================
// Engine Types
// =============================================================================

/**
 * Progress callback for long solves
 */
export interface AssignmentProgress {
  stage: 'validating' | 'building' | 'solving' | 'extracting' | 'complete';
  status: string;
  progress: number;  // 0-100
  problemSize?: {
    numVariables: number;
    numConstraints: number;
  };
}

export type AssignmentProgressCallback = (progress: AssignmentProgress) => void;

/**
 * Options shared by both engines
 */
export interface SolveOptions {
  silent?: boolean;
  timeLimitSeconds?: number | null;
  attributes?: Record<string, string | number | boolean>;
  /** Injected solver; defaults to HiGHS with GLPK fallback */
  solver?: LPSolver;
  onProgress?: AssignmentProgressCallback;
}

export interface ImmersionWeights {
  preference: number;
  sizeImbalance: number;
  sameProgram: number;
  repeatPartner: number;
}

export interface ImmersionOptions extends SolveOptions {
  weights?: Partial<ImmersionWeights>;
  /** Include all-zero (sentinel) weeks in the size-imbalance penalty */
  balanceSentinelWeeks?: boolean;
}

/**
 * Fields common to both engine results
 */
interface SolveSummary {
  /** null when the solver was never called */
  solverStatus: SolverStatus | null;
  objectiveValue: number | null;
  relativeGap: number | null;
  solveTimeMs: number;
  warnings: string[];
  errorCategory?: OptimizationErrorCategory;
}

export interface PartnerAssignResult extends SolveSummary {
  groups: PartnerStudent[][];
}

export interface ImmersionAssignResult extends SolveSummary {
  /** Same array that was passed in, mutated in place */
  students: ImmersionStudent[];
}

// =============================================================================
// Analysis Types
// =============================================================================

export interface ImmersionStats {
  meanPreferenceScore: number;
  maxImbalance: number;
  /** pairKey(a, b) → number of weeks the pair shared an option */
  pairCollisions: Map<string, number>;
  /** programCollisionKey(week, option, program) → extra same-program students */
  programCollisions: Map<string, number>;
  /** program → sum of its programCollisions cells */
  programCollisionTotals: Map<string, number>;
}

export interface PartnerGroupStats {
  groupSizes: number[];
  groupMeanScores: number[];
  /** Largest minus smallest group size */
  sizeSpread: number;
  /** Bonus pairs (negative preference) that ended up in the same group */
  honoredBonusPairs: number;
  /** Bonus pairs that were split across groups */
  splitBonusPairs: number;
}
