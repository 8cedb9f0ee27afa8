/**
 * ============================================================================
 * ASSIGNMENT CONSTANTS
 * ============================================================================
 *
 * Thresholds, sentinels and default values shared by the model builders,
 * the solver wrappers and the analyzers.
 *
 * NAMING CONVENTION:
 * - Use SCREAMING_SNAKE_CASE for constants
 * - Group related constants in objects
 *
 * ============================================================================
 */

// =============================================================================
// SOLUTION EXTRACTION
// =============================================================================

/**
 * SELECTION THRESHOLD
 * -------------------
 * A binary indicator counts as "selected" when the solver value is strictly
 * greater than this. Solvers return values within a feasibility tolerance
 * (0.9999997, 1e-9, ...), so integrality is never assumed.
 */
export const SELECTION_THRESHOLD = 0.5;

/**
 * NOT PARTICIPATING
 * -----------------
 * Stored in `assigned[week]` when a student sits out a week.
 * Real option indices are 1-based, so 0 never collides with one.
 */
export const NOT_PARTICIPATING = 0;

// =============================================================================
// INPUT VALIDATION
// =============================================================================

/**
 * Tolerance for the symmetry check on partner preference matrices.
 */
export const SYMMETRY_TOLERANCE = 1e-9;

// =============================================================================
// IMMERSION PENALTY WEIGHTS
// =============================================================================

/**
 * DEFAULT IMMERSION WEIGHTS
 * -------------------------
 * Multipliers for the four objective terms of the immersion model.
 * All equal by default; a weight of 0 drops the term (and its auxiliary
 * variables) from the model entirely.
 *
 * - preference:    summed preference value of the chosen options
 * - sizeImbalance: per-week (largest - smallest) option occupancy
 * - sameProgram:   extra students of one program sharing an option
 * - repeatPartner: extra weeks a pair shares an option beyond the first
 */
export const DEFAULT_IMMERSION_WEIGHTS = {
  preference: 1,
  sizeImbalance: 1,
  sameProgram: 1,
  repeatPartner: 1,
} as const;

// =============================================================================
// PARTNER REQUESTS
// =============================================================================

/**
 * DEFAULT PARTNER BONUS
 * ---------------------
 * Matrix entry written for each requested partner when a roster lists
 * names instead of raw preference values. Negative = bonus.
 *
 * The magnitude trades off directly against the score-balance term:
 * -1000 forces the pair together, -0.1 rarely beats balance.
 */
export const DEFAULT_PARTNER_BONUS = -1;

// =============================================================================
// SOLVER
// =============================================================================

/**
 * SOLVER DEFAULTS
 * ---------------
 * Wall-clock budget handed to the solver. The solver returns its best
 * incumbent when the budget runs out; nothing is discarded.
 */
export const SOLVER_DEFAULTS = {
  /** Seconds before the solver reports TIME_LIMIT */
  TIME_LIMIT_SECONDS: 60,

  /** Relative gap denominator floor when the incumbent objective is ~0 */
  GAP_EPSILON: 1e-10,

  /** Share of a time budget held back for the LP-relaxation bound */
  RELAXATION_BUDGET_SHARE: 0.05,
} as const;

/**
 * LP SCALE LIMITS
 * ---------------
 * Problem sizes above which the engines log a performance warning.
 * The repeat-partner term grows with students² × options, so the immersion
 * model gets slow long before the partner model does.
 */
export const LP_SCALE_LIMITS = {
  /** Warn when the model has more variables than this */
  WARN_VARIABLES_THRESHOLD: 50_000,

  /** Warn when the roster is larger than this */
  WARN_STUDENTS_THRESHOLD: 300,
} as const;
