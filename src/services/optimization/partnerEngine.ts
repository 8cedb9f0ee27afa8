/**
 * Partner Engine
 *
 * Splits one roster into `numGroups` groups of near-equal size, balancing
 * mean score across groups while honoring pairwise partner bonuses.
 *
 * Execution flow:
 * 1. Validate inputs
 * 2. Build LP problem
 * 3. Solve (HiGHS, GLPK fallback, or the injected solver)
 * 4. Extract groups
 *
 * The input students are never mutated.
 */

import type {
  AssignmentProgress,
  PartnerAssignResult,
  PartnerPreferences,
  PartnerStudent,
  SolveOptions
} from './types';
import { validatePartnerInputs } from './preprocessing/inputValidator';
import { buildPartnerProblem } from './constraints/partnerProblemBuilder';
import { solveProblem } from './solver/solveProblem';
import { extractPartnerGroups } from './postprocessing/solutionExtractor';
import { errorCategoryFor, nonOptimalWarnings, resolveSolverParams } from './utils/solverDiagnostics';
import { displayName } from './students';
import { LP_SCALE_LIMITS } from '@/_domain';

const TIME_LIMIT_HINT =
  'Increase timeLimitSeconds, relax the mip_rel_gap attribute, or strengthen the partner bonuses so fewer splits compete';

/**
 * Assign students to balanced groups
 *
 * @param preferences - n×n symmetric; negative entries pull a pair together
 * @throws InputShapeError | InputDomainError for malformed inputs
 */
export async function assignPartners(
  students: PartnerStudent[],
  numGroups: number,
  preferences: PartnerPreferences,
  options: SolveOptions = {}
): Promise<PartnerAssignResult> {
  const report = (progress: AssignmentProgress) => options.onProgress?.(progress);

  report({ stage: 'validating', status: 'Validating inputs...', progress: 5 });
  validatePartnerInputs(students, numGroups, preferences);
  const params = resolveSolverParams(options);

  if (students.length > LP_SCALE_LIMITS.WARN_STUDENTS_THRESHOLD) {
    console.warn(`[PartnerEngine] ${students.length} students exceeds ${LP_SCALE_LIMITS.WARN_STUDENTS_THRESHOLD}, solve may be slow`);
  }
  console.log(`[PartnerEngine] Assigning ${students.length} students to ${numGroups} groups`);

  report({ stage: 'building', status: 'Building LP problem...', progress: 15 });
  const { problem, assignmentVars } = buildPartnerProblem(students, numGroups, preferences);
  const problemSize = { numVariables: problem.numVariables, numConstraints: problem.numConstraints };

  report({ stage: 'solving', status: 'Solving...', progress: 30, problemSize });
  const solution = await solveProblem(problem, params, options.solver);

  report({ stage: 'extracting', status: 'Extracting groups...', progress: 90, problemSize });
  const warnings = nonOptimalWarnings(solution, params, '[PartnerEngine]', TIME_LIMIT_HINT);
  const { groups, unassigned } = extractPartnerGroups(solution, students, assignmentVars, numGroups);

  if (unassigned.length > 0 && solution.values.size > 0) {
    const message = `${unassigned.length} student(s) were not placed in any group: ${unassigned.map(displayName).join(', ')}`;
    console.warn(`[PartnerEngine] ${message}`);
    warnings.push(message);
  }

  console.log(`[PartnerEngine] Done: status ${solution.status}, group sizes [${groups.map(g => g.length).join(', ')}]`);
  report({ stage: 'complete', status: 'Complete', progress: 100, problemSize });

  return {
    groups,
    solverStatus: solution.status,
    objectiveValue: solution.objectiveValue,
    relativeGap: solution.relativeGap,
    solveTimeMs: solution.solveTimeMs,
    warnings,
    errorCategory: errorCategoryFor(solution.status),
  };
}
