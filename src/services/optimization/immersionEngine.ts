/**
 * Immersion Engine
 *
 * Assigns students to one option per week across several weeks, trading off
 * preferences, per-week group balance, program diversity and repeat partners.
 *
 * Students' `assigned` sequences are both input and output: weeks already
 * present are kept as fixed history, the remaining weeks are solved and
 * appended in place. Calling again once everyone is fully assigned is a
 * no-op (see `unassign` to start over).
 */

import type {
  AssignmentProgress,
  ImmersionAssignResult,
  ImmersionOptions,
  ImmersionStudent,
  WeeklyPreferences
} from './types';
import { validateImmersionInputs } from './preprocessing/inputValidator';
import { buildImmersionProblem } from './constraints/immersionProblemBuilder';
import { solveProblem } from './solver/solveProblem';
import { extractImmersionChoices } from './postprocessing/solutionExtractor';
import { errorCategoryFor, nonOptimalWarnings, resolveSolverParams } from './utils/solverDiagnostics';
import { activeTerms, formatWeights, resolveWeights } from './utils/penaltyWeights';
import { displayName } from './students';
import { LP_SCALE_LIMITS } from '@/_domain';

export const ALL_ASSIGNED_WARNING = 'All students are already assigned to groups (use `unassign` to reset)';

const TIME_LIMIT_HINT =
  'Increase timeLimitSeconds, relax the mip_rel_gap attribute, or lower the repeatPartner weight to shrink the model';

/**
 * Solve the unassigned weeks and append the choices to each student
 *
 * @param preferences - one n×options matrix per week; all-zero = externally assigned week
 * @throws InputShapeError | InputDomainError for malformed inputs
 */
export async function assignImmersion(
  students: ImmersionStudent[],
  preferences: WeeklyPreferences,
  options: ImmersionOptions = {}
): Promise<ImmersionAssignResult> {
  const report = (progress: AssignmentProgress) => options.onProgress?.(progress);

  report({ stage: 'validating', status: 'Validating inputs...', progress: 5 });
  const layout = validateImmersionInputs(students, preferences);
  const weights = resolveWeights(options.weights);
  const params = resolveSolverParams(options);

  if (students.every(s => s.assigned.length === layout.numWeeks)) {
    console.warn(ALL_ASSIGNED_WARNING);
    report({ stage: 'complete', status: 'Nothing to assign', progress: 100 });
    return {
      students,
      solverStatus: null,
      objectiveValue: null,
      relativeGap: null,
      solveTimeMs: 0,
      warnings: [ALL_ASSIGNED_WARNING],
    };
  }

  if (students.length > LP_SCALE_LIMITS.WARN_STUDENTS_THRESHOLD) {
    console.warn(`[ImmersionEngine] ${students.length} students exceeds ${LP_SCALE_LIMITS.WARN_STUDENTS_THRESHOLD}, solve may be slow`);
  }
  console.log(`[ImmersionEngine] Assigning ${students.length} students over ${layout.numWeeks} weeks (${formatWeights(weights)}; active: ${activeTerms(weights).join(', ') || 'none'})`);

  report({ stage: 'building', status: 'Building LP problem...', progress: 15 });
  const { problem, assignmentVars } = buildImmersionProblem({
    students,
    preferences,
    layout,
    weights,
    balanceSentinelWeeks: options.balanceSentinelWeeks ?? true,
  });
  const problemSize = { numVariables: problem.numVariables, numConstraints: problem.numConstraints };

  report({ stage: 'solving', status: 'Solving...', progress: 30, problemSize });
  const solution = await solveProblem(problem, params, options.solver);

  report({ stage: 'extracting', status: 'Extracting assignments...', progress: 90, problemSize });
  const warnings = nonOptimalWarnings(solution, params, '[ImmersionEngine]', TIME_LIMIT_HINT);
  const { appended, incomplete } = extractImmersionChoices(solution, students, assignmentVars, layout);

  if (incomplete.length > 0 && solution.values.size > 0) {
    const message = `${incomplete.length} student(s) have unassigned weeks: ${incomplete.map(displayName).join(', ')}`;
    console.warn(`[ImmersionEngine] ${message}`);
    warnings.push(message);
  }

  console.log(`[ImmersionEngine] Done: status ${solution.status}, ${appended} weekly choices appended`);
  report({ stage: 'complete', status: 'Complete', progress: 100, problemSize });

  return {
    students,
    solverStatus: solution.status,
    objectiveValue: solution.objectiveValue,
    relativeGap: solution.relativeGap,
    solveTimeMs: solution.solveTimeMs,
    warnings,
    errorCategory: errorCategoryFor(solution.status),
  };
}
