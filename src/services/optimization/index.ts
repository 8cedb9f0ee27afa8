/**
 * Group Assignment Engine - Public API
 *
 * Usage:
 * ```typescript
 * import {
 *   assignImmersion,
 *   analyzeAssignments,
 *   createImmersionStudent,
 *   formatImmersionReport
 * } from '@/services/optimization';
 *
 * const students = [createImmersionStudent('Ada', 'Byron', 'Math'), ...];
 * await assignImmersion(students, [week1Preferences], { timeLimitSeconds: 30 });
 * console.log(formatImmersionReport(analyzeAssignments(students, [week1Preferences])));
 * ```
 */

// Types
export * from './types';
export { AssignmentInputError, InputShapeError, InputDomainError, type InputErrorCategory } from './errors';

// Students
export {
  createPartnerStudent,
  createImmersionStudent,
  sameStudent,
  displayName,
  sortName,
  unassign
} from './students';

// Engines
export { assignPartners } from './partnerEngine';
export { assignImmersion, ALL_ASSIGNED_WARNING } from './immersionEngine';

// Preprocessing
export { validatePartnerInputs, validateImmersionInputs } from './preprocessing/inputValidator';
export { buildOptionLayout, globalOptionIndex, isSentinelWeek, type OptionLayout } from './preprocessing/optionLayout';
export {
  parsePartnerCsv,
  parseImmersionCsv,
  type PartnerCsvOptions,
  type PartnerCsvResult,
  type ImmersionCsvOptions,
  type ImmersionCsvResult
} from './preprocessing/csvInputParser';

// Constraints
export { LPModel } from './constraints/lpModel';
export { buildPartnerProblem } from './constraints/partnerProblemBuilder';
export { buildImmersionProblem } from './constraints/immersionProblemBuilder';

// Utilities
export { resolveWeights, formatWeights } from './utils/penaltyWeights';

// Solver
export { solveProblem } from './solver/solveProblem';
export { highsSolver } from './solver/highsWrapper';
export { glpkSolver } from './solver/glpkWrapper';
export { problemToLPFormat } from './solver/lpFormat';

// Post-processing
export { extractPartnerGroups, extractImmersionChoices } from './postprocessing/solutionExtractor';
export {
  analyzeAssignments,
  analyzePartnerGroups,
  pairKey,
  programCollisionKey,
  getPairCollisions,
  getProgramCollisions
} from './postprocessing/assignmentAnalyzer';
export { formatImmersionReport, formatImmersionReportLines } from './postprocessing/statsReport';
