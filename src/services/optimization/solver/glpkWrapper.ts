/**
 * LP Solver Wrapper using GLPK.js
 *
 * Fallback solver. Builds the glpk.js object model directly from the
 * LPProblem, so no LP text is involved.
 */

import type { DecisionVariable, LPProblem, LPSolver, LPSolverParams, SolverSolution, SolverStatus } from '../types';

/**
 * The part of the glpk.js instance this wrapper relies on
 */
interface GLPKInstance {
  readonly GLP_MIN: number;
  readonly GLP_FR: number;
  readonly GLP_LO: number;
  readonly GLP_UP: number;
  readonly GLP_DB: number;
  readonly GLP_FX: number;
  readonly GLP_MSG_OFF: number;
  readonly GLP_MSG_ALL: number;
  readonly GLP_UNDEF: number;
  readonly GLP_FEAS: number;
  readonly GLP_INFEAS: number;
  readonly GLP_NOFEAS: number;
  readonly GLP_OPT: number;
  solve(lp: object, options?: object): unknown;
}

interface GLPKBounds {
  type: number;
  lb: number;
  ub: number;
}

interface ParsedGLPKResult {
  status: number;
  objectiveValue: number | null;
  values: Map<string, number>;
}

// Solver instance (lazy loaded)
let glpkInstance: GLPKInstance | null = null;
let glpkLoadPromise: Promise<GLPKInstance> | null = null;

/**
 * Load GLPK
 */
async function loadGLPK(): Promise<GLPKInstance> {
  if (glpkInstance) return glpkInstance;
  if (!glpkLoadPromise) {
    glpkLoadPromise = (async () => {
      try {
        console.log('[GLPK] Loading GLPK.js...');
        const GLPK = await import('glpk.js');
        const instance: GLPKInstance = await GLPK.default();
        glpkInstance = instance;
        console.log('[GLPK] GLPK loaded successfully');
        return instance;
      } catch (error) {
        glpkLoadPromise = null;
        throw error;
      }
    })();
  }
  return glpkLoadPromise;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Parse the raw result of glpk.solve(): { result: { status, z, vars } }
 */
export function parseGLPKResult(raw: unknown): ParsedGLPKResult {
  const result = isRecord(raw) ? raw.result : undefined;
  if (!isRecord(result) || typeof result.status !== 'number') {
    throw new Error('[GLPK] Unexpected result shape (no status)');
  }

  const values = new Map<string, number>();
  if (isRecord(result.vars)) {
    for (const [name, value] of Object.entries(result.vars)) {
      if (typeof value === 'number') values.set(name, value);
    }
  }

  const objectiveValue = typeof result.z === 'number' && Number.isFinite(result.z) ? result.z : null;
  return { status: result.status, objectiveValue, values };
}

function variableBounds(glpk: GLPKInstance, variable: DecisionVariable): GLPKBounds {
  const { lower, upper } = variable;
  if (lower === null && upper === null) return { type: glpk.GLP_FR, lb: 0, ub: 0 };
  if (lower === null && upper !== null) return { type: glpk.GLP_UP, lb: 0, ub: upper };
  if (lower !== null && upper === null) return { type: glpk.GLP_LO, lb: lower, ub: 0 };
  if (lower !== null && upper !== null) {
    return lower === upper
      ? { type: glpk.GLP_FX, lb: lower, ub: upper }
      : { type: glpk.GLP_DB, lb: lower, ub: upper };
  }
  return { type: glpk.GLP_FR, lb: 0, ub: 0 };
}

function constraintBounds(glpk: GLPKInstance, type: 'eq' | 'le' | 'ge', rhs: number): GLPKBounds {
  if (type === 'eq') return { type: glpk.GLP_FX, lb: rhs, ub: rhs };
  if (type === 'le') return { type: glpk.GLP_UP, lb: 0, ub: rhs };
  return { type: glpk.GLP_LO, lb: rhs, ub: 0 };
}

/**
 * Convert LPProblem to the glpk.js object model
 */
function toGLPKProblem(glpk: GLPKInstance, problem: LPProblem) {
  return {
    name: problem.name,
    objective: {
      direction: glpk.GLP_MIN,
      name: 'obj',
      // Every variable listed so that GLPK knows all columns
      vars: problem.variables.map(v => ({ name: v.name, coef: problem.objectiveCoefficients.get(v.name) ?? 0 })),
    },
    subjectTo: problem.constraints
      .filter(c => c.variables.length > 0)
      .map(c => ({
        name: c.name,
        vars: c.variables.map(term => ({ name: term.name, coef: term.coefficient })),
        bnds: constraintBounds(glpk, c.type, c.rhs),
      })),
    bounds: problem.variables
      .filter(v => v.kind !== 'binary')
      .map(v => ({ name: v.name, ...variableBounds(glpk, v) })),
    binaries: problem.variables.filter(v => v.kind === 'binary').map(v => v.name),
    generals: problem.variables.filter(v => v.kind === 'integer').map(v => v.name),
  };
}

/**
 * Map GLPK status codes to SolverStatus.
 * GLP_FEAS / GLP_UNDEF count as TIME_LIMIT only when the budget was used up.
 */
export function mapGLPKStatus(glpk: GLPKInstance, status: number, hitTimeLimit: boolean): SolverStatus {
  if (status === glpk.GLP_OPT) return 'OPTIMAL';
  if (status === glpk.GLP_INFEAS || status === glpk.GLP_NOFEAS) return 'INFEASIBLE';
  if ((status === glpk.GLP_FEAS || status === glpk.GLP_UNDEF) && hitTimeLimit) return 'TIME_LIMIT';
  return 'OTHER';
}

/**
 * Solve using GLPK
 */
async function solveWithGLPK(problem: LPProblem, params: LPSolverParams): Promise<SolverSolution> {
  const startTime = Date.now();
  const glpk = await loadGLPK();

  const glpkProblem = toGLPKProblem(glpk, problem);
  console.log(`[GLPK] Solving problem (${problem.numVariables} vars, ${problem.numConstraints} constraints, ${glpkProblem.binaries.length} binary)...`);

  const options: Record<string, string | number | boolean> = {
    msglev: params.silent ? glpk.GLP_MSG_OFF : glpk.GLP_MSG_ALL,
    presol: true,
  };
  if (params.timeLimitSeconds !== null) {
    options.tmlim = params.timeLimitSeconds;
  }

  const parsed = parseGLPKResult(await glpk.solve(glpkProblem, { ...options, ...params.attributes }));
  const solveTimeMs = Date.now() - startTime;

  const hitTimeLimit = params.timeLimitSeconds !== null && solveTimeMs >= params.timeLimitSeconds * 1000;
  const status = mapGLPKStatus(glpk, parsed.status, hitTimeLimit);
  console.log(`[GLPK] Solve completed in ${solveTimeMs}ms, raw status: ${parsed.status}, objective: ${parsed.objectiveValue}`);

  // GLPK reports zeros for every column even without a solution
  const hasSolution = status === 'OPTIMAL' || parsed.status === glpk.GLP_FEAS;
  const values = hasSolution ? parsed.values : new Map<string, number>();

  return {
    status,
    objectiveValue: hasSolution ? parsed.objectiveValue : null,
    values,
    relativeGap: status === 'OPTIMAL' ? 0 : null,
    solveTimeMs,
    solverName: 'GLPK',
    error: status === 'OTHER' ? `GLPK status: ${parsed.status}` : undefined,
  };
}

export const glpkSolver: LPSolver = {
  name: 'GLPK',
  solve: solveWithGLPK,
};
