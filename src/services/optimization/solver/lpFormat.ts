/**
 * LP Format writer
 *
 * Converts an LPProblem to CPLEX LP text for HiGHS.
 * Variables get compact names (x0, x1, ...) to keep lines short; the
 * returned mapping translates solver columns back to model names.
 */

import type { DecisionVariable, LPProblem } from '../types';

const MAX_LINE_LENGTH = 200;

export interface LPFormatOptions {
  /** Drop integrality (Binary/General sections); binaries become [0, 1] */
  relaxIntegrality?: boolean;
}

export interface LPFormatResult {
  lpString: string;
  /** compact name → model name */
  varMapping: Map<string, string>;
}

/**
 * Number formatting: 12 significant digits, no trailing zeros
 */
export function formatNumber(value: number): string {
  return String(Number(value.toPrecision(12)));
}

function compactVarName(index: number): string {
  return `x${index}`;
}

/**
 * Validate coefficient is a finite number
 */
function validateCoefficient(value: number, context: string): number {
  if (!Number.isFinite(value)) {
    throw new Error(`[LPFormat] Invalid coefficient (${value}) in ${context}`);
  }
  return value;
}

function formatTerm(coefficient: number, compactName: string): string {
  return `${coefficient >= 0 ? '+' : '-'} ${formatNumber(Math.abs(coefficient))} ${compactName}`;
}

/**
 * Append terms to `lines`, starting a continuation line past MAX_LINE_LENGTH
 */
function pushWrapped(lines: string[], head: string, terms: string[], tail: string): void {
  let current = head;
  for (const term of terms) {
    if (current.length + term.length + 1 > MAX_LINE_LENGTH) {
      lines.push(current);
      current = ' ';
    }
    current += ' ' + term;
  }
  if (current.length + tail.length > MAX_LINE_LENGTH) {
    lines.push(current);
    current = ' ';
  }
  lines.push(current + tail);
}

function formatBound(variable: DecisionVariable, compactName: string, relax: boolean): string | null {
  if (variable.kind === 'binary') {
    return relax ? ` 0 <= ${compactName} <= 1` : null;
  }
  const { lower, upper } = variable;
  if (lower === null && upper === null) return ` ${compactName} free`;
  if (lower === null && upper !== null) return ` -inf <= ${compactName} <= ${formatNumber(upper)}`;
  if (lower !== null && upper === null) return ` ${compactName} >= ${formatNumber(lower)}`;
  if (lower !== null && upper !== null) return ` ${formatNumber(lower)} <= ${compactName} <= ${formatNumber(upper)}`;
  return null;
}

/**
 * Convert LPProblem to LP format string
 */
export function problemToLPFormat(problem: LPProblem, options: LPFormatOptions = {}): LPFormatResult {
  const relax = options.relaxIntegrality ?? false;

  if (problem.variables.length === 0) {
    throw new Error(`[LPFormat] Problem "${problem.name}" has no variables`);
  }

  const varMapping = new Map<string, string>();
  const compactNames = new Map<string, string>();
  problem.variables.forEach((variable, index) => {
    const compactName = compactVarName(index);
    varMapping.set(compactName, variable.name);
    compactNames.set(variable.name, compactName);
  });

  const getCompactName = (name: string): string => {
    const compactName = compactNames.get(name);
    if (compactName === undefined) {
      throw new Error(`[LPFormat] Unknown variable "${name}"`);
    }
    return compactName;
  };

  const lines: string[] = [];

  // Objective
  lines.push('Minimize');
  const objectiveTerms: string[] = [];
  for (const [name, coefficient] of problem.objectiveCoefficients) {
    const coef = validateCoefficient(coefficient, `obj:${name}`);
    if (coef === 0) continue;
    objectiveTerms.push(formatTerm(coef, getCompactName(name)));
  }
  if (objectiveTerms.length === 0) {
    // LP format requires at least one term
    objectiveTerms.push(`+ 0 ${compactVarName(0)}`);
  }
  pushWrapped(lines, ' obj:', objectiveTerms, '');

  // Constraints
  lines.push('Subject To');
  let constraintCount = 0;
  for (const constraint of problem.constraints) {
    const rhs = validateCoefficient(constraint.rhs, `constraint:${constraint.name}:rhs`);
    const terms: string[] = [];
    for (const term of constraint.variables) {
      const coef = validateCoefficient(term.coefficient, `constraint:${constraint.name}`);
      if (coef === 0) continue;
      terms.push(formatTerm(coef, getCompactName(term.name)));
    }
    if (terms.length === 0) continue;

    const op = constraint.type === 'eq' ? '=' : constraint.type === 'le' ? '<=' : '>=';
    pushWrapped(lines, ` c${constraintCount++}:`, terms, ` ${op} ${formatNumber(rhs)}`);
  }

  // Bounds
  lines.push('Bounds');
  for (const variable of problem.variables) {
    const bound = formatBound(variable, getCompactName(variable.name), relax);
    if (bound !== null) lines.push(bound);
  }

  if (!relax) {
    const binaries = problem.variables.filter(v => v.kind === 'binary');
    if (binaries.length > 0) {
      lines.push('Binary');
      for (const variable of binaries) lines.push(` ${getCompactName(variable.name)}`);
    }
    const integers = problem.variables.filter(v => v.kind === 'integer');
    if (integers.length > 0) {
      lines.push('General');
      for (const variable of integers) lines.push(` ${getCompactName(variable.name)}`);
    }
  }

  lines.push('End');

  return { lpString: lines.join('\n'), varMapping };
}
