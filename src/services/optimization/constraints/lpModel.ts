/**
 * LP Model accumulator
 *
 * Collects variables, constraints and objective terms while a problem
 * builder walks its inputs, then freezes them into an LPProblem.
 * Objective terms on the same variable add up.
 */

import type {
  ConstraintTerm,
  DecisionVariable,
  LPConstraint,
  LPProblem,
  VariableKind
} from '../types';

export class LPModel {
  private readonly name: string;
  private readonly variables: DecisionVariable[] = [];
  private readonly variableNames = new Set<string>();
  private readonly constraints: LPConstraint[] = [];
  private readonly objectiveCoefficients = new Map<string, number>();

  constructor(name: string) {
    this.name = name;
  }

  private addVariable(name: string, kind: VariableKind, lower: number | null, upper: number | null): string {
    if (this.variableNames.has(name)) {
      throw new Error(`[LPModel] Duplicate variable "${name}" in ${this.name}`);
    }
    this.variableNames.add(name);
    this.variables.push({ name, kind, lower, upper });
    return name;
  }

  addBinary(name: string): string {
    return this.addVariable(name, 'binary', 0, 1);
  }

  addInteger(name: string, lower: number | null = 0, upper: number | null = null): string {
    return this.addVariable(name, 'integer', lower, upper);
  }

  addContinuous(name: string, lower: number | null = 0, upper: number | null = null): string {
    return this.addVariable(name, 'continuous', lower, upper);
  }

  addConstraint(name: string, type: LPConstraint['type'], variables: ConstraintTerm[], rhs: number): void {
    for (const term of variables) {
      if (!this.variableNames.has(term.name)) {
        throw new Error(`[LPModel] Constraint "${name}" references unknown variable "${term.name}"`);
      }
    }
    this.constraints.push({ name, type, variables, rhs });
  }

  addObjectiveTerm(variable: string, coefficient: number): void {
    if (!this.variableNames.has(variable)) {
      throw new Error(`[LPModel] Objective references unknown variable "${variable}"`);
    }
    if (coefficient === 0) return;
    this.objectiveCoefficients.set(variable, (this.objectiveCoefficients.get(variable) ?? 0) + coefficient);
  }

  build(): LPProblem {
    return {
      name: this.name,
      variables: [...this.variables],
      constraints: [...this.constraints],
      objectiveCoefficients: new Map(this.objectiveCoefficients),
      numVariables: this.variables.length,
      numConstraints: this.constraints.length
    };
  }
}
