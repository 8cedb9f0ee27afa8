/**
 * Partner Problem Builder
 *
 * Single-round balanced partition with pairwise partner bonuses:
 * - Decision variables: binary assign[i][j] (student i in group j)
 * - Group sizes: integer size[j] in [floor(n/g), ceil(n/g)] (never relaxed)
 * - Score balance: L1 norm of group score deviations, epigraph form
 *     dev[j]    = Σ_i score_i·assign[i][j] - mean·size[j]
 *     absdev[j] ≥ ±dev[j]
 *     l1norm    ≥ Σ_j absdev[j]
 * - Pairing: paired[i1][i2][j] ≤ (assign[i1][j] + assign[i2][j]) / 2
 *
 * Objective (minimize): l1norm + Σ preference[i1][i2]·paired[i1][i2][j]
 *
 * Preference magnitude trades off directly against the balance term: a
 * large negative bonus forces the pair together, a small one loses to balance.
 */

import type { LPProblem, PartnerPreferences, PartnerStudent } from '../types';
import { LPModel } from './lpModel';

export interface PartnerProblemBuildResult {
  problem: LPProblem;
  /** assignmentVars[i][j] = name of the "student i in group j" indicator */
  assignmentVars: string[][];
  minGroupSize: number;
  maxGroupSize: number;
  meanScore: number;
}

/**
 * Build the partner partition problem.
 * Inputs must already have passed validatePartnerInputs.
 */
export function buildPartnerProblem(
  students: PartnerStudent[],
  numGroups: number,
  preferences: PartnerPreferences
): PartnerProblemBuildResult {
  const numStudents = students.length;
  const scores = students.map(s => s.score);
  const meanScore = scores.reduce((sum, s) => sum + s, 0) / numStudents;
  const minGroupSize = Math.floor(numStudents / numGroups);
  const maxGroupSize = Math.ceil(numStudents / numGroups);

  console.log(`[PartnerBuilder] Building problem: ${numStudents} students, ${numGroups} groups, sizes ${minGroupSize}-${maxGroupSize}, mean score ${meanScore.toFixed(3)}`);

  const model = new LPModel('partners');

  const assignmentVars: string[][] = [];
  for (let i = 0; i < numStudents; i++) {
    const row: string[] = [];
    for (let j = 0; j < numGroups; j++) {
      row.push(model.addBinary(`assign_${i}_${j}`));
    }
    assignmentVars.push(row);
  }

  // 1. Each student in exactly one group
  for (let i = 0; i < numStudents; i++) {
    model.addConstraint(
      `one_group_${i}`,
      'eq',
      assignmentVars[i].map(name => ({ name, coefficient: 1 })),
      1
    );
  }

  // 2. Group sizes and score deviations
  const absDevVars: string[] = [];
  for (let j = 0; j < numGroups; j++) {
    const sizeVar = model.addInteger(`size_${j}`, minGroupSize, maxGroupSize);
    const devVar = model.addContinuous(`dev_${j}`, null, null);
    const absDevVar = model.addContinuous(`absdev_${j}`);
    absDevVars.push(absDevVar);

    model.addConstraint(
      `size_def_${j}`,
      'eq',
      [
        ...assignmentVars.map(row => ({ name: row[j], coefficient: 1 })),
        { name: sizeVar, coefficient: -1 }
      ],
      0
    );

    model.addConstraint(
      `dev_def_${j}`,
      'eq',
      [
        ...assignmentVars.map((row, i) => ({ name: row[j], coefficient: scores[i] })),
        { name: sizeVar, coefficient: -meanScore },
        { name: devVar, coefficient: -1 }
      ],
      0
    );

    model.addConstraint(`absdev_pos_${j}`, 'ge', [
      { name: absDevVar, coefficient: 1 },
      { name: devVar, coefficient: -1 }
    ], 0);
    model.addConstraint(`absdev_neg_${j}`, 'ge', [
      { name: absDevVar, coefficient: 1 },
      { name: devVar, coefficient: 1 }
    ], 0);
  }

  // 3. L1 norm epigraph
  const l1Var = model.addContinuous('l1norm');
  model.addConstraint('l1norm_def', 'ge', [
    { name: l1Var, coefficient: 1 },
    ...absDevVars.map(name => ({ name, coefficient: -1 }))
  ], 0);
  model.addObjectiveTerm(l1Var, 1);

  // 4. Pairing indicators (only where the preference is non-zero)
  let pairCount = 0;
  for (let i1 = 0; i1 < numStudents; i1++) {
    for (let i2 = i1 + 1; i2 < numStudents; i2++) {
      const preference = preferences[i1][i2];
      if (preference === 0) continue;
      pairCount++;

      for (let j = 0; j < numGroups; j++) {
        const pairedVar = model.addBinary(`paired_${i1}_${i2}_${j}`);
        model.addObjectiveTerm(pairedVar, preference);

        // paired ≤ (a1 + a2) / 2
        model.addConstraint(`paired_ub_${i1}_${i2}_${j}`, 'le', [
          { name: pairedVar, coefficient: 2 },
          { name: assignmentVars[i1][j], coefficient: -1 },
          { name: assignmentVars[i2][j], coefficient: -1 }
        ], 0);

        // A penalty only bites if pairing is forced on: paired ≥ a1 + a2 - 1
        if (preference > 0) {
          model.addConstraint(`paired_lb_${i1}_${i2}_${j}`, 'ge', [
            { name: pairedVar, coefficient: 1 },
            { name: assignmentVars[i1][j], coefficient: -1 },
            { name: assignmentVars[i2][j], coefficient: -1 }
          ], -1);
        }
      }
    }
  }

  const problem = model.build();

  console.log(`[PartnerBuilder] Problem built: ${problem.numVariables} variables, ${problem.numConstraints} constraints, ${pairCount} preference pairs`);

  return { problem, assignmentVars, minGroupSize, maxGroupSize, meanScore };
}
