/**
 * Immersion Problem Builder
 *
 * Multi-week assignment over the concatenated option space (see optionLayout).
 *
 * Variables:
 * - assign[i][c]   binary, student i takes global option c
 * - occmax_w/occmin_w  largest/smallest occupancy in week w
 * - prog[c][p]     extra students of program p in option c
 * - shared[i1][i2][c] ∈ [0,1], pair shares option c
 * - repeat[i1][i2] extra weeks the pair shares beyond the first
 *
 * Objective (minimize):
 *   preference·Σ P·assign + sizeImbalance·Σ_w (occmax_w - occmin_w)
 *   + sameProgram·Σ prog + repeatPartner·Σ repeat
 *
 * Weeks already present in `assigned` are pinned with lock_ constraints so
 * that staged solves (week 1 now, later weeks next time) see the history.
 */

import type { ImmersionStudent, ImmersionWeights, LPProblem, WeeklyPreferences } from '../types';
import { LPModel } from './lpModel';
import { globalOptionIndex, isSentinelWeek, weekOptionIndices, type OptionLayout } from '../preprocessing/optionLayout';
import { NOT_PARTICIPATING } from '@/_domain';

export interface ImmersionProblemInput {
  students: ImmersionStudent[];
  preferences: WeeklyPreferences;
  layout: OptionLayout;
  weights: ImmersionWeights;
  balanceSentinelWeeks: boolean;
}

export interface ImmersionProblemBuildResult {
  problem: LPProblem;
  /** assignmentVars[i][c] = name of the "student i takes global option c" indicator */
  assignmentVars: string[][];
  stats: {
    lockedWeeks: number;
    freeWeeks: number;
    programsWithPeers: number;
  };
}

/**
 * Group student indices by program, keeping only programs with 2+ students
 */
function programsWithPeers(students: ImmersionStudent[]): number[][] {
  const byProgram = new Map<string, number[]>();
  students.forEach((student, i) => {
    const members = byProgram.get(student.program) ?? [];
    members.push(i);
    byProgram.set(student.program, members);
  });
  return Array.from(byProgram.values())
    .filter(members => members.length >= 2);
}

/**
 * Build the immersion problem.
 * Inputs must already have passed validateImmersionInputs.
 */
export function buildImmersionProblem(input: ImmersionProblemInput): ImmersionProblemBuildResult {
  const { students, preferences, layout, weights, balanceSentinelWeeks } = input;
  const numStudents = students.length;
  const sentinelWeeks = preferences.map(isSentinelWeek);

  console.log(`[ImmersionBuilder] Building problem: ${numStudents} students, ${layout.numWeeks} weeks, ${layout.totalOptions} options`);

  const model = new LPModel('immersion');

  const assignmentVars: string[][] = [];
  for (let i = 0; i < numStudents; i++) {
    const row: string[] = [];
    for (let c = 0; c < layout.totalOptions; c++) {
      row.push(model.addBinary(`assign_${i}_${c}`));
    }
    assignmentVars.push(row);
  }

  // 1. One option per free week; stored weeks locked
  let lockedWeeks = 0;
  let freeWeeks = 0;
  students.forEach((student, i) => {
    for (let w = 0; w < layout.numWeeks; w++) {
      const weekTerms = weekOptionIndices(layout, w).map(c => ({ name: assignmentVars[i][c], coefficient: 1 }));

      if (w < student.assigned.length) {
        lockedWeeks++;
        const chosen = student.assigned[w];
        if (chosen === NOT_PARTICIPATING) {
          model.addConstraint(`lock_${i}_${w}`, 'eq', weekTerms, 0);
        } else {
          model.addConstraint(`week_${i}_${w}`, 'eq', weekTerms, 1);
          model.addConstraint(`lock_${i}_${w}`, 'eq', [
            { name: assignmentVars[i][globalOptionIndex(layout, w, chosen)], coefficient: 1 }
          ], 1);
        }
      } else {
        freeWeeks++;
        model.addConstraint(`week_${i}_${w}`, 'eq', weekTerms, 1);
      }
    }
  });

  // 2. Preference cost
  if (weights.preference > 0) {
    preferences.forEach((matrix, w) => {
      if (sentinelWeeks[w]) return;
      matrix.forEach((row, i) => {
        row.forEach((value, k) => {
          model.addObjectiveTerm(assignmentVars[i][layout.offsets[w] + k], weights.preference * value);
        });
      });
    });
  }

  // 3. Size imbalance per week
  if (weights.sizeImbalance > 0) {
    for (let w = 0; w < layout.numWeeks; w++) {
      if (sentinelWeeks[w] && !balanceSentinelWeeks) continue;
      // A single option is always balanced
      if (layout.numOptions[w] < 2) continue;

      const maxVar = model.addContinuous(`occmax_${w}`);
      const minVar = model.addContinuous(`occmin_${w}`);

      for (const c of weekOptionIndices(layout, w)) {
        const occupancy = assignmentVars.map(row => ({ name: row[c], coefficient: -1 }));
        model.addConstraint(`occmax_${w}_${c}`, 'ge', [{ name: maxVar, coefficient: 1 }, ...occupancy], 0);
        model.addConstraint(`occmin_${w}_${c}`, 'le', [{ name: minVar, coefficient: 1 }, ...occupancy], 0);
      }

      model.addObjectiveTerm(maxVar, weights.sizeImbalance);
      model.addObjectiveTerm(minVar, -weights.sizeImbalance);
    }
  }

  // 4. Same-program collisions
  const programs = programsWithPeers(students);
  if (weights.sameProgram > 0) {
    for (let c = 0; c < layout.totalOptions; c++) {
      programs.forEach((members, p) => {
        const progVar = model.addContinuous(`prog_${c}_${p}`);
        // prog ≥ Σ_{i∈p} assign[i][c] - 1
        model.addConstraint(`prog_${c}_${p}`, 'ge', [
          { name: progVar, coefficient: 1 },
          ...members.map(i => ({ name: assignmentVars[i][c], coefficient: -1 }))
        ], -1);
        model.addObjectiveTerm(progVar, weights.sameProgram);
      });
    }
  }

  // 5. Repeat partners (meaningless with a single week)
  if (weights.repeatPartner > 0 && layout.numWeeks >= 2) {
    for (let i1 = 0; i1 < numStudents; i1++) {
      for (let i2 = i1 + 1; i2 < numStudents; i2++) {
        const sharedVars: string[] = [];
        for (let c = 0; c < layout.totalOptions; c++) {
          const sharedVar = model.addContinuous(`shared_${i1}_${i2}_${c}`, 0, 1);
          sharedVars.push(sharedVar);
          // shared ≥ a1 + a2 - 1
          model.addConstraint(`shared_${i1}_${i2}_${c}`, 'ge', [
            { name: sharedVar, coefficient: 1 },
            { name: assignmentVars[i1][c], coefficient: -1 },
            { name: assignmentVars[i2][c], coefficient: -1 }
          ], -1);
        }

        const repeatVar = model.addContinuous(`repeat_${i1}_${i2}`);
        // repeat ≥ Σ_c shared - 1
        model.addConstraint(`repeat_${i1}_${i2}`, 'ge', [
          { name: repeatVar, coefficient: 1 },
          ...sharedVars.map(name => ({ name, coefficient: -1 }))
        ], -1);
        model.addObjectiveTerm(repeatVar, weights.repeatPartner);
      }
    }
  }

  const problem = model.build();

  console.log(`[ImmersionBuilder] Problem built: ${problem.numVariables} variables, ${problem.numConstraints} constraints (${lockedWeeks} locked, ${freeWeeks} free student-weeks)`);

  return {
    problem,
    assignmentVars,
    stats: { lockedWeeks, freeWeeks, programsWithPeers: programs.length }
  };
}
