/**
 * Solution Extractor
 *
 * Reads assignment indicators back out of a SolverSolution.
 * An indicator counts only when its value is > SELECTION_THRESHOLD.
 */

import type { ImmersionStudent, PartnerStudent, SolverSolution } from '../types';
import type { OptionLayout } from '../preprocessing/optionLayout';
import { SELECTION_THRESHOLD } from '@/_domain';

export interface PartnerExtraction {
  groups: PartnerStudent[][];
  /** Students with no indicator above the threshold */
  unassigned: PartnerStudent[];
}

export interface ImmersionExtraction {
  /** Number of (student, week) choices appended */
  appended: number;
  /** Students whose sequence is still shorter than the number of weeks */
  incomplete: ImmersionStudent[];
}

function isSelected(solution: SolverSolution, name: string): boolean {
  return (solution.values.get(name) ?? 0) > SELECTION_THRESHOLD;
}

/**
 * Build groups from the partner model's indicators.
 * Students keep their input order inside each group.
 */
export function extractPartnerGroups(
  solution: SolverSolution,
  students: PartnerStudent[],
  assignmentVars: string[][],
  numGroups: number
): PartnerExtraction {
  const groups: PartnerStudent[][] = Array.from({ length: numGroups }, () => []);
  const unassigned: PartnerStudent[] = [];

  students.forEach((student, i) => {
    const group = assignmentVars[i].findIndex(name => isSelected(solution, name));
    if (group === -1) {
      unassigned.push(student);
    } else {
      groups[group].push(student);
    }
  });

  return { groups, unassigned };
}

/**
 * Append each student's chosen options for the weeks not yet assigned.
 *
 * Weeks already in `assigned` are never touched. A student's sequence stops
 * growing at the first week with no selected indicator. An empty solution
 * extracts nothing.
 */
export function extractImmersionChoices(
  solution: SolverSolution,
  students: ImmersionStudent[],
  assignmentVars: string[][],
  layout: OptionLayout
): ImmersionExtraction {
  let appended = 0;

  if (solution.values.size > 0) {
    students.forEach((student, i) => {
      for (let w = student.assigned.length; w < layout.numWeeks; w++) {
        let chosen = -1;
        for (let k = 0; k < layout.numOptions[w]; k++) {
          if (isSelected(solution, assignmentVars[i][layout.offsets[w] + k])) {
            chosen = k + 1;
            break;
          }
        }
        if (chosen === -1) break;
        student.assigned.push(chosen);
        appended++;
      }
    });
  }

  const incomplete = students.filter(s => s.assigned.length < layout.numWeeks);
  return { appended, incomplete };
}
