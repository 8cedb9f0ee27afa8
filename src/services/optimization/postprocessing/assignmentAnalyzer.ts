/**
 * Assignment Analyzer
 *
 * Summary statistics for a finished (or partially finished) assignment:
 * - Mean preference score over real choices in regular weeks
 * - Largest per-week spread in option occupancy
 * - Pair collisions: weeks each pair of students shared an option
 * - Program collisions: extra same-program students per (week, option)
 *
 * Pure: nothing here mutates students.
 */

import type {
  ImmersionStats,
  ImmersionStudent,
  NamedStudent,
  PartnerGroupStats,
  PartnerPreferences,
  PartnerStudent,
  WeeklyPreferences
} from '../types';
import { isSentinelWeek } from '../preprocessing/optionLayout';
import { sameStudent, sortName } from '../students';
import { NOT_PARTICIPATING } from '@/_domain';

/**
 * Order-independent key for a pair of students: "Last, First | Last, First"
 */
export function pairKey(a: NamedStudent, b: NamedStudent): string {
  return [sortName(a), sortName(b)].sort().join(' | ');
}

/**
 * Key for one (week, option, program) cell; week and option are 1-based
 */
export function programCollisionKey(week: number, option: number, program: string): string {
  return `${week}:${option}:${program}`;
}

export function getPairCollisions(stats: ImmersionStats, a: NamedStudent, b: NamedStudent): number {
  return stats.pairCollisions.get(pairKey(a, b)) ?? 0;
}

export function getProgramCollisions(stats: ImmersionStats, week: number, option: number, program: string): number {
  return stats.programCollisions.get(programCollisionKey(week, option, program)) ?? 0;
}

/**
 * Students grouped by the option they took in week w (0-based week,
 * 1-based option keys). Non-participants are left out.
 */
function membersByOption(students: ImmersionStudent[], week: number): Map<number, ImmersionStudent[]> {
  const members = new Map<number, ImmersionStudent[]>();
  for (const student of students) {
    if (week >= student.assigned.length) continue;
    const option = student.assigned[week];
    if (option === NOT_PARTICIPATING) continue;
    const list = members.get(option) ?? [];
    list.push(student);
    members.set(option, list);
  }
  return members;
}

/**
 * Analyze immersion assignments against the weekly preferences
 */
export function analyzeAssignments(students: ImmersionStudent[], preferences: WeeklyPreferences): ImmersionStats {
  let preferenceSum = 0;
  let preferenceCount = 0;
  let maxImbalance = 0;
  const pairCollisions = new Map<string, number>();
  const programCollisions = new Map<string, number>();
  const programCollisionTotals = new Map<string, number>();

  preferences.forEach((matrix, w) => {
    const sentinel = isSentinelWeek(matrix);
    const numOptions = matrix[0]?.length ?? 0;

    // Mean preference
    if (!sentinel) {
      students.forEach((student, i) => {
        if (w >= student.assigned.length) return;
        const option = student.assigned[w];
        if (option === NOT_PARTICIPATING) return;
        preferenceSum += matrix[i][option - 1];
        preferenceCount++;
      });
    }

    const members = membersByOption(students, w);

    // Occupancy spread (empty options count as 0)
    const occupancy = Array.from({ length: numOptions }, (_, k) => members.get(k + 1)?.length ?? 0);
    if (occupancy.length > 0) {
      maxImbalance = Math.max(maxImbalance, Math.max(...occupancy) - Math.min(...occupancy));
    }

    for (const [option, group] of members) {
      // Pairs sharing this option
      for (let a = 0; a < group.length; a++) {
        for (let b = a + 1; b < group.length; b++) {
          const key = pairKey(group[a], group[b]);
          pairCollisions.set(key, (pairCollisions.get(key) ?? 0) + 1);
        }
      }

      // Same-program students in this option
      const programCounts = new Map<string, number>();
      for (const student of group) {
        programCounts.set(student.program, (programCounts.get(student.program) ?? 0) + 1);
      }
      for (const [program, count] of programCounts) {
        if (count < 2) continue;
        programCollisions.set(programCollisionKey(w + 1, option, program), count - 1);
        programCollisionTotals.set(program, (programCollisionTotals.get(program) ?? 0) + count - 1);
      }
    }
  });

  return {
    meanPreferenceScore: preferenceCount > 0 ? preferenceSum / preferenceCount : 0,
    maxImbalance,
    pairCollisions,
    programCollisions,
    programCollisionTotals,
  };
}

/**
 * Group sizes, mean scores and how many bonus pairs were honored
 */
export function analyzePartnerGroups(
  groups: PartnerStudent[][],
  students: PartnerStudent[],
  preferences?: PartnerPreferences
): PartnerGroupStats {
  const groupSizes = groups.map(group => group.length);
  const groupMeanScores = groups.map(group =>
    group.length > 0 ? group.reduce((sum, s) => sum + s.score, 0) / group.length : 0
  );
  const sizeSpread = groupSizes.length > 0 ? Math.max(...groupSizes) - Math.min(...groupSizes) : 0;

  let honoredBonusPairs = 0;
  let splitBonusPairs = 0;

  if (preferences) {
    const groupOf = students.map(student => groups.findIndex(group => group.some(s => sameStudent(s, student))));
    for (let i1 = 0; i1 < students.length; i1++) {
      for (let i2 = i1 + 1; i2 < students.length; i2++) {
        if (preferences[i1][i2] >= 0) continue;
        if (groupOf[i1] !== -1 && groupOf[i1] === groupOf[i2]) {
          honoredBonusPairs++;
        } else {
          splitBonusPairs++;
        }
      }
    }
  }

  return { groupSizes, groupMeanScores, sizeSpread, honoredBonusPairs, splitBonusPairs };
}
