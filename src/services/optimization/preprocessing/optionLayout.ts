/**
 * Concatenated option space
 *
 * Every week's options are laid out back to back in one global index range,
 * so a single row of assignment indicators per student covers all weeks:
 *
 *   week 0: [0, 1]   week 1: [2, 3, 4]   →   offsets = [0, 2, 5]
 *
 * Global indices are 0-based; option numbers stored on students are 1-based.
 */

import type { WeeklyPreferences } from '../types';

export interface OptionLayout {
  numWeeks: number;
  numOptions: number[];
  /** offsets[w] = first global index of week w; offsets[numWeeks] = total */
  offsets: number[];
  totalOptions: number;
}

/**
 * Build the layout from the weekly matrices (width of the first row).
 * Call after validation: every week must have at least one row.
 */
export function buildOptionLayout(preferences: WeeklyPreferences): OptionLayout {
  const numOptions = preferences.map(week => week[0]?.length ?? 0);
  const offsets = [0];
  for (const count of numOptions) {
    offsets.push(offsets[offsets.length - 1] + count);
  }
  return {
    numWeeks: preferences.length,
    numOptions,
    offsets,
    totalOptions: offsets[offsets.length - 1],
  };
}

/**
 * Global index of a 1-based option in a given week
 */
export function globalOptionIndex(layout: OptionLayout, week: number, option: number): number {
  return layout.offsets[week] + option - 1;
}

/**
 * Global indices owned by a week
 */
export function weekOptionIndices(layout: OptionLayout, week: number): number[] {
  const indices: number[] = [];
  for (let c = layout.offsets[week]; c < layout.offsets[week + 1]; c++) {
    indices.push(c);
  }
  return indices;
}

/**
 * An all-zero matrix marks a week whose choices are supplied externally
 */
export function isSentinelWeek(matrix: number[][]): boolean {
  return matrix.every(row => row.every(value => value === 0));
}
