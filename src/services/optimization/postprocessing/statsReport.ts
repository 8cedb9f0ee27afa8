/**
 * Stats Report
 *
 * Human-readable summary of ImmersionStats.
 */

import type { ImmersionStats } from '../types';

/**
 * Integers keep one decimal ("1.0"), everything else prints as is
 */
function formatScore(value: number): string {
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

function maxValue(values: Iterable<number>): number {
  let max = 0;
  for (const value of values) {
    if (value > max) max = value;
  }
  return max;
}

/**
 * "{A: 1, B: 2}" with programs in name order
 */
function formatProgramTotals(totals: Map<string, number>): string {
  const entries = Array.from(totals.entries())
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([program, count]) => `${program}: ${count}`);
  return `{${entries.join(', ')}}`;
}

/**
 * Format the report lines for console output
 */
export function formatImmersionReportLines(stats: ImmersionStats): string[] {
  const repeatedPairs = Array.from(stats.pairCollisions.values()).filter(count => count > 1).length;

  return [
    `Mean preference score: ${formatScore(stats.meanPreferenceScore)}`,
    `Maximum imbalance in group size: ${stats.maxImbalance}`,
    'Two or more students from the same program assigned to the same group ("program collisions"):',
    `  Total number of program collisions: ${stats.programCollisions.size}`,
    `  Maximum number of collisions in a single group: ${maxValue(stats.programCollisions.values())}`,
    `  Number of times each program appears in a collision: ${formatProgramTotals(stats.programCollisionTotals)}`,
    'Two or more students sharing a group in more than one week ("student collisions"):',
    `  Total number of student collisions: ${repeatedPairs}`,
    `  Maximum number of collisions for a single pair: ${maxValue(stats.pairCollisions.values())}`,
  ];
}

export function formatImmersionReport(stats: ImmersionStats): string {
  return formatImmersionReportLines(stats).join('\n');
}
