/**
 * ============================================================================
 * CORE MODULE - Shared constants for the assignment models
 * ============================================================================
 *
 * USAGE:
 * ------
 *   import { SELECTION_THRESHOLD, DEFAULT_IMMERSION_WEIGHTS } from '@/_domain';
 *
 * When adding new thresholds or defaults:
 * 1. Add to constants.ts (or a new module)
 * 2. Export from this index.ts
 *
 * ============================================================================
 */

/** Thresholds, sentinels, default weights */
export * from './constants';
