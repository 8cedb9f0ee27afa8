/**
 * Penalty Weights
 *
 * Resolves the immersion objective weights: caller overrides merged over the
 * defaults, each checked to be a finite non-negative number.
 * A weight of 0 switches its term off.
 */

import type { ImmersionWeights } from '../types';
import { InputDomainError } from '../errors';
import { DEFAULT_IMMERSION_WEIGHTS } from '@/_domain';

const WEIGHT_KEYS = ['preference', 'sizeImbalance', 'sameProgram', 'repeatPartner'] as const;

/**
 * Merge partial weights over DEFAULT_IMMERSION_WEIGHTS
 *
 * @throws InputDomainError for negative or non-finite weights
 */
export function resolveWeights(overrides: Partial<ImmersionWeights> = {}): ImmersionWeights {
  const weights: ImmersionWeights = { ...DEFAULT_IMMERSION_WEIGHTS };

  for (const key of WEIGHT_KEYS) {
    const value = overrides[key];
    if (value === undefined) continue;
    if (!Number.isFinite(value) || value < 0) {
      throw new InputDomainError(`Weight "${key}" must be a finite non-negative number, got ${value}`);
    }
    weights[key] = value;
  }

  return weights;
}

/**
 * Terms that will actually be built (weight > 0)
 */
export function activeTerms(weights: ImmersionWeights): Array<keyof ImmersionWeights> {
  return WEIGHT_KEYS.filter(key => weights[key] > 0);
}

/**
 * Format weights for logging
 */
export function formatWeights(weights: ImmersionWeights): string {
  return `pref=${weights.preference}, balance=${weights.sizeImbalance}, program=${weights.sameProgram}, partner=${weights.repeatPartner}`;
}
