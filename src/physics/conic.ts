import { CIRCULAR_ECCENTRICITY_TOLERANCE, PARABOLIC_ECCENTRICITY_TOLERANCE } from '../constants';

export const CONICS = ['circular', 'elliptical', 'parabolic', 'hyperbolic', 'invalid'] as const;

export type Conic = (typeof CONICS)[number];

/**
 * Conic section of a two-body orbit from its eccentricity.
 *
 * `valid = false` wins over any eccentricity. Circular and parabolic use
 * absolute tolerances since round-off rarely lands exactly on 0 or 1.
 * Negative or NaN eccentricity is not a physical orbit and classifies as invalid.
 */
export function classifyConic(eccentricity: number, valid = true): Conic {
  if (!valid || Number.isNaN(eccentricity) || eccentricity < 0) return 'invalid';
  if (eccentricity <= CIRCULAR_ECCENTRICITY_TOLERANCE) return 'circular';
  if (Math.abs(eccentricity - 1) <= PARABOLIC_ECCENTRICITY_TOLERANCE) return 'parabolic';
  return eccentricity < 1 ? 'elliptical' : 'hyperbolic';
}
