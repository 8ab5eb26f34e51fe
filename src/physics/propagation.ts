import { AstrodynamicsError } from '../errors';
import type { Quantity } from '../units';
import { invalidOrbit, isInvalid, type Orbit } from './orbit';

/**
 * Advances an orbit by `duration`. Implementations return the invalid
 * sentinel when they cannot converge rather than throwing.
 */
export type Propagator = (orbit: Orbit, duration: Quantity<'time'>) => Orbit;

export interface KeplerSolution {
  /** Eccentric anomaly for ellipses, hyperbolic anomaly for hyperbolas (radians). */
  anomaly: number;
  converged: boolean;
}

/** Solves Kepler's equation for a mean anomaly (radians) and eccentricity. */
export type KeplerSolver = (meanAnomaly: number, eccentricity: number) => KeplerSolution;

/**
 * Wrap a propagator so batch callers never see a numerical failure as an
 * exception. Invalid inputs pass straight through. A thrown error becomes the
 * invalid sentinel, except for this library's own construction errors (bad
 * units, wrong vector sizes, frame mismatches), which still throw.
 */
export function guardPropagator(propagator: Propagator): Propagator {
  return (orbit, duration) => {
    if (isInvalid(orbit)) return orbit;
    try {
      return propagator(orbit, duration);
    } catch (error) {
      if (error instanceof AstrodynamicsError) throw error;
      console.warn(`Propagation over ${duration.toString()} failed, returning invalid orbit:`, error);
      return invalidOrbit(orbit.body, { frame: orbit.frame, precision: orbit.precision });
    }
  };
}

/** Propagate every orbit by the same duration; failures come back as invalid orbits. */
export function propagateAll(
  orbits: readonly Orbit[],
  duration: Quantity<'time'>,
  propagator: Propagator,
): Orbit[] {
  const guarded = guardPropagator(propagator);
  return orbits.map((orbit) => guarded(orbit, duration));
}

export function partitionOrbits(orbits: readonly Orbit[]): { valid: Orbit[]; invalid: Orbit[] } {
  const valid: Orbit[] = [];
  const invalid: Orbit[] = [];
  for (const orbit of orbits) {
    (isInvalid(orbit) ? invalid : valid).push(orbit);
  }
  return { valid, invalid };
}

/**
 * Adapt a Kepler solver so that non-convergence yields null, letting a
 * propagator built on it return the invalid sentinel.
 */
export function solveOrNull(solver: KeplerSolver, meanAnomaly: number, eccentricity: number): number | null {
  const { anomaly, converged } = solver(meanAnomaly, eccentricity);
  return converged && Number.isFinite(anomaly) ? anomaly : null;
}
