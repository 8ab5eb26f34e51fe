import type { Orbit } from '../physics/orbit';
import type { StateVector } from '../types';
import { summarizeOrbit } from '../ui/orbit-summary';

const isVec3 = (v: unknown): v is [number, number, number] =>
  Array.isArray(v) && v.length === 3 && v.every((x) => typeof x === 'number' && Number.isFinite(x));

/**
 * Validate a StateVector (km, km/s) from imported JSON.
 */
export function validateStateVector(data: unknown): StateVector | null {
  if (!data || typeof data !== 'object') return null;
  if (!('position' in data) || !('velocity' in data)) return null;

  const { position, velocity } = data;
  if (!isVec3(position) || !isVec3(velocity)) return null;

  return { position: [...position], velocity: [...velocity] };
}

/**
 * Pretty-printed JSON of an orbit's summary. JSON has no NaN or Infinity,
 * so the fields of an invalid orbit and the apoapsis of an open one are written as null.
 */
export function serializeOrbit(orbit: Orbit): string {
  return JSON.stringify(summarizeOrbit(orbit), null, 2);
}
