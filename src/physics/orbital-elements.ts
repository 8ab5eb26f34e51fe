import * as THREE from 'three';
import { EQUATORIAL_TOLERANCE } from '../constants';
import type { OrbitalElements, StateVector, Vec3 } from '../types';
import { classifyConic } from './conic';

const TWO_PI = 2 * Math.PI;

const clamp = (x: number) => Math.max(-1, Math.min(1, x));

/** Wrap an angle into [0, 2π). */
export function wrapAngle(angle: number): number {
  const wrapped = angle % TWO_PI;
  return wrapped < 0 ? wrapped + TWO_PI : wrapped;
}

const isEquatorial = (inclination: number) => Math.abs(Math.sin(inclination)) <= EQUATORIAL_TOLERANCE;

/**
 * Convert an inertial state vector to Keplerian orbital elements.
 * Z is the pole of the fundamental plane, X the reference direction.
 *
 * Undefined angles take canonical values instead of NaN:
 *  - equatorial: RAAN = 0, argument of periapsis is the longitude of periapsis
 *  - circular: argument of periapsis = 0, true anomaly is the argument of
 *    latitude (true longitude when also equatorial)
 * Retrograde equatorial orbits measure longitudes clockwise, matching the
 * R3(Ω)·R1(π)·R3(ω) rotation used to go back.
 *
 * Returns null when no conic fits the state: zero radius, rectilinear
 * motion, or non-finite input.
 */
export function stateToElements(sv: StateVector, mu: number): OrbitalElements | null {
  const [x, y, z] = sv.position;
  const [vx, vy, vz] = sv.velocity;

  const r = Math.hypot(x, y, z);
  const v = Math.hypot(vx, vy, vz);
  if (!Number.isFinite(r) || !Number.isFinite(v) || r === 0) return null;

  // Specific angular momentum h = r × v
  const hx = y * vz - z * vy;
  const hy = z * vx - x * vz;
  const hz = x * vy - y * vx;
  const hMag = Math.hypot(hx, hy, hz);
  if (hMag <= Number.EPSILON * r * v) return null;

  // Node vector n = k × h
  const nx = -hy;
  const ny = hx;
  const nMag = Math.hypot(nx, ny);

  // Eccentricity vector e = ((v^2 - mu/r) r - (r·v) v) / mu
  const rdotv = x * vx + y * vy + z * vz;
  const factor1 = (v * v - mu / r) / mu;
  const factor2 = rdotv / mu;
  const ex = factor1 * x - factor2 * vx;
  const ey = factor1 * y - factor2 * vy;
  const ez = factor1 * z - factor2 * vz;
  const eccentricity = Math.hypot(ex, ey, ez);

  const conic = classifyConic(eccentricity);
  const semilatusRectum = (hMag * hMag) / mu;
  const semiMajorAxis = conic === 'parabolic' ? Infinity : semilatusRectum / (1 - eccentricity * eccentricity);

  const inclination = Math.acos(clamp(hz / hMag));
  const equatorial = isEquatorial(inclination);
  const prograde = hz >= 0;

  const raan = equatorial ? 0 : wrapAngle(Math.atan2(ny, nx));

  let argumentOfPeriapsis = 0;
  if (conic !== 'circular') {
    if (equatorial) {
      const longitude = Math.atan2(ey, ex);
      argumentOfPeriapsis = wrapAngle(prograde ? longitude : -longitude);
    } else {
      argumentOfPeriapsis = Math.acos(clamp((nx * ex + ny * ey) / (nMag * eccentricity)));
      if (ez < 0) argumentOfPeriapsis = TWO_PI - argumentOfPeriapsis;
    }
  }

  let trueAnomaly: number;
  if (conic !== 'circular') {
    trueAnomaly = Math.acos(clamp((ex * x + ey * y + ez * z) / (eccentricity * r)));
    if (rdotv < 0) trueAnomaly = TWO_PI - trueAnomaly;
  } else if (equatorial) {
    const longitude = Math.atan2(y, x);
    trueAnomaly = prograde ? longitude : -longitude;
  } else {
    trueAnomaly = Math.acos(clamp((nx * x + ny * y) / (nMag * r)));
    if (z < 0) trueAnomaly = TWO_PI - trueAnomaly;
  }

  return {
    eccentricity,
    semiMajorAxis,
    semilatusRectum,
    inclination,
    raan,
    argumentOfPeriapsis: wrapAngle(argumentOfPeriapsis),
    trueAnomaly: wrapAngle(trueAnomaly),
  };
}

/**
 * Fold undefined angles into the defined ones so that the elements match
 * what {@link stateToElements} would return for the same state.
 */
export function canonicalizeElements(el: OrbitalElements): OrbitalElements {
  let { raan, argumentOfPeriapsis, trueAnomaly } = el;

  if (isEquatorial(el.inclination)) {
    argumentOfPeriapsis += Math.cos(el.inclination) > 0 ? raan : -raan;
    raan = 0;
  }
  if (classifyConic(el.eccentricity) === 'circular') {
    trueAnomaly += argumentOfPeriapsis;
    argumentOfPeriapsis = 0;
  }

  return {
    ...el,
    raan: wrapAngle(raan),
    argumentOfPeriapsis: wrapAngle(argumentOfPeriapsis),
    trueAnomaly: wrapAngle(trueAnomaly),
  };
}

/**
 * Position and velocity in the perifocal frame: periapsis along the first
 * axis, angular momentum along the third.
 * Returns null past the asymptotes of a hyperbola, where 1 + e·cos ν ≤ 0.
 */
export function perifocalState(
  semilatusRectum: number,
  eccentricity: number,
  trueAnomaly: number,
  mu: number,
): StateVector | null {
  const cosNu = Math.cos(trueAnomaly);
  const sinNu = Math.sin(trueAnomaly);
  const denominator = 1 + eccentricity * cosNu;
  if (denominator <= 0) return null;

  const r = semilatusRectum / denominator;
  const speedScale = Math.sqrt(mu / semilatusRectum);
  return {
    position: [r * cosNu, r * sinNu, 0],
    velocity: [-speedScale * sinNu, speedScale * (eccentricity + cosNu), 0],
  };
}

/** Rotation taking perifocal coordinates to inertial ones: R3(Ω)·R1(i)·R3(ω). */
export function perifocalToInertial(inclination: number, raan: number, argumentOfPeriapsis: number): THREE.Matrix3 {
  const ci = Math.cos(inclination);
  const si = Math.sin(inclination);
  const cO = Math.cos(raan);
  const sO = Math.sin(raan);
  const cw = Math.cos(argumentOfPeriapsis);
  const sw = Math.sin(argumentOfPeriapsis);

  // Matrix3.set takes row-major arguments
  return new THREE.Matrix3().set(
    cO * cw - sO * sw * ci, -cO * sw - sO * cw * ci, sO * si,
    sO * cw + cO * sw * ci, -sO * sw + cO * cw * ci, -cO * si,
    sw * si, cw * si, ci,
  );
}

export function applyMatrix(matrix: THREE.Matrix3, v: Readonly<Vec3>): Vec3 {
  const out = new THREE.Vector3(v[0], v[1], v[2]).applyMatrix3(matrix);
  return [out.x, out.y, out.z];
}

/**
 * Convert Keplerian elements to an inertial state vector.
 * The elements are used as given; canonicalize them first if they may carry
 * angles that are undefined for their geometry.
 */
export function elementsToState(el: OrbitalElements, mu: number): StateVector | null {
  const perifocal = perifocalState(el.semilatusRectum, el.eccentricity, el.trueAnomaly, mu);
  if (!perifocal) return null;

  const rotation = perifocalToInertial(el.inclination, el.raan, el.argumentOfPeriapsis);
  return {
    position: applyMatrix(rotation, perifocal.position),
    velocity: applyMatrix(rotation, perifocal.velocity),
  };
}
