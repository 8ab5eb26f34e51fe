import * as THREE from 'three';
import { J2000_OBLIQUITY } from '../constants';
import { FrameMismatchError } from '../errors';
import { applyMatrix } from '../physics/orbital-elements';
import { invalidOrbit, isInvalid, type Orbit, orbitFromStateVector } from '../physics/orbit';
import type { FrameName, StateVector, Vec3 } from '../types';
import { vectorIn } from '../units';

export type PositionTransformation = (position: Readonly<Vec3>) => Vec3;

/**
 * Velocity transformations also see the source position: a rotating
 * destination frame subtracts ω × r, so it cannot reuse the position map.
 */
export type VelocityTransformation = (velocity: Readonly<Vec3>, position: Readonly<Vec3>) => Vec3;

/**
 * Coordinate transformation from frame `From` to frame `To`, built from
 * separate position and velocity maps. Vectors are in km and km/s.
 */
export class Transform<From extends FrameName, To extends FrameName> {
  constructor(
    readonly transformPosition: PositionTransformation,
    readonly transformVelocity: VelocityTransformation,
    readonly from: From,
    readonly to: To,
  ) {}

  apply(sv: StateVector): StateVector {
    return {
      position: this.transformPosition(sv.position),
      velocity: this.transformVelocity(sv.velocity, sv.position),
    };
  }

  /** This transform followed by `next`. */
  then<Next extends FrameName>(next: Transform<To, Next>): Transform<From, Next> {
    return new Transform(
      (r) => next.transformPosition(this.transformPosition(r)),
      (v, r) => next.transformVelocity(this.transformVelocity(v, r), this.transformPosition(r)),
      this.from,
      next.to,
    );
  }
}

/** Rotation matrix re-expressing vectors in a frame turned by `angle` about `axis`. */
export function frameRotation(axis: Readonly<Vec3>, angle: number): THREE.Matrix3 {
  const unit = new THREE.Vector3(axis[0], axis[1], axis[2]).normalize();
  const active = new THREE.Matrix4().makeRotationAxis(unit, angle);
  // Coordinates in the turned frame are the inverse (transpose) of the active rotation
  return new THREE.Matrix3().setFromMatrix4(active).transpose();
}

/** Fixed rotation applied to both position and velocity. */
export function rotationTransform<From extends FrameName, To extends FrameName>(
  matrix: THREE.Matrix3,
  from: From,
  to: To,
): Transform<From, To> {
  const rotation = matrix.clone();
  return new Transform(
    (r) => applyMatrix(rotation, r),
    (v) => applyMatrix(rotation, v),
    from,
    to,
  );
}

export function axisRotationTransform<From extends FrameName, To extends FrameName>(
  axis: Readonly<Vec3>,
  angle: number,
  from: From,
  to: To,
): Transform<From, To> {
  return rotationTransform(frameRotation(axis, angle), from, to);
}

/**
 * Destination frame turned by `angle` about `axis` and spinning about it at
 * `rate` rad/s. Velocities pick up the transport term: v' = Rᵀ(v − ω × r).
 */
export function rotatingFrameTransform<From extends FrameName, To extends FrameName>(
  axis: Readonly<Vec3>,
  angle: number,
  rate: number,
  from: From,
  to: To,
): Transform<From, To> {
  const rotation = frameRotation(axis, angle);
  const omega = new THREE.Vector3(axis[0], axis[1], axis[2]).normalize().multiplyScalar(rate);

  return new Transform(
    (r) => applyMatrix(rotation, r),
    (v, r) => {
      const transport = omega.clone().cross(new THREE.Vector3(r[0], r[1], r[2]));
      return applyMatrix(rotation, [v[0] - transport.x, v[1] - transport.y, v[2] - transport.z]);
    },
    from,
    to,
  );
}

export const ICRF_TO_ECLIPTIC = axisRotationTransform([1, 0, 0], J2000_OBLIQUITY, 'ICRF', 'ECLIPJ2000');

export const ECLIPTIC_TO_ICRF = axisRotationTransform([1, 0, 0], -J2000_OBLIQUITY, 'ECLIPJ2000', 'ICRF');

/**
 * Re-express an orbit in the transform's destination frame.
 *
 * The Cartesian state is transformed and the orbit rebuilt from it, so
 * inclination and RAAN are measured against the new fundamental plane.
 * The invalid sentinel stays invalid.
 */
export function transformOrbit<From extends FrameName, To extends FrameName>(
  transform: Transform<From, To>,
  orbit: Orbit,
): Orbit {
  if (orbit.frame !== transform.from) {
    throw new FrameMismatchError(transform.from, orbit.frame);
  }
  const options = { frame: transform.to, precision: orbit.precision };
  if (isInvalid(orbit)) return invalidOrbit(orbit.body, options);

  const state = transform.apply({
    position: vectorIn('length', orbit.position, 'km'),
    velocity: vectorIn('velocity', orbit.velocity, 'km/s'),
  });
  return orbitFromStateVector(state, orbit.body, options);
}
