import { describe, it, expect } from 'vitest';
import { Earth } from '../src/bodies';
import { J2000_OBLIQUITY } from '../src/constants';
import { FrameMismatchError } from '../src/errors';
import {
  axisRotationTransform,
  ECLIPTIC_TO_ICRF,
  ICRF_TO_ECLIPTIC,
  rotatingFrameTransform,
  Transform,
  transformOrbit,
} from '../src/frames/transform';
import { invalidOrbit, isInvalid, orbitFromStateVector } from '../src/physics/orbit';
import type { StateVector } from '../src/types';
import { vectorIn } from '../src/units';

const leo: StateVector = { position: [7000, 0, 0], velocity: [0, 7.5, 0] };

describe('Transform', () => {
  it('keeps position and velocity maps separate', () => {
    const shift = new Transform(
      (r) => [r[0] + 1, r[1], r[2]],
      (v) => [v[0], v[1] * 2, v[2]],
      'A',
      'B',
    );
    expect(shift.apply(leo)).toEqual({ position: [7001, 0, 0], velocity: [0, 15, 0] });
    expect(shift.from).toBe('A');
    expect(shift.to).toBe('B');
  });

  it('composes with a transform out of its destination frame', () => {
    const there = ICRF_TO_ECLIPTIC.then(ECLIPTIC_TO_ICRF);
    expect(there.from).toBe('ICRF');
    expect(there.to).toBe('ICRF');

    const sv = there.apply({ position: [7000, 1000, 2000], velocity: [-1, 7, 2] });
    for (const [actual, expected] of [
      [sv.position[0], 7000], [sv.position[1], 1000], [sv.position[2], 2000],
      [sv.velocity[0], -1], [sv.velocity[1], 7], [sv.velocity[2], 2],
    ]) {
      expect(actual).toBeCloseTo(expected, 9);
    }
  });

  it('re-expresses coordinates in a turned frame', () => {
    const turned = axisRotationTransform([0, 0, 1], Math.PI / 2, 'ICRF', 'TURNED');
    const { position, velocity } = turned.apply(leo);
    expect(position[0]).toBeCloseTo(0, 9);
    expect(position[1]).toBeCloseTo(-7000, 9);
    expect(velocity[0]).toBeCloseTo(7.5, 12);
    expect(velocity[1]).toBeCloseTo(0, 12);
  });

  it('adds the transport velocity of a rotating frame', () => {
    const corotating = rotatingFrameTransform([0, 0, 1], 0, 7.5 / 7000, 'ICRF', 'COROTATING');
    const { position, velocity } = corotating.apply(leo);
    expect(position).toEqual([7000, 0, 0]);
    expect(velocity[0]).toBeCloseTo(0, 12);
    expect(velocity[1]).toBeCloseTo(0, 12);
    expect(velocity[2]).toBeCloseTo(0, 12);
  });
});

describe('transformOrbit', () => {
  it('recomputes inclination and RAAN against the new fundamental plane', () => {
    const orbit = orbitFromStateVector(leo, Earth);
    const ecliptic = transformOrbit(ICRF_TO_ECLIPTIC, orbit);

    expect(ecliptic.frame).toBe('ECLIPJ2000');
    expect(ecliptic.inclination.value).toBeCloseTo(J2000_OBLIQUITY, 12);
    expect(ecliptic.raan.value).toBeCloseTo(Math.PI, 12);
    expect(ecliptic.eccentricity).toBeCloseTo(orbit.eccentricity, 12);
    expect(ecliptic.semimajorAxis.in('km')).toBeCloseTo(orbit.semimajorAxis.in('km'), 6);
  });

  it('turns an equatorial orbit polar under a quarter turn about X', () => {
    const orbit = orbitFromStateVector(leo, Earth);
    const polar = transformOrbit(axisRotationTransform([1, 0, 0], Math.PI / 2, 'ICRF', 'POLAR'), orbit);

    expect(polar.inclination.value).toBeCloseTo(Math.PI / 2, 12);
    expect(polar.raan.value).toBeCloseTo(Math.PI, 12);
    expect(vectorIn('velocity', polar.velocity, 'km/s')[2]).toBeCloseTo(-7.5, 12);
  });

  it('refuses an orbit from another frame', () => {
    const orbit = orbitFromStateVector(leo, Earth);
    expect(() => transformOrbit(ECLIPTIC_TO_ICRF, orbit)).toThrow(FrameMismatchError);
  });

  it('keeps the sentinel invalid', () => {
    const invalid = invalidOrbit(Earth);
    const once = transformOrbit(ICRF_TO_ECLIPTIC, invalid);
    const twice = transformOrbit(ECLIPTIC_TO_ICRF, once);

    expect(once.frame).toBe('ECLIPJ2000');
    expect(isInvalid(once)).toBe(true);
    expect(isInvalid(twice)).toBe(true);
    expect(twice.body).toBe(Earth);
  });

  it('keeps the orbit precision', () => {
    const orbit = orbitFromStateVector(leo, Earth, { precision: 'float32' });
    expect(transformOrbit(ICRF_TO_ECLIPTIC, orbit).precision).toBe('float32');
  });
});
