import { DEFAULT_FRAME } from '../constants';
import { OrbitConstructionError } from '../errors';
import { promotePrecision, roundTo } from '../precision';
import type { FrameName, OrbitalElements, Precision, StateVector, Vec3 } from '../types';
import { type Dimension, Quantity, type QuantityVector, vector, vectorIn } from '../units';
import type { CelestialBody } from './celestial-body';
import { classifyConic, type Conic } from './conic';
import { canonicalizeElements, elementsToState, perifocalState, stateToElements } from './orbital-elements';

/** Fields shared by every orbit, whatever its conic. */
export interface OrbitFields {
  // Inertial Cartesian
  readonly position: QuantityVector<'length'>;
  readonly velocity: QuantityVector<'velocity'>;

  // Perifocal Cartesian (periapsis on the first axis)
  readonly perifocalPosition: QuantityVector<'length'>;
  readonly perifocalVelocity: QuantityVector<'velocity'>;

  // Keplerian
  readonly eccentricity: number;
  readonly semimajorAxis: Quantity<'length'>;
  readonly semilatusRectum: Quantity<'length'>;
  readonly inclination: Quantity<'angle'>;
  readonly raan: Quantity<'angle'>;
  readonly argumentOfPeriapsis: Quantity<'angle'>;
  readonly trueAnomaly: Quantity<'angle'>;

  readonly body: CelestialBody;
  readonly frame: FrameName;
  readonly precision: Precision;
}

export interface ConicOrbit<C extends Conic> extends OrbitFields {
  readonly conic: C;
}

/** A two-body orbit, discriminated by its conic section. */
export type Orbit = { [C in Conic]: ConicOrbit<C> }[Conic];

export interface OrbitOptions {
  frame?: FrameName;
  precision?: Precision;
}

/** Keplerian elements as accepted by {@link orbitFromElements}. */
export interface KeplerianElements {
  eccentricity: number;
  semimajorAxis: Quantity<'length'>;
  inclination: Quantity<'angle'>;
  raan: Quantity<'angle'>;
  argumentOfPeriapsis: Quantity<'angle'>;
  trueAnomaly: Quantity<'angle'>;
  /** Required for parabolic orbits, whose semimajor axis is infinite. */
  semilatusRectum?: Quantity<'length'>;
}

const freeze = <C extends Conic>(orbit: ConicOrbit<C>): ConicOrbit<C> => Object.freeze(orbit);

function tagOrbit(fields: OrbitFields, conic: Conic): Orbit {
  switch (conic) {
    case 'circular':
      return freeze({ ...fields, conic });
    case 'elliptical':
      return freeze({ ...fields, conic });
    case 'parabolic':
      return freeze({ ...fields, conic });
    case 'hyperbolic':
      return freeze({ ...fields, conic });
    case 'invalid':
      return freeze({ ...fields, conic });
  }
}

const km = (values: Vec3, precision: Precision) =>
  vector('length', values.map((v) => roundTo(precision, v)), 'km');
const kms = (values: Vec3, precision: Precision) =>
  vector('velocity', values.map((v) => roundTo(precision, v)), 'km/s');
const rad = (value: number, precision: Precision) => new Quantity('angle', roundTo(precision, value), 'rad');

function resolveOptions(body: CelestialBody, options: OrbitOptions) {
  return {
    frame: options.frame ?? DEFAULT_FRAME,
    precision: options.precision ?? body.precision,
  };
}

/** Assemble an orbit from raw values in km, km/s and radians. */
function buildOrbit(
  state: StateVector,
  perifocal: StateVector,
  el: OrbitalElements,
  body: CelestialBody,
  frame: FrameName,
  precision: Precision,
): Orbit {
  const eccentricity = roundTo(precision, el.eccentricity);
  const conic = classifyConic(eccentricity);
  const fields: OrbitFields = {
    position: km(state.position, precision),
    velocity: kms(state.velocity, precision),
    perifocalPosition: km(perifocal.position, precision),
    perifocalVelocity: kms(perifocal.velocity, precision),
    eccentricity,
    semimajorAxis: new Quantity('length', conic === 'parabolic' ? Infinity : roundTo(precision, el.semiMajorAxis), 'km'),
    semilatusRectum: new Quantity('length', roundTo(precision, el.semilatusRectum), 'km'),
    inclination: rad(el.inclination, precision),
    raan: rad(el.raan, precision),
    argumentOfPeriapsis: rad(el.argumentOfPeriapsis, precision),
    trueAnomaly: rad(el.trueAnomaly, precision),
    body: body.withPrecision(precision),
    frame,
    precision,
  };
  return tagOrbit(fields, conic);
}

const isFiniteVector = (v: Readonly<Vec3>) => v.every(Number.isFinite);

const isFiniteState = (sv: StateVector) => isFiniteVector(sv.position) && isFiniteVector(sv.velocity);

/**
 * The failure sentinel: every vector and scalar field NaN, body kept.
 * Returned by algorithms that must hand back an orbit but could not compute one.
 */
export function invalidOrbit(body: CelestialBody, options: OrbitOptions = {}): ConicOrbit<'invalid'> {
  const { frame, precision } = resolveOptions(body, options);
  const nan: Vec3 = [NaN, NaN, NaN];
  const angle = rad(NaN, precision);
  return freeze({
    position: km(nan, precision),
    velocity: kms(nan, precision),
    perifocalPosition: km(nan, precision),
    perifocalVelocity: kms(nan, precision),
    eccentricity: NaN,
    semimajorAxis: new Quantity('length', NaN, 'km'),
    semilatusRectum: new Quantity('length', NaN, 'km'),
    inclination: angle,
    raan: angle,
    argumentOfPeriapsis: angle,
    trueAnomaly: angle,
    body: body.withPrecision(precision),
    frame,
    precision,
    conic: 'invalid' as const,
  });
}

/**
 * Orbit from an inertial position and velocity. The Cartesian state is the
 * source of truth; elements and the perifocal state are derived from it.
 * A state no conic fits (zero radius, rectilinear motion, NaN) gives the
 * invalid sentinel.
 */
export function orbitFromCartesian(
  position: readonly Quantity<'length'>[],
  velocity: readonly Quantity<'velocity'>[],
  body: CelestialBody,
  options: OrbitOptions = {},
): Orbit {
  return orbitFromStateVector(
    {
      position: vectorIn('length', position, 'km'),
      velocity: vectorIn('velocity', velocity, 'km/s'),
    },
    body,
    options,
  );
}

/** {@link orbitFromCartesian} for raw km and km/s tuples. */
export function orbitFromStateVector(sv: StateVector, body: CelestialBody, options: OrbitOptions = {}): Orbit {
  if (sv.position.length !== 3 || sv.velocity.length !== 3) {
    throw new OrbitConstructionError(
      `State vectors need 3 components, got ${sv.position.length} and ${sv.velocity.length}`,
    );
  }
  const { frame, precision } = resolveOptions(body, options);
  const mu = body.mu.in('km^3/s^2');

  const el = stateToElements(sv, mu);
  if (!el) return invalidOrbit(body, { frame, precision });
  const perifocal = perifocalState(el.semilatusRectum, el.eccentricity, el.trueAnomaly, mu);
  if (!perifocal) return invalidOrbit(body, { frame, precision });

  return buildOrbit(sv, perifocal, el, body, frame, precision);
}

function semilatusRectumOf(elements: KeplerianElements): number {
  const e = elements.eccentricity;
  const a = elements.semimajorAxis.in('km');
  const conic = classifyConic(e);

  switch (conic) {
    case 'parabolic': {
      if (!elements.semilatusRectum) {
        throw new OrbitConstructionError('Parabolic orbits need a semilatus rectum');
      }
      return elements.semilatusRectum.in('km');
    }
    case 'circular':
    case 'elliptical':
      if (!(a > 0)) {
        throw new OrbitConstructionError(`A ${conic} orbit needs a positive semimajor axis, got ${a} km`);
      }
      return a * (1 - e * e);
    case 'hyperbolic':
      if (!(a < 0)) {
        throw new OrbitConstructionError(`A hyperbolic orbit needs a negative semimajor axis, got ${a} km`);
      }
      return a * (1 - e * e);
    case 'invalid':
      throw new OrbitConstructionError(`Eccentricity must be a non-negative number, got ${e}`);
  }
}

/**
 * Orbit from classical elements. The elements are the source of truth,
 * after undefined angles are folded into defined ones (see
 * {@link canonicalizeElements}); the Cartesian states are derived from them.
 * A true anomaly beyond a hyperbola's asymptotes, or any non-finite angle or
 * size, gives the invalid sentinel.
 */
export function orbitFromElements(elements: KeplerianElements, body: CelestialBody, options: OrbitOptions = {}): Orbit {
  const inclination = elements.inclination.in('rad');
  if (!(inclination >= 0 && inclination <= Math.PI)) {
    throw new OrbitConstructionError(`Inclination must lie in [0, π], got ${inclination} rad`);
  }
  const { frame, precision } = resolveOptions(body, options);
  const mu = body.mu.in('km^3/s^2');
  const semilatusRectum = semilatusRectumOf(elements);
  const raan = elements.raan.in('rad');
  const argumentOfPeriapsis = elements.argumentOfPeriapsis.in('rad');
  const trueAnomaly = elements.trueAnomaly.in('rad');
  if (![semilatusRectum, raan, argumentOfPeriapsis, trueAnomaly].every(Number.isFinite)) {
    return invalidOrbit(body, { frame, precision });
  }

  const el = canonicalizeElements({
    eccentricity: elements.eccentricity,
    semiMajorAxis: classifyConic(elements.eccentricity) === 'parabolic' ? Infinity : elements.semimajorAxis.in('km'),
    semilatusRectum,
    inclination,
    raan,
    argumentOfPeriapsis,
    trueAnomaly,
  });

  const perifocal = perifocalState(el.semilatusRectum, el.eccentricity, el.trueAnomaly, mu);
  const state = elementsToState(el, mu);
  if (!perifocal || !state || !isFiniteState(perifocal) || !isFiniteState(state)) {
    return invalidOrbit(body, { frame, precision });
  }

  return buildOrbit(state, perifocal, el, body, frame, precision);
}

/** Values of the fields that define an orbit: r, v, e, a, i, Ω, ω, ν. */
function definingValues(orbit: OrbitFields): number[] {
  return [
    ...orbit.position.map((q) => q.value),
    ...orbit.velocity.map((q) => q.value),
    orbit.eccentricity,
    orbit.semimajorAxis.value,
    orbit.inclination.value,
    orbit.raan.value,
    orbit.argumentOfPeriapsis.value,
    orbit.trueAnomaly.value,
  ];
}

/**
 * True when the orbit is the failure sentinel, i.e. every defining field
 * (r, v, e, a, i, Ω, ω, ν) is NaN. An orbit with only some NaN fields is
 * not invalid in this sense; see {@link hasUndefinedElements}.
 */
export function isInvalid(orbit: OrbitFields): boolean {
  return definingValues(orbit).every(Number.isNaN);
}

/** Exact negation of {@link isInvalid}. */
export function isValid(orbit: OrbitFields): boolean {
  return !isInvalid(orbit);
}

/** Some, but not all, defining fields are NaN. The constructors never produce this. */
export function hasUndefinedElements(orbit: OrbitFields): boolean {
  const values = definingValues(orbit);
  return values.some(Number.isNaN) && !values.every(Number.isNaN);
}

/** Conic of an orbit's current fields; any NaN defining field makes it invalid. */
export function classifyOrbit(orbit: OrbitFields): Conic {
  return classifyConic(orbit.eccentricity, !definingValues(orbit).some(Number.isNaN));
}

type ConicHandlers<R> = { [C in Conic]: (orbit: ConicOrbit<C>) => R };

/** Exhaustive dispatch on an orbit's conic tag. */
export function matchConic<R>(orbit: Orbit, handlers: ConicHandlers<R>): R {
  switch (orbit.conic) {
    case 'circular':
      return handlers.circular(orbit);
    case 'elliptical':
      return handlers.elliptical(orbit);
    case 'parabolic':
      return handlers.parabolic(orbit);
    case 'hyperbolic':
      return handlers.hyperbolic(orbit);
    case 'invalid':
      return handlers.invalid(orbit);
  }
}

/**
 * Every field, and the body, rounded to `precision`. The conic is re-derived
 * from the rounded eccentricity; one that rounds onto 1 becomes a parabola
 * with an infinite semimajor axis.
 */
export function convertOrbit(orbit: Orbit, precision: Precision): Orbit {
  if (orbit.precision === precision) return orbit;
  const round = <D extends Dimension>(q: Quantity<D>): Quantity<D> => q.map((x) => roundTo(precision, x));
  const roundVector = <D extends Dimension>(v: QuantityVector<D>): QuantityVector<D> => [round(v[0]), round(v[1]), round(v[2])];

  const eccentricity = roundTo(precision, orbit.eccentricity);
  const parabolic = orbit.conic !== 'invalid' && classifyConic(eccentricity) === 'parabolic';
  const fields: OrbitFields = {
    position: roundVector(orbit.position),
    velocity: roundVector(orbit.velocity),
    perifocalPosition: roundVector(orbit.perifocalPosition),
    perifocalVelocity: roundVector(orbit.perifocalVelocity),
    eccentricity,
    semimajorAxis: parabolic ? new Quantity('length', Infinity, 'km') : round(orbit.semimajorAxis),
    semilatusRectum: round(orbit.semilatusRectum),
    inclination: round(orbit.inclination),
    raan: round(orbit.raan),
    argumentOfPeriapsis: round(orbit.argumentOfPeriapsis),
    trueAnomaly: round(orbit.trueAnomaly),
    body: orbit.body.withPrecision(precision),
    frame: orbit.frame,
    precision,
  };
  return tagOrbit(fields, orbit.conic === 'invalid' ? 'invalid' : classifyOrbit(fields));
}

/** Both orbits at the wider of their precisions, ready to be combined. */
export function promoteOrbits(a: Orbit, b: Orbit): [Orbit, Orbit] {
  const precision = promotePrecision(a.precision, b.precision);
  return [convertOrbit(a, precision), convertOrbit(b, precision)];
}
