import { G } from '../constants';
import { promotePrecision, roundTo } from '../precision';
import type { Precision } from '../types';
import { Quantity } from '../units';

export interface CelestialBodyOptions {
  name?: string;
  precision?: Precision;
}

/**
 * A gravitating body: mean radius plus standard gravitational parameter.
 *
 * Instances are frozen. Inputs are taken to be physically valid; a zero or
 * negative mass or radius is stored as given.
 */
export class CelestialBody {
  readonly name: string;
  readonly radius: Quantity<'length'>;
  readonly mu: Quantity<'massParameter'>;
  readonly precision: Precision;

  private constructor(
    name: string,
    radius: Quantity<'length'>,
    mu: Quantity<'massParameter'>,
    precision: Precision,
  ) {
    this.name = name;
    this.radius = radius.map((v) => roundTo(precision, v));
    this.mu = mu.map((v) => roundTo(precision, v));
    this.precision = precision;
    Object.freeze(this);
  }

  /** Body from its mass; mu = G * mass. */
  static fromMass(
    mass: Quantity<'mass'>,
    radius: Quantity<'length'>,
    { name = 'Body', precision = 'float64' }: CelestialBodyOptions = {},
  ): CelestialBody {
    const mu = new Quantity('massParameter', G * mass.in('kg'), 'm^3/s^2');
    return new CelestialBody(name, radius, mu, precision);
  }

  /** Body from its gravitational parameter, stored without derivation. */
  static fromMu(
    radius: Quantity<'length'>,
    mu: Quantity<'massParameter'>,
    { name = 'Body', precision = 'float64' }: CelestialBodyOptions = {},
  ): CelestialBody {
    return new CelestialBody(name, radius, mu, precision);
  }

  get mass(): Quantity<'mass'> {
    return new Quantity('mass', this.mu.in('m^3/s^2') / G, 'kg');
  }

  /** Same body re-expressed at another precision. */
  withPrecision(precision: Precision): CelestialBody {
    if (precision === this.precision) return this;
    return new CelestialBody(this.name, this.radius, this.mu, precision);
  }
}

/** Both bodies at the wider of their two precisions. */
export function promoteBodies(a: CelestialBody, b: CelestialBody): [CelestialBody, CelestialBody] {
  const precision = promotePrecision(a.precision, b.precision);
  return [a.withPrecision(precision), b.withPrecision(precision)];
}
