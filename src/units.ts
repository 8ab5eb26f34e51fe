import { ASTRONOMICAL_UNIT } from './constants';
import { OrbitConstructionError, UnitError } from './errors';
import type { Vec3 } from './types';

// Scale of each unit relative to the SI unit of its dimension
const UNITS = {
  length: { m: 1, km: 1e3, AU: ASTRONOMICAL_UNIT },
  velocity: { 'm/s': 1, 'km/s': 1e3 },
  mass: { kg: 1, g: 1e-3 },
  angle: { rad: 1, deg: Math.PI / 180 },
  massParameter: { 'm^3/s^2': 1, 'km^3/s^2': 1e9 },
  time: { s: 1, min: 60, h: 3600, d: 86400 },
} as const;

export type Dimension = keyof typeof UNITS;

export type Unit<D extends Dimension> = D extends Dimension ? keyof (typeof UNITS)[D] & string : never;

function scaleOf(dimension: Dimension, unit: string): number {
  const table: Partial<Record<string, number>> = UNITS[dimension];
  const scale = table[unit];
  if (scale === undefined) {
    throw new UnitError(`Unknown ${dimension} unit "${unit}"`);
  }
  return scale;
}

/**
 * A number tagged with its physical dimension and unit.
 *
 * Quantities of different dimensions have incompatible types, and combining
 * them through an untyped path still throws a {@link UnitError}.
 */
export class Quantity<D extends Dimension> {
  readonly dimension: D;
  readonly value: number;
  readonly unit: Unit<D>;

  constructor(dimension: D, value: number, unit: Unit<D>) {
    scaleOf(dimension, unit);
    this.dimension = dimension;
    this.value = value;
    this.unit = unit;
    Object.freeze(this);
  }

  /** Numeric value expressed in `unit`. */
  in(unit: Unit<D>): number {
    if (unit === this.unit) return this.value;
    return (this.value * scaleOf(this.dimension, this.unit)) / scaleOf(this.dimension, unit);
  }

  to(unit: Unit<D>): Quantity<D> {
    return new Quantity(this.dimension, this.in(unit), unit);
  }

  plus(other: Quantity<D>): Quantity<D> {
    this.assertSameDimension(other);
    return new Quantity(this.dimension, this.value + other.in(this.unit), this.unit);
  }

  minus(other: Quantity<D>): Quantity<D> {
    this.assertSameDimension(other);
    return new Quantity(this.dimension, this.value - other.in(this.unit), this.unit);
  }

  times(factor: number): Quantity<D> {
    return new Quantity(this.dimension, this.value * factor, this.unit);
  }

  /** Apply `fn` to the raw value, keeping dimension and unit. */
  map(fn: (value: number) => number): Quantity<D> {
    return new Quantity(this.dimension, fn(this.value), this.unit);
  }

  toString(): string {
    return `${this.value} ${this.unit}`;
  }

  private assertSameDimension(other: { readonly dimension: Dimension }): void {
    if (other.dimension !== this.dimension) {
      throw new UnitError(`Cannot combine ${this.dimension} with ${other.dimension}`);
    }
  }
}

export type QuantityVector<D extends Dimension> = readonly [Quantity<D>, Quantity<D>, Quantity<D>];

export const length = (value: number, unit: Unit<'length'> = 'km') => new Quantity('length', value, unit);
export const velocity = (value: number, unit: Unit<'velocity'> = 'km/s') => new Quantity('velocity', value, unit);
export const mass = (value: number, unit: Unit<'mass'> = 'kg') => new Quantity('mass', value, unit);
export const angle = (value: number, unit: Unit<'angle'> = 'rad') => new Quantity('angle', value, unit);
export const massParameter = (value: number, unit: Unit<'massParameter'> = 'km^3/s^2') =>
  new Quantity('massParameter', value, unit);
export const duration = (value: number, unit: Unit<'time'> = 's') => new Quantity('time', value, unit);

/** Build a 3-vector of quantities sharing one unit. */
export function vector<D extends Dimension>(
  dimension: D,
  values: readonly number[],
  unit: Unit<D>,
): QuantityVector<D> {
  if (values.length !== 3) {
    throw new OrbitConstructionError(`Expected a 3-component vector, got ${values.length} components`);
  }
  return [
    new Quantity(dimension, values[0], unit),
    new Quantity(dimension, values[1], unit),
    new Quantity(dimension, values[2], unit),
  ];
}

/** Strip a quantity vector to raw numbers in `unit`, checking size and dimension. */
export function vectorIn<D extends Dimension>(
  dimension: D,
  v: readonly Quantity<D>[],
  unit: Unit<D>,
): Vec3 {
  if (v.length !== 3) {
    throw new OrbitConstructionError(`Expected a 3-component vector, got ${v.length} components`);
  }
  for (const component of v) {
    if (component.dimension !== dimension) {
      throw new UnitError(`Expected a ${dimension} vector, got a ${component.dimension} component`);
    }
  }
  return [v[0].in(unit), v[1].in(unit), v[2].in(unit)];
}
