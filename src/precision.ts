import type { Precision } from './types';

const BITS: Record<Precision, number> = {
  float32: 32,
  float64: 64,
};

/** Round a value to what the given precision can represent. */
export function roundTo(precision: Precision, value: number): number {
  return precision === 'float32' ? Math.fround(value) : value;
}

/** The wider of two precisions; mixed operations happen at this width. */
export function promotePrecision(a: Precision, b: Precision): Precision {
  return BITS[a] >= BITS[b] ? a : b;
}
