/** Base class for every error this library throws. */
export class AstrodynamicsError extends Error {
  override name = 'AstrodynamicsError';

  constructor(message: string) {
    super(message);
  }
}

/** Unknown unit, or quantities of different dimensions combined. */
export class UnitError extends AstrodynamicsError {
  override name = 'UnitError';
}

/** Malformed input to an orbit or body constructor (wrong vector size, out-of-range element). */
export class OrbitConstructionError extends AstrodynamicsError {
  override name = 'OrbitConstructionError';
}

/** An orbit was handed to a transform that starts from a different frame. */
export class FrameMismatchError extends AstrodynamicsError {
  override name = 'FrameMismatchError';

  constructor(
    readonly expected: string,
    readonly actual: string,
  ) {
    super(`Transform expects an orbit in ${expected}, got ${actual}`);
  }
}
