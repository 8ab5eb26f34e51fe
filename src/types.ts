export type Vec3 = [number, number, number];

export interface StateVector {
  position: Vec3; // km
  velocity: Vec3; // km/s
}

export interface OrbitalElements {
  eccentricity: number;
  semiMajorAxis: number;       // km, negative for hyperbolas, Infinity for parabolas
  semilatusRectum: number;     // km
  inclination: number;         // radians
  raan: number;                // right ascension of ascending node (radians)
  argumentOfPeriapsis: number; // radians
  trueAnomaly: number;         // radians
}

export type Precision = 'float32' | 'float64';

export type FrameName = string;
