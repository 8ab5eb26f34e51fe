import type { Orbit } from '../physics/orbit';
import type { Vec3 } from '../types';
import { vectorIn } from '../units';

/** Read-only view of an orbit in display units (km, km/s, degrees). */
export interface OrbitSummary {
  readonly body: string;
  readonly frame: string;
  readonly conic: Orbit['conic'];
  readonly precision: Orbit['precision'];
  readonly mu: number;                 // km^3/s^2
  readonly position: Vec3;             // km
  readonly velocity: Vec3;             // km/s
  readonly perifocalPosition: Vec3;    // km
  readonly perifocalVelocity: Vec3;    // km/s
  readonly radius: number;             // km
  readonly speed: number;              // km/s
  readonly altitude: number;           // km above the body's mean radius
  readonly eccentricity: number;
  readonly semimajorAxis: number;      // km
  readonly periapsis: number;          // km (radius)
  readonly apoapsis: number;           // km (radius), Infinity for open orbits
  readonly inclination: number;        // degrees
  readonly raan: number;               // degrees
  readonly argumentOfPeriapsis: number; // degrees
  readonly trueAnomaly: number;        // degrees
}

export function summarizeOrbit(orbit: Orbit): OrbitSummary {
  const position = vectorIn('length', orbit.position, 'km');
  const velocity = vectorIn('velocity', orbit.velocity, 'km/s');
  const radius = Math.hypot(...position);

  const e = orbit.eccentricity;
  const p = orbit.semilatusRectum.in('km');

  return {
    body: orbit.body.name,
    frame: orbit.frame,
    conic: orbit.conic,
    precision: orbit.precision,
    mu: orbit.body.mu.in('km^3/s^2'),
    position,
    velocity,
    perifocalPosition: vectorIn('length', orbit.perifocalPosition, 'km'),
    perifocalVelocity: vectorIn('velocity', orbit.perifocalVelocity, 'km/s'),
    radius,
    speed: Math.hypot(...velocity),
    altitude: radius - orbit.body.radius.in('km'),
    eccentricity: e,
    semimajorAxis: orbit.semimajorAxis.in('km'),
    periapsis: p / (1 + e),
    apoapsis: e < 1 ? p / (1 - e) : Infinity,
    inclination: orbit.inclination.in('deg'),
    raan: orbit.raan.in('deg'),
    argumentOfPeriapsis: orbit.argumentOfPeriapsis.in('deg'),
    trueAnomaly: orbit.trueAnomaly.in('deg'),
  };
}
