import { CelestialBody } from './physics/celestial-body';
import { length, mass } from './units';

// Masses and mean radii of the major solar system bodies.
// Sources: IAU/astropy constants and the list of solar system objects by size.

export const Sun = CelestialBody.fromMass(mass(1.98840987e30), length(696342.0), { name: 'Sun' });

export const Mercury = CelestialBody.fromMass(mass(330.1e21), length(2439.7), { name: 'Mercury' });

export const Venus = CelestialBody.fromMass(mass(4867.5e21), length(6051.8), { name: 'Venus' });

export const Earth = CelestialBody.fromMass(mass(5.97216787e24), length(6371.0), { name: 'Earth' });

export const Moon = CelestialBody.fromMass(mass(73.42e21), length(1737.4), { name: 'Moon' });

// Alias
export const Luna = Moon;

export const Mars = CelestialBody.fromMass(mass(641.7e21), length(3389.5), { name: 'Mars' });

export const Jupiter = CelestialBody.fromMass(mass(1.8981246e27), length(69911.0), { name: 'Jupiter' });

export const Saturn = CelestialBody.fromMass(mass(568340e21), length(58232.0), { name: 'Saturn' });

export const Uranus = CelestialBody.fromMass(mass(86813e21), length(25362.0), { name: 'Uranus' });

export const Neptune = CelestialBody.fromMass(mass(102413e21), length(24622.0), { name: 'Neptune' });

export const Pluto = CelestialBody.fromMass(mass(13.03e21), length(1188.3), { name: 'Pluto' });
