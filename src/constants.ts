// Newtonian gravitational constant, CODATA 2018 (m^3 kg^-1 s^-2)
export const G = 6.6743e-11;

// Astronomical unit (meters)
export const ASTRONOMICAL_UNIT = 1.495978707e11;

// Eccentricities at or below this are treated as exactly circular
export const CIRCULAR_ECCENTRICITY_TOLERANCE = 1e-9;

// |e - 1| at or below this is treated as exactly parabolic
export const PARABOLIC_ECCENTRICITY_TOLERANCE = 1e-9;

// sin(i) at or below this marks an equatorial orbit (RAAN undefined)
export const EQUATORIAL_TOLERANCE = 1e-10;

// Mean obliquity of the ecliptic at J2000 (radians), 84381.448 arcsec
export const J2000_OBLIQUITY = (84381.448 / 3600) * (Math.PI / 180);

// Frame orbits are expressed in unless the caller says otherwise
export const DEFAULT_FRAME = 'ICRF';
