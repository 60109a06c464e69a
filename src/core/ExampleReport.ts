import { computeOrbit } from '../physics/OrbitalMechanics.js';

// Fixed low Earth orbit used by the example script
export const EXAMPLE_SEMI_MAJOR_AXIS = 7000; // km
export const EXAMPLE_ECCENTRICITY = 0.01;

// Distances in km and period in minutes, two decimals each
export function formatExampleReport(semiMajorAxis: number, eccentricity: number): string[] {
  const { periapsis, apoapsis, orbital_period } = computeOrbit({ semiMajorAxis, eccentricity });
  return [
    `Periapsis distance: ${periapsis.toFixed(2)} km`,
    `Apoapsis distance: ${apoapsis.toFixed(2)} km`,
    `Orbital period: ${(orbital_period / 60).toFixed(2)} minutes`,
  ];
}
