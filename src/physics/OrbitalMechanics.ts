import type { OrbitInput, OrbitResult } from '../core/types.js';
import { EARTH } from './CentralBody.js';

// Closed-form two-body helpers. Distances in km, times in s, mu in km³/s².

export class OrbitDomainError extends Error {
  constructor(
    public readonly parameter: 'semiMajorAxis' | 'mu',
    message: string
  ) {
    super(message);
    this.name = 'OrbitDomainError';
  }
}

// A finite input whose result overflows, or underflows to zero, in double precision
export class OrbitRangeError extends Error {
  constructor(
    public readonly field: keyof OrbitResult,
    message: string
  ) {
    super(message);
    this.name = 'OrbitRangeError';
  }
}

/**
 * Orbital period from Kepler's third law, T = 2π·sqrt(a³/μ)
 * @param semiMajorAxis Semi-major axis (km)
 * @param mu Gravitational parameter of the central body (km³/s²), Earth's by default
 * @returns Orbital period (s)
 * @throws OrbitDomainError when either argument is not a finite positive number
 * @throws OrbitRangeError when the period is not representable
 */
export function orbitalPeriod(semiMajorAxis: number, mu: number = EARTH.mu): number {
  if (!Number.isFinite(semiMajorAxis) || semiMajorAxis <= 0) {
    throw new OrbitDomainError('semiMajorAxis', `Semi-major axis must be positive, got ${semiMajorAxis}`);
  }
  if (!Number.isFinite(mu) || mu <= 0) {
    throw new OrbitDomainError('mu', `Gravitational parameter must be positive, got ${mu}`);
  }
  // a·sqrt(a/μ): a³ alone overflows above a ≈ 6e102
  const period = 2 * Math.PI * semiMajorAxis * Math.sqrt(semiMajorAxis / mu);
  if (!Number.isFinite(period) || period === 0) {
    throw new OrbitRangeError('orbital_period', `Orbital period out of range for semi-major axis ${semiMajorAxis}`);
  }
  return period;
}

// r_p = a(1 − e)
export function periapsisDistance(semiMajorAxis: number, eccentricity: number): number {
  return semiMajorAxis * (1 - eccentricity);
}

// r_a = a(1 + e)
export function apoapsisDistance(semiMajorAxis: number, eccentricity: number): number {
  return semiMajorAxis * (1 + eccentricity);
}

export function isClosedOrbit(eccentricity: number): boolean {
  return eccentricity >= 0 && eccentricity < 1;
}

function finiteDistance(field: 'periapsis' | 'apoapsis', value: number): number {
  if (!Number.isFinite(value)) throw new OrbitRangeError(field, `${field} distance out of range`);
  return value;
}

/**
 * Periapsis, apoapsis and period for one orbit.
 * Shared by the HTTP handler and the example script.
 * @throws OrbitRangeError when any value is not a finite number
 */
export function computeOrbit(input: OrbitInput, mu: number = EARTH.mu): OrbitResult {
  const { semiMajorAxis, eccentricity } = input;
  const orbital_period = orbitalPeriod(semiMajorAxis, mu);
  return {
    periapsis: finiteDistance('periapsis', periapsisDistance(semiMajorAxis, eccentricity)),
    apoapsis: finiteDistance('apoapsis', apoapsisDistance(semiMajorAxis, eccentricity)),
    orbital_period,
  };
}
