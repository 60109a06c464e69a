// Central body constants for two-body orbit math (km, s)
export interface CentralBody {
  name: string;
  mu: number; // Gravitational parameter (km³/s²)
}

// Standard gravitational parameter for Earth
export const EARTH_MU = 398600.4418;

export const EARTH: Readonly<CentralBody> = Object.freeze({
  name: 'Earth',
  mu: EARTH_MU,
});
