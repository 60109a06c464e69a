// Core type definitions

export interface OrbitInput {
  semiMajorAxis: number; // km
  eccentricity: number;  // 0 <= e < 1 for a closed ellipse
}

// Field names match the JSON the /calculate endpoint returns
export interface OrbitResult {
  readonly periapsis: number;      // km
  readonly apoapsis: number;       // km
  readonly orbital_period: number; // s
}

export interface ErrorBody {
  error: string;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';
