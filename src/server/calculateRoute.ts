import { Router, type RequestHandler } from 'express';
import { parseFloatParam } from '../core/QueryParser.js';
import type { OrbitResult } from '../core/types.js';
import { computeOrbit, isClosedOrbit, OrbitDomainError, OrbitRangeError } from '../physics/OrbitalMechanics.js';
import { BadRequestError, MethodNotAllowedError } from './errors.js';

export const INVALID_PARAMETERS_MESSAGE = 'Invalid or missing parameters';
export const NON_POSITIVE_AXIS_MESSAGE = 'Semi-major axis must be positive';
export const ECCENTRICITY_RANGE_MESSAGE = 'Eccentricity must be in [0, 1)';
export const RESULT_RANGE_MESSAGE = 'Parameters produce a result outside the representable range';

export interface CalculateRouteOptions {
  // Off by default: eccentricity is otherwise accepted as any finite number
  strictValidation?: boolean;
}

/**
 * GET /calculate?semi_major_axis=<km>&eccentricity=<e>
 * Responds with periapsis (km), apoapsis (km) and orbital_period (s) around Earth.
 */
export function calculateHandler(options: CalculateRouteOptions = {}): RequestHandler {
  const { strictValidation = false } = options;

  return (req, res) => {
    const semiMajorAxis = parseFloatParam(req.query.semi_major_axis);
    const eccentricity = parseFloatParam(req.query.eccentricity);
    if (semiMajorAxis === null || eccentricity === null) {
      throw new BadRequestError(INVALID_PARAMETERS_MESSAGE);
    }
    if (strictValidation && !isClosedOrbit(eccentricity)) {
      throw new BadRequestError(ECCENTRICITY_RANGE_MESSAGE);
    }

    let result: OrbitResult;
    try {
      result = computeOrbit({ semiMajorAxis, eccentricity });
    } catch (err) {
      if (err instanceof OrbitDomainError) throw new BadRequestError(NON_POSITIVE_AXIS_MESSAGE);
      if (err instanceof OrbitRangeError) throw new BadRequestError(RESULT_RANGE_MESSAGE);
      throw err;
    }
    res.status(200).json(result);
  };
}

export function calculateRouter(options: CalculateRouteOptions = {}): Router {
  const router = Router();
  router
    .route('/calculate')
    .get(calculateHandler(options))
    .all(() => {
      throw new MethodNotAllowedError(['GET', 'HEAD']);
    });
  return router;
}
