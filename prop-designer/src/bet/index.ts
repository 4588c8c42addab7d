/**
 * BET module — public API.
 *
 * This is the barrel export for the propeller analysis library.
 * Everything in this directory is UI-independent.
 */

export type { BladeSection, Propeller, PropellerParams, PropellerSpec } from './blade-geometry.ts'
export { createPropeller, assemblePropeller, linspace, tipRadius } from './blade-geometry.ts'
export type { CoefficientCurve, CoefficientLookup, LookupStatus } from './interpolate.ts'
export { interpolateClamped, curveDomain, lookupCoefficient } from './interpolate.ts'
export type { SectionResult, SolveResult, SolveOptions, CoefficientLookupDegraded } from './solver.ts'
export { computeThrustAndTorque, powerFromTorque, advanceRatio, warnDiagnostic, DEFAULT_SOLVE_OPTIONS } from './solver.ts'
export type { SweepPoint, SweepRange } from './sweep.ts'
export { sweepRpm, sweepVelocity } from './sweep.ts'
export type { AirfoilTable } from './airfoils.ts'
export { getAirfoil, listAirfoils, flatCurve } from './airfoils.ts'
export { InvalidGeometryError, InvalidOperatingPointError, MalformedCurveError } from './errors.ts'
export { DEG2RAD, RAD2DEG, SEA_LEVEL_AIR_DENSITY, RPM_TO_RAD_PER_SEC } from './constants.ts'
