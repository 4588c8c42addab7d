/**
 * Table interpolation for tabulated airfoil coefficients.
 *
 * Lookups clamp to the table boundaries; there is no extrapolation
 * past the first or last α sample.
 *
 * This module is UI-independent.
 */

import { MalformedCurveError } from './errors.ts'

// ─── Types ───────────────────────────────────────────────────────────────────

/** Tabulated coefficient vs angle of attack. α in degrees, non-decreasing. */
export interface CoefficientCurve {
  readonly alpha: readonly number[]
  readonly value: readonly number[]
}

export type LookupStatus = 'ok' | 'clamped-low' | 'clamped-high' | 'malformed'

export interface CoefficientLookup {
  value: number
  status: LookupStatus
  reason?: string   // set when status is 'malformed'
}

/** Frozen copy of a curve, detached from the caller's arrays. */
export function freezeCurve(curve: CoefficientCurve): CoefficientCurve {
  return Object.freeze({
    alpha: Object.freeze([...curve.alpha]),
    value: Object.freeze([...curve.value]),
  })
}

// ─── Validation ──────────────────────────────────────────────────────────────

function checkTable(xs: readonly number[], ys: readonly number[]): void {
  if (xs.length === 0) {
    throw new MalformedCurveError('empty coefficient table')
  }
  if (xs.length !== ys.length) {
    throw new MalformedCurveError(`table length mismatch: ${xs.length} α samples, ${ys.length} values`)
  }
  for (let i = 0; i < xs.length; i++) {
    if (!Number.isFinite(xs[i]) || !Number.isFinite(ys[i])) {
      throw new MalformedCurveError(`non-finite sample at index ${i}`)
    }
    // repeated α is allowed (step in the curve, e.g. a stall break)
    if (i > 0 && xs[i] < xs[i - 1]) {
      throw new MalformedCurveError(`α samples decreasing at index ${i}`)
    }
  }
}

// ─── Interpolation ───────────────────────────────────────────────────────────

/**
 * Piecewise-linear interpolation of ys(xs) at x, clamped to the end values.
 * Throws MalformedCurveError if the table cannot be interpolated.
 */
export function interpolateClamped(x: number, xs: readonly number[], ys: readonly number[]): number {
  checkTable(xs, ys)
  if (Number.isNaN(x)) {
    throw new MalformedCurveError('cannot interpolate at NaN')
  }

  const last = xs.length - 1
  if (x <= xs[0]) return ys[0]
  if (x >= xs[last]) return ys[last]

  // first sample strictly above x (exists since x < xs[last])
  let hi = 1
  while (xs[hi] <= x) hi++
  const lo = hi - 1
  const t = (x - xs[lo]) / (xs[hi] - xs[lo])
  return ys[lo] * (1 - t) + ys[hi] * t
}

/** Tabulated α range of a curve [deg]. */
export function curveDomain(curve: CoefficientCurve): { min: number, max: number } {
  checkTable(curve.alpha, curve.value)
  return { min: curve.alpha[0], max: curve.alpha[curve.alpha.length - 1] }
}

/**
 * Non-throwing coefficient lookup used by the solver.
 * Malformed tables yield 0; out-of-range α yields the boundary value.
 */
export function lookupCoefficient(alpha_deg: number, curve: CoefficientCurve): CoefficientLookup {
  try {
    const value = interpolateClamped(alpha_deg, curve.alpha, curve.value)
    const { min, max } = curveDomain(curve)
    const status: LookupStatus = alpha_deg < min ? 'clamped-low' : alpha_deg > max ? 'clamped-high' : 'ok'
    return { value, status }
  } catch (err) {
    if (err instanceof MalformedCurveError) {
      return { value: 0, status: 'malformed', reason: err.message }
    }
    throw err
  }
}
