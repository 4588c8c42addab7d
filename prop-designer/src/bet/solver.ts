/**
 * Blade Element Theory solver — thrust and torque of a propeller.
 *
 * Direct, single-pass blade-element summation:
 *   - each section sees the velocity triangle (ω·r tangential, V axial)
 *   - α = twist − φ, with φ = atan2(V, ω·r)
 *   - CL, CD from the section's tabulated curves (clamped lookup)
 *   - dL, dD resolved into thrust (axial) and torque (tangential · r)
 *
 * No induced inflow, tip loss or compressibility. Sections are independent.
 *
 * This module is UI-independent. Pure: same inputs → same result.
 */

import type { Propeller } from './blade-geometry.ts'
import { tipRadius } from './blade-geometry.ts'
import { lookupCoefficient } from './interpolate.ts'
import type { LookupStatus } from './interpolate.ts'
import { InvalidOperatingPointError } from './errors.ts'
import { DEG2RAD, RAD2DEG, RPM_TO_RAD_PER_SEC, SEA_LEVEL_AIR_DENSITY } from './constants.ts'

// ─── Types ───────────────────────────────────────────────────────────────────

/** Per-section breakdown. Forces are per blade. */
export interface SectionResult {
  radius: number     // [m]
  rOverR: number     // r / tip radius
  alphaDeg: number   // angle of attack [deg]
  phiDeg: number     // inflow angle [deg]
  chord: number      // [m]
  twist: number      // [deg]
  cl: number
  cd: number
  dLift: number      // [N]
  dDrag: number      // [N]
  velocity: number   // resultant local velocity [m/s]
  dThrust: number    // [N]
  dTorque: number    // [N·m]
}

/**
 * Non-fatal lookup problem at one section. The section still contributes,
 * using the clamped boundary value (out of range) or 0 (malformed table).
 */
export interface CoefficientLookupDegraded {
  kind: 'CoefficientLookupDegraded'
  sectionIndex: number
  coefficient: 'cl' | 'cd'
  alphaDeg: number
  status: Exclude<LookupStatus, 'ok'>
  substituted: number
  message: string
}

export interface SolveResult {
  thrust: number     // [N] all blades
  torque: number     // [N·m] all blades
  sections: SectionResult[]
  rpm: number
  freeStreamVelocity: number
  rho: number
  diagnostics: CoefficientLookupDegraded[]
}

export interface SolveOptions {
  rho: number   // air density [kg/m³]
  onDiagnostic: (d: CoefficientLookupDegraded) => void
}

// ─── Defaults ────────────────────────────────────────────────────────────────

export function warnDiagnostic(d: CoefficientLookupDegraded): void {
  console.warn(d.message)
}

export const DEFAULT_SOLVE_OPTIONS: SolveOptions = {
  rho: SEA_LEVEL_AIR_DENSITY,
  onDiagnostic: warnDiagnostic,
}

// explicit `undefined` entries fall back to the defaults
function resolveOptions(options: Partial<SolveOptions>): SolveOptions {
  return {
    rho: options.rho ?? DEFAULT_SOLVE_OPTIONS.rho,
    onDiagnostic: options.onDiagnostic ?? DEFAULT_SOLVE_OPTIONS.onDiagnostic,
  }
}

// ─── Operating point ─────────────────────────────────────────────────────────

function checkOperatingPoint(rpm: number, freeStreamVelocity: number, rho: number): void {
  if (!Number.isFinite(rpm)) {
    throw new InvalidOperatingPointError('rpm', rpm, `rpm must be finite, got ${rpm}`)
  }
  if (rpm < 0) {
    throw new InvalidOperatingPointError('rpm', rpm, `negative rpm (${rpm}) is not supported`)
  }
  // Negative V (reverse flow) is accepted as-is.
  if (!Number.isFinite(freeStreamVelocity)) {
    throw new InvalidOperatingPointError('freeStreamVelocity', freeStreamVelocity,
      `freeStreamVelocity must be finite, got ${freeStreamVelocity}`)
  }
  if (!Number.isFinite(rho) || rho <= 0) {
    throw new InvalidOperatingPointError('rho', rho, `air density must be positive, got ${rho}`)
  }
}

function describeLookup(
  coefficient: 'cl' | 'cd', sectionIndex: number, alphaDeg: number,
  status: Exclude<LookupStatus, 'ok'>, substituted: number, reason?: string,
): string {
  const where = `section ${sectionIndex}: α ${alphaDeg.toFixed(1)}°`
  if (status === 'malformed') {
    return `${where}: ${coefficient} table malformed (${reason ?? 'unknown'}), using 0`
  }
  return `${where} out of range for ${coefficient} table, clamped to ${substituted}`
}

// ─── Solver ──────────────────────────────────────────────────────────────────

/**
 * Thrust and torque of `propeller` at `rpm` in an axial free stream.
 *
 * Section width is one uniform span, (D/2) / sectionCount, regardless of
 * the actual station spacing.
 */
export function computeThrustAndTorque(
  propeller: Propeller,
  rpm: number,
  freeStreamVelocity: number,
  options: Partial<SolveOptions> = {},
): SolveResult {
  const opts = resolveOptions(options)
  checkOperatingPoint(rpm, freeStreamVelocity, opts.rho)

  const R = tipRadius(propeller)
  const sectionWidth = R / propeller.sections.length
  const omega = rpm * RPM_TO_RAD_PER_SEC
  const V = freeStreamVelocity

  const sections: SectionResult[] = []
  const diagnostics: CoefficientLookupDegraded[] = []
  let thrustPerBlade = 0
  let torquePerBlade = 0

  propeller.sections.forEach((blade, i) => {
    // Velocity triangle
    const vTangential = omega * blade.radius
    const velocity = Math.sqrt(vTangential * vTangential + V * V)
    const phi = Math.atan2(V, vTangential)

    const alpha = blade.twist * DEG2RAD - phi
    const alphaDeg = alpha * RAD2DEG

    const lookups = {
      cl: lookupCoefficient(alphaDeg, blade.liftCurve),
      cd: lookupCoefficient(alphaDeg, blade.dragCurve),
    }
    for (const coefficient of ['cl', 'cd'] as const) {
      const { status, value, reason } = lookups[coefficient]
      if (status === 'ok') continue
      const d: CoefficientLookupDegraded = {
        kind: 'CoefficientLookupDegraded',
        sectionIndex: i,
        coefficient,
        alphaDeg,
        status,
        substituted: value,
        message: describeLookup(coefficient, i, alphaDeg, status, value, reason),
      }
      diagnostics.push(d)
      opts.onDiagnostic(d)
    }
    const cl = lookups.cl.value
    const cd = lookups.cd.value

    // Sectional forces
    const q = 0.5 * opts.rho * velocity * velocity
    const dLift = cl * q * blade.chord * sectionWidth
    const dDrag = cd * q * blade.chord * sectionWidth

    // Resolve into axial (thrust) and tangential (torque) components
    const cosPhi = Math.cos(phi)
    const sinPhi = Math.sin(phi)
    const dThrust = dLift * cosPhi - dDrag * sinPhi
    const dTorque = (dLift * sinPhi + dDrag * cosPhi) * blade.radius

    thrustPerBlade += dThrust
    torquePerBlade += dTorque

    sections.push({
      radius: blade.radius,
      rOverR: blade.radius / R,
      alphaDeg,
      phiDeg: phi * RAD2DEG,
      chord: blade.chord,
      twist: blade.twist,
      cl,
      cd,
      dLift,
      dDrag,
      velocity,
      dThrust,
      dTorque,
    })
  })

  return {
    thrust: thrustPerBlade * propeller.numBlades,
    torque: torquePerBlade * propeller.numBlades,
    sections,
    rpm,
    freeStreamVelocity,
    rho: opts.rho,
    diagnostics,
  }
}

// ─── Derived quantities ──────────────────────────────────────────────────────

/** Shaft power [W] = Q·ω */
export function powerFromTorque(torque: number, rpm: number): number {
  return torque * rpm * RPM_TO_RAD_PER_SEC
}

/** Advance ratio J = V / (n·D), n in rev/s. 0 when the propeller is stopped. */
export function advanceRatio(freeStreamVelocity: number, rpm: number, diameter: number): number {
  const n = rpm / 60
  if (n * diameter === 0) return 0
  return freeStreamVelocity / (n * diameter)
}
