/**
 * Operating-point sweeps — repeated solver calls over RPM or airspeed.
 *
 * Each point is an independent computeThrustAndTorque() call on the
 * same (frozen) propeller.
 */

import type { Propeller } from './blade-geometry.ts'
import { computeThrustAndTorque, powerFromTorque, advanceRatio } from './solver.ts'
import type { SolveOptions } from './solver.ts'

// ─── Types ───────────────────────────────────────────────────────────────────

export interface SweepPoint {
  rpm: number
  freeStreamVelocity: number
  thrust: number        // [N]
  torque: number        // [N·m]
  power: number         // [W]
  advanceRatio: number  // J
}

export interface SweepRange {
  min: number
  max: number
  step: number
  solve?: Partial<SolveOptions>
}

// ─── Sweeps ──────────────────────────────────────────────────────────────────

function rangeValues({ min, max, step }: SweepRange): number[] {
  if (!(step > 0)) throw new RangeError(`sweep step must be positive, got ${step}`)
  if (!(min <= max)) throw new RangeError(`sweep min (${min}) must not exceed max (${max})`)
  const values: number[] = []
  // min + i·step, not a running sum
  const count = Math.floor((max - min) / step + 1e-9)
  for (let i = 0; i <= count; i++) {
    values.push(min + i * step)
  }
  return values
}

function solvePoint(propeller: Propeller, rpm: number, v: number, solve?: Partial<SolveOptions>): SweepPoint {
  const result = computeThrustAndTorque(propeller, rpm, v, solve)
  return {
    rpm,
    freeStreamVelocity: v,
    thrust: result.thrust,
    torque: result.torque,
    power: powerFromTorque(result.torque, rpm),
    advanceRatio: advanceRatio(v, rpm, propeller.diameter),
  }
}

/** Sweep RPM from min to max (inclusive) at a fixed free-stream velocity. */
export function sweepRpm(propeller: Propeller, freeStreamVelocity: number, range: SweepRange): SweepPoint[] {
  return rangeValues(range).map(rpm => solvePoint(propeller, rpm, freeStreamVelocity, range.solve))
}

/** Sweep free-stream velocity from min to max (inclusive) at a fixed RPM. */
export function sweepVelocity(propeller: Propeller, rpm: number, range: SweepRange): SweepPoint[] {
  return rangeValues(range).map(v => solvePoint(propeller, rpm, v, range.solve))
}
