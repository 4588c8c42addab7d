/**
 * Sample tabulated airfoils and curve helpers.
 *
 * Tables live in data/airfoils.json (α in degrees).
 */

import type { CoefficientCurve } from './interpolate.ts'
import { freezeCurve } from './interpolate.ts'
import airfoilData from './data/airfoils.json'

export interface AirfoilTable {
  description: string
  lift: CoefficientCurve
  drag: CoefficientCurve
}

const AIRFOILS: Record<string, AirfoilTable> = airfoilData

export function listAirfoils(): string[] {
  return Object.keys(AIRFOILS)
}

/** Lift/drag curves for a named sample airfoil, ready for createPropeller(). */
export function getAirfoil(name: string): { liftCurve: CoefficientCurve, dragCurve: CoefficientCurve } {
  const table = AIRFOILS[name]
  if (!table) {
    throw new RangeError(`unknown airfoil "${name}" (available: ${listAirfoils().join(', ')})`)
  }
  return { liftCurve: freezeCurve(table.lift), dragCurve: freezeCurve(table.drag) }
}

/** Constant coefficient over [min, max] as a two-point table. */
export function flatCurve(value: number, min: number, max: number): CoefficientCurve {
  return { alpha: [min, max], value: [value, value] }
}
