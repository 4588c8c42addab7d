/**
 * Tabular readout — fixed-precision text for a per-section table plus totals.
 */

import type { SolveResult, SectionResult } from '../bet/solver.ts'
import { powerFromTorque, advanceRatio } from '../bet/solver.ts'

export type SectionColumn = keyof SectionResult

/** Column order and display precision for the section table. */
export const SECTION_COLUMNS: { key: SectionColumn, label: string, digits: number }[] = [
  { key: 'radius',   label: 'r [m]',     digits: 4 },
  { key: 'rOverR',   label: 'r/R',       digits: 3 },
  { key: 'alphaDeg', label: 'α [°]',     digits: 2 },
  { key: 'phiDeg',   label: 'φ [°]',     digits: 2 },
  { key: 'chord',    label: 'c [m]',     digits: 4 },
  { key: 'twist',    label: 'θ [°]',     digits: 2 },
  { key: 'cl',       label: 'CL',        digits: 3 },
  { key: 'cd',       label: 'CD',        digits: 4 },
  { key: 'dLift',    label: 'dL [N]',    digits: 3 },
  { key: 'dDrag',    label: 'dD [N]',    digits: 3 },
  { key: 'velocity', label: 'V [m/s]',   digits: 2 },
  { key: 'dThrust',  label: 'dT [N]',    digits: 3 },
  { key: 'dTorque',  label: 'dQ [N·m]',  digits: 4 },
]

function fmt(n: number, digits = 3): string {
  return n.toFixed(digits)
}

export function sectionHeader(): string[] {
  return SECTION_COLUMNS.map(col => col.label)
}

/** One row of cells per section, in SECTION_COLUMNS order. */
export function sectionRows(result: SolveResult): string[][] {
  return result.sections.map(s => SECTION_COLUMNS.map(col => fmt(s[col.key], col.digits)))
}

/**
 * Summary lines shown under the table.
 * The propeller diameter is needed for advance ratio; omit it to skip J.
 */
export function summaryLines(result: SolveResult, diameter?: number): string[] {
  const power = powerFromTorque(result.torque, result.rpm)
  const lines = [
    `RPM: ${fmt(result.rpm, 0)}`,
    `V∞: ${fmt(result.freeStreamVelocity, 2)} m/s`,
    `Thrust: ${fmt(result.thrust, 2)} N`,
    `Torque: ${fmt(result.torque, 3)} N·m`,
    `Power: ${fmt(power, 1)} W`,
  ]
  if (diameter !== undefined) {
    lines.push(`J: ${fmt(advanceRatio(result.freeStreamVelocity, result.rpm, diameter), 3)}`)
  }
  if (result.diagnostics.length > 0) {
    lines.push(`Lookup warnings: ${result.diagnostics.length}`)
  }
  return lines
}
