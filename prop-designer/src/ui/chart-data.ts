/**
 * Chart data generation — Chart.js datasets for spanwise loading
 * and operating-point sweeps.
 *
 * Produces plain ChartData objects; no canvas or DOM is touched here.
 */

import type { ChartData } from 'chart.js'
import type { SolveResult, SectionResult } from '../bet/solver.ts'
import type { SweepPoint } from '../bet/sweep.ts'

// ─── Colors ──────────────────────────────────────────────────────────────────

/**
 * Map t ∈ [0, 1] to a blue → red hue ramp.
 */
export function rampColor(t: number): string {
  const clamped = Math.max(0, Math.min(1, t))
  const hue = 240 * (1 - clamped)
  return `hsl(${hue}, 90%, 55%)`
}

// ─── Spanwise loading ────────────────────────────────────────────────────────

export type SpanwiseField = Exclude<keyof SectionResult, 'radius' | 'rOverR'>

const FIELD_LABELS: Record<SpanwiseField, string> = {
  alphaDeg: 'α [deg]',
  phiDeg: 'φ [deg]',
  chord: 'Chord [m]',
  twist: 'Twist [deg]',
  cl: 'CL',
  cd: 'CD',
  dLift: 'dL [N]',
  dDrag: 'dD [N]',
  velocity: 'Resultant velocity [m/s]',
  dThrust: 'dT [N]',
  dTorque: 'dQ [N·m]',
}

/** One section field plotted against r/R. */
export function sectionChartData(result: SolveResult, field: SpanwiseField): ChartData<'scatter'> {
  const n = result.sections.length
  return {
    datasets: [{
      label: FIELD_LABELS[field],
      data: result.sections.map(s => ({ x: s.rOverR, y: s[field] })),
      showLine: true,
      borderColor: rampColor(0),
      pointBackgroundColor: result.sections.map((_, i) => rampColor(n > 1 ? i / (n - 1) : 0)),
    }],
  }
}

// ─── Sweeps ──────────────────────────────────────────────────────────────────

export type SweepAxis = keyof SweepPoint

const AXIS_LABELS: Record<SweepAxis, string> = {
  rpm: 'RPM',
  freeStreamVelocity: 'V∞ [m/s]',
  thrust: 'Thrust [N]',
  torque: 'Torque [N·m]',
  power: 'Power [W]',
  advanceRatio: 'J',
}

export function axisLabel(axis: SweepAxis): string {
  return AXIS_LABELS[axis]
}

/** y vs x over a sweep, e.g. thrust vs rpm. */
export function sweepChartData(points: SweepPoint[], x: SweepAxis, y: SweepAxis): ChartData<'scatter'> {
  return {
    datasets: [{
      label: `${AXIS_LABELS[y]} vs ${AXIS_LABELS[x]}`,
      data: points.map(p => ({ x: p[x], y: p[y] })),
      showLine: true,
      borderColor: rampColor(1),
    }],
  }
}
