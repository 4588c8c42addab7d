/**
 * Propeller geometry — blade sections and whole-propeller description.
 *
 * Geometry is validated once at construction and frozen. The solver
 * only ever reads it, so one Propeller can serve any number of
 * solver calls (RPM / airspeed sweeps).
 *
 * This module is UI-independent.
 */

import type { CoefficientCurve } from './interpolate.ts'
import { freezeCurve } from './interpolate.ts'
import { InvalidGeometryError } from './errors.ts'

// ─── Types ───────────────────────────────────────────────────────────────────

/** One radial slice of a blade. */
export interface BladeSection {
  readonly radius: number      // [m] from hub center
  readonly chord: number       // [m]
  readonly twist: number       // [deg] geometric twist, may be negative
  readonly liftCurve: CoefficientCurve
  readonly dragCurve: CoefficientCurve
}

/**
 * Complete blade geometry. Sectional forces are per blade and get
 * multiplied by numBlades when totalled.
 */
export interface Propeller {
  readonly numBlades: number
  readonly diameter: number    // [m]
  readonly hubRadius: number   // [m]
  readonly sections: readonly BladeSection[]   // increasing radius
}

/** Parametric inputs for createPropeller(). */
export interface PropellerParams {
  numBlades: number
  diameter: number
  hubRadius: number
  numSections: number
  chordRange: readonly [number, number]   // [root, tip] chord [m]
  twistRange: readonly [number, number]   // [root, tip] twist [deg]
  liftCurve: CoefficientCurve
  dragCurve: CoefficientCurve
}

/** Explicit section list for assemblePropeller(). */
export interface PropellerSpec {
  numBlades: number
  diameter: number
  hubRadius: number
  sections: readonly BladeSection[]
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

/**
 * `count` evenly spaced samples from start to stop inclusive.
 * The last sample is exactly `stop`; a single sample is `start`.
 */
export function linspace(start: number, stop: number, count: number): number[] {
  if (count < 1) return []
  if (count === 1) return [start]
  const step = (stop - start) / (count - 1)
  const out: number[] = []
  for (let i = 0; i < count - 1; i++) {
    out.push(start + i * step)
  }
  out.push(stop)
  return out
}

export function tipRadius(propeller: Pick<Propeller, 'diameter'>): number {
  return propeller.diameter / 2
}

function requireFinite(field: string, value: number): void {
  if (!Number.isFinite(value)) {
    throw new InvalidGeometryError(field, value, `${field} must be a finite number, got ${value}`)
  }
}

function checkPropellerFrame(numBlades: number, diameter: number, hubRadius: number): void {
  requireFinite('diameter', diameter)
  requireFinite('hubRadius', hubRadius)
  if (!Number.isInteger(numBlades) || numBlades < 1) {
    throw new InvalidGeometryError('numBlades', numBlades, `numBlades must be a positive integer, got ${numBlades}`)
  }
  if (hubRadius < 0) {
    throw new InvalidGeometryError('hubRadius', hubRadius, `hubRadius must be >= 0, got ${hubRadius}`)
  }
  if (diameter <= 2 * hubRadius) {
    throw new InvalidGeometryError('diameter', diameter,
      `diameter ${diameter} must exceed twice the hub radius (${2 * hubRadius})`)
  }
}

// ─── Construction ────────────────────────────────────────────────────────────

/**
 * Build a propeller from linear chord/twist distributions.
 *
 * Stations run from the hub radius to the tip inclusive, and every
 * section uses the same airfoil (liftCurve / dragCurve).
 */
export function createPropeller(params: PropellerParams): Propeller {
  const { numBlades, diameter, hubRadius, numSections, chordRange, twistRange } = params

  checkPropellerFrame(numBlades, diameter, hubRadius)
  if (!Number.isInteger(numSections) || numSections < 1) {
    throw new InvalidGeometryError('numSections', numSections, `numSections must be an integer >= 1, got ${numSections}`)
  }
  requireFinite('chordRange[0]', chordRange[0])
  requireFinite('chordRange[1]', chordRange[1])
  requireFinite('twistRange[0]', twistRange[0])
  requireFinite('twistRange[1]', twistRange[1])

  const radii = linspace(hubRadius, tipRadius(params), numSections)
  const chords = linspace(chordRange[0], chordRange[1], numSections)
  const twists = linspace(twistRange[0], twistRange[1], numSections)

  const badChord = chords.findIndex(c => c <= 0)
  if (badChord >= 0) {
    throw new InvalidGeometryError('chord', chords[badChord], `chord must be > 0, got ${chords[badChord]}`, badChord)
  }

  const liftCurve = freezeCurve(params.liftCurve)
  const dragCurve = freezeCurve(params.dragCurve)

  const sections = radii.map((radius, i): BladeSection => Object.freeze({
    radius,
    chord: chords[i],
    twist: twists[i],
    liftCurve,
    dragCurve,
  }))

  return Object.freeze({
    numBlades,
    diameter,
    hubRadius,
    sections: Object.freeze(sections),
  })
}

/**
 * Build a propeller from an explicit (possibly non-uniform) section list.
 * Sections must lie within [hubRadius, tip] with strictly increasing radius.
 */
export function assemblePropeller(spec: PropellerSpec): Propeller {
  const { numBlades, diameter, hubRadius } = spec
  checkPropellerFrame(numBlades, diameter, hubRadius)

  if (spec.sections.length === 0) {
    throw new InvalidGeometryError('sections', spec.sections, 'propeller needs at least one section')
  }

  const tip = tipRadius(spec)
  const sections = spec.sections.map((s, i): BladeSection => {
    if (!Number.isFinite(s.radius) || s.radius < hubRadius || s.radius > tip) {
      throw new InvalidGeometryError('radius', s.radius, `radius ${s.radius} outside [${hubRadius}, ${tip}]`, i)
    }
    if (i > 0 && s.radius <= spec.sections[i - 1].radius) {
      throw new InvalidGeometryError('radius', s.radius, 'sections must be ordered by strictly increasing radius', i)
    }
    if (!Number.isFinite(s.chord) || s.chord <= 0) {
      throw new InvalidGeometryError('chord', s.chord, `chord must be > 0, got ${s.chord}`, i)
    }
    if (!Number.isFinite(s.twist)) {
      throw new InvalidGeometryError('twist', s.twist, `twist must be finite, got ${s.twist}`, i)
    }
    return Object.freeze({
      radius: s.radius,
      chord: s.chord,
      twist: s.twist,
      liftCurve: freezeCurve(s.liftCurve),
      dragCurve: freezeCurve(s.dragCurve),
    })
  })

  return Object.freeze({
    numBlades,
    diameter,
    hubRadius,
    sections: Object.freeze(sections),
  })
}
