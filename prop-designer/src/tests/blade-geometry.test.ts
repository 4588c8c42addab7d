/**
 * Propeller geometry construction tests.
 */

import { describe, it, expect } from 'vitest'
import { createPropeller, assemblePropeller, linspace, tipRadius } from '../bet/blade-geometry.ts'
import type { PropellerParams, BladeSection } from '../bet/blade-geometry.ts'
import { InvalidGeometryError } from '../bet/errors.ts'
import { flatCurve } from '../bet/airfoils.ts'

const lift = flatCurve(0.5, -10, 10)
const drag = flatCurve(0.02, -10, 10)

function params(overrides: Partial<PropellerParams> = {}): PropellerParams {
  return {
    numBlades: 2,
    diameter: 0.5,
    hubRadius: 0.05,
    numSections: 3,
    chordRange: [0.05, 0.03],
    twistRange: [20, 5],
    liftCurve: lift,
    dragCurve: drag,
    ...overrides,
  }
}

function section(radius: number, chord = 0.04, twist = 10): BladeSection {
  return { radius, chord, twist, liftCurve: lift, dragCurve: drag }
}

// ─── linspace ────────────────────────────────────────────────────────────────

describe('linspace', () => {
  it('includes both endpoints exactly', () => {
    const v = linspace(0.05, 0.25, 5)
    expect(v).toHaveLength(5)
    expect(v[0]).toBe(0.05)
    expect(v[4]).toBe(0.25)
    expect(v[2]).toBeCloseTo(0.15, 12)
  })

  it('single sample is the start value', () => {
    expect(linspace(3, 7, 1)).toEqual([3])
  })
})

// ─── createPropeller ─────────────────────────────────────────────────────────

describe('createPropeller', () => {
  it('places chord and twist range endpoints at the first and last stations', () => {
    const prop = createPropeller(params())
    expect(prop.sections).toHaveLength(3)
    expect(prop.sections[0].chord).toBe(0.05)
    expect(prop.sections[2].chord).toBe(0.03)
    expect(prop.sections[0].twist).toBe(20)
    expect(prop.sections[2].twist).toBe(5)
    expect(prop.sections[1].chord).toBeCloseTo(0.04, 12)
    expect(prop.sections[1].twist).toBeCloseTo(12.5, 12)
  })

  it('spaces stations from hub radius to tip', () => {
    const prop = createPropeller(params({ numSections: 5 }))
    expect(prop.sections.map(s => s.radius)).toEqual(linspace(0.05, 0.25, 5))
    expect(prop.sections[4].radius).toBe(tipRadius(prop))
  })

  it('puts a single section at the hub radius', () => {
    const prop = createPropeller(params({ numSections: 1 }))
    expect(prop.sections).toHaveLength(1)
    expect(prop.sections[0].radius).toBe(0.05)
    expect(prop.sections[0].chord).toBe(0.05)
    expect(prop.sections[0].twist).toBe(20)
  })

  it('shares the airfoil curves across sections', () => {
    const prop = createPropeller(params())
    expect(prop.sections[0].liftCurve).toBe(prop.sections[2].liftCurve)
    expect(prop.sections[1].dragCurve.value).toEqual([0.02, 0.02])
  })

  it('returns a frozen geometry', () => {
    const prop = createPropeller(params())
    expect(Object.isFrozen(prop)).toBe(true)
    expect(Object.isFrozen(prop.sections)).toBe(true)
    expect(Object.isFrozen(prop.sections[0])).toBe(true)
    expect(Object.isFrozen(prop.sections[0].liftCurve.alpha)).toBe(true)
  })

  it('copies the input curves', () => {
    const liftCurve = { alpha: [-5, 5], value: [0, 1] }
    const prop = createPropeller(params({ liftCurve }))
    liftCurve.value[1] = 99
    expect(prop.sections[0].liftCurve.value).toEqual([0, 1])
  })

  it('rejects numSections < 1', () => {
    expect(() => createPropeller(params({ numSections: 0 }))).toThrow(InvalidGeometryError)
    expect(() => createPropeller(params({ numSections: 2.5 }))).toThrow(InvalidGeometryError)
  })

  it('rejects a hub that does not fit inside the diameter', () => {
    expect(() => createPropeller(params({ diameter: 0.1, hubRadius: 0.05 }))).toThrow(InvalidGeometryError)
    expect(() => createPropeller(params({ diameter: 0.08, hubRadius: 0.05 }))).toThrow(InvalidGeometryError)
  })

  it('rejects a non-positive chord and names the station', () => {
    try {
      createPropeller(params({ chordRange: [0.05, -0.01] }))
      expect.unreachable('createPropeller should have thrown')
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidGeometryError)
      if (err instanceof InvalidGeometryError) {
        expect(err.field).toBe('chord')
        expect(err.index).toBe(2)
        expect(err.value).toBe(-0.01)
      }
    }
    expect(() => createPropeller(params({ chordRange: [0.02, 0] }))).toThrow('section 2: chord must be > 0, got 0')
  })

  it('rejects invalid blade counts and hub radii', () => {
    expect(() => createPropeller(params({ numBlades: 0 }))).toThrow(InvalidGeometryError)
    expect(() => createPropeller(params({ numBlades: 1.5 }))).toThrow(InvalidGeometryError)
    expect(() => createPropeller(params({ hubRadius: -0.01 }))).toThrow(InvalidGeometryError)
    expect(() => createPropeller(params({ diameter: NaN }))).toThrow(InvalidGeometryError)
  })
})

// ─── assemblePropeller ───────────────────────────────────────────────────────

describe('assemblePropeller', () => {
  const frame = { numBlades: 3, diameter: 0.5, hubRadius: 0.05 }

  it('keeps a non-uniform section list as given', () => {
    const prop = assemblePropeller({ ...frame, sections: [section(0.06), section(0.2), section(0.25)] })
    expect(prop.sections.map(s => s.radius)).toEqual([0.06, 0.2, 0.25])
    expect(prop.numBlades).toBe(3)
    expect(Object.isFrozen(prop.sections[1])).toBe(true)
  })

  it('rejects sections out of radial order', () => {
    expect(() => assemblePropeller({ ...frame, sections: [section(0.2), section(0.1)] }))
      .toThrow('section 1: sections must be ordered by strictly increasing radius')
  })

  it('rejects sections outside the hub–tip span', () => {
    expect(() => assemblePropeller({ ...frame, sections: [section(0.3)] })).toThrow(InvalidGeometryError)
    expect(() => assemblePropeller({ ...frame, sections: [section(0.01)] })).toThrow(InvalidGeometryError)
  })

  it('rejects empty section lists and bad chords', () => {
    expect(() => assemblePropeller({ ...frame, sections: [] })).toThrow('propeller needs at least one section')
    expect(() => assemblePropeller({ ...frame, sections: [section(0.1, 0)] })).toThrow(InvalidGeometryError)
  })
})
