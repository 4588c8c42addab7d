/**
 * Error types for the BET library.
 *
 * Construction and operating-point errors abort the call.
 * Per-section lookup degradation is not an error. It is reported
 * as a CoefficientLookupDegraded diagnostic (see solver.ts).
 */

/** Structurally impossible propeller geometry. */
export class InvalidGeometryError extends Error {
  readonly field: string
  readonly value: unknown
  readonly index?: number   // section index, when the problem is per-section

  constructor(field: string, value: unknown, message: string, index?: number) {
    super(index === undefined ? message : `section ${index}: ${message}`)
    this.name = 'InvalidGeometryError'
    this.field = field
    this.value = value
    this.index = index
  }
}

/** Operating condition outside what the model supports (e.g. negative RPM). */
export class InvalidOperatingPointError extends Error {
  readonly field: string
  readonly value: number

  constructor(field: string, value: number, message: string) {
    super(message)
    this.name = 'InvalidOperatingPointError'
    this.field = field
    this.value = value
  }
}

/** Coefficient table that cannot be interpolated. */
export class MalformedCurveError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'MalformedCurveError'
  }
}
