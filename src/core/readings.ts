import type { Limits, NdValue, Reading } from './types/capabilities'

/**
 * Shape of a nested value, or null when it is ragged.
 */
export function shapeOf(values: NdValue): number[] | null {
  if (typeof values === 'number') return []
  if (values.length === 0) return [0]

  const inner = shapeOf(values[0])
  if (inner === null) return null

  for (const item of values) {
    const shape = shapeOf(item)
    if (shape === null || shape.length !== inner.length || shape.some((n, i) => n !== inner[i])) {
      return null
    }
  }
  return [values.length, ...inner]
}

/**
 * Check a reading against the dimensionality its detector declares.
 * Returns a description of the mismatch, or null if the reading is well-formed.
 */
export function checkReading(reading: Reading, dimensionality: number): string | null {
  if (reading.dimensionality !== dimensionality) {
    return `expected ${dimensionality}-D reading, got ${reading.dimensionality}-D`
  }
  const shape = shapeOf(reading.values)
  if (shape === null) return 'reading values are ragged'
  if (shape.length !== dimensionality) {
    return `reading values have ${shape.length} dimensions, expected ${dimensionality}`
  }
  if (shape.length !== reading.shape.length || shape.some((n, i) => n !== reading.shape[i])) {
    return `reading shape [${reading.shape.join(', ')}] does not match values [${shape.join(', ')}]`
  }
  return null
}

export function scalarReading(value: number, unit: string | null = null): Reading {
  return { dimensionality: 0, shape: [], values: value, unit }
}

export function vectorReading(values: number[], unit: string | null = null): Reading {
  return { dimensionality: 1, shape: [values.length], values, unit }
}

export function imageReading(rows: number[][], unit: string | null = null): Reading {
  return { dimensionality: 2, shape: [rows.length, rows[0]?.length ?? 0], values: rows, unit }
}

/**
 * Whether a value lies within (lower, upper), where null means no limit.
 */
export function withinLimits(value: number, limits: Limits): boolean {
  const [lower, upper] = limits
  return (lower === null || lower <= value) && (upper === null || value <= upper)
}
