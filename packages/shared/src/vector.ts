import { invalidArgument } from './errors'
import type { Rgb, Vec3 } from './types'

const isFiniteNumber = (value: unknown): value is number =>
  typeof value === 'number' && Number.isFinite(value)

export function assertFinite(value: unknown, label: string): number {
  if (!isFiniteNumber(value)) {
    throw invalidArgument(`${label} must be a finite number`, { value })
  }
  return value
}

export function assertNonNegative(value: unknown, label: string): number {
  const finite = assertFinite(value, label)
  if (finite < 0) {
    throw invalidArgument(`${label} must not be negative`, { value })
  }
  return finite
}

export function assertPositiveInteger(value: unknown, label: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw invalidArgument(`${label} must be a positive integer`, { value })
  }
  return value
}

/** 長さ 3 の有限数配列であることを検証し、Vec3 として返す。 */
export function assertVec3(value: unknown, label: string): Vec3 {
  if (!Array.isArray(value) || value.length !== 3) {
    throw invalidArgument(`${label} must be a coordinate triple`, { value })
  }
  const [x, y, z]: Array<unknown> = value
  return [
    assertFinite(x, `${label}.x`),
    assertFinite(y, `${label}.y`),
    assertFinite(z, `${label}.z`),
  ]
}

export function assertRgb(value: unknown, label: string): Rgb {
  if (!Array.isArray(value) || value.length !== 3) {
    throw invalidArgument(`${label} must be an RGB triple`, { value })
  }
  const channels: Array<unknown> = value
  const [r, g, b] = channels.map((channel, index) => {
    const finite = assertFinite(channel, `${label}[${index}]`)
    if (finite < 0 || finite > 1) {
      throw invalidArgument(`${label}[${index}] must be within [0, 1]`, {
        value: channel,
      })
    }
    return finite
  })
  return [r, g, b]
}
