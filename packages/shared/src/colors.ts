import colorNames from './color-names.json'
import { invalidArgument } from './errors'
import { assertFinite, assertPositiveInteger } from './vector'
import type { Rgb } from './types'

/** Named colors in VMD color-index order (indices 0-32). */
export const VMD_COLOR_NAMES: ReadonlyArray<string> = colorNames

export const VMD_COLOR_SCALE_START = 33
export const VMD_COLOR_SCALE_SIZE = 1024
export const VMD_COLOR_COUNT = VMD_COLOR_SCALE_START + VMD_COLOR_SCALE_SIZE

export function assertColorIndex(value: unknown, label = 'color'): number {
  if (
    typeof value !== 'number' ||
    !Number.isInteger(value) ||
    value < 0 ||
    value >= VMD_COLOR_COUNT
  ) {
    throw invalidArgument(
      `${label} must be an integer color index in [0, ${VMD_COLOR_COUNT - 1}]`,
      { value },
    )
  }
  return value
}

/** Returns the token VMD accepts for a color index or name. */
export function colorToken(color: unknown): string {
  if (typeof color === 'string') {
    const name = color.trim()
    if (!VMD_COLOR_NAMES.includes(name)) {
      throw invalidArgument(`Unknown VMD color name: ${color}`, { value: color })
    }
    return name
  }
  return String(assertColorIndex(color))
}

/** Maps a value in [0, 1] onto the color scale. */
export function colorIndexForValue(value: number): number {
  const finite = assertFinite(value, 'color value')
  if (finite < 0 || finite > 1) {
    throw invalidArgument('color value must be within [0, 1]', { value })
  }
  const offset = Math.min(
    Math.floor(finite * VMD_COLOR_SCALE_SIZE),
    VMD_COLOR_SCALE_SIZE - 1,
  )
  return VMD_COLOR_SCALE_START + offset
}

/** Piecewise-linear control points: [position, intensity]. */
export type ColorRampChannel = ReadonlyArray<readonly [number, number]>

export type ColorRamp = {
  red: ColorRampChannel
  green: ColorRampChannel
  blue: ColorRampChannel
}

export const JET_RAMP: ColorRamp = {
  red: [
    [0, 0],
    [0.35, 0],
    [0.66, 1],
    [0.89, 1],
    [1, 0.5],
  ],
  green: [
    [0, 0],
    [0.125, 0],
    [0.375, 1],
    [0.64, 1],
    [0.91, 0],
    [1, 0],
  ],
  blue: [
    [0, 0.5],
    [0.11, 1],
    [0.34, 1],
    [0.65, 0],
    [1, 0],
  ],
}

const sampleChannel = (channel: ColorRampChannel, position: number): number => {
  const upper = channel.findIndex(([x]) => x >= position)
  if (upper === -1) {
    return channel[channel.length - 1]?.[1] ?? 0
  }
  const [x1, y1] = channel[upper]
  if (upper === 0) {
    return y1
  }
  const [x0, y0] = channel[upper - 1]
  if (x1 === x0) {
    return y1
  }
  return y0 + ((y1 - y0) * (position - x0)) / (x1 - x0)
}

export function sampleColorRamp(ramp: ColorRamp, position: number): Rgb {
  const clamped = Math.min(1, Math.max(0, assertFinite(position, 'position')))
  return [
    sampleChannel(ramp.red, clamped),
    sampleChannel(ramp.green, clamped),
    sampleChannel(ramp.blue, clamped),
  ]
}

/** Samples `count` evenly spaced colors from the ramp, first and last included. */
export function discretizeColorRamp(
  count: number,
  ramp: ColorRamp = JET_RAMP,
): Array<Rgb> {
  const size = assertPositiveInteger(count, 'count')
  return Array.from({ length: size }, (_, index) =>
    sampleColorRamp(ramp, size === 1 ? 0 : index / (size - 1)),
  )
}
