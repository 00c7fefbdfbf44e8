export type Vec3 = readonly [number, number, number]

/** RGB intensities, each in [0, 1]. */
export type Rgb = readonly [number, number, number]

/** VMD color index (0-1056) or one of its named colors. */
export type ColorSpec = number | string

export type LineStyle = 'solid' | 'dashed'

export type Frame = {
  positions: Array<Vec3>
  atomTypes: Array<number>
  box: Array<number>
}

export type Trajectory = {
  frames: Array<Frame>
  typeLabels: Array<string>
}
