import {
  VMD_COLOR_SCALE_START,
  assertColorIndex,
  colorIndexForValue,
} from '@vmdstream/shared/colors'
import { invalidArgument } from '@vmdstream/shared/errors'
import { assertNonNegative, assertPositiveInteger } from '@vmdstream/shared/vector'
import type { Vec3 } from '@vmdstream/shared/types'

import type { AxesLocation, ProjectionMode, RemoteCommand } from './commands'

export type SceneSetupOptions = {
  width?: number
  height?: number
  material?: string
  axes?: AxesLocation
  projection?: ProjectionMode
}

export type ConfigurationOptions = {
  /** Per-atom type index; also the fallback color index. */
  atomTypes?: ReadonlyArray<number>
  /** Radius per atom type, indexed by `atomTypes`. */
  typeRadii?: ReadonlyArray<number>
  /** Radius per atom. */
  radii?: ReadonlyArray<number>
  defaultRadius?: number
  /** Per-atom offsets (0-1023) into the color scale. */
  colorIndices?: ReadonlyArray<number>
  /** Per-atom values in [0, 1], mapped onto the color scale. Wins over `colorIndices`. */
  colorValues?: ReadonlyArray<number>
  sphereResolution?: number
  /** Atom index pairs joined with cylinders. */
  bonds?: ReadonlyArray<readonly [number, number]>
  /** Consecutive atoms that share one of these types are joined with cylinders. */
  connectTypes?: ReadonlyArray<number>
  cylinderRadiusFraction?: number
  resetView?: boolean
}

export const DEFAULT_SCENE_SIZE = 800
export const DEFAULT_MATERIAL = 'HardPlastic'
export const DEFAULT_ATOM_RADIUS = 0.5
export const DEFAULT_SPHERE_RESOLUTION = 30
export const DEFAULT_CYLINDER_RADIUS_FRACTION = 0.5
export const RESET_VIEW_SCALE = 1.3

export const sceneSetupCommands = (
  options: SceneSetupOptions = {},
): Array<RemoteCommand> => [
  { kind: 'axes', location: options.axes ?? 'off' },
  { kind: 'projection', mode: options.projection ?? 'orthographic' },
  {
    kind: 'resize',
    width: options.width ?? DEFAULT_SCENE_SIZE,
    height: options.height ?? DEFAULT_SCENE_SIZE,
  },
  { kind: 'clear' },
  { kind: 'materials', enabled: true },
  { kind: 'material', name: options.material ?? DEFAULT_MATERIAL },
]

const assertPerAtom = (
  values: ReadonlyArray<number> | undefined,
  count: number,
  label: string,
): void => {
  if (values !== undefined && values.length !== count) {
    throw invalidArgument(`${label} must have one entry per atom`, {
      expected: count,
      received: values.length,
    })
  }
}

const assertAtomIndex = (value: number, count: number, label: string): number => {
  if (!Number.isInteger(value) || value < 0 || value >= count) {
    throw invalidArgument(`${label} must be an atom index in [0, ${count - 1}]`, {
      value,
    })
  }
  return value
}

/**
 * Builds the command sequence that renders one atomic configuration:
 * bond cylinders first, then a sphere per atom, each preceded by its color.
 */
export function configurationCommands(
  positions: ReadonlyArray<Vec3>,
  options: ConfigurationOptions = {},
): Array<RemoteCommand> {
  const count = positions.length
  const {
    atomTypes,
    typeRadii,
    radii,
    colorIndices,
    colorValues,
    bonds,
    connectTypes,
  } = options
  assertPerAtom(atomTypes, count, 'atomTypes')
  assertPerAtom(radii, count, 'radii')
  assertPerAtom(colorIndices, count, 'colorIndices')
  assertPerAtom(colorValues, count, 'colorValues')
  if (connectTypes && !atomTypes) {
    throw invalidArgument('connectTypes requires atomTypes')
  }

  const defaultRadius = assertNonNegative(
    options.defaultRadius ?? DEFAULT_ATOM_RADIUS,
    'defaultRadius',
  )
  const resolution = assertPositiveInteger(
    options.sphereResolution ?? DEFAULT_SPHERE_RESOLUTION,
    'sphereResolution',
  )
  const fraction = assertNonNegative(
    options.cylinderRadiusFraction ?? DEFAULT_CYLINDER_RADIUS_FRACTION,
    'cylinderRadiusFraction',
  )

  const colorOf = (index: number): number | undefined => {
    if (colorValues) {
      return colorIndexForValue(colorValues[index])
    }
    if (colorIndices) {
      return assertColorIndex(
        VMD_COLOR_SCALE_START + colorIndices[index],
        `colorIndices[${index}]`,
      )
    }
    return atomTypes?.[index]
  }

  const radiusOf = (index: number): number => {
    if (typeRadii && atomTypes) {
      const radius = typeRadii[atomTypes[index]]
      if (radius === undefined) {
        throw invalidArgument(`typeRadii has no entry for atom type ${atomTypes[index]}`)
      }
      return radius
    }
    return radii?.[index] ?? defaultRadius
  }

  const commands: Array<RemoteCommand> = []
  const pushColor = (index: number) => {
    const color = colorOf(index)
    if (color !== undefined) {
      commands.push({ kind: 'color', color })
    }
  }
  const pushCylinder = (from: number, to: number) => {
    commands.push({
      kind: 'cylinder',
      from: positions[from],
      to: positions[to],
      radius: radiusOf(from) * fraction,
      resolution,
      filled: true,
    })
  }

  bonds?.forEach(([first, second], index) => {
    const a = assertAtomIndex(first, count, `bonds[${index}][0]`)
    const b = assertAtomIndex(second, count, `bonds[${index}][1]`)
    pushColor(a)
    pushCylinder(a, b)
  })

  for (let i = 0; i < count; i += 1) {
    pushColor(i)
    commands.push({
      kind: 'sphere',
      center: positions[i],
      radius: radiusOf(i),
      resolution,
    })
    if (connectTypes && atomTypes && i + 1 < count) {
      const type = atomTypes[i]
      if (type === atomTypes[i + 1] && connectTypes.includes(type)) {
        pushCylinder(i, i + 1)
      }
    }
  }

  if (options.resetView ?? true) {
    commands.push({ kind: 'reset-view' }, { kind: 'scale', factor: RESET_VIEW_SCALE })
  }
  return commands
}
