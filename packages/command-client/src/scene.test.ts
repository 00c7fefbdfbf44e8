import { describe, expect, it } from 'vitest'

import { configurationCommands, sceneSetupCommands } from './scene'
import type { Vec3 } from '@vmdstream/shared/types'

const POSITIONS: Array<Vec3> = [
  [0, 0, 0],
  [1, 0, 0],
  [2, 0, 0],
]

describe('sceneSetupCommands', () => {
  it('uses an orthographic 800x800 view with HardPlastic by default', () => {
    expect(sceneSetupCommands()).toEqual([
      { kind: 'axes', location: 'off' },
      { kind: 'projection', mode: 'orthographic' },
      { kind: 'resize', width: 800, height: 800 },
      { kind: 'clear' },
      { kind: 'materials', enabled: true },
      { kind: 'material', name: 'HardPlastic' },
    ])
  })
})

describe('configurationCommands', () => {
  it('draws plain spheres with the default radius and resets the view', () => {
    expect(configurationCommands(POSITIONS.slice(0, 1))).toEqual([
      { kind: 'sphere', center: [0, 0, 0], radius: 0.5, resolution: 30 },
      { kind: 'reset-view' },
      { kind: 'scale', factor: 1.3 },
    ])
  })

  it('colors by atom type and sizes by type radius', () => {
    const commands = configurationCommands(POSITIONS.slice(0, 2), {
      atomTypes: [0, 1],
      typeRadii: [0.45, 0.35],
      resetView: false,
    })

    expect(commands).toEqual([
      { kind: 'color', color: 0 },
      { kind: 'sphere', center: [0, 0, 0], radius: 0.45, resolution: 30 },
      { kind: 'color', color: 1 },
      { kind: 'sphere', center: [1, 0, 0], radius: 0.35, resolution: 30 },
    ])
  })

  it('offsets explicit color indices into the color scale', () => {
    const commands = configurationCommands(POSITIONS.slice(0, 1), {
      atomTypes: [5],
      colorIndices: [10],
      resetView: false,
    })

    expect(commands[0]).toEqual({ kind: 'color', color: 43 })
  })

  it('prefers color values over color indices', () => {
    const commands = configurationCommands(POSITIONS.slice(0, 1), {
      colorIndices: [10],
      colorValues: [1],
      resetView: false,
    })

    expect(commands[0]).toEqual({ kind: 'color', color: 1056 })
  })

  it('draws bond cylinders before the atoms', () => {
    const commands = configurationCommands(POSITIONS.slice(0, 2), {
      radii: [0.4, 0.2],
      bonds: [[1, 0]],
      cylinderRadiusFraction: 0.5,
      sphereResolution: 12,
      resetView: false,
    })

    expect(commands).toEqual([
      {
        kind: 'cylinder',
        from: [1, 0, 0],
        to: [0, 0, 0],
        radius: 0.1,
        resolution: 12,
        filled: true,
      },
      { kind: 'sphere', center: [0, 0, 0], radius: 0.4, resolution: 12 },
      { kind: 'sphere', center: [1, 0, 0], radius: 0.2, resolution: 12 },
    ])
  })

  it('joins consecutive atoms of a connected type after each sphere', () => {
    const commands = configurationCommands(POSITIONS, {
      atomTypes: [0, 0, 1],
      connectTypes: [0],
      resetView: false,
    })

    expect(commands.map((command) => command.kind)).toEqual([
      'color',
      'sphere',
      'cylinder',
      'color',
      'sphere',
      'color',
      'sphere',
    ])
    expect(commands[2]).toMatchObject({ from: [0, 0, 0], to: [1, 0, 0], radius: 0.25 })
  })

  it('rejects per-atom arrays of the wrong length', () => {
    expect(() => configurationCommands(POSITIONS, { radii: [1] })).toThrow(
      'radii must have one entry per atom',
    )
  })

  it('rejects bonds that point outside the configuration', () => {
    expect(() => configurationCommands(POSITIONS, { bonds: [[0, 3]] })).toThrow(
      'bonds[0][1] must be an atom index in [0, 2]',
    )
  })

  it('requires atom types for segment connection and type radii lookups', () => {
    expect(() => configurationCommands(POSITIONS, { connectTypes: [0] })).toThrow(
      'connectTypes requires atomTypes',
    )
    expect(() =>
      configurationCommands(POSITIONS.slice(0, 1), { atomTypes: [2], typeRadii: [0.4] }),
    ).toThrow('typeRadii has no entry for atom type 2')
  })
})
