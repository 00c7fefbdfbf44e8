import { VMD_COLOR_COUNT, VMD_COLOR_SCALE_START } from '@vmdstream/shared/colors'
import { invalidArgument } from '@vmdstream/shared/errors'
import type { ColorSpec, LineStyle, Rgb, Vec3 } from '@vmdstream/shared/types'

import { toWireLine } from './commands'
import { configurationCommands, sceneSetupCommands } from './scene'
import type { ColorScaleMethod, RemoteCommand, Styled } from './commands'
import type { ConfigurationOptions, SceneSetupOptions } from './scene'

/** Writes one terminated line to the remote interpreter. */
export type CommandSender = (line: string) => Promise<void>

export type CommandClientOptions = {
  send: CommandSender
  /** Throws when the transport can no longer take lines. Runs before any argument is validated. */
  assertReady?: () => void
}

export type PointOptions = Styled & { size?: number }
export type LineOptions = Styled & { width?: number; style?: LineStyle }
export type SphereOptions = Styled & { resolution?: number }
export type CylinderOptions = Styled & {
  radius?: number
  resolution?: number
  filled?: boolean
}
export type ConeOptions = Styled & { radius?: number; resolution?: number }
export type TextOptions = Styled & { size?: number; thickness?: number }
export type RenderOptions = { executable?: string; antialiasSamples?: number }

export type CommandClient = {
  send: (command: RemoteCommand) => Promise<void>
  sendAll: (commands: ReadonlyArray<RemoteCommand>) => Promise<void>
  drawPoint: (at: Vec3, options?: PointOptions) => Promise<void>
  drawLine: (from: Vec3, to: Vec3, options?: LineOptions) => Promise<void>
  drawSphere: (center: Vec3, radius: number, options?: SphereOptions) => Promise<void>
  drawCylinder: (from: Vec3, to: Vec3, options?: CylinderOptions) => Promise<void>
  drawCone: (base: Vec3, tip: Vec3, options?: ConeOptions) => Promise<void>
  drawTriangle: (a: Vec3, b: Vec3, c: Vec3, options?: Styled) => Promise<void>
  drawText: (at: Vec3, text: string, options?: TextOptions) => Promise<void>
  setColor: (color: ColorSpec) => Promise<void>
  clear: () => Promise<void>
  setMaterials: (enabled: boolean) => Promise<void>
  setMaterial: (name: string) => Promise<void>
  changeColorRgb: (index: number, rgb: Rgb) => Promise<void>
  setColorScale: (
    colors: ReadonlyArray<Rgb>,
    options?: { startIndex?: number },
  ) => Promise<void>
  resetColorScale: (method?: ColorScaleMethod) => Promise<void>
  prepareScene: (options?: SceneSetupOptions) => Promise<void>
  drawConfiguration: (
    positions: ReadonlyArray<Vec3>,
    options?: ConfigurationOptions,
  ) => Promise<void>
  resetView: (options?: { scale?: number }) => Promise<void>
  renderTachyon: (filePrefix: string, options?: RenderOptions) => Promise<void>
  exitRemote: () => Promise<void>
  raw: (text: string) => Promise<void>
  /** Evaluates `text` remotely and asks the listener to write the result back for `read()`. */
  query: (text: string) => Promise<void>
}

export const createCommandClient = (options: CommandClientOptions): CommandClient => {
  const { send, assertReady } = options

  // All lines of a batch are formatted and handed to send before the first await.
  const dispatch = async (
    build: () => ReadonlyArray<RemoteCommand>,
  ): Promise<void> => {
    assertReady?.()
    const lines = build().map(toWireLine)
    await Promise.all(lines.map((line) => send(line)))
  }

  const sendOne = async (command: RemoteCommand): Promise<void> => {
    return dispatch(() => [command])
  }

  const sendAll = async (commands: ReadonlyArray<RemoteCommand>): Promise<void> => {
    return dispatch(() => commands)
  }

  return {
    send: sendOne,
    sendAll,

    async drawPoint(at, pointOptions) {
      return sendOne({ kind: 'point', at, ...pointOptions })
    },

    async drawLine(from, to, lineOptions) {
      return sendOne({ kind: 'line', from, to, ...lineOptions })
    },

    async drawSphere(center, radius, sphereOptions) {
      return sendOne({ kind: 'sphere', center, radius, ...sphereOptions })
    },

    async drawCylinder(from, to, cylinderOptions) {
      return sendOne({ kind: 'cylinder', from, to, ...cylinderOptions })
    },

    async drawCone(base, tip, coneOptions) {
      return sendOne({ kind: 'cone', from: base, to: tip, ...coneOptions })
    },

    async drawTriangle(a, b, c, styleOptions) {
      return sendOne({ kind: 'triangle', vertices: [a, b, c], ...styleOptions })
    },

    async drawText(at, text, textOptions) {
      return sendOne({ kind: 'text', at, text, ...textOptions })
    },

    async setColor(color) {
      return sendOne({ kind: 'color', color })
    },

    async clear() {
      return sendOne({ kind: 'clear' })
    },

    async setMaterials(enabled) {
      return sendOne({ kind: 'materials', enabled })
    },

    async setMaterial(name) {
      return sendOne({ kind: 'material', name })
    },

    async changeColorRgb(index, rgb) {
      return sendOne({ kind: 'color-change', index, rgb })
    },

    async setColorScale(colors, scaleOptions) {
      return dispatch(() => {
        const startIndex = scaleOptions?.startIndex ?? VMD_COLOR_SCALE_START
        if (startIndex + colors.length > VMD_COLOR_COUNT) {
          throw invalidArgument(
            `${colors.length} colors starting at ${startIndex} exceed the VMD color table`,
            { startIndex, count: colors.length },
          )
        }
        return colors.map((rgb, offset): RemoteCommand => ({
          kind: 'color-change',
          index: startIndex + offset,
          rgb,
        }))
      })
    },

    async resetColorScale(method) {
      return sendOne({ kind: 'color-scale-method', method: method ?? 'RGB' })
    },

    async prepareScene(setupOptions) {
      return dispatch(() => sceneSetupCommands(setupOptions))
    },

    async drawConfiguration(positions, configurationOptions) {
      return dispatch(() => configurationCommands(positions, configurationOptions))
    },

    async resetView(viewOptions) {
      const commands: Array<RemoteCommand> = [{ kind: 'reset-view' }]
      if (viewOptions?.scale !== undefined) {
        commands.push({ kind: 'scale', factor: viewOptions.scale })
      }
      return sendAll(commands)
    },

    async renderTachyon(filePrefix, renderOptions) {
      return sendOne({ kind: 'render-tachyon', filePrefix, ...renderOptions })
    },

    async exitRemote() {
      return sendOne({ kind: 'exit' })
    },

    async raw(text) {
      return sendOne({ kind: 'raw', text })
    },

    async query(text) {
      return sendOne({ kind: 'query', text })
    },
  }
}
