import { assertColorIndex, colorToken } from '@vmdstream/shared/colors'
import { invalidArgument } from '@vmdstream/shared/errors'
import {
  assertFinite,
  assertNonNegative,
  assertPositiveInteger,
  assertRgb,
  assertVec3,
} from '@vmdstream/shared/vector'
import type { ColorSpec, LineStyle, Rgb, Vec3 } from '@vmdstream/shared/types'

export const LINE_TERMINATOR = '\n'

export const AXES_LOCATIONS = [
  'off',
  'origin',
  'lowerleft',
  'lowerright',
  'upperleft',
  'upperright',
] as const

export type AxesLocation = (typeof AXES_LOCATIONS)[number]

export type ProjectionMode = 'orthographic' | 'perspective'

export const COLOR_SCALE_METHODS = [
  'RGB',
  'BGR',
  'RWB',
  'BWR',
  'RWG',
  'GWR',
  'GWB',
  'BWG',
  'BlkW',
  'WBlk',
] as const

export type ColorScaleMethod = (typeof COLOR_SCALE_METHODS)[number]

export type Styled = {
  color?: ColorSpec
}

export type RemoteCommand =
  | ({ kind: 'point'; at: Vec3; size?: number } & Styled)
  | ({
      kind: 'line'
      from: Vec3
      to: Vec3
      width?: number
      style?: LineStyle
    } & Styled)
  | ({
      kind: 'sphere'
      center: Vec3
      radius: number
      resolution?: number
    } & Styled)
  | ({
      kind: 'cylinder'
      from: Vec3
      to: Vec3
      radius?: number
      resolution?: number
      filled?: boolean
    } & Styled)
  | ({
      kind: 'cone'
      from: Vec3
      to: Vec3
      radius?: number
      resolution?: number
    } & Styled)
  | ({ kind: 'triangle'; vertices: readonly [Vec3, Vec3, Vec3] } & Styled)
  | ({
      kind: 'text'
      at: Vec3
      text: string
      size?: number
      thickness?: number
    } & Styled)
  | { kind: 'color'; color: ColorSpec }
  | { kind: 'clear' }
  | { kind: 'materials'; enabled: boolean }
  | { kind: 'material'; name: string }
  | { kind: 'color-change'; index: number; rgb: Rgb }
  | { kind: 'color-scale-method'; method: ColorScaleMethod }
  | { kind: 'reset-view' }
  | { kind: 'scale'; factor: number }
  | { kind: 'axes'; location: AxesLocation }
  | { kind: 'projection'; mode: ProjectionMode }
  | { kind: 'resize'; width: number; height: number }
  | {
      kind: 'render-tachyon'
      filePrefix: string
      executable?: string
      antialiasSamples?: number
    }
  | { kind: 'exit' }
  | { kind: 'raw'; text: string }
  | { kind: 'query'; text: string }

export type RemoteCommandKind = RemoteCommand['kind']

const MATERIAL_NAME_RE = /^[A-Za-z][A-Za-z0-9_]*$/
const FILE_PREFIX_RE = /^[^\s"{}[\]$;\\]+$/
const LINE_BREAK_RE = /[\r\n]/
/** Listener proc that evaluates its arguments and writes the result back. */
export const QUERY_PROC = '::vmdstream::reply'

/** Shortest decimal form that parses back to the same double. */
const formatNumber = (value: number): string => String(value)

const formatVec3 = (value: unknown, label: string): string => {
  return `{${assertVec3(value, label).map(formatNumber).join(' ')}}`
}

/** Tcl のダブルクォート文字列として安全に埋め込む。 */
const quoteTcl = (text: string, label: string): string => {
  if (LINE_BREAK_RE.test(text)) {
    throw invalidArgument(`${label} must not contain line breaks`, { text })
  }
  return `"${text.replace(/[\\"$[\]]/g, (char) => `\\${char}`)}"`
}

const withColor = (line: string, color: ColorSpec | undefined): string => {
  if (color === undefined) {
    return line
  }
  return `draw color ${colorToken(color)}; ${line}`
}

const optionalToken = (
  keyword: string,
  value: number | undefined,
  format: (value: number) => string,
): string => (value === undefined ? '' : ` ${keyword} ${format(value)}`)

const isOneOf = <T extends string>(
  values: ReadonlyArray<T>,
  value: unknown,
): value is T => typeof value === 'string' && values.some((item) => item === value)

const assertPositive = (value: unknown, label: string): number => {
  const finite = assertFinite(value, label)
  if (finite <= 0) {
    throw invalidArgument(`${label} must be positive`, { value })
  }
  return finite
}

const assertOneOf = <T extends string>(
  values: ReadonlyArray<T>,
  value: unknown,
  label: string,
): T => {
  if (!isOneOf(values, value)) {
    throw invalidArgument(`${label} must be one of ${values.join(', ')}`, { value })
  }
  return value
}

const unknownCommand = (command: unknown): never => {
  const kind: unknown =
    typeof command === 'object' && command !== null && 'kind' in command
      ? command.kind
      : undefined
  throw invalidArgument(`Unknown command kind: ${String(kind)}`, { kind })
}

/**
 * Formats a command as a single line of VMD Tcl, without the terminator.
 * Every argument is validated first; a ChannelError with code
 * INVALID_ARGUMENT is thrown for malformed geometry or style.
 */
export function formatCommand(command: RemoteCommand): string {
  switch (command.kind) {
    case 'point': {
      const at = formatVec3(command.at, 'point')
      if (command.size === undefined) {
        return withColor(`draw point ${at}`, command.color)
      }
      const size = assertNonNegative(command.size, 'size')
      return withColor(`draw sphere ${at} radius ${formatNumber(size)}`, command.color)
    }
    case 'line': {
      const style =
        command.style === undefined
          ? ''
          : ` style ${assertOneOf(['solid', 'dashed'] as const, command.style, 'style')}`
      const width = optionalToken('width', command.width, (value) =>
        String(assertPositiveInteger(value, 'width')),
      )
      return withColor(
        `draw line ${formatVec3(command.from, 'start')} ${formatVec3(command.to, 'end')}${style}${width}`,
        command.color,
      )
    }
    case 'sphere': {
      const radius = assertNonNegative(command.radius, 'radius')
      const resolution = optionalToken('resolution', command.resolution, (value) =>
        String(assertPositiveInteger(value, 'resolution')),
      )
      return withColor(
        `draw sphere ${formatVec3(command.center, 'center')} radius ${formatNumber(radius)}${resolution}`,
        command.color,
      )
    }
    case 'cylinder': {
      const radius = optionalToken('radius', command.radius, (value) =>
        formatNumber(assertNonNegative(value, 'radius')),
      )
      const resolution = optionalToken('resolution', command.resolution, (value) =>
        String(assertPositiveInteger(value, 'resolution')),
      )
      const filled =
        command.filled === undefined ? '' : ` filled ${command.filled ? 'yes' : 'no'}`
      return withColor(
        `draw cylinder ${formatVec3(command.from, 'start')} ${formatVec3(command.to, 'end')}${radius}${resolution}${filled}`,
        command.color,
      )
    }
    case 'cone': {
      const radius = optionalToken('radius', command.radius, (value) =>
        formatNumber(assertNonNegative(value, 'radius')),
      )
      const resolution = optionalToken('resolution', command.resolution, (value) =>
        String(assertPositiveInteger(value, 'resolution')),
      )
      return withColor(
        `draw cone ${formatVec3(command.from, 'base')} ${formatVec3(command.to, 'tip')}${radius}${resolution}`,
        command.color,
      )
    }
    case 'triangle': {
      if (!Array.isArray(command.vertices) || command.vertices.length !== 3) {
        throw invalidArgument('triangle needs exactly three vertices', {
          value: command.vertices,
        })
      }
      const vertices = command.vertices
        .map((vertex, index) => formatVec3(vertex, `vertex${index + 1}`))
        .join(' ')
      return withColor(`draw triangle ${vertices}`, command.color)
    }
    case 'text': {
      if (typeof command.text !== 'string') {
        throw invalidArgument('text must be a string', { value: command.text })
      }
      const size = optionalToken('size', command.size, (value) =>
        formatNumber(assertPositive(value, 'size')),
      )
      const thickness = optionalToken('thickness', command.thickness, (value) =>
        formatNumber(assertPositive(value, 'thickness')),
      )
      return withColor(
        `draw text ${formatVec3(command.at, 'position')} ${quoteTcl(command.text, 'text')}${size}${thickness}`,
        command.color,
      )
    }
    case 'color':
      return `draw color ${colorToken(command.color)}`
    case 'clear':
      return 'draw delete all'
    case 'materials':
      return `draw materials ${command.enabled ? 'on' : 'off'}`
    case 'material': {
      if (typeof command.name !== 'string' || !MATERIAL_NAME_RE.test(command.name)) {
        throw invalidArgument(`Invalid material name: ${String(command.name)}`, {
          value: command.name,
        })
      }
      return `draw material ${command.name}`
    }
    case 'color-change': {
      const index = assertColorIndex(command.index, 'index')
      const rgb = assertRgb(command.rgb, 'rgb')
      return `color change rgb ${index} ${rgb.map(formatNumber).join(' ')}`
    }
    case 'color-scale-method':
      return `color scale method ${assertOneOf(COLOR_SCALE_METHODS, command.method, 'method')}`
    case 'reset-view':
      return 'display resetview'
    case 'scale':
      return `scale by ${assertPositive(command.factor, 'scale factor')}`
    case 'axes':
      return `axes location ${assertOneOf(AXES_LOCATIONS, command.location, 'axes location')}`
    case 'projection':
      return `display projection ${assertOneOf(['orthographic', 'perspective'] as const, command.mode, 'projection')}`
    case 'resize': {
      const width = assertPositiveInteger(command.width, 'width')
      const height = assertPositiveInteger(command.height, 'height')
      return `display resize ${width} ${height}`
    }
    case 'render-tachyon': {
      if (typeof command.filePrefix !== 'string' || !FILE_PREFIX_RE.test(command.filePrefix)) {
        throw invalidArgument(`Invalid render file prefix: ${String(command.filePrefix)}`, {
          value: command.filePrefix,
        })
      }
      const executable = quoteTcl(command.executable ?? 'tachyon', 'executable')
      const samples = assertPositiveInteger(
        command.antialiasSamples ?? 12,
        'antialiasSamples',
      )
      return `render Tachyon ${command.filePrefix}.dat ${executable} -aasamples ${samples} %s -format TARGA -o %s.tga`
    }
    case 'exit':
      return 'exit'
    case 'raw': {
      if (typeof command.text !== 'string') {
        throw invalidArgument('raw command must be a string', { value: command.text })
      }
      if (LINE_BREAK_RE.test(command.text)) {
        throw invalidArgument('raw command must be a single line', {
          text: command.text,
        })
      }
      return command.text
    }
    case 'query': {
      if (typeof command.text !== 'string' || !command.text.trim()) {
        throw invalidArgument('query must be a non-empty string', { value: command.text })
      }
      if (LINE_BREAK_RE.test(command.text)) {
        throw invalidArgument('query must be a single line', { text: command.text })
      }
      return `${QUERY_PROC} ${command.text}`
    }
    default: {
      const unhandled: never = command
      return unknownCommand(unhandled)
    }
  }
}

export function toWireLine(command: RemoteCommand): string {
  return `${formatCommand(command)}${LINE_TERMINATOR}`
}
