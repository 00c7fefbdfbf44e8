import { invalidArgument } from './errors'
import type { Frame, Trajectory, Vec3 } from './types'

const NUMBER = String.raw`[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?`

const HEADER_RE = /^(?<count>\d+)(?:\s|$)/
const ATOM_RE = new RegExp(
  String.raw`^(?<id>\S+)\s+(?<type>\S+)\s+(?<x>${NUMBER})\s+(?<y>${NUMBER})\s+(?<z>${NUMBER})(?:\s|$)`,
)

type SourceLine = {
  text: string
  lineNumber: number
}

/**
 * Reads concatenated frames of the form
 *
 *   N [comment]
 *   id type x y z    (N lines)
 *   Lx Ly [Lz]
 *
 * Type labels are numbered in order of first appearance across all frames.
 */
export function parseTrajectory(text: string): Trajectory {
  const lines = text.split(/\r?\n/)
  const typeLabels: Array<string> = []
  const frames: Array<Frame> = []
  let cursor = 0

  const nextLine = (): SourceLine | null => {
    while (cursor < lines.length) {
      const line = lines[cursor].trim()
      cursor += 1
      if (line) {
        return { text: line, lineNumber: cursor }
      }
    }
    return null
  }

  const typeIndexOf = (label: string): number => {
    const known = typeLabels.indexOf(label)
    if (known !== -1) {
      return known
    }
    typeLabels.push(label)
    return typeLabels.length - 1
  }

  for (let header = nextLine(); header; header = nextLine()) {
    const match = header.text.match(HEADER_RE)
    if (!match?.groups) {
      throw invalidArgument(`line ${header.lineNumber}: expected an atom count`, {
        line: header.text,
      })
    }
    const count = Number(match.groups.count)
    const positions: Array<Vec3> = []
    const atomTypes: Array<number> = []

    for (let i = 0; i < count; i += 1) {
      const line = nextLine()
      if (!line) {
        throw invalidArgument(
          `unexpected end of input: frame ${frames.length + 1} declares ${count} atoms`,
        )
      }
      const atom = line.text.match(ATOM_RE)
      if (!atom?.groups) {
        throw invalidArgument(
          `line ${line.lineNumber}: expected "id type x y z"`,
          { line: line.text },
        )
      }
      atomTypes.push(typeIndexOf(atom.groups.type))
      positions.push([
        Number(atom.groups.x),
        Number(atom.groups.y),
        Number(atom.groups.z),
      ])
    }

    const boxLine = nextLine()
    if (!boxLine) {
      throw invalidArgument(
        `unexpected end of input: frame ${frames.length + 1} has no box line`,
      )
    }
    const box = boxLine.text.split(/\s+/).map(Number)
    if (box.some((value) => !Number.isFinite(value))) {
      throw invalidArgument(`line ${boxLine.lineNumber}: invalid box dimensions`, {
        line: boxLine.text,
      })
    }
    frames.push({ positions, atomTypes, box })
  }

  return { frames, typeLabels }
}
