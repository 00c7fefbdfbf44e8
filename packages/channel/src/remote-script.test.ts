import { mkdtemp, readFile, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import { afterEach, describe, expect, it } from 'vitest'

import { QUERY_PROC } from '@vmdstream/command-client'

import { remoteControlScript, writeRemoteControlScript } from './remote-script'

describe('remoteControlScript', () => {
  let dir: string | null = null

  afterEach(async () => {
    if (dir) {
      await rm(dir, { recursive: true, force: true })
      dir = null
    }
  })

  it('listens on the default port', () => {
    const script = remoteControlScript()
    expect(script).toContain('variable port 5555')
    expect(script).not.toContain('{{PORT}}')
  })

  it('writes results back only for queries', () => {
    const script = remoteControlScript()
    expect(script).toContain(`proc ${QUERY_PROC} {args} {`)
    expect(script).toContain('} elseif {$replying} {')
  })

  it('substitutes a custom port', () => {
    expect(remoteControlScript(6123)).toContain('variable port 6123')
  })

  it('rejects ports out of range', () => {
    expect(() => remoteControlScript(0)).toThrow('port must be an integer in [1, 65535]')
  })

  it('writes the rendered script to disk', async () => {
    dir = await mkdtemp(join(tmpdir(), 'vmdstream-'))
    const path = join(dir, 'remote_ctl.tcl')
    await writeRemoteControlScript(path, 6001)
    expect(await readFile(path, 'utf8')).toBe(remoteControlScript(6001))
  })
})
