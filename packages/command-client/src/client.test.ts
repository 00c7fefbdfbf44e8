import { describe, expect, it, vi } from 'vitest'

import { ChannelError } from '@vmdstream/shared/errors'

import { createCommandClient } from './client'

const makeClient = () => {
  const send = vi.fn(async (_line: string) => {})
  const client = createCommandClient({ send })
  const lines = () => send.mock.calls.map(([line]) => line)
  return { client, send, lines }
}

describe('createCommandClient', () => {
  it('sends one terminated line per drawing call', async () => {
    const { client, lines } = makeClient()

    await client.drawPoint([1, 2, 3], { color: 1 })

    expect(lines()).toEqual(['draw color 1; draw point {1 2 3}\n'])
  })

  it('formats each command independently of earlier color changes', async () => {
    const { client, lines } = makeClient()

    await client.setColor(4)
    await client.drawSphere([0, 0, 0], 2)

    expect(lines()).toEqual([
      'draw color 4\n',
      'draw sphere {0 0 0} radius 2\n',
    ])
  })

  it('forwards raw text with only the terminator added', async () => {
    const { client, lines } = makeClient()

    await client.raw('arbitrary text')

    expect(lines()).toEqual(['arbitrary text\n'])
  })

  it('maps the remaining primitives onto their draw commands', async () => {
    const { client, lines } = makeClient()

    await client.drawLine([0, 0, 0], [1, 1, 1], { width: 2 })
    await client.drawCylinder([0, 0, 0], [0, 0, 1], { radius: 0.1 })
    await client.drawCone([0, 0, 0], [0, 0, 1])
    await client.drawTriangle([0, 0, 0], [1, 0, 0], [0, 1, 0], { color: 'blue' })
    await client.drawText([0, 0, 0], 'origin')
    await client.clear()
    await client.setMaterials(true)
    await client.setMaterial('Opaque')
    await client.exitRemote()

    expect(lines()).toEqual([
      'draw line {0 0 0} {1 1 1} width 2\n',
      'draw cylinder {0 0 0} {0 0 1} radius 0.1\n',
      'draw cone {0 0 0} {0 0 1}\n',
      'draw color blue; draw triangle {0 0 0} {1 0 0} {0 1 0}\n',
      'draw text {0 0 0} "origin"\n',
      'draw delete all\n',
      'draw materials on\n',
      'draw material Opaque\n',
      'exit\n',
    ])
  })

  it('writes nothing when validation fails', async () => {
    const { client, send } = makeClient()

    await expect(client.drawSphere([0, 0, 0], -2)).rejects.toMatchObject({
      code: 'INVALID_ARGUMENT',
    })
    await expect(
      client.drawConfiguration(
        [
          [0, 0, 0],
          [1, Number.NaN, 0],
        ],
        { resetView: false },
      ),
    ).rejects.toThrow('center.y must be a finite number')
    expect(send).not.toHaveBeenCalled()
  })

  it('propagates sender failures to the caller', async () => {
    const send = vi
      .fn(async (_line: string) => {})
      .mockResolvedValueOnce(undefined)
      .mockRejectedValueOnce(new Error('broken pipe'))
    const client = createCommandClient({ send })

    await expect(client.resetView({ scale: 1.3 })).rejects.toThrow('broken pipe')
    await expect(client.clear()).resolves.toBeUndefined()
    expect(send.mock.calls.map(([line]) => line)).toEqual([
      'display resetview\n',
      'scale by 1.3\n',
      'draw delete all\n',
    ])
  })
})

describe('write ordering', () => {
  it('hands a whole batch to the sender before a later call', async () => {
    const { client, lines } = makeClient()

    const batch = client.resetView({ scale: 2 })
    const single = client.drawPoint([0, 0, 0])
    await Promise.all([batch, single])

    expect(lines()).toEqual(['display resetview\n', 'scale by 2\n', 'draw point {0 0 0}\n'])
  })

  it('checks readiness before validating arguments', async () => {
    const send = vi.fn(async (_line: string) => {})
    const client = createCommandClient({
      send,
      assertReady: () => {
        throw new ChannelError('CONNECTION_CLOSED', 'Connection to 127.0.0.1:5555 is closed')
      },
    })

    await expect(client.drawSphere([0, 0, 0], -1)).rejects.toMatchObject({
      code: 'CONNECTION_CLOSED',
    })
    await expect(
      client.drawConfiguration([[0, 0, 0]], { radii: [1, 2] }),
    ).rejects.toMatchObject({ code: 'CONNECTION_CLOSED' })
    await expect(
      client.setColorScale([[0, 0, 0]], { startIndex: 2000 }),
    ).rejects.toMatchObject({ code: 'CONNECTION_CLOSED' })
    expect(send).not.toHaveBeenCalled()
  })

  it('sends queries through the listener reply proc', async () => {
    const { client, lines } = makeClient()

    await client.query('molinfo num')

    expect(lines()).toEqual(['::vmdstream::reply molinfo num\n'])
  })
})

describe('color scale helpers', () => {
  it('writes one color change per entry from the scale start', async () => {
    const { client, lines } = makeClient()

    await client.setColorScale([
      [1, 0, 0],
      [0, 0, 1],
    ])

    expect(lines()).toEqual([
      'color change rgb 33 1 0 0\n',
      'color change rgb 34 0 0 1\n',
    ])
  })

  it('refuses scales that overflow the color table', async () => {
    const { client, send } = makeClient()

    await expect(
      client.setColorScale([[0, 0, 0]], { startIndex: 1056 }),
    ).resolves.toBeUndefined()
    await expect(
      client.setColorScale(
        [
          [0, 0, 0],
          [1, 1, 1],
        ],
        { startIndex: 1056 },
      ),
    ).rejects.toThrow('2 colors starting at 1056 exceed the VMD color table')
    expect(send).toHaveBeenCalledTimes(1)
  })

  it('resets the scale method to RGB by default', async () => {
    const { client, lines } = makeClient()

    await client.resetColorScale()
    await client.resetColorScale('BWR')

    expect(lines()).toEqual(['color scale method RGB\n', 'color scale method BWR\n'])
  })
})

describe('scene helpers', () => {
  it('prepares the scene and renders frames', async () => {
    const { client, lines } = makeClient()

    await client.prepareScene({ width: 640, height: 480 })
    await client.renderTachyon('test_frame_00')

    expect(lines()).toEqual([
      'axes location off\n',
      'display projection orthographic\n',
      'display resize 640 480\n',
      'draw delete all\n',
      'draw materials on\n',
      'draw material HardPlastic\n',
      'render Tachyon test_frame_00.dat "tachyon" -aasamples 12 %s -format TARGA -o %s.tga\n',
    ])
  })
})
