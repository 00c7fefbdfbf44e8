import net from 'node:net'

import { canTransitionChannelState, isWritableChannelState } from '@vmdstream/shared/channel-state'
import { ChannelError, describeError } from '@vmdstream/shared/errors'
import type { ChannelState } from '@vmdstream/shared/channel-state'

import type { ChannelConfig } from './config'

/** Upper bound on waiting for the remote end to acknowledge our FIN. */
export const CLOSE_GRACE_MS = 1000
/** Unread reply text kept while no reader waits; older text is dropped first. */
export const MAX_BUFFERED_CHARS = 64 * 1024

export type SocketTransport = {
  state: () => ChannelState
  /** Throws CONNECTION_CLOSED unless the socket can take another line. */
  assertWritable: () => void
  write: (line: string) => Promise<void>
  read: () => Promise<string>
  close: () => Promise<void>
}

type PendingRead = {
  resolve: (text: string) => void
  reject: (error: ChannelError) => void
}

const errorReason = (error: unknown): string | undefined => {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code
  }
  return undefined
}

const connect = (socket: net.Socket, connectTimeoutMs: number | null) => {
  return new Promise<void>((resolve, reject) => {
    let timer: NodeJS.Timeout | undefined
    const settle = () => {
      clearTimeout(timer)
      socket.off('connect', onConnect)
      socket.off('error', onError)
    }
    const onConnect = () => {
      settle()
      resolve()
    }
    const onError = (error: Error) => {
      settle()
      reject(error)
    }
    socket.once('connect', onConnect)
    socket.once('error', onError)
    if (connectTimeoutMs !== null) {
      timer = setTimeout(() => {
        settle()
        reject(new Error(`timed out after ${connectTimeoutMs} ms`))
      }, connectTimeoutMs)
    }
  })
}

/**
 * Opens one TCP connection and exposes ordered line writes and buffered reads.
 * Fails with CONNECTION_FAILED after a single attempt; the socket is destroyed
 * before the error reaches the caller.
 */
export async function openSocketTransport(config: ChannelConfig): Promise<SocketTransport> {
  const { host, port, logger } = config
  let state: ChannelState = 'connecting'
  let failure: ChannelError | null = null
  let buffered = ''
  let closedLocally = false
  const readers: Array<PendingRead> = []

  const transition = (next: ChannelState) => {
    if (canTransitionChannelState(state, next)) {
      state = next
    }
  }

  const closedError = () =>
    new ChannelError('CONNECTION_CLOSED', `Connection to ${host}:${port} is closed`, {
      host,
      port,
      reason: failure?.code,
    })

  const socket = net.createConnection({ host, port })
  socket.setEncoding('utf8')

  socket.on('data', (chunk: string) => {
    if (closedLocally) {
      return
    }
    buffered += chunk
    const reader = readers.shift()
    if (reader) {
      const text = buffered
      buffered = ''
      reader.resolve(text)
      return
    }
    if (buffered.length > MAX_BUFFERED_CHARS) {
      const dropped = buffered.length - MAX_BUFFERED_CHARS
      buffered = buffered.slice(dropped)
      logger.debug('[vmd-channel] dropped unread reply text', { dropped })
    }
  })

  socket.on('error', (error) => {
    if (!failure) {
      failure = new ChannelError('WRITE_FAILED', describeError(error), {
        host,
        port,
        reason: errorReason(error),
      })
    }
  })

  socket.on('close', () => {
    const wasConnected = state === 'open' || state === 'closing'
    transition('closed')
    const error = failure?.code === 'TIMEOUT' ? failure : closedError()
    for (const reader of readers.splice(0)) {
      reader.reject(error)
    }
    if (wasConnected) {
      logger.debug('[vmd-channel] closed', { host, port })
    }
  })

  try {
    await connect(socket, config.connectTimeoutMs)
  } catch (error) {
    socket.destroy()
    transition('closed')
    throw new ChannelError(
      'CONNECTION_FAILED',
      `Could not connect to VMD at ${host}:${port}: ${describeError(error)}`,
      { host, port, reason: errorReason(error) },
    )
  }

  transition('open')
  logger.debug('[vmd-channel] connected', { host, port })

  const { timeoutMs } = config
  if (timeoutMs !== null) {
    socket.setTimeout(timeoutMs, () => {
      failure = new ChannelError(
        'TIMEOUT',
        `No activity on ${host}:${port} for ${timeoutMs} ms`,
        { host, port },
      )
      socket.destroy()
    })
  }

  const assertWritable = () => {
    if (!isWritableChannelState(state) || !socket.writable) {
      throw closedError()
    }
  }

  return {
    state: () => state,
    assertWritable,

    write(line) {
      try {
        assertWritable()
      } catch (error) {
        return Promise.reject(error)
      }
      return new Promise<void>((resolve, reject) => {
        socket.write(line, 'utf8', (error) => {
          if (error) {
            reject(
              new ChannelError(
                'WRITE_FAILED',
                `Failed to write to ${host}:${port}: ${error.message}`,
                { host, port, reason: errorReason(error) },
              ),
            )
            return
          }
          logger.debug('[vmd-channel] sent', { line: line.trimEnd() })
          resolve()
        })
      })
    },

    read() {
      if (buffered && !closedLocally) {
        const text = buffered
        buffered = ''
        return Promise.resolve(text)
      }
      if (state !== 'open') {
        return Promise.reject(failure?.code === 'TIMEOUT' ? failure : closedError())
      }
      return new Promise<string>((resolve, reject) => {
        readers.push({ resolve, reject })
      })
    },

    async close() {
      if (state === 'closed') {
        return
      }
      transition('closing')
      closedLocally = true
      buffered = ''
      if (!socket.destroyed) {
        await new Promise<void>((resolve) => {
          const timer = setTimeout(() => socket.destroy(), CLOSE_GRACE_MS)
          timer.unref()
          socket.once('close', () => {
            clearTimeout(timer)
            resolve()
          })
          socket.end()
        })
      }
      transition('closed')
    },
  }
}
