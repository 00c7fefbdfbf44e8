import { invalidArgument } from '@vmdstream/shared/errors'

export const DEFAULT_HOST = '127.0.0.1'
/** Port the remote-control listener opens unless told otherwise. */
export const DEFAULT_PORT = 5555

export type ChannelLogger = Pick<Console, 'debug'>

export type ChannelOptions = {
  host?: string
  port?: number
  /** Abort the connection attempt after this many milliseconds. */
  connectTimeoutMs?: number
  /** Destroy the socket after this many idle milliseconds. */
  timeoutMs?: number
  debug?: boolean
  logger?: ChannelLogger
}

export type ChannelConfig = {
  host: string
  port: number
  connectTimeoutMs: number | null
  timeoutMs: number | null
  logger: ChannelLogger
}

export type ChannelEnv = Record<string, string | undefined>

const silentLogger: ChannelLogger = {
  debug: () => {},
}

const PORT_RE = /^\d{1,5}$/
const TRUTHY_FLAGS = ['1', 'true', 'yes', 'on']

export function assertPort(value: unknown, label = 'port'): number {
  const port =
    typeof value === 'string' && PORT_RE.test(value.trim())
      ? Number(value.trim())
      : value
  if (typeof port !== 'number' || !Number.isInteger(port) || port < 1 || port > 65535) {
    throw invalidArgument(`${label} must be an integer in [1, 65535]`, { value })
  }
  return port
}

const resolveTimeout = (value: number | undefined, label: string): number | null => {
  if (value === undefined) {
    return null
  }
  if (!Number.isFinite(value) || value <= 0) {
    throw invalidArgument(`${label} must be a positive number of milliseconds`, {
      value,
    })
  }
  return value
}

const isFlagSet = (value: string | undefined): boolean =>
  TRUTHY_FLAGS.includes(value?.trim().toLowerCase() ?? '')

/** 明示オプション、環境変数、既定値の順に接続設定を解決する。 */
export function resolveChannelConfig(
  options: ChannelOptions = {},
  env: ChannelEnv = process.env,
): ChannelConfig {
  const host = (options.host ?? env.VMD_HOST ?? DEFAULT_HOST).trim()
  if (!host) {
    throw invalidArgument('host must not be empty')
  }

  const port =
    options.port !== undefined
      ? assertPort(options.port)
      : env.VMD_PORT?.trim()
        ? assertPort(env.VMD_PORT, 'VMD_PORT')
        : DEFAULT_PORT

  const debug = options.debug ?? isFlagSet(env.VMDSTREAM_DEBUG)

  return {
    host,
    port,
    connectTimeoutMs: resolveTimeout(options.connectTimeoutMs, 'connectTimeoutMs'),
    timeoutMs: resolveTimeout(options.timeoutMs, 'timeoutMs'),
    logger: options.logger ?? (debug ? console : silentLogger),
  }
}
