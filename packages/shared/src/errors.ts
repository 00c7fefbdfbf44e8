export type ChannelErrorCode =
  | 'CONNECTION_FAILED'
  | 'CONNECTION_CLOSED'
  | 'WRITE_FAILED'
  | 'INVALID_ARGUMENT'
  | 'TIMEOUT'

export class ChannelError extends Error {
  readonly code: ChannelErrorCode
  readonly details?: Record<string, unknown>

  constructor(
    code: ChannelErrorCode,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message)
    this.name = 'ChannelError'
    this.code = code
    this.details = details
  }
}

export const invalidArgument = (
  message: string,
  details?: Record<string, unknown>,
): ChannelError => {
  return new ChannelError('INVALID_ARGUMENT', message, details)
}

export const isChannelError = (
  error: unknown,
  code?: ChannelErrorCode,
): error is ChannelError => {
  if (!(error instanceof ChannelError)) {
    return false
  }
  return code === undefined || error.code === code
}

/** 任意の例外から表示用メッセージを取り出す。 */
export const describeError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message
  }
  return 'Unknown socket error'
}
