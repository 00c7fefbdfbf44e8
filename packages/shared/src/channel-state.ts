export const CHANNEL_STATES = ['connecting', 'open', 'closing', 'closed'] as const

export type ChannelState = (typeof CHANNEL_STATES)[number]

export const canTransitionChannelState = (
  previous: ChannelState | null | undefined,
  next: ChannelState,
): boolean => {
  if (previous == null) return next === 'connecting'
  if (previous === next) return true

  switch (previous) {
    case 'connecting':
      return next === 'open' || next === 'closed'
    case 'open':
      return next === 'closing' || next === 'closed'
    case 'closing':
      return next === 'closed'
    case 'closed':
      return false
    default:
      return false
  }
}

export const isWritableChannelState = (state: ChannelState): boolean => {
  return state === 'open'
}
