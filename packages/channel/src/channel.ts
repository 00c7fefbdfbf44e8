import { createCommandClient } from '@vmdstream/command-client'
import type { CommandClient } from '@vmdstream/command-client'
import type { ChannelState } from '@vmdstream/shared/channel-state'

import { resolveChannelConfig } from './config'
import { openSocketTransport } from './socket'
import type { ChannelOptions } from './config'

export type CloseOptions = {
  /** Send `exit` first, which quits the remote VMD session. */
  exitRemote?: boolean
}

export type Channel = CommandClient & {
  readonly host: string
  readonly port: number
  state: () => ChannelState
  /** Resolves with text the listener has written back: query results and errors. */
  read: () => Promise<string>
  close: (options?: CloseOptions) => Promise<void>
}

export const openChannel = async (options: ChannelOptions = {}): Promise<Channel> => {
  const config = resolveChannelConfig(options)
  const transport = await openSocketTransport(config)
  const client = createCommandClient({
    send: transport.write,
    assertReady: transport.assertWritable,
  })

  return {
    ...client,
    host: config.host,
    port: config.port,
    state: transport.state,
    read: transport.read,

    async close(closeOptions) {
      if (!closeOptions?.exitRemote || transport.state() !== 'open') {
        return transport.close()
      }
      try {
        await client.exitRemote()
      } finally {
        await transport.close()
      }
    },
  }
}

/** チャネルを開いて処理を実行し、成否にかかわらず必ず閉じる。 */
export const withChannel = async <T>(
  options: ChannelOptions,
  fn: (channel: Channel) => Promise<T>,
): Promise<T> => {
  const channel = await openChannel(options)
  try {
    return await fn(channel)
  } finally {
    await channel.close()
  }
}
