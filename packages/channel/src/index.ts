export * from './channel'
export * from './config'
export * from './remote-script'
export type { SocketTransport } from './socket'
