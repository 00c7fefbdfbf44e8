import { readFileSync } from 'node:fs'
import { writeFile } from 'node:fs/promises'

import { DEFAULT_PORT, assertPort } from './config'

const TEMPLATE_URL = new URL('../templates/remote_ctl.tcl', import.meta.url)
const PORT_PLACEHOLDER = '{{PORT}}'

/**
 * Renders the Tcl listener VMD must source before a channel can connect.
 * Launching VMD itself is left to the caller.
 */
export function remoteControlScript(port: number = DEFAULT_PORT): string {
  const listenPort = assertPort(port)
  return readFileSync(TEMPLATE_URL, 'utf8').replaceAll(PORT_PLACEHOLDER, String(listenPort))
}

export async function writeRemoteControlScript(
  path: string,
  port: number = DEFAULT_PORT,
): Promise<void> {
  await writeFile(path, remoteControlScript(port), 'utf8')
}
