import {homedir} from 'node:os'
import {resolve} from 'node:path'

export function getTooltalkHome(): string {
  const custom = process.env.TOOLTALK_HOME?.trim()
  if (custom) return resolve(custom)
  return resolve(homedir(), '.tooltalk')
}

export function getGlobalEnvPath(): string {
  return resolve(getTooltalkHome(), '.env')
}

export function getLogsDir(homeDir = getTooltalkHome()): string {
  return resolve(homeDir, 'logs')
}

export function getExchangeLogPath(sessionId: string, homeDir = getTooltalkHome()): string {
  return resolve(getLogsDir(homeDir), `${sessionId}.jsonl`)
}
