import {homedir} from 'node:os'
import {resolve} from 'node:path'

export function getToolloopHome(): string {
  const custom = process.env.TOOLLOOP_HOME?.trim()
  if (custom) return resolve(custom)
  return resolve(homedir(), '.toolloop')
}

export function getGlobalEnvPath(): string {
  return resolve(getToolloopHome(), '.env')
}

export function getLocalEnvPath(cwd = process.cwd()): string {
  return resolve(cwd, '.env')
}
