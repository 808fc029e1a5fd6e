import {execa} from 'execa'
import {errorMessage} from '../core/errors.js'
import type {ToolOutcome} from './types.js'

export type ShellOptions = {
  cwd?: string
  timeoutMs?: number
  /** Shell binary; defaults to `$SHELL`, then the platform shell. */
  shell?: string | true
}

function resolveShell(): string | true {
  const shell = process.env.SHELL
  if (shell?.trim()) return shell
  if (process.platform === 'win32') return process.env.ComSpec || 'cmd.exe'
  return true
}

export function joinOutput(stdout: string, stderr: string): string {
  if (!stderr) return stdout
  const separator = stdout && !stdout.endsWith('\n') ? '\n' : ''
  return `${stdout}${separator}${stderr}`
}

export function failureReport(headline: string, stdout: string, stderr: string): string {
  return `${headline}\n[stdout]\n${stdout}\n[stderr]\n${stderr}`
}

/**
 * The shell leads its own process group, so a timeout kills every process it
 * started. Otherwise a grandchild holding stdout open keeps the pipes, and the run,
 * alive past the limit.
 */
export async function runShell(command: string, options: ShellOptions = {}): Promise<ToolOutcome> {
  const ownGroup = process.platform !== 'win32'
  const subprocess = execa(command, {
    cwd: options.cwd ?? process.cwd(),
    shell: options.shell ?? resolveShell(),
    detached: ownGroup,
    reject: false,
    stdin: 'ignore',
    stripFinalNewline: false
  })

  let timedOut = false
  const timer = options.timeoutMs
    ? setTimeout(() => {
        timedOut = true
        const {pid} = subprocess
        if (ownGroup && pid !== undefined) {
          try {
            process.kill(-pid, 'SIGKILL')
            return
          } catch (error) {
            // ESRCH: the group is already gone; fall back to the shell itself.
            if (!(error instanceof Error)) throw error
          }
        }
        subprocess.kill('SIGKILL')
      }, options.timeoutMs)
    : undefined

  let result: Awaited<typeof subprocess>
  try {
    result = await subprocess
  } finally {
    clearTimeout(timer)
  }
  const stdout = typeof result.stdout === 'string' ? result.stdout : ''
  const stderr = typeof result.stderr === 'string' ? result.stderr : ''

  if (timedOut) {
    return {ok: false, output: failureReport(`ERROR: Command timed out after ${options.timeoutMs}ms`, stdout, stderr)}
  }

  if (result.exitCode === undefined) {
    if (result.signal) {
      return {ok: false, output: failureReport(`Command terminated by signal ${result.signal}`, stdout, stderr)}
    }
    const reason = 'shortMessage' in result && typeof result.shortMessage === 'string' ? result.shortMessage : errorMessage(result)
    return {ok: false, output: `ERROR: Failed to launch command: ${reason}`}
  }

  if (result.exitCode !== 0) {
    return {ok: false, output: failureReport(`Command failed with exit code ${result.exitCode}`, stdout, stderr)}
  }

  return {ok: true, output: joinOutput(stdout, stderr)}
}
