import {mkdtemp, rm} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {join} from 'node:path'

export async function makeWorkspace(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'toolloop-test-'))
}

export async function removeWorkspace(dir: string): Promise<void> {
  await rm(dir, {recursive: true, force: true})
}

export function captureError(fn: () => unknown): unknown {
  try {
    fn()
  } catch (error) {
    return error
  }
  throw new Error('expected function to throw')
}
