import {mkdir, readFile, writeFile} from 'node:fs/promises'
import {dirname, resolve} from 'node:path'

const utf8 = new TextDecoder('utf-8', {fatal: true})

export function resolveWorkspacePath(workspace: string, path: string): string {
  return resolve(workspace, path)
}

/** Reads the whole file; throws on invalid UTF-8 rather than substituting U+FFFD. */
export async function readTextFile(workspace: string, path: string): Promise<string> {
  const bytes = await readFile(resolveWorkspacePath(workspace, path))
  return utf8.decode(bytes)
}

export async function writeTextFile(workspace: string, path: string, content: string): Promise<void> {
  const fullPath = resolveWorkspacePath(workspace, path)
  await mkdir(dirname(fullPath), {recursive: true})
  await writeFile(fullPath, content, 'utf8')
}

export function characterCount(text: string): number {
  return Array.from(text).length
}
