import {afterEach, beforeEach, describe, expect, it} from 'vitest'
import {existsSync} from 'node:fs'
import {readFile, writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import {bashTool, readTool, writeTool} from '../src/tools/builtin.js'
import {runShell} from '../src/tools/shell.js'
import {ToolExecutionError} from '../src/core/errors.js'
import type {ToolContext} from '../src/tools/types.js'
import {makeWorkspace, removeWorkspace} from './helpers.js'

describe('Read and Write tools', () => {
  let workspace: string
  let context: ToolContext

  beforeEach(async () => {
    workspace = await makeWorkspace()
    context = {workspace, shellTimeoutMs: 10_000}
  })

  afterEach(async () => {
    await removeWorkspace(workspace)
  })

  it('writes into missing parent directories and reads the exact content back', async () => {
    const written = await writeTool.invoke({file_path: 'nested/dir/a.txt', content: 'héllo\n'}, context)
    expect(written).toEqual({ok: true, output: 'Wrote 6 characters to nested/dir/a.txt'})

    const read = await readTool.invoke({file_path: 'nested/dir/a.txt'}, context)
    expect(read).toEqual({ok: true, output: 'héllo\n'})
    expect(await readFile(join(workspace, 'nested/dir/a.txt'), 'utf8')).toBe('héllo\n')
  })

  it('round-trips empty content', async () => {
    const written = await writeTool.invoke({file_path: 'empty.txt', content: ''}, context)
    expect(written.output).toBe('Wrote 0 characters to empty.txt')
    expect((await readTool.invoke({file_path: 'empty.txt'}, context)).output).toBe('')
  })

  it('overwrites instead of appending', async () => {
    await writeTool.invoke({file_path: 'f.txt', content: 'A'}, context)
    await writeTool.invoke({file_path: 'f.txt', content: 'B'}, context)
    expect((await readTool.invoke({file_path: 'f.txt'}, context)).output).toBe('B')
  })

  it('counts characters as code points', async () => {
    const written = await writeTool.invoke({file_path: 'emoji.txt', content: '😀!'}, context)
    expect(written.output).toBe('Wrote 2 characters to emoji.txt')
  })

  it('fails fatally when the file does not exist', async () => {
    await expect(readTool.invoke({file_path: 'missing.txt'}, context)).rejects.toBeInstanceOf(ToolExecutionError)
    await expect(readTool.invoke({file_path: 'missing.txt'}, context)).rejects.toMatchObject({
      kind: 'tool_execution',
      tool: 'Read'
    })
  })

  it('fails fatally on invalid UTF-8', async () => {
    await writeFile(join(workspace, 'bin.dat'), Buffer.from([0xff, 0xfe, 0x41]))
    await expect(readTool.invoke({file_path: 'bin.dat'}, context)).rejects.toBeInstanceOf(ToolExecutionError)
  })

  it('fails fatally when the target is a directory', async () => {
    await writeTool.invoke({file_path: 'dir/inner.txt', content: 'x'}, context)
    await expect(writeTool.invoke({file_path: 'dir', content: 'y'}, context)).rejects.toMatchObject({
      kind: 'tool_execution',
      tool: 'Write'
    })
    expect(existsSync(join(workspace, 'dir/inner.txt'))).toBe(true)
  })
})

describe('Bash tool', () => {
  let workspace: string
  let context: ToolContext

  beforeEach(async () => {
    workspace = await makeWorkspace()
    context = {workspace, shellTimeoutMs: 10_000}
  })

  afterEach(async () => {
    await removeWorkspace(workspace)
  })

  it('returns stdout verbatim on success', async () => {
    expect(await bashTool.invoke({command: 'echo hi'}, context)).toEqual({ok: true, output: 'hi\n'})
  })

  it('reports the exit code with labeled empty streams', async () => {
    expect(await bashTool.invoke({command: 'exit 7'}, context)).toEqual({
      ok: false,
      output: 'Command failed with exit code 7\n[stdout]\n\n[stderr]\n'
    })
  })

  it('reports both streams on failure', async () => {
    const result = await bashTool.invoke({command: 'echo o; echo e >&2; exit 3'}, context)
    expect(result).toEqual({ok: false, output: 'Command failed with exit code 3\n[stdout]\no\n\n[stderr]\ne\n'})
  })

  it('appends stderr after stdout, adding a newline only when stdout lacks one', async () => {
    expect((await bashTool.invoke({command: 'printf out; printf err >&2'}, context)).output).toBe('out\nerr')
    expect((await bashTool.invoke({command: 'echo out; echo err >&2'}, context)).output).toBe('out\nerr\n')
    expect((await bashTool.invoke({command: 'echo err >&2'}, context)).output).toBe('err\n')
  })

  it('runs in the workspace directory', async () => {
    await writeFile(join(workspace, 'marker.txt'), 'inside\n', 'utf8')
    expect((await bashTool.invoke({command: 'cat marker.txt'}, context)).output).toBe('inside\n')
  })

  it('returns an ERROR result when the shell cannot be launched', async () => {
    const result = await runShell('echo hi', {cwd: workspace, shell: '/nonexistent/toolloop-shell'})
    expect(result.ok).toBe(false)
    expect(result.output.startsWith('ERROR: Failed to launch command: ')).toBe(true)
  })

  it('returns an ERROR result when the command times out', async () => {
    const result = await runShell('sleep 3', {cwd: workspace, timeoutMs: 100, shell: '/bin/sh'})
    expect(result.ok).toBe(false)
    expect(result.output.startsWith('ERROR: Command timed out after 100ms\n[stdout]\n')).toBe(true)
  })

  it('kills the commands the shell started when the timeout fires', async () => {
    for (const command of ['sleep 5; echo late', 'sleep 5 | cat']) {
      const started = Date.now()
      const result = await runShell(command, {cwd: workspace, timeoutMs: 200, shell: '/bin/sh'})
      expect(Date.now() - started).toBeLessThan(3000)
      expect(result).toEqual({ok: false, output: 'ERROR: Command timed out after 200ms\n[stdout]\n\n[stderr]\n'})
    }
  })
})
