import {z} from 'zod'
import {ToolExecutionError, errorMessage} from '../core/errors.js'
import {characterCount, readTextFile, writeTextFile} from './filesystem.js'
import {ToolRegistry} from './registry.js'
import {runShell} from './shell.js'
import {defineTool} from './types.js'

export const readTool = defineTool({
  name: 'Read',
  description: 'Read and return the contents of a file',
  parameters: z.object({
    file_path: z.string().min(1).describe('The path to the file to read')
  }),
  async invoke({file_path}, {workspace}) {
    try {
      return {ok: true, output: await readTextFile(workspace, file_path)}
    } catch (error) {
      throw new ToolExecutionError('Read', `Failed to read '${file_path}': ${errorMessage(error)}`, {cause: error})
    }
  }
})

export const writeTool = defineTool({
  name: 'Write',
  description: 'Write content to a file, creating parent directories and replacing any existing content',
  parameters: z.object({
    file_path: z.string().min(1).describe('The path of the file to write to'),
    content: z.string().describe('The content to write to the file')
  }),
  async invoke({file_path, content}, {workspace}) {
    try {
      await writeTextFile(workspace, file_path, content)
    } catch (error) {
      throw new ToolExecutionError('Write', `Failed to write '${file_path}': ${errorMessage(error)}`, {cause: error})
    }
    return {ok: true, output: `Wrote ${characterCount(content)} characters to ${file_path}`}
  }
})

export const bashTool = defineTool({
  name: 'Bash',
  description: 'Execute a shell command in the working directory and return its output',
  parameters: z.object({
    command: z.string().min(1).describe('The command to execute')
  }),
  invoke({command}, {workspace, shellTimeoutMs}) {
    return runShell(command, {cwd: workspace, timeoutMs: shellTimeoutMs})
  }
})

export function createDefaultToolRegistry(): ToolRegistry {
  return new ToolRegistry([readTool, writeTool, bashTool])
}
