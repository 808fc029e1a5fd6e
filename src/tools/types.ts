import type {z} from 'zod'

export type ToolParameters = z.AnyZodObject

export type ToolContext = {
  /** Directory that relative paths and shell commands resolve against. */
  workspace: string
  shellTimeoutMs: number
}

/** `ok: false` is a recoverable failure: the output still goes back to the model. */
export type ToolOutcome = {
  ok: boolean
  output: string
}

export interface ToolDefinition<TParams extends ToolParameters = ToolParameters> {
  readonly name: string
  readonly description: string
  readonly parameters: TParams
  invoke(params: z.infer<TParams>, context: ToolContext): Promise<ToolOutcome>
}

export function defineTool<TParams extends ToolParameters>(tool: ToolDefinition<TParams>): ToolDefinition<TParams> {
  return tool
}
