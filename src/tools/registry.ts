import type {z} from 'zod'
import {ServiceContractError, errorMessage} from '../core/errors.js'
import type {ProviderToolCall, ProviderToolDefinition} from '../providers/types.js'
import {requiredParameters, toInputSchema} from './schema.js'
import type {ToolContext, ToolDefinition, ToolOutcome, ToolParameters} from './types.js'

export type ResolvedToolCall = {
  call: ProviderToolCall
  tool: ToolDefinition
  params: z.infer<ToolParameters>
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function decodeArguments(call: ProviderToolCall): Record<string, unknown> {
  const raw = call.arguments.trim()
  if (!raw) return {}

  let decoded: unknown
  try {
    decoded = JSON.parse(raw)
  } catch (error) {
    throw new ServiceContractError(
      'malformed_arguments',
      `Invalid tool arguments JSON for '${call.name}' (call ${call.id}): ${errorMessage(error)}`,
      {cause: error}
    )
  }

  if (!isRecord(decoded)) {
    throw new ServiceContractError(
      'malformed_arguments',
      `Tool arguments for '${call.name}' (call ${call.id}) must be a JSON object`
    )
  }

  return decoded
}

export class ToolRegistry {
  private readonly tools = new Map<string, ToolDefinition>()

  constructor(tools: ToolDefinition[] = []) {
    for (const tool of tools) this.register(tool)
  }

  register(tool: ToolDefinition): this {
    if (this.tools.has(tool.name)) {
      throw new Error(`Tool already registered: ${tool.name}`)
    }
    // Fails fast on parameter types the schema cannot advertise.
    toInputSchema(tool.parameters)
    this.tools.set(tool.name, tool)
    return this
  }

  names(): string[] {
    return [...this.tools.keys()]
  }

  definitions(): ProviderToolDefinition[] {
    return [...this.tools.values()].map((tool) => ({
      name: tool.name,
      description: tool.description,
      inputSchema: toInputSchema(tool.parameters)
    }))
  }

  /**
   * Decodes and validates a tool request without running it.
   * Every failure here is a service-contract fault.
   */
  resolve(call: ProviderToolCall): ResolvedToolCall {
    const input = decodeArguments(call)

    const tool = this.tools.get(call.name)
    if (!tool) {
      throw new ServiceContractError('unknown_tool', `Unsupported tool call: ${call.name}`)
    }

    for (const key of requiredParameters(tool.parameters)) {
      if (input[key] === undefined || input[key] === null) {
        throw new ServiceContractError('missing_argument', `Missing required argument '${key}' for tool '${tool.name}'`)
      }
    }

    const parsed = tool.parameters.safeParse(input)
    if (!parsed.success) {
      const issue = parsed.error.issues[0]
      const where = issue?.path.join('.') || '(arguments)'
      throw new ServiceContractError(
        'invalid_argument',
        `Invalid argument '${where}' for tool '${tool.name}': ${issue?.message ?? 'validation failed'}`
      )
    }

    return {call, tool, params: parsed.data}
  }

  async invoke(resolved: ResolvedToolCall, context: ToolContext): Promise<ToolOutcome> {
    return resolved.tool.invoke(resolved.params, context)
  }
}
