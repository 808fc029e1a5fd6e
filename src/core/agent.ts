import {loadConfig} from '../config/load-config.js'
import type {AppConfig} from '../config/schema.js'
import {OpenAIProvider} from '../providers/openai-provider.js'
import type {LLMProvider} from '../providers/types.js'
import {createDefaultToolRegistry} from '../tools/builtin.js'
import type {ToolRegistry} from '../tools/registry.js'
import type {ToolContext} from '../tools/types.js'
import {Conversation} from './conversation.js'
import {InternalError, StepLimitError} from './errors.js'
import type {EventBus} from './event-bus.js'

export const DEFAULT_MAX_STEPS = 50

export type AgentEvent =
  | {type: 'start'; provider: string; model: string; workspace: string; tools: string[]}
  | {type: 'model_request'; step: number; messageCount: number}
  | {type: 'model_response'; step: number; content: string; toolCallCount: number}
  | {type: 'tool_call'; step: number; id: string; tool: string; input: Record<string, unknown>}
  | {type: 'tool_result'; step: number; id: string; tool: string; ok: boolean; output: string}
  | {type: 'final'; step: number; content: string}

export type AgentRunOptions = {
  provider: LLMProvider
  registry?: ToolRegistry
  context?: Partial<ToolContext>
  maxSteps?: number
  bus?: EventBus<AgentEvent>
  /** Receives the live transcript; it stays owned by this run. */
  onConversation?: (conversation: Conversation) => void
}

export type AgentTaskOptions = {
  config?: AppConfig
  bus?: EventBus<AgentEvent>
  maxSteps?: number
}

/**
 * Runs one prompt to completion.
 *
 * Each round-trip sends the whole transcript plus the tool schemas. Tool requests are
 * validated and executed one at a time, in the order the model produced them, and
 * the loop ends on the first response without tool requests. Contract faults and
 * fatal tool failures propagate and end the run.
 */
export async function runAgent(prompt: string, options: AgentRunOptions): Promise<string> {
  const {provider, bus} = options
  const registry = options.registry ?? createDefaultToolRegistry()
  const maxSteps = options.maxSteps ?? DEFAULT_MAX_STEPS
  const context: ToolContext = {
    workspace: options.context?.workspace ?? process.cwd(),
    shellTimeoutMs: options.context?.shellTimeoutMs ?? 120_000
  }
  const tools = registry.definitions()
  const conversation = new Conversation(prompt)
  options.onConversation?.(conversation)

  bus?.publish({
    type: 'start',
    provider: provider.name,
    model: provider.model,
    workspace: context.workspace,
    tools: registry.names()
  })

  for (let step = 0; step < maxSteps; step += 1) {
    if (conversation.state !== 'awaiting_model') {
      throw new InternalError(`Tool calls left unanswered before step ${step}`)
    }
    bus?.publish({type: 'model_request', step, messageCount: conversation.length})
    const response = await provider.chat(conversation.messages, tools)
    conversation.appendAssistant(response.text, response.toolCalls)
    bus?.publish({
      type: 'model_response',
      step,
      content: response.text ?? '',
      toolCallCount: response.toolCalls.length
    })

    if (response.toolCalls.length === 0) {
      const content = response.text ?? ''
      bus?.publish({type: 'final', step, content})
      return content
    }

    for (const call of response.toolCalls) {
      const resolved = registry.resolve(call)
      bus?.publish({type: 'tool_call', step, id: call.id, tool: call.name, input: resolved.params})
      const result = await registry.invoke(resolved, context)
      bus?.publish({type: 'tool_result', step, id: call.id, tool: call.name, ok: result.ok, output: result.output})
      conversation.appendToolResult(call.id, result.output)
    }
  }

  throw new StepLimitError(maxSteps)
}

export function providerFromConfig(config: AppConfig): LLMProvider {
  return new OpenAIProvider({
    apiKey: config.apiKey,
    model: config.model,
    baseUrl: config.baseURL,
    timeoutMs: config.runtime.modelTimeoutMs,
    retryCount: config.runtime.modelRetryCount
  })
}

export async function runAgentTask(task: string, options: AgentTaskOptions = {}): Promise<string> {
  const config = options.config ?? (await loadConfig())
  return runAgent(task, {
    provider: providerFromConfig(config),
    registry: createDefaultToolRegistry(),
    context: {workspace: config.workspace, shellTimeoutMs: config.runtime.shellTimeoutMs},
    maxSteps: options.maxSteps ?? config.runtime.maxSteps,
    bus: options.bus
  })
}
