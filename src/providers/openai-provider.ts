import OpenAI from 'openai'
import type {
  ChatMessage,
  LLMProvider,
  ProviderResponse,
  ProviderToolCall,
  ProviderToolDefinition
} from './types.js'
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessage,
  ChatCompletionMessageParam,
  ChatCompletionTool
} from 'openai/resources/chat/completions'
import {ServiceContractError} from '../core/errors.js'

type OpenAIProviderOptions = {
  apiKey: string
  model: string
  baseUrl: string
  timeoutMs?: number
  retryCount?: number
}

function safeJsonSnippet(value: unknown): string {
  try {
    return JSON.stringify(value).slice(0, 500)
  } catch {
    return '[unserializable response]'
  }
}

function toRequestMessage(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case 'user':
      return {role: 'user', content: message.content}
    case 'tool':
      return {role: 'tool', content: message.content, tool_call_id: message.toolCallId}
    case 'assistant': {
      const toolCalls = message.toolCalls ?? []
      return {
        role: 'assistant',
        content: message.content ?? null,
        ...(toolCalls.length > 0
          ? {
              tool_calls: toolCalls.map((call) => ({
                id: call.id,
                type: 'function' as const,
                function: {name: call.name, arguments: call.arguments}
              }))
            }
          : {})
      }
    }
  }
}

function parseToolCalls(message: ChatCompletionMessage): ProviderToolCall[] {
  const rawCalls = message.tool_calls ?? []
  return rawCalls.map((call) => {
    if (call.type !== 'function') {
      throw new ServiceContractError('unsupported_tool_call', `Unsupported tool call type in response ${safeJsonSnippet(call)}`)
    }
    return {
      id: call.id,
      name: call.function.name,
      arguments: call.function.arguments
    }
  })
}

/** Older completion-style backends put the answer in `choices[0].text`. */
function choiceText(choice: ChatCompletion.Choice, message: ChatCompletionMessage | undefined): string | undefined {
  if (typeof message?.content === 'string') return message.content
  return 'text' in choice && typeof choice.text === 'string' ? choice.text : undefined
}

function isTransient(error: unknown): boolean {
  if (error instanceof OpenAI.APIConnectionError) return true
  if (error instanceof OpenAI.APIError) {
    const status = error.status
    return status === 429 || (status !== undefined && status >= 500)
  }
  return false
}

export class OpenAIProvider implements LLMProvider {
  readonly name = 'openai'
  readonly model: string
  private readonly client: OpenAI
  private readonly timeoutMs: number
  private readonly retryCount: number

  constructor(options: OpenAIProviderOptions) {
    this.model = options.model
    this.timeoutMs = options.timeoutMs ?? 120_000
    this.retryCount = options.retryCount ?? 1
    const baseURL = options.baseUrl.replace(/\/+$/, '')
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL,
      maxRetries: 0
    })
  }

  async chat(messages: readonly ChatMessage[], tools: ProviderToolDefinition[] = []): Promise<ProviderResponse> {
    const mappedTools: ChatCompletionTool[] = tools.map((tool) => ({
      type: 'function' as const,
      function: {
        name: tool.name,
        description: tool.description,
        parameters: tool.inputSchema
      }
    }))

    const request: ChatCompletionCreateParamsNonStreaming = {
      model: this.model,
      messages: messages.map(toRequestMessage),
      ...(mappedTools.length > 0 ? {tools: mappedTools, tool_choice: 'auto' as const} : {})
    }

    const completion = await this.createWithRetry(request)
    // Some OpenAI-compatible backends omit `choices` entirely on upstream failures.
    const choice = completion.choices?.[0]
    if (!choice) {
      throw new ServiceContractError(
        'no_choices',
        `Model returned no choices. Response snippet: ${safeJsonSnippet(completion)}`
      )
    }

    const message: ChatCompletionMessage | undefined = choice.message
    const text = choiceText(choice, message)
    if (!message && text === undefined) {
      throw new ServiceContractError(
        'no_choices',
        `Model returned a choice without a message. Response snippet: ${safeJsonSnippet(completion)}`
      )
    }

    return {
      ...(text !== undefined ? {text} : {}),
      toolCalls: message ? parseToolCalls(message) : []
    }
  }

  private async createWithRetry(request: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletion> {
    let attempt = 0
    for (;;) {
      try {
        return await this.client.chat.completions.create(request, {timeout: this.timeoutMs})
      } catch (error) {
        if (attempt >= this.retryCount || !isTransient(error)) throw error
        attempt += 1
      }
    }
  }
}
