export type ChatMessage =
  | {role: 'user'; content: string}
  | {
      role: 'assistant'
      content?: string
      /** Tool requests in the order the service produced them; replayed verbatim on later round-trips. */
      toolCalls?: ProviderToolCall[]
    }
  | {role: 'tool'; content: string; toolCallId: string; toolName: string}

export type ProviderToolDefinition = {
  name: string
  description: string
  inputSchema: Record<string, unknown>
}

export type ProviderToolCall = {
  id: string
  name: string
  /** Serialized JSON argument bundle, decoded only by the dispatcher. */
  arguments: string
}

export type ProviderResponse = {
  text?: string
  toolCalls: ProviderToolCall[]
}

export interface LLMProvider {
  readonly name: string
  readonly model: string
  chat(messages: readonly ChatMessage[], tools?: ProviderToolDefinition[]): Promise<ProviderResponse>
}
