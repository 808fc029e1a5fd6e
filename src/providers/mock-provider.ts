import type {ChatMessage, LLMProvider, ProviderResponse, ProviderToolDefinition} from './types.js'

export type RecordedRequest = {
  messages: ChatMessage[]
  tools: ProviderToolDefinition[]
}

/** Replays canned responses in order and records what it was sent. */
export class ScriptedProvider implements LLMProvider {
  readonly name = 'scripted'
  readonly model = 'scripted-model'
  readonly requests: RecordedRequest[] = []
  private readonly responses: ProviderResponse[]

  constructor(responses: ProviderResponse[]) {
    this.responses = [...responses]
  }

  async chat(messages: readonly ChatMessage[], tools: ProviderToolDefinition[] = []): Promise<ProviderResponse> {
    this.requests.push({
      messages: messages.map((message) => ({...message})),
      tools
    })
    const next = this.responses.shift()
    if (!next) throw new Error(`Scripted provider exhausted after ${this.requests.length - 1} responses`)
    return next
  }
}
