import type {ChatMessage, ProviderToolCall} from '../providers/types.js'
import {InternalError, ServiceContractError} from './errors.js'

export type ConversationState = 'awaiting_model' | 'awaiting_tool_results'

/**
 * Append-only transcript for one agent run.
 *
 * Every tool message answers exactly one request of the latest assistant message,
 * and every request is answered before the next assistant message may be appended.
 */
export class Conversation {
  private readonly entries: ChatMessage[] = []
  private readonly usedToolCallIds = new Set<string>()
  private pending: ProviderToolCall[] = []

  constructor(prompt: string) {
    this.entries.push({role: 'user', content: prompt})
  }

  get state(): ConversationState {
    return this.pending.length > 0 ? 'awaiting_tool_results' : 'awaiting_model'
  }

  get messages(): readonly ChatMessage[] {
    return [...this.entries]
  }

  get length(): number {
    return this.entries.length
  }

  get pendingToolCalls(): readonly ProviderToolCall[] {
    return [...this.pending]
  }

  appendAssistant(text: string | undefined, toolCalls: readonly ProviderToolCall[]): void {
    if (this.pending.length > 0) {
      throw new InternalError(`Cannot append assistant message with ${this.pending.length} tool calls unanswered`)
    }

    const ids = new Set<string>()
    for (const call of toolCalls) {
      if (ids.has(call.id) || this.usedToolCallIds.has(call.id)) {
        throw new ServiceContractError('duplicate_tool_call_id', `Duplicate tool call id from model: ${call.id}`)
      }
      ids.add(call.id)
    }

    const calls = toolCalls.map((call) => ({...call}))
    this.entries.push({
      role: 'assistant',
      ...(text !== undefined ? {content: text} : {}),
      ...(calls.length > 0 ? {toolCalls: calls} : {})
    })
    for (const id of ids) this.usedToolCallIds.add(id)
    this.pending = [...calls]
  }

  appendToolResult(toolCallId: string, content: string): void {
    const index = this.pending.findIndex((call) => call.id === toolCallId)
    const call = this.pending[index]
    if (!call) {
      throw new InternalError(`No pending tool call with id ${toolCallId}`)
    }

    this.entries.push({role: 'tool', toolCallId, toolName: call.name, content})
    this.pending.splice(index, 1)
  }
}
