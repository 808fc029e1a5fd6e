import type {AgentEvent} from '../agent.js'

export type LogSink = (line: string) => void

export type LogSubscriberOptions = {
  verboseModel?: boolean
  debug?: boolean
  clock?: () => number
}

function shorten(text: string, max = 500): string {
  if (text.length <= max) return text
  return `${text.slice(0, max)}\n...[truncated]`
}

export function baseEventLine(event: AgentEvent, ts: string): string {
  switch (event.type) {
    case 'start':
      return `[${ts}] START provider=${event.provider} model=${event.model} workspace=${event.workspace} tools=${event.tools.join(',')}`
    case 'model_request':
      return `[${ts}] MODEL_REQUEST step=${event.step} messages=${event.messageCount}`
    case 'model_response':
      return `[${ts}] MODEL_RESPONSE step=${event.step} tool_calls=${event.toolCallCount}\n${shorten(event.content)}`
    case 'tool_call':
      return `[${ts}] TOOL_CALL step=${event.step} id=${event.id} tool=${event.tool} input=${shorten(JSON.stringify(event.input), 200)}`
    case 'tool_result':
      return `[${ts}] TOOL_RESULT step=${event.step} id=${event.id} tool=${event.tool} ok=${event.ok}\n${shorten(event.output)}`
    case 'final':
      return `[${ts}] FINAL step=${event.step} chars=${event.content.length}`
  }
}

/** Renders agent events as diagnostic lines; the sink decides where they go. */
export class LogSubscriber {
  private readonly clock: () => number
  private startedAtMs: number | undefined
  private lastEventAtMs: number | undefined

  constructor(
    private readonly sink: LogSink,
    private readonly options: LogSubscriberOptions = {}
  ) {
    this.clock = options.clock ?? Date.now
  }

  handle(event: AgentEvent): void {
    if (event.type === 'model_request' && !this.options.debug) return
    if (event.type === 'model_response' && !this.options.verboseModel) return

    const nowMs = this.clock()
    const base = baseEventLine(event, new Date(nowMs).toISOString())
    if (!this.options.debug) {
      this.sink(base)
      return
    }

    const startedAt = this.startedAtMs ?? nowMs
    const deltaMs = nowMs - (this.lastEventAtMs ?? nowMs)
    this.startedAtMs = startedAt
    this.lastEventAtMs = nowMs
    this.sink(`[debug +${deltaMs}ms total=${nowMs - startedAt}ms] ${base}`)
  }
}
