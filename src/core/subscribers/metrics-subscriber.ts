import type {AgentEvent} from '../agent.js'

export type RunMetrics = {
  model: string
  turns: number
  toolCalls: number
  toolFailures: number
  toolCallsByName: Record<string, number>
  elapsedMs: number
}

/** Tallies one run's events in memory; `snapshot()` is read once the run ends. */
export class MetricsSubscriber {
  private startedAtMs: number | undefined
  private lastEventAtMs: number | undefined
  private model = 'unknown'
  private turns = 0
  private toolCalls = 0
  private toolFailures = 0
  private readonly toolCallsByName = new Map<string, number>()

  constructor(private readonly clock: () => number = Date.now) {}

  handle(event: AgentEvent): void {
    const nowMs = this.clock()
    this.lastEventAtMs = nowMs

    switch (event.type) {
      case 'start':
        this.startedAtMs = nowMs
        this.model = event.model
        break
      case 'model_response':
        this.turns += 1
        break
      case 'tool_call':
        this.toolCalls += 1
        this.toolCallsByName.set(event.tool, (this.toolCallsByName.get(event.tool) ?? 0) + 1)
        break
      case 'tool_result':
        if (!event.ok) this.toolFailures += 1
        break
    }
  }

  snapshot(): RunMetrics {
    const startedAt = this.startedAtMs ?? this.clock()
    return {
      model: this.model,
      turns: this.turns,
      toolCalls: this.toolCalls,
      toolFailures: this.toolFailures,
      toolCallsByName: Object.fromEntries(this.toolCallsByName),
      elapsedMs: (this.lastEventAtMs ?? startedAt) - startedAt
    }
  }
}

export function formatMetrics(metrics: RunMetrics): string {
  const byTool = Object.entries(metrics.toolCallsByName)
    .map(([name, count]) => `${name}=${count}`)
    .join(',')
  return `METRICS model=${metrics.model} turns=${metrics.turns} tool_calls=${metrics.toolCalls} tool_failures=${metrics.toolFailures} by_tool=${byTool || '-'} elapsed_ms=${metrics.elapsedMs}`
}
