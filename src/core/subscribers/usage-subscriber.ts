import type {ClientEvent} from '../events.js'
import {Usage} from '../usage.js'

export type ModelUsageSummary = {
  provider: string
  model: string
  requests: number
  errors: number
  toolCalls: number
  usage: Usage
  totalDurationMs: number
}

/** Aggregates token usage, tool calls and failures per provider/model pair. */
export class UsageSubscriber {
  private readonly byModel = new Map<string, ModelUsageSummary>()

  handle(event: ClientEvent): void {
    const key = `${event.provider}:${event.model}`
    const state = this.byModel.get(key) ?? {
      provider: event.provider,
      model: event.model,
      requests: 0,
      errors: 0,
      toolCalls: 0,
      usage: Usage.empty(),
      totalDurationMs: 0
    }

    switch (event.type) {
      case 'request_start':
        state.requests += 1
        break
      case 'response':
        state.toolCalls += event.toolCallCount
        state.usage = state.usage.add(
          new Usage(event.usage.prompt_tokens, event.usage.output_tokens, event.usage.total_tokens)
        )
        state.totalDurationMs += event.durationMs
        break
      case 'error':
        state.errors += 1
        state.totalDurationMs += event.durationMs
        break
    }

    this.byModel.set(key, state)
  }

  snapshot(): ModelUsageSummary[] {
    return [...this.byModel.values()].map((summary) => ({...summary}))
  }

  total(): Usage {
    return this.snapshot().reduce((sum, summary) => sum.add(summary.usage), Usage.empty())
  }
}
