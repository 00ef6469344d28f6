import {createProvider, type ProviderOverrides} from '../providers/factory.js'
import type {LLMProvider} from '../providers/types.js'
import {PlainBuilder, StructuredBuilder, ToolBuilder, type SessionContext, type ToolInput} from './builders.js'
import type {EventBus} from './event-bus.js'
import type {ClientEvent} from './events.js'
import type {JsonObject} from './json.js'
import {parseModelId} from './model-id.js'
import type {RequestConfig} from './request-config.js'

export type LLMOptions = ProviderOverrides & {
  /** Use this provider instead of resolving one from the model id. */
  provider?: LLMProvider
  bus?: EventBus<ClientEvent>
  config?: RequestConfig
}

function createSession(modelId: string, options: LLMOptions): SessionContext {
  const id = parseModelId(modelId)
  return {
    modelId: id,
    provider:
      options.provider ??
      createProvider(id, {apiKey: options.apiKey, baseUrl: options.baseUrl, timeoutMs: options.timeoutMs}),
    bus: options.bus
  }
}

/**
 * Entry point for one model. Completes plain conversations itself and hands out
 * structured-output and tool-calling builders that start from its current config.
 *
 * @example
 * const llm = new LLM('openai:gpt-4o-mini').setTemperature(0)
 * const reply = await llm.complete(new MessageCollection().appendUser('Hello'))
 */
export class LLM extends PlainBuilder {
  constructor(modelId: string, options: LLMOptions = {}) {
    super(createSession(modelId, options), options.config)
  }

  structured(schema?: JsonObject | string): StructuredBuilder {
    return new StructuredBuilder(this.session, this.getConfig(), schema)
  }

  withTools(tools: readonly ToolInput[] = []): ToolBuilder {
    return new ToolBuilder(this.session, this.getConfig(), tools)
  }

  getProviderName(): string {
    return this.session.provider.name
  }
}
