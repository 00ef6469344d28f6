import {randomUUID} from 'node:crypto'
import {getExchangeLogPath} from '../config/paths.js'
import type {AppConfig} from '../config/schema.js'
import type {LLMProvider} from '../providers/types.js'
import {InMemoryEventBus} from './event-bus.js'
import type {ClientEvent} from './events.js'
import {LLM} from './llm.js'
import {parseModelId} from './model-id.js'
import {ExchangeLogSubscriber} from './subscribers/exchange-log-subscriber.js'
import {UsageSubscriber} from './subscribers/usage-subscriber.js'

export type Runtime = {
  sessionId: string
  llm: LLM
  bus: InMemoryEventBus<ClientEvent>
  usage: UsageSubscriber
  exchangeLog?: ExchangeLogSubscriber
  close(): Promise<void>
}

type RuntimeOverrides = {
  model?: string
  provider?: LLMProvider
}

/** Builds an LLM session from resolved config with usage tracking and, if enabled, an exchange log. */
export function openRuntime(config: AppConfig, overrides: RuntimeOverrides = {}): Runtime {
  const sessionId = randomUUID()
  const bus = new InMemoryEventBus<ClientEvent>()
  const usage = new UsageSubscriber()
  const unsubscribers = [bus.subscribe((event) => usage.handle(event))]

  let exchangeLog: ExchangeLogSubscriber | undefined
  if (config.logging.exchanges) {
    const log = new ExchangeLogSubscriber(getExchangeLogPath(sessionId, config.homeDir), sessionId)
    unsubscribers.push(
      bus.subscribe((event) => {
        void log.handle(event)
      })
    )
    exchangeLog = log
  }

  const model = overrides.model ?? config.model
  const llm = new LLM(model, {
    // `baseURL` names the OpenAI endpoint; other vendors keep their own base url.
    baseUrl: parseModelId(model).provider === 'openai' ? config.baseURL : undefined,
    timeoutMs: config.runtime.timeoutMs,
    provider: overrides.provider,
    config: config.request,
    bus
  })

  return {
    sessionId,
    llm,
    bus,
    usage,
    exchangeLog,
    async close() {
      for (const unsubscribe of unsubscribers) unsubscribe()
      await exchangeLog?.flush()
    }
  }
}
