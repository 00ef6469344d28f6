import {ValidationError} from '../core/errors.js'
import type {ModelId} from '../core/model-id.js'
import {MockProvider} from './mock-provider.js'
import {OpenAIProvider} from './openai-provider.js'
import type {LLMProvider} from './types.js'

/** Opaque pass-through settings for the adapter; the core never reads them. */
export type ProviderOverrides = {
  apiKey?: string
  baseUrl?: string
  timeoutMs?: number
}

type OpenAICompatibleVendor = {
  apiKeyEnv: string
  baseUrlEnv: string
  defaultBaseUrl?: string
}

const OPENAI_COMPATIBLE: Record<string, OpenAICompatibleVendor> = {
  openai: {apiKeyEnv: 'OPENAI_API_KEY', baseUrlEnv: 'OPENAI_BASE_URL'},
  openrouter: {
    apiKeyEnv: 'OPENROUTER_API_KEY',
    baseUrlEnv: 'OPENROUTER_BASE_URL',
    defaultBaseUrl: 'https://openrouter.ai/api/v1'
  }
}

export const SUPPORTED_PROVIDERS = ['mock', ...Object.keys(OPENAI_COMPATIBLE)]

function nonEmpty(value?: string): string | undefined {
  if (!value) return undefined
  const trimmed = value.trim()
  return trimmed.length > 0 ? trimmed : undefined
}

export function createProvider(id: ModelId, overrides: ProviderOverrides = {}): LLMProvider {
  if (id.provider === 'mock') return new MockProvider()

  const vendor = OPENAI_COMPATIBLE[id.provider]
  if (!vendor) {
    throw new ValidationError(
      `Provider '${id.provider}' is not supported. Use one of: ${SUPPORTED_PROVIDERS.join(', ')}`
    )
  }

  const apiKey = nonEmpty(overrides.apiKey) ?? nonEmpty(process.env[vendor.apiKeyEnv])
  if (!apiKey) {
    throw new ValidationError(`${vendor.apiKeyEnv} is missing. Set it in your environment or .env file.`)
  }

  return new OpenAIProvider({
    apiKey,
    name: id.provider,
    baseUrl: nonEmpty(overrides.baseUrl) ?? nonEmpty(process.env[vendor.baseUrlEnv]) ?? vendor.defaultBaseUrl,
    timeoutMs: overrides.timeoutMs
  })
}
