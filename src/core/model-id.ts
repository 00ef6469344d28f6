import {ValidationError} from './errors.js'

export type ModelId = {
  provider: string
  model: string
}

/**
 * Splits a `"provider:model"` string at the first colon. The model part may itself
 * contain colons (e.g. `ollama:llama3:8b`).
 */
export function parseModelId(value: string): ModelId {
  const separator = value.indexOf(':')
  if (separator < 0) {
    throw new ValidationError(`Model id '${value}' must look like 'provider:model'`)
  }
  const provider = value.slice(0, separator).trim().toLowerCase()
  const model = value.slice(separator + 1).trim()
  if (!provider || !model) {
    throw new ValidationError(`Model id '${value}' must name both a provider and a model`)
  }
  return {provider, model}
}

export function formatModelId(id: ModelId): string {
  return `${id.provider}:${id.model}`
}
