import {ValidationError, errorMessage} from './errors.js'

export type JsonPrimitive = null | boolean | number | string

export type JsonValue = JsonPrimitive | readonly JsonValue[] | JsonObject

export type JsonObject = {readonly [key: string]: JsonValue}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true
  switch (typeof value) {
    case 'boolean':
    case 'string':
      return true
    case 'number':
      return Number.isFinite(value)
    case 'object':
      if (Array.isArray(value)) return value.every((item) => isJsonValue(item))
      return Object.values(value).every((item) => isJsonValue(item))
    default:
      return false
  }
}

/** Recursively copies and freezes a JSON value so callers cannot mutate shared state. */
export function freezeJson<T extends JsonValue>(value: T): T {
  return deepFreeze(structuredClone(value))
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const item of Object.values(value)) deepFreeze(item)
    Object.freeze(value)
  }
  return value
}

/**
 * Parses JSON text into a JsonValue. Returns `undefined` when the text is not valid JSON.
 */
export function tryParseJson(text: string): JsonValue | undefined {
  try {
    const parsed: unknown = JSON.parse(text)
    return isJsonValue(parsed) ? parsed : undefined
  } catch {
    return undefined
  }
}

/** Parses JSON text from an external source, raising ValidationError on malformed input. */
export function parseJsonText(text: string, what: string): unknown {
  try {
    return JSON.parse(text)
  } catch (error) {
    throw new ValidationError(`Invalid ${what} JSON: ${errorMessage(error)}`, error)
  }
}
