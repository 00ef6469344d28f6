import {cosmiconfig} from 'cosmiconfig'
import dotenv from 'dotenv'
import {ValidationError, formatZodError} from '../core/errors.js'
import {isJsonObject, type JsonObject} from '../core/json.js'
import {DEFAULT_MODEL, appConfigSchema, type AppConfig} from './schema.js'
import {getGlobalEnvPath} from './paths.js'

let envLoaded = false

function loadEnvFiles(): void {
  if (envLoaded) return
  envLoaded = true
  dotenv.config({path: getGlobalEnvPath()})
  dotenv.config()
}

function nonEmpty(value?: string): string | undefined {
  if (!value) return undefined
  const trimmed = value.trim()
  return trimmed.length > 0 ? trimmed : undefined
}

function positiveIntFromEnv(name: string): number | undefined {
  const parsed = Number.parseInt(process.env[name] ?? '', 10)
  return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined
}

function booleanFromEnv(name: string): boolean | undefined {
  const raw = nonEmpty(process.env[name])?.toLowerCase()
  if (!raw) return undefined
  if (raw === '1' || raw === 'true' || raw === 'yes' || raw === 'on') return true
  if (raw === '0' || raw === 'false' || raw === 'no' || raw === 'off') return false
  return undefined
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === 'string' ? nonEmpty(value) : undefined
}

function section(value: unknown): JsonObject {
  return isJsonObject(value) ? value : {}
}

/**
 * Resolves config from the nearest `tooltalk` cosmiconfig file, then lets environment
 * variables override individual settings.
 */
export async function loadConfig(searchFrom?: string): Promise<AppConfig> {
  loadEnvFiles()
  const explorer = cosmiconfig('tooltalk')
  const result = await explorer.search(searchFrom)
  const base: unknown = result?.config ?? {}
  const baseObject = section(base)
  const baseRuntime = section(baseObject.runtime)
  const baseLogging = section(baseObject.logging)

  const timeoutMs = positiveIntFromEnv('TOOLTALK_TIMEOUT_MS')
  const maxToolRounds = positiveIntFromEnv('TOOLTALK_MAX_TOOL_ROUNDS')
  const logExchanges = booleanFromEnv('TOOLTALK_LOG_EXCHANGES')

  const merged: Record<string, unknown> = {
    ...baseObject,
    model: nonEmpty(process.env.TOOLTALK_MODEL) ?? nonEmptyString(baseObject.model) ?? DEFAULT_MODEL,
    baseURL: nonEmpty(process.env.OPENAI_BASE_URL) ?? baseObject.baseURL,
    ...(nonEmpty(process.env.TOOLTALK_HOME) ? {homeDir: nonEmpty(process.env.TOOLTALK_HOME)} : {}),
    runtime: {
      ...baseRuntime,
      ...(timeoutMs ? {timeoutMs} : {}),
      ...(maxToolRounds ? {maxToolRounds} : {})
    },
    logging: {
      ...baseLogging,
      ...(logExchanges !== undefined ? {exchanges: logExchanges} : {})
    }
  }

  const parsed = appConfigSchema.safeParse(merged)
  if (!parsed.success) {
    const source = result?.filepath ?? 'environment'
    throw new ValidationError(`Invalid config (${source}): ${formatZodError(parsed.error)}`, parsed.error)
  }
  return parsed.data
}
