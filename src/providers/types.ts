import type {JsonObject, JsonValue} from '../core/json.js'
import type {Message} from '../core/message.js'
import type {RequestConfig} from '../core/request-config.js'
import type {ToolDefinition} from '../core/tool.js'

export type ResponseFormat = {type: 'json'} | {type: 'json_schema'; schema: JsonObject; name?: string}

export type ProviderRequest = {
  model: string
  messages: readonly Message[]
  config: RequestConfig
  tools?: readonly ToolDefinition[]
  responseFormat?: ResponseFormat
  signal?: AbortSignal
}

export type ProviderToolCall = {
  id: string
  name: string
  arguments: JsonValue
  /** The vendor's argument text, set only when it could not be parsed as JSON. */
  rawArguments?: string
}

export type ProviderUsage = {
  promptTokens: number
  outputTokens: number
  /** Left undefined when the vendor does not report a total. */
  totalTokens?: number
}

export type ProviderReply = {
  content: string
  finishReason: string
  usage?: ProviderUsage
  toolCalls?: ProviderToolCall[]
  structured?: JsonValue
  responseId?: string
  /** Model name echoed by the vendor, if it differs from the requested one. */
  model?: string
}

export interface LLMProvider {
  readonly name: string
  completeChat(request: ProviderRequest): Promise<ProviderReply>
}
